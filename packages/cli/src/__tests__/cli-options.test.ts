/**
 * CLI options parsing tests
 */

import { InvalidArgumentError } from 'commander';
import { describe, it, expect } from 'vitest';

import { createProgram, parseCliOptions, parsePositiveInt } from '../cli.js';

describe('parseCliOptions', () => {
  describe('file options', () => {
    it('should parse input option', () => {
      const result = parseCliOptions({ input: 'article.txt' });
      expect(result.input).toBe('article.txt');
    });

    it('should parse config option', () => {
      const result = parseCliOptions({ config: './my-config.json' });
      expect(result.config).toBe('./my-config.json');
    });

    it('should parse seed option', () => {
      const result = parseCliOptions({ seed: 'claims.json' });
      expect(result.seed).toBe('claims.json');
    });
  });

  describe('pipeline options', () => {
    it('should parse language', () => {
      expect(parseCliOptions({ lang: 'de' }).lang).toBe('de');
    });

    it('should parse deadline as number', () => {
      expect(parseCliOptions({ deadline: 60000 }).deadline).toBe(60000);
    });

    it('should ignore a deadline that is not a number', () => {
      expect(parseCliOptions({ deadline: '60000' }).deadline).toBeUndefined();
    });

    it('should parse continueOnError flag', () => {
      expect(parseCliOptions({ continueOnError: true }).continueOnError).toBe(true);
    });
  });

  describe('output flags', () => {
    it('should parse json flag', () => {
      expect(parseCliOptions({ json: true }).json).toBe(true);
    });

    it('should parse showConfig flag', () => {
      expect(parseCliOptions({ showConfig: true }).showConfig).toBe(true);
    });

    it('should parse dryRun flag', () => {
      expect(parseCliOptions({ dryRun: true }).dryRun).toBe(true);
    });
  });

  describe('color flag', () => {
    it('should set noColor when color is false', () => {
      expect(parseCliOptions({ color: false }).noColor).toBe(true);
    });

    it('should not set noColor when color is true', () => {
      expect(parseCliOptions({ color: true }).noColor).toBeUndefined();
    });
  });

  it('should return an empty object for no options', () => {
    expect(parseCliOptions({})).toEqual({});
  });
});

describe('parsePositiveInt', () => {
  it('should parse positive integers', () => {
    expect(parsePositiveInt('250')).toBe(250);
  });

  it('should reject zero, fractions and words', () => {
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('1.5')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('soon')).toThrow(InvalidArgumentError);
  });
});

describe('createProgram', () => {
  it('should define run and check commands', () => {
    const program = createProgram();
    expect(program.name()).toBe('annotext');
    expect(program.commands.map((command) => command.name())).toEqual(['run', 'check']);
  });

  it('should accept the run options', () => {
    const run = createProgram().commands.find((command) => command.name() === 'run');
    expect(run?.options.map((option) => option.long)).toEqual([
      '--input',
      '--config',
      '--seed',
      '--lang',
      '--deadline',
      '--continue-on-error',
      '--json',
      '--show-config',
      '--dry-run',
      '--no-color',
    ]);
  });
});
