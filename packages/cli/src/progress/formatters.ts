/**
 * Output formatting utilities
 */

import { coveredText, type AggregateResult, type RunStatus, type StageRecord } from '@annotext/core';
import { ANNOTATION_KINDS, type AnnotationKind, type Span } from '@annotext/types';
import chalk from 'chalk';

import type { AnnotextConfig, StageKey } from '../config/schema.js';
import type { RunReport } from '../orchestrator/orchestrator.js';
import type { SkippedSeed } from '../orchestrator/seeds.js';

import type { ColorFunctions } from './types.js';

const QUOTE_LENGTH = 60;

const KIND_LABELS: Record<AnnotationKind, string> = {
  sentiment: 'Sentiment',
  hate_verdict: 'Hate verdicts',
  claim: 'Claims',
  fact: 'Facts',
  fact_check_verdict: 'Fact-check verdicts',
};

const STAGE_LABELS: Record<StageKey, string> = {
  sentiment: 'Sentiment',
  hateCheck: 'Hate check',
  factCheck: 'Fact check',
};

/**
 * Color functions that are either chalk or the identity
 */
export function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: AnnotextConfig): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Configuration:'));
  lines.push('');

  lines.push(chalk.dim('Pipeline:'));
  lines.push(`  Language: ${config.pipeline.language}`);
  lines.push(`  Deadline: ${formatDuration(config.pipeline.deadlineMs)}`);
  lines.push(`  Duplicate policy: ${config.pipeline.duplicatePolicy}`);
  lines.push(`  Span strategy: ${config.pipeline.spanStrategy}`);
  lines.push(`  Order: ${config.pipeline.order.join(' → ')}`);
  lines.push('');

  lines.push(chalk.dim('Stages:'));
  for (const key of config.pipeline.order) {
    const stage = config.stages[key];
    const state = stage.enabled ? '' : ` ${chalk.yellow('(disabled)')}`;
    lines.push(`  ${STAGE_LABELS[key]}: ${stage.endpoint}${state}`);
    lines.push(`    Scale: ${stage.scale}, timeout: ${formatDuration(stage.timeoutMs)}`);
    if (stage.continueOnError) {
      lines.push(`    Continue on error: ${chalk.yellow('yes')}`);
    }
    const parameters = Object.keys(stage.parameters);
    if (parameters.length > 0) {
      lines.push(`    Parameters: ${parameters.join(', ')}`);
    }
  }
  lines.push(`  Sentiment model: ${config.stages.sentiment.modelName}`);
  lines.push('');

  lines.push(chalk.dim('Output:'));
  lines.push(`  JSON: ${config.output.json}`);
  lines.push(`  Color: ${config.output.color}`);

  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Collapse whitespace and cut `text` to at most `max` characters
 */
export function truncate(text: string, max: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  if (flat.length <= max) {
    return flat;
  }
  return `${flat.slice(0, Math.max(max - 1, 0))}…`;
}

/**
 * Half-open span notation
 */
export function formatSpan(span: Span): string {
  return `[${span.begin}, ${span.end})`;
}

function quote(text: string, span: Span): string {
  return `"${truncate(coveredText(text, span), QUOTE_LENGTH)}"`;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * One line per stage record
 */
export function formatStageRecord(record: StageRecord, c: ColorFunctions): string {
  const duration = c.dim(` (${formatDuration(record.durationMs)})`);
  const reason = record.error ? `: ${record.error.message}` : '';

  switch (record.status) {
    case 'completed':
      return `${c.green('✓')} ${record.name}: ${plural(record.annotationsAdded, 'annotation')}${duration}`;
    case 'skipped':
      return `${c.yellow('~')} ${record.name}: skipped${reason}${duration}`;
    case 'failed':
      return `${c.red('✗')} ${record.name}: failed${reason}${duration}`;
    case 'not_run':
      return `${c.dim('-')} ${record.name}: not run`;
  }
}

/**
 * Human-readable run summary
 */
export function formatSummary(
  report: RunReport,
  c: ColorFunctions = createColorFns(false),
): string {
  const { run, summary, document } = report;
  const lines: string[] = [];

  const status = run.status === 'completed' ? c.green(run.status) : c.red(run.status);
  lines.push(c.bold('Summary:'));
  lines.push(`  Status: ${status} (${formatDuration(run.durationMs)})`);
  if (run.error) {
    lines.push(`  Error: ${c.red(run.error.message)}`);
  }
  lines.push(`  Annotations: ${summary.total}`);
  for (const kind of ANNOTATION_KINDS) {
    if (summary.counts[kind] > 0) {
      lines.push(`    ${KIND_LABELS[kind]}: ${summary.counts[kind]}`);
    }
  }
  if (report.seeded > 0 || report.skippedSeeds.length > 0) {
    const skipped = report.skippedSeeds.length;
    lines.push(
      `  Seeded claims: ${report.seeded}${skipped > 0 ? c.yellow(` (${skipped} skipped)`) : ''}`,
    );
  }

  if (run.stages.length > 0) {
    lines.push('');
    lines.push(c.bold('Stages:'));
    for (const record of run.stages) {
      lines.push(`  ${formatStageRecord(record, c)}`);
    }
  }

  if (summary.sentiments.length > 0) {
    lines.push('');
    lines.push(c.bold('Sentiment:'));
    for (const sentiment of summary.sentiments) {
      lines.push(
        `  ${formatSpan(sentiment.span)} ${sentiment.label} ${sentiment.score.toFixed(2)} ${c.dim(quote(document.text, sentiment.span))}`,
      );
    }
  }

  if (summary.hateVerdicts.length > 0) {
    lines.push('');
    lines.push(c.bold('Hate speech:'));
    for (const verdict of summary.hateVerdicts) {
      const flag = verdict.flagged ? ` ${c.red('FLAGGED')}` : '';
      lines.push(
        `  ${formatSpan(verdict.span)} hate ${verdict.hate.toFixed(2)}, non-hate ${verdict.nonHate.toFixed(2)}${flag}`,
      );
    }
  }

  if (summary.factChecks.length > 0) {
    lines.push('');
    lines.push(c.bold('Fact checks:'));
    for (const check of summary.factChecks) {
      lines.push(
        `  "${truncate(check.claim, QUOTE_LENGTH)}" vs "${truncate(check.fact, QUOTE_LENGTH)}": ${check.consistency.toFixed(2)} ${check.assessment.replace(/_/g, ' ')}`,
      );
    }
  }

  return lines.join('\n');
}

/**
 * Stage record with the error reduced to its message
 */
export interface JsonStageRecord {
  name: string;
  status: StageRecord['status'];
  durationMs: number;
  annotationsAdded: number;
  error?: string;
}

/**
 * Serializable run report
 */
export interface JsonReport
  extends Omit<AggregateResult, 'status' | 'stages'> {
  status: RunStatus;
  durationMs: number;
  error?: string;
  stages: JsonStageRecord[];
  skippedSeeds: SkippedSeed[];
}

/**
 * Reduce a run report to plain data
 */
export function toJsonReport(report: RunReport): JsonReport {
  const { run, summary } = report;
  const json: JsonReport = {
    status: run.status,
    durationMs: run.durationMs,
    stages: run.stages.map((record) => {
      const stage: JsonStageRecord = {
        name: record.name,
        status: record.status,
        durationMs: record.durationMs,
        annotationsAdded: record.annotationsAdded,
      };
      if (record.error) {
        stage.error = record.error.message;
      }
      return stage;
    }),
    total: summary.total,
    counts: summary.counts,
    sentiments: summary.sentiments,
    hateVerdicts: summary.hateVerdicts,
    factChecks: summary.factChecks,
    claims: summary.claims,
    skippedSeeds: report.skippedSeeds,
  };
  if (run.error) {
    json.error = run.error.message;
  }
  return json;
}

/**
 * Pretty-printed JSON run report
 */
export function formatJson(report: RunReport): string {
  return JSON.stringify(toJsonReport(report), null, 2);
}
