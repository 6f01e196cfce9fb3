import { describe, it, expect } from 'vitest';

import {
  ExactSpanResolver,
  SentenceSpanResolver,
  createSpanResolver,
  findSentenceEnd,
  segmentSentences,
} from '../span/span-resolver.js';

const TEXT = 'Dr. Smith said the bridge opened in 1990. It is 2 km long! Is it safe? Nobody knows';

describe('segmentSentences', () => {
  it('should split on terminators followed by whitespace', () => {
    expect(segmentSentences(TEXT)).toEqual([
      { begin: 0, end: 41 },
      { begin: 42, end: 58 },
      { begin: 59, end: 70 },
      { begin: 71, end: 83 },
    ]);
  });

  it('should not split on decimals or known abbreviations', () => {
    const text = 'The index rose 3.5 percent, e.g. in March. Done.';

    expect(segmentSentences(text)).toEqual([
      { begin: 0, end: 42 },
      { begin: 43, end: 48 },
    ]);
  });

  it('should only treat whole words as abbreviations', () => {
    expect(segmentSentences('Casino. Next')).toEqual([
      { begin: 0, end: 7 },
      { begin: 8, end: 12 },
    ]);
  });

  it('should trim surrounding whitespace', () => {
    expect(segmentSentences('  Hi there  ')).toEqual([{ begin: 2, end: 10 }]);
    expect(segmentSentences('   ')).toEqual([]);
    expect(segmentSentences('')).toEqual([]);
  });

  it('should accept a custom abbreviation list', () => {
    expect(segmentSentences('Dr. Who', [])).toEqual([
      { begin: 0, end: 3 },
      { begin: 4, end: 7 },
    ]);
  });
});

describe('findSentenceEnd', () => {
  it('should return null when no terminator follows', () => {
    expect(findSentenceEnd(TEXT, 71)).toBeNull();
  });

  it('should return the offset past the terminator', () => {
    expect(findSentenceEnd(TEXT, 42)).toBe(58);
  });
});

describe('ExactSpanResolver', () => {
  const resolver = new ExactSpanResolver();

  it('should resolve to the anchor itself', () => {
    expect(resolver.resolve(TEXT, 'the bridge')).toEqual({ begin: 15, end: 25 });
  });

  it('should search from the given index', () => {
    expect(resolver.resolve('A cat. A dog.', 'A', 1)).toEqual({ begin: 7, end: 8 });
  });

  it('should return null for missing or empty anchors', () => {
    expect(resolver.resolve(TEXT, 'tunnel')).toBeNull();
    expect(resolver.resolve(TEXT, '')).toBeNull();
  });
});

describe('SentenceSpanResolver', () => {
  const resolver = new SentenceSpanResolver();

  it('should extend the anchor to the end of its sentence', () => {
    expect(resolver.resolve(TEXT, 'the bridge')).toEqual({ begin: 15, end: 41 });
  });

  it('should skip abbreviations inside the anchor', () => {
    expect(resolver.resolve(TEXT, 'Dr. Smith')).toEqual({ begin: 0, end: 41 });
  });

  it('should stop at a terminator that ends the anchor', () => {
    expect(resolver.resolve(TEXT, 'It is 2 km long!')).toEqual({ begin: 42, end: 58 });
  });

  it('should fall back to the anchor length without a terminator', () => {
    expect(resolver.resolve(TEXT, 'Nobody')).toEqual({ begin: 71, end: 77 });
  });

  it('should search from the given index', () => {
    expect(resolver.resolve('A cat. A dog.', 'A', 1)).toEqual({ begin: 7, end: 13 });
  });

  it('should return null when the anchor is missing', () => {
    expect(resolver.resolve(TEXT, 'tunnel')).toBeNull();
  });
});

describe('createSpanResolver', () => {
  it('should build the resolver for a strategy', () => {
    expect(createSpanResolver('exact')).toBeInstanceOf(ExactSpanResolver);
    expect(createSpanResolver('sentence')).toBeInstanceOf(SentenceSpanResolver);
  });
});
