import { describe, expect, it } from 'vitest';
import { nonEmpty, parsePositiveNumber } from './parse.js';

describe('nonEmpty', () => {
  it('trims values', () => {
    expect(nonEmpty('  PirateBot ')).toBe('PirateBot');
  });

  it('returns undefined for missing or blank values', () => {
    expect(nonEmpty()).toBeUndefined();
    expect(nonEmpty('   ')).toBeUndefined();
  });
});

describe('parsePositiveNumber', () => {
  it('accepts positive numbers and numeric strings', () => {
    expect(parsePositiveNumber(3)).toBe(3);
    expect(parsePositiveNumber('1.5')).toBe(1.5);
  });

  it('rejects zero, negatives, junk and other types', () => {
    expect(parsePositiveNumber(0)).toBeUndefined();
    expect(parsePositiveNumber('-3')).toBeUndefined();
    expect(parsePositiveNumber('3 minutes')).toBeUndefined();
    expect(parsePositiveNumber('')).toBeUndefined();
    expect(parsePositiveNumber(true)).toBeUndefined();
    expect(parsePositiveNumber(undefined)).toBeUndefined();
  });
});
