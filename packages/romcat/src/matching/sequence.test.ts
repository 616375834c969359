import { describe, it, expect } from 'vitest';
import {
  chineseNumeralToInt,
  extractSequelTokens,
  rewriteNumerals,
  romanToInt,
  sameTokens,
  tokensIntersect,
} from './sequence.js';

describe('chineseNumeralToInt', () => {
  it('reads single digits', () => {
    expect(chineseNumeralToInt('七')).toBe(7);
    expect(chineseNumeralToInt('两')).toBe(2);
  });

  it('reads tens', () => {
    expect(chineseNumeralToInt('十')).toBe(10);
    expect(chineseNumeralToInt('十二')).toBe(12);
    expect(chineseNumeralToInt('二十')).toBe(20);
    expect(chineseNumeralToInt('二十三')).toBe(23);
  });

  it('passes Arabic digits through', () => {
    expect(chineseNumeralToInt('3')).toBe(3);
  });

  it('returns undefined for anything else', () => {
    expect(chineseNumeralToInt('')).toBeUndefined();
    expect(chineseNumeralToInt('x')).toBeUndefined();
  });
});

describe('romanToInt', () => {
  it('is case-insensitive', () => {
    expect(romanToInt('vii')).toBe(7);
    expect(romanToInt('IX')).toBe(9);
    expect(romanToInt('XI')).toBeUndefined();
  });
});

describe('extractSequelTokens', () => {
  it('finds the same number written three ways', () => {
    expect([...extractSequelTokens('最终幻想七')]).toEqual(['7']);
    expect([...extractSequelTokens('Final Fantasy VII')]).toEqual(['7']);
    expect([...extractSequelTokens('ff7')]).toEqual(['7']);
  });

  it('ignores years and other long numbers', () => {
    expect(extractSequelTokens('FIFA 2002').size).toBe(0);
  });

  it('only matches Roman numerals as whole words', () => {
    expect(extractSequelTokens('alphax').size).toBe(0);
    expect([...extractSequelTokens('Street Fighter II Turbo')]).toEqual(['2']);
  });
});

describe('rewriteNumerals', () => {
  it('rewrites Roman and Chinese numerals as digits', () => {
    expect(rewriteNumerals('final fantasy vii')).toBe('final fantasy 7');
    expect(rewriteNumerals('最终幻想十二')).toBe('最终幻想12');
  });
});

describe('token set helpers', () => {
  it('compares sets', () => {
    expect(sameTokens(new Set(['1', '2']), new Set(['2', '1']))).toBe(true);
    expect(sameTokens(new Set(['1']), new Set(['1', '2']))).toBe(false);
    expect(tokensIntersect(new Set(['1']), new Set(['1', '2']))).toBe(true);
    expect(tokensIntersect(new Set(), new Set(['1']))).toBe(false);
  });
});
