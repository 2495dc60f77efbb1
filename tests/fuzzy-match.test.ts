import { describe, expect, it } from 'vitest';
import { findBestCompanyMatch, fuzzyMatchCompany, weightedRatio } from '../lib/fuzzyMatch';

describe('weightedRatio', () => {
  it('ignores case and punctuation', () => {
    expect(weightedRatio('Tata-Motors', 'tata motors')).toBe(100);
    expect(weightedRatio('', 'tata motors')).toBe(0);
  });
});

describe('fuzzyMatchCompany', () => {
  it('scores a name contained in a longer candidate at 90', () => {
    expect(fuzzyMatchCompany('Lupin', ['Lupin Limited'])).toEqual([['Lupin Limited', 90]]);
  });

  it('excludes an unrelated candidate', () => {
    expect(fuzzyMatchCompany('Lupin', ['Lupin Limited', 'Sun Pharma'])).toEqual([['Lupin Limited', 90]]);
  });

  it('ranks an exact match first', () => {
    const [first] = fuzzyMatchCompany('Tata Motors', ['Tata Steel', 'Tata Motors']);
    expect(first).toEqual(['Tata Motors', 100]);
  });

  it('normalizes the query before scoring', () => {
    expect(fuzzyMatchCompany('Lupin Ltd.', ['Lupin'])).toEqual([['Lupin', 100]]);
  });

  it('drops candidates below the threshold', () => {
    expect(fuzzyMatchCompany('Zzzz', ['Lupin Limited'])).toEqual([]);
    expect(fuzzyMatchCompany('Lupin', ['Lupin Limited'], 95)).toEqual([]);
  });

  it('returns nothing for an empty candidate list or an empty query', () => {
    expect(fuzzyMatchCompany('Lupin', [])).toEqual([]);
    expect(fuzzyMatchCompany('', ['Lupin Limited'])).toEqual([]);
  });

  it('returns at most ten matches in descending order', () => {
    const candidates = Array.from({ length: 15 }, (_, i) => `Lupin ${String.fromCharCode(97 + i)}`);
    const matches = fuzzyMatchCompany('Lupin', candidates);
    expect(matches).toHaveLength(10);
    const scores = matches.map(([, score]) => score);
    expect(scores).toEqual([...scores].sort((a, b) => b - a));
    expect(matches[0]).toEqual(['Lupin a', 95]);
  });
});

describe('findBestCompanyMatch', () => {
  it('returns the best candidate name', () => {
    expect(findBestCompanyMatch('Infosys', ['Wipro', 'Infosys Ltd'])).toBe('Infosys Ltd');
  });

  it('returns null when nothing clears the threshold', () => {
    expect(findBestCompanyMatch('Infosys', ['Wipro'])).toBeNull();
  });
});
