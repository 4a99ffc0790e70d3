/**
 * fuzzy-match.test.ts
 *
 * Pins the fuzzy scorer: exact scores for the bonus and penalty rules, the
 * reported positions, and agreement with a plain case-insensitive
 * subsequence check.
 */

import { describe, it, expect } from 'vitest';
import { EMPTY_QUERY_SCORE, scoreFuzzyMatch } from '../fuzzy-match.js';

function isSubsequenceIgnoringCase(query: string, candidate: string): boolean {
  const q = query.toLowerCase();
  const c = candidate.toLowerCase();
  let index = 0;
  for (const ch of c) {
    if (index < q.length && ch === q[index]) index += 1;
  }
  return index === q.length;
}

describe('scoreFuzzyMatch', () => {
  it('returns the baseline score with no positions for an empty query', () => {
    expect(scoreFuzzyMatch('', 'Firefox')).toEqual({ score: EMPTY_QUERY_SCORE, positions: [] });
    expect(scoreFuzzyMatch('', '')).toEqual({ score: EMPTY_QUERY_SCORE, positions: [] });
  });

  it('scores a contiguous prefix match', () => {
    expect(scoreFuzzyMatch('fire', 'Firefox')).toEqual({ score: 87, positions: [0, 1, 2, 3] });
  });

  it('ignores case on both sides', () => {
    expect(scoreFuzzyMatch('FIRE', 'firefox')).toEqual(scoreFuzzyMatch('fire', 'Firefox'));
  });

  it('maps case folds that change length back onto the original string', () => {
    expect(scoreFuzzyMatch('i', 'İstanbul')).toEqual({ score: 16, positions: [0] });
    expect(scoreFuzzyMatch('st', 'İstanbul')).toEqual({ score: 29, positions: [1, 2] });
  });

  it('rewards word boundaries after separators', () => {
    expect(scoreFuzzyMatch('fb', 'foo_bar')).toEqual({ score: 38, positions: [0, 4] });
    expect(scoreFuzzyMatch('fb', 'foobar')).toEqual({ score: 32, positions: [0, 3] });
  });

  it('prefers a consecutive run over an earlier scattered one', () => {
    expect(scoreFuzzyMatch('abc', 'a_abc')).toEqual({ score: 64, positions: [2, 3, 4] });
  });

  it('picks the earliest position among equal-scoring single matches', () => {
    expect(scoreFuzzyMatch('a', 'banana')).toEqual({ score: 10, positions: [1] });
    expect(scoreFuzzyMatch('a', 'a_a')).toEqual({ score: 22, positions: [0] });
  });

  it('scores an exact match', () => {
    expect(scoreFuzzyMatch('ab', 'ab')).toEqual({ score: 46, positions: [0, 1] });
  });

  it('returns null when the query is not a subsequence', () => {
    expect(scoreFuzzyMatch('xf', 'firefox')).toBeNull();
    expect(scoreFuzzyMatch('firefox!', 'firefox')).toBeNull();
    expect(scoreFuzzyMatch('a', '')).toBeNull();
  });

  it('matches exactly when the query is a case-insensitive subsequence', () => {
    const pairs: Array<[string, string]> = [
      ['ff', 'Firefox'],
      ['fox', 'Firefox'],
      ['xo', 'Firefox'],
      ['term', 'Terminal'],
      ['tml', 'Terminal'],
      ['lt', 'Terminal'],
      ['rc', 'src/readme.md'],
    ];
    for (const [query, candidate] of pairs) {
      const match = scoreFuzzyMatch(query, candidate);
      expect(match !== null).toBe(isSubsequenceIgnoringCase(query, candidate));
      if (!match) continue;
      expect(match.positions).toHaveLength(query.length);
      match.positions.forEach((position, index) => {
        expect(candidate[position].toLowerCase()).toBe(query[index].toLowerCase());
        if (index > 0) expect(position).toBeGreaterThan(match.positions[index - 1]);
      });
    }
  });

  it('is deterministic', () => {
    const first = scoreFuzzyMatch('tml', 'Terminal');
    const second = scoreFuzzyMatch('tml', 'Terminal');
    expect(second).toEqual(first);
  });
});
