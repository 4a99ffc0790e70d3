/**
 * Fuzzy subsequence scoring.
 *
 * A query matches a candidate when every query character appears in the
 * candidate, in order, ignoring case. Among all such subsequences the one with
 * the highest score is chosen by a dynamic program over
 * (query index, candidate index) with affine gap penalties, so the reported
 * positions are exactly the ones the score was computed from.
 *
 * Scoring:
 *   + SCORE_MATCH for every matched character
 *   + BONUS_BOUNDARY when the character starts the string or follows `/ _ - .` or a space
 *   + BONUS_CONSECUTIVE when it directly follows the previous match
 *   - PENALTY_GAP_START + PENALTY_GAP_EXTENSION * (gap - 1) between matches
 *   - one point per character before the first match (capped)
 *   - one point per unmatched candidate character (capped)
 */

const SCORE_MATCH = 16;
const BONUS_BOUNDARY = 8;
const BONUS_CONSECUTIVE = 6;
const PENALTY_GAP_START = 3;
const PENALTY_GAP_EXTENSION = 1;
const PENALTY_LEADING_MAX = 12;
const PENALTY_LENGTH_MAX = 20;

export const EMPTY_QUERY_SCORE = 0;

const BOUNDARY_CHARACTERS = new Set(['/', '_', '-', '.', ' ']);
const NO_SCORE = Number.NEGATIVE_INFINITY;

export interface FuzzyMatch {
  score: number;
  positions: number[];
}

interface FoldedText {
  units: string[];
  /** Index in the original string of each folded unit. */
  sources: number[];
}

// Folds one code point at a time. A fold that changes length ('İ' → 'i̇')
// maps all of its units back to the code point's first index.
function foldCase(value: string): FoldedText {
  const units: string[] = [];
  const sources: number[] = [];
  let index = 0;
  for (const ch of value) {
    const lower = ch.toLowerCase();
    const sameLength = lower.length === ch.length;
    for (let k = 0; k < lower.length; k += 1) {
      units.push(lower[k]);
      sources.push(sameLength ? index + k : index);
    }
    index += ch.length;
  }
  return { units, sources };
}

function isSubsequence(needle: string[], haystack: string[]): boolean {
  let needleIndex = 0;
  for (let i = 0; i < haystack.length && needleIndex < needle.length; i += 1) {
    if (haystack[i] === needle[needleIndex]) needleIndex += 1;
  }
  return needleIndex === needle.length;
}

function boundaryBonus(candidate: string, index: number): number {
  if (index === 0) return BONUS_BOUNDARY;
  return BOUNDARY_CHARACTERS.has(candidate[index - 1]) ? BONUS_BOUNDARY : 0;
}

export function scoreFuzzyMatch(query: string, candidate: string): FuzzyMatch | null {
  if (!query) return { score: EMPTY_QUERY_SCORE, positions: [] };

  const needle = foldCase(query).units;
  const folded = foldCase(candidate);
  const haystack = folded.units;
  const sources = folded.sources;
  const m = needle.length;
  const n = haystack.length;
  if (m > n || !isSubsequence(needle, haystack)) return null;

  const bonuses = sources.map((source, j) => {
    return j > 0 && sources[j - 1] === source ? 0 : boundaryBonus(candidate, source);
  });
  const predecessors: Int32Array[] = [];

  let previousRow: number[] = new Array<number>(n).fill(NO_SCORE);
  const firstPredecessors = new Int32Array(n).fill(-1);
  for (let j = 0; j < n; j += 1) {
    if (haystack[j] !== needle[0]) continue;
    previousRow[j] = SCORE_MATCH + bonuses[j] - Math.min(PENALTY_LEADING_MAX, j);
  }
  predecessors.push(firstPredecessors);

  for (let i = 1; i < m; i += 1) {
    const row = new Array<number>(n).fill(NO_SCORE);
    const rowPredecessors = new Int32Array(n).fill(-1);
    // Best score reachable through a gap of at least one character.
    let gapBest = NO_SCORE;
    let gapIndex = -1;

    for (let j = i; j < n; j += 1) {
      if (j >= 2) {
        gapBest -= PENALTY_GAP_EXTENSION;
        const opened = previousRow[j - 2] - PENALTY_GAP_START;
        if (opened > gapBest) {
          gapBest = opened;
          gapIndex = j - 2;
        }
      }

      if (haystack[j] !== needle[i]) continue;

      const consecutive = previousRow[j - 1] + BONUS_CONSECUTIVE;
      let best = gapBest;
      let from = gapIndex;
      if (consecutive >= gapBest) {
        best = consecutive;
        from = j - 1;
      }
      if (best === NO_SCORE) continue;

      row[j] = SCORE_MATCH + bonuses[j] + best;
      rowPredecessors[j] = from;
    }

    predecessors.push(rowPredecessors);
    previousRow = row;
  }

  let end = -1;
  let endScore = NO_SCORE;
  for (let j = 0; j < n; j += 1) {
    if (previousRow[j] > endScore) {
      endScore = previousRow[j];
      end = j;
    }
  }
  if (end < 0) return null;

  const foldedPositions = new Array<number>(m);
  let cursor = end;
  for (let i = m - 1; i >= 0; i -= 1) {
    foldedPositions[i] = cursor;
    cursor = predecessors[i][cursor];
  }
  const positions: number[] = [];
  for (const position of foldedPositions) {
    const source = sources[position];
    if (positions[positions.length - 1] !== source) positions.push(source);
  }

  return {
    score: endScore - Math.min(PENALTY_LENGTH_MAX, n - m),
    positions,
  };
}
