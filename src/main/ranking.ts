import { getTargetKey, type Candidate } from './types.js';

export interface UsageWeighting {
  bonusPerLaunch: number;
  bonusCap: number;
}

export const DEFAULT_USAGE_WEIGHTING: UsageWeighting = {
  bonusPerLaunch: 10,
  bonusCap: 50,
};

/**
 * Bonus added to the fuzzy score for an item launched `launchCount` times.
 * Linear up to the cap, so frequency never drowns out a strong textual match.
 */
export function usageBonus(launchCount: number, weighting: UsageWeighting = DEFAULT_USAGE_WEIGHTING): number {
  if (!Number.isFinite(launchCount) || launchCount <= 0) return 0;
  return Math.min(weighting.bonusCap, Math.floor(launchCount) * weighting.bonusPerLaunch);
}

export function compareCandidates(a: Candidate, b: Candidate): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.displayText !== b.displayText) return a.displayText < b.displayText ? -1 : 1;
  const keyA = getTargetKey(a.payload);
  const keyB = getTargetKey(b.payload);
  if (keyA === keyB) return 0;
  return keyA < keyB ? -1 : 1;
}

export function applyUsageWeight(
  candidates: Candidate[],
  getLaunchCount: (key: string) => number,
  weighting: UsageWeighting = DEFAULT_USAGE_WEIGHTING
): Candidate[] {
  return candidates.map((candidate) => {
    const bonus = usageBonus(getLaunchCount(getTargetKey(candidate.payload)), weighting);
    if (bonus === 0) return candidate;
    return { ...candidate, score: candidate.score + bonus };
  });
}

export function rankCandidates(candidates: Candidate[], limit: number): Candidate[] {
  return [...candidates].sort(compareCandidates).slice(0, Math.max(0, limit));
}

/**
 * Folds a newly streamed batch into an already ranked, already bounded list.
 */
export function mergeRankedCandidates(ranked: Candidate[], incoming: Candidate[], limit: number): Candidate[] {
  if (incoming.length === 0) return ranked;
  return rankCandidates([...ranked, ...incoming], limit);
}
