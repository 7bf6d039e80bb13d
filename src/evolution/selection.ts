/**
 * Diversity-aware selection
 *
 * The best-scoring top-k form a reference set. Every candidate is then ranked
 * by its summed distance to that set, blended with its normalized score by
 * diversityRate. With diversityRate = 1 the ranking is by diversity alone, so
 * a distant but mediocre candidate can displace a top performer.
 */

import { rankByScore } from '../population.js';
import { ScoredCandidate } from '../types.js';

export interface DiversityRecord extends ScoredCandidate {
  diversity: number;
  rankKey: number;
}

export interface SelectionResult {
  reference: ScoredCandidate[];
  selected: DiversityRecord[];
}

export function selectDiverse(
  scored: readonly ScoredCandidate[],
  topK: number,
  diversityRate: number
): SelectionResult {
  const k = Math.min(Math.max(0, Math.floor(topK)), scored.length);
  const reference = rankByScore(scored).slice(0, k);

  const diversities = scored.map((entry) =>
    reference.reduce((sum, ref) => sum + entry.candidate.distance(ref.candidate), 0)
  );
  const maxDiversity = Math.max(0, ...diversities);
  const performance = normalizedPerformance(scored);

  const records: DiversityRecord[] = scored.map((entry, position) => {
    const diversity = diversities[position];
    const normalizedDiversity = maxDiversity > 0 ? diversity / maxDiversity : 0;
    return {
      ...entry,
      diversity,
      rankKey:
        diversityRate * normalizedDiversity + (1 - diversityRate) * performance[position],
    };
  });

  const selected = records
    .sort((a, b) => b.rankKey - a.rankKey || a.index - b.index)
    .slice(0, k);

  return { reference, selected };
}

/**
 * 1 for the best finite score, 0 for the worst or a failed evaluation
 */
function normalizedPerformance(scored: readonly ScoredCandidate[]): number[] {
  const finite = scored.map((s) => s.score).filter((score) => Number.isFinite(score));
  if (finite.length === 0) {
    return scored.map(() => 0);
  }
  const min = Math.min(...finite);
  const max = Math.max(...finite);
  return scored.map(({ score }) => {
    if (!Number.isFinite(score)) {
      return 0;
    }
    return max === min ? 1 : (max - score) / (max - min);
  });
}
