/**
 * Mutation and crossover parameters derived from the current generation's
 * scores. Nothing here re-evaluates a candidate.
 */

import { Score } from '../types.js';

/**
 * (mean - min) / (max - min) over finite scores; 0 when they all agree
 */
export function scoreSpread(scores: readonly Score[]): number {
  const finite = scores.filter((score) => Number.isFinite(score));
  if (finite.length === 0) {
    return 0;
  }
  const min = Math.min(...finite);
  const max = Math.max(...finite);
  if (max === min) {
    return 0;
  }
  const mean = finite.reduce((a, b) => a + b, 0) / finite.length;
  return (mean - min) / (max - min);
}

/**
 * base * (1 + spread), kept within [0, 1]
 */
export function adaptiveMutationRate(baseRate: number, scores: readonly Score[]): number {
  return Math.min(1, Math.max(0, baseRate * (1 + scoreSpread(scores))));
}

/**
 * Probability of taking each parameter from the first parent.
 * The lower-scoring parent gets `favoured`; equal scores split evenly.
 */
export function crossoverBias(first: Score, second: Score, favoured: number): number {
  if (first === second) {
    return 0.5;
  }
  return first < second ? favoured : 1 - favoured;
}
