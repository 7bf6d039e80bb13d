/**
 * Population Manager
 *
 * Holds the ordered set of candidates for one generation:
 * - Seeding and reinitialization from a base candidate
 * - Sequential scoring, with failures recorded as WORST_SCORE
 * - Ranking and summary statistics over index-aligned scores
 */

import { PopulationSizeError, errorMessage } from './errors.js';
import { Logger, silentLogger } from './logger.js';
import {
  Candidate,
  Dataset,
  RuntimeSettings,
  Score,
  ScoredCandidate,
  WORST_SCORE,
} from './types.js';

export interface PopulationStats {
  size: number;
  evaluated: number;
  failed: number;
  bestScore: Score;
  meanScore: Score;
  worstScore: Score;
}

export class Population {
  private members: Candidate[];
  readonly targetSize: number;

  constructor(members: Candidate[], targetSize: number = members.length) {
    this.members = [...members];
    this.targetSize = targetSize;
  }

  /**
   * `size` independent clones of the base candidate
   */
  static seed(base: Candidate, size: number): Population {
    return new Population(
      Array.from({ length: size }, () => base.clone()),
      size
    );
  }

  /**
   * Get all candidates in order
   */
  getAll(): Candidate[] {
    return [...this.members];
  }

  size(): number {
    return this.members.length;
  }

  /**
   * Replace every member with fresh clones of the base candidate
   */
  reinitialize(base: Candidate): void {
    this.members = Array.from({ length: this.targetSize }, () => base.clone());
  }

  replace(members: Candidate[]): void {
    this.members = [...members];
    this.assertSize();
  }

  assertSize(): void {
    if (this.members.length !== this.targetSize) {
      throw new PopulationSizeError(this.members.length, this.targetSize);
    }
  }

  /**
   * Score each candidate in turn. A throwing or non-numeric evaluation
   * becomes WORST_SCORE for that candidate only.
   */
  async evaluate(
    data: Dataset,
    settings: RuntimeSettings,
    logger: Logger = silentLogger
  ): Promise<ScoredCandidate[]> {
    const scored: ScoredCandidate[] = [];
    for (const [index, candidate] of this.members.entries()) {
      const score = await scoreCandidate(candidate, data, settings, logger);
      scored.push({ index, candidate, score });
    }
    return scored;
  }

  /**
   * Train each candidate in turn, logging and skipping failures
   */
  async train(
    data: Dataset,
    settings: RuntimeSettings,
    logger: Logger = silentLogger
  ): Promise<number> {
    let failures = 0;
    for (const candidate of this.members) {
      try {
        await candidate.train(data, settings);
      } catch (error) {
        failures++;
        logger.warn(`Training failed for ${candidate.id}: ${errorMessage(error)}`);
      }
    }
    return failures;
  }
}

/**
 * Evaluate one candidate, substituting WORST_SCORE on failure
 */
export async function scoreCandidate(
  candidate: Candidate,
  data: Dataset,
  settings: RuntimeSettings,
  logger: Logger = silentLogger
): Promise<Score> {
  try {
    const score = await candidate.evaluate(data, settings);
    if (typeof score !== 'number' || Number.isNaN(score)) {
      logger.warn(`Evaluation of ${candidate.id} returned a non-numeric score`);
      return WORST_SCORE;
    }
    return score;
  } catch (error) {
    logger.warn(`Evaluation failed for ${candidate.id}: ${errorMessage(error)}`);
    return WORST_SCORE;
  }
}

/**
 * Lowest score first; ties keep population order
 */
export function rankByScore(scored: readonly ScoredCandidate[]): ScoredCandidate[] {
  return [...scored].sort((a, b) => a.score - b.score || a.index - b.index);
}

export function getBest(scored: readonly ScoredCandidate[]): ScoredCandidate | null {
  return rankByScore(scored)[0] ?? null;
}

/**
 * Summary statistics over finite scores
 */
export function getStats(scored: readonly ScoredCandidate[]): PopulationStats {
  const finite = scored.map((s) => s.score).filter((score) => Number.isFinite(score));
  return {
    size: scored.length,
    evaluated: finite.length,
    failed: scored.length - finite.length,
    bestScore: finite.length > 0 ? Math.min(...finite) : WORST_SCORE,
    meanScore:
      finite.length > 0 ? finite.reduce((a, b) => a + b, 0) / finite.length : WORST_SCORE,
    worstScore: finite.length > 0 ? Math.max(...finite) : WORST_SCORE,
  };
}
