/**
 * Degradation Monitor
 *
 * Compares the generation's best score with the baseline recorded at the
 * first evaluation. drop = (baseline - current) / baseline.
 */

import { Logger, silentLogger } from './logger.js';
import { scoreCandidate } from './population.js';
import { Candidate, Dataset, RuntimeSettings, Score } from './types.js';

export const DEFAULT_DEGRADATION_THRESHOLD = 0.05;

export type DegradationResult =
  | { status: 'skipped'; reason: 'no-baseline' }
  | { status: 'checked'; degraded: boolean; dropFraction: number; score: Score };

export class DegradationMonitor {
  constructor(
    private readonly threshold: number = DEFAULT_DEGRADATION_THRESHOLD,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Evaluate the candidate on the validation set, then compare
   */
  async check(
    candidate: Candidate,
    validation: Dataset,
    baseline: Score | null,
    settings: RuntimeSettings
  ): Promise<DegradationResult> {
    if (!isUsableBaseline(baseline)) {
      return this.skip();
    }
    const score = await scoreCandidate(candidate, validation, settings, this.logger);
    return this.checkScore(score, baseline);
  }

  /**
   * Compare an already computed score
   */
  checkScore(score: Score, baseline: Score | null): DegradationResult {
    if (!isUsableBaseline(baseline)) {
      return this.skip();
    }
    const dropFraction = (baseline - score) / baseline;
    return {
      status: 'checked',
      degraded: dropFraction > this.threshold,
      dropFraction,
      score,
    };
  }

  private skip(): DegradationResult {
    this.logger.info('Degradation check skipped: no baseline yet');
    return { status: 'skipped', reason: 'no-baseline' };
  }
}

function isUsableBaseline(baseline: Score | null): baseline is Score {
  return baseline !== null && Number.isFinite(baseline) && baseline > 0;
}
