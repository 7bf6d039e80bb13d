/**
 * Evolution Engine
 *
 * Turns one scored generation into the next population:
 * 1. Select a diverse top-k set
 * 2. Refill to populationSize with crossover children of random parent pairs
 * 3. Mutate each child at a rate that rises with the spread of scores
 */

import { Logger, silentLogger } from '../logger.js';
import { getStats } from '../population.js';
import { Candidate, ControllerConfig, Score, ScoredCandidate } from '../types.js';
import { RandomSource, normalizeRandom, pickDistinctPair } from '../utils/random.js';
import { adaptiveMutationRate, crossoverBias } from './mutation.js';
import { DiversityRecord, selectDiverse } from './selection.js';

export type EvolutionSettings = Pick<
  ControllerConfig,
  'populationSize' | 'selectionTopK' | 'mutationRate' | 'diversityRate' | 'crossoverBias'
>;

export interface EvolutionOutcome {
  population: Candidate[];
  bestScore: Score;
  mutationRate: number;
  selected: DiversityRecord[];
  childrenCreated: number;
}

export class EvolutionEngine {
  private readonly random: RandomSource;
  private readonly logger: Logger;

  constructor(
    private readonly settings: EvolutionSettings,
    options: { random?: RandomSource; logger?: Logger } = {}
  ) {
    this.random = normalizeRandom(options.random);
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run selection and refill over an already scored population
   */
  evolve(scored: readonly ScoredCandidate[]): EvolutionOutcome {
    if (scored.length === 0) {
      throw new Error('Cannot evolve an empty population');
    }

    const { selected } = selectDiverse(
      scored,
      this.settings.selectionTopK,
      this.settings.diversityRate
    );
    const mutationRate = adaptiveMutationRate(
      this.settings.mutationRate,
      scored.map((s) => s.score)
    );

    const next: Candidate[] = selected.map((record) => record.candidate);
    let childrenCreated = 0;
    while (next.length < this.settings.populationSize) {
      next.push(this.breed(selected, mutationRate));
      childrenCreated++;
    }

    const bestScore = getStats(scored).bestScore;
    this.logger.info(
      `Selected ${selected.length}, bred ${childrenCreated} children ` +
        `(mutation rate ${mutationRate.toFixed(3)})`
    );

    return { population: next, bestScore, mutationRate, selected, childrenCreated };
  }

  private breed(parents: readonly DiversityRecord[], mutationRate: number): Candidate {
    if (parents.length === 1) {
      return parents[0].candidate.clone().mutate(mutationRate);
    }
    const [i, j] = pickDistinctPair(parents.length, this.random);
    const first = parents[i];
    const second = parents[j];
    const bias = crossoverBias(first.score, second.score, this.settings.crossoverBias);
    return first.candidate.crossover(second.candidate, bias).mutate(mutationRate);
  }
}
