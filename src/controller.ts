/**
 * Adaptive Controller
 *
 * Runs the control loop, one generation per call:
 * 1. Drift check every driftCheckFreq generations (reset on drift)
 * 2. Optional training pass
 * 3. Sequential evaluation on the validation split
 * 4. Baseline capture on the first evaluation
 * 5. Degradation check on the best candidate (reset on degradation)
 * 6. Evolution into the next population
 * 7. Scheduled reset every retrainingFreq generations
 * 8. Resource throttle check
 *
 * The generation budget belongs to the caller.
 */

import { assertCandidate } from './candidate.js';
import { resolveConfig } from './config.js';
import { DegradationMonitor } from './degradation.js';
import { DriftDetector } from './drift/detector.js';
import { TwoSampleTest } from './drift/ks-test.js';
import { EvolutionEngine } from './evolution/engine.js';
import { ConsoleEventSink, EventSink } from './events.js';
import { Logger, consoleLogger } from './logger.js';
import { Population, getBest, getStats } from './population.js';
import { ResourceSampler, ResourceThrottle } from './throttle.js';
import {
  Candidate,
  ControllerConfig,
  ControllerRunResult,
  DataSource,
  Dataset,
  GenerationResult,
  GenerationState,
  ResetReason,
  RuntimeSettings,
  ScoredCandidate,
  WORST_SCORE,
} from './types.js';
import { RandomSource } from './utils/random.js';

export interface ControllerOptions {
  events?: EventSink;
  logger?: Logger;
  random?: RandomSource;
  sampler?: ResourceSampler;
  driftTest?: TwoSampleTest;
}

export class AdaptiveController {
  private readonly config: ControllerConfig;
  private readonly base: Candidate;
  private readonly dataSource: DataSource;
  private readonly settings: RuntimeSettings;
  private readonly population: Population;
  private readonly driftDetector: DriftDetector;
  private readonly degradationMonitor: DegradationMonitor;
  private readonly engine: EvolutionEngine;
  private readonly throttle: ResourceThrottle;
  private readonly events: EventSink;
  private readonly logger: Logger;
  private state: Omit<GenerationState, 'throttled' | 'batchSize'>;
  private onProgress: ((result: GenerationResult) => void) | null = null;

  constructor(
    baseCandidate: unknown,
    dataSource: DataSource,
    config: Partial<ControllerConfig> = {},
    options: ControllerOptions = {}
  ) {
    assertCandidate(baseCandidate);
    this.base = baseCandidate;
    this.dataSource = dataSource;
    this.config = resolveConfig(config);
    this.logger = options.logger ?? consoleLogger;
    this.events = options.events ?? new ConsoleEventSink(this.logger);

    // Shared with every component that reads batch size
    this.settings = { batchSize: this.config.batchSize };

    this.population = Population.seed(this.base, this.config.populationSize);
    this.driftDetector = new DriftDetector({
      significance: this.config.driftSignificance,
      test: options.driftTest,
    });
    this.degradationMonitor = new DegradationMonitor(
      this.config.degradationThreshold,
      this.logger
    );
    this.engine = new EvolutionEngine(this.config, {
      random: options.random,
      logger: this.logger,
    });
    this.throttle = new ResourceThrottle(this.settings, {
      sampler: options.sampler,
      cpuThreshold: this.config.cpuThreshold,
      memoryThreshold: this.config.memoryThreshold,
      windowMs: this.config.samplingWindowMs,
      events: this.events,
      logger: this.logger,
    });

    this.state = {
      generation: 0,
      lastResetGeneration: 0,
      baseline: null,
      phase: 'idle',
    };
  }

  /**
   * Set progress callback, invoked after every generation
   */
  setProgressCallback(callback: (result: GenerationResult) => void): void {
    this.onProgress = callback;
  }

  /**
   * Run a fixed number of generations
   */
  async run(generations: number): Promise<ControllerRunResult> {
    const startTime = Date.now();
    const results: GenerationResult[] = [];

    for (let i = 0; i < generations; i++) {
      const result = await this.runGeneration();
      results.push(result);
      this.onProgress?.(result);
    }

    const last = results[results.length - 1];
    return {
      generations: results,
      population: this.population.getAll(),
      bestScore: last?.bestScore ?? WORST_SCORE,
      baseline: this.state.baseline,
      totalTimeMs: Date.now() - startTime,
    };
  }

  /**
   * Run a single generation
   */
  async runGeneration(): Promise<GenerationResult> {
    this.state.generation++;
    const generation = this.state.generation;
    const resets: ResetReason[] = [];

    try {
      const validation = await this.dataSource.validationSet();
      const driftDue = generation % this.config.driftCheckFreq === 0;
      const training =
        driftDue || this.config.trainCandidates
          ? await this.dataSource.trainingBatch(generation)
          : null;

      // 1. Drift
      if (driftDue && training) {
        this.state.phase = 'drift-check';
        this.checkDrift(generation, training, validation, resets);
      }

      // 2. Training
      if (this.config.trainCandidates && training) {
        await this.population.train(training, this.settings, this.logger);
      }

      // 3. Evaluation
      this.state.phase = 'evaluating';
      let scored = await this.population.evaluate(validation, this.settings, this.logger);
      const failedEvaluations = getStats(scored).failed;

      // 4. Baseline
      if (this.state.baseline === null) {
        const best = getStats(scored).bestScore;
        if (Number.isFinite(best)) {
          this.state.baseline = best;
          this.logger.info(`Baseline score: ${best.toFixed(4)}`);
        }
      }

      // 5. Degradation
      this.state.phase = 'degradation-check';
      if (await this.checkDegradation(generation, scored, resets)) {
        scored = await this.population.evaluate(validation, this.settings, this.logger);
      }

      // 6. Evolution
      this.state.phase = 'evolving';
      const outcome = this.engine.evolve(scored);
      this.population.replace(outcome.population);

      // 7. Scheduled reset
      if (generation % this.config.retrainingFreq === 0) {
        this.state.phase = 'scheduled-reset';
        this.reset(generation, 'scheduled', resets);
      }

      // 8. Resources
      this.state.phase = 'throttle-check';
      await this.throttle.check(generation);

      this.population.assertSize();
      this.events.emit({
        type: 'generation_completed',
        generation,
        bestScore: outcome.bestScore,
        mutationRate: outcome.mutationRate,
      });

      return {
        generation,
        population: this.population.getAll(),
        bestScore: outcome.bestScore,
        mutationRate: outcome.mutationRate,
        baseline: this.state.baseline,
        resets,
        failedEvaluations,
        batchSize: this.settings.batchSize,
      };
    } finally {
      this.state.phase = 'idle';
    }
  }

  /**
   * Get current state
   */
  getState(): GenerationState {
    return {
      ...this.state,
      throttled: this.throttle.isEngaged(),
      batchSize: this.settings.batchSize,
    };
  }

  getSettings(): RuntimeSettings {
    return { ...this.settings };
  }

  getConfig(): ControllerConfig {
    return { ...this.config };
  }

  getPopulation(): Candidate[] {
    return this.population.getAll();
  }

  isThrottled(): boolean {
    return this.throttle.isEngaged();
  }

  private checkDrift(
    generation: number,
    training: Dataset,
    validation: Dataset,
    resets: ResetReason[]
  ): void {
    const drift = this.driftDetector.detect(training.features, validation.features);
    if (!drift.drifted) {
      return;
    }
    this.logger.warn(
      `Drift detected on feature ${drift.featureIndex} (p=${drift.pValue.toExponential(2)})`
    );
    this.events.emit({
      type: 'drift_detected',
      generation,
      featureIndex: drift.featureIndex,
      pValue: drift.pValue,
    });
    this.reset(generation, 'drift', resets);
  }

  /**
   * True when the population was reset and needs re-scoring
   */
  private async checkDegradation(
    generation: number,
    scored: readonly ScoredCandidate[],
    resets: ResetReason[]
  ): Promise<boolean> {
    const best = getBest(scored);
    if (!best) {
      return false;
    }
    const result = this.degradationMonitor.checkScore(best.score, this.state.baseline);
    if (result.status === 'skipped' || !result.degraded) {
      return false;
    }
    this.logger.warn(
      `Degradation detected: drop ${(result.dropFraction * 100).toFixed(1)}% from baseline`
    );
    this.events.emit({
      type: 'degradation_detected',
      generation,
      dropFraction: result.dropFraction,
    });
    this.reset(generation, 'degradation', resets);
    return true;
  }

  private reset(generation: number, reason: ResetReason, resets: ResetReason[]): void {
    this.population.reinitialize(this.base);
    this.state.lastResetGeneration = generation;
    if (this.config.baselineResetPolicy === 'on-reinitialize') {
      this.state.baseline = null;
    }
    resets.push(reason);
    this.events.emit({ type: 'population_reset', generation, reason });
  }
}
