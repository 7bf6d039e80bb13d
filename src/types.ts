/**
 * Core types for the adaptive population controller
 */

/**
 * Lower is better. Failed evaluations are scored as WORST_SCORE.
 */
export type Score = number;

export const WORST_SCORE: Score = Number.POSITIVE_INFINITY;

export type FeatureMatrix = readonly (readonly number[])[];

export interface Dataset {
  features: FeatureMatrix;
  labels: readonly number[];
}

/**
 * Process-wide settings the resource throttle may change between generations.
 * Anything with batch semantics reads batchSize at call time.
 */
export interface RuntimeSettings {
  batchSize: number;
}

/**
 * Capability contract every population member must satisfy.
 */
export interface Candidate {
  readonly id: string;
  clone(): Candidate;
  mutate(rate: number): Candidate;
  crossover(other: Candidate, bias: number): Candidate;
  train(data: Dataset, settings: RuntimeSettings): void | Promise<void>;
  evaluate(data: Dataset, settings: RuntimeSettings): Score | Promise<Score>;
  distance(other: Candidate): number;
}

export interface ScoredCandidate {
  index: number;
  candidate: Candidate;
  score: Score;
}

export interface DataSource {
  trainingBatch(generation: number): Dataset | Promise<Dataset>;
  validationSet(): Dataset | Promise<Dataset>;
}

export type BaselineResetPolicy = 'never' | 'on-reinitialize';

export interface ControllerConfig {
  // Population
  populationSize: number;
  selectionTopK: number;

  // Evolution
  mutationRate: number;
  diversityRate: number;
  crossoverBias: number;

  // Monitoring
  driftCheckFreq: number;
  driftSignificance: number;
  degradationThreshold: number;
  retrainingFreq: number;
  baselineResetPolicy: BaselineResetPolicy;
  trainCandidates: boolean;

  // Resources
  batchSize: number;
  cpuThreshold: number;
  memoryThreshold: number;
  samplingWindowMs: number;
}

export type ControllerPhase =
  | 'idle'
  | 'drift-check'
  | 'evaluating'
  | 'degradation-check'
  | 'evolving'
  | 'scheduled-reset'
  | 'throttle-check';

export interface GenerationState {
  generation: number;
  lastResetGeneration: number;
  baseline: Score | null;
  phase: ControllerPhase;
  /** Sticky until CPU and memory both fall below their thresholds */
  throttled: boolean;
  batchSize: number;
}

export type ResetReason = 'drift' | 'degradation' | 'scheduled';

export interface GenerationResult {
  generation: number;
  population: Candidate[];
  bestScore: Score;
  mutationRate: number;
  baseline: Score | null;
  resets: ResetReason[];
  failedEvaluations: number;
  batchSize: number;
}

export interface ControllerRunResult {
  generations: GenerationResult[];
  population: Candidate[];
  bestScore: Score;
  baseline: Score | null;
  totalTimeMs: number;
}

// Default configuration
export const DEFAULT_CONFIG: ControllerConfig = {
  populationSize: 10,
  selectionTopK: 5,
  mutationRate: 0.1,
  diversityRate: 1,
  crossoverBias: 0.6,
  driftCheckFreq: 5,
  driftSignificance: 0.05,
  degradationThreshold: 0.05,
  retrainingFreq: 50,
  baselineResetPolicy: 'never',
  trainCandidates: false,
  batchSize: 32,
  cpuThreshold: 80,
  memoryThreshold: 80,
  samplingWindowMs: 1000,
};
