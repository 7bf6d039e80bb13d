/**
 * Adaptive population controller
 *
 * Keeps a population of trainable candidates healthy over time: watches for
 * input drift and performance degradation, evolves or resets the population,
 * and backs off the batch size under resource pressure.
 */

export { AdaptiveController } from './controller.js';
export type { ControllerOptions } from './controller.js';
export { assertCandidate, WeightVectorCandidate, MUTATION_NOISE_STD } from './candidate.js';
export type { WeightVectorOptions } from './candidate.js';
export { Population, scoreCandidate, rankByScore, getBest, getStats } from './population.js';
export type { PopulationStats } from './population.js';
export { DriftDetector, featureDimension, DEFAULT_DRIFT_SIGNIFICANCE } from './drift/detector.js';
export type { DriftResult, DriftDetectorOptions } from './drift/detector.js';
export { kolmogorovSmirnovTest, ksStatistic, kolmogorovSurvival } from './drift/ks-test.js';
export type { TwoSampleTest } from './drift/ks-test.js';
export { DegradationMonitor, DEFAULT_DEGRADATION_THRESHOLD } from './degradation.js';
export type { DegradationResult } from './degradation.js';
export { EvolutionEngine } from './evolution/engine.js';
export type { EvolutionOutcome, EvolutionSettings } from './evolution/engine.js';
export { selectDiverse } from './evolution/selection.js';
export type { DiversityRecord, SelectionResult } from './evolution/selection.js';
export { adaptiveMutationRate, crossoverBias, scoreSpread } from './evolution/mutation.js';
export { ResourceThrottle, ProcessResourceSampler } from './throttle.js';
export type {
  ResourceSample,
  ResourceSampler,
  ResourceThrottleOptions,
  ThrottleDecision,
  ThrottleReading,
} from './throttle.js';
export { ConsoleEventSink, RecordingEventSink } from './events.js';
export type { ControllerEvent, ControllerEventType, EventSink } from './events.js';
export { InMemoryDataSource } from './data.js';
export { resolveConfig, parseConfig, loadConfigFile } from './config.js';
export { consoleLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';
export {
  ConfigError,
  CandidateContractError,
  DriftDimensionError,
  PopulationSizeError,
} from './errors.js';
export * from './types.js';

// Default export for convenience
import { AdaptiveController } from './controller.js';
export default AdaptiveController;
