/**
 * Candidates
 *
 * The capability check the controller runs on its base candidate, plus a
 * reference implementation: a linear model whose weights live in a single
 * Float64Array and are shared copy-on-write between clones.
 */

import { nanoid } from 'nanoid';
import { CandidateContractError } from './errors.js';
import { Candidate, Dataset, RuntimeSettings, Score } from './types.js';
import { RandomSource, gaussian, normalizeRandom } from './utils/random.js';

const REQUIRED_CAPABILITIES = [
  'clone',
  'mutate',
  'crossover',
  'train',
  'evaluate',
  'distance',
] as const;

export const MUTATION_NOISE_STD = 0.1;

/**
 * Throws CandidateContractError unless every capability is a function
 */
export function assertCandidate(value: unknown): asserts value is Candidate {
  if (typeof value !== 'object' || value === null) {
    throw new CandidateContractError([...REQUIRED_CAPABILITIES]);
  }
  const missing = REQUIRED_CAPABILITIES.filter(
    (name) => typeof Reflect.get(value, name) !== 'function'
  );
  if (missing.length > 0) {
    throw new CandidateContractError(missing);
  }
}

export interface WeightVectorOptions {
  random?: RandomSource;
  learningRate?: number;
  noiseStd?: number;
}

/**
 * Linear regressor scored by mean squared error.
 * The last weight is the bias term.
 */
export class WeightVectorCandidate implements Candidate {
  readonly id: string;
  private weights: Float64Array;
  private ownsWeights: boolean;
  private readonly random: RandomSource;
  private readonly learningRate: number;
  private readonly noiseStd: number;

  constructor(weights: ArrayLike<number>, options: WeightVectorOptions = {}) {
    if (weights.length < 1) {
      throw new Error('A weight vector needs at least the bias term.');
    }
    this.id = nanoid(10);
    this.weights = Float64Array.from(weights);
    this.ownsWeights = true;
    this.random = normalizeRandom(options.random);
    this.learningRate = options.learningRate ?? 0.01;
    this.noiseStd = options.noiseStd ?? MUTATION_NOISE_STD;
  }

  /**
   * Small random weights for `featureCount` inputs plus a bias
   */
  static random(featureCount: number, options: WeightVectorOptions = {}): WeightVectorCandidate {
    const random = normalizeRandom(options.random);
    const weights = Array.from({ length: featureCount + 1 }, () => gaussian(random) * 0.1);
    return new WeightVectorCandidate(weights, { ...options, random });
  }

  get featureCount(): number {
    return this.weights.length - 1;
  }

  toArray(): number[] {
    return Array.from(this.weights);
  }

  clone(): WeightVectorCandidate {
    const copy = new WeightVectorCandidate([0], this.options());
    copy.weights = this.weights;
    copy.ownsWeights = false;
    this.ownsWeights = false;
    return copy;
  }

  mutate(rate: number): WeightVectorCandidate {
    this.ensureOwned();
    for (let i = 0; i < this.weights.length; i++) {
      if (this.random() < rate) {
        this.weights[i] += gaussian(this.random) * this.noiseStd;
      }
    }
    return this;
  }

  crossover(other: Candidate, bias: number): WeightVectorCandidate {
    const partner = this.requireCompatible(other);
    const child = Array.from(this.weights, (weight, i) =>
      this.random() < bias ? weight : partner.weights[i]
    );
    return new WeightVectorCandidate(child, this.options());
  }

  distance(other: Candidate): number {
    const partner = this.requireCompatible(other);
    let sum = 0;
    for (let i = 0; i < this.weights.length; i++) {
      const diff = this.weights[i] - partner.weights[i];
      sum += diff * diff;
    }
    return Math.sqrt(sum);
  }

  /**
   * One epoch of mini-batch gradient descent
   */
  train(data: Dataset, settings: RuntimeSettings): void {
    this.checkDataset(data);
    this.ensureOwned();
    const batchSize = Math.max(1, Math.floor(settings.batchSize));
    const gradient = new Float64Array(this.weights.length);

    for (let start = 0; start < data.features.length; start += batchSize) {
      const end = Math.min(start + batchSize, data.features.length);
      gradient.fill(0);
      for (let row = start; row < end; row++) {
        const features = data.features[row];
        const error = this.predict(features) - data.labels[row];
        for (let i = 0; i < features.length; i++) {
          gradient[i] += 2 * error * features[i];
        }
        gradient[this.featureCount] += 2 * error;
      }
      const count = end - start;
      for (let i = 0; i < this.weights.length; i++) {
        this.weights[i] -= (this.learningRate * gradient[i]) / count;
      }
    }
  }

  evaluate(data: Dataset, _settings: RuntimeSettings): Score {
    this.checkDataset(data);
    let total = 0;
    for (let row = 0; row < data.features.length; row++) {
      const error = this.predict(data.features[row]) - data.labels[row];
      total += error * error;
    }
    const mse = total / data.features.length;
    if (!Number.isFinite(mse)) {
      throw new Error(`Candidate ${this.id} produced a non-finite score`);
    }
    return mse;
  }

  predict(features: readonly number[]): number {
    let value = this.weights[this.featureCount];
    for (let i = 0; i < features.length; i++) {
      value += this.weights[i] * features[i];
    }
    return value;
  }

  private ensureOwned(): void {
    if (!this.ownsWeights) {
      this.weights = Float64Array.from(this.weights);
      this.ownsWeights = true;
    }
  }

  private options(): WeightVectorOptions {
    return { random: this.random, learningRate: this.learningRate, noiseStd: this.noiseStd };
  }

  private requireCompatible(other: Candidate): WeightVectorCandidate {
    if (!(other instanceof WeightVectorCandidate)) {
      throw new Error(`Candidate ${other.id} is not a weight vector`);
    }
    if (other.weights.length !== this.weights.length) {
      throw new Error(
        `Weight length mismatch: ${this.weights.length} vs ${other.weights.length}`
      );
    }
    return other;
  }

  private checkDataset(data: Dataset): void {
    if (data.features.length === 0) {
      throw new Error('Cannot score a candidate on an empty dataset');
    }
    if (data.features.length !== data.labels.length) {
      throw new Error(
        `Dataset has ${data.features.length} rows but ${data.labels.length} labels`
      );
    }
    for (const row of data.features) {
      if (row.length !== this.featureCount) {
        throw new Error(`Expected ${this.featureCount} features, got ${row.length}`);
      }
    }
  }
}
