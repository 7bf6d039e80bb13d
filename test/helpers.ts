import type { ResourceSample, ResourceSampler } from '../src/throttle.js';
import type { Candidate, Dataset, RuntimeSettings, Score } from '../src/types.js';

export type ScalarBehaviour = {
  readonly evaluate?: (candidate: ScalarCandidate, data: Dataset) => Score;
  readonly onTrain?: (candidate: ScalarCandidate, settings: RuntimeSettings) => void;
};

let nextScalarId = 0;

/**
 * One-parameter candidate: mutate adds the rate, crossover takes the
 * bias-weighted mean, distance is the absolute difference.
 */
export class ScalarCandidate implements Candidate {
  readonly id: string;

  constructor(
    public value: number,
    private readonly behaviour: ScalarBehaviour = {}
  ) {
    nextScalarId += 1;
    this.id = `scalar-${nextScalarId}`;
  }

  clone(): ScalarCandidate {
    return new ScalarCandidate(this.value, this.behaviour);
  }

  mutate(rate: number): ScalarCandidate {
    this.value += rate;
    return this;
  }

  crossover(other: Candidate, bias: number): ScalarCandidate {
    const partner = asScalar(other);
    return new ScalarCandidate(bias * this.value + (1 - bias) * partner.value, this.behaviour);
  }

  train(_data: Dataset, settings: RuntimeSettings): void {
    this.behaviour.onTrain?.(this, settings);
  }

  evaluate(data: Dataset): Score {
    return this.behaviour.evaluate ? this.behaviour.evaluate(this, data) : this.value;
  }

  distance(other: Candidate): number {
    return Math.abs(this.value - asScalar(other).value);
  }
}

function asScalar(candidate: Candidate): ScalarCandidate {
  if (!(candidate instanceof ScalarCandidate)) {
    throw new Error(`Expected a scalar candidate, got ${candidate.id}`);
  }
  return candidate;
}

/**
 * Serves the queued samples in order, then repeats the last one
 */
export function queuedSampler(samples: readonly ResourceSample[]): ResourceSampler {
  let index = 0;
  return {
    sample: async () => {
      const sample = samples[Math.min(index, samples.length - 1)];
      index += 1;
      if (!sample) {
        throw new Error('No samples queued');
      }
      return sample;
    },
  };
}

export const QUIET: ResourceSample = { cpuPct: 10, memPct: 10 };

/**
 * Deterministic [0, 1) generator (mulberry32)
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomSequence(values: readonly number[], fallback = 0.5): () => number {
  let index = 0;
  return () => {
    const value = values[index];
    index += 1;
    return value ?? fallback;
  };
}

export const SMALL_DATASET: Dataset = {
  features: [[0], [1], [2]],
  labels: [0, 1, 2],
};
