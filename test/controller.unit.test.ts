import { describe, expect, it, vi } from 'vitest';

import { AdaptiveController, type ControllerOptions } from '../src/controller.js';
import { InMemoryDataSource } from '../src/data.js';
import { CandidateContractError, ConfigError } from '../src/errors.js';
import { RecordingEventSink } from '../src/events.js';
import { silentLogger } from '../src/logger.js';
import type { ControllerConfig, Dataset, DataSource } from '../src/types.js';
import { gaussian } from '../src/utils/random.js';
import {
  QUIET,
  SMALL_DATASET,
  ScalarCandidate,
  type ScalarBehaviour,
  queuedSampler,
  seededRandom,
} from './helpers.js';

const BASE_CONFIG: Partial<ControllerConfig> = {
  populationSize: 6,
  selectionTopK: 3,
  mutationRate: 0.1,
  driftCheckFreq: 100,
  retrainingFreq: 100,
  batchSize: 32,
  samplingWindowMs: 0,
};

function setup(
  input: {
    config?: Partial<ControllerConfig>;
    behaviour?: ScalarBehaviour;
    dataSource?: DataSource;
    options?: ControllerOptions;
  } = {}
) {
  const events = new RecordingEventSink();
  const base = new ScalarCandidate(2, input.behaviour);
  const controller = new AdaptiveController(
    base,
    input.dataSource ?? new InMemoryDataSource(SMALL_DATASET, () => SMALL_DATASET),
    { ...BASE_CONFIG, ...input.config },
    {
      events,
      logger: silentLogger,
      random: seededRandom(1),
      sampler: queuedSampler([QUIET]),
      ...input.options,
    }
  );
  return { controller, events, base };
}

function values(population: readonly unknown[]): number[] {
  return population.map((member) => (member instanceof ScalarCandidate ? member.value : NaN));
}

describe('AdaptiveController construction', () => {
  it('rejects a base candidate missing a capability', () => {
    expect(
      () =>
        new AdaptiveController(
          { clone: () => null },
          new InMemoryDataSource(SMALL_DATASET, () => SMALL_DATASET)
        )
    ).toThrow(CandidateContractError);
  });

  it('rejects an invalid config', () => {
    expect(() => setup({ config: { populationSize: 2, selectionTopK: 3 } })).toThrow(ConfigError);
  });

  it('starts with clones of the base candidate', () => {
    const { controller, base } = setup();
    const population = controller.getPopulation();
    expect(values(population)).toEqual([2, 2, 2, 2, 2, 2]);
    expect(population).not.toContain(base);
    expect(controller.getState()).toEqual({
      generation: 0,
      lastResetGeneration: 0,
      baseline: null,
      phase: 'idle',
      throttled: false,
      batchSize: 32,
    });
  });
});

describe('AdaptiveController generations', () => {
  it('keeps the population size at every generation boundary', async () => {
    const { controller } = setup({
      config: { driftCheckFreq: 3, retrainingFreq: 4 },
      options: { driftTest: () => 1 },
    });

    const result = await controller.run(10);

    expect(result.generations).toHaveLength(10);
    for (const generation of result.generations) {
      expect(generation.population).toHaveLength(6);
    }
    expect(result.population).toHaveLength(6);
  });

  it('sets the baseline once from the first evaluation', async () => {
    const { controller } = setup();

    const result = await controller.run(5);

    expect(result.generations.map((g) => g.baseline)).toEqual([2, 2, 2, 2, 2]);
    expect(controller.getState().baseline).toBe(2);
    expect(result.generations.every((g) => g.resets.length === 0)).toBe(true);
  });

  it('breeds mutated children after the first generation', async () => {
    const { controller } = setup();

    const first = await controller.runGeneration();

    // identical parents: zero spread, so children are 2 + 0.1
    expect(first.mutationRate).toBe(0.1);
    expect(values(first.population).slice(0, 3)).toEqual([2, 2, 2]);
    for (const value of values(first.population).slice(3)) {
      expect(value).toBeCloseTo(2.1, 10);
    }
  });

  it('does not fetch training data it does not need', async () => {
    const trainingBatch = vi.fn(() => SMALL_DATASET);
    const { controller } = setup({
      dataSource: { trainingBatch, validationSet: () => SMALL_DATASET },
    });

    await controller.run(3);

    expect(trainingBatch).not.toHaveBeenCalled();
  });

  it('scores failed evaluations as worst and carries on', async () => {
    const { controller } = setup({
      behaviour: {
        evaluate: (candidate) => {
          if (candidate.value > 2.05) {
            throw new Error('numerical error');
          }
          return candidate.value;
        },
      },
    });

    const [first, second] = (await controller.run(2)).generations;

    expect(first?.failedEvaluations).toBe(0);
    expect(second?.failedEvaluations).toBe(3);
    expect(second?.bestScore).toBe(2);
    expect(second?.population).toHaveLength(6);
  });

  it('reports each generation to the progress callback', async () => {
    const { controller, events } = setup();
    const progress = vi.fn();
    controller.setProgressCallback(progress);

    await controller.run(3);

    expect(progress.mock.calls.map(([result]) => result.generation)).toEqual([1, 2, 3]);
    expect(events.ofType('generation_completed').map((e) => e.generation)).toEqual([1, 2, 3]);
    expect(controller.getState().generation).toBe(3);
    expect(controller.getState().phase).toBe('idle');
  });
});

describe('AdaptiveController resets', () => {
  it('resets the population when the training batch drifts', async () => {
    const driftTest = vi.fn(() => 0.01);
    const training: Dataset = { features: [[5], [6]], labels: [5, 6] };
    const { controller, events } = setup({
      config: { driftCheckFreq: 2 },
      dataSource: new InMemoryDataSource(SMALL_DATASET, () => training),
      options: { driftTest },
    });

    const [first, second] = (await controller.run(2)).generations;

    expect(first?.resets).toEqual([]);
    expect(second?.resets).toEqual(['drift']);
    expect(driftTest).toHaveBeenCalledTimes(1);
    expect(driftTest).toHaveBeenCalledWith([5, 6], [0, 1, 2]);
    expect(events.ofType('drift_detected')).toEqual([
      { type: 'drift_detected', generation: 2, featureIndex: 0, pValue: 0.01 },
    ]);
    expect(events.ofType('population_reset')).toEqual([
      { type: 'population_reset', generation: 2, reason: 'drift' },
    ]);
    expect(controller.getState().lastResetGeneration).toBe(2);
  });

  it('detects a shifted feature with the default test', async () => {
    const random = seededRandom(5);
    const features = Array.from({ length: 100 }, () => [gaussian(random), gaussian(random)]);
    const validation: Dataset = { features, labels: features.map(() => 0) };
    const shifted: Dataset = {
      features: features.map(([a, b]) => [a, b + 5]),
      labels: validation.labels,
    };
    const { controller, events } = setup({
      config: { driftCheckFreq: 1 },
      dataSource: new InMemoryDataSource(validation, () => shifted),
    });

    await controller.runGeneration();

    expect(events.ofType('drift_detected').map((e) => e.featureIndex)).toEqual([1]);
  });

  it('resets the population when the best score drops past the threshold', async () => {
    let scale = 1;
    const { controller, events } = setup({
      behaviour: { evaluate: (candidate) => candidate.value * scale },
    });

    await controller.runGeneration();
    scale = 0.5;
    const second = await controller.runGeneration();

    // best 1.0 against baseline 2.0
    expect(second.resets).toEqual(['degradation']);
    expect(events.ofType('degradation_detected')).toEqual([
      { type: 'degradation_detected', generation: 2, dropFraction: 0.5 },
    ]);
    expect(second.baseline).toBe(2);
    expect(controller.getState().lastResetGeneration).toBe(2);
  });

  it('clears the baseline on reset when configured to', async () => {
    let scale = 1;
    const { controller } = setup({
      config: { baselineResetPolicy: 'on-reinitialize' },
      behaviour: { evaluate: (candidate) => candidate.value * scale },
    });

    await controller.runGeneration();
    scale = 0.5;
    const second = await controller.runGeneration();
    const third = await controller.runGeneration();

    expect(second.baseline).toBeNull();
    expect(third.baseline).toBe(1);
    expect(third.resets).toEqual([]);
  });

  it('replaces the evolved population on the retraining schedule', async () => {
    const { controller, events, base } = setup({ config: { retrainingFreq: 3 } });

    const result = await controller.run(3);
    const third = result.generations[2];

    expect(third?.resets).toEqual(['scheduled']);
    expect(values(third?.population ?? [])).toEqual([2, 2, 2, 2, 2, 2]);
    expect(third?.population.map((m) => m.id)).not.toContain(base.id);
    expect(events.ofType('population_reset')).toEqual([
      { type: 'population_reset', generation: 3, reason: 'scheduled' },
    ]);
  });
});

describe('AdaptiveController throttling', () => {
  it('halves the batch size once per overload episode', async () => {
    const { controller, events } = setup({
      options: { sampler: queuedSampler([{ cpuPct: 85, memPct: 50 }]) },
    });

    const result = await controller.run(2);

    expect(result.generations.map((g) => g.batchSize)).toEqual([16, 16]);
    expect(events.ofType('resource_throttled')).toHaveLength(1);
    expect(controller.isThrottled()).toBe(true);
    expect(controller.getSettings()).toEqual({ batchSize: 16 });
    expect(controller.getState()).toMatchObject({ throttled: true, batchSize: 16 });
  });

  it('trains with the batch size current at call time', async () => {
    const seen: number[] = [];
    const { controller } = setup({
      config: { trainCandidates: true },
      behaviour: { onTrain: (_candidate, settings) => seen.push(settings.batchSize) },
      options: { sampler: queuedSampler([{ cpuPct: 85, memPct: 50 }]) },
    });

    await controller.run(2);

    expect(seen).toEqual([32, 32, 32, 32, 32, 32, 16, 16, 16, 16, 16, 16]);
  });

  it('carries on when resource sampling fails', async () => {
    const { controller } = setup({
      options: {
        sampler: {
          sample: async () => {
            throw new Error('unavailable');
          },
        },
      },
    });

    const result = await controller.run(2);

    expect(result.generations.map((g) => g.batchSize)).toEqual([32, 32]);
  });
});
