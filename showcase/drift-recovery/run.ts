#!/usr/bin/env npx tsx
/**
 * Drift Recovery Showcase
 *
 * Evolves a population of linear regressors against a stream whose second
 * feature shifts part-way through, and prints every controller event.
 * Run with: npx tsx showcase/drift-recovery/run.ts
 */

import { AdaptiveController } from '../../src/controller.js';
import { WeightVectorCandidate } from '../../src/candidate.js';
import { InMemoryDataSource } from '../../src/data.js';
import { sampleDataset, shiftingBatches } from './stream.js';

async function main() {
  const random = Math.random;
  const validation = sampleDataset(200, random);
  const dataSource = new InMemoryDataSource(
    validation,
    shiftingBatches(200, random, 12, 5)
  );

  const controller = new AdaptiveController(
    WeightVectorCandidate.random(2),
    dataSource,
    {
      populationSize: 12,
      selectionTopK: 4,
      mutationRate: 0.3,
      driftCheckFreq: 4,
      retrainingFreq: 25,
      trainCandidates: true,
      batchSize: 32,
      samplingWindowMs: 50,
    }
  );

  controller.setProgressCallback((result) => {
    const resets = result.resets.length > 0 ? ` | reset: ${result.resets.join(', ')}` : '';
    console.log(
      `Generation ${String(result.generation).padStart(2)} | ` +
        `best ${result.bestScore.toFixed(4)} | ` +
        `mutation ${result.mutationRate.toFixed(3)} | ` +
        `batch ${result.batchSize}${resets}`
    );
  });

  const result = await controller.run(30);

  console.log('\nRun complete');
  console.log(`  Generations: ${result.generations.length}`);
  console.log(`  Baseline:    ${result.baseline?.toFixed(4) ?? 'n/a'}`);
  console.log(`  Final best:  ${result.bestScore.toFixed(4)}`);
  console.log(`  Time:        ${(result.totalTimeMs / 1000).toFixed(1)}s`);
}

main().catch(console.error);
