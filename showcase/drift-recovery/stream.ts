/**
 * Synthetic regression stream: y = 2*x0 - x1 + 0.5 plus noise.
 * From `shiftAt` onwards the second feature moves by `shift` standard deviations.
 */

import { Dataset } from '../../src/types.js';
import { RandomSource, gaussian } from '../../src/utils/random.js';

const TRUE_WEIGHTS = [2, -1];
const TRUE_BIAS = 0.5;

export function sampleDataset(rows: number, random: RandomSource, shift = 0): Dataset {
  const features: number[][] = [];
  const labels: number[] = [];
  for (let row = 0; row < rows; row++) {
    const x = [gaussian(random), gaussian(random) + shift];
    features.push(x);
    labels.push(
      TRUE_WEIGHTS[0] * x[0] + TRUE_WEIGHTS[1] * x[1] + TRUE_BIAS + gaussian(random) * 0.1
    );
  }
  return { features, labels };
}

export function shiftingBatches(
  rows: number,
  random: RandomSource,
  shiftAt: number,
  shift: number
): (generation: number) => Dataset {
  return (generation) => sampleDataset(rows, random, generation >= shiftAt ? shift : 0);
}
