/**
 * Drift Detector
 *
 * Tests each feature column of a new sample against the same column of a
 * reference sample and reports the first column whose distribution shifted.
 */

import { DriftDimensionError } from '../errors.js';
import { FeatureMatrix } from '../types.js';
import { TwoSampleTest, kolmogorovSmirnovTest } from './ks-test.js';

export const DEFAULT_DRIFT_SIGNIFICANCE = 0.05;

export type DriftResult =
  | { drifted: true; featureIndex: number; pValue: number }
  | { drifted: false; reason: 'insufficient-data' }
  | { drifted: false; reason: 'no-shift'; minPValue: number };

export interface DriftDetectorOptions {
  significance?: number;
  test?: TwoSampleTest;
}

export class DriftDetector {
  private readonly significance: number;
  private readonly test: TwoSampleTest;

  constructor(options: DriftDetectorOptions = {}) {
    this.significance = options.significance ?? DEFAULT_DRIFT_SIGNIFICANCE;
    this.test = options.test ?? kolmogorovSmirnovTest;
  }

  detect(newData: FeatureMatrix, reference: FeatureMatrix): DriftResult {
    if (newData.length === 0 || reference.length === 0) {
      return { drifted: false, reason: 'insufficient-data' };
    }

    const dimension = featureDimension(newData);
    const referenceDimension = featureDimension(reference);
    if (dimension !== referenceDimension) {
      throw new DriftDimensionError(dimension, referenceDimension);
    }

    let minPValue = 1;
    for (let featureIndex = 0; featureIndex < dimension; featureIndex++) {
      const pValue = this.test(column(newData, featureIndex), column(reference, featureIndex));
      if (pValue < this.significance) {
        return { drifted: true, featureIndex, pValue };
      }
      minPValue = Math.min(minPValue, pValue);
    }
    return { drifted: false, reason: 'no-shift', minPValue };
  }
}

/**
 * Column count of a matrix; every row must agree
 */
export function featureDimension(matrix: FeatureMatrix): number {
  const dimension = matrix[0]?.length ?? 0;
  for (const [row, values] of matrix.entries()) {
    if (values.length !== dimension) {
      throw new Error(`Row ${row} has ${values.length} features, expected ${dimension}`);
    }
  }
  return dimension;
}

function column(matrix: FeatureMatrix, index: number): number[] {
  return matrix.map((row) => row[index]);
}
