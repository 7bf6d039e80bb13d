/**
 * In-memory data collaborator: a fixed validation split and a per-generation
 * training batch produced by a callback.
 */

import { DataSource, Dataset } from './types.js';

export class InMemoryDataSource implements DataSource {
  constructor(
    private readonly validation: Dataset,
    private readonly batchFor: (generation: number) => Dataset
  ) {}

  trainingBatch(generation: number): Dataset {
    return this.batchFor(generation);
  }

  validationSet(): Dataset {
    return this.validation;
  }
}
