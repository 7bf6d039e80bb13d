/**
 * Error types
 *
 * Structural problems (bad config, a candidate missing a capability,
 * mismatched feature dimensions) throw one of these. Recoverable failures
 * such as a single evaluation throwing are handled where they happen.
 */

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid controller config: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class CandidateContractError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Candidate is missing required capabilities: ${missing.join(', ')}`);
    this.name = 'CandidateContractError';
    this.missing = missing;
  }
}

export class DriftDimensionError extends Error {
  constructor(newDimension: number, referenceDimension: number) {
    super(
      `Feature dimension mismatch: new data has ${newDimension} columns, ` +
        `reference has ${referenceDimension}`
    );
    this.name = 'DriftDimensionError';
  }
}

export class PopulationSizeError extends Error {
  constructor(actual: number, expected: number) {
    super(`Population size ${actual} does not match configured size ${expected}`);
    this.name = 'PopulationSizeError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
