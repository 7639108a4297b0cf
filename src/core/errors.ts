/**
 * Custom error types for dataset loading and pipeline execution.
 * Enables callers to handle different failure modes appropriately.
 */

export class SourceUnavailableError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly statusCode: number | null = null
  ) {
    super(message);
    this.name = 'SourceUnavailableError';
  }
}

export class SchemaMismatchError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly missingColumns: string[] = []
  ) {
    super(message);
    this.name = 'SchemaMismatchError';
  }
}

export class StructuralViolationError extends Error {
  constructor(
    public readonly company: string,
    public readonly tag: string,
    public readonly count: number
  ) {
    super(
      `Cannot pivot facts: ${company} has ${count} values for tag ${tag}. ` +
      'Facts must be deduplicated to one value per (company, tag) before reshaping.'
    );
    this.name = 'StructuralViolationError';
  }
}

export class ConceptNotFoundError extends Error {
  constructor(
    public readonly query: string,
    public readonly availableConcepts: string[]
  ) {
    super(`Could not identify a concept in: "${query}"`);
    this.name = 'ConceptNotFoundError';
  }
}

export class InvalidOptionError extends Error {
  constructor(
    public readonly option: string,
    public readonly value: string
  ) {
    super(`Invalid value for ${option}: "${value}" (expected a non-negative integer)`);
    this.name = 'InvalidOptionError';
  }
}
