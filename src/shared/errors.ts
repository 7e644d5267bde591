/**
 * Error types raised by the analysis core and the loaders around it.
 * Expected "nothing found" results are empty arrays, never errors.
 */

export class InsufficientDataError extends Error {
  constructor(
    message: string,
    public readonly readingCount: number,
    public readonly required: number
  ) {
    super(message);
    this.name = "InsufficientDataError";
  }
}

export class NonUniformSamplingError extends Error {
  constructor(
    message: string,
    public readonly index: number,
    public readonly expectedMinutes: number,
    public readonly actualMinutes: number
  ) {
    super(message);
    this.name = "NonUniformSamplingError";
  }
}

export class AnchorNotFoundError extends Error {
  constructor(
    message: string,
    public readonly anchorTimestamp: string
  ) {
    super(message);
    this.name = "AnchorNotFoundError";
  }
}

export class InvalidSeriesError extends Error {
  constructor(
    message: string,
    public readonly index: number
  ) {
    super(message);
    this.name = "InvalidSeriesError";
  }
}

export class CatalogValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = "CatalogValidationError";
  }
}
