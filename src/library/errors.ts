import type { ErrorDescriptor, ErrorKind, Scalar, StageName } from '../types.js';

interface PricingErrorParams {
  message: string;
  field?: string;
  value?: unknown;
  recordId?: Scalar;
}

/**
 * Base class for every failure the pipeline raises on purpose.
 */
export abstract class PricingError extends Error {
  abstract readonly kind: ErrorKind;
  readonly field?: string;
  readonly value?: unknown;
  recordId?: Scalar;

  constructor(params: PricingErrorParams) {
    super(params.message);
    this.field = params.field;
    this.value = params.value;
    this.recordId = params.recordId;
  }

  toDescriptor(): ErrorDescriptor {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.field !== undefined && { field: this.field }),
      ...(this.value !== undefined && { value: this.value }),
      ...(this.recordId !== undefined && { recordId: this.recordId }),
    };
  }
}

/** Malformed or missing required input fields. */
export class SchemaError extends PricingError {
  readonly kind = 'SchemaError' as const;

  constructor(params: PricingErrorParams) {
    super(params);
    this.name = 'SchemaError';
  }
}

/** A categorical value with no entry in the category mapping. */
export class CategoryLookupError extends PricingError {
  readonly kind = 'CategoryLookupError' as const;

  constructor(field: string, value: unknown) {
    super({ message: `Unknown category ${JSON.stringify(value)} for field "${field}"`, field, value });
    this.name = 'CategoryLookupError';
  }
}

/** A numeric value outside every configured band. */
export class BandingError extends PricingError {
  readonly kind = 'BandingError' as const;

  constructor(field: string, value: unknown) {
    super({ message: `Value ${JSON.stringify(value)} for field "${field}" falls outside all bands`, field, value });
    this.name = 'BandingError';
  }
}

/** No rating-table row for the record's key. */
export class RatingLookupError extends PricingError {
  readonly kind = 'RatingLookupError' as const;
  readonly factor: string;

  constructor(factor: string, table: string, key: string) {
    super({
      message: `No entry for key "${key}" in rating table "${table}" (factor "${factor}")`,
      field: factor,
      value: key,
    });
    this.name = 'RatingLookupError';
    this.factor = factor;
  }
}

/** Malformed mapping, banding or rating files. Fatal at load time. */
export class ConfigurationError extends PricingError {
  readonly kind = 'ConfigurationError' as const;
  readonly file?: string;

  constructor(message: string, file?: string) {
    super({ message: file ? `${file}: ${message}` : message });
    this.name = 'ConfigurationError';
    this.file = file;
  }
}

/**
 * Raised when any stage fails for a record. Keeps the underlying error so
 * the descriptor reports the original kind, field and value plus the stage.
 */
export class TransformationError extends Error {
  readonly stage: StageName;
  readonly target: string;
  readonly original: Error;
  recordId?: Scalar;

  constructor(stage: StageName, target: string, original: Error, recordId?: Scalar) {
    super(`${stage} stage failed on "${target}": ${original.message}`);
    this.name = 'TransformationError';
    this.stage = stage;
    this.target = target;
    this.original = original;
    this.recordId = recordId;
  }

  toDescriptor(): ErrorDescriptor {
    const base: ErrorDescriptor =
      this.original instanceof PricingError
        ? this.original.toDescriptor()
        : { kind: 'UnexpectedError', message: this.original.message, field: this.target };
    return {
      ...base,
      message: this.message,
      stage: this.stage,
      ...(this.recordId !== undefined && { recordId: this.recordId }),
    };
  }
}

/**
 * Convert anything thrown during pricing into a serializable descriptor.
 */
export function toErrorDescriptor(error: unknown, recordId?: Scalar): ErrorDescriptor {
  let descriptor: ErrorDescriptor;
  if (error instanceof PricingError || error instanceof TransformationError) {
    descriptor = error.toDescriptor();
  } else {
    descriptor = {
      kind: 'UnexpectedError',
      message: error instanceof Error ? error.message : String(error),
    };
  }
  if (recordId !== undefined && descriptor.recordId === undefined) {
    descriptor.recordId = recordId;
  }
  return descriptor;
}
