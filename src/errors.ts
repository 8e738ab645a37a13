/**
 * Benchplot Error Hierarchy
 * Structured error types for input malformation and invariant violations
 */

/**
 * Base error class for all Benchplot errors
 */
export class BenchplotError extends Error {
  public readonly code: string;
  public readonly recoverable: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    recoverable: boolean = false,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BenchplotError';
    this.code = code;
    this.recoverable = recoverable;
    this.context = context;
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      recoverable: this.recoverable,
      context: this.context,
    };
  }
}

// ==================== Input Errors ====================

/**
 * Errors caused by malformed input files or configuration
 */
export class InputError extends BenchplotError {
  constructor(
    message: string,
    code: string = 'INPUT_ERROR',
    context?: Record<string, unknown>
  ) {
    super(message, code, false, context);
    this.name = 'InputError';
  }
}

/**
 * Error when a statistics file or one of its fields cannot be decoded
 */
export class RecordParseError extends InputError {
  constructor(source: string, reason: string) {
    super(
      `Cannot parse ${source}: ${reason}`,
      'INPUT_RECORD_PARSE',
      { source, reason }
    );
    this.name = 'RecordParseError';
  }
}

/**
 * Error when the records of one batch do not share a schema
 */
export class SchemaMismatchError extends InputError {
  constructor(source: string, expected: string[], actual: string[]) {
    super(
      `Record ${source} does not match the batch schema`,
      'INPUT_SCHEMA_MISMATCH',
      {
        source,
        missing: expected.filter(key => !actual.includes(key)),
        unexpected: actual.filter(key => !expected.includes(key)),
      }
    );
    this.name = 'SchemaMismatchError';
  }
}

/**
 * Error when required input is missing
 */
export class MissingInputError extends InputError {
  constructor(field: string) {
    super(
      `Missing required input: ${field}`,
      'INPUT_MISSING',
      { field }
    );
    this.name = 'MissingInputError';
  }
}

/**
 * Error when an input value has an invalid format
 */
export class InvalidInputError extends InputError {
  constructor(field: string, reason: string) {
    super(
      `Invalid ${field}: ${reason}`,
      'INPUT_INVALID',
      { field, reason }
    );
    this.name = 'InvalidInputError';
  }
}

/**
 * Error when a configuration file exists but cannot be used
 */
export class ConfigFileError extends InputError {
  constructor(filePath: string, reason: string) {
    super(
      `Failed to load config from ${filePath}: ${reason}`,
      'INPUT_CONFIG_FILE',
      { filePath, reason }
    );
    this.name = 'ConfigFileError';
  }
}

// ==================== Invariant Errors ====================

/**
 * Base invariant violation. Never recoverable.
 */
export class InvariantError extends BenchplotError {
  constructor(
    message: string,
    code: string = 'INVARIANT_VIOLATION',
    context?: Record<string, unknown>
  ) {
    super(message, code, false, context);
    this.name = 'InvariantError';
  }
}

/**
 * Error when a grouping pass produces groups of different cardinality
 */
export class UnequalGroupSizesError extends InvariantError {
  constructor(sizes: ReadonlyArray<{ name: string; size: number }>) {
    super(
      `Groups have unequal sizes: ${sizes.map(s => `${s.name}=${s.size}`).join(', ')}`,
      'UNEQUAL_GROUP_SIZES',
      { sizes: sizes.map(s => ({ ...s })) }
    );
    this.name = 'UnequalGroupSizesError';
  }
}

/**
 * Error when a group reaches the merger without records
 */
export class EmptyPartitionError extends InvariantError {
  constructor(group: string) {
    super(
      `Group ${group} has no records to merge`,
      'EMPTY_PARTITION',
      { group }
    );
    this.name = 'EmptyPartitionError';
  }
}

/**
 * Error when a summary statistic is requested over no measurements
 */
export class EmptyAggregationError extends InvariantError {
  constructor(operation: string) {
    super(
      `Cannot compute ${operation} of an empty measurement list`,
      'EMPTY_AGGREGATION',
      { operation }
    );
    this.name = 'EmptyAggregationError';
  }
}

export class InvalidBucketCountError extends InvariantError {
  constructor(bucketCount: number) {
    super(
      `Bucket count must be a positive integer, got ${bucketCount}`,
      'INVALID_BUCKET_COUNT',
      { bucketCount }
    );
    this.name = 'InvalidBucketCountError';
  }
}

export class InvalidTransformDegreeError extends InvariantError {
  constructor(degree: number) {
    super(
      `Root transform degree must be at least 1, got ${degree}`,
      'INVALID_TRANSFORM_DEGREE',
      { degree }
    );
    this.name = 'InvalidTransformDegreeError';
  }
}

/**
 * Error when a value cannot be formatted as a magnitude
 */
export class UnsupportedMagnitudeError extends InvariantError {
  constructor(value: number, reason: string) {
    super(
      `Unsupported value ${value}: ${reason}`,
      'UNSUPPORTED_MAGNITUDE',
      { value, reason }
    );
    this.name = 'UnsupportedMagnitudeError';
  }
}

// ==================== Type Guards ====================

export function isBenchplotError(error: unknown): error is BenchplotError {
  return error instanceof BenchplotError;
}

export function isInvariantError(error: unknown): error is InvariantError {
  return error instanceof InvariantError;
}

export function isRecoverable(error: unknown): boolean {
  if (isBenchplotError(error)) {
    return error.recoverable;
  }
  return false;
}

// ==================== Error Factory ====================

function contextString(context: Record<string, unknown> | undefined, key: string): string {
  const value = context?.[key];
  return typeof value === 'string' ? value : 'Unknown';
}

function contextNumber(context: Record<string, unknown> | undefined, key: string): number {
  const value = context?.[key];
  return typeof value === 'number' ? value : NaN;
}

/**
 * Create appropriate error from code
 */
export function createError(
  code: string,
  message: string,
  context?: Record<string, unknown>
): BenchplotError {
  switch (code) {
    case 'INPUT_RECORD_PARSE':
      return new RecordParseError(contextString(context, 'source'), contextString(context, 'reason'));
    case 'INPUT_MISSING':
      return new MissingInputError(contextString(context, 'field'));
    case 'INPUT_INVALID':
      return new InvalidInputError(contextString(context, 'field'), contextString(context, 'reason'));
    case 'INPUT_CONFIG_FILE':
      return new ConfigFileError(contextString(context, 'filePath'), contextString(context, 'reason'));
    case 'EMPTY_PARTITION':
      return new EmptyPartitionError(contextString(context, 'group'));
    case 'EMPTY_AGGREGATION':
      return new EmptyAggregationError(contextString(context, 'operation'));
    case 'INVALID_BUCKET_COUNT':
      return new InvalidBucketCountError(contextNumber(context, 'bucketCount'));
    case 'INVALID_TRANSFORM_DEGREE':
      return new InvalidTransformDegreeError(contextNumber(context, 'degree'));
    case 'UNSUPPORTED_MAGNITUDE':
      return new UnsupportedMagnitudeError(contextNumber(context, 'value'), contextString(context, 'reason'));
    default:
      return new BenchplotError(message, code, false, context);
  }
}
