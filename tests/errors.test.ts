/**
 * Tests for error hierarchy
 */

import {
  BenchplotError,
  InputError,
  RecordParseError,
  SchemaMismatchError,
  MissingInputError,
  InvalidInputError,
  ConfigFileError,
  InvariantError,
  UnequalGroupSizesError,
  EmptyPartitionError,
  EmptyAggregationError,
  InvalidBucketCountError,
  InvalidTransformDegreeError,
  UnsupportedMagnitudeError,
  isBenchplotError,
  isInvariantError,
  isRecoverable,
  createError,
} from '../src/errors.js';

describe('Error Hierarchy', () => {
  describe('BenchplotError (base class)', () => {
    it('should create error with all properties', () => {
      const error = new BenchplotError('Test error', 'TEST_CODE', true, { key: 'value' });
      expect(error.message).toBe('Test error');
      expect(error.code).toBe('TEST_CODE');
      expect(error.recoverable).toBe(true);
      expect(error.context).toEqual({ key: 'value' });
      expect(error.name).toBe('BenchplotError');
    });

    it('should not be recoverable by default', () => {
      expect(new BenchplotError('Test error', 'TEST').recoverable).toBe(false);
    });

    it('should have proper stack trace', () => {
      const error = new BenchplotError('Test error', 'TEST');
      expect(error.stack).toBeDefined();
    });

    it('should serialize to JSON', () => {
      const json = new BenchplotError('Test error', 'TEST_CODE', false, { key: 'value' }).toJSON();
      expect(json).toEqual({
        name: 'BenchplotError',
        message: 'Test error',
        code: 'TEST_CODE',
        recoverable: false,
        context: { key: 'value' },
      });
    });
  });

  describe('Input Errors', () => {
    it('RecordParseError should name the source', () => {
      const error = new RecordParseError('runs/a.toml', 'bad runtime');
      expect(error.message).toBe('Cannot parse runs/a.toml: bad runtime');
      expect(error.code).toBe('INPUT_RECORD_PARSE');
      expect(error).toBeInstanceOf(InputError);
      expect(error.name).toBe('RecordParseError');
    });

    it('SchemaMismatchError should list missing and unexpected keys', () => {
      const error = new SchemaMismatchError('b.toml', ['aligner', 'seed'], ['aligner', 'extra']);
      expect(error.context).toEqual({ source: 'b.toml', missing: ['seed'], unexpected: ['extra'] });
    });

    it('MissingInputError should have correct properties', () => {
      const error = new MissingInputError('statistics files');
      expect(error.message).toBe('Missing required input: statistics files');
      expect(error.code).toBe('INPUT_MISSING');
    });

    it('InvalidInputError should have correct properties', () => {
      const error = new InvalidInputError('buckets', 'not a number');
      expect(error.message).toBe('Invalid buckets: not a number');
      expect(error.context).toEqual({ field: 'buckets', reason: 'not a number' });
    });

    it('ConfigFileError should name the file', () => {
      const error = new ConfigFileError('/tmp/c.json', 'Unexpected token');
      expect(error.message).toContain('/tmp/c.json');
      expect(error.code).toBe('INPUT_CONFIG_FILE');
    });
  });

  describe('Invariant Errors', () => {
    it('UnequalGroupSizesError should enumerate groups', () => {
      const error = new UnequalGroupSizesError([{ name: 'a', size: 3 }, { name: 'b', size: 2 }]);
      expect(error.message).toBe('Groups have unequal sizes: a=3, b=2');
      expect(error).toBeInstanceOf(InvariantError);
      expect(error.recoverable).toBe(false);
    });

    it('should carry specific codes', () => {
      expect(new EmptyPartitionError('g').code).toBe('EMPTY_PARTITION');
      expect(new EmptyAggregationError('mean').code).toBe('EMPTY_AGGREGATION');
      expect(new InvalidBucketCountError(0).code).toBe('INVALID_BUCKET_COUNT');
      expect(new InvalidTransformDegreeError(0).code).toBe('INVALID_TRANSFORM_DEGREE');
      expect(new UnsupportedMagnitudeError(-1, 'negative').code).toBe('UNSUPPORTED_MAGNITUDE');
    });
  });

  describe('Type Guards', () => {
    it('isBenchplotError should identify Benchplot errors', () => {
      expect(isBenchplotError(new BenchplotError('test', 'TEST'))).toBe(true);
      expect(isBenchplotError(new EmptyPartitionError('g'))).toBe(true);
      expect(isBenchplotError(new Error('test'))).toBe(false);
      expect(isBenchplotError('string')).toBe(false);
    });

    it('isInvariantError should separate invariant from input errors', () => {
      expect(isInvariantError(new InvalidBucketCountError(0))).toBe(true);
      expect(isInvariantError(new MissingInputError('x'))).toBe(false);
    });

    it('isRecoverable should check recoverability', () => {
      expect(isRecoverable(new BenchplotError('x', 'X', true))).toBe(true);
      expect(isRecoverable(new RecordParseError('a', 'b'))).toBe(false);
      expect(isRecoverable(new Error('test'))).toBe(false);
    });
  });

  describe('createError factory', () => {
    it('should create errors from codes', () => {
      expect(createError('EMPTY_PARTITION', '', { group: 'g' })).toBeInstanceOf(EmptyPartitionError);
      expect(createError('INVALID_BUCKET_COUNT', '', { bucketCount: 0 })).toBeInstanceOf(InvalidBucketCountError);
      expect(createError('INPUT_INVALID', '', { field: 'f', reason: 'r' })).toBeInstanceOf(InvalidInputError);
    });

    it('should fall back to the base class for unknown codes', () => {
      const error = createError('SOMETHING_ELSE', 'Custom message', { key: 'value' });
      expect(error).toBeInstanceOf(BenchplotError);
      expect(error.message).toBe('Custom message');
      expect(error.code).toBe('SOMETHING_ELSE');
    });

    it('should tolerate missing context', () => {
      const error = createError('INPUT_MISSING', '');
      expect(error.message).toBe('Missing required input: Unknown');
    });
  });
});
