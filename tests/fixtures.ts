/**
 * Shared record builders for tests
 */

import { buildMeasurements } from '../src/statistics/measurements';
import {
  MeasurementField,
  Measurements,
  RunIdentity,
  StatisticsRecord,
  StrategyName,
} from '../src/types';

export function makeMeasurements(values: Partial<Record<MeasurementField, number>> = {}): Measurements {
  return buildMeasurements(field => values[field] ?? 0);
}

export function makeIdentity(overrides: Partial<RunIdentity> = {}): RunIdentity {
  return {
    testSequenceName: 'seq-a',
    aligner: 'astar',
    alignmentMethod: 'template-switch',
    length: 100,
    cost: 0,
    seed: 1,
    alignmentConfig: 'default',
    rqRange: '0..10',
    costLimit: '',
    memoryLimit: '',
    runtimeRaw: ['0:01'],
    memoryRaw: 1,
    strategies: {
      [StrategyName.NODE_ORD]: 'node',
      [StrategyName.TS_MIN_LENGTH]: 'lookahead',
    },
    ...overrides,
  };
}

export function makeRecord(
  identity: Partial<RunIdentity> = {},
  measurements: Partial<Record<MeasurementField, number>> = {}
): StatisticsRecord {
  return {
    identity: makeIdentity(identity),
    measurements: makeMeasurements(measurements),
  };
}
