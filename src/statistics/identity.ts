/**
 * Identity projections
 *
 * RunIdentity carries everything a run was started with. ExperimentIdentity drops
 * the fields that vary between repetitions of the same experiment.
 */

import {
  ExperimentField,
  ExperimentIdentity,
  KeyAxis,
  RunIdentity,
  STRATEGY_NAMES,
  StatisticsRecord,
  StrategyName,
} from '../types.js';

/**
 * Project a run identity onto its merge-stable subset.
 * Cleared fields are reset to the zero value of their type.
 */
export function toExperimentIdentity(
  identity: RunIdentity,
  clears: readonly ExperimentField[] = []
): ExperimentIdentity {
  const experiment: ExperimentIdentity = {
    testSequenceName: identity.testSequenceName,
    aligner: identity.aligner,
    alignmentMethod: identity.alignmentMethod,
    length: identity.length,
    alignmentConfig: identity.alignmentConfig,
    rqRange: identity.rqRange,
    costLimit: identity.costLimit,
    memoryLimit: identity.memoryLimit,
    strategies: { ...identity.strategies },
  };

  for (const field of clears) {
    switch (field) {
      case 'length':
        experiment.length = 0;
        break;
      case 'strategies':
        experiment.strategies = {
          [StrategyName.NODE_ORD]: '',
          [StrategyName.TS_MIN_LENGTH]: '',
        };
        break;
      default:
        experiment[field] = '';
    }
  }

  return Object.freeze(experiment);
}

/**
 * Canonical string form of an experiment identity, used for merge-key equality
 */
export function experimentKey(identity: ExperimentIdentity): string {
  return JSON.stringify([
    identity.testSequenceName,
    identity.aligner,
    identity.alignmentMethod,
    identity.length,
    identity.alignmentConfig,
    identity.rqRange,
    identity.costLimit,
    identity.memoryLimit,
    STRATEGY_NAMES.map(name => identity.strategies[name]),
  ]);
}

// ==================== Key axes ====================

export const LENGTH_AXIS: KeyAxis = {
  name: 'length',
  label: 'Sequence length',
  project: identity => identity.length,
  clears: ['length'],
};

export const COST_AXIS: KeyAxis = {
  name: 'cost',
  label: 'Alignment cost',
  project: identity => identity.cost,
  clears: [],
};

export const KEY_AXES: Readonly<Record<string, KeyAxis>> = {
  length: LENGTH_AXIS,
  cost: COST_AXIS,
};

export function findKeyAxis(name: string): KeyAxis | undefined {
  return Object.hasOwn(KEY_AXES, name) ? KEY_AXES[name] : undefined;
}

// ==================== Strategy labels ====================

/**
 * Labels records by the strategies that actually vary within a record set
 */
export class StrategyLabeler {
  readonly relevantStrategies: readonly StrategyName[];

  constructor(records: readonly StatisticsRecord[]) {
    const seen = new Map<StrategyName, Set<string>>();
    for (const record of records) {
      for (const name of STRATEGY_NAMES) {
        const values = seen.get(name) ?? new Set<string>();
        values.add(record.identity.strategies[name]);
        seen.set(name, values);
      }
    }

    this.relevantStrategies = STRATEGY_NAMES.filter(name => (seen.get(name)?.size ?? 0) > 1);
  }

  label(identity: Pick<RunIdentity, 'strategies'>): string {
    return this.relevantStrategies
      .map(name => `; ${name} ${identity.strategies[name]}`)
      .join('');
  }
}

// ==================== Group keys ====================

export type GroupKeyFn = (record: StatisticsRecord) => string;

export function byAligner(records: readonly StatisticsRecord[]): GroupKeyFn {
  const labeler = new StrategyLabeler(records);
  return record => `${record.identity.aligner}${labeler.label(record.identity)}`;
}

export function bySequenceName(): GroupKeyFn {
  return record => record.identity.testSequenceName;
}

export function byAlignmentMethod(): GroupKeyFn {
  return record => record.identity.alignmentMethod;
}

export type GroupByName = 'aligner' | 'sequence' | 'method';

export const GROUP_BY_NAMES: readonly GroupByName[] = ['aligner', 'sequence', 'method'];

export function groupKeyFor(name: GroupByName, records: readonly StatisticsRecord[]): GroupKeyFn {
  switch (name) {
    case 'aligner':
      return byAligner(records);
    case 'sequence':
      return bySequenceName();
    case 'method':
      return byAlignmentMethod();
  }
}

export function isGroupByName(value: string): value is GroupByName {
  return GROUP_BY_NAMES.some(name => name === value);
}
