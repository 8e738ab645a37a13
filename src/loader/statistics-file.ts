/**
 * Statistics file decoding
 *
 * One TOML or JSON file per run: identity parameters at the top level and the
 * aligner's measurements under a `statistics` table.
 */

import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import { RecordParseError } from '../errors.js';
import { buildMeasurements } from '../statistics/measurements.js';
import { Measurements, MeasurementField, StatisticsRecord, StrategyName } from '../types.js';

const StatisticsTableSchema = z.object({
  cost: z.number().nonnegative().default(0),
  cost_per_base: z.number().nonnegative().default(0),
  duration_seconds: z.number().nonnegative().default(0),
  opened_nodes: z.number().nonnegative().default(0),
  closed_nodes: z.number().nonnegative().default(0),
  suboptimal_opened_nodes: z.number().nonnegative().default(0),
  suboptimal_opened_nodes_ratio: z.number().nonnegative().default(0),
  template_switch_amount: z.number().nonnegative().default(0),
});

export const StatisticsFileSchema = z.object({
  test_sequence_name: z.string(),
  aligner: z.string(),
  alignment_method: z.string(),
  length: z.number().int().nonnegative(),
  seed: z.union([z.number().int(), z.bigint()]),
  alignment_config: z.string().default(''),
  rq_range: z.string(),
  cost_limit: z.string(),
  memory_limit: z.string().default(''),
  runtime_raw: z.array(z.string()),
  memory_raw: z.number().int().nonnegative().describe('Peak memory in KiB'),
  ts_node_ord_strategy: z.string().default(''),
  ts_min_length_strategy: z.string().default(''),
  template_switch_amount: z.number().int().nonnegative().default(0),
  statistics: StatisticsTableSchema.default({}),
});

export type StatisticsFile = z.infer<typeof StatisticsFileSchema>;

export type StatisticsFileFormat = 'toml' | 'json';

/**
 * Parse the text of one statistics file into its raw object form
 */
export function parseStatisticsText(
  text: string,
  format: StatisticsFileFormat,
  source: string
): unknown {
  try {
    return format === 'toml' ? parseToml(text, { integersAsBigInt: 'asNeeded' }) : JSON.parse(text);
  } catch (error) {
    throw new RecordParseError(source, error instanceof Error ? error.message : String(error));
  }
}

/**
 * Seconds of one `m:s` or `h:m:s` runtime entry
 */
export function parseRuntimeEntry(entry: string, source: string): number {
  const components = entry.split(':');
  if (components.length < 2 || components.length > 3) {
    throw new RecordParseError(source, `runtime "${entry}" must have 2 or 3 colon-separated parts`);
  }

  let seconds = 0;
  let factor = 1;
  for (const component of components.reverse()) {
    const value = Number(component);
    if (component.trim() === '' || Number.isNaN(value)) {
      throw new RecordParseError(source, `runtime "${entry}" has a non-numeric part "${component}"`);
    }
    seconds += value * factor;
    factor *= 60;
  }
  return seconds;
}

export function unpackRuntime(runtimeRaw: readonly string[], source: string): number {
  return runtimeRaw.reduce((total, entry) => total + parseRuntimeEntry(entry, source), 0);
}

export function unpackMemory(memoryRawKib: number): number {
  return memoryRawKib * 1024;
}

/**
 * Measurement vector of a validated file, with runtime and memory unpacked
 */
function toMeasurements(file: StatisticsFile, source: string): Measurements {
  const statistics = file.statistics;

  let templateSwitchAmount = statistics.template_switch_amount;
  if (file.template_switch_amount > 0) {
    if (templateSwitchAmount !== 0) {
      throw new RecordParseError(
        source,
        'template_switch_amount is given both at the top level and in the statistics'
      );
    }
    templateSwitchAmount = file.template_switch_amount;
  }

  const values: Record<MeasurementField, number> = {
    cost: statistics.cost,
    costPerBase: statistics.cost_per_base,
    durationSeconds: statistics.duration_seconds,
    openedNodes: statistics.opened_nodes,
    closedNodes: statistics.closed_nodes,
    suboptimalOpenedNodes: statistics.suboptimal_opened_nodes,
    suboptimalOpenedNodesRatio: statistics.suboptimal_opened_nodes_ratio,
    templateSwitchAmount,
    runtime: unpackRuntime(file.runtime_raw, source),
    memory: unpackMemory(file.memory_raw),
  };
  return buildMeasurements(field => values[field]);
}

/**
 * Validate a raw object and turn it into a record
 */
export function decodeStatisticsFile(raw: unknown, source: string): StatisticsRecord {
  const parsed = StatisticsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new RecordParseError(source, reason);
  }

  const file = parsed.data;
  const measurements = toMeasurements(file, source);

  return {
    identity: {
      testSequenceName: file.test_sequence_name,
      aligner: file.aligner,
      alignmentMethod: file.alignment_method,
      length: file.length,
      cost: measurements.cost,
      seed: file.seed,
      alignmentConfig: file.alignment_config,
      rqRange: file.rq_range,
      costLimit: file.cost_limit,
      memoryLimit: file.memory_limit,
      runtimeRaw: [...file.runtime_raw],
      memoryRaw: file.memory_raw,
      strategies: {
        [StrategyName.NODE_ORD]: file.ts_node_ord_strategy,
        [StrategyName.TS_MIN_LENGTH]: file.ts_min_length_strategy,
      },
    },
    measurements,
    source,
  };
}

/**
 * Sorted key paths of a raw file, used to check that a batch is homogeneous
 */
export function schemaSignature(raw: unknown): string[] {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return [];
  }

  const keys: string[] = [];
  for (const [key, value] of Object.entries(raw)) {
    if (key === 'statistics' && typeof value === 'object' && value !== null && !Array.isArray(value)) {
      keys.push(...Object.keys(value).map(inner => `statistics.${inner}`));
    } else {
      keys.push(key);
    }
  }
  return keys.sort();
}
