/**
 * CLI option resolution
 * Turns raw command-line strings plus the loaded config into pipeline options.
 */

import { InvalidInputError } from '../errors.js';
import { REPORT_NAMES } from '../reports/definitions.js';
import { RunReportsOptions } from '../reports/runner.js';
import { parseAxisTransform } from '../statistics/axis-transform.js';
import { GroupByName, isGroupByName } from '../statistics/identity.js';
import { validateBucketCount } from '../statistics/merger.js';
import { MEASUREMENT_FIELDS, MeasurementField } from '../types.js';
import { BenchplotConfig, enabledReports } from '../utils/config.js';

export interface PlotCommandOptions {
  buckets?: string;
  transform?: string;
  output?: string;
  reports?: string;
  csv?: string;
  verbose?: boolean;
}

export function parseBucketCount(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const bucketCount = Number(value);
  if (value.trim() === '' || Number.isNaN(bucketCount)) {
    throw new InvalidInputError('buckets', `"${value}" is not a number`);
  }
  validateBucketCount(bucketCount);
  return bucketCount;
}

export function parseReportList(value: string): string[] {
  const names = value.split(',').map(name => name.trim()).filter(name => name.length > 0);
  for (const name of names) {
    if (!REPORT_NAMES.includes(name)) {
      throw new InvalidInputError('reports', `unknown report "${name}" (available: ${REPORT_NAMES.join(', ')})`);
    }
  }
  return names;
}

export function parseField(value: string): MeasurementField {
  const field = MEASUREMENT_FIELDS.find(name => name === value);
  if (!field) {
    throw new InvalidInputError('field', `unknown field "${value}" (available: ${MEASUREMENT_FIELDS.join(', ')})`);
  }
  return field;
}

export function parseGroupBy(value: string): GroupByName {
  if (!isGroupByName(value)) {
    throw new InvalidInputError('group-by', `expected aligner, sequence or method, got "${value}"`);
  }
  return value;
}

/**
 * Command-line values win over the config file, which wins over defaults
 */
export function resolvePlotOptions(
  options: PlotCommandOptions,
  config: BenchplotConfig
): RunReportsOptions & { csvPath?: string } {
  const bucketCount = options.buckets !== undefined
    ? parseBucketCount(options.buckets)
    : config.bucketCount;
  validateBucketCount(bucketCount);

  return {
    reports: options.reports ? parseReportList(options.reports) : enabledReports(config),
    outputDir: options.output ?? config.outputDir,
    transform: parseAxisTransform(options.transform ?? config.transform),
    bucketCount,
    histogramBins: config.histogramBins,
    verbose: options.verbose ?? false,
    csvPath: options.csv ?? config.csvPath,
  };
}
