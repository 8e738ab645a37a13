/**
 * Report pipeline
 *
 * records → group (equal sizes enforced) → report filter → bucket/merge →
 * global ranges → chart data for the renderer.
 */

import { AxisTransform } from '../statistics/axis-transform.js';
import { ValueFormatter, formatValue } from '../statistics/format.js';
import { filterGroups, groupRecords } from '../statistics/grouper.js';
import { groupKeyFor } from '../statistics/identity.js';
import { mergeGroups } from '../statistics/merger.js';
import { computeValueRange, suppressionEpsilon } from '../statistics/quartiles.js';
import { GroupSeries, Range, StatisticsRecord } from '../types.js';
import { ReportDefinition } from './definitions.js';

export interface PipelineOptions {
  bucketCount?: number;
  transform: AxisTransform;
  format?: ValueFormatter;
}

/**
 * Everything a renderer needs for one chart. Summaries are frozen.
 */
export interface ChartData {
  report: ReportDefinition;
  series: readonly GroupSeries[];
  keyRange: Range;
  valueRange: Range;
  epsilon: number;
  transform: AxisTransform;
  format: ValueFormatter;
  bucketCount?: number;
  groupSize: number;
  skippedGroups: string[];
}

/**
 * Run the aggregation pipeline for one report.
 * Returns null when the report filter leaves no records at all.
 */
export function buildChartData(
  records: readonly StatisticsRecord[],
  report: ReportDefinition,
  options: PipelineOptions
): ChartData | null {
  const groups = groupRecords(records, groupKeyFor(report.groupBy, records));
  const groupSize = groups.size > 0 ? [...groups.values()][0].length : 0;

  const { groups: filtered, skipped } = report.filter
    ? filterGroups(groups, report.filter)
    : { groups, skipped: [] };

  if (filtered.size === 0) {
    return null;
  }

  const { series, keyRange } = mergeGroups(filtered, {
    axis: report.axis,
    bucketCount: options.bucketCount,
  });
  const valueRange = computeValueRange(series, report.field);

  return {
    report,
    series,
    keyRange,
    valueRange,
    epsilon: suppressionEpsilon(valueRange),
    transform: options.transform,
    format: options.format ?? formatValue,
    bucketCount: options.bucketCount,
    groupSize,
    skippedGroups: skipped,
  };
}
