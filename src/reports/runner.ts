/**
 * Report Runner
 *
 * Builds every enabled report and writes the charts. All charts are rendered
 * before the first file is written, so a failing report leaves no partial output.
 */

import * as fs from 'fs';
import * as path from 'path';
import { MissingInputError } from '../errors.js';
import { renderChart } from '../render/charts.js';
import { AxisTransform } from '../statistics/axis-transform.js';
import { ValueFormatter, formatValue } from '../statistics/format.js';
import { groupRecords } from '../statistics/grouper.js';
import { GroupByName, LENGTH_AXIS, findKeyAxis, groupKeyFor } from '../statistics/identity.js';
import { mergeGroups, validateBucketCount } from '../statistics/merger.js';
import { GroupSeries, MeasurementField, StatisticsRecord } from '../types.js';
import { ReportDefinition, findReport } from './definitions.js';
import { ChartData, buildChartData } from './pipeline.js';

export interface RunReportsOptions {
  reports: readonly string[];
  outputDir: string;
  transform: AxisTransform;
  bucketCount?: number;
  histogramBins?: number;
  verbose?: boolean;
}

export interface ReportOutcome {
  name: string;
  outputPath?: string;
  skippedGroups: string[];
  // Set when the report filter left no records
  empty: boolean;
}

export function resolveReports(names: readonly string[]): ReportDefinition[] {
  return names.map(name => {
    const report = findReport(name);
    if (!report) {
      throw new MissingInputError(`report definition "${name}"`);
    }
    return report;
  });
}

export function runReports(
  records: readonly StatisticsRecord[],
  options: RunReportsOptions
): ReportOutcome[] {
  validateBucketCount(options.bucketCount);
  const reports = resolveReports(options.reports);

  const rendered: Array<{ outcome: ReportOutcome; svg?: string }> = [];
  for (const report of reports) {
    const data = buildChartData(records, report, {
      bucketCount: options.bucketCount,
      transform: options.transform,
    });

    if (!data) {
      rendered.push({ outcome: { name: report.name, skippedGroups: [], empty: true } });
      continue;
    }

    if (options.verbose) {
      logChartData(data);
    }

    rendered.push({
      outcome: {
        name: report.name,
        outputPath: path.join(options.outputDir, `${report.name}.svg`),
        skippedGroups: data.skippedGroups,
        empty: false,
      },
      svg: renderChart(data, { histogramBins: options.histogramBins }),
    });
  }

  if (!fs.existsSync(options.outputDir)) {
    fs.mkdirSync(options.outputDir, { recursive: true });
  }
  for (const { outcome, svg } of rendered) {
    if (outcome.outputPath && svg !== undefined) {
      fs.writeFileSync(outcome.outputPath, svg);
    }
  }

  return rendered.map(r => r.outcome);
}

function logChartData(data: ChartData): void {
  console.log(`  ${data.report.name}: ${data.series.length} groups of ${data.groupSize} runs`);
  console.log(`    key range:   ${data.keyRange.min} - ${data.keyRange.max}`);
  console.log(`    value range: ${data.valueRange.min} - ${data.valueRange.max} (epsilon ${data.epsilon})`);
  for (const group of data.series) {
    console.log(`    ${group.name.padEnd(40)} ${group.summaries.length} summaries`);
  }
}

// ==================== Summary table ====================

export interface SummaryOptions {
  groupBy: GroupByName;
  field: MeasurementField;
  axis?: string;
  bucketCount?: number;
}

export function summarizeRecords(
  records: readonly StatisticsRecord[],
  options: SummaryOptions
): GroupSeries[] {
  const axis = options.axis ? findKeyAxis(options.axis) : LENGTH_AXIS;
  if (!axis) {
    throw new MissingInputError(`key axis "${options.axis}"`);
  }
  const groups = groupRecords(records, groupKeyFor(options.groupBy, records));
  return mergeGroups(groups, { axis, bucketCount: options.bucketCount }).series;
}

/**
 * Format merged series as a markdown table
 */
export function formatSummaryTable(
  series: readonly GroupSeries[],
  field: MeasurementField,
  format: ValueFormatter = formatValue
): string {
  const lines: string[] = [
    `| Group | Key | Runs | Min | Median | Mean | Max |`,
    `|-------|-----|------|-----|--------|------|-----|`,
  ];

  for (const group of series) {
    for (const summary of group.summaries) {
      lines.push(
        `| ${group.name} | ${format(summary.key)} | ${summary.contained.length} | ` +
        `${format(summary.min[field])} | ${format(summary.median[field])} | ` +
        `${format(summary.mean[field])} | ${format(summary.max[field])} |`
      );
    }
  }

  return lines.join('\n');
}
