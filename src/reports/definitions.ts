/**
 * Built-in reports
 * Each report names one chart and the subset of records it is drawn from.
 */

import { GroupByName, LENGTH_AXIS } from '../statistics/identity.js';
import { KeyAxis, MeasurementField, StatisticsRecord } from '../types.js';

export type ChartKind = 'box' | 'line' | 'histogram';

export interface ReportDefinition {
  name: string;
  title: string;
  kind: ChartKind;
  field: MeasurementField;
  valueLabel: string;
  axis: KeyAxis;
  groupBy: GroupByName;
  // Applied after grouping; groups it empties are skipped
  filter?: (record: StatisticsRecord) => boolean;
}

export const BUILT_IN_REPORTS: readonly ReportDefinition[] = [
  {
    name: 'runtime-by-length',
    title: 'Runtime by sequence length',
    kind: 'line',
    field: 'runtime',
    valueLabel: 'Runtime [s]',
    axis: LENGTH_AXIS,
    groupBy: 'aligner',
  },
  {
    name: 'memory-by-length',
    title: 'Peak memory by sequence length',
    kind: 'line',
    field: 'memory',
    valueLabel: 'Memory [B]',
    axis: LENGTH_AXIS,
    groupBy: 'aligner',
  },
  {
    name: 'opened-nodes-by-length',
    title: 'Opened nodes by sequence length',
    kind: 'line',
    field: 'openedNodes',
    valueLabel: 'Opened nodes',
    axis: LENGTH_AXIS,
    groupBy: 'aligner',
  },
  {
    name: 'runtime-boxplot',
    title: 'Runtime distribution',
    kind: 'box',
    field: 'runtime',
    valueLabel: 'Runtime [s]',
    axis: LENGTH_AXIS,
    groupBy: 'aligner',
  },
  {
    name: 'cost-boxplot',
    title: 'Alignment cost distribution',
    kind: 'box',
    field: 'cost',
    valueLabel: 'Cost',
    axis: LENGTH_AXIS,
    groupBy: 'aligner',
  },
  {
    name: 'template-switch-histogram',
    title: 'Template switches per alignment',
    kind: 'histogram',
    field: 'templateSwitchAmount',
    valueLabel: 'Template switches',
    axis: LENGTH_AXIS,
    groupBy: 'aligner',
    filter: record => record.measurements.templateSwitchAmount > 0,
  },
];

export const REPORT_NAMES: readonly string[] = BUILT_IN_REPORTS.map(report => report.name);

export function findReport(name: string): ReportDefinition | undefined {
  return BUILT_IN_REPORTS.find(report => report.name === name);
}
