/**
 * Tests for the report pipeline
 */

import { buildChartData } from '../src/reports/pipeline';
import { BUILT_IN_REPORTS, ReportDefinition, findReport } from '../src/reports/definitions';
import { AxisTransform } from '../src/statistics/axis-transform';
import { LENGTH_AXIS } from '../src/statistics/identity';
import { UnequalGroupSizesError } from '../src/errors';
import { StatisticsRecord } from '../src/types';
import { makeRecord } from './fixtures';

function matrix(): StatisticsRecord[] {
  const records: StatisticsRecord[] = [];
  for (const aligner of ['astar', 'blast']) {
    for (const length of [100, 200]) {
      for (const seed of [1, 2]) {
        records.push(makeRecord(
          { aligner, length, seed },
          {
            runtime: length / 100 + seed,
            templateSwitchAmount: aligner === 'astar' ? seed : 0,
          }
        ));
      }
    }
  }
  return records;
}

const runtimeLine: ReportDefinition = {
  name: 'runtime-test',
  title: 'Runtime',
  kind: 'line',
  field: 'runtime',
  valueLabel: 'Runtime [s]',
  axis: LENGTH_AXIS,
  groupBy: 'aligner',
};

describe('buildChartData', () => {
  it('should merge every group against shared ranges', () => {
    const data = buildChartData(matrix(), runtimeLine, { transform: AxisTransform.linear() });

    expect(data).not.toBeNull();
    if (!data) return;
    expect(data.series.map(s => s.name)).toEqual(['astar', 'blast']);
    expect(data.groupSize).toBe(4);
    expect(data.keyRange).toEqual({ min: 100, max: 200 });
    expect(data.valueRange).toEqual({ min: 2, max: 4 });
    expect(data.epsilon).toBeCloseTo(4e-12, 24);
    expect(data.series[0].summaries.map(s => s.median.runtime)).toEqual([2.5, 3.5]);
    expect(data.skippedGroups).toEqual([]);
  });

  it('should pass the bucket count through', () => {
    const data = buildChartData(matrix(), runtimeLine, { transform: AxisTransform.linear(), bucketCount: 1 });
    expect(data?.bucketCount).toBe(1);
    expect(data?.series[0].summaries).toHaveLength(1);
    expect(data?.series[0].summaries[0].key).toBe(150);
  });

  it('should skip groups emptied by the report filter', () => {
    const report = findReport('template-switch-histogram');
    expect(report).toBeDefined();
    if (!report) return;

    const data = buildChartData(matrix(), report, { transform: AxisTransform.linear() });
    expect(data?.series.map(s => s.name)).toEqual(['astar']);
    expect(data?.skippedGroups).toEqual(['blast']);
    expect(data?.valueRange).toEqual({ min: 1, max: 2 });
  });

  it('should return null when the filter removes every record', () => {
    const report: ReportDefinition = { ...runtimeLine, filter: () => false };
    expect(buildChartData(matrix(), report, { transform: AxisTransform.linear() })).toBeNull();
  });

  it('should enforce equal group sizes before filtering', () => {
    const records = [...matrix(), makeRecord({ aligner: 'astar', length: 300 })];
    expect(() => buildChartData(records, runtimeLine, { transform: AxisTransform.linear() }))
      .toThrow(UnequalGroupSizesError);
  });

  it('should run every built-in report on a complete matrix', () => {
    for (const report of BUILT_IN_REPORTS) {
      const data = buildChartData(matrix(), report, { transform: AxisTransform.root(2) });
      expect(data).not.toBeNull();
    }
  });
});
