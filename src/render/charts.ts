/**
 * Chart rendering
 *
 * Consumes ChartData produced by the report pipeline and draws it as SVG.
 * Summaries are only read, never modified.
 */

import { flattenSeries } from '../statistics/merger.js';
import { fieldValues } from '../statistics/measurements.js';
import { boxPlotQuartiles, suppressBelow } from '../statistics/quartiles.js';
import { ChartData } from '../reports/pipeline.js';
import { LinearScale, chartValueRange, formatChartTick, formatTick, widenKeyRange } from './axes.js';
import { SvgDocument } from './svg.js';

export interface RenderOptions {
  width?: number;
  height?: number;
  histogramBins?: number;
}

const PALETTE = [
  '#1f77b4', '#ff7f0e', '#2ca02c', '#d62728', '#9467bd',
  '#8c564b', '#e377c2', '#7f7f7f', '#bcbd22', '#17becf',
];

const MARGIN = { top: 50, right: 220, bottom: 60, left: 80 };
const TICK_COUNT = 5;

export function seriesColor(index: number): string {
  return PALETTE[index % PALETTE.length];
}

interface Frame {
  svg: SvgDocument;
  left: number;
  right: number;
  top: number;
  bottom: number;
}

function createFrame(data: ChartData, options: RenderOptions): Frame {
  const width = options.width ?? 960;
  const height = options.height ?? 600;
  const svg = new SvgDocument(width, height);

  svg.rect({ x: 0, y: 0, width, height, fill: 'white' });

  const subtitle = [
    `value axis: ${data.transform.toString()}`,
    data.bucketCount === undefined ? undefined : `${data.bucketCount} buckets`,
    `${data.groupSize} runs per group`,
  ].filter((part): part is string => part !== undefined).join(', ');

  svg.text(width / 2, 24, data.report.title, { 'text-anchor': 'middle', 'font-size': 18 });
  svg.text(width / 2, 42, subtitle, { 'text-anchor': 'middle', 'font-size': 11, fill: '#555' });

  return {
    svg,
    left: MARGIN.left,
    right: width - MARGIN.right,
    top: MARGIN.top,
    bottom: height - MARGIN.bottom,
  };
}

function drawLegend(frame: Frame, names: readonly string[]): void {
  names.forEach((name, index) => {
    const y = frame.top + 10 + index * 20;
    frame.svg.rect({ x: frame.right + 20, y: y - 9, width: 12, height: 12, fill: seriesColor(index) });
    frame.svg.text(frame.right + 38, y + 1, name, { 'font-size': 12 });
  });
}

function drawValueAxis(frame: Frame, scale: LinearScale, label: string, tickLabel: (value: number) => string): void {
  const { svg } = frame;
  svg.line(frame.left, frame.top, frame.left, frame.bottom, { stroke: 'black' });
  for (const tick of scale.ticks(TICK_COUNT)) {
    const y = scale.map(tick);
    svg.line(frame.left - 5, y, frame.left, y, { stroke: 'black' });
    svg.line(frame.left, y, frame.right, y, { stroke: '#e0e0e0' });
    svg.text(frame.left - 8, y + 4, tickLabel(tick), { 'text-anchor': 'end', 'font-size': 11 });
  }
  const middle = (frame.top + frame.bottom) / 2;
  svg.text(18, middle, label, {
    'text-anchor': 'middle',
    'font-size': 12,
    transform: `rotate(-90 18 ${middle})`,
  });
}

function drawKeyAxis(frame: Frame, ticks: ReadonlyArray<{ x: number; label: string }>, label: string): void {
  const { svg } = frame;
  svg.line(frame.left, frame.bottom, frame.right, frame.bottom, { stroke: 'black' });
  for (const tick of ticks) {
    svg.line(tick.x, frame.bottom, tick.x, frame.bottom + 5, { stroke: 'black' });
    svg.text(tick.x, frame.bottom + 18, tick.label, { 'text-anchor': 'middle', 'font-size': 11 });
  }
  svg.text((frame.left + frame.right) / 2, frame.bottom + 42, label, { 'text-anchor': 'middle', 'font-size': 12 });
}

// ==================== Line chart ====================

/**
 * Median per summary, with the min–max range as a translucent band
 */
export function renderLineChart(data: ChartData, options: RenderOptions = {}): string {
  const frame = createFrame(data, options);
  const field = data.report.field;
  const keyScale = new LinearScale(widenKeyRange(data.keyRange), frame.left, frame.right);
  const valueScale = new LinearScale(chartValueRange(data), frame.bottom, frame.top);
  const toY = (value: number): number =>
    valueScale.map(data.transform.apply(suppressBelow(value, data.epsilon)));

  drawValueAxis(frame, valueScale, `${data.report.valueLabel} (${data.transform.toString()})`,
    tick => formatChartTick(tick, data.transform, data.format));
  drawKeyAxis(
    frame,
    keyScale.ticks(TICK_COUNT).map(tick => ({ x: keyScale.map(tick), label: formatTick(tick, data.format) })),
    data.report.axis.label
  );

  data.series.forEach((group, index) => {
    const color = seriesColor(index);
    const upper = group.summaries.map((s): [number, number] => [keyScale.map(s.key), toY(s.max[field])]);
    const lower = group.summaries.map((s): [number, number] => [keyScale.map(s.key), toY(s.min[field])]);
    frame.svg.polygon([...upper, ...lower.reverse()], { fill: color, 'fill-opacity': 0.15, stroke: 'none' });

    const medians = group.summaries.map((s): [number, number] => [keyScale.map(s.key), toY(s.median[field])]);
    frame.svg.polyline(medians, { stroke: color, 'stroke-width': 2 });
    for (const [x, y] of medians) {
      frame.svg.circle(x, y, 3, { fill: color });
    }
  });

  drawLegend(frame, data.series.map(group => group.name));
  return frame.svg.toString();
}

// ==================== Box chart ====================

/**
 * One box per summary. Distinct keys form the x slots; groups share a slot side by side.
 */
export function renderBoxChart(data: ChartData, options: RenderOptions = {}): string {
  const frame = createFrame(data, options);
  const field = data.report.field;
  const valueScale = new LinearScale(chartValueRange(data), frame.bottom, frame.top);

  const keys = [...new Set(data.series.flatMap(group => group.summaries.map(s => s.key)))]
    .sort((a, b) => a - b);
  const slotWidth = (frame.right - frame.left) / Math.max(keys.length, 1);
  const boxWidth = (slotWidth * 0.8) / Math.max(data.series.length, 1);
  const slotOf = new Map(keys.map((key, index) => [key, index]));

  drawValueAxis(frame, valueScale, `${data.report.valueLabel} (${data.transform.toString()})`,
    tick => formatChartTick(tick, data.transform, data.format));
  drawKeyAxis(
    frame,
    keys.map((key, index) => ({
      x: frame.left + slotWidth * (index + 0.5),
      label: formatTick(key, data.format),
    })),
    data.report.axis.label
  );

  data.series.forEach((group, groupIndex) => {
    const color = seriesColor(groupIndex);
    for (const summary of group.summaries) {
      const slot = slotOf.get(summary.key) ?? 0;
      const x = frame.left + slotWidth * slot + slotWidth * 0.1 + boxWidth * groupIndex;
      const center = x + boxWidth / 2;
      const q = boxPlotQuartiles(summary, field, data.epsilon, data.transform);
      const [yMin, yQ1, yMedian, yQ3, yMax] = [q.min, q.q1, q.median, q.q3, q.max].map(v => valueScale.map(v));

      frame.svg.line(center, yMin, center, yQ1, { stroke: color });
      frame.svg.line(center, yQ3, center, yMax, { stroke: color });
      frame.svg.line(x + boxWidth * 0.25, yMin, x + boxWidth * 0.75, yMin, { stroke: color });
      frame.svg.line(x + boxWidth * 0.25, yMax, x + boxWidth * 0.75, yMax, { stroke: color });
      frame.svg.rect({
        x,
        y: yQ3,
        width: boxWidth,
        height: Math.max(yQ1 - yQ3, 0),
        fill: color,
        'fill-opacity': 0.3,
        stroke: color,
      });
      frame.svg.line(x, yMedian, x + boxWidth, yMedian, { stroke: color, 'stroke-width': 2 });
    }
  });

  drawLegend(frame, data.series.map(group => group.name));
  return frame.svg.toString();
}

// ==================== Histogram ====================

/**
 * Bin counts of chart-space values over `binCount` equal bins of `range`
 */
export function histogramCounts(values: readonly number[], range: { min: number; max: number }, binCount: number): number[] {
  const counts = new Array<number>(binCount).fill(0);
  const width = range.max - range.min;
  for (const value of values) {
    if (!Number.isFinite(value)) continue;
    const raw = width <= 0 ? 0 : Math.floor(((value - range.min) * binCount) / width);
    counts[Math.min(Math.max(raw, 0), binCount - 1)] += 1;
  }
  return counts;
}

/**
 * Raw values of every group, binned along the transformed value axis
 */
export function renderHistogram(data: ChartData, options: RenderOptions = {}): string {
  const frame = createFrame(data, options);
  const field = data.report.field;
  const binCount = options.histogramBins ?? 20;
  const valueRange = chartValueRange(data);
  const valueScale = new LinearScale(valueRange, frame.left, frame.right);

  const counts = data.series.map(group =>
    histogramCounts(
      fieldValues(flattenSeries(group), field)
        .map(value => data.transform.apply(suppressBelow(value, data.epsilon))),
      valueRange,
      binCount
    )
  );
  const highest = Math.max(1, ...counts.flat());
  const countScale = new LinearScale({ min: 0, max: highest }, frame.bottom, frame.top);

  drawValueAxis(frame, countScale, 'Runs', tick => formatTick(tick, data.format));
  drawKeyAxis(
    frame,
    valueScale.ticks(TICK_COUNT).map(tick => ({
      x: valueScale.map(tick),
      label: formatChartTick(tick, data.transform, data.format),
    })),
    `${data.report.valueLabel} (${data.transform.toString()})`
  );

  const binWidth = (frame.right - frame.left) / binCount;
  const barWidth = binWidth / Math.max(data.series.length, 1);
  counts.forEach((groupCounts, groupIndex) => {
    groupCounts.forEach((count, bin) => {
      if (count === 0) return;
      const y = countScale.map(count);
      frame.svg.rect({
        x: frame.left + bin * binWidth + groupIndex * barWidth,
        y,
        width: barWidth,
        height: frame.bottom - y,
        fill: seriesColor(groupIndex),
      });
    });
  });

  drawLegend(frame, data.series.map(group => group.name));
  return frame.svg.toString();
}

export function renderChart(data: ChartData, options: RenderOptions = {}): string {
  switch (data.report.kind) {
    case 'line':
      return renderLineChart(data, options);
    case 'box':
      return renderBoxChart(data, options);
    case 'histogram':
      return renderHistogram(data, options);
  }
}
