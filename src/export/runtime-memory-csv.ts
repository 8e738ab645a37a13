/**
 * Runtime / memory CSV export
 * One line per run, for analysis outside the chart pipeline
 */

import * as fs from 'fs';
import * as path from 'path';
import { StatisticsRecord } from '../types.js';

interface CsvColumn {
  name: string;
  value: (record: StatisticsRecord) => string;
}

function csvField(text: string): string {
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

const COLUMNS: readonly CsvColumn[] = [
  { name: 'aligner', value: record => csvField(record.identity.aligner) },
  { name: 'runtime_seconds', value: record => String(record.measurements.runtime) },
  { name: 'memory_bytes', value: record => String(record.measurements.memory) },
];

export function formatRuntimeMemoryCsv(records: readonly StatisticsRecord[]): string {
  const lines = [COLUMNS.map(column => column.name).join(',')];
  for (const record of records) {
    lines.push(COLUMNS.map(column => column.value(record)).join(','));
  }
  return lines.join('\n') + '\n';
}

export function writeRuntimeMemoryCsv(records: readonly StatisticsRecord[], outputPath: string): void {
  const dir = path.dirname(outputPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(outputPath, formatRuntimeMemoryCsv(records));
}
