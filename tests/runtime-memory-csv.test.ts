/**
 * Tests for the runtime / memory CSV export
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { formatRuntimeMemoryCsv, writeRuntimeMemoryCsv } from '../src/export/runtime-memory-csv';
import { makeRecord } from './fixtures';

describe('Runtime / memory CSV', () => {
  it('should write a header and one line per run', () => {
    const csv = formatRuntimeMemoryCsv([
      makeRecord({ aligner: 'astar' }, { runtime: 90.5, memory: 2048 }),
      makeRecord({ aligner: 'blast' }, { runtime: 3, memory: 0 }),
    ]);

    expect(csv).toBe('aligner,runtime_seconds,memory_bytes\nastar,90.5,2048\nblast,3,0\n');
  });

  it('should quote aligner names containing separators', () => {
    const csv = formatRuntimeMemoryCsv([makeRecord({ aligner: 'a,"b"' }, { runtime: 1, memory: 1 })]);
    expect(csv.split('\n')[1]).toBe('"a,""b""",1,1');
  });

  it('should write only the header for no runs', () => {
    expect(formatRuntimeMemoryCsv([])).toBe('aligner,runtime_seconds,memory_bytes\n');
  });

  it('should create the target directory', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'benchplot-csv-'));
    try {
      const target = path.join(dir, 'nested', 'runs.csv');
      writeRuntimeMemoryCsv([makeRecord({}, { runtime: 2, memory: 8 })], target);
      expect(fs.readFileSync(target, 'utf-8')).toBe('aligner,runtime_seconds,memory_bytes\nastar,2,8\n');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
