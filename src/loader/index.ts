/**
 * Record loading
 * Expands paths into statistics files and decodes them as one batch
 */

import * as fs from 'fs';
import * as path from 'path';
import { MissingInputError, RecordParseError, SchemaMismatchError } from '../errors.js';
import { StatisticsRecord } from '../types.js';
import {
  StatisticsFileFormat,
  decodeStatisticsFile,
  parseStatisticsText,
  schemaSignature,
} from './statistics-file.js';

export * from './statistics-file.js';

const EXTENSIONS: Record<string, StatisticsFileFormat> = {
  '.toml': 'toml',
  '.json': 'json',
};

export function formatOf(filePath: string): StatisticsFileFormat | undefined {
  return EXTENSIONS[path.extname(filePath).toLowerCase()];
}

/**
 * Expand files and directories into a sorted list of statistics files.
 * Explicit files are kept whatever their extension; directories contribute
 * their .toml and .json files, recursively.
 */
export function collectStatisticsFiles(paths: readonly string[]): string[] {
  const files: string[] = [];

  const walk = (dir: string): void => {
    const entries = fs.readdirSync(dir, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(fullPath);
      } else if (entry.isFile() && formatOf(fullPath)) {
        files.push(fullPath);
      }
    }
  };

  for (const input of paths) {
    if (!fs.existsSync(input)) {
      throw new RecordParseError(input, 'no such file or directory');
    }
    if (fs.statSync(input).isDirectory()) {
      walk(input);
    } else {
      files.push(input);
    }
  }

  return files;
}

/**
 * Decode one file from disk
 */
export function loadRecord(filePath: string): { record: StatisticsRecord; signature: string[] } {
  const format = formatOf(filePath) ?? 'toml';
  const text = fs.readFileSync(filePath, 'utf-8');
  const raw = parseStatisticsText(text, format, filePath);
  return {
    record: decodeStatisticsFile(raw, filePath),
    signature: schemaSignature(raw),
  };
}

/**
 * Load every record of a batch. All records must share one schema.
 */
export function loadRecords(paths: readonly string[]): StatisticsRecord[] {
  if (paths.length === 0) {
    throw new MissingInputError('statistics files');
  }

  const files = collectStatisticsFiles(paths);
  if (files.length === 0) {
    throw new MissingInputError('statistics files');
  }

  const records: StatisticsRecord[] = [];
  let expected: string[] | undefined;

  for (const file of files) {
    const { record, signature } = loadRecord(file);
    if (expected === undefined) {
      expected = signature;
    } else if (signature.join(',') !== expected.join(',')) {
      throw new SchemaMismatchError(file, expected, signature);
    }
    records.push(record);
  }

  return records;
}
