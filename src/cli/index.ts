#!/usr/bin/env node
/**
 * Benchplot CLI
 * Aggregates benchmark run files and renders comparative charts
 */

import { Command } from 'commander';
import { isBenchplotError } from '../errors.js';
import { writeRuntimeMemoryCsv } from '../export/runtime-memory-csv.js';
import { loadRecords } from '../loader/index.js';
import { BUILT_IN_REPORTS } from '../reports/definitions.js';
import { formatSummaryTable, runReports, summarizeRecords } from '../reports/runner.js';
import { enabledReports, loadConfig, validateConfig } from '../utils/config.js';
import {
  PlotCommandOptions,
  parseBucketCount,
  parseField,
  parseGroupBy,
  resolvePlotOptions,
} from './options.js';

const program = new Command();

function fail(error: unknown): never {
  if (isBenchplotError(error)) {
    console.error(`Error [${error.code}]: ${error.message}`);
    if (error.context) {
      console.error(JSON.stringify(error.context, null, 2));
    }
  } else {
    console.error('Error:', error);
  }
  process.exit(1);
}

program
  .name('benchplot')
  .description('Aggregate alignment benchmark runs and render comparative charts')
  .version('0.2.0')
  .option('-c, --config <path>', 'Config file (default: ./benchplot.config.json)');

// Plot command
program
  .command('plot <paths...>')
  .description('Render every enabled report as an SVG chart')
  .option('-b, --buckets <n>', 'Number of key buckets')
  .option('-t, --transform <kind>', 'Value axis transform: linear, log or root:<degree>')
  .option('-o, --output <dir>', 'Output directory for charts')
  .option('-r, --reports <names>', 'Comma-separated reports to render (overrides config toggles)')
  .option('--csv <path>', 'Also write a runtime/memory CSV')
  .option('-v, --verbose', 'Show per-report details')
  .action((paths: string[], options: PlotCommandOptions) => {
    try {
      const config = loadConfig(program.opts<{ config?: string }>().config);
      const validation = validateConfig(config);
      if (!validation.valid) {
        for (const message of validation.errors) {
          console.error(`Config: ${message}`);
        }
        process.exit(1);
      }

      const runOptions = resolvePlotOptions(options, config);
      const records = loadRecords(paths);
      console.log(`Loaded ${records.length} runs`);

      const outcomes = runReports(records, runOptions);
      for (const outcome of outcomes) {
        if (outcome.empty) {
          console.warn(`Skipped ${outcome.name}: no runs match its filter`);
          continue;
        }
        for (const group of outcome.skippedGroups) {
          console.warn(`${outcome.name}: group "${group}" has no matching runs`);
        }
        console.log(`Wrote ${outcome.outputPath}`);
      }

      if (runOptions.csvPath) {
        writeRuntimeMemoryCsv(records, runOptions.csvPath);
        console.log(`Wrote ${runOptions.csvPath}`);
      }
    } catch (error) {
      fail(error);
    }
  });

// Summary command
program
  .command('summary <paths...>')
  .description('Print merged summaries of one measurement field')
  .option('-g, --group-by <key>', 'Grouping: aligner, sequence or method', 'aligner')
  .option('-f, --field <name>', 'Measurement field', 'runtime')
  .option('-k, --key <axis>', 'Key axis: length or cost', 'length')
  .option('-b, --buckets <n>', 'Number of key buckets')
  .option('--json', 'Output as JSON')
  .action((paths: string[], options: { groupBy: string; field: string; key: string; buckets?: string; json?: boolean }) => {
    try {
      const field = parseField(options.field);
      const records = loadRecords(paths);
      const series = summarizeRecords(records, {
        groupBy: parseGroupBy(options.groupBy),
        field,
        axis: options.key,
        bucketCount: parseBucketCount(options.buckets),
      });

      if (options.json) {
        console.log(JSON.stringify(series, null, 2));
      } else {
        console.log(formatSummaryTable(series, field));
      }
    } catch (error) {
      fail(error);
    }
  });

// Reports command
program
  .command('reports')
  .description('List built-in reports and whether they are enabled')
  .action(() => {
    try {
      const config = loadConfig(program.opts<{ config?: string }>().config);
      const enabled = new Set(enabledReports(config));
      for (const report of BUILT_IN_REPORTS) {
        const status = enabled.has(report.name) ? 'on ' : 'off';
        console.log(`  [${status}] ${report.name.padEnd(28)} ${report.kind.padEnd(9)} ${report.title}`);
      }
    } catch (error) {
      fail(error);
    }
  });

program.parse();
