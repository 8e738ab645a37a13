/**
 * Configuration Management for Benchplot
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigFileError, InvalidInputError } from '../errors.js';
import { REPORT_NAMES } from '../reports/definitions.js';
import { parseAxisTransform } from '../statistics/axis-transform.js';

export interface BenchplotConfig {
  bucketCount?: number;
  transform: string;
  outputDir: string;
  csvPath?: string;
  histogramBins: number;
  reports: Record<string, boolean>;
}

export const DEFAULT_CONFIG_FILE = 'benchplot.config.json';

function defaultReports(): Record<string, boolean> {
  return Object.fromEntries(REPORT_NAMES.map(name => [name, true]));
}

function defaultConfig(): BenchplotConfig {
  return {
    transform: 'linear',
    outputDir: path.join(process.cwd(), 'plots'),
    histogramBins: 20,
    reports: defaultReports(),
  };
}

// Shape of benchplot.config.json; value ranges are checked by validateConfig
const ConfigFileSchema = z.object({
  bucketCount: z.number().optional(),
  transform: z.string().optional(),
  outputDir: z.string().optional(),
  csvPath: z.string().optional(),
  histogramBins: z.number().optional(),
  reports: z.record(z.string(), z.boolean()).optional(),
}).strict();

let currentConfig: BenchplotConfig = defaultConfig();
let configLoaded = false;

/**
 * Load configuration from file and environment.
 * Idempotent - only loads once unless a specific configPath is provided.
 */
export function loadConfig(configPath?: string): BenchplotConfig {
  if (configLoaded && !configPath) {
    return currentConfig;
  }

  const filePath = configPath || path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  currentConfig = defaultConfig();

  if (fs.existsSync(filePath)) {
    let fileConfig: z.infer<typeof ConfigFileSchema>;
    try {
      const fileContent = fs.readFileSync(filePath, 'utf-8');
      fileConfig = ConfigFileSchema.parse(JSON.parse(fileContent));
    } catch (error) {
      throw new ConfigFileError(filePath, error instanceof Error ? error.message : String(error));
    }

    const { reports, ...rest } = fileConfig;
    currentConfig = {
      ...currentConfig,
      ...rest,
      reports: { ...currentConfig.reports, ...reports },
    };
  }

  // Override with environment variables
  if (process.env.BENCHPLOT_BUCKETS) {
    const buckets = Number(process.env.BENCHPLOT_BUCKETS);
    if (Number.isNaN(buckets)) {
      throw new InvalidInputError('BENCHPLOT_BUCKETS', `"${process.env.BENCHPLOT_BUCKETS}" is not a number`);
    }
    currentConfig.bucketCount = buckets;
  }
  if (process.env.BENCHPLOT_TRANSFORM) {
    currentConfig.transform = process.env.BENCHPLOT_TRANSFORM;
  }
  if (process.env.BENCHPLOT_OUTPUT_DIR) {
    currentConfig.outputDir = process.env.BENCHPLOT_OUTPUT_DIR;
  }

  configLoaded = true;
  return currentConfig;
}

/**
 * Get current configuration
 */
export function getConfig(): BenchplotConfig {
  return currentConfig;
}

/**
 * Update configuration (marks config as loaded to prevent reset)
 */
export function updateConfig(updates: Partial<BenchplotConfig>): BenchplotConfig {
  currentConfig = {
    ...currentConfig,
    ...updates,
    reports: { ...currentConfig.reports, ...updates.reports },
  };
  configLoaded = true;
  return currentConfig;
}

/**
 * Reset configuration to defaults (for testing)
 */
export function resetConfig(): void {
  currentConfig = defaultConfig();
  configLoaded = false;
}

/**
 * Save configuration to file
 */
export function saveConfig(configPath?: string): void {
  const filePath = configPath || path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  fs.writeFileSync(filePath, JSON.stringify(currentConfig, null, 2));
}

/**
 * Names of the reports switched on
 */
export function enabledReports(config: BenchplotConfig = currentConfig): string[] {
  return REPORT_NAMES.filter(name => config.reports[name] !== false);
}

/**
 * Validate configuration
 */
export function validateConfig(config: BenchplotConfig = currentConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (config.bucketCount !== undefined && (!Number.isInteger(config.bucketCount) || config.bucketCount < 1)) {
    errors.push('bucketCount must be a positive integer');
  }

  try {
    parseAxisTransform(config.transform);
  } catch (error) {
    errors.push(error instanceof Error ? error.message : String(error));
  }

  if (!Number.isInteger(config.histogramBins) || config.histogramBins < 1) {
    errors.push('histogramBins must be a positive integer');
  }

  for (const name of Object.keys(config.reports)) {
    if (!REPORT_NAMES.includes(name)) {
      errors.push(`Unknown report: ${name}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
