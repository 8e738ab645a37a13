/**
 * Tests for configuration management
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  enabledReports,
  getConfig,
  loadConfig,
  resetConfig,
  saveConfig,
  updateConfig,
  validateConfig,
} from '../src/utils/config';
import { ConfigFileError, InvalidInputError } from '../src/errors';
import { REPORT_NAMES } from '../src/reports/definitions';

describe('Configuration', () => {
  let testDir: string;
  let originalEnv: NodeJS.ProcessEnv;

  beforeAll(() => {
    testDir = path.join(os.tmpdir(), `benchplot-config-test-${Date.now()}`);
    fs.mkdirSync(testDir, { recursive: true });
    originalEnv = { ...process.env };
  });

  afterAll(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
    process.env = originalEnv;
  });

  beforeEach(() => {
    // Reset config state for test isolation
    resetConfig();
    delete process.env.BENCHPLOT_BUCKETS;
    delete process.env.BENCHPLOT_TRANSFORM;
    delete process.env.BENCHPLOT_OUTPUT_DIR;
  });

  describe('loadConfig', () => {
    it('should load default config', () => {
      const config = loadConfig(path.join(testDir, 'nonexistent.json'));

      expect(config.transform).toBe('linear');
      expect(config.bucketCount).toBeUndefined();
      expect(config.histogramBins).toBe(20);
      expect(enabledReports(config)).toEqual(REPORT_NAMES);
    });

    it('should load config from file', () => {
      const configPath = path.join(testDir, 'test-config.json');
      fs.writeFileSync(configPath, JSON.stringify({
        bucketCount: 8,
        transform: 'log',
        reports: { 'cost-boxplot': false },
      }));

      const config = loadConfig(configPath);

      expect(config.bucketCount).toBe(8);
      expect(config.transform).toBe('log');
      expect(config.reports['cost-boxplot']).toBe(false);
      expect(config.reports['runtime-boxplot']).toBe(true);
      expect(enabledReports(config)).not.toContain('cost-boxplot');
    });

    it('should fail on a malformed config file', () => {
      const configPath = path.join(testDir, 'invalid.json');
      fs.writeFileSync(configPath, 'not valid json');

      expect(() => loadConfig(configPath)).toThrow(ConfigFileError);
    });

    it('should fail on unknown config keys', () => {
      const configPath = path.join(testDir, 'unknown-key.json');
      fs.writeFileSync(configPath, JSON.stringify({ bukets: 3 }));

      expect(() => loadConfig(configPath)).toThrow(ConfigFileError);
    });

    it('should override with environment variables', () => {
      process.env.BENCHPLOT_BUCKETS = '5';
      process.env.BENCHPLOT_TRANSFORM = 'root:2';
      process.env.BENCHPLOT_OUTPUT_DIR = path.join(testDir, 'charts');

      const config = loadConfig(path.join(testDir, 'nonexistent.json'));

      expect(config.bucketCount).toBe(5);
      expect(config.transform).toBe('root:2');
      expect(config.outputDir).toBe(path.join(testDir, 'charts'));
    });

    it('should reject a non-numeric bucket count from the environment', () => {
      process.env.BENCHPLOT_BUCKETS = 'many';
      expect(() => loadConfig(path.join(testDir, 'nonexistent.json'))).toThrow(InvalidInputError);
    });
  });

  describe('updateConfig', () => {
    it('should update configuration and merge report toggles', () => {
      loadConfig(path.join(testDir, 'nonexistent.json'));
      updateConfig({ bucketCount: 3, reports: { 'memory-by-length': false } });

      const config = getConfig();
      expect(config.bucketCount).toBe(3);
      expect(config.reports['memory-by-length']).toBe(false);
      expect(config.reports['runtime-by-length']).toBe(true);
    });

    it('should survive a later loadConfig without a path', () => {
      updateConfig({ transform: 'log' });
      expect(loadConfig().transform).toBe('log');
    });
  });

  describe('saveConfig', () => {
    it('should save config to file', () => {
      const configPath = path.join(testDir, 'saved', 'config.json');
      updateConfig({ bucketCount: 6 });

      saveConfig(configPath);

      const saved = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      expect(saved.bucketCount).toBe(6);
    });
  });

  describe('validateConfig', () => {
    it('should accept the defaults', () => {
      expect(validateConfig()).toEqual({ valid: true, errors: [] });
    });

    it('should reject a zero bucket count', () => {
      updateConfig({ bucketCount: 0 });
      const result = validateConfig();
      expect(result.valid).toBe(false);
      expect(result.errors).toContain('bucketCount must be a positive integer');
    });

    it('should reject a root degree below 1', () => {
      updateConfig({ transform: 'root:0' });
      const result = validateConfig();
      expect(result.valid).toBe(false);
      expect(result.errors).toContain('Root transform degree must be at least 1, got 0');
    });

    it('should reject unknown reports', () => {
      updateConfig({ reports: { 'latency-heatmap': true } });
      expect(validateConfig().errors).toContain('Unknown report: latency-heatmap');
    });
  });
});
