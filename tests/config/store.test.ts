import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  ConfigError,
  clearConfig,
  deleteConfigValue,
  getConfigLocation,
  getConfigValue,
  isConfigKey,
  loadConfig,
  saveConfig,
  setConfigValue,
} from '../../src/config/store.js';
import { resolveSettings } from '../../src/config/env.js';

describe('config store', () => {
  let configDir: string;

  beforeEach(async () => {
    configDir = await mkdtemp(join(tmpdir(), 'hunkscan-config-'));
    vi.stubEnv('HUNKSCAN_CONFIG_DIR', configDir);
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(configDir, { recursive: true, force: true });
  });

  it('should place the config file in the configured directory', () => {
    expect(getConfigLocation()).toBe(join(configDir, 'config.json'));
  });

  it('should load an empty configuration when no file exists', () => {
    expect(loadConfig()).toEqual({});
  });

  it('should merge saved values', async () => {
    saveConfig({ format: 'json' });
    saveConfig({ failOn: 'high' });

    expect(loadConfig()).toEqual({ format: 'json', failOn: 'high' });
    expect(JSON.parse(await readFile(getConfigLocation(), 'utf-8'))).toEqual({ format: 'json', failOn: 'high' });
  });

  it('should parse values given as text', () => {
    setConfigValue('concurrency', '4');
    setConfigValue('exclude', 'vendor/**, fixtures/**');

    expect(getConfigValue('concurrency')).toBe(4);
    expect(getConfigValue('exclude')).toEqual(['vendor/**', 'fixtures/**']);
  });

  it('should reject invalid values', () => {
    expect(() => setConfigValue('format', 'html')).toThrow(ConfigError);
    expect(() => setConfigValue('concurrency', '0')).toThrow(ConfigError);
    expect(() => setConfigValue('failOn', 'urgent')).toThrow(ConfigError);
    expect(loadConfig()).toEqual({});
  });

  it('should delete and clear values', () => {
    saveConfig({ format: 'markdown', concurrency: 2 });

    deleteConfigValue('format');
    expect(loadConfig()).toEqual({ concurrency: 2 });

    clearConfig();
    expect(loadConfig()).toEqual({});
  });

  it('should reject a malformed config file', async () => {
    await writeFile(getConfigLocation(), '{ not json');
    expect(() => loadConfig()).toThrow(ConfigError);

    await writeFile(getConfigLocation(), JSON.stringify({ apiKey: 'test-secret' }));
    expect(() => loadConfig()).toThrow(/Invalid config file/);
  });

  it('should recognize config keys', () => {
    expect(isConfigKey('rulesDirs')).toBe(true);
    expect(isConfigKey('model')).toBe(false);
  });
});

describe('resolveSettings', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should fall back to built-in defaults', () => {
    vi.stubEnv('HUNKSCAN_FORMAT', '');
    vi.stubEnv('HUNKSCAN_FAIL_ON', '');
    vi.stubEnv('HUNKSCAN_CONCURRENCY', '');

    const settings = resolveSettings({}, {});

    expect(settings.format).toBe('summary');
    expect(settings.failOn).toBeUndefined();
    expect(settings.concurrency).toBeGreaterThanOrEqual(1);
    expect(settings.rulesDirs).toEqual([]);
    expect(settings.exclude).toEqual([]);
  });

  it('should prefer flags over environment over config', () => {
    vi.stubEnv('HUNKSCAN_FORMAT', 'json');
    vi.stubEnv('HUNKSCAN_FAIL_ON', 'high');
    vi.stubEnv('HUNKSCAN_CONCURRENCY', '');

    const settings = resolveSettings(
      { format: 'markdown', exclude: ['tmp/**'] },
      { format: 'detailed', failOn: 'low', concurrency: 3, exclude: ['vendor/**'] }
    );

    expect(settings.format).toBe('markdown');
    expect(settings.failOn).toBe('high');
    expect(settings.concurrency).toBe(3);
    expect(settings.exclude).toEqual(['vendor/**', 'tmp/**']);
  });

  it('should reject malformed values and name their source', () => {
    vi.stubEnv('HUNKSCAN_CONCURRENCY', 'many');

    expect(() => resolveSettings({}, {})).toThrow(/HUNKSCAN_CONCURRENCY/);
    expect(() => resolveSettings({ format: 'pdf' }, {})).toThrow(ConfigError);
    expect(() => resolveSettings({ concurrency: '0' }, {})).toThrow(/command line/);
  });
});
