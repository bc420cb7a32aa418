/**
 * Run settings resolution
 *
 * Priority order (highest to lowest):
 * 1. Command-line flags
 * 2. HUNKSCAN_FORMAT / HUNKSCAN_FAIL_ON / HUNKSCAN_CONCURRENCY
 * 3. Config file (~/.hunkscan/config.json)
 * 4. Built-in defaults
 */

import type { Severity } from '../catalog/types.js';
import { SEVERITIES } from '../catalog/types.js';
import { isOutputFormat, type OutputFormat } from '../report/formatters.js';
import { defaultConcurrency } from '../utils/index.js';
import { ConfigError, loadConfig, type HunkscanConfig } from './store.js';

/**
 * Settings given on the command line
 */
export interface SettingOverrides {
  format?: string;
  failOn?: string;
  concurrency?: string;
  rulesDirs?: string[];
  exclude?: string[];
}

/**
 * Fully resolved run settings
 */
export interface ResolvedSettings {
  format: OutputFormat;
  failOn?: Severity;
  concurrency: number;
  rulesDirs: string[];
  exclude: string[];
}

function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

function pick(flag: string | undefined, envName: string): { value: string; origin: string } | undefined {
  if (flag !== undefined) {
    return { value: flag, origin: 'command line' };
  }
  const fromEnv = process.env[envName];
  if (fromEnv) {
    return { value: fromEnv, origin: envName };
  }
  return undefined;
}

function resolveFormat(flag: string | undefined, config: HunkscanConfig): OutputFormat {
  const picked = pick(flag, 'HUNKSCAN_FORMAT');
  if (!picked) return config.format ?? 'summary';
  if (!isOutputFormat(picked.value)) {
    throw new ConfigError(`Unknown format "${picked.value}" from ${picked.origin}`);
  }
  return picked.value;
}

function resolveFailOn(flag: string | undefined, config: HunkscanConfig): Severity | undefined {
  const picked = pick(flag, 'HUNKSCAN_FAIL_ON');
  if (!picked) return config.failOn;
  if (!isSeverity(picked.value)) {
    throw new ConfigError(`Unknown severity "${picked.value}" from ${picked.origin}`);
  }
  return picked.value;
}

function resolveConcurrency(flag: string | undefined, config: HunkscanConfig): number {
  const picked = pick(flag, 'HUNKSCAN_CONCURRENCY');
  if (!picked) return config.concurrency ?? defaultConcurrency();
  const value = /^\d+$/.test(picked.value) ? Number.parseInt(picked.value, 10) : NaN;
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`Concurrency must be a positive integer, got "${picked.value}" from ${picked.origin}`);
  }
  return value;
}

/**
 * Resolve run settings from flags, environment and the config file
 *
 * Rule directories and exclusions accumulate: config entries first, then
 * those given on the command line.
 *
 * @throws ConfigError on a malformed value from any source
 */
export function resolveSettings(overrides: SettingOverrides = {}, config: HunkscanConfig = loadConfig()): ResolvedSettings {
  return {
    format: resolveFormat(overrides.format, config),
    failOn: resolveFailOn(overrides.failOn, config),
    concurrency: resolveConcurrency(overrides.concurrency, config),
    rulesDirs: [...(config.rulesDirs ?? []), ...(overrides.rulesDirs ?? [])],
    exclude: [...(config.exclude ?? []), ...(overrides.exclude ?? [])],
  };
}
