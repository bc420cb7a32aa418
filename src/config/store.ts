/**
 * Configuration Store
 *
 * Manages persistent configuration stored in user's home directory.
 * Config file: ~/.hunkscan/config.json (directory overridable by HUNKSCAN_CONFIG_DIR)
 */

import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { SEVERITIES } from '../catalog/types.js';
import { OUTPUT_FORMATS } from '../report/formatters.js';

export const ConfigSchema = z
  .object({
    /** Default report format */
    format: z.enum(OUTPUT_FORMATS).optional(),
    /** Exit with code 2 when a finding at or above this severity exists */
    failOn: z.enum(SEVERITIES).optional(),
    /** Files analyzed in parallel */
    concurrency: z.number().int().positive().optional(),
    /** Extra rule directories loaded after the built-in catalog */
    rulesDirs: z.array(z.string().min(1)).optional(),
    /** Exclusion globs added to every run */
    exclude: z.array(z.string().min(1)).optional(),
  })
  .strict();

/**
 * Configuration structure
 */
export type HunkscanConfig = z.infer<typeof ConfigSchema>;

export type ConfigKey = keyof HunkscanConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = ['format', 'failOn', 'concurrency', 'rulesDirs', 'exclude'];

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path?: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEYS.some((key) => key === value);
}

/**
 * Get config directory path
 */
function getConfigDir(): string {
  return process.env.HUNKSCAN_CONFIG_DIR || join(homedir(), '.hunkscan');
}

/**
 * Get config file path
 */
function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

/**
 * Ensure config directory exists
 */
function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

function writeConfig(config: HunkscanConfig): void {
  ensureConfigDir();
  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

/**
 * Load configuration from file
 *
 * A missing file is an empty configuration; a file that is not valid JSON
 * or does not match the schema raises ConfigError.
 */
export function loadConfig(): HunkscanConfig {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse config file at ${configPath}: ${reason}`, configPath);
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file at ${configPath}: ${issues}`, configPath);
  }

  return parsed.data;
}

/**
 * Save configuration to file, merged over what is already stored
 */
export function saveConfig(config: HunkscanConfig): void {
  const merged = ConfigSchema.parse({ ...loadConfig(), ...config });

  // Remove undefined values
  const cleaned = Object.fromEntries(Object.entries(merged).filter(([, v]) => v !== undefined));

  writeConfig(cleaned);
}

/**
 * Get a specific config value
 */
export function getConfigValue<K extends ConfigKey>(key: K): HunkscanConfig[K] {
  const config = loadConfig();
  return config[key];
}

/**
 * Set a config value from its command-line text
 *
 * List keys take a comma-separated value; concurrency takes an integer.
 */
export function setConfigValue(key: ConfigKey, text: string): void {
  const value = parseConfigText(key, text);
  const candidate = ConfigSchema.safeParse({ [key]: value });
  if (!candidate.success) {
    const message = candidate.error.issues.map((issue) => issue.message).join('; ');
    throw new ConfigError(`Invalid value for ${key}: ${message}`);
  }
  saveConfig(candidate.data);
}

function parseConfigText(key: ConfigKey, text: string): unknown {
  switch (key) {
    case 'concurrency':
      return /^\d+$/.test(text) ? Number.parseInt(text, 10) : text;
    case 'rulesDirs':
    case 'exclude':
      return text
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0);
    case 'format':
    case 'failOn':
      return text;
  }
}

/**
 * Delete a specific config value
 */
export function deleteConfigValue(key: ConfigKey): void {
  const config = loadConfig();
  delete config[key];
  writeConfig(config);
}

/**
 * Clear all configuration
 */
export function clearConfig(): void {
  writeConfig({});
}

/**
 * Get config file location (for display purposes)
 */
export function getConfigLocation(): string {
  return getConfigPath();
}
