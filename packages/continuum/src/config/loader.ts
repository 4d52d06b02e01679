/**
 * Config Loader
 *
 * Loads configuration from .continuum/config.json, merges it over the
 * defaults and applies CONTINUUM_* environment variable overrides.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { DEFAULT_CONFIG, DEFAULT_DATA_DIR } from './defaults.js';
import type { ContinuumConfig } from './types.js';
import { ConfigValidationException, isPlainObject, validateConfig } from './validator.js';

// ============================================================================
// Constants
// ============================================================================

const CONFIG_FILE = 'config.json';

const DB_FILE = 'continuum.db';

const ENV_PREFIX = 'CONTINUUM_';

const ENV_VARS = {
  DATA_DIR: `${ENV_PREFIX}DATA_DIR`,
  DB_PATH: `${ENV_PREFIX}DB_PATH`,
  VERBOSE: `${ENV_PREFIX}VERBOSE`,
  MAX_DELEGATION_DEPTH: `${ENV_PREFIX}MAX_DELEGATION_DEPTH`,
  COLLABORATOR_TIMEOUT_MS: `${ENV_PREFIX}COLLABORATOR_TIMEOUT_MS`,
  UNIQUE_THRESHOLD: `${ENV_PREFIX}UNIQUE_THRESHOLD`,
  KERNEL_BATCH_SIZE: `${ENV_PREFIX}KERNEL_BATCH_SIZE`,
  KERNEL_MAX_ATTEMPTS: `${ENV_PREFIX}KERNEL_MAX_ATTEMPTS`,
  IMPROVEMENT_THRESHOLD: `${ENV_PREFIX}IMPROVEMENT_THRESHOLD`,
} as const;

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Error thrown when the configuration file cannot be read or parsed
 */
export class ConfigLoadError extends Error {
  public readonly filePath: string;
  public readonly errorCause: Error | undefined;

  constructor(message: string, filePath: string, errorCause?: Error) {
    super(message);
    this.name = 'ConfigLoadError';
    this.filePath = filePath;
    this.errorCause = errorCause;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Deep merge two records; source values override target values, arrays are replaced
 */
export function mergeRecords(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;
    const targetValue = target[key];
    result[key] =
      isPlainObject(sourceValue) && isPlainObject(targetValue)
        ? mergeRecords(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const lower = value.toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') return true;
  if (lower === 'false' || lower === '0' || lower === 'no') return false;
  return undefined;
}

function parseEnvNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const num = parseFloat(value);
  return isNaN(num) ? undefined : num;
}

function parseEnvInteger(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

function toRecord(config: ContinuumConfig): Record<string, unknown> {
  const plain: unknown = JSON.parse(JSON.stringify(config));
  return isPlainObject(plain) ? plain : {};
}

// ============================================================================
// Config Loader Class
// ============================================================================

export interface ConfigLoaderOptions {
  /** Directory containing .continuum/ (defaults to cwd) */
  rootDir?: string;
  applyEnvOverrides?: boolean;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface ConfigLoadResult {
  config: ContinuumConfig;
  configPath?: string;
  configFileFound: boolean;
  envOverridesApplied: boolean;
}

export class ConfigLoader {
  private readonly rootDir: string;
  private readonly applyEnvOverrides: boolean;
  private readonly env: NodeJS.ProcessEnv;
  private readonly configPath: string;
  private cachedConfig: ContinuumConfig | null = null;

  constructor(options: ConfigLoaderOptions = {}) {
    this.rootDir = options.rootDir ?? process.cwd();
    this.applyEnvOverrides = options.applyEnvOverrides ?? true;
    this.env = options.env ?? process.env;
    this.configPath = path.join(this.rootDir, DEFAULT_DATA_DIR, CONFIG_FILE);
  }

  /**
   * Load configuration from file, merge with defaults, and apply env overrides
   */
  async load(): Promise<ConfigLoadResult> {
    let raw = toRecord(DEFAULT_CONFIG);
    raw['dataDir'] = path.join(this.rootDir, DEFAULT_DATA_DIR);
    delete raw['dbPath'];
    let configFileFound = false;
    let envOverridesApplied = false;

    if (await fileExists(this.configPath)) {
      raw = mergeRecords(raw, await this.loadFromFile(this.configPath));
      configFileFound = true;
    }

    if (this.applyEnvOverrides) {
      const envConfig = this.getEnvOverrides();
      if (Object.keys(envConfig).length > 0) {
        raw = mergeRecords(raw, envConfig);
        envOverridesApplied = true;
      }
    }

    // dbPath follows dataDir unless set explicitly
    if (typeof raw['dbPath'] !== 'string' && typeof raw['dataDir'] === 'string') {
      raw['dbPath'] = path.join(raw['dataDir'], DB_FILE);
    }

    const result = validateConfig(raw, DEFAULT_CONFIG);
    if (!result.valid || !result.data) {
      throw new ConfigValidationException('Invalid continuum configuration', result.errors ?? []);
    }

    this.cachedConfig = result.data;

    return {
      config: result.data,
      ...(configFileFound ? { configPath: this.configPath } : {}),
      configFileFound,
      envOverridesApplied,
    };
  }

  /**
   * Get the cached configuration, loading if necessary
   */
  async getConfig(): Promise<ContinuumConfig> {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }
    const result = await this.load();
    return result.config;
  }

  /**
   * Save configuration to file
   */
  async save(config: ContinuumConfig): Promise<void> {
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 2), 'utf-8');
    this.cachedConfig = config;
  }

  private async loadFromFile(filePath: string): Promise<Record<string, unknown>> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new ConfigLoadError(`Failed to read configuration file: ${String(error)}`, filePath, cause);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new ConfigLoadError(`Failed to parse configuration file: ${cause?.message ?? String(error)}`, filePath, cause);
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigLoadError('Configuration must be a JSON object', filePath);
    }
    return parsed;
  }

  /**
   * Collect CONTINUUM_* overrides as a nested record
   */
  private getEnvOverrides(): Record<string, unknown> {
    const overrides: Record<string, unknown> = {};
    const ring: Record<string, unknown> = {};
    const kernelPass: Record<string, unknown> = {};

    const dataDir = this.env[ENV_VARS.DATA_DIR];
    if (dataDir) overrides['dataDir'] = dataDir;

    const dbPath = this.env[ENV_VARS.DB_PATH];
    if (dbPath) overrides['dbPath'] = dbPath;

    const verbose = parseEnvBoolean(this.env[ENV_VARS.VERBOSE]);
    if (verbose !== undefined) overrides['verbose'] = verbose;

    const depth = parseEnvInteger(this.env[ENV_VARS.MAX_DELEGATION_DEPTH]);
    if (depth !== undefined) ring['maxDelegationDepth'] = depth;

    const timeout = parseEnvInteger(this.env[ENV_VARS.COLLABORATOR_TIMEOUT_MS]);
    if (timeout !== undefined) ring['collaboratorTimeoutMs'] = timeout;

    const uniqueThreshold = parseEnvNumber(this.env[ENV_VARS.UNIQUE_THRESHOLD]);
    if (uniqueThreshold !== undefined) ring['uniqueThreshold'] = uniqueThreshold;

    const batchSize = parseEnvInteger(this.env[ENV_VARS.KERNEL_BATCH_SIZE]);
    if (batchSize !== undefined) kernelPass['batchSize'] = batchSize;

    const maxAttempts = parseEnvInteger(this.env[ENV_VARS.KERNEL_MAX_ATTEMPTS]);
    if (maxAttempts !== undefined) kernelPass['maxAttempts'] = maxAttempts;

    const improvement = parseEnvNumber(this.env[ENV_VARS.IMPROVEMENT_THRESHOLD]);
    if (improvement !== undefined) kernelPass['improvementThreshold'] = improvement;

    if (Object.keys(kernelPass).length > 0) ring['kernelPass'] = kernelPass;
    if (Object.keys(ring).length > 0) overrides['ring'] = ring;

    return overrides;
  }
}
