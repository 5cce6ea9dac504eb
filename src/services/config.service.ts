/**
 * Configuration Service
 *
 * Builds the relay configuration from defaults, an optional JSON file and
 * environment overrides, then validates the merged result once at startup.
 *
 * @module services/config
 * @security SEC-014: Input validation on all configuration sources
 */

import fs from 'fs';
import path from 'path';
import {
  DEFAULT_CONFIG,
  RelayConfigFileSchema,
  RelayConfigSchema,
  type RelayConfig,
  type RelayConfigFile,
} from '../shared/types/config.types';
import { ConfigValidationError } from '../utils/errors';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface LoadConfigOptions {
  /** Explicit config file; falls back to SCAN_RELAY_CONFIG, then ./scan-relay.config.json */
  configPath?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence values, mainly for tests */
  overrides?: RelayConfigFile;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_CONFIG_FILE = 'scan-relay.config.json';

/**
 * String-valued options that may be set from the environment
 */
const ENV_OVERRIDES = {
  SCAN_RELAY_API_BASE_URL: 'apiBaseUrl',
  SCAN_RELAY_HUB_PROVISIONING_ENDPOINT: 'hubProvisioningEndpoint',
  SCAN_RELAY_PROVISIONING_API_KEY: 'provisioningApiKey',
  SCAN_RELAY_API_KEY: 'apiKey',
  SCAN_RELAY_DATABASE_PATH: 'databasePath',
  SCAN_RELAY_LOG_LEVEL: 'logLevel',
  SCAN_RELAY_SOURCE_DEVICE_TAG: 'sourceDeviceTag',
} as const satisfies Record<string, keyof RelayConfigFile>;

const log = createLogger('config');

// ============================================================================
// Loading
// ============================================================================

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string[] {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Read and validate a config file. A missing file at the default location is
 * not an error; a missing file that was asked for explicitly is.
 */
export function readConfigFile(filePath: string, required: boolean): RelayConfigFile {
  if (!fs.existsSync(filePath)) {
    if (required) {
      throw new ConfigValidationError([`config file not found: ${filePath}`]);
    }
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : 'unreadable';
    throw new ConfigValidationError([`${filePath}: ${message}`]);
  }

  const parsed = RelayConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigValidationError(formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

/**
 * Collect string overrides from the environment
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const [envKey, configKey] of Object.entries(ENV_OVERRIDES)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== '') {
      overrides[configKey] = value.trim();
    }
  }
  return overrides;
}

/**
 * Load the relay configuration
 *
 * Precedence (lowest to highest): defaults, config file, environment, overrides.
 *
 * @throws ConfigValidationError when the merged configuration is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): RelayConfig {
  const env = options.env ?? process.env;
  const explicitPath = options.configPath ?? env.SCAN_RELAY_CONFIG;
  const filePath = path.resolve(explicitPath ?? DEFAULT_CONFIG_FILE);

  const fileConfig = readConfigFile(filePath, explicitPath !== undefined);
  const merged: unknown = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    ...readEnvOverrides(env),
    ...options.overrides,
  };

  const result = RelayConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = formatIssues(result.error.issues);
    log.error('Configuration validation failed', { issues });
    throw new ConfigValidationError(issues);
  }

  log.info('Configuration loaded', {
    file: fs.existsSync(filePath) ? filePath : null,
    apiBaseUrl: result.data.apiBaseUrl,
    hubProvisioningEndpoint: result.data.hubProvisioningEndpoint,
    maxRetries: result.data.maxRetries,
    drainBatchSize: result.data.drainBatchSize,
    requiredSinks: result.data.requiredSinks,
  });

  return result.data;
}
