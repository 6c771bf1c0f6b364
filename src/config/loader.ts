/**
 * Configuration File Loader
 *
 * Loads configuration from multiple sources with precedence:
 * 1. Environment variables (highest priority)
 * 2. Project-local config (.channel-bus/config.yml)
 * 3. Global user config (~/.channel-bus/config.yml)
 * 4. Built-in defaults (lowest priority)
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import { AppConfigSchema, type AppConfig } from './schema.js';
import { DEFAULT_CONFIG } from './defaults.js';

/**
 * Loosely-typed configuration fragment, validated only after merging
 */
export type ConfigRecord = Record<string, unknown>;

/**
 * Directory name used for both global and project configuration
 */
export const CONFIG_DIR_NAME = '.channel-bus';

/**
 * Cached configuration to avoid repeated file system access
 */
let cachedConfig: AppConfig | null = null;

/**
 * Load and merge configuration from all sources.
 *
 * @returns Complete configuration with all required fields
 * @throws {Error} If configuration validation fails
 */
export function loadConfig(): AppConfig {
  let config: ConfigRecord = deepClone({ ...DEFAULT_CONFIG });

  const globalConfig = loadConfigFile(path.join(os.homedir(), CONFIG_DIR_NAME, 'config.yml'));
  if (globalConfig) {
    config = deepMerge(config, globalConfig);
  }

  const projectConfig = loadConfigFile(path.join(process.cwd(), CONFIG_DIR_NAME, 'config.yml'));
  if (projectConfig) {
    config = deepMerge(config, projectConfig);
  }

  const envConfig = loadEnvironmentConfig();
  if (envConfig) {
    config = deepMerge(config, envConfig);
  }

  try {
    const validated = AppConfigSchema.parse(config);
    cachedConfig = validated;
    return validated;
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(formatValidationErrors(error));
    }
    throw error;
  }
}

/**
 * Get cached configuration or load if not cached.
 */
export function getConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }
  return loadConfig();
}

/**
 * Reload configuration, clearing cache and re-reading all sources.
 */
export function reloadConfig(): AppConfig {
  cachedConfig = null;
  return loadConfig();
}

/**
 * Clear cached configuration. Useful for testing.
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Load configuration from a YAML file.
 *
 * @param filePath - Path to YAML configuration file
 * @returns Parsed configuration object or null if file doesn't exist
 * @throws {Error} If YAML parsing fails
 */
export function loadConfigFile(filePath: string): ConfigRecord | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new Error(
        `YAML parsing error in ${filePath}:\n` +
          `  Line ${error.mark?.line ?? '?'}: ${error.message}`
      );
    }
    throw error;
  }

  // Empty file returns null
  if (parsed === null || parsed === undefined) {
    return null;
  }

  if (!isPlainObject(parsed)) {
    throw new Error(`Invalid configuration file: ${filePath} - expected object`);
  }

  return parsed;
}

/**
 * Load configuration from environment variables.
 *
 * Supported variables:
 * - CHANNEL_BUS_MAX_QUEUE_SIZE
 * - CHANNEL_BUS_POLL_INTERVAL
 * - CHANNEL_BUS_RPC_TIMEOUT
 * - CHANNEL_BUS_LOG_LEVEL
 * - CHANNEL_BUS_LOG_FILE
 * - CHANNEL_BUS_CONSOLE_OUTPUT
 *
 * @returns Partial configuration from environment variables
 */
export function loadEnvironmentConfig(): ConfigRecord | null {
  const env = process.env;
  const broker: ConfigRecord = {};
  const rpc: ConfigRecord = {};
  const logging: ConfigRecord = {};

  if (env.CHANNEL_BUS_MAX_QUEUE_SIZE) {
    broker.maxQueueSize = parseInt(env.CHANNEL_BUS_MAX_QUEUE_SIZE, 10);
  }
  if (env.CHANNEL_BUS_POLL_INTERVAL) {
    broker.pollInterval = parseInt(env.CHANNEL_BUS_POLL_INTERVAL, 10);
  }

  if (env.CHANNEL_BUS_RPC_TIMEOUT) {
    rpc.timeout = Number(env.CHANNEL_BUS_RPC_TIMEOUT);
  }

  if (env.CHANNEL_BUS_LOG_LEVEL) {
    logging.level = env.CHANNEL_BUS_LOG_LEVEL;
  }
  if (env.CHANNEL_BUS_LOG_FILE) {
    logging.filePath = env.CHANNEL_BUS_LOG_FILE;
  }
  if (env.CHANNEL_BUS_CONSOLE_OUTPUT !== undefined) {
    logging.consoleOutput = env.CHANNEL_BUS_CONSOLE_OUTPUT === 'true';
  }

  const config: ConfigRecord = {};
  if (Object.keys(broker).length > 0) config.broker = broker;
  if (Object.keys(rpc).length > 0) config.rpc = rpc;
  if (Object.keys(logging).length > 0) config.logging = logging;

  return Object.keys(config).length > 0 ? config : null;
}

/**
 * Deep merge two objects, with source overriding target.
 *
 * - Nested objects are merged recursively
 * - Arrays are replaced entirely (not merged)
 * - Primitive values in source override target
 */
export function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (sourceValue === undefined) {
      continue;
    }

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Deep clone a JSON-compatible object.
 */
export function deepClone<T>(obj: T): T {
  return JSON.parse(JSON.stringify(obj));
}

/**
 * Format Zod validation errors into human-readable message.
 */
export function formatValidationErrors(error: ZodError): string {
  const errors = error.issues.map((err) => {
    const issuePath = err.path.join('.');
    return `  • ${issuePath}: ${err.message}`;
  });

  return `Configuration validation failed:\n${errors.join('\n')}`;
}

function isPlainObject(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
