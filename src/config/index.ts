/**
 * Configuration Management Module
 *
 * @example
 * ```typescript
 * import { getConfig } from './config/index.js';
 * import { MessageBroker } from './broker/index.js';
 *
 * const broker = MessageBroker.fromConfig(getConfig());
 * ```
 */

export {
  type BrokerConfig,
  type RpcConfig,
  type LoggingConfig,
  type AppConfig,
  type ValidatedAppConfig,
  BrokerConfigSchema,
  RpcConfigSchema,
  LoggingConfigSchema,
  AppConfigSchema,
} from './schema.js';

export { DEFAULT_CONFIG } from './defaults.js';

export {
  loadConfig,
  getConfig,
  reloadConfig,
  clearConfigCache,
  loadConfigFile,
  loadEnvironmentConfig,
  deepMerge,
  deepClone,
  formatValidationErrors,
  CONFIG_DIR_NAME,
  type ConfigRecord,
} from './loader.js';
