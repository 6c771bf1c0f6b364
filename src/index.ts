export * from './broker/index.js';
export * from './events/index.js';
export * from './config/index.js';
export {
  createLogger,
  initLogger,
  getLogger,
  type Logger,
  type LoggerOptions,
  type LogLevel,
} from './logging/logger.js';
