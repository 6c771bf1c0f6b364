/**
 * Default Configuration Values
 */

import type { AppConfig } from './schema.js';

/**
 * Default Application Configuration
 *
 * - 1000 envelopes per channel queue
 * - 500 ms consumer poll interval and RPC timeout
 * - Info-level logging with console output
 */
export const DEFAULT_CONFIG: AppConfig = {
  broker: {
    maxQueueSize: 1000,
    pollInterval: 500,
  },
  rpc: {
    timeout: 500,
  },
  logging: {
    level: 'info',
    consoleOutput: true,
    filePath: undefined,
  },
};
