/**
 * Configuration Schema Definition
 *
 * Defines TypeScript interfaces and Zod schemas for runtime validation
 * of broker, RPC and logging settings.
 */

import { z } from 'zod';

/** Longest timer delay Node.js accepts */
const MAX_DELAY_MS = 2_147_483_647;

/**
 * Broker Configuration
 *
 * Controls per-channel queue capacity and consumer loop polling.
 */
export interface BrokerConfig {
  /**
   * Capacity of every channel queue. Fixed for the lifetime of a broker;
   * publishes beyond it are dropped and counted as errors.
   *
   * @default 1000
   * @minimum 1
   * @example 5000
   */
  maxQueueSize: number;

  /**
   * Bounded wait (milliseconds) of a consumer loop on an empty queue before it
   * re-checks the broker state.
   *
   * @default 500
   * @minimum 1
   * @maximum 2147483647
   * @example 250
   */
  pollInterval: number;
}

/**
 * RPC Configuration
 */
export interface RpcConfig {
  /**
   * Default time (milliseconds) a request waits for its reply.
   *
   * @default 500
   * @minimum 1
   * @maximum 2147483647
   * @example 1000
   */
  timeout: number;
}

/**
 * Logging Configuration
 *
 * Controls logging behavior, output destinations, and verbosity.
 */
export interface LoggingConfig {
  /**
   * Log level controlling verbosity of output.
   *
   * @default "info"
   * @example "debug"
   */
  level: 'debug' | 'info' | 'warn' | 'error';

  /**
   * Optional file path for log output. If undefined, only console logging is used.
   *
   * @default undefined
   * @example ".channel-bus/logs/bus.log"
   */
  filePath?: string;

  /**
   * Whether to output logs to console.
   *
   * @default true
   */
  consoleOutput: boolean;
}

/**
 * Application Configuration
 */
export interface AppConfig {
  broker: BrokerConfig;
  rpc: RpcConfig;
  logging: LoggingConfig;
}

/**
 * Zod Schema for Broker Configuration
 */
export const BrokerConfigSchema = z.object({
  maxQueueSize: z.number().int().positive({
    message: 'maxQueueSize must be a positive integer',
  }),
  pollInterval: z.number().int().positive({
    message: 'pollInterval must be a positive integer (milliseconds)',
  }).max(MAX_DELAY_MS, {
    message: `pollInterval must not exceed ${MAX_DELAY_MS} milliseconds`,
  }),
});

/**
 * Zod Schema for RPC Configuration
 */
export const RpcConfigSchema = z.object({
  timeout: z.number().positive({
    message: 'timeout must be a positive number (milliseconds)',
  }).max(MAX_DELAY_MS, {
    message: `timeout must not exceed ${MAX_DELAY_MS} milliseconds`,
  }),
});

/**
 * Zod Schema for Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']),
  filePath: z.string().optional(),
  consoleOutput: z.boolean(),
});

/**
 * Complete Application Configuration Schema
 */
export const AppConfigSchema = z.object({
  broker: BrokerConfigSchema,
  rpc: RpcConfigSchema,
  logging: LoggingConfigSchema,
});

/**
 * Type alias for validated configuration
 */
export type ValidatedAppConfig = z.infer<typeof AppConfigSchema>;
