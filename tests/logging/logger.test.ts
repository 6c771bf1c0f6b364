import { describe, it, expect, afterEach, vi } from 'vitest';
import os from 'os';
import path from 'path';
import winston from 'winston';
import { createLogger, initLogger, getLogger, describeError, consoleFormat } from '../../src/logging/logger.js';

const MESSAGE = Symbol.for('message');

function render(noColor: boolean, level: string, message: string): string {
  const info: winston.Logform.TransformableInfo = { level, message, timestamp: '00:00:00' };
  const formatted = consoleFormat(noColor).transform(info);
  if (!formatted || typeof formatted === 'boolean') {
    return '';
  }
  return String(Reflect.get(formatted, MESSAGE));
}

describe('logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('creates logger with debug level when verbose', () => {
    const logger = createLogger({ verbose: true, noColor: true });
    expect(logger.level).toBe('debug');
    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
  });

  it('respects provided log level', () => {
    const logger = createLogger({ level: 'warn', noColor: true });
    expect(logger.level).toBe('warn');
  });

  it('formats plain lines when color is off', () => {
    expect(render(true, 'warn', 'queue full')).toBe('[00:00:00] WARN: queue full');
  });

  it('keeps the level and message in colored lines', () => {
    const line = render(false, 'error', 'handler failed');
    expect(line).toContain('ERROR');
    expect(line).toContain('handler failed');
  });

  it('reads the default level from the environment', () => {
    vi.stubEnv('CHANNEL_BUS_LOG_LEVEL', 'debug');
    expect(createLogger().level).toBe('debug');

    vi.stubEnv('CHANNEL_BUS_LOG_LEVEL', 'verbose');
    expect(createLogger().level).toBe('info');
  });

  it('adds a file transport when a path is given', () => {
    const filePath = path.join(os.tmpdir(), 'channel-bus-logger-test.log');
    const logger = createLogger({ filePath, consoleOutput: false, silent: true });

    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.File);
    logger.close();
  });

  it('keeps a silent transport when every output is disabled', () => {
    const logger = createLogger({ consoleOutput: false });

    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0].silent).toBe(true);
  });

  it('initializes and reuses global logger', () => {
    const first = initLogger({ level: 'error' });
    const retrieved = getLogger();
    expect(retrieved).toBe(first);
  });

  it('describes thrown values', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });
});
