/**
 * Logger factory.
 *
 * Components log through the `(message, meta?)` ILogger shape; the default
 * implementation forwards to pino with `meta` as the merge object.
 */

import { pino, type Logger as PinoLogger, type LoggerOptions } from 'pino';
import type { ILogger } from '@baton/agent-contracts';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface CreateLoggerOptions {
  /** Defaults to BATON_LOG_LEVEL, then 'info' */
  level?: LogLevel;
  /** Logger name, shown as `name` on every line */
  name?: string;
  /** Bindings merged into every line */
  bindings?: Record<string, unknown>;
  /** Existing pino instance to wrap instead of creating one */
  instance?: PinoLogger;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function resolveLogLevel(explicit?: LogLevel, env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (explicit) {
    return explicit;
  }
  const fromEnv = env.BATON_LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * Wrap a pino instance in the ILogger interface
 */
export function fromPino(base: PinoLogger): ILogger {
  return {
    debug: (message, meta) => (meta ? base.debug(meta, message) : base.debug(message)),
    info: (message, meta) => (meta ? base.info(meta, message) : base.info(message)),
    warn: (message, meta) => (meta ? base.warn(meta, message) : base.warn(message)),
    error: (message, meta) => (meta ? base.error(meta, message) : base.error(message)),
  };
}

export function createLogger(options: CreateLoggerOptions = {}): ILogger {
  if (options.instance) {
    return fromPino(options.bindings ? options.instance.child(options.bindings) : options.instance);
  }
  const pinoOptions: LoggerOptions = {
    name: options.name ?? 'baton',
    level: resolveLogLevel(options.level),
    base: options.bindings ?? null,
  };
  return fromPino(pino(pinoOptions));
}

/**
 * Logger that drops everything
 */
export function createNoopLogger(): ILogger {
  const noop = (): void => {};
  return { debug: noop, info: noop, warn: noop, error: noop };
}
