/**
 * core/logger.ts
 *
 * Singleton pino logger. Every module does:
 *     const log = scopedLogger('codecs/unix_codec');
 *
 * Child loggers are scoped with a `module` field so output can be
 * filtered per-module.
 */

import pino from 'pino';
import { LogLevel } from './types';

let instance: pino.Logger | null = null;

export function initLogger(config: { logLevel?: LogLevel }): pino.Logger {
  instance = pino({
    level: config.logLevel ?? 'info'
  });
  return instance;
}

export function getLogger(): pino.Logger {
  if (!instance) {
    // Fallback for early imports before initLogger is called
    instance = pino({ level: process.env.CROSSCHED_LOG_LEVEL ?? 'info' });
  }
  return instance;
}

/**
 * Returns a child logger scoped to a specific module.
 * The child is resolved lazily, so modules that grab a logger at import
 * time still follow a later initLogger() call.
 */
export function scopedLogger(moduleName: string): ScopedLogger {
  let root: pino.Logger | null = null;
  let child: pino.Logger | null = null;
  const current = (): pino.Logger => {
    const logger = getLogger();
    if (child === null || root !== logger) {
      root = logger;
      child = logger.child({ module: moduleName });
    }
    return child;
  };

  return {
    debug: (obj, msg) => current().debug(obj, msg),
    info:  (obj, msg) => current().info(obj, msg),
    warn:  (obj, msg) => current().warn(obj, msg),
    error: (obj, msg) => current().error(obj, msg)
  };
}

export interface ScopedLogger {
  debug(obj: Record<string, unknown>, msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
}
