/**
 * Console logger with level tags and per-module prefixes.
 *
 * ```ts
 * const log = logger.create("Game");
 * log.debug("Recorded roll", { pins });
 * ```
 */

import { environment } from "../environments/environment.js";
import { Environment } from "../environments/types.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * Debug output is opt-in through TENPIN_DEBUG (or NODE_ENV=development).
 * Production runs never go below INFO, whatever the debug flag says.
 */
export function resolveMinLogLevel(env: Pick<Environment, "production" | "debug">): LogLevel {
  if (env.production) return LogLevel.INFO;
  return env.debug ? LogLevel.DEBUG : LogLevel.INFO;
}

export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  create(prefix: string): ILogger;
}

export class Logger implements ILogger {
  constructor(private readonly minLevel: LogLevel = resolveMinLogLevel(environment)) {}

  debug(message: string, ...args: unknown[]): void {
    if (this.minLevel <= LogLevel.DEBUG) {
      console.log(`🔍 [DEBUG] ${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.minLevel <= LogLevel.INFO) {
      console.log(`ℹ️ [INFO] ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.minLevel <= LogLevel.WARN) {
      console.warn(`⚠️ [WARN] ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.minLevel <= LogLevel.ERROR) {
      console.error(`❌ [ERROR] ${message}`, ...args);
    }
  }

  /**
   * Child logger tagging each line with `[prefix]`; nesting joins with ":",
   * so `logger.create("Game").create("Replay")` logs as `[Game:Replay]`.
   */
  create(prefix: string): ILogger {
    const tag = (message: string) => `[${prefix}] ${message}`;
    return {
      debug: (message, ...args) => this.debug(tag(message), ...args),
      info: (message, ...args) => this.info(tag(message), ...args),
      warn: (message, ...args) => this.warn(tag(message), ...args),
      error: (message, ...args) => this.error(tag(message), ...args),
      create: (subPrefix) => this.create(`${prefix}:${subPrefix}`),
    };
  }
}

export const logger = new Logger();
