/**
 * Pino logger factory.
 *
 * One root logger per gateway; components and turns bind their context
 * through `child()`.
 */

import pino, { type Logger, type LoggerOptions } from "pino";
import type { LogLevel } from "@helpdesk/types";

export type { Logger } from "pino";

export interface LoggerConfig {
  level?: LogLevel;
  /** Pretty-print through pino-pretty (development only). */
  pretty?: boolean;
  /** Bindings included in every line. */
  base?: Record<string, unknown>;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: "info",
  pretty: false,
  base: {
    service: "helpdesk-router",
  },
};

export function createLogger(config?: LoggerConfig): Logger {
  const merged = { ...DEFAULT_CONFIG, ...config };

  const options: LoggerOptions = {
    level: merged.level,
    base: merged.base,
  };

  if (merged.pretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return pino(options);
}

/** Logger that drops everything. Default for components built without one. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
