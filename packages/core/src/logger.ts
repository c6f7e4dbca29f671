/**
 * Scoped console logging.
 *
 * Every line is prefixed with `[planar/<scope>]` and the level, and is only
 * written when the level is at or above `log.level` (or `debug` when the
 * `debug` flag is set).
 */

import { config, type LogLevel } from "./config.js";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

type EmitLevel = Exclude<LogLevel, "silent">;

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

/**
 * The level currently in effect.
 */
export function currentLogLevel(): LogLevel {
  if (config.get("debug") === true) return "debug";
  const level = config.get("log.level");
  return isLogLevel(level) ? level : "warn";
}

function emit(level: EmitLevel, line: string): void {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

export function createLogger(scope: string): Logger {
  const prefix = `[planar/${scope}]`;

  const write = (level: EmitLevel, message: string): void => {
    if (SEVERITY[level] < SEVERITY[currentLogLevel()]) return;
    emit(level, `${prefix} ${level.toUpperCase()}: ${message}`);
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}
