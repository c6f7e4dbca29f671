/**
 * Core module exports for @planar/core
 *
 * This package provides:
 * - The unified configuration system
 * - Scoped console logging
 */

// Configuration System
export {
  config,
  defineConfig,
  type PlanarConfig,
  type ContractsConfig,
  type LogConfig,
  type LogLevel,
} from "./config.js";

// Logging
export { createLogger, currentLogLevel, type Logger } from "./logger.js";
