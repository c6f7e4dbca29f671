/**
 * Unified Configuration System
 *
 * Configuration is loaded on first access from (in priority order):
 *
 * 1. Environment variables: PLANAR_* (for CI overrides)
 * 2. Config files: .planarrc, planar.config.cjs, package.json#planar, ...
 * 3. Defaults
 *
 * `config.set()` merges on top of whatever was loaded.
 *
 * @example
 * ```typescript
 * import { config } from "@planar/core";
 *
 * config.get("contracts.mode");                 // → "full" | "none"
 * config.set({ contracts: { mode: "none" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { createLogger } from "./logger.js";

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/**
 * Contract configuration options.
 */
export interface ContractsConfig {
  /** "full" = precondition checks run, "none" = checks skipped */
  mode?: "full" | "none";
  /** Fine-grained stripping per contract type */
  strip?: {
    preconditions?: boolean;
  };
}

export interface LogConfig {
  level?: LogLevel;
}

/**
 * Full planar configuration schema.
 */
export interface PlanarConfig {
  /** Enable debug logging */
  debug?: boolean;
  log?: LogConfig;
  contracts?: ContractsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

const log = createLogger("config");

const PREFIX = "PLANAR_";
const MODULE_NAME = "planar";

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[parts[i]] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   PLANAR_DEBUG=1                         → { debug: true }
 *   PLANAR_CONTRACTS_MODE=none             → { contracts: { mode: "none" } }
 *   PLANAR_CONTRACTS_STRIP_PRECONDITIONS=1 → { contracts: { strip: { preconditions: true } } }
 */
function loadConfigFromEnv(): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key.slice(PREFIX.length).toLowerCase().replace(/_+/g, ".");
    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

// ============================================================================
// Config File Loading
// ============================================================================

function loadConfigFromFiles(): ConfigRecord {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  try {
    const result = explorer.search();
    if (result === null || result.isEmpty) return {};

    const loaded: unknown = result.config;
    if (!isRecord(loaded)) {
      log.warn(`ignoring ${result.filepath}: configuration must be an object`);
      return {};
    }

    configFilePath = result.filepath;
    log.debug(`loaded configuration from ${result.filepath}`);
    return loaded;
  } catch (error) {
    log.warn(`failed to load configuration file: ${String(error)}`);
    return {};
  }
}

// ============================================================================
// Config Initialization
// ============================================================================

function defaults(): ConfigRecord {
  return {
    debug: false,
    log: { level: "warn" },
    contracts: {
      mode: "full",
      strip: {},
    },
  };
}

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;
  // Set first so that logging during file loading reads the defaults.
  configLoaded = true;
  configStore = defaults();

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  configStore = deepMerge(deepMerge(configStore, fileConfig), envConfig);
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot-separated path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: PlanarConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

function getAll(): Readonly<ConfigRecord> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration so the next read reloads every source (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
};

/**
 * Identity helper giving config files type checking.
 *
 * @example
 * ```js
 * // planar.config.cjs
 * const { defineConfig } = require("@planar/core");
 * module.exports = defineConfig({ contracts: { mode: "none" } });
 * ```
 */
export function defineConfig(cfg: PlanarConfig): PlanarConfig {
  return cfg;
}
