/**
 * Contract Configuration
 *
 * Contracts configuration is managed through the unified planar config system.
 * This module provides contract-specific accessors.
 *
 * Configuration sources (priority order):
 * 1. Environment variables: PLANAR_CONTRACTS_MODE, PLANAR_CONTRACTS_STRIP_PRECONDITIONS
 * 2. Config files: .planarrc, planar.config.cjs, ...
 * 3. Defaults: mode="full"
 *
 * `config.set({ contracts: { ... } })` overrides all of them.
 *
 * @example Environment variables
 * ```bash
 * PLANAR_CONTRACTS_MODE=none node app.js                  # Skip all checks
 * PLANAR_CONTRACTS_STRIP_PRECONDITIONS=1 node app.js      # Skip preconditions only
 * ```
 */

import { config, createLogger } from "@planar/core";
import type { ContractType } from "./runtime/errors.js";

export type ContractMode = "full" | "none";

export interface ContractConfig {
  /**
   * Contract checking mode:
   * - "full": All checks enabled (default)
   * - "none": All checks skipped
   */
  mode: ContractMode;

  /**
   * Fine-grained control per contract type.
   * When a key is true, that contract type is skipped.
   */
  strip: {
    preconditions: boolean;
  };
}

const log = createLogger("contracts");

let reportedMode: unknown;

function readMode(): ContractMode {
  const mode = config.get("contracts.mode");
  if (mode === undefined || mode === "full" || mode === "none") {
    return mode ?? "full";
  }
  // Report each bad value once; this runs on every checked access.
  if (mode !== reportedMode) {
    reportedMode = mode;
    log.warn(`unknown contracts.mode ${JSON.stringify(mode)}, using "full"`);
  }
  return "full";
}

/**
 * Get the current contract configuration.
 */
export function getContractConfig(): ContractConfig {
  return {
    mode: readMode(),
    strip: {
      preconditions: config.get("contracts.strip.preconditions") === true,
    },
  };
}

/**
 * Should a runtime check run for the given contract type?
 */
export function shouldEmitCheck(type: ContractType): boolean {
  const contractConfig = getContractConfig();

  if (contractConfig.mode === "none") return false;

  const stripKey = {
    precondition: "preconditions" as const,
  }[type];

  return !contractConfig.strip[stripKey];
}
