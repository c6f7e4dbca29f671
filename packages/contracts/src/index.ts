/**
 * @planar/contracts — Design by Contract
 *
 * - `requires(condition, message?)` — Precondition check
 *
 * Checks can be switched off through configuration:
 * - `contracts.mode: "full"` — All checks (default)
 * - `contracts.mode: "none"` — All skipped
 * - `contracts.strip.preconditions: true` — Preconditions skipped
 *
 * @example
 * ```typescript
 * import { requires } from "@planar/contracts";
 *
 * function at(index: number) {
 *   requires(index === 0 || index === 1, `index ${index} is out of range`);
 * }
 * ```
 */

export { requires } from "./runtime/requires.js";
export { ContractError, PreconditionError, type ContractType } from "./runtime/errors.js";
export {
  getContractConfig,
  shouldEmitCheck,
  type ContractConfig,
  type ContractMode,
} from "./config.js";
