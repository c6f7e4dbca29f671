import { shouldEmitCheck } from "../config.js";
import { PreconditionError } from "./errors.js";

/**
 * Precondition check.
 *
 * Throws a {@link PreconditionError} when `condition` is false, unless
 * precondition checks are switched off through `contracts.mode: "none"` or
 * `contracts.strip.preconditions`, in which case the caller runs unchecked.
 *
 * @example
 * ```typescript
 * function withdraw(account: Account, amount: number): number {
 *   requires(account.balance >= amount, "Insufficient funds");
 *   return account.balance - amount;
 * }
 * ```
 */
export function requires(condition: boolean, message?: string): void {
  if (condition || !shouldEmitCheck("precondition")) return;
  throw new PreconditionError(
    message === undefined ? "Precondition failed" : `Precondition failed: ${message}`
  );
}
