/**
 * Contract Error Types
 *
 * Contract violations are programmer errors: they are thrown to stop the
 * caller, not to be caught and recovered from.
 */

export type ContractType = "precondition";

/**
 * Base class for all contract violations.
 */
export class ContractError extends Error {
  constructor(
    message: string,
    public readonly contractType: ContractType
  ) {
    super(message);
    this.name = "ContractError";
  }
}

/**
 * Thrown when a precondition (requires) is violated.
 */
export class PreconditionError extends ContractError {
  constructor(message: string) {
    super(message, "precondition");
    this.name = "PreconditionError";
  }
}
