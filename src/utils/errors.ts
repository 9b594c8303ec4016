/**
 * Error taxonomy for the limit-order engine.
 *
 * Every error carries a stable `code` so callers can branch without
 * matching on message text.
 */

export type LimitOrderErrorCode =
  | "INVALID_ORDER"
  | "NOTHING_TO_CLAIM"
  | "NOT_ENOUGH_TO_CLAIM"
  | "UNAUTHORIZED"
  | "INSUFFICIENT_BALANCE"
  | "INVARIANT_VIOLATION"
  | "POOL_ERROR";

export class LimitOrderError extends Error {
  readonly code: LimitOrderErrorCode;

  constructor(code: LimitOrderErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Rejected input: non-positive amounts, off-range ticks, bad spacing. */
export class InvalidOrderError extends LimitOrderError {
  constructor(message: string) {
    super("INVALID_ORDER", message);
  }
}

/** The caller holds none of this order, or the order has accrued no output. */
export class NothingToClaimError extends LimitOrderError {
  constructor(orderId: bigint) {
    super("NOTHING_TO_CLAIM", `Nothing to claim for order ${orderId}`);
  }
}

/** The caller holds some of this order, but less than requested. */
export class NotEnoughToClaimError extends LimitOrderError {
  constructor(orderId: bigint, available: bigint, requested: bigint) {
    super(
      "NOT_ENOUGH_TO_CLAIM",
      `Not enough to claim for order ${orderId}: available ${available}, requested ${requested}`
    );
  }
}

export class UnauthorizedError extends LimitOrderError {
  constructor(message: string) {
    super("UNAUTHORIZED", message);
  }
}

export class InsufficientBalanceError extends LimitOrderError {
  constructor(message: string) {
    super("INSUFFICIENT_BALANCE", message);
  }
}

export class InvariantViolationError extends LimitOrderError {
  constructor(message: string) {
    super("INVARIANT_VIOLATION", message);
  }
}

export class PoolError extends LimitOrderError {
  constructor(message: string) {
    super("POOL_ERROR", message);
  }
}
