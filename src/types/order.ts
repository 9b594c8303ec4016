import type { Hex } from "viem";

/**
 * One (pool, tick, direction) bucket as seen through the public read surface.
 * `tick` is always the lower usable tick the bucket is stored under.
 */
export interface OrderState {
  poolId: Hex;
  tick: number;
  zeroForOne: boolean;
  orderId: bigint;
  pendingAmount: bigint;
  claimSupply: bigint;
  claimableOutput: bigint;
}

/**
 * A bucket drained by the execution engine. The whole pending amount is
 * always filled at once.
 */
export interface OrderFill {
  tick: number;
  zeroForOne: boolean;
  orderId: bigint;
  inputAmount: bigint;
  outputAmount: bigint; // realized from the swap delta
}

/**
 * Outcome of one afterSwap pass over a pool.
 * `skipped` is set when the swap came from the engine's own fill.
 */
export interface ExecutionReport {
  poolId: Hex;
  fills: OrderFill[];
  lastTick: number;
  skipped: boolean;
}
