/**
 * Tick-crossing fill loop, run once per external swap.
 *
 * Each pass:
 * 1. Read the pool's current tick; floor it and the last observed tick to the grid
 * 2. Walk the grid from last to current, inclusive
 *    - upward: buckets selling currency0 (zeroForOne = true)
 *    - downward: buckets selling currency1 (zeroForOne = false)
 * 3. Fill the first nonzero bucket in full with an exact-input swap and stop
 *
 * A fill is itself a swap and may move the price, so passes repeat until one
 * makes no fill. Each fill drains a bucket and nothing refills buckets
 * mid-loop, so the pass count is bounded by the pool's nonzero buckets + 1.
 */

import type { Hex } from "viem";
import type { SettlementAdapter } from "../chain/settlement.js";
import type { ExecutionReport, OrderFill } from "../types/order.js";
import type { PoolKey, PoolManager } from "../types/pool.js";
import type { Logger } from "../utils/logger.js";
import type { OrderLedger } from "./ledger.js";
import { InvariantViolationError } from "../utils/errors.js";
import { deltaInput, deltaOutput } from "./fills.js";
import { getOrderId, toPoolId } from "./orderId.js";
import {
  gridTicksBetween,
  lowerUsableTick,
  MAX_SQRT_PRICE,
  MIN_SQRT_PRICE,
} from "./tick.js";

export interface ExecutorOptions {
  ledger: OrderLedger;
  pool: PoolManager;
  settlement: SettlementAdapter;
  logger: Logger;
}

interface PassResult {
  fill: OrderFill | null;
  currentTick: number;
}

export class TickCrossingExecutor {
  private ledger: OrderLedger;
  private pool: PoolManager;
  private settlement: SettlementAdapter;
  private logger: Logger;
  // Pools with a pass in progress; swaps made by our own fills land here
  private executing = new Set<Hex>();

  constructor(opts: ExecutorOptions) {
    this.ledger = opts.ledger;
    this.pool = opts.pool;
    this.settlement = opts.settlement;
    this.logger = opts.logger;
  }

  isExecuting(poolId: Hex): boolean {
    return this.executing.has(poolId);
  }

  /**
   * Run passes until none fills, then record the final tick as last observed.
   * Returns a skipped report without touching state when re-entered for a
   * pool that is already mid-scan.
   */
  execute(key: PoolKey): ExecutionReport {
    const poolId = toPoolId(key);

    if (this.executing.has(poolId)) {
      return {
        poolId,
        fills: [],
        lastTick: this.ledger.getLastTick(poolId) ?? this.pool.getSlot0(poolId).tick,
        skipped: true,
      };
    }

    this.executing.add(poolId);
    try {
      return this.runPasses(key, poolId);
    } finally {
      this.executing.delete(poolId);
    }
  }

  private runPasses(key: PoolKey, poolId: Hex): ExecutionReport {
    const lastTick = this.ledger.getLastTick(poolId);
    if (lastTick === undefined) {
      // Never saw afterInitialize: start observing from here
      const { tick } = this.pool.getSlot0(poolId);
      this.ledger.setLastTick(poolId, tick);
      return { poolId, fills: [], lastTick: tick, skipped: false };
    }

    const maxPasses = this.ledger.countPendingBuckets(poolId) + 1;
    const fills: OrderFill[] = [];
    let currentTick = lastTick;

    for (let pass = 1; ; pass++) {
      if (pass > maxPasses) {
        throw new InvariantViolationError(
          `Fill loop exceeded ${maxPasses} passes for pool ${poolId}`
        );
      }

      const result = this.tryExecutingOrders(key, poolId, lastTick);
      currentTick = result.currentTick;
      this.logger.debug(
        { poolId, pass, lastTick, currentTick, filled: result.fill !== null },
        "Scan pass complete"
      );

      if (!result.fill) break;
      fills.push(result.fill);
    }

    this.ledger.setLastTick(poolId, currentTick);

    if (fills.length > 0) {
      this.logger.info(
        { poolId, fillCount: fills.length, lastTick: currentTick },
        "Resting orders filled"
      );
    }

    return { poolId, fills, lastTick: currentTick, skipped: false };
  }

  private tryExecutingOrders(key: PoolKey, poolId: Hex, lastTick: number): PassResult {
    const { tick: currentTick } = this.pool.getSlot0(poolId);
    const from = lowerUsableTick(lastTick, key.tickSpacing);
    const to = lowerUsableTick(currentTick, key.tickSpacing);

    // Price of currency0 rose: sell-currency0 orders are now in the money
    const zeroForOne = to > from;

    for (const tick of gridTicksBetween(from, to, key.tickSpacing)) {
      const inputAmount = this.ledger.getPendingOrder(poolId, tick, zeroForOne);
      if (inputAmount > 0n) {
        const fill = this.executeOrder(key, poolId, tick, zeroForOne, inputAmount);
        return { fill, currentTick };
      }
    }

    return { fill: null, currentTick };
  }

  private executeOrder(
    key: PoolKey,
    poolId: Hex,
    tick: number,
    zeroForOne: boolean,
    inputAmount: bigint
  ): OrderFill {
    const delta = this.settlement.swapAndSettle(key, {
      zeroForOne,
      amountSpecified: -inputAmount,
      sqrtPriceLimitX96: zeroForOne ? MIN_SQRT_PRICE + 1n : MAX_SQRT_PRICE - 1n,
    });

    const paid = deltaInput(delta, zeroForOne);
    if (paid !== inputAmount) {
      throw new InvariantViolationError(
        `Fill at tick ${tick} consumed ${paid} of ${inputAmount}`
      );
    }

    this.ledger.subPendingOrder(poolId, tick, zeroForOne, inputAmount);

    const orderId = getOrderId(key, tick, zeroForOne);
    const outputAmount = deltaOutput(delta, zeroForOne);
    this.ledger.addClaimableOutput(orderId, outputAmount);

    this.logger.info(
      {
        poolId,
        tick,
        zeroForOne,
        orderId: orderId.toString(),
        inputAmount: inputAmount.toString(),
        outputAmount: outputAmount.toString(),
      },
      "Order filled"
    );

    return { tick, zeroForOne, orderId, inputAmount, outputAmount };
  }
}
