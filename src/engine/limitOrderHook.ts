/**
 * Take-profit limit orders resting on a pool.
 *
 * Users deposit one side of a pool at a target tick and receive claim units
 * for that (pool, tick, direction) bucket. afterSwap fills every bucket the
 * price crosses; claim holders later redeem their pro-rata share of the
 * output, or cancel against whatever is still pending.
 *
 * Every mutating call runs inside the journal, so a throw anywhere
 * (including in a collaborator) leaves no partial state behind.
 */

import type { Address } from "viem";
import type { ClaimLedger, CurrencyLedger } from "../types/currency.js";
import type { ExecutionReport, OrderState } from "../types/order.js";
import type {
  BalanceDelta,
  HookPermissions,
  PoolHooks,
  PoolKey,
  PoolManager,
  SwapParams,
} from "../types/pool.js";
import type { Logger } from "../utils/logger.js";
import { SettlementAdapter } from "../chain/settlement.js";
import {
  InvalidOrderError,
  NotEnoughToClaimError,
  NothingToClaimError,
} from "../utils/errors.js";
import { TickCrossingExecutor } from "./executor.js";
import { computeOutputShare } from "./fills.js";
import { Journal, isSnapshotable } from "./journal.js";
import { OrderLedger } from "./ledger.js";
import { getOrderId, toPoolId } from "./orderId.js";
import { LIMIT_ORDER_HOOK_PERMISSIONS } from "./permissions.js";
import { lowerUsableTick } from "./tick.js";

export interface LimitOrderHookOptions {
  address: Address;
  pool: PoolManager;
  currencies: CurrencyLedger;
  claims: ClaimLedger;
  logger: Logger;
  /**
   * Shared with the pool when a swap should roll back together with its
   * fills. The hook always registers its own order ledger, plus the claim
   * and currency ledgers when they can snapshot themselves.
   */
  journal?: Journal;
}

function assertPositive(amount: bigint, label: string): void {
  if (amount <= 0n) {
    throw new InvalidOrderError(`${label} must be positive, got ${amount}`);
  }
}

export class LimitOrderHook implements PoolHooks {
  readonly address: Address;
  private ledger = new OrderLedger();
  private claims: ClaimLedger;
  private journal: Journal;
  private settlement: SettlementAdapter;
  private executor: TickCrossingExecutor;
  private logger: Logger;

  constructor(opts: LimitOrderHookOptions) {
    this.address = opts.address;
    this.claims = opts.claims;
    this.logger = opts.logger.child({ component: "limit-order-hook" });
    this.journal = opts.journal ?? new Journal();
    this.journal.register(this.ledger);
    for (const store of [opts.claims, opts.currencies]) {
      if (isSnapshotable(store)) this.journal.register(store);
    }

    this.settlement = new SettlementAdapter({
      account: opts.address,
      pool: opts.pool,
      currencies: opts.currencies,
      logger: this.logger,
    });
    this.executor = new TickCrossingExecutor({
      ledger: this.ledger,
      pool: opts.pool,
      settlement: this.settlement,
      logger: this.logger,
    });
  }

  getHookPermissions(): HookPermissions {
    return LIMIT_ORDER_HOOK_PERMISSIONS;
  }

  // ============ Pool callbacks ============

  afterInitialize(_sender: Address, key: PoolKey, _sqrtPriceX96: bigint, tick: number): void {
    const poolId = toPoolId(key);
    this.journal.atomic(() => this.ledger.setLastTick(poolId, tick));
    this.logger.info({ poolId, tick }, "Pool initialized");
  }

  afterSwap(
    _sender: Address,
    key: PoolKey,
    _params: SwapParams,
    _delta: BalanceDelta
  ): ExecutionReport {
    return this.journal.atomic(() => this.executor.execute(key));
  }

  // ============ Orders ============

  /**
   * Deposit `inputAmount` of the sold currency at the lower usable tick of
   * `tickToSellAt`. Mints the same number of claim units to `sender`.
   * Returns the tick the order rests at.
   */
  placeOrder(
    sender: Address,
    key: PoolKey,
    tickToSellAt: number,
    zeroForOne: boolean,
    inputAmount: bigint
  ): number {
    assertPositive(inputAmount, "inputAmount");
    const tick = lowerUsableTick(tickToSellAt, key.tickSpacing);
    const poolId = toPoolId(key);
    const orderId = getOrderId(key, tick, zeroForOne);

    this.journal.atomic(() => {
      this.ledger.addPendingOrder(poolId, tick, zeroForOne, inputAmount);
      this.ledger.addClaimSupply(orderId, inputAmount);
      this.claims.mint(this.address, sender, orderId, inputAmount);
      this.settlement.pull(sellCurrency(key, zeroForOne), sender, inputAmount);
    });

    this.logger.info(
      {
        poolId,
        sender,
        tick,
        zeroForOne,
        orderId: orderId.toString(),
        inputAmount: inputAmount.toString(),
      },
      "Order placed"
    );
    return tick;
  }

  /**
   * Withdraw still-pending input. The filled part of a bucket can only be
   * recovered through redeem().
   */
  cancelOrder(
    sender: Address,
    key: PoolKey,
    tickToSellAt: number,
    zeroForOne: boolean,
    amountToCancel: bigint
  ): void {
    assertPositive(amountToCancel, "amountToCancel");
    const tick = lowerUsableTick(tickToSellAt, key.tickSpacing);
    const poolId = toPoolId(key);
    const orderId = getOrderId(key, tick, zeroForOne);

    const positionTokens = this.claims.balanceOf(sender, orderId);
    if (positionTokens === 0n) throw new NothingToClaimError(orderId);
    if (positionTokens < amountToCancel) {
      throw new NotEnoughToClaimError(orderId, positionTokens, amountToCancel);
    }
    const pending = this.ledger.getPendingOrder(poolId, tick, zeroForOne);
    if (pending < amountToCancel) {
      throw new NotEnoughToClaimError(orderId, pending, amountToCancel);
    }

    this.journal.atomic(() => {
      this.ledger.subPendingOrder(poolId, tick, zeroForOne, amountToCancel);
      this.ledger.subClaimSupply(orderId, amountToCancel);
      this.claims.burn(this.address, sender, orderId, amountToCancel);
      this.settlement.push(sellCurrency(key, zeroForOne), sender, amountToCancel);
    });

    this.logger.info(
      {
        poolId,
        sender,
        tick,
        zeroForOne,
        orderId: orderId.toString(),
        amount: amountToCancel.toString(),
      },
      "Order cancelled"
    );
  }

  /**
   * Burn `inputAmountToClaimFor` claim units for
   * floor(units * claimableOutput / claimSupply) of the bought currency.
   * Returns the output amount sent.
   */
  redeem(
    sender: Address,
    key: PoolKey,
    tickToSellAt: number,
    zeroForOne: boolean,
    inputAmountToClaimFor: bigint
  ): bigint {
    assertPositive(inputAmountToClaimFor, "inputAmountToClaimFor");
    const tick = lowerUsableTick(tickToSellAt, key.tickSpacing);
    const orderId = getOrderId(key, tick, zeroForOne);

    const claimableOutput = this.ledger.getClaimableOutput(orderId);
    if (claimableOutput === 0n) throw new NothingToClaimError(orderId);

    const positionTokens = this.claims.balanceOf(sender, orderId);
    if (positionTokens < inputAmountToClaimFor) {
      throw new NotEnoughToClaimError(orderId, positionTokens, inputAmountToClaimFor);
    }

    const claimSupply = this.ledger.getClaimSupply(orderId);
    const outputAmount = computeOutputShare(
      inputAmountToClaimFor,
      claimableOutput,
      claimSupply
    );

    this.journal.atomic(() => {
      this.ledger.subClaimableOutput(orderId, outputAmount);
      this.ledger.subClaimSupply(orderId, inputAmountToClaimFor);
      this.claims.burn(this.address, sender, orderId, inputAmountToClaimFor);
      this.settlement.push(buyCurrency(key, zeroForOne), sender, outputAmount);
    });

    this.logger.info(
      {
        sender,
        tick,
        zeroForOne,
        orderId: orderId.toString(),
        burned: inputAmountToClaimFor.toString(),
        outputAmount: outputAmount.toString(),
      },
      "Order redeemed"
    );
    return outputAmount;
  }

  // ============ Reads ============

  getOrderId(key: PoolKey, tick: number, zeroForOne: boolean): bigint {
    return getOrderId(key, tick, zeroForOne);
  }

  /** Pending input at an exact stored tick (not normalized). */
  getPendingOrder(key: PoolKey, tick: number, zeroForOne: boolean): bigint {
    return this.ledger.getPendingOrder(toPoolId(key), tick, zeroForOne);
  }

  getClaimSupply(orderId: bigint): bigint {
    return this.ledger.getClaimSupply(orderId);
  }

  getClaimableOutput(orderId: bigint): bigint {
    return this.ledger.getClaimableOutput(orderId);
  }

  getLastTick(key: PoolKey): number | undefined {
    return this.ledger.getLastTick(toPoolId(key));
  }

  /**
   * Everything known about the bucket a raw tick falls into.
   */
  getOrderState(key: PoolKey, tickToSellAt: number, zeroForOne: boolean): OrderState {
    const tick = lowerUsableTick(tickToSellAt, key.tickSpacing);
    const poolId = toPoolId(key);
    const orderId = getOrderId(key, tick, zeroForOne);
    return {
      poolId,
      tick,
      zeroForOne,
      orderId,
      pendingAmount: this.ledger.getPendingOrder(poolId, tick, zeroForOne),
      claimSupply: this.ledger.getClaimSupply(orderId),
      claimableOutput: this.ledger.getClaimableOutput(orderId),
    };
  }
}

function sellCurrency(key: PoolKey, zeroForOne: boolean): Address {
  return zeroForOne ? key.currency0 : key.currency1;
}

function buyCurrency(key: PoolKey, zeroForOne: boolean): Address {
  return zeroForOne ? key.currency1 : key.currency0;
}
