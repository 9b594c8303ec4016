/**
 * In-process constant-product pool manager with v4-style flash accounting.
 *
 * - swap() only inside unlock(); every account's currency deltas must net
 *   to zero by the time unlock() returns
 * - exact-input swaps only; the fee (pips) stays in the reserves
 * - the tick is derived from the reserve ratio, so it tracks price but is
 *   not a full concentrated-liquidity curve
 * - hook callbacks are delivered according to the hook's permissions
 */

import { isAddressEqual, zeroAddress, type Address, type Hex } from "viem";
import type { CurrencyLedger } from "../types/currency.js";
import type {
  BalanceDelta,
  PoolHooks,
  PoolKey,
  PoolManager,
  Slot0,
  SwapParams,
} from "../types/pool.js";
import type { Logger } from "../utils/logger.js";
import type { Journal, Snapshotable } from "../engine/journal.js";
import { isNative } from "../chain/settlement.js";
import { toPoolId } from "../engine/orderId.js";
import { validateHookAddress } from "../engine/permissions.js";
import {
  MAX_SQRT_PRICE,
  MAX_TICK,
  MIN_SQRT_PRICE,
  MIN_TICK,
} from "../engine/tick.js";
import { PoolError } from "../utils/errors.js";

const FEE_DENOMINATOR = 1_000_000n;
const MAX_TICK_SPACING = 32767;
const LOG_TICK_BASE = Math.log(1.0001);

interface PoolState {
  key: PoolKey;
  reserve0: bigint;
  reserve1: bigint;
}

export interface PoolManagerSnapshot {
  pools: Map<Hex, PoolState>;
  deltas: Map<string, bigint>;
}

export interface PoolManagerOptions {
  address: Address;
  currencies: CurrencyLedger;
  journal: Journal;
  logger: Logger;
}

function sqrt(value: bigint): bigint {
  if (value < 2n) return value;
  let x = value;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + value / x) / 2n;
  }
  return x;
}

export function sqrtPriceX96FromReserves(reserve0: bigint, reserve1: bigint): bigint {
  return sqrt((reserve1 << 192n) / reserve0);
}

export function tickFromReserves(reserve0: bigint, reserve1: bigint): number {
  const tick = Math.floor(Math.log(Number(reserve1) / Number(reserve0)) / LOG_TICK_BASE);
  return Math.min(MAX_TICK, Math.max(MIN_TICK, tick));
}

function deltaKey(account: Address, currency: Address): string {
  return `${account.toLowerCase()}:${currency.toLowerCase()}`;
}

function copyPools(pools: Map<Hex, PoolState>): Map<Hex, PoolState> {
  return new Map(Array.from(pools, ([id, state]) => [id, { ...state }]));
}

export class InMemoryPoolManager implements PoolManager, Snapshotable<PoolManagerSnapshot> {
  readonly address: Address;
  private currencies: CurrencyLedger;
  private journal: Journal;
  private logger: Logger;
  private pools = new Map<Hex, PoolState>();
  // Positive: the pool owes the account
  private deltas = new Map<string, bigint>();
  private hooks = new Map<string, PoolHooks>();
  private synced: { currency: Address; balance: bigint } | null = null;
  private unlocked = false;

  constructor(opts: PoolManagerOptions) {
    this.address = opts.address;
    this.currencies = opts.currencies;
    this.journal = opts.journal;
    this.logger = opts.logger.child({ component: "pool-manager" });
    this.journal.register(this);
  }

  registerHook(hook: PoolHooks): void {
    validateHookAddress(hook.address, hook.getHookPermissions());
    this.hooks.set(hook.address.toLowerCase(), hook);
  }

  /**
   * Create a pool with the given virtual reserves. The pool's own currency
   * balances must be funded separately to pay out takes.
   */
  initialize(sender: Address, key: PoolKey, reserve0: bigint, reserve1: bigint): number {
    if (BigInt(key.currency0) >= BigInt(key.currency1)) {
      throw new PoolError("Currencies out of order or equal");
    }
    if (!Number.isInteger(key.tickSpacing) || key.tickSpacing < 1 || key.tickSpacing > MAX_TICK_SPACING) {
      throw new PoolError(`Tick spacing out of range: ${key.tickSpacing}`);
    }
    if (!Number.isInteger(key.fee) || key.fee < 0 || BigInt(key.fee) >= FEE_DENOMINATOR) {
      throw new PoolError(`Fee out of range: ${key.fee}`);
    }
    if (reserve0 <= 0n || reserve1 <= 0n) {
      throw new PoolError("Reserves must be positive");
    }

    const poolId = toPoolId(key);
    if (this.pools.has(poolId)) {
      throw new PoolError(`Pool already initialized: ${poolId}`);
    }
    const hook = this.hookFor(key);

    return this.journal.atomic(() => {
      this.pools.set(poolId, { key, reserve0, reserve1 });
      const { sqrtPriceX96, tick } = this.getSlot0(poolId);
      this.logger.info({ poolId, tick, fee: key.fee, tickSpacing: key.tickSpacing }, "Pool initialized");

      if (hook?.getHookPermissions().afterInitialize) {
        hook.afterInitialize(sender, key, sqrtPriceX96, tick);
      }
      return tick;
    });
  }

  getSlot0(poolId: Hex): Slot0 {
    const state = this.requirePool(poolId);
    return {
      sqrtPriceX96: sqrtPriceX96FromReserves(state.reserve0, state.reserve1),
      tick: tickFromReserves(state.reserve0, state.reserve1),
    };
  }

  getReserves(poolId: Hex): { reserve0: bigint; reserve1: bigint } {
    const { reserve0, reserve1 } = this.requirePool(poolId);
    return { reserve0, reserve1 };
  }

  /**
   * Run `fn` with the manager unlocked. Any open delta afterwards, or any
   * throw inside, rolls back everything registered with the journal.
   */
  unlock<T>(fn: () => T): T {
    if (this.unlocked) throw new PoolError("Pool manager already unlocked");

    return this.journal.atomic(() => {
      this.unlocked = true;
      try {
        const result = fn();
        this.assertSettled();
        return result;
      } finally {
        this.unlocked = false;
        this.synced = null;
      }
    });
  }

  swap(sender: Address, key: PoolKey, params: SwapParams): BalanceDelta {
    if (!this.unlocked) throw new PoolError("Pool manager is locked");
    if (params.amountSpecified >= 0n) {
      throw new PoolError("Only exact-input swaps are supported");
    }

    const poolId = toPoolId(key);
    const state = this.requirePool(poolId);
    this.checkPriceLimit(state, params);

    const amountIn = -params.amountSpecified;
    const amountInLessFee = (amountIn * (FEE_DENOMINATOR - BigInt(key.fee))) / FEE_DENOMINATOR;

    let delta: BalanceDelta;
    if (params.zeroForOne) {
      const amountOut = (state.reserve1 * amountInLessFee) / (state.reserve0 + amountInLessFee);
      state.reserve0 += amountIn;
      state.reserve1 -= amountOut;
      delta = { amount0: -amountIn, amount1: amountOut };
    } else {
      const amountOut = (state.reserve0 * amountInLessFee) / (state.reserve1 + amountInLessFee);
      state.reserve1 += amountIn;
      state.reserve0 -= amountOut;
      delta = { amount0: amountOut, amount1: -amountIn };
    }

    this.accountDelta(sender, key.currency0, delta.amount0);
    this.accountDelta(sender, key.currency1, delta.amount1);

    this.logger.debug(
      {
        poolId,
        sender,
        zeroForOne: params.zeroForOne,
        amount0: delta.amount0.toString(),
        amount1: delta.amount1.toString(),
        tick: tickFromReserves(state.reserve0, state.reserve1),
      },
      "Swap executed"
    );

    const hook = this.hookFor(key);
    if (hook?.getHookPermissions().afterSwap) {
      hook.afterSwap(sender, key, params, delta);
    }
    return delta;
  }

  sync(currency: Address): void {
    this.synced = { currency, balance: this.currencies.balanceOf(currency, this.address) };
  }

  /**
   * Credit `payer` with whatever arrived since the last sync().
   */
  settle(payer: Address): bigint {
    if (!this.unlocked) throw new PoolError("Pool manager is locked");
    if (!this.synced) throw new PoolError("settle() without a prior sync()");

    const { currency, balance } = this.synced;
    const paid = this.currencies.balanceOf(currency, this.address) - balance;
    this.synced = null;
    this.accountDelta(payer, currency, paid);
    return paid;
  }

  /**
   * Send `amount` to `to` and debit `to`'s delta.
   */
  take(currency: Address, to: Address, amount: bigint): void {
    if (!this.unlocked) throw new PoolError("Pool manager is locked");
    this.accountDelta(to, currency, -amount);
    if (isNative(currency)) {
      this.currencies.sendValue(this.address, to, amount);
    } else {
      this.currencies.transfer(currency, this.address, to, amount);
    }
  }

  snapshot(): PoolManagerSnapshot {
    return { pools: copyPools(this.pools), deltas: new Map(this.deltas) };
  }

  restore(snapshot: PoolManagerSnapshot): void {
    this.pools = copyPools(snapshot.pools);
    this.deltas = new Map(snapshot.deltas);
  }

  private accountDelta(account: Address, currency: Address, amount: bigint): void {
    if (amount === 0n) return;
    const key = deltaKey(account, currency);
    this.deltas.set(key, (this.deltas.get(key) ?? 0n) + amount);
  }

  private assertSettled(): void {
    for (const [key, amount] of this.deltas) {
      if (amount !== 0n) {
        const [account, currency] = key.split(":");
        throw new PoolError(`Currency ${currency} not settled for ${account}: ${amount}`);
      }
    }
  }

  private checkPriceLimit(state: PoolState, params: SwapParams): void {
    const limit = params.sqrtPriceLimitX96;
    const current = sqrtPriceX96FromReserves(state.reserve0, state.reserve1);
    if (params.zeroForOne) {
      if (limit >= current) throw new PoolError("Price limit already exceeded");
      if (limit <= MIN_SQRT_PRICE) throw new PoolError("Price limit out of bounds");
    } else {
      if (limit <= current) throw new PoolError("Price limit already exceeded");
      if (limit >= MAX_SQRT_PRICE) throw new PoolError("Price limit out of bounds");
    }
  }

  private hookFor(key: PoolKey): PoolHooks | undefined {
    if (isAddressEqual(key.hooks, zeroAddress)) return undefined;
    const hook = this.hooks.get(key.hooks.toLowerCase());
    if (!hook) throw new PoolError(`No hook registered at ${key.hooks}`);
    return hook;
  }

  private requirePool(poolId: Hex): PoolState {
    const state = this.pools.get(poolId);
    if (!state) throw new PoolError(`Pool not initialized: ${poolId}`);
    return state;
  }
}
