import type { Address, Hex } from "viem";

/**
 * Uniswap v4 PoolKey. currency0 < currency1 by address; the zero address
 * designates the native asset.
 */
export interface PoolKey {
  currency0: Address;
  currency1: Address;
  fee: number;
  tickSpacing: number;
  hooks: Address;
}

export interface SwapParams {
  zeroForOne: boolean;
  amountSpecified: bigint; // negative = exact input
  sqrtPriceLimitX96: bigint;
}

/**
 * Signed per-currency change from the swapper's perspective:
 * negative is owed to the pool, positive is owed to the swapper.
 */
export interface BalanceDelta {
  amount0: bigint;
  amount1: bigint;
}

export interface Slot0 {
  sqrtPriceX96: bigint;
  tick: number;
}

export interface HookPermissions {
  beforeInitialize: boolean;
  afterInitialize: boolean;
  beforeAddLiquidity: boolean;
  afterAddLiquidity: boolean;
  beforeRemoveLiquidity: boolean;
  afterRemoveLiquidity: boolean;
  beforeSwap: boolean;
  afterSwap: boolean;
  beforeDonate: boolean;
  afterDonate: boolean;
  beforeSwapReturnDelta: boolean;
  afterSwapReturnDelta: boolean;
  afterAddLiquidityReturnDelta: boolean;
  afterRemoveLiquidityReturnDelta: boolean;
}

/**
 * Callbacks a pool delivers to a registered hook, gated by its permissions.
 */
export interface PoolHooks {
  readonly address: Address;
  getHookPermissions(): HookPermissions;
  afterInitialize(sender: Address, key: PoolKey, sqrtPriceX96: bigint, tick: number): void;
  afterSwap(sender: Address, key: PoolKey, params: SwapParams, delta: BalanceDelta): void;
}

/**
 * The slice of the pool manager the engine talks to.
 *
 * swap() runs synchronously and leaves the caller with open currency
 * deltas; sync()/settle() pay them in and take() withdraws.
 */
export interface PoolManager {
  readonly address: Address;
  getSlot0(poolId: Hex): Slot0;
  swap(sender: Address, key: PoolKey, params: SwapParams): BalanceDelta;
  sync(currency: Address): void;
  settle(payer: Address): bigint;
  take(currency: Address, to: Address, amount: bigint): void;
}
