import { hexToBigInt, type Address } from "viem";
import type { HookPermissions } from "../types/pool.js";
import { PoolError } from "../utils/errors.js";

/**
 * The limit-order hook only listens for pool initialization (to seed the
 * last observed tick) and completed swaps (to run the fill loop).
 */
export const LIMIT_ORDER_HOOK_PERMISSIONS: Readonly<HookPermissions> = Object.freeze({
  beforeInitialize: false,
  afterInitialize: true,
  beforeAddLiquidity: false,
  afterAddLiquidity: false,
  beforeRemoveLiquidity: false,
  afterRemoveLiquidity: false,
  beforeSwap: false,
  afterSwap: true,
  beforeDonate: false,
  afterDonate: false,
  beforeSwapReturnDelta: false,
  afterSwapReturnDelta: false,
  afterAddLiquidityReturnDelta: false,
  afterRemoveLiquidityReturnDelta: false,
});

const PERMISSION_FLAGS = [
  "beforeInitialize",
  "afterInitialize",
  "beforeAddLiquidity",
  "afterAddLiquidity",
  "beforeRemoveLiquidity",
  "afterRemoveLiquidity",
  "beforeSwap",
  "afterSwap",
  "beforeDonate",
  "afterDonate",
  "beforeSwapReturnDelta",
  "afterSwapReturnDelta",
  "afterAddLiquidityReturnDelta",
  "afterRemoveLiquidityReturnDelta",
] as const satisfies readonly (keyof HookPermissions)[];

/**
 * Every flag must be declared, enabled or not. Return-delta flags need
 * their base callback enabled.
 */
export function validateHookPermissions(permissions: HookPermissions): void {
  for (const flag of PERMISSION_FLAGS) {
    if (typeof permissions[flag] !== "boolean") {
      throw new PoolError(`Hook permission ${flag} must be declared`);
    }
  }
  if (permissions.afterSwapReturnDelta && !permissions.afterSwap) {
    throw new PoolError("afterSwapReturnDelta requires afterSwap");
  }
  if (permissions.beforeSwapReturnDelta && !permissions.beforeSwap) {
    throw new PoolError("beforeSwapReturnDelta requires beforeSwap");
  }
}

// Low 14 bits of a hook address, one per flag in PERMISSION_FLAGS order
const ALL_HOOK_MASK = (1n << 14n) - 1n;

/**
 * Address bits a hook with these permissions must carry. The pool reads
 * permissions from the address, so a mismatch means callbacks are missed.
 */
export function hookAddressFlags(permissions: HookPermissions): bigint {
  let flags = 0n;
  PERMISSION_FLAGS.forEach((flag, i) => {
    if (permissions[flag]) flags |= 1n << BigInt(PERMISSION_FLAGS.length - 1 - i);
  });
  return flags;
}

export function validateHookAddress(address: Address, permissions: HookPermissions): void {
  validateHookPermissions(permissions);
  const expected = hookAddressFlags(permissions);
  const actual = hexToBigInt(address) & ALL_HOOK_MASK;
  if (actual !== expected) {
    throw new PoolError(
      `Hook address ${address} carries flags 0x${actual.toString(16)}, expected 0x${expected.toString(16)}`
    );
  }
}
