/**
 * Settlement adapter: moves assets between an account's custody and its
 * counterparties.
 *
 * Handles:
 * 1. pull/push of plain input and output assets (placement, cancel, redeem)
 * 2. swapAndSettle: run a swap as `account`, then pay the negative leg in
 *    (sync → transfer → settle) and take the positive leg out
 *
 * The zero address is the native asset and moves by raw value transfer.
 * Nothing is skimmed; amounts pass through exactly.
 */

import { isAddressEqual, zeroAddress, type Address } from "viem";
import type { CurrencyLedger } from "../types/currency.js";
import type { BalanceDelta, PoolKey, PoolManager, SwapParams } from "../types/pool.js";
import type { Logger } from "../utils/logger.js";

export interface SettlementOptions {
  account: Address;
  pool: PoolManager;
  currencies: CurrencyLedger;
  logger: Logger;
}

export function isNative(currency: Address): boolean {
  return isAddressEqual(currency, zeroAddress);
}

export class SettlementAdapter {
  readonly account: Address;
  private pool: PoolManager;
  private currencies: CurrencyLedger;
  private logger: Logger;

  constructor(opts: SettlementOptions) {
    this.account = opts.account;
    this.pool = opts.pool;
    this.currencies = opts.currencies;
    this.logger = opts.logger;
  }

  /**
   * Move `amount` from `from` into this account's custody.
   * Tokens need a prior allowance for this account.
   */
  pull(currency: Address, from: Address, amount: bigint): void {
    if (amount === 0n) return;
    if (isNative(currency)) {
      this.currencies.sendValue(from, this.account, amount);
    } else {
      this.currencies.transferFrom(currency, this.account, from, this.account, amount);
    }
  }

  /**
   * Move `amount` out of this account's custody to `to`.
   */
  push(currency: Address, to: Address, amount: bigint): void {
    if (amount === 0n) return;
    if (isNative(currency)) {
      this.currencies.sendValue(this.account, to, amount);
    } else {
      this.currencies.transfer(currency, this.account, to, amount);
    }
  }

  /**
   * Swap against the pool and square both legs of the resulting delta.
   * Returns the delta as reported by the pool.
   */
  swapAndSettle(key: PoolKey, params: SwapParams): BalanceDelta {
    const delta = this.pool.swap(this.account, key, params);

    if (params.zeroForOne) {
      if (delta.amount0 < 0n) this.settle(key.currency0, -delta.amount0);
      if (delta.amount1 > 0n) this.take(key.currency1, delta.amount1);
    } else {
      if (delta.amount1 < 0n) this.settle(key.currency1, -delta.amount1);
      if (delta.amount0 > 0n) this.take(key.currency0, delta.amount0);
    }

    this.logger.debug(
      {
        account: this.account,
        zeroForOne: params.zeroForOne,
        amount0: delta.amount0.toString(),
        amount1: delta.amount1.toString(),
      },
      "Swap settled"
    );

    return delta;
  }

  private settle(currency: Address, amount: bigint): void {
    this.pool.sync(currency);
    this.push(currency, this.pool.address, amount);
    this.pool.settle(this.account);
  }

  private take(currency: Address, amount: bigint): void {
    this.pool.take(currency, this.account, amount);
  }
}
