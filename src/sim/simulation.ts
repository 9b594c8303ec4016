/**
 * Wires an in-process pool, currency ledger, claim ledger and the
 * limit-order hook onto one journal, so a failure anywhere inside a swap
 * unwinds all of them together.
 */

import type { Address } from "viem";
import type { BalanceDelta, PoolKey } from "../types/pool.js";
import type { Logger } from "../utils/logger.js";
import { SettlementAdapter, isNative } from "../chain/settlement.js";
import { DEFAULT_HOOK_ADDRESS, DEFAULT_POOL_MANAGER_ADDRESS } from "../constants.js";
import { ClaimTokenLedger } from "../engine/claims.js";
import { Journal } from "../engine/journal.js";
import { LimitOrderHook } from "../engine/limitOrderHook.js";
import { toPoolId } from "../engine/orderId.js";
import { MAX_SQRT_PRICE, MIN_SQRT_PRICE } from "../engine/tick.js";
import { createSilentLogger } from "../utils/logger.js";
import { InMemoryCurrencyLedger } from "./currencyLedger.js";
import { InMemoryPoolManager } from "./poolManager.js";

export { DEFAULT_HOOK_ADDRESS, DEFAULT_POOL_MANAGER_ADDRESS };

export interface SimulationOptions {
  hookAddress?: Address;
  poolManagerAddress?: Address;
  logger?: Logger;
}

export interface CreatePoolParams {
  currency0: Address;
  currency1: Address;
  fee: number;
  tickSpacing: number;
  reserve0: bigint;
  reserve1: bigint;
}

export class LimitOrderSimulation {
  readonly journal = new Journal();
  readonly currencies = new InMemoryCurrencyLedger();
  readonly claims: ClaimTokenLedger;
  readonly pool: InMemoryPoolManager;
  readonly hook: LimitOrderHook;
  readonly logger: Logger;

  constructor(opts: SimulationOptions = {}) {
    const hookAddress = opts.hookAddress ?? DEFAULT_HOOK_ADDRESS;
    this.logger = opts.logger ?? createSilentLogger();

    this.journal.register(this.currencies);
    this.claims = new ClaimTokenLedger({ minter: hookAddress });
    this.journal.register(this.claims);

    this.pool = new InMemoryPoolManager({
      address: opts.poolManagerAddress ?? DEFAULT_POOL_MANAGER_ADDRESS,
      currencies: this.currencies,
      journal: this.journal,
      logger: this.logger,
    });
    this.hook = new LimitOrderHook({
      address: hookAddress,
      pool: this.pool,
      currencies: this.currencies,
      claims: this.claims,
      logger: this.logger,
      journal: this.journal,
    });
    this.pool.registerHook(this.hook);
  }

  /**
   * Initialize a pool hooked to the limit-order hook and fund its reserves.
   */
  createPool(params: CreatePoolParams): PoolKey {
    const key: PoolKey = {
      currency0: params.currency0,
      currency1: params.currency1,
      fee: params.fee,
      tickSpacing: params.tickSpacing,
      hooks: this.hook.address,
    };

    this.journal.atomic(() => {
      this.currencies.mint(key.currency0, this.pool.address, params.reserve0);
      this.currencies.mint(key.currency1, this.pool.address, params.reserve1);
      this.pool.initialize(this.hook.address, key, params.reserve0, params.reserve1);
    });
    return key;
  }

  /**
   * Give `account` `amount` of `currency` and let the hook pull it.
   */
  fund(account: Address, currency: Address, amount: bigint): void {
    this.currencies.mint(currency, account, amount);
    if (!isNative(currency)) {
      const allowed = this.currencies.allowance(currency, account, this.hook.address);
      this.currencies.approve(currency, account, this.hook.address, allowed + amount);
    }
  }

  /**
   * Router-style exact-input swap by an external trader, with no price limit.
   */
  swapExactInput(
    trader: Address,
    key: PoolKey,
    zeroForOne: boolean,
    amountIn: bigint
  ): BalanceDelta {
    const router = new SettlementAdapter({
      account: trader,
      pool: this.pool,
      currencies: this.currencies,
      logger: this.logger,
    });

    return this.pool.unlock(() =>
      router.swapAndSettle(key, {
        zeroForOne,
        amountSpecified: -amountIn,
        sqrtPriceLimitX96: zeroForOne ? MIN_SQRT_PRICE + 1n : MAX_SQRT_PRICE - 1n,
      })
    );
  }

  currentTick(key: PoolKey): number {
    return this.pool.getSlot0(toPoolId(key)).tick;
  }
}
