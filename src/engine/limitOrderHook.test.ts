import { describe, it, expect, beforeEach, vi } from "vitest";
import { parseEther, zeroAddress, type Address } from "viem";
import { LimitOrderSimulation, DEFAULT_HOOK_ADDRESS } from "../sim/simulation.js";
import { InMemoryCurrencyLedger } from "../sim/currencyLedger.js";
import { ClaimTokenLedger } from "./claims.js";
import { LimitOrderHook } from "./limitOrderHook.js";
import { createSilentLogger } from "../utils/logger.js";
import {
  InvalidOrderError,
  NotEnoughToClaimError,
  NothingToClaimError,
} from "../utils/errors.js";
import type { PoolKey, PoolManager } from "../types/pool.js";

const TOKEN0: Address = "0x1111111111111111111111111111111111111111";
const TOKEN1: Address = "0x2222222222222222222222222222222222222222";
const ALICE: Address = "0xa11ce00000000000000000000000000000000001";
const BOB: Address = "0xb0b0000000000000000000000000000000000002";
const TRADER: Address = "0x7eade00000000000000000000000000000000003";

const RESERVE = parseEther("1000");
const ORDER = parseEther("0.01");

// Output of filling a 0.01 sell-currency0 bucket right after a 2 token1 buy
const FILL_AT_0_AFTER_SMALL_TRADE = 10009759944057528n;

function setup(tickSpacing = 30): { sim: LimitOrderSimulation; key: PoolKey } {
  const sim = new LimitOrderSimulation();
  const key = sim.createPool({
    currency0: TOKEN0,
    currency1: TOKEN1,
    fee: 3000,
    tickSpacing,
    reserve0: RESERVE,
    reserve1: RESERVE,
  });
  for (const account of [ALICE, BOB, TRADER]) {
    sim.fund(account, TOKEN0, parseEther("100"));
    sim.fund(account, TOKEN1, parseEther("100"));
  }
  return { sim, key };
}

describe("LimitOrderHook", () => {
  let sim: LimitOrderSimulation;
  let key: PoolKey;

  beforeEach(() => {
    ({ sim, key } = setup());
  });

  describe("afterInitialize", () => {
    it("seeds the last observed tick", () => {
      expect(sim.hook.getLastTick(key)).toBe(0);
    });
  });

  describe("placeOrder", () => {
    it("rests the order at the lower usable tick", () => {
      expect(sim.hook.placeOrder(ALICE, key, 75, true, ORDER)).toBe(60);
      expect(sim.hook.placeOrder(ALICE, key, -10, false, ORDER)).toBe(-30);
    });

    it("records pending volume, claim supply and claim units", () => {
      sim.hook.placeOrder(ALICE, key, 60, true, ORDER);
      sim.hook.placeOrder(BOB, key, 61, true, ORDER);

      const orderId = sim.hook.getOrderId(key, 60, true);
      expect(sim.hook.getPendingOrder(key, 60, true)).toBe(2n * ORDER);
      expect(sim.hook.getClaimSupply(orderId)).toBe(2n * ORDER);
      expect(sim.claims.balanceOf(ALICE, orderId)).toBe(ORDER);
      expect(sim.claims.balanceOf(BOB, orderId)).toBe(ORDER);
      expect(sim.hook.getPendingOrder(key, 60, false)).toBe(0n);
    });

    it("pulls the sold currency into the hook's custody", () => {
      sim.hook.placeOrder(ALICE, key, 60, true, ORDER);
      sim.hook.placeOrder(ALICE, key, -60, false, ORDER);

      expect(sim.currencies.balanceOf(TOKEN0, ALICE)).toBe(parseEther("100") - ORDER);
      expect(sim.currencies.balanceOf(TOKEN1, ALICE)).toBe(parseEther("100") - ORDER);
      expect(sim.currencies.balanceOf(TOKEN0, DEFAULT_HOOK_ADDRESS)).toBe(ORDER);
      expect(sim.currencies.balanceOf(TOKEN1, DEFAULT_HOOK_ADDRESS)).toBe(ORDER);
    });

    it("rejects a zero amount before touching state", () => {
      expect(() => sim.hook.placeOrder(ALICE, key, 60, true, 0n)).toThrow(InvalidOrderError);
      expect(sim.hook.getPendingOrder(key, 60, true)).toBe(0n);
    });

    it("rolls back ledger and claims when the deposit cannot be pulled", () => {
      const broke: Address = "0x000000000000000000000000000000000000dead";
      expect(() => sim.hook.placeOrder(broke, key, 60, true, ORDER)).toThrow(
        "Allowance of"
      );

      const orderId = sim.hook.getOrderId(key, 60, true);
      expect(sim.hook.getPendingOrder(key, 60, true)).toBe(0n);
      expect(sim.hook.getClaimSupply(orderId)).toBe(0n);
      expect(sim.claims.balanceOf(broke, orderId)).toBe(0n);
    });
  });

  describe("cancelOrder", () => {
    it("restores the depositor's balance exactly", () => {
      sim.hook.placeOrder(ALICE, key, 60, true, ORDER);
      sim.hook.cancelOrder(ALICE, key, 60, true, ORDER);

      const orderId = sim.hook.getOrderId(key, 60, true);
      expect(sim.currencies.balanceOf(TOKEN0, ALICE)).toBe(parseEther("100"));
      expect(sim.hook.getPendingOrder(key, 60, true)).toBe(0n);
      expect(sim.hook.getClaimSupply(orderId)).toBe(0n);
      expect(sim.claims.balanceOf(ALICE, orderId)).toBe(0n);
    });

    it("allows partial cancellation", () => {
      sim.hook.placeOrder(ALICE, key, 60, true, ORDER);
      sim.hook.cancelOrder(ALICE, key, 89, true, ORDER / 4n);

      expect(sim.hook.getPendingOrder(key, 60, true)).toBe((ORDER * 3n) / 4n);
      expect(sim.currencies.balanceOf(TOKEN0, ALICE)).toBe(
        parseEther("100") - (ORDER * 3n) / 4n
      );
    });

    it("fails with nothing to claim for a non-holder", () => {
      sim.hook.placeOrder(ALICE, key, 60, true, ORDER);
      expect(() => sim.hook.cancelOrder(BOB, key, 60, true, 1n)).toThrow(NothingToClaimError);
    });

    it("fails with not enough to claim above the holder's balance", () => {
      sim.hook.placeOrder(ALICE, key, 60, true, ORDER);
      sim.hook.placeOrder(BOB, key, 60, true, ORDER);
      expect(() => sim.hook.cancelOrder(ALICE, key, 60, true, ORDER + 1n)).toThrow(
        NotEnoughToClaimError
      );
      expect(sim.hook.getPendingOrder(key, 60, true)).toBe(2n * ORDER);
    });

    it("cannot cancel the filled part of a bucket", () => {
      sim.hook.placeOrder(ALICE, key, 0, true, ORDER);
      sim.swapExactInput(TRADER, key, false, parseEther("2"));

      expect(() => sim.hook.cancelOrder(ALICE, key, 0, true, ORDER)).toThrow(
        NotEnoughToClaimError
      );
    });
  });

  describe("afterSwap", () => {
    beforeEach(() => {
      sim.hook.placeOrder(ALICE, key, 0, true, ORDER);
      sim.hook.placeOrder(ALICE, key, 60, true, ORDER);
    });

    it("fills only the orders the price crossed", () => {
      sim.swapExactInput(TRADER, key, false, parseEther("2"));

      const id0 = sim.hook.getOrderId(key, 0, true);
      const id60 = sim.hook.getOrderId(key, 60, true);
      expect(sim.hook.getPendingOrder(key, 0, true)).toBe(0n);
      expect(sim.hook.getClaimableOutput(id0)).toBe(FILL_AT_0_AFTER_SMALL_TRADE);
      expect(sim.hook.getPendingOrder(key, 60, true)).toBe(ORDER);
      expect(sim.hook.getClaimableOutput(id60)).toBe(0n);
      expect(sim.hook.getLastTick(key)).toBe(39);
    });

    it("fills every crossed order in the same triggering swap", () => {
      sim.swapExactInput(TRADER, key, false, parseEther("5"));

      expect(sim.hook.getPendingOrder(key, 0, true)).toBe(0n);
      expect(sim.hook.getPendingOrder(key, 60, true)).toBe(0n);
      expect(sim.hook.getClaimableOutput(sim.hook.getOrderId(key, 0, true))).toBe(
        10069698056891847n
      );
      expect(sim.hook.getClaimableOutput(sim.hook.getOrderId(key, 60, true))).toBe(
        10069495966634539n
      );
      expect(sim.hook.getLastTick(key)).toBe(99);
    });

    it("holds the realized output in the hook's custody", () => {
      sim.swapExactInput(TRADER, key, false, parseEther("2"));

      expect(sim.currencies.balanceOf(TOKEN1, DEFAULT_HOOK_ADDRESS)).toBe(
        FILL_AT_0_AFTER_SMALL_TRADE
      );
      expect(sim.currencies.balanceOf(TOKEN0, DEFAULT_HOOK_ADDRESS)).toBe(ORDER);
    });

    it("fills sell-currency1 orders when the price falls", () => {
      sim.hook.placeOrder(BOB, key, -45, false, ORDER);
      sim.swapExactInput(TRADER, key, true, parseEther("8"));

      const orderId = sim.hook.getOrderId(key, -60, false);
      expect(sim.hook.getPendingOrder(key, -60, false)).toBe(0n);
      expect(sim.hook.getClaimableOutput(orderId)).toBe(10129815085973403n);
      // Rising-side orders are untouched by a falling price
      expect(sim.hook.getPendingOrder(key, 0, true)).toBe(ORDER);
      expect(sim.hook.getLastTick(key)).toBe(-159);
    });

    it("does nothing when the price stays inside the current grid cell", () => {
      sim.swapExactInput(TRADER, key, false, parseEther("0.5"));
      expect(sim.hook.getPendingOrder(key, 0, true)).toBe(ORDER);
      expect(sim.hook.getPendingOrder(key, 60, true)).toBe(ORDER);
    });

    it("rolls back the triggering swap when a fill cannot settle", () => {
      const transfer = sim.currencies.transfer.bind(sim.currencies);
      vi.spyOn(sim.currencies, "transfer").mockImplementation((currency, from, to, amount) => {
        if (from === DEFAULT_HOOK_ADDRESS) throw new Error("transfer blocked");
        transfer(currency, from, to, amount);
      });

      expect(() => sim.swapExactInput(TRADER, key, false, parseEther("5"))).toThrow(
        "transfer blocked"
      );

      expect(sim.hook.getPendingOrder(key, 0, true)).toBe(ORDER);
      expect(sim.hook.getPendingOrder(key, 60, true)).toBe(ORDER);
      expect(sim.hook.getLastTick(key)).toBe(0);
      expect(sim.currentTick(key)).toBe(0);
      expect(sim.currencies.balanceOf(TOKEN1, TRADER)).toBe(parseEther("100"));
      expect(sim.currencies.balanceOf(TOKEN0, TRADER)).toBe(parseEther("100"));
    });
  });

  describe("redeem", () => {
    it("fails with nothing to claim before any fill", () => {
      sim.hook.placeOrder(ALICE, key, 0, true, ORDER);
      expect(() => sim.hook.redeem(ALICE, key, 0, true, ORDER)).toThrow(NothingToClaimError);
    });

    it("pays the whole claimable output to the sole holder", () => {
      sim.hook.placeOrder(ALICE, key, 0, true, ORDER);
      sim.swapExactInput(TRADER, key, false, parseEther("2"));

      const out = sim.hook.redeem(ALICE, key, 0, true, ORDER);
      const orderId = sim.hook.getOrderId(key, 0, true);

      expect(out).toBe(FILL_AT_0_AFTER_SMALL_TRADE);
      expect(sim.currencies.balanceOf(TOKEN1, ALICE)).toBe(
        parseEther("100") + FILL_AT_0_AFTER_SMALL_TRADE
      );
      expect(sim.hook.getClaimableOutput(orderId)).toBe(0n);
      expect(sim.hook.getClaimSupply(orderId)).toBe(0n);
      expect(sim.claims.balanceOf(ALICE, orderId)).toBe(0n);
      expect(() => sim.hook.redeem(ALICE, key, 0, true, ORDER)).toThrow(NothingToClaimError);
    });

    it("fails with not enough to claim above the holder's balance", () => {
      sim.hook.placeOrder(ALICE, key, 0, true, ORDER);
      sim.swapExactInput(TRADER, key, false, parseEther("2"));

      expect(() => sim.hook.redeem(BOB, key, 0, true, 1n)).toThrow(NotEnoughToClaimError);
      expect(() => sim.hook.redeem(ALICE, key, 0, true, ORDER + 1n)).toThrow(
        NotEnoughToClaimError
      );
    });

    it("splits output pro-rata regardless of redemption order", () => {
      const totals: bigint[] = [];
      for (const order of [[ALICE, BOB], [BOB, ALICE]]) {
        const fresh = setup();
        fresh.sim.hook.placeOrder(ALICE, fresh.key, 0, true, ORDER / 2n);
        fresh.sim.hook.placeOrder(BOB, fresh.key, 0, true, ORDER / 2n);
        fresh.sim.swapExactInput(TRADER, fresh.key, false, parseEther("2"));

        const first = fresh.sim.hook.redeem(order[0], fresh.key, 0, true, ORDER / 2n);
        const second = fresh.sim.hook.redeem(order[1], fresh.key, 0, true, ORDER / 2n);
        expect(first).toBe(5004879972028764n);
        expect(second).toBe(5004879972028764n);
        totals.push(first + second);
      }
      expect(totals).toEqual([FILL_AT_0_AFTER_SMALL_TRADE, FILL_AT_0_AFTER_SMALL_TRADE]);
    });

    it("leaves claims and output untouched when the payout fails", () => {
      sim.hook.placeOrder(ALICE, key, 0, true, ORDER);
      sim.swapExactInput(TRADER, key, false, parseEther("2"));
      vi.spyOn(sim.currencies, "transfer").mockImplementation(() => {
        throw new Error("transfer blocked");
      });

      expect(() => sim.hook.redeem(ALICE, key, 0, true, ORDER)).toThrow("transfer blocked");

      const orderId = sim.hook.getOrderId(key, 0, true);
      expect(sim.hook.getClaimableOutput(orderId)).toBe(FILL_AT_0_AFTER_SMALL_TRADE);
      expect(sim.hook.getClaimSupply(orderId)).toBe(ORDER);
      expect(sim.claims.balanceOf(ALICE, orderId)).toBe(ORDER);
      expect(sim.currencies.balanceOf(TOKEN1, ALICE)).toBe(parseEther("100"));
    });

    it("honours claim units that changed hands", () => {
      sim.hook.placeOrder(ALICE, key, 0, true, ORDER);
      sim.swapExactInput(TRADER, key, false, parseEther("2"));
      const orderId = sim.hook.getOrderId(key, 0, true);
      sim.claims.transfer(ALICE, BOB, orderId, ORDER / 2n);

      expect(sim.hook.redeem(BOB, key, 0, true, ORDER / 2n)).toBe(5004879972028764n);
      expect(sim.hook.redeem(ALICE, key, 0, true, ORDER / 2n)).toBe(5004879972028764n);
    });
  });

  describe("getOrderState", () => {
    it("reports the bucket a raw tick falls into", () => {
      sim.hook.placeOrder(ALICE, key, 70, true, ORDER);
      const state = sim.hook.getOrderState(key, 85, true);

      expect(state.tick).toBe(60);
      expect(state.orderId).toBe(sim.hook.getOrderId(key, 60, true));
      expect(state.pendingAmount).toBe(ORDER);
      expect(state.claimSupply).toBe(ORDER);
      expect(state.claimableOutput).toBe(0n);
    });
  });
});

describe("LimitOrderHook with the native asset", () => {
  it("routes native deposits and refunds through value transfers", () => {
    const sim = new LimitOrderSimulation();
    const key = sim.createPool({
      currency0: zeroAddress,
      currency1: TOKEN1,
      fee: 3000,
      tickSpacing: 60,
      reserve0: RESERVE,
      reserve1: RESERVE,
    });
    sim.fund(ALICE, zeroAddress, parseEther("1"));

    sim.hook.placeOrder(ALICE, key, 120, true, ORDER);
    expect(sim.currencies.balanceOf(zeroAddress, ALICE)).toBe(parseEther("1") - ORDER);
    expect(sim.currencies.balanceOf(zeroAddress, DEFAULT_HOOK_ADDRESS)).toBe(ORDER);

    sim.hook.cancelOrder(ALICE, key, 120, true, ORDER);
    expect(sim.currencies.balanceOf(zeroAddress, ALICE)).toBe(parseEther("1"));
  });

  it("fills a native order and pays out the token", () => {
    const sim = new LimitOrderSimulation();
    const key = sim.createPool({
      currency0: zeroAddress,
      currency1: TOKEN1,
      fee: 3000,
      tickSpacing: 30,
      reserve0: RESERVE,
      reserve1: RESERVE,
    });
    sim.fund(ALICE, zeroAddress, parseEther("1"));
    sim.fund(TRADER, TOKEN1, parseEther("10"));

    sim.hook.placeOrder(ALICE, key, 0, true, ORDER);
    sim.swapExactInput(TRADER, key, false, parseEther("2"));

    expect(sim.hook.redeem(ALICE, key, 0, true, ORDER)).toBe(FILL_AT_0_AFTER_SMALL_TRADE);
    expect(sim.currencies.balanceOf(zeroAddress, DEFAULT_HOOK_ADDRESS)).toBe(0n);
  });
});

describe("LimitOrderHook scan direction", () => {
  it("fills sell-currency1 orders crossed by its own sell-currency0 fill", () => {
    const { sim, key } = setup();
    sim.hook.placeOrder(ALICE, key, 0, true, parseEther("6"));
    sim.hook.placeOrder(BOB, key, -45, false, ORDER);

    // Lifts the tick to 39; filling the 6 token0 bucket drops it to -80
    sim.swapExactInput(TRADER, key, false, parseEther("2"));

    expect(sim.hook.getPendingOrder(key, 0, true)).toBe(0n);
    expect(sim.hook.getPendingOrder(key, -60, false)).toBe(0n);
    expect(sim.hook.getClaimableOutput(sim.hook.getOrderId(key, 0, true))).toBe(
      5970131425655310521n
    );
    expect(sim.hook.getClaimableOutput(sim.hook.getOrderId(key, -60, false))).toBe(
      10049778125862343n
    );
    expect(sim.hook.getLastTick(key)).toBe(-80);
  });
});

describe("LimitOrderHook without a shared journal", () => {
  const key: PoolKey = {
    currency0: TOKEN0,
    currency1: TOKEN1,
    fee: 3000,
    tickSpacing: 30,
    hooks: DEFAULT_HOOK_ADDRESS,
  };

  // Placement, cancellation and redemption never reach the pool
  function unusedPool(): PoolManager {
    const fail = (): never => {
      throw new Error("pool not expected");
    };
    return {
      address: "0x5555555555555555555555555555555555555555",
      getSlot0: fail,
      swap: fail,
      sync: fail,
      settle: fail,
      take: fail,
    };
  }

  let currencies: InMemoryCurrencyLedger;
  let claims: ClaimTokenLedger;
  let hook: LimitOrderHook;

  beforeEach(() => {
    currencies = new InMemoryCurrencyLedger();
    claims = new ClaimTokenLedger({ minter: DEFAULT_HOOK_ADDRESS });
    hook = new LimitOrderHook({
      address: DEFAULT_HOOK_ADDRESS,
      pool: unusedPool(),
      currencies,
      claims,
      logger: createSilentLogger(),
    });
    currencies.mint(TOKEN0, ALICE, parseEther("1"));
  });

  it("does not mint claim units when the deposit cannot be pulled", () => {
    expect(() => hook.placeOrder(ALICE, key, 60, true, ORDER)).toThrow("Allowance of");

    const orderId = hook.getOrderId(key, 60, true);
    expect(hook.getPendingOrder(key, 60, true)).toBe(0n);
    expect(hook.getClaimSupply(orderId)).toBe(0n);
    expect(claims.balanceOf(ALICE, orderId)).toBe(0n);
    expect(claims.totalMinted(orderId)).toBe(0n);
  });

  it("keeps claim units when the refund cannot be pushed", () => {
    currencies.approve(TOKEN0, ALICE, DEFAULT_HOOK_ADDRESS, ORDER);
    hook.placeOrder(ALICE, key, 60, true, ORDER);
    vi.spyOn(currencies, "transfer").mockImplementation(() => {
      throw new Error("transfer blocked");
    });

    expect(() => hook.cancelOrder(ALICE, key, 60, true, ORDER)).toThrow("transfer blocked");

    const orderId = hook.getOrderId(key, 60, true);
    expect(hook.getPendingOrder(key, 60, true)).toBe(ORDER);
    expect(hook.getClaimSupply(orderId)).toBe(ORDER);
    expect(claims.balanceOf(ALICE, orderId)).toBe(ORDER);
    expect(currencies.balanceOf(TOKEN0, ALICE)).toBe(parseEther("1") - ORDER);
    expect(currencies.balanceOf(TOKEN0, DEFAULT_HOOK_ADDRESS)).toBe(ORDER);
  });
});
