/**
 * JSON scenarios replayed against an in-process pool.
 *
 * Amounts are decimal strings in whole units (parsed with 18 decimals).
 * A step that fails with a LimitOrderError is recorded and the run
 * continues; any other error aborts the run.
 */

import { readFileSync } from "node:fs";
import { isAddress, parseEther, type Address } from "viem";
import { z } from "zod";
import type { EngineConfig } from "../types/config.js";
import type { OrderState } from "../types/order.js";
import type { PoolKey } from "../types/pool.js";
import type { Logger } from "../utils/logger.js";
import { LimitOrderError } from "../utils/errors.js";
import { LimitOrderSimulation } from "./simulation.js";

const amount = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "amount must be a decimal string")
  .transform((value) => parseEther(value));

const address = z
  .string()
  .refine((value): value is Address => isAddress(value), "invalid address");

const orderStep = z.object({
  account: z.string(),
  tick: z.number().int(),
  zeroForOne: z.boolean(),
  amount,
});

const stepSchema = z.discriminatedUnion("action", [
  orderStep.extend({ action: z.literal("place") }),
  orderStep.extend({ action: z.literal("cancel") }),
  orderStep.extend({ action: z.literal("redeem") }),
  z.object({
    action: z.literal("swap"),
    account: z.string(),
    zeroForOne: z.boolean(),
    amount,
  }),
]);

export const scenarioSchema = z.object({
  name: z.string().default("scenario"),
  pool: z
    .object({
      fee: z.number().int().nonnegative().optional(),
      tickSpacing: z.number().int().positive().optional(),
      reserve0: amount.optional(),
      reserve1: amount.optional(),
    })
    .default({}),
  accounts: z.record(
    z.object({
      address,
      token0: amount.default("0"),
      token1: amount.default("0"),
    })
  ),
  steps: z.array(stepSchema),
});

export type Scenario = z.infer<typeof scenarioSchema>;
export type ScenarioStep = Scenario["steps"][number];

export interface StepResult {
  index: number;
  action: ScenarioStep["action"];
  account: string;
  ok: boolean;
  detail: string;
  tick: number;
}

export interface ScenarioResult {
  name: string;
  key: PoolKey;
  steps: StepResult[];
  orders: OrderState[];
}

export function loadScenario(path: string): Scenario {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return scenarioSchema.parse(raw);
}

export function runScenario(
  scenario: Scenario,
  config: EngineConfig,
  logger: Logger
): ScenarioResult {
  const sim = new LimitOrderSimulation({
    hookAddress: config.hookAddress,
    poolManagerAddress: config.poolManagerAddress,
    logger,
  });
  const key = sim.createPool({
    currency0: config.currency0,
    currency1: config.currency1,
    fee: scenario.pool.fee ?? config.poolFee,
    tickSpacing: scenario.pool.tickSpacing ?? config.tickSpacing,
    reserve0: scenario.pool.reserve0 ?? config.initialReserve0,
    reserve1: scenario.pool.reserve1 ?? config.initialReserve1,
  });

  const accounts = new Map<string, Address>();
  for (const [name, account] of Object.entries(scenario.accounts)) {
    accounts.set(name, account.address);
    if (account.token0 > 0n) sim.fund(account.address, key.currency0, account.token0);
    if (account.token1 > 0n) sim.fund(account.address, key.currency1, account.token1);
  }

  const touched = new Map<string, { tick: number; zeroForOne: boolean }>();
  const steps: StepResult[] = scenario.steps.map((step, index) => {
    const sender = accounts.get(step.account);
    if (!sender) throw new Error(`Step ${index}: unknown account ${step.account}`);

    let detail: string;
    let ok = true;
    try {
      detail = applyStep(sim, key, sender, step);
      if (step.action !== "swap") {
        touched.set(`${step.tick}:${step.zeroForOne}`, {
          tick: step.tick,
          zeroForOne: step.zeroForOne,
        });
      }
    } catch (err) {
      if (!(err instanceof LimitOrderError)) throw err;
      ok = false;
      detail = `${err.code}: ${err.message}`;
      logger.warn({ index, action: step.action, code: err.code }, "Scenario step rejected");
    }

    return { index, action: step.action, account: step.account, ok, detail, tick: sim.currentTick(key) };
  });

  // Raw ticks in the same bucket collapse to one entry
  const orders = new Map<bigint, OrderState>();
  for (const { tick, zeroForOne } of touched.values()) {
    const state = sim.hook.getOrderState(key, tick, zeroForOne);
    orders.set(state.orderId, state);
  }

  return { name: scenario.name, key, steps, orders: Array.from(orders.values()) };
}

function applyStep(
  sim: LimitOrderSimulation,
  key: PoolKey,
  sender: Address,
  step: ScenarioStep
): string {
  switch (step.action) {
    case "place": {
      const tick = sim.hook.placeOrder(sender, key, step.tick, step.zeroForOne, step.amount);
      return `placed ${step.amount} at tick ${tick}`;
    }
    case "cancel":
      sim.hook.cancelOrder(sender, key, step.tick, step.zeroForOne, step.amount);
      return `cancelled ${step.amount}`;
    case "redeem": {
      const output = sim.hook.redeem(sender, key, step.tick, step.zeroForOne, step.amount);
      return `redeemed ${step.amount} for ${output}`;
    }
    case "swap": {
      const delta = sim.swapExactInput(sender, key, step.zeroForOne, step.amount);
      return `swapped: amount0 ${delta.amount0}, amount1 ${delta.amount1}`;
    }
  }
}
