#!/usr/bin/env -S npx tsx
/**
 * Take-profit order simulator CLI
 *
 * Usage:
 *   npx tsx scripts/sim/cli.ts run <scenario.json>
 *   npx tsx scripts/sim/cli.ts order-id <currency0> <currency1> <fee> <tickSpacing> <hooks> <tick> <zeroForOne>
 *   npx tsx scripts/sim/cli.ts lower-tick <tick> <spacing>
 */

import { Command } from "commander";
import { isAddress, type Address } from "viem";
import { loadConfig } from "../../src/config.js";
import { getOrderId, toPoolId } from "../../src/engine/orderId.js";
import { lowerUsableTick } from "../../src/engine/tick.js";
import { loadScenario, runScenario } from "../../src/sim/scenario.js";
import type { PoolKey } from "../../src/types/pool.js";
import { createLogger } from "../../src/utils/logger.js";

function parseAddress(label: string, value: string): Address {
  if (!isAddress(value)) {
    throw new Error(`Invalid ${label}: ${value}`);
  }
  return value;
}

function parseInteger(label: string, value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new Error(`Invalid ${label}: ${value}`);
  }
  return parseInt(value, 10);
}

function parseBool(label: string, value: string): boolean {
  if (value === "true") return true;
  if (value === "false") return false;
  throw new Error(`Invalid ${label}: ${value} (expected true or false)`);
}

// ============ CLI Setup ============

const program = new Command();

program
  .name("take-profit-sim")
  .description("Replay take-profit order scenarios against an in-process pool")
  .version("0.1.0");

// ============ Run Command ============

program
  .command("run")
  .description("Replay a JSON scenario and print the resulting orders")
  .argument("<scenario>", "Path to scenario JSON")
  .action((scenarioPath: string) => {
    const config = loadConfig();
    const logger = createLogger(config.logLevel);
    const result = runScenario(loadScenario(scenarioPath), config, logger);

    console.log(`\n--- ${result.name} ---`);
    console.log(`Pool: ${toPoolId(result.key)}\n`);

    for (const step of result.steps) {
      const mark = step.ok ? "ok  " : "FAIL";
      console.log(
        `[${mark}] #${step.index} ${step.action} (${step.account}) tick=${step.tick}: ${step.detail}`
      );
    }

    console.log("\nOrders:");
    console.table(
      result.orders.map((order) => ({
        tick: order.tick,
        zeroForOne: order.zeroForOne,
        pending: order.pendingAmount.toString(),
        claimSupply: order.claimSupply.toString(),
        claimable: order.claimableOutput.toString(),
      }))
    );
  });

// ============ Order Id Command ============

program
  .command("order-id")
  .description("Compute the claim token id for a bucket")
  .argument("<currency0>")
  .argument("<currency1>")
  .argument("<fee>")
  .argument("<tickSpacing>")
  .argument("<hooks>")
  .argument("<tick>", "Raw tick; floored to the spacing")
  .argument("<zeroForOne>", "true or false")
  .action(
    (
      currency0: string,
      currency1: string,
      fee: string,
      tickSpacing: string,
      hooks: string,
      tick: string,
      zeroForOne: string
    ) => {
      const key: PoolKey = {
        currency0: parseAddress("currency0", currency0),
        currency1: parseAddress("currency1", currency1),
        fee: parseInteger("fee", fee),
        tickSpacing: parseInteger("tickSpacing", tickSpacing),
        hooks: parseAddress("hooks", hooks),
      };
      const usable = lowerUsableTick(parseInteger("tick", tick), key.tickSpacing);
      const id = getOrderId(key, usable, parseBool("zeroForOne", zeroForOne));

      console.log(`Pool id:  ${toPoolId(key)}`);
      console.log(`Tick:     ${usable}`);
      console.log(`Order id: ${id}`);
    }
  );

// ============ Lower Tick Command ============

program
  .command("lower-tick")
  .description("Floor a tick to the nearest usable grid point")
  .argument("<tick>")
  .argument("<spacing>")
  .action((tick: string, spacing: string) => {
    console.log(lowerUsableTick(parseInteger("tick", tick), parseInteger("spacing", spacing)));
  });

try {
  program.parse();
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}
