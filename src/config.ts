import "dotenv/config";
import { isAddress, type Address } from "viem";
import type { EngineConfig } from "./types/config.js";
import { DEFAULT_HOOK_ADDRESS, DEFAULT_POOL_MANAGER_ADDRESS } from "./constants.js";

const DEFAULT_CURRENCY0: Address = "0x1111111111111111111111111111111111111111";
const DEFAULT_CURRENCY1: Address = "0x2222222222222222222222222222222222222222";
const DEFAULT_RESERVE = "1000000000000000000000"; // 1000e18

function readAddress(name: string, fallback: Address): Address {
  const value = process.env[name];
  if (!value) return fallback;
  if (!isAddress(value)) {
    throw new Error(`Invalid value for ${name}: ${value}`);
  }
  return value;
}

function readInt(name: string, fallback: number): number {
  const value = process.env[name];
  if (!value) return fallback;
  if (!/^-?\d+$/.test(value)) {
    throw new Error(`Invalid value for ${name}: ${value}`);
  }
  return parseInt(value, 10);
}

function readAmount(name: string, fallback: string): bigint {
  const value = process.env[name] ?? fallback;
  if (!/^\d+$/.test(value)) {
    throw new Error(`Invalid value for ${name}: ${value}`);
  }
  return BigInt(value);
}

export function loadConfig(): EngineConfig {
  return {
    hookAddress: readAddress("HOOK_ADDRESS", DEFAULT_HOOK_ADDRESS),
    poolManagerAddress: readAddress("POOL_MANAGER_ADDRESS", DEFAULT_POOL_MANAGER_ADDRESS),
    currency0: readAddress("CURRENCY0", DEFAULT_CURRENCY0),
    currency1: readAddress("CURRENCY1", DEFAULT_CURRENCY1),
    poolFee: readInt("POOL_FEE", 3000),
    tickSpacing: readInt("TICK_SPACING", 60),
    initialReserve0: readAmount("INITIAL_RESERVE0", DEFAULT_RESERVE),
    initialReserve1: readAmount("INITIAL_RESERVE1", DEFAULT_RESERVE),
    logLevel: process.env.LOG_LEVEL ?? "info",
  };
}
