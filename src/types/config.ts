import type { Address } from "viem";

export interface EngineConfig {
  hookAddress: Address;
  poolManagerAddress: Address;
  currency0: Address;
  currency1: Address;
  poolFee: number;
  tickSpacing: number;
  initialReserve0: bigint;
  initialReserve1: bigint;
  logLevel: string;
}
