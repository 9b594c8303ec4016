import type { Address } from "viem";

// Low bits 0x1040 = afterInitialize | afterSwap
export const DEFAULT_HOOK_ADDRESS: Address = "0x0000000000000000000000000000000000001040";
export const DEFAULT_POOL_MANAGER_ADDRESS: Address = "0x5555555555555555555555555555555555555555";
