/**
 * Take-profit limit orders on a constant-product pool.
 *
 * The hook, its executor and ledgers are the engine; the sim/ exports wire
 * them to an in-process pool manager and currency ledger.
 */

export { LimitOrderHook, type LimitOrderHookOptions } from "./engine/limitOrderHook.js";
export { TickCrossingExecutor, type ExecutorOptions } from "./engine/executor.js";
export { OrderLedger, type LedgerSnapshot } from "./engine/ledger.js";
export { ClaimTokenLedger, type ClaimLedgerSnapshot } from "./engine/claims.js";
export { Journal, isSnapshotable, type Snapshotable } from "./engine/journal.js";
export { getOrderId, toPoolId } from "./engine/orderId.js";
export { computeOutputShare, deltaInput, deltaOutput } from "./engine/fills.js";
export {
  LIMIT_ORDER_HOOK_PERMISSIONS,
  hookAddressFlags,
  validateHookAddress,
  validateHookPermissions,
} from "./engine/permissions.js";
export {
  MAX_SQRT_PRICE,
  MAX_TICK,
  MIN_SQRT_PRICE,
  MIN_TICK,
  gridTicksBetween,
  lowerUsableTick,
} from "./engine/tick.js";
export { SettlementAdapter, isNative, type SettlementOptions } from "./chain/settlement.js";

export { InMemoryCurrencyLedger, type CurrencyLedgerSnapshot } from "./sim/currencyLedger.js";
export {
  InMemoryPoolManager,
  sqrtPriceX96FromReserves,
  tickFromReserves,
  type PoolManagerOptions,
  type PoolManagerSnapshot,
} from "./sim/poolManager.js";
export {
  DEFAULT_HOOK_ADDRESS,
  DEFAULT_POOL_MANAGER_ADDRESS,
  LimitOrderSimulation,
  type CreatePoolParams,
  type SimulationOptions,
} from "./sim/simulation.js";
export {
  loadScenario,
  runScenario,
  scenarioSchema,
  type Scenario,
  type ScenarioResult,
  type ScenarioStep,
  type StepResult,
} from "./sim/scenario.js";

export { loadConfig } from "./config.js";
export { createLogger, createSilentLogger, type Logger } from "./utils/logger.js";
export * from "./utils/errors.js";

export type { EngineConfig } from "./types/config.js";
export type { ClaimLedger, CurrencyLedger } from "./types/currency.js";
export type { ExecutionReport, OrderFill, OrderState } from "./types/order.js";
export type {
  BalanceDelta,
  HookPermissions,
  PoolHooks,
  PoolKey,
  PoolManager,
  SwapParams,
  Slot0,
} from "./types/pool.js";
