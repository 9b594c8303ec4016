/**
 * Order ledger: pending input per (pool, tick, direction), claim supply and
 * claimable output per order id, and the last observed tick per pool.
 *
 * Entries are never deleted. A drained bucket stays as a zero entry and
 * reads the same as one that was never written.
 */

import type { Hex } from "viem";
import type { Snapshotable } from "./journal.js";
import { InvariantViolationError } from "../utils/errors.js";

export interface LedgerSnapshot {
  pendingOrders: Map<string, bigint>;
  claimSupply: Map<bigint, bigint>;
  claimableOutput: Map<bigint, bigint>;
  lastTicks: Map<Hex, number>;
}

function bucketKey(poolId: Hex, tick: number, zeroForOne: boolean): string {
  return `${poolId}:${tick}:${zeroForOne ? 1 : 0}`;
}

function add<K>(map: Map<K, bigint>, key: K, amount: bigint): bigint {
  const next = (map.get(key) ?? 0n) + amount;
  map.set(key, next);
  return next;
}

function sub<K>(map: Map<K, bigint>, key: K, amount: bigint, label: string): bigint {
  const current = map.get(key) ?? 0n;
  if (amount > current) {
    throw new InvariantViolationError(
      `${label} underflow: ${current} - ${amount}`
    );
  }
  const next = current - amount;
  map.set(key, next);
  return next;
}

export class OrderLedger implements Snapshotable<LedgerSnapshot> {
  private pendingOrders = new Map<string, bigint>();
  private claimSupply = new Map<bigint, bigint>();
  private claimableOutput = new Map<bigint, bigint>();
  private lastTicks = new Map<Hex, number>();

  getPendingOrder(poolId: Hex, tick: number, zeroForOne: boolean): bigint {
    return this.pendingOrders.get(bucketKey(poolId, tick, zeroForOne)) ?? 0n;
  }

  addPendingOrder(poolId: Hex, tick: number, zeroForOne: boolean, amount: bigint): bigint {
    return add(this.pendingOrders, bucketKey(poolId, tick, zeroForOne), amount);
  }

  subPendingOrder(poolId: Hex, tick: number, zeroForOne: boolean, amount: bigint): bigint {
    return sub(
      this.pendingOrders,
      bucketKey(poolId, tick, zeroForOne),
      amount,
      "pendingOrders"
    );
  }

  /**
   * Number of buckets with pending input for a pool, both directions.
   * Bounds the number of fills a single execution pass can make.
   */
  countPendingBuckets(poolId: Hex): number {
    const prefix = `${poolId}:`;
    let count = 0;
    for (const [key, amount] of this.pendingOrders) {
      if (amount > 0n && key.startsWith(prefix)) count++;
    }
    return count;
  }

  getClaimSupply(orderId: bigint): bigint {
    return this.claimSupply.get(orderId) ?? 0n;
  }

  addClaimSupply(orderId: bigint, amount: bigint): bigint {
    return add(this.claimSupply, orderId, amount);
  }

  subClaimSupply(orderId: bigint, amount: bigint): bigint {
    return sub(this.claimSupply, orderId, amount, "claimSupply");
  }

  getClaimableOutput(orderId: bigint): bigint {
    return this.claimableOutput.get(orderId) ?? 0n;
  }

  addClaimableOutput(orderId: bigint, amount: bigint): bigint {
    return add(this.claimableOutput, orderId, amount);
  }

  subClaimableOutput(orderId: bigint, amount: bigint): bigint {
    return sub(this.claimableOutput, orderId, amount, "claimableOutput");
  }

  getLastTick(poolId: Hex): number | undefined {
    return this.lastTicks.get(poolId);
  }

  setLastTick(poolId: Hex, tick: number): void {
    this.lastTicks.set(poolId, tick);
  }

  snapshot(): LedgerSnapshot {
    return {
      pendingOrders: new Map(this.pendingOrders),
      claimSupply: new Map(this.claimSupply),
      claimableOutput: new Map(this.claimableOutput),
      lastTicks: new Map(this.lastTicks),
    };
  }

  restore(snapshot: LedgerSnapshot): void {
    this.pendingOrders = new Map(snapshot.pendingOrders);
    this.claimSupply = new Map(snapshot.claimSupply);
    this.claimableOutput = new Map(snapshot.claimableOutput);
    this.lastTicks = new Map(snapshot.lastTicks);
  }
}
