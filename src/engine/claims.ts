/**
 * In-memory multi-token claim ledger (ERC-6909 style).
 *
 * One token id per order bucket. Mint and burn are reserved to a single
 * minter address; holders may move units between themselves.
 */

import type { Address } from "viem";
import type { ClaimLedger } from "../types/currency.js";
import type { Snapshotable } from "./journal.js";
import {
  InsufficientBalanceError,
  InvalidOrderError,
  UnauthorizedError,
} from "../utils/errors.js";

export interface ClaimLedgerSnapshot {
  balances: Map<string, bigint>;
  minted: Map<bigint, bigint>;
}

function balanceKey(holder: Address, id: bigint): string {
  return `${holder.toLowerCase()}:${id}`;
}

export class ClaimTokenLedger implements ClaimLedger, Snapshotable<ClaimLedgerSnapshot> {
  private balances = new Map<string, bigint>();
  private minted = new Map<bigint, bigint>();
  private readonly minter: string;

  constructor(opts: { minter: Address }) {
    this.minter = opts.minter.toLowerCase();
  }

  balanceOf(holder: Address, id: bigint): bigint {
    return this.balances.get(balanceKey(holder, id)) ?? 0n;
  }

  /** Units ever minted for an id, net of burns. */
  totalMinted(id: bigint): bigint {
    return this.minted.get(id) ?? 0n;
  }

  mint(operator: Address, holder: Address, id: bigint, amount: bigint): void {
    this.assertMinter(operator);
    this.assertAmount(amount);
    this.credit(holder, id, amount);
    this.minted.set(id, this.totalMinted(id) + amount);
  }

  burn(operator: Address, holder: Address, id: bigint, amount: bigint): void {
    this.assertMinter(operator);
    this.assertAmount(amount);
    this.debit(holder, id, amount);
    this.minted.set(id, this.totalMinted(id) - amount);
  }

  transfer(from: Address, to: Address, id: bigint, amount: bigint): void {
    this.assertAmount(amount);
    this.debit(from, id, amount);
    this.credit(to, id, amount);
  }

  snapshot(): ClaimLedgerSnapshot {
    return { balances: new Map(this.balances), minted: new Map(this.minted) };
  }

  restore(snapshot: ClaimLedgerSnapshot): void {
    this.balances = new Map(snapshot.balances);
    this.minted = new Map(snapshot.minted);
  }

  private credit(holder: Address, id: bigint, amount: bigint): void {
    const key = balanceKey(holder, id);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  private debit(holder: Address, id: bigint, amount: bigint): void {
    const key = balanceKey(holder, id);
    const balance = this.balances.get(key) ?? 0n;
    if (balance < amount) {
      throw new InsufficientBalanceError(
        `Claim balance of ${holder} for ${id} is ${balance}, needed ${amount}`
      );
    }
    this.balances.set(key, balance - amount);
  }

  private assertMinter(operator: Address): void {
    if (operator.toLowerCase() !== this.minter) {
      throw new UnauthorizedError(`${operator} may not mint or burn claims`);
    }
  }

  private assertAmount(amount: bigint): void {
    if (amount <= 0n) {
      throw new InvalidOrderError(`Claim amount must be positive, got ${amount}`);
    }
  }
}
