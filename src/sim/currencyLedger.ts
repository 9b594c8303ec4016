/**
 * In-memory ERC-20 balances and allowances plus native balances.
 * The zero address is the native asset and only moves through sendValue().
 */

import { zeroAddress, type Address } from "viem";
import type { CurrencyLedger } from "../types/currency.js";
import type { Snapshotable } from "../engine/journal.js";
import { isNative } from "../chain/settlement.js";
import { InsufficientBalanceError, InvalidOrderError } from "../utils/errors.js";

export interface CurrencyLedgerSnapshot {
  balances: Map<string, bigint>;
  allowances: Map<string, bigint>;
}

function balanceKey(currency: Address, account: Address): string {
  return `${currency.toLowerCase()}:${account.toLowerCase()}`;
}

function allowanceKey(currency: Address, owner: Address, spender: Address): string {
  return `${currency.toLowerCase()}:${owner.toLowerCase()}:${spender.toLowerCase()}`;
}

export class InMemoryCurrencyLedger
  implements CurrencyLedger, Snapshotable<CurrencyLedgerSnapshot>
{
  private balances = new Map<string, bigint>();
  private allowances = new Map<string, bigint>();

  balanceOf(currency: Address, account: Address): bigint {
    return this.balances.get(balanceKey(currency, account)) ?? 0n;
  }

  allowance(currency: Address, owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(currency, owner, spender)) ?? 0n;
  }

  /** Faucet: credit `amount` out of thin air. */
  mint(currency: Address, to: Address, amount: bigint): void {
    this.assertAmount(amount);
    this.credit(currency, to, amount);
  }

  approve(currency: Address, owner: Address, spender: Address, amount: bigint): void {
    this.assertToken(currency);
    this.allowances.set(allowanceKey(currency, owner, spender), amount);
  }

  transfer(currency: Address, from: Address, to: Address, amount: bigint): void {
    this.assertToken(currency);
    this.move(currency, from, to, amount);
  }

  transferFrom(
    currency: Address,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint
  ): void {
    this.assertToken(currency);
    const key = allowanceKey(currency, from, spender);
    const allowed = this.allowances.get(key) ?? 0n;
    if (allowed < amount) {
      throw new InsufficientBalanceError(
        `Allowance of ${spender} on ${from} is ${allowed}, needed ${amount}`
      );
    }
    this.move(currency, from, to, amount);
    this.allowances.set(key, allowed - amount);
  }

  sendValue(from: Address, to: Address, amount: bigint): void {
    this.move(zeroAddress, from, to, amount);
  }

  snapshot(): CurrencyLedgerSnapshot {
    return { balances: new Map(this.balances), allowances: new Map(this.allowances) };
  }

  restore(snapshot: CurrencyLedgerSnapshot): void {
    this.balances = new Map(snapshot.balances);
    this.allowances = new Map(snapshot.allowances);
  }

  private move(currency: Address, from: Address, to: Address, amount: bigint): void {
    this.assertAmount(amount);
    const fromKey = balanceKey(currency, from);
    const balance = this.balances.get(fromKey) ?? 0n;
    if (balance < amount) {
      throw new InsufficientBalanceError(
        `Balance of ${from} in ${currency} is ${balance}, needed ${amount}`
      );
    }
    this.balances.set(fromKey, balance - amount);
    this.credit(currency, to, amount);
  }

  private credit(currency: Address, to: Address, amount: bigint): void {
    const key = balanceKey(currency, to);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  private assertToken(currency: Address): void {
    if (isNative(currency)) {
      throw new InvalidOrderError("Native currency moves through sendValue");
    }
  }

  private assertAmount(amount: bigint): void {
    if (amount < 0n) {
      throw new InvalidOrderError(`Amount must not be negative, got ${amount}`);
    }
  }
}
