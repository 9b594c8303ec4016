import type { Address } from "viem";

/**
 * Fungible asset collaborator. ERC-20 style calls for tokens;
 * sendValue() for the native asset (zero address).
 */
export interface CurrencyLedger {
  balanceOf(currency: Address, account: Address): bigint;
  transfer(currency: Address, from: Address, to: Address, amount: bigint): void;
  transferFrom(
    currency: Address,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint
  ): void;
  approve(currency: Address, owner: Address, spender: Address, amount: bigint): void;
  sendValue(from: Address, to: Address, amount: bigint): void;
}

/**
 * Per-order claim units. Only the configured minter may mint or burn.
 */
export interface ClaimLedger {
  mint(operator: Address, holder: Address, id: bigint, amount: bigint): void;
  burn(operator: Address, holder: Address, id: bigint, amount: bigint): void;
  balanceOf(holder: Address, id: bigint): bigint;
}
