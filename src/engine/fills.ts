/**
 * Fill and redemption arithmetic.
 *
 * Rounding: floor division throughout (BigInt division truncates, and all
 * operands are non-negative). A redeemer can lose dust, never gain it.
 */

import type { BalanceDelta } from "../types/pool.js";
import { InvariantViolationError } from "../utils/errors.js";

/**
 * Output owed for redeeming `requested` claim units:
 * floor(requested * claimableOutput / claimSupply).
 */
export function computeOutputShare(
  requested: bigint,
  claimableOutput: bigint,
  claimSupply: bigint
): bigint {
  if (claimSupply === 0n) return 0n;
  return (requested * claimableOutput) / claimSupply;
}

/**
 * Output leg of a fill's delta: currency1 received when selling currency0,
 * currency0 received otherwise.
 */
export function deltaOutput(delta: BalanceDelta, zeroForOne: boolean): bigint {
  const output = zeroForOne ? delta.amount1 : delta.amount0;
  if (output < 0n) {
    throw new InvariantViolationError(`Fill produced negative output: ${output}`);
  }
  return output;
}

/**
 * Input leg of a fill's delta, as a positive amount paid to the pool.
 */
export function deltaInput(delta: BalanceDelta, zeroForOne: boolean): bigint {
  const input = zeroForOne ? delta.amount0 : delta.amount1;
  return input < 0n ? -input : 0n;
}
