/**
 * Tick grid arithmetic.
 *
 * Usable ticks are multiples of a pool's tickSpacing. Rounding is floor
 * division on the number line, so -1 with spacing 60 maps to -60, not 0.
 */

import { InvalidOrderError } from "../utils/errors.js";

export const MIN_TICK = -887272;
export const MAX_TICK = 887272;

// TickMath bounds; triggered fills swap against these (no slippage limit).
export const MIN_SQRT_PRICE = 4295128739n;
export const MAX_SQRT_PRICE = 1461446703485210103287273452203988016110461652n;

function assertTick(tick: number): void {
  if (!Number.isInteger(tick) || tick < MIN_TICK || tick > MAX_TICK) {
    throw new InvalidOrderError(`Tick out of range: ${tick}`);
  }
}

function assertSpacing(spacing: number): void {
  if (!Number.isInteger(spacing) || spacing <= 0) {
    throw new InvalidOrderError(`Tick spacing must be a positive integer: ${spacing}`);
  }
}

/**
 * Greatest multiple of `spacing` that is <= `tick`.
 */
export function lowerUsableTick(tick: number, spacing: number): number {
  assertTick(tick);
  assertSpacing(spacing);

  let intervals = Math.trunc(tick / spacing);
  // Truncation rounds negatives up; step back one interval
  if (tick < 0 && tick % spacing !== 0) intervals--;

  // Avoid -0 when tick is a small negative multiple
  return intervals * spacing + 0;
}

/**
 * Grid ticks from `from` to `to`, both inclusive, in walking order.
 * Both ends must already sit on the grid. Equal ends yield an empty list.
 */
export function gridTicksBetween(from: number, to: number, spacing: number): number[] {
  assertSpacing(spacing);
  if (from % spacing !== 0 || to % spacing !== 0) {
    throw new InvalidOrderError(`Ticks ${from} and ${to} are not on a ${spacing} grid`);
  }
  if (from === to) return [];

  const ticks: number[] = [];
  if (to > from) {
    for (let tick = from; tick <= to; tick += spacing) ticks.push(tick);
  } else {
    for (let tick = from; tick >= to; tick -= spacing) ticks.push(tick);
  }
  return ticks;
}
