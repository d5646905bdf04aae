/**
 * Outcome prices are stored as integers with 2 implied decimals ("12.10" <-> 1210n).
 * Conversion goes through decimal.js so no float rounding touches the value.
 */

import { Decimal } from "decimal.js";

export const OUTCOME_DECIMALS = 2;
const SCALE = new Decimal(10).pow(OUTCOME_DECIMALS);

/** Parse a price; digits past the second decimal are truncated toward zero. */
export function parseOutcome(price: string | number): bigint {
  const d = new Decimal(String(price));
  if (!d.isFinite() || d.isNegative()) throw new Error(`Invalid outcome price: ${price}`);
  return BigInt(d.times(SCALE).toDecimalPlaces(0, Decimal.ROUND_DOWN).toFixed(0));
}

export function formatOutcome(value: bigint): string {
  return new Decimal(value.toString()).div(SCALE).toFixed(OUTCOME_DECIMALS);
}
