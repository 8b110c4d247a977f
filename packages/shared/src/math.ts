import * as _ from "radash";

export const SECONDS_PER_HOUR = 3600;

export function mean(values: readonly number[]): number {
  if (values.length === 0) return Number.NaN;
  return _.sum(values) / values.length;
}

/** Largest value, or `fallback` for an empty list */
export function maxOf(values: readonly number[], fallback = 0): number {
  return _.max(values) ?? fallback;
}

/** Smallest value, or `fallback` for an empty list */
export function minOf(values: readonly number[], fallback = 0): number {
  return _.min(values) ?? fallback;
}

/** `value / divisor`, or 0 when the divisor is 0 */
export function ratioOrZero(value: number, divisor: number): number {
  return divisor === 0 ? 0 : value / divisor;
}
