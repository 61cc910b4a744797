import type { TimeUnit } from '../types/shared.js';

/** Milliseconds are kept as integers, so conversions into them round. */
export function fromSeconds(sec: number, unit: TimeUnit): number {
  return unit === 'milliseconds' ? Math.round(sec * 1000) : sec;
}

export function toSeconds(value: number, unit: TimeUnit): number {
  return unit === 'milliseconds' ? value / 1000 : value;
}

export function convertTime(value: number, from: TimeUnit, to: TimeUnit): number {
  if (from === to) return value;
  return fromSeconds(toSeconds(value, from), to);
}
