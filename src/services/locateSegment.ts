import type { PatchworkLayout } from '../types/shared.js';

export interface Location {
  index: number;
  inGap: boolean;
}

/** Rightmost insertion point of `value` in an ascending array. */
export function bisectRight(sorted: number[], value: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (value < sorted[mid]) hi = mid;
    else lo = mid + 1;
  }
  return lo;
}

/**
 * Find the segment whose spliced content contains a token on the patchwork timeline.
 * A token that starts or ends past the segment's end lies (at least partly) in the
 * following silence gap and is reported as `inGap`; tokens are never truncated.
 */
export function locate(layout: PatchworkLayout, time: number, duration = 0): Location {
  const index = bisectRight(layout.patchworkStarts, time) - 1;
  if (index < 0) {
    return { index, inGap: true };
  }
  const end = layout.patchworkEnds[index];
  return { index, inGap: time > end || time + duration > end };
}
