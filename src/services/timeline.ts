// src/services/timeline.ts
import type { PatchworkLayout, Segment, TimeUnit } from '../types/shared.js';
import { ConfigurationError } from './errors.js';
import { toSeconds } from './timeUnits.js';

// Array.prototype.sort is stable, so equal starts keep the caller's order.
const byStart = (segments: Segment[]) => [...segments].sort((a, b) => a.start - b.start);

/**
 * Reject segment lists the layout cannot represent faithfully:
 * inverted intervals and overlaps. Touching intervals are fine.
 */
export function validateSegments(segments: Segment[]): void {
  for (const s of segments) {
    if (!Number.isFinite(s.start) || !Number.isFinite(s.end)) {
      throw new ConfigurationError(`Segment ${s.id} has a non-numeric boundary`);
    }
    if (s.end < s.start) {
      throw new ConfigurationError(`Segment ${s.id} ends (${s.end}) before it starts (${s.start})`);
    }
  }
  const sorted = byStart(segments);
  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1];
    const cur = sorted[i];
    if (cur.start < prev.end) {
      throw new ConfigurationError(
        `Segments ${prev.id} [${prev.start}, ${prev.end}] and ${cur.id} [${cur.start}, ${cur.end}] overlap`
      );
    }
  }
}

/**
 * Lay the segments end to end with `gap` of silence between them.
 * Durations are preserved and the first segment starts at 0.
 */
export function buildLayout(segments: Segment[], gap: number): PatchworkLayout {
  const layout: PatchworkLayout = {
    segmentIds: [],
    originalStarts: [],
    originalEnds: [],
    patchworkStarts: [],
    patchworkEnds: [],
  };

  let prevEnd: number | undefined;
  for (const s of byStart(segments)) {
    const patchworkStart = prevEnd === undefined ? 0 : prevEnd + gap;
    const patchworkEnd = patchworkStart + (s.end - s.start);
    layout.segmentIds.push(s.id);
    layout.originalStarts.push(s.start);
    layout.originalEnds.push(s.end);
    layout.patchworkStarts.push(patchworkStart);
    layout.patchworkEnds.push(patchworkEnd);
    prevEnd = patchworkEnd;
  }
  return layout;
}

export const layoutSize = (layout: PatchworkLayout) => layout.segmentIds.length;

export function toOriginalTime(layout: PatchworkLayout, index: number, patchworkTime: number): number {
  return patchworkTime + (layout.originalStarts[index] - layout.patchworkStarts[index]);
}

export function toPatchworkTime(layout: PatchworkLayout, index: number, originalTime: number): number {
  return originalTime - (layout.originalStarts[index] - layout.patchworkStarts[index]);
}

/** Original-timeline intervals in seconds, in layout order, for the audio trimmer. */
export function layoutIntervalsInSeconds(layout: PatchworkLayout, unit: TimeUnit): Array<[number, number]> {
  return layout.originalStarts.map((start, i) => [
    toSeconds(start, unit),
    toSeconds(layout.originalEnds[i], unit),
  ]);
}
