import type { SliceWindow } from "../types.js";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_SEGMENT_LENGTH_MS = 30_000;
export const DEFAULT_OVERLAP_MS = 5_000;

export interface SlicePlannerOptions {
  segmentLengthMs?: number;
  overlapMs?: number;
}

/**
 * Splits an audio timeline into fixed-length windows. Every window after
 * the first starts `overlapMs` early so it re-covers the tail of the
 * previous one; the cursor itself always advances by `segmentLengthMs`.
 */
export class SlicePlanner {
  readonly segmentLengthMs: number;
  readonly overlapMs: number;

  constructor(options: SlicePlannerOptions = {}) {
    const segmentLengthMs = options.segmentLengthMs ?? DEFAULT_SEGMENT_LENGTH_MS;
    const overlapMs = options.overlapMs ?? DEFAULT_OVERLAP_MS;

    if (!Number.isInteger(segmentLengthMs) || segmentLengthMs <= 0) {
      throw new ConfigurationError(`segmentLengthMs must be a positive integer, got ${segmentLengthMs}`);
    }
    if (!Number.isInteger(overlapMs) || overlapMs < 0) {
      throw new ConfigurationError(`overlapMs must be a non-negative integer, got ${overlapMs}`);
    }
    if (overlapMs >= segmentLengthMs) {
      throw new ConfigurationError(
        `overlapMs (${overlapMs}) must be smaller than segmentLengthMs (${segmentLengthMs})`
      );
    }

    this.segmentLengthMs = segmentLengthMs;
    this.overlapMs = overlapMs;
  }

  plan(totalDurationMs: number): SliceWindow[] {
    if (!Number.isFinite(totalDurationMs) || totalDurationMs < 0) {
      throw new RangeError(`totalDurationMs must be a non-negative number, got ${totalDurationMs}`);
    }

    const windows: SliceWindow[] = [];
    let cursor = 0;
    while (cursor < totalDurationMs) {
      const isFirst = windows.length === 0;
      const startMs = isFirst ? cursor : Math.max(0, cursor - this.overlapMs);
      const endMs = Math.min(cursor + this.segmentLengthMs, totalDurationMs);
      windows.push({ index: windows.length, startMs, endMs, isFirst });
      cursor += this.segmentLengthMs;
    }
    return windows;
  }
}
