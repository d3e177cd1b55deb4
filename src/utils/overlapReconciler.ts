import type { Cue, RawFragment, SliceWindow } from "../types.js";

/**
 * Shift one slice's fragments onto the global timeline and trim whatever
 * the previous slice already covered.
 *
 * For every window but the first, fragments starting before
 * `window.startMs + overlapMs` are clipped to that cutoff, and dropped when
 * nothing is left. This is a fixed time cutoff rather than text matching,
 * so a sentence straddling the cutoff can still be partly duplicated.
 */
export function reconcileSlice(
  fragments: readonly RawFragment[],
  window: SliceWindow,
  overlapMs: number
): Cue[] {
  const offset = window.startMs / 1000;
  const cutoff = offset + overlapMs / 1000;
  const cues: Cue[] = [];

  for (const fragment of fragments) {
    let start = fragment.start + offset;
    const end = fragment.end + offset;

    if (!window.isFirst && start < cutoff) {
      start = cutoff;
      if (start >= end) continue;
    }

    cues.push({ start, end, text: fragment.text });
  }

  return cues;
}
