import type { Cue } from "../types.js";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_MERGE_THRESHOLD_SECONDS = 1.0;

function joinText(left: string, right: string): string {
  return `${left.trim()} ${right.trim()}`.trim();
}

/**
 * Fold cues shorter than `thresholdSeconds` into the cue before them.
 * The first cue is never absorbed. Input cues are left untouched.
 *
 * An absorbed cue only ever pushes the previous end forward, which keeps
 * every emitted cue after the first at least `thresholdSeconds` long and
 * makes a second pass a no-op.
 */
export function mergeShortCues(
  cues: readonly Cue[],
  thresholdSeconds: number = DEFAULT_MERGE_THRESHOLD_SECONDS
): Cue[] {
  if (!Number.isFinite(thresholdSeconds) || thresholdSeconds < 0) {
    throw new ConfigurationError(`merge threshold must be a non-negative number, got ${thresholdSeconds}`);
  }

  const [first, ...rest] = cues;
  if (!first) return [];

  const merged: Cue[] = [];
  const last = rest.reduce<Cue>((current, cue) => {
    if (cue.end - cue.start < thresholdSeconds) {
      return {
        start: current.start,
        end: Math.max(current.end, cue.end),
        text: joinText(current.text, cue.text),
      };
    }
    merged.push(current);
    return { ...cue };
  }, { ...first });
  merged.push(last);

  return merged;
}
