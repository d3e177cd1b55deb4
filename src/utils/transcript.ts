import { z } from "zod";
import type { RawFragment } from "../types.js";

const segmentSchema = z.object({
  start: z.number().nonnegative(),
  end: z.number().nonnegative(),
  text: z
    .string()
    .nullish()
    .transform((text) => text ?? ""),
});

/** Segment-level transcript as returned by whisper-style models. */
export const transcriptSchema = z.object({
  segments: z.array(segmentSchema).default([]),
});

/**
 * Validate a transcriber payload and reduce it to slice-local fragments,
 * in the order the model returned them.
 */
export function parseTranscriptSegments(payload: unknown, source: string): RawFragment[] {
  const parsed = transcriptSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "payload"}: ${issue.message}`)
      .join("; ");
    throw new Error(`${source} returned an unexpected transcript: ${issues}`);
  }

  return parsed.data.segments.map((segment) => ({
    start: segment.start,
    end: segment.end,
    text: segment.text,
  }));
}
