import type { Cue, CueInput } from "../types.js";
import { SubtitleParseError, type SkipReason } from "./errors.js";
import { formatTimecode, parseTimecode } from "./timecode.js";

export const WEBVTT_MAGIC = "WEBVTT";

const TIMESTAMP = String.raw`\d{2,}:\d{2}:\d{2}[.,]\d{3}|\d{2}:\d{2}[.,]\d{3}`;
const TIMING_PATTERN = new RegExp(`(${TIMESTAMP})\\s*-->\\s*(${TIMESTAMP})`);
// Header line plus any metadata lines, up to and including the first blank line.
// A header with no cue after it runs to the end of the document.
const HEADER_BLOCK = new RegExp(`^${WEBVTT_MAGIC}(?:[\\s\\S]*?\\n[ \\t]*\\n|(?![\\s\\S]*-->)[\\s\\S]*$)`);
const BLANK_LINE_RUN = /\n(?:[ \t]*\n)+/;
const BLANK_LINE_RUNS = /\n(?:[ \t]*\n)+/g;
const ID_LINE = /^\d+$/;
const NOTE_BLOCK = /^NOTE/i;

export type ParseMode = "best-effort" | "strict";

export interface ParseOptions {
  /**
   * `best-effort` (default) drops blocks it cannot read and lists them in
   * `skipped`; `strict` throws a {@link SubtitleParseError} instead.
   */
  mode?: ParseMode;
}

export interface SkippedBlock {
  block: number;
  reason: SkipReason;
}

export interface ParsedSubtitles {
  cues: Cue[];
  skipped: SkippedBlock[];
}

export interface RenderOptions {
  includeIds?: boolean;
}

type BlockResult =
  | { kind: "cue"; cue: Cue }
  | { kind: "comment" }
  | { kind: "skip"; reason: SkipReason };

/** Drop a leading BOM and fold CRLF / CR line endings into LF. */
export function normalizeDocument(raw: string): string {
  const withoutBom = raw.startsWith("\uFEFF") ? raw.slice(1) : raw;
  return withoutBom.replace(/\r\n?/g, "\n");
}

function isDirectiveLine(line: string): boolean {
  const upper = line.trim().toUpperCase();
  return upper.startsWith("STYLE") || upper.startsWith("REGION");
}

function matchTiming(line: string): RegExpExecArray | null {
  return TIMING_PATTERN.exec(line) ?? TIMING_PATTERN.exec(line.replace(/\t/g, " ").trim());
}

function parseBlock(part: string): BlockResult {
  if (NOTE_BLOCK.test(part)) {
    return { kind: "comment" };
  }

  const lines = part.split("\n");
  const timingIndex = lines.findIndex((line) => line.includes("-->"));
  if (timingIndex === -1) {
    return { kind: "skip", reason: "no-timing-line" };
  }

  const match = matchTiming(lines[timingIndex] ?? "");
  if (!match) {
    return { kind: "skip", reason: "unrecognized-timing" };
  }

  const text = lines
    .filter((_, index) => index !== timingIndex)
    .filter((line) => !ID_LINE.test(line.trim()) && !isDirectiveLine(line))
    .join("\n")
    .trim();

  return {
    kind: "cue",
    cue: {
      start: parseTimecode(match[1] ?? ""),
      end: parseTimecode(match[2] ?? ""),
      text,
    },
  };
}

/**
 * Parse header-less cue blocks. Shared by the WebVTT and SRT readers; the
 * input must already be normalized with {@link normalizeDocument}.
 */
export function parseCueBlocks(body: string, options: ParseOptions = {}): ParsedSubtitles {
  const strict = options.mode === "strict";
  const cues: Cue[] = [];
  const skipped: SkippedBlock[] = [];

  const parts = body.trim().split(BLANK_LINE_RUN);
  parts.forEach((rawPart, block) => {
    const part = rawPart.trim();
    if (!part) return;

    const result = parseBlock(part);
    if (result.kind === "cue") {
      cues.push(result.cue);
    } else if (result.kind === "skip") {
      if (strict) throw new SubtitleParseError(block, result.reason);
      skipped.push({ block, reason: result.reason });
    }
  });

  return { cues, skipped };
}

export function parseWebVtt(content: string, options: ParseOptions = {}): ParsedSubtitles {
  const body = normalizeDocument(content).replace(HEADER_BLOCK, "");
  return parseCueBlocks(body, options);
}

/** Cues of a WebVTT document, unreadable blocks silently dropped. */
export function decodeWebVtt(content: string): Cue[] {
  return parseWebVtt(content).cues;
}

/**
 * Fill in missing timing and tidy the text of a cue about to be written.
 * A missing start becomes 0 and a missing, invalid or non-increasing end
 * becomes start + 0.5s. Runs of blank lines inside the text collapse to a
 * single line break, since a blank line would end the cue.
 */
export function normalizeCueForOutput(cue: CueInput): Cue {
  const start = typeof cue.start === "number" && Number.isFinite(cue.start) ? cue.start : 0;
  const end =
    typeof cue.end === "number" && Number.isFinite(cue.end) && cue.end > start ? cue.end : start + 0.5;
  const text = (cue.text ?? "").replace(/\r\n?/g, "\n").trim().replace(BLANK_LINE_RUNS, "\n");
  return { start, end, text };
}

export function renderWebVtt(cues: readonly CueInput[], options: RenderOptions = {}): string {
  const includeIds = options.includeIds ?? true;
  let vtt = `${WEBVTT_MAGIC}\n\n`;

  cues.forEach((input, index) => {
    const cue = normalizeCueForOutput(input);
    if (includeIds) {
      vtt += `${index}\n`;
    }
    vtt += `${formatTimecode(cue.start)} --> ${formatTimecode(cue.end)}\n`;
    vtt += `${cue.text}\n\n`;
  });

  return vtt;
}
