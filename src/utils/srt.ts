import type { CueInput } from "../types.js";
import { formatTimecode } from "./timecode.js";
import {
  normalizeCueForOutput,
  normalizeDocument,
  parseCueBlocks,
  type ParseOptions,
  type ParsedSubtitles,
} from "./vtt.js";

/** SRT timestamps use a comma before the milliseconds: `HH:MM:SS,mmm`. */
export function formatSrtTimestamp(seconds: number): string {
  return formatTimecode(seconds).replace(".", ",");
}

// SRT has no header and numbers cues from 1
export function renderSrt(cues: readonly CueInput[]): string {
  let srt = "";
  cues.forEach((input, index) => {
    const cue = normalizeCueForOutput(input);
    srt += `${index + 1}\n`;
    srt += `${formatSrtTimestamp(cue.start)} --> ${formatSrtTimestamp(cue.end)}\n`;
    srt += `${cue.text}\n\n`;
  });
  return srt;
}

export function parseSrt(content: string, options: ParseOptions = {}): ParsedSubtitles {
  return parseCueBlocks(normalizeDocument(content), options);
}
