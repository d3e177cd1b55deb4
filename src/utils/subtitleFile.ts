import fs from "fs";
import path from "path";
import type { CueInput, SubtitleFormat } from "../types.js";
import { parseSrt, renderSrt } from "./srt.js";
import { parseWebVtt, renderWebVtt, type ParseOptions, type ParsedSubtitles, type RenderOptions } from "./vtt.js";

export function subtitleFormatFor(filePath: string): SubtitleFormat {
  return path.extname(filePath).toLowerCase() === ".srt" ? "srt" : "vtt";
}

export function renderSubtitles(
  cues: readonly CueInput[],
  format: SubtitleFormat,
  options: RenderOptions = {}
): string {
  return format === "srt" ? renderSrt(cues) : renderWebVtt(cues, options);
}

/**
 * Read a subtitle document from disk. The format follows the file extension.
 * Read failures propagate; malformed blocks follow `options.mode`.
 */
export function readSubtitleFile(filePath: string, options: ParseOptions = {}): ParsedSubtitles {
  const content = fs.readFileSync(filePath, "utf8");
  return subtitleFormatFor(filePath) === "srt" ? parseSrt(content, options) : parseWebVtt(content, options);
}

export function writeSubtitleFile(
  filePath: string,
  cues: readonly CueInput[],
  options: RenderOptions = {}
): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, renderSubtitles(cues, subtitleFormatFor(filePath), options), "utf8");
}
