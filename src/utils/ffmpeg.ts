import fs from "fs";
import path from "path";
import type { AudioSource, SliceWindow } from "../types.js";
import { errorMessage } from "./errors.js";
import { runProcess, type ProcessOutput } from "./process.js";

/** Audio probing and slicing through the ffprobe / ffmpeg binaries. */
export class FfmpegAudio implements AudioSource {
  private ffmpegPath: string;
  private ffprobePath: string;

  constructor(ffmpegPath = "ffmpeg", ffprobePath = "ffprobe") {
    this.ffmpegPath = ffmpegPath;
    this.ffprobePath = ffprobePath;
  }

  async probeDurationMs(audioPath: string): Promise<number> {
    if (!fs.existsSync(audioPath)) {
      throw new Error(`Audio file not found: ${audioPath}`);
    }

    let output: ProcessOutput;
    try {
      output = await runProcess(this.ffprobePath, [
        "-v", "error",
        "-show_entries", "format=duration",
        "-of", "default=noprint_wrappers=1:nokey=1",
        audioPath,
      ]);
    } catch (error) {
      throw new Error(`ffprobe failed: ${errorMessage(error)}`);
    }

    const reported = output.stdout.trim();
    const seconds = Number.parseFloat(reported);
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new Error(`ffprobe returned no usable duration for ${audioPath}: "${reported}"`);
    }
    return Math.round(seconds * 1000);
  }

  async exportClip(audioPath: string, window: SliceWindow, outputPath: string): Promise<void> {
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });

    try {
      await runProcess(this.ffmpegPath, [
        "-y",
        "-v", "error",
        "-i", audioPath,
        "-ss", (window.startMs / 1000).toFixed(3),
        "-to", (window.endMs / 1000).toFixed(3),
        "-vn",
        // mono, 16 kHz
        "-ac", "1",
        "-ar", "16000",
        outputPath,
      ]);
    } catch (error) {
      throw new Error(`ffmpeg failed to export slice ${window.index}: ${errorMessage(error)}`);
    }
  }
}
