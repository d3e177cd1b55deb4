import fs from "fs";
import path from "path";
import type { RawFragment, SegmentTranscriber } from "../types.js";
import { errorMessage } from "./errors.js";
import { runProcess } from "./process.js";
import { parseTranscriptSegments } from "./transcript.js";

export type WhisperDevice = "cpu" | "cuda";

/**
 * Runs the `whisper` CLI on a clip and reads back the JSON it writes next
 * to the clip.
 */
export class LocalWhisperTranscriber implements SegmentTranscriber {
  readonly name = "whisper-cli";
  private model: string;
  private device: WhisperDevice;
  private command: string;

  constructor(model = "large-v3", device: WhisperDevice = "cpu", command = "whisper") {
    this.model = model;
    this.device = device;
    this.command = command;
  }

  buildArgs(clipPath: string, language: string): string[] {
    return [
      clipPath,
      "--model", this.model,
      "--device", this.device,
      "--language", language,
      "--task", "transcribe",
      "--beam_size", "5",
      "--output_format", "json",
      "--output_dir", path.dirname(clipPath),
      "--verbose", "False",
    ];
  }

  async transcribe(clipPath: string, language: string): Promise<RawFragment[]> {
    if (!fs.existsSync(clipPath)) {
      throw new Error(`Audio clip not found: ${clipPath}`);
    }

    const jsonPath = path.join(path.dirname(clipPath), `${path.parse(clipPath).name}.json`);
    try {
      await runProcess(this.command, this.buildArgs(clipPath, language));

      if (!fs.existsSync(jsonPath)) {
        throw new Error(`whisper output file not found: ${jsonPath}`);
      }
      const payload: unknown = JSON.parse(fs.readFileSync(jsonPath, "utf8"));
      return parseTranscriptSegments(payload, "whisper");
    } catch (error) {
      throw new Error(`Local whisper transcription failed: ${errorMessage(error)}`);
    } finally {
      fs.rmSync(jsonPath, { force: true });
    }
  }
}
