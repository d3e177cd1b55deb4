import OpenAI from "openai";
import fs from "fs";
import type { RawFragment, SegmentTranscriber } from "../types.js";
import { errorMessage } from "./errors.js";
import { parseTranscriptSegments } from "./transcript.js";

export const DEFAULT_OPENAI_AUDIO_MODEL = "whisper-1";

/**
 * Wrapper around the OpenAI audio transcriptions endpoint.
 * Segment timestamps need `verbose_json`, which the whisper family supports.
 */
export class OpenAITranscriber implements SegmentTranscriber {
  readonly name = "openai";
  private openai: OpenAI;
  private model: string;

  constructor(apiKey: string, model: string = DEFAULT_OPENAI_AUDIO_MODEL) {
    this.openai = new OpenAI({ apiKey });
    this.model = model;
  }

  async transcribe(clipPath: string, language: string): Promise<RawFragment[]> {
    if (!fs.existsSync(clipPath)) {
      throw new Error(`Audio clip not found: ${clipPath}`);
    }

    try {
      const transcription = await this.openai.audio.transcriptions.create({
        file: fs.createReadStream(clipPath),
        model: this.model,
        language,
        response_format: "verbose_json",
        timestamp_granularities: ["segment"],
      });

      return parseTranscriptSegments(transcription, "OpenAI");
    } catch (error) {
      throw new Error(`OpenAI transcription failed: ${errorMessage(error)}`);
    }
  }
}
