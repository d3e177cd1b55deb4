import fs from "fs";
import type { AppConfig } from "./config.js";
import type { SegmentTranscriber } from "./types.js";
import { ConfigurationError } from "./utils/errors.js";
import { logger } from "./utils/logger.js";
import { OpenAITranscriber } from "./utils/openaiTranscriber.js";
import { LocalWhisperTranscriber } from "./utils/whisper.js";

export function createTranscriber(config: AppConfig): SegmentTranscriber {
  if (config.backend === "whisper-cli") {
    logger.info(`Using local whisper model ${config.whisperModel} on ${config.whisperDevice}`);
    return new LocalWhisperTranscriber(config.whisperModel, config.whisperDevice);
  }

  if (!config.openaiApiKey) {
    throw new ConfigurationError("openaiApiKey: OPENAI_API_KEY is required for the openai backend");
  }
  logger.info(`Using OpenAI transcription model ${config.openaiModel}`);
  return new OpenAITranscriber(config.openaiApiKey, config.openaiModel);
}

/** Create the output and scratch directories if missing. */
export function prepareDirectories(config: AppConfig): void {
  for (const dir of [config.outputDir, config.workDir]) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }
}
