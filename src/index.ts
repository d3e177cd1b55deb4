#!/usr/bin/env node
import "dotenv/config";
import path from "path";
import { BatchQueue, summarize } from "./batch-queue.js";
import { HELP_TEXT, loadConfig } from "./config.js";
import { createTranscriber, prepareDirectories } from "./setup.js";
import { ConfigurationError, errorMessage } from "./utils/errors.js";
import { FfmpegAudio } from "./utils/ffmpeg.js";
import { findOutputCollisions, scanInputs } from "./utils/inputScanner.js";
import { logger } from "./utils/logger.js";
import { TranscriptionWorker } from "./worker.js";

let worker: TranscriptionWorker | null = null;
let isShuttingDown = false;

async function main(argv: string[]): Promise<number> {
  if (argv.includes("--help") || argv.includes("-h")) {
    console.log(HELP_TEXT);
    return 0;
  }

  const config = loadConfig(argv, process.env);
  prepareDirectories(config);

  const transcriber = createTranscriber(config);
  worker = new TranscriptionWorker(
    new FfmpegAudio(config.ffmpegPath, config.ffprobePath),
    transcriber,
    config.workDir,
    {
      language: config.language,
      segmentLengthMs: config.segmentLengthMs,
      overlapMs: config.overlapMs,
      mergeThresholdSeconds: config.mergeThresholdSeconds,
      outputFormat: config.outputFormat,
      includeCueIds: config.includeCueIds,
    }
  );

  const inputs = scanInputs(config.inputDir, config.extensions);
  if (inputs.length === 0) {
    logger.warn(`No ${config.extensions.join("/")} files found in ${config.inputDir}`);
    return 0;
  }

  const collisions = findOutputCollisions(inputs);
  if (collisions.length > 0) {
    for (const group of collisions) {
      logger.error(`These inputs would write the same subtitle file: ${group.map((p) => path.basename(p)).join(", ")}`);
    }
    return 1;
  }

  logger.info(
    `Transcribing ${inputs.length} file(s) with ${transcriber.name} ` +
      `(language=${config.language}, slices=${config.segmentLengthMs}ms, overlap=${config.overlapMs}ms)`
  );

  const queue = new BatchQueue(worker, config.outputDir, {
    concurrency: config.concurrency,
    failFast: config.failFast,
    onProgress: (inputPath, pct, status) => logger.info(`[${path.basename(inputPath)}] ${pct}% ${status}`),
  });
  const summary = summarize(await queue.run(inputs));

  logger.info(`All done: ${summary.done} written, ${summary.failed} failed, ${summary.skipped} skipped`);
  return summary.failed > 0 ? 1 : 0;
}

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.warn(`Received ${signal}, cleaning up scratch files...`);

  try {
    await worker?.cleanup();
    process.exit(130);
  } catch (error) {
    logger.error("Error during cleanup:", errorMessage(error));
    process.exit(1);
  }
}

process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error) => {
    if (error instanceof ConfigurationError) {
      logger.error(`Invalid configuration: ${error.message}`);
      console.error(HELP_TEXT);
    } else {
      logger.error(errorMessage(error));
    }
    process.exit(1);
  });
