import type { FileProcessor } from "./worker.js";
import { errorMessage } from "./utils/errors.js";
import { logger } from "./utils/logger.js";

export type BatchItemResult =
  | { inputPath: string; status: "done"; outputPath: string; cueCount: number; windowCount: number }
  | { inputPath: string; status: "error"; error: string }
  | { inputPath: string; status: "skipped" };

export interface BatchQueueOptions {
  concurrency?: number;
  failFast?: boolean;
  onProgress?: (inputPath: string, pct: number, status: string) => void;
}

export interface BatchSummary {
  done: number;
  failed: number;
  skipped: number;
}

/**
 * Runs a list of files through a {@link FileProcessor}. Files share no
 * state, so up to `concurrency` of them are in flight at once; results
 * come back in input order.
 */
export class BatchQueue {
  private processor: FileProcessor;
  private outputDir: string;
  private concurrency: number;
  private failFast: boolean;
  private onProgress?: BatchQueueOptions["onProgress"];

  constructor(processor: FileProcessor, outputDir: string, options: BatchQueueOptions = {}) {
    this.processor = processor;
    this.outputDir = outputDir;
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    this.failFast = options.failFast ?? false;
    this.onProgress = options.onProgress;
  }

  async run(inputPaths: readonly string[]): Promise<BatchItemResult[]> {
    const results: BatchItemResult[] = [];
    let next = 0;
    let aborted = false;

    const drain = async (): Promise<void> => {
      while (next < inputPaths.length) {
        const index = next++;
        const inputPath = inputPaths[index];

        if (aborted) {
          results[index] = { inputPath, status: "skipped" };
          continue;
        }

        try {
          const result = await this.processor.processFile(inputPath, this.outputDir, (pct, status) =>
            this.onProgress?.(inputPath, pct, status)
          );
          results[index] = {
            inputPath,
            status: "done",
            outputPath: result.outputPath,
            cueCount: result.cueCount,
            windowCount: result.windowCount,
          };
          logger.info(`Written ${result.outputPath} (${result.cueCount} cues)`);
        } catch (error) {
          results[index] = { inputPath, status: "error", error: errorMessage(error) };
          logger.error(`Failed ${inputPath}:`, errorMessage(error));
          if (this.failFast) {
            aborted = true;
          }
        }
      }
    };

    const lanes = Math.min(this.concurrency, inputPaths.length);
    await Promise.all(Array.from({ length: lanes }, () => drain()));
    return results;
  }
}

export function summarize(results: readonly BatchItemResult[]): BatchSummary {
  return {
    done: results.filter((result) => result.status === "done").length,
    failed: results.filter((result) => result.status === "error").length,
    skipped: results.filter((result) => result.status === "skipped").length,
  };
}
