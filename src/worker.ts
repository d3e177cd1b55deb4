import path from "path";
import fs from "fs";
import { v4 as uuidv4 } from "uuid";
import type {
  AudioSource,
  Cue,
  ProgressCallback,
  SegmentTranscriber,
  SubtitleFormat,
} from "./types.js";
import { errorMessage } from "./utils/errors.js";
import { logger } from "./utils/logger.js";
import { reconcileSlice } from "./utils/overlapReconciler.js";
import { DEFAULT_MERGE_THRESHOLD_SECONDS, mergeShortCues } from "./utils/segmentMerger.js";
import { SlicePlanner } from "./utils/slicePlanner.js";
import { writeSubtitleFile } from "./utils/subtitleFile.js";

export interface TranscriptionWorkerOptions {
  language?: string;
  segmentLengthMs?: number;
  overlapMs?: number;
  mergeThresholdSeconds?: number;
  outputFormat?: SubtitleFormat;
  includeCueIds?: boolean;
}

export interface TranscriptionOutcome {
  cues: Cue[];
  windowCount: number;
}

export interface FileProcessingResult {
  inputPath: string;
  outputPath: string;
  cueCount: number;
  windowCount: number;
}

/** Anything that can turn one audio file into one subtitle file. */
export interface FileProcessor {
  processFile(
    inputPath: string,
    outputDir: string,
    onProgress?: ProgressCallback
  ): Promise<FileProcessingResult>;
}

export class TranscriptionWorker implements FileProcessor {
  private audio: AudioSource;
  private transcriber: SegmentTranscriber;
  private planner: SlicePlanner;
  private workDir: string;
  private language: string;
  private mergeThresholdSeconds: number;
  private outputFormat: SubtitleFormat;
  private includeCueIds: boolean;
  private activeFiles: Set<string> = new Set();

  constructor(
    audio: AudioSource,
    transcriber: SegmentTranscriber,
    workDir = "./temp",
    options: TranscriptionWorkerOptions = {}
  ) {
    this.audio = audio;
    this.transcriber = transcriber;
    // Throws ConfigurationError on an unusable segment/overlap pair
    this.planner = new SlicePlanner({
      segmentLengthMs: options.segmentLengthMs,
      overlapMs: options.overlapMs,
    });
    this.workDir = workDir;
    this.language = options.language ?? "ja";
    this.mergeThresholdSeconds = options.mergeThresholdSeconds ?? DEFAULT_MERGE_THRESHOLD_SECONDS;
    this.outputFormat = options.outputFormat ?? "vtt";
    this.includeCueIds = options.includeCueIds ?? true;

    if (!fs.existsSync(this.workDir)) {
      fs.mkdirSync(this.workDir, { recursive: true });
    }
  }

  /**
   * Slice, transcribe and stitch one audio file into a cue list.
   * Slices are handled strictly in order; the scratch clips live in a
   * per-call directory that is removed when the call settles.
   */
  async transcribeFile(audioPath: string, onProgress?: ProgressCallback): Promise<TranscriptionOutcome> {
    const label = path.basename(audioPath);
    const stem = path.parse(audioPath).name;
    const runDir = path.join(this.workDir, uuidv4());
    fs.mkdirSync(runDir, { recursive: true });
    this.activeFiles.add(audioPath);

    try {
      onProgress?.(5, "Reading audio duration...");
      const durationMs = await this.audio.probeDurationMs(audioPath);
      const windows = this.planner.plan(durationMs);
      logger.info(`${label}: ${durationMs}ms split into ${windows.length} slice(s)`);

      const collected: Cue[] = [];
      for (const window of windows) {
        const clipPath = path.join(runDir, `${stem}_slice${window.index}.wav`);
        await this.audio.exportClip(audioPath, window, clipPath);

        const fragments = await this.transcriber.transcribe(clipPath, this.language);
        const cues = reconcileSlice(fragments, window, this.planner.overlapMs);
        logger.debug(
          `${label} slice ${window.index} [${window.startMs}-${window.endMs}ms]: ${fragments.length} fragment(s), ${cues.length} kept`
        );
        collected.push(...cues);

        const pct = 10 + Math.round((80 * (window.index + 1)) / windows.length);
        onProgress?.(pct, `Transcribed slice ${window.index + 1}/${windows.length}`);
      }

      onProgress?.(95, "Merging short cues...");
      const cues = mergeShortCues(collected, this.mergeThresholdSeconds);
      return { cues, windowCount: windows.length };
    } catch (error) {
      throw new Error(`Processing ${label} failed: ${errorMessage(error)}`);
    } finally {
      fs.rmSync(runDir, { recursive: true, force: true });
      this.activeFiles.delete(audioPath);
    }
  }

  /** Transcribe one file and write `<outputDir>/<basename>.<format>`. */
  async processFile(
    inputPath: string,
    outputDir: string,
    onProgress?: ProgressCallback
  ): Promise<FileProcessingResult> {
    const { cues, windowCount } = await this.transcribeFile(inputPath, onProgress);

    const outputPath = path.join(outputDir, `${path.parse(inputPath).name}.${this.outputFormat}`);
    writeSubtitleFile(outputPath, cues, { includeIds: this.includeCueIds });
    onProgress?.(100, "Complete!");

    return { inputPath, outputPath, cueCount: cues.length, windowCount };
  }

  /** Wait briefly for in-flight files, then empty the scratch directory. */
  async cleanup(maxWaitMs = 5000): Promise<void> {
    if (this.activeFiles.size > 0) {
      logger.info(`Waiting for ${this.activeFiles.size} active file(s) to finish...`);
      const waitStart = Date.now();
      while (this.activeFiles.size > 0 && Date.now() - waitStart < maxWaitMs) {
        await new Promise((resolve) => setTimeout(resolve, 100));
      }
      if (this.activeFiles.size > 0) {
        logger.warn(`${this.activeFiles.size} file(s) still active after ${maxWaitMs}ms, cleaning up anyway`);
      }
    }

    if (!fs.existsSync(this.workDir)) return;
    for (const item of fs.readdirSync(this.workDir)) {
      const itemPath = path.join(this.workDir, item);
      try {
        fs.rmSync(itemPath, { recursive: true, force: true });
        logger.debug(`Deleted ${itemPath}`);
      } catch (err) {
        logger.warn(`Could not delete ${itemPath}:`, errorMessage(err));
      }
    }
  }

  getActiveFileCount(): number {
    return this.activeFiles.size;
  }

  getActiveFiles(): string[] {
    return Array.from(this.activeFiles);
  }
}
