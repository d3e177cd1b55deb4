import { parseArgs } from "util";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./utils/errors.js";
import { DEFAULT_OPENAI_AUDIO_MODEL } from "./utils/openaiTranscriber.js";
import { DEFAULT_MERGE_THRESHOLD_SECONDS } from "./utils/segmentMerger.js";
import { DEFAULT_OVERLAP_MS, DEFAULT_SEGMENT_LENGTH_MS } from "./utils/slicePlanner.js";

export const HELP_TEXT = `Usage: segment-scribe [options]

Transcribe every audio file in the input directory into a subtitle file.

Options:
  -i, --input <dir>            Directory with audio files (INPUT_DIR, default: inputs)
  -o, --output <dir>           Where subtitle files are written (OUTPUT_DIR, default: subtitles)
      --work-dir <dir>         Scratch directory for slices (WORK_DIR, default: ./temp)
      --ext <list>             Comma-separated input extensions (INPUT_EXTENSIONS, default: .wav)
  -l, --language <code>        Spoken language (TRANSCRIBE_LANGUAGE, default: ja)
      --backend <name>         openai | whisper-cli (TRANSCRIBE_BACKEND, default: openai)
      --model <name>           Local whisper model (WHISPER_MODEL, default: large-v3)
      --device <name>          cpu | cuda (WHISPER_DEVICE, default: cpu)
      --segment-length <ms>    Slice length (SEGMENT_LENGTH_MS, default: 30000)
      --overlap <ms>           Slice overlap (OVERLAP_MS, default: 5000)
      --merge-threshold <s>    Merge cues shorter than this (MERGE_SHORT_THRESHOLD, default: 1.0)
      --format <vtt|srt>       Output format (OUTPUT_FORMAT, default: vtt)
      --no-ids                 Omit numeric cue ids in WebVTT output (CUE_IDS=false)
      --concurrency <n>        Files processed at once (CONCURRENCY, default: 1)
      --fail-fast              Stop after the first failed file (FAIL_FAST)
  -h, --help                   Show this help
`;

const configSchema = z
  .object({
    inputDir: z.string().min(1),
    outputDir: z.string().min(1),
    workDir: z.string().min(1),
    extensions: z.array(z.string().min(1)).min(1),
    language: z.string().min(1),
    backend: z.enum(["openai", "whisper-cli"]),
    whisperModel: z.string().min(1),
    whisperDevice: z.enum(["cpu", "cuda"]),
    openaiModel: z.string().min(1),
    openaiApiKey: z.string().optional(),
    ffmpegPath: z.string().min(1),
    ffprobePath: z.string().min(1),
    segmentLengthMs: z.coerce.number().int().positive(),
    overlapMs: z.coerce.number().int().nonnegative(),
    mergeThresholdSeconds: z.coerce.number().nonnegative(),
    outputFormat: z.enum(["vtt", "srt"]),
    includeCueIds: z.boolean(),
    concurrency: z.coerce.number().int().positive(),
    failFast: z.boolean(),
  })
  .superRefine((config, ctx) => {
    if (config.overlapMs >= config.segmentLengthMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["overlapMs"],
        message: `must be smaller than segmentLengthMs (${config.segmentLengthMs})`,
      });
    }
    if (config.backend === "openai" && !config.openaiApiKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["openaiApiKey"],
        message: "OPENAI_API_KEY is required for the openai backend",
      });
    }
  });

export type AppConfig = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

/** First value that is set and not blank. */
function firstSet(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== "")?.trim();
}

// Unrecognised strings pass through so the schema reports them.
function envFlag(value: string | undefined): boolean | string | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) return undefined;
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return value;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function parseCliArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        input: { type: "string", short: "i" },
        output: { type: "string", short: "o" },
        "work-dir": { type: "string" },
        ext: { type: "string" },
        language: { type: "string", short: "l" },
        backend: { type: "string" },
        model: { type: "string" },
        device: { type: "string" },
        "segment-length": { type: "string" },
        overlap: { type: "string" },
        "merge-threshold": { type: "string" },
        format: { type: "string" },
        "no-ids": { type: "boolean" },
        concurrency: { type: "string" },
        "fail-fast": { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (error) {
    throw new ConfigurationError(errorMessage(error));
  }
}

/**
 * Build the run configuration. CLI flags win over environment variables,
 * which win over the built-in defaults.
 */
export function loadConfig(argv: string[], env: Env = process.env): AppConfig {
  const args = parseCliArgs(argv);

  const raw = {
    inputDir: firstSet(args.input, env.INPUT_DIR) ?? "inputs",
    outputDir: firstSet(args.output, env.OUTPUT_DIR) ?? "subtitles",
    workDir: firstSet(args["work-dir"], env.WORK_DIR) ?? "./temp",
    extensions: splitList(firstSet(args.ext, env.INPUT_EXTENSIONS) ?? ".wav"),
    language: firstSet(args.language, env.TRANSCRIBE_LANGUAGE) ?? "ja",
    backend: firstSet(args.backend, env.TRANSCRIBE_BACKEND) ?? "openai",
    whisperModel: firstSet(args.model, env.WHISPER_MODEL) ?? "large-v3",
    whisperDevice: firstSet(args.device, env.WHISPER_DEVICE) ?? "cpu",
    openaiModel: firstSet(env.OPENAI_AUDIO_MODEL) ?? DEFAULT_OPENAI_AUDIO_MODEL,
    openaiApiKey: firstSet(env.OPENAI_API_KEY),
    ffmpegPath: firstSet(env.FFMPEG_PATH) ?? "ffmpeg",
    ffprobePath: firstSet(env.FFPROBE_PATH) ?? "ffprobe",
    segmentLengthMs: firstSet(args["segment-length"], env.SEGMENT_LENGTH_MS) ?? DEFAULT_SEGMENT_LENGTH_MS,
    overlapMs: firstSet(args.overlap, env.OVERLAP_MS) ?? DEFAULT_OVERLAP_MS,
    mergeThresholdSeconds:
      firstSet(args["merge-threshold"], env.MERGE_SHORT_THRESHOLD) ?? DEFAULT_MERGE_THRESHOLD_SECONDS,
    outputFormat: firstSet(args.format, env.OUTPUT_FORMAT)?.toLowerCase() ?? "vtt",
    includeCueIds: args["no-ids"] ? false : envFlag(env.CUE_IDS) ?? true,
    concurrency: firstSet(args.concurrency, env.CONCURRENCY) ?? 1,
    failFast: args["fail-fast"] ?? envFlag(env.FAIL_FAST) ?? false,
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(issues);
  }
  return parsed.data;
}
