import assert from "node:assert/strict";
import test from "node:test";
import { loadConfig } from "../src/config.js";
import { ConfigurationError } from "../src/utils/errors.js";

test("loadConfig falls back to the defaults", () => {
  assert.deepEqual(loadConfig([], { OPENAI_API_KEY: "test-key" }), {
    inputDir: "inputs",
    outputDir: "subtitles",
    workDir: "./temp",
    extensions: [".wav"],
    language: "ja",
    backend: "openai",
    whisperModel: "large-v3",
    whisperDevice: "cpu",
    openaiModel: "whisper-1",
    openaiApiKey: "test-key",
    ffmpegPath: "ffmpeg",
    ffprobePath: "ffprobe",
    segmentLengthMs: 30000,
    overlapMs: 5000,
    mergeThresholdSeconds: 1,
    outputFormat: "vtt",
    includeCueIds: true,
    concurrency: 1,
    failFast: false,
  });
});

test("environment variables override defaults", () => {
  const config = loadConfig([], {
    TRANSCRIBE_BACKEND: "whisper-cli",
    SEGMENT_LENGTH_MS: "20000",
    OVERLAP_MS: "2000",
    MERGE_SHORT_THRESHOLD: "0.5",
    OUTPUT_FORMAT: "SRT",
    INPUT_EXTENSIONS: ".wav, .MP3,,",
    CUE_IDS: "false",
    FAIL_FAST: "yes",
    CONCURRENCY: "3",
  });

  assert.equal(config.backend, "whisper-cli");
  assert.equal(config.segmentLengthMs, 20000);
  assert.equal(config.overlapMs, 2000);
  assert.equal(config.mergeThresholdSeconds, 0.5);
  assert.equal(config.outputFormat, "srt");
  assert.deepEqual(config.extensions, [".wav", ".MP3"]);
  assert.equal(config.includeCueIds, false);
  assert.equal(config.failFast, true);
  assert.equal(config.concurrency, 3);
});

test("CLI flags override environment variables", () => {
  const config = loadConfig(
    ["--segment-length", "40000", "-i", "audio", "--language", "en", "--no-ids", "--fail-fast"],
    { OPENAI_API_KEY: "test-key", SEGMENT_LENGTH_MS: "20000", INPUT_DIR: "elsewhere", TRANSCRIBE_LANGUAGE: "ja" }
  );

  assert.equal(config.segmentLengthMs, 40000);
  assert.equal(config.inputDir, "audio");
  assert.equal(config.language, "en");
  assert.equal(config.includeCueIds, false);
  assert.equal(config.failFast, true);
});

test("blank environment values count as unset", () => {
  const config = loadConfig([], { OPENAI_API_KEY: "test-key", OUTPUT_DIR: "  ", OVERLAP_MS: "" });
  assert.equal(config.outputDir, "subtitles");
  assert.equal(config.overlapMs, 5000);
});

test("an overlap as long as the slice is rejected", () => {
  assert.throws(() => loadConfig(["--overlap", "30000"], { OPENAI_API_KEY: "test-key" }), {
    name: "ConfigurationError",
    message: "overlapMs: must be smaller than segmentLengthMs (30000)",
  });
});

test("the openai backend needs an API key", () => {
  assert.throws(() => loadConfig([], {}), {
    name: "ConfigurationError",
    message: "openaiApiKey: OPENAI_API_KEY is required for the openai backend",
  });
});

test("invalid values are reported per field", () => {
  const env = { OPENAI_API_KEY: "test-key" };
  assert.throws(() => loadConfig(["--concurrency", "0"], env), /concurrency/);
  assert.throws(() => loadConfig(["--segment-length", "abc"], env), /segmentLengthMs/);
  assert.throws(() => loadConfig(["--format", "ass"], env), /outputFormat/);
  assert.throws(() => loadConfig([], { ...env, FAIL_FAST: "maybe" }), /failFast/);
});

test("unknown flags are a configuration error", () => {
  assert.throws(() => loadConfig(["--bogus"], { OPENAI_API_KEY: "test-key" }), ConfigurationError);
});
