import assert from "node:assert/strict";
import test from "node:test";
import { SubtitleParseError } from "../src/utils/errors.js";
import { decodeWebVtt, normalizeCueForOutput, parseWebVtt, renderWebVtt } from "../src/utils/vtt.js";

const MESSY_DOCUMENT = [
  "\uFEFFWEBVTT - recorded live",
  "Kind: captions",
  "",
  "NOTE this is a comment",
  "spanning lines",
  "",
  "STYLE",
  "::cue { color: red }",
  "",
  "1",
  "00:01.000 --> 00:02,500",
  "first line",
  "",
  "",
  "2",
  "00:00:03.000\t-->\t00:00:04.250 align:start",
  "REGION id:x",
  "second",
  "line",
  "",
  "just some text",
  "",
  "00:05.000 --> bad",
  "lost",
  "",
].join("\r\n");

test("renderWebVtt writes header, ids, timing and trimmed text", () => {
  const vtt = renderWebVtt([
    { start: 0, end: 1.23, text: "こんにちは" },
    { start: 1.5, end: 2.5, text: "  はぁ...  " },
  ]);

  assert.equal(
    vtt,
    "WEBVTT\n\n" +
      "0\n00:00:00.000 --> 00:00:01.230\nこんにちは\n\n" +
      "1\n00:00:01.500 --> 00:00:02.500\nはぁ...\n\n"
  );
});

test("renderWebVtt can leave out cue ids", () => {
  const vtt = renderWebVtt([{ start: 2, end: 3, text: "no id" }], { includeIds: false });
  assert.equal(vtt, "WEBVTT\n\n00:00:02.000 --> 00:00:03.000\nno id\n\n");
});

test("renderWebVtt of an empty list is just the header", () => {
  assert.equal(renderWebVtt([]), "WEBVTT\n\n");
});

test("normalizeCueForOutput defaults missing or invalid timing", () => {
  assert.deepEqual(normalizeCueForOutput({ text: "x" }), { start: 0, end: 0.5, text: "x" });
  assert.deepEqual(normalizeCueForOutput({ start: 2, end: Number.NaN, text: "y" }), { start: 2, end: 2.5, text: "y" });
  assert.deepEqual(normalizeCueForOutput({ start: 3, end: 1, text: "z" }), { start: 3, end: 3.5, text: "z" });
  assert.deepEqual(normalizeCueForOutput({ start: null, end: 4, text: null }), { start: 0, end: 4, text: "" });
});

test("normalizeCueForOutput collapses blank lines inside the text", () => {
  assert.equal(normalizeCueForOutput({ start: 0, end: 1, text: "a\r\n\r\n\nb\n \nc" }).text, "a\nb\nc");
});

test("parseWebVtt tolerates BOM, CRLF, comments, directives and broken blocks", () => {
  const { cues, skipped } = parseWebVtt(MESSY_DOCUMENT);

  assert.deepEqual(cues, [
    { start: 1, end: 2.5, text: "first line" },
    { start: 3, end: 4.25, text: "second\nline" },
  ]);
  assert.deepEqual(skipped, [
    { block: 1, reason: "no-timing-line" },
    { block: 4, reason: "no-timing-line" },
    { block: 5, reason: "unrecognized-timing" },
  ]);
});

test("parseWebVtt keeps NOTE, STYLE, REGION and id lines out of cue text", () => {
  for (const cue of decodeWebVtt(MESSY_DOCUMENT)) {
    assert.doesNotMatch(cue.text, /NOTE|STYLE|REGION|comment/);
    assert.doesNotMatch(cue.text, /^\d+$/m);
  }
});

test("parseWebVtt in strict mode throws on the first unreadable block", () => {
  assert.throws(
    () => parseWebVtt(MESSY_DOCUMENT, { mode: "strict" }),
    (error: unknown) =>
      error instanceof SubtitleParseError && error.block === 1 && error.reason === "no-timing-line"
  );
});

test("a NOTE keyword followed by punctuation still starts a comment", () => {
  const content =
    "WEBVTT\n\nNOTE: check this timing\n00:00:01.000 --> 00:00:02.000\nhello\n\n" +
    "NOTE: translator comment\n\n00:00:03.000 --> 00:00:04.000\nkept\n";

  assert.deepEqual(parseWebVtt(content, { mode: "strict" }), {
    cues: [{ start: 3, end: 4, text: "kept" }],
    skipped: [],
  });
});

test("parseWebVtt treats the NOTE keyword case-insensitively", () => {
  const cues = decodeWebVtt("WEBVTT\n\nnote lower-case comment 00:00:01.000 --> 00:00:02.000\n\n00:00:03.000 --> 00:00:04.000\nkept\n");
  assert.deepEqual(cues, [{ start: 3, end: 4, text: "kept" }]);
});

test("parseWebVtt reads documents without a header", () => {
  assert.deepEqual(decodeWebVtt("00:00:01.000 --> 00:00:02.000\nno header\n"), [
    { start: 1, end: 2, text: "no header" },
  ]);
});

test("parseWebVtt reads hours beyond 99", () => {
  assert.deepEqual(decodeWebVtt("WEBVTT\n\n100:00:00.000 --> 100:00:01.500\nlate\n"), [
    { start: 360000, end: 360001.5, text: "late" },
  ]);
});

test("parseWebVtt keeps a cue whose text is empty", () => {
  assert.deepEqual(decodeWebVtt("WEBVTT\n\n0\n00:00:01.000 --> 00:00:02.000\n\n\n"), [
    { start: 1, end: 2, text: "" },
  ]);
});

test("a header with no cues yields nothing", () => {
  assert.deepEqual(parseWebVtt("WEBVTT\n").cues, []);
  assert.deepEqual(parseWebVtt("").cues, []);
});

test("a header-only document is valid in strict mode", () => {
  for (const content of ["WEBVTT", "WEBVTT\n", "WEBVTT\nKind: captions\n", "WEBVTT\n\n"]) {
    assert.deepEqual(parseWebVtt(content, { mode: "strict" }), { cues: [], skipped: [] });
  }
});

test("a header without a trailing blank line still ends before its cues", () => {
  assert.deepEqual(parseWebVtt("WEBVTT\nKind: captions\n\n00:00:01.000 --> 00:00:02.000\nhi\n", { mode: "strict" }), {
    cues: [{ start: 1, end: 2, text: "hi" }],
    skipped: [],
  });
});

test("render then parse returns the same cues", () => {
  const cues = [
    { start: 0, end: 1.234, text: "one" },
    { start: 1.5, end: 4, text: "two\nlines" },
    { start: 3725.004, end: 3726.5, text: "after an hour" },
  ];

  const decoded = decodeWebVtt(renderWebVtt(cues));
  assert.equal(decoded.length, cues.length);
  decoded.forEach((cue, index) => {
    const original = cues[index];
    assert.ok(Math.abs(cue.start - original.start) < 0.001);
    assert.ok(Math.abs(cue.end - original.end) < 0.001);
    assert.equal(cue.text, original.text);
  });
});

test("render then parse collapses blank lines inside cue text", () => {
  const decoded = decodeWebVtt(renderWebVtt([{ start: 0, end: 2, text: "first\n\n\nsecond" }]));
  assert.deepEqual(decoded, [{ start: 0, end: 2, text: "first\nsecond" }]);
});
