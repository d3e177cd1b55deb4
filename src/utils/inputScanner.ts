import fs from "fs";
import path from "path";

function normalizeExtension(extension: string): string {
  const lower = extension.trim().toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

/**
 * List the audio files directly inside `inputDir` whose extension is one of
 * `extensions` (case-insensitive), sorted by file name. A missing directory
 * throws.
 */
export function scanInputs(inputDir: string, extensions: readonly string[]): string[] {
  const wanted = new Set(extensions.map(normalizeExtension));

  return fs
    .readdirSync(inputDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && wanted.has(path.extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(inputDir, name));
}

/**
 * Group inputs that would write the same output file, i.e. share a base name
 * once the extension is dropped (`talk.wav` and `talk.mp3`). Only groups of
 * two or more are returned.
 */
export function findOutputCollisions(inputPaths: readonly string[]): string[][] {
  const byStem = new Map<string, string[]>();
  for (const inputPath of inputPaths) {
    const stem = path.parse(inputPath).name;
    byStem.set(stem, [...(byStem.get(stem) ?? []), inputPath]);
  }
  return Array.from(byStem.values()).filter((group) => group.length > 1);
}
