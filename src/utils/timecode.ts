const NUMBER_PART = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Format seconds as a WebVTT timestamp (`HH:MM:SS.mmm`).
 * Negative and non-finite input renders as zero. Hours are at least two
 * digits but are never truncated, so 100h renders as `100:00:00.000`.
 */
export function formatTimecode(totalSeconds: number): string {
  const safe = Number.isFinite(totalSeconds) && totalSeconds > 0 ? totalSeconds : 0;
  // Work in whole milliseconds so 59.9996 becomes 00:01:00.000, not 00:00:60.000
  const totalMs = Math.round(safe * 1000);
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const millis = totalMs % 60_000;
  const secs = Math.floor(millis / 1000);
  const ms = millis % 1000;

  return `${hours.toString().padStart(2, "0")}:${minutes
    .toString()
    .padStart(2, "0")}:${secs.toString().padStart(2, "0")}.${ms
    .toString()
    .padStart(3, "0")}`;
}

/**
 * Parse `HH:MM:SS.mmm`, `MM:SS.mmm` or a bare number of seconds.
 * Either `.` or `,` may be the decimal separator. Returns null when any
 * component is not a number.
 */
export function tryParseTimecode(value: string): number | null {
  const trimmed = value.trim();
  if (!trimmed) return null;

  const parts = trimmed.replace(/,/g, ".").split(":");
  if (parts.length > 3) return null;

  const numbers: number[] = [];
  for (const part of parts) {
    const candidate = part.trim();
    if (!NUMBER_PART.test(candidate)) return null;
    numbers.push(Number(candidate));
  }

  if (numbers.length === 3) {
    const [h, m, s] = numbers;
    return h * 3600 + m * 60 + s;
  }
  if (numbers.length === 2) {
    const [m, s] = numbers;
    return m * 60 + s;
  }
  return numbers[0] ?? null;
}

/** Best-effort variant of {@link tryParseTimecode}: unparseable input is 0. */
export function parseTimecode(value: string): number {
  return tryParseTimecode(value) ?? 0;
}
