/**
 * Raised when a component is constructed with settings it cannot work with.
 * These indicate a setup mistake, never noisy input data.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export type SkipReason = "no-timing-line" | "unrecognized-timing";

export class SubtitleParseError extends Error {
  readonly block: number;
  readonly reason: SkipReason;

  constructor(block: number, reason: SkipReason) {
    super(`Subtitle block ${block} could not be parsed: ${reason}`);
    this.name = "SubtitleParseError";
    this.block = block;
    this.reason = reason;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
