const debugEnabled = () => process.env.LOG_LEVEL?.toLowerCase() === "debug";

export const logger = {
  info: (...args: unknown[]) => console.log("[SEGMENT-SCRIBE]", ...args),
  warn: (...args: unknown[]) => console.warn("[SEGMENT-SCRIBE]", ...args),
  error: (...args: unknown[]) => console.error("[SEGMENT-SCRIBE]", ...args),
  debug: (...args: unknown[]) => {
    if (debugEnabled()) console.debug("[SEGMENT-SCRIBE]", ...args);
  },
};
