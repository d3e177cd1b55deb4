/** One timestamped subtitle line on the global timeline (seconds). */
export interface Cue {
  start: number;
  end: number;
  text: string;
}

/**
 * Cue shape accepted by the writers. Timing may be missing or invalid
 * when cues come from hand-built or partially trusted data.
 */
export interface CueInput {
  start?: number | null;
  end?: number | null;
  text?: string | null;
}

/** Fragment returned by a transcriber, in seconds from the start of its clip. */
export interface RawFragment {
  start: number;
  end: number;
  text: string;
}

export interface SliceWindow {
  index: number;
  startMs: number; // global, already stepped back by the overlap
  endMs: number;
  isFirst: boolean;
}

export type ProgressCallback = (pct: number, status: string) => void;

/** Audio decode/encode collaborator. */
export interface AudioSource {
  probeDurationMs(audioPath: string): Promise<number>;
  exportClip(audioPath: string, window: SliceWindow, outputPath: string): Promise<void>;
}

/** Speech-to-text collaborator. */
export interface SegmentTranscriber {
  readonly name: string;
  transcribe(clipPath: string, language: string): Promise<RawFragment[]>;
}

export type SubtitleFormat = "vtt" | "srt";
