/** An episode as produced by the feed parser. A missing mediaUrl means it cannot be played. */
export interface Episode {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly mediaUrl?: string;
  readonly publishedAt: string;
  readonly duration: string;
  readonly artworkUrl?: string;
}

export type TransportPhase = "idle" | "loading" | "playing" | "paused";

export interface PlaybackState {
  episode: Episode | null;
  phase: TransportPhase;
  position: number; // seconds
  duration: number | null; // seconds; null until resolved
}

export interface TranscriptSegment {
  text: string;
  startSeconds: number;
  ordinal: number;
}

export type RunStatus =
  | "preparing"
  | "downloading"
  | "installingModel"
  | "transcribing"
  | "done"
  | "failed";

export interface TranscriptionRun {
  mediaUrl: string;
  status: RunStatus;
  statusText: string;
  fractionComplete: number;
  text: string;
  segments: readonly TranscriptSegment[];
  locale: string | null;
  error: string | null;
}

export interface SummaryTimecode {
  display: string;
  seconds: number;
}

export interface TranscriptRecord {
  mediaUrl: string;
  transcript: string;
  summary: string | null;
  segments: TranscriptSegment[] | null;
  savedAt: string; // ISO-8601
}

export type Unsubscribe = () => void;
