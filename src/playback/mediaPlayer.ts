import type { Unsubscribe } from "../types.js";

export type MediaStatus = "unknown" | "readyToPlay" | "failed";

/** A platform audio player. Seeks are clamped to the media's bounds by the player. */
export interface MediaPlayer {
  load(mediaUrl: string): void;
  status(): MediaStatus;
  /** Only meaningful once status() is "readyToPlay". */
  loadDuration(): Promise<number>;
  play(): void;
  pause(): void;
  seek(seconds: number): void;
  currentTime(): number;
  observePeriodicTime(intervalMs: number, listener: (seconds: number) => void): Unsubscribe;
  unload(): void;
}
