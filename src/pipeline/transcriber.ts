export type RecognitionEvent =
  | { kind: "progress"; processedSeconds: number }
  | { kind: "result"; text: string; startSeconds?: number };

export interface RecognitionSession {
  /** Total audio duration, known before the first event. */
  readonly durationSeconds: number;
  events(): AsyncIterable<RecognitionEvent>;
  cancel(): void;
}

export interface AssetInstallation {
  /** Rejects once `signal` aborts. */
  downloadAndInstall(signal?: AbortSignal): Promise<void>;
}

/**
 * A speech recognition backend that yields text as it recognizes it, plus
 * "processed up to" progress markers.
 */
export interface IncrementalTranscriber {
  isAvailable(): Promise<boolean>;
  /** The backend's locale equivalent to `locale`, if it supports one. */
  supportedLocale(locale: string): Promise<string | undefined>;
  installedLocales(): Promise<string[]>;
  /** Undefined when the assets for `locale` are already present. */
  assetInstallation(locale: string): Promise<AssetInstallation | undefined>;
  openSession(audioPath: string, locale: string, signal?: AbortSignal): Promise<RecognitionSession>;
}
