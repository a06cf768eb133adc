export type ErrorCode =
  | "MEDIA_UNAVAILABLE"
  | "DOWNLOAD_FAILED"
  | "LOCALE_UNSUPPORTED"
  | "ASSET_INSTALL_FAILED"
  | "RECOGNITION_FAILED"
  | "PERSISTENCE_FAILURE"
  | "EMPTY_SUMMARY_RESPONSE"
  | "TIMEOUT";

export class EpisodeSyncError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MediaUnavailableError extends EpisodeSyncError {
  constructor(message = "Episode has no playable media.", options?: { cause?: unknown }) {
    super("MEDIA_UNAVAILABLE", message, options);
  }
}

export class DownloadFailedError extends EpisodeSyncError {
  readonly statusCode?: number;

  constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
    super("DOWNLOAD_FAILED", message, options);
    this.statusCode = options?.statusCode;
  }
}

export class LocaleUnsupportedError extends EpisodeSyncError {
  constructor(
    message = "No supported speech language is available. Install a speech language for the transcriber.",
  ) {
    super("LOCALE_UNSUPPORTED", message);
  }
}

export class AssetInstallFailedError extends EpisodeSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ASSET_INSTALL_FAILED", message, options);
  }
}

export class RecognitionFailedError extends EpisodeSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RECOGNITION_FAILED", message, options);
  }
}

export class PersistenceError extends EpisodeSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PERSISTENCE_FAILURE", message, options);
  }
}

export class EmptySummaryResponseError extends EpisodeSyncError {
  constructor(message = "The summarizer returned an empty response.") {
    super("EMPTY_SUMMARY_RESPONSE", message);
  }
}

export class TimeoutError extends EpisodeSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TIMEOUT", message, options);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === "string") return err;
  return String(err);
}
