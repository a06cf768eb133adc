export * from "./types.js";
export * from "./errors.js";
export { loadConfig, type ServiceConfig } from "./config.js";
export { logger, componentLogger, type Logger } from "./logger.js";
export { createServices, type EpisodeSyncServices, type ServiceOverrides } from "./app.js";

export {
  parseTimecodes,
  parseSummaryLines,
  timecodesIn,
  tokenSource,
  formatClock,
  formatTimecode,
  buildTimestampedTranscript,
  type TimecodeToken,
  type SummaryLine,
} from "./timecode/parseTimecodes.js";

export { TranscriptStore, canonicalMediaKey, type TranscriptStoreOptions } from "./store/transcriptStore.js";
export { MemoryBackend, RedisBackend, type KeyValueBackend } from "./store/backends.js";

export { TranscriptionPipeline, type TranscriptionPipelineOptions } from "./pipeline/transcriptionPipeline.js";
export { HttpContentFetcher, type ContentFetcher } from "./pipeline/download.js";
export { LocalAsrTranscriber, type LocalAsrTranscriberOptions } from "./pipeline/transcribe_local.js";
export { resolveLocale } from "./pipeline/locale.js";
export type {
  IncrementalTranscriber,
  RecognitionSession,
  RecognitionEvent,
  AssetInstallation,
} from "./pipeline/transcriber.js";

export { PlaybackEngine, progressOf, type PlaybackEngineOptions } from "./playback/playbackEngine.js";
export type { MediaPlayer, MediaStatus } from "./playback/mediaPlayer.js";
export type {
  RemoteTransportSurface,
  NowPlayingInfo,
  TransportCommand,
  TransportCommandHandler,
} from "./playback/transportSurface.js";
export { HttpTransportSurface } from "./remote/httpTransportSurface.js";

export { EpisodeSession, type SessionState, type EpisodeSessionOptions } from "./session/episodeSession.js";
export { summarizeEpisode, type Summarizer } from "./session/summarizer.js";
