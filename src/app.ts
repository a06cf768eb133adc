import { Redis } from "ioredis";
import { loadConfig, type ServiceConfig } from "./config.js";
import { logger as rootLogger, type Logger } from "./logger.js";
import type { ContentFetcher } from "./pipeline/download.js";
import { LocalAsrTranscriber } from "./pipeline/transcribe_local.js";
import type { IncrementalTranscriber } from "./pipeline/transcriber.js";
import { TranscriptionPipeline } from "./pipeline/transcriptionPipeline.js";
import type { MediaPlayer } from "./playback/mediaPlayer.js";
import { PlaybackEngine } from "./playback/playbackEngine.js";
import { HttpTransportSurface } from "./remote/httpTransportSurface.js";
import { EpisodeSession } from "./session/episodeSession.js";
import type { Summarizer } from "./session/summarizer.js";
import { RedisBackend, type KeyValueBackend } from "./store/backends.js";
import { TranscriptStore } from "./store/transcriptStore.js";
import type { Episode } from "./types.js";

export interface ServiceOverrides {
  config?: ServiceConfig;
  backend?: KeyValueBackend;
  transcriber?: IncrementalTranscriber;
  fetcher?: ContentFetcher;
  summarizer?: Summarizer;
  logger?: Logger;
}

export interface EpisodeSyncServices {
  config: ServiceConfig;
  engine: PlaybackEngine;
  pipeline: TranscriptionPipeline;
  store: TranscriptStore;
  surface: HttpTransportSurface;
  openSession(episode: Episode): EpisodeSession;
  close(): Promise<void>;
}

/** Builds the playback, transcription and persistence services around a platform player. */
export function createServices(player: MediaPlayer, overrides: ServiceOverrides = {}): EpisodeSyncServices {
  const config = overrides.config ?? loadConfig();
  const logger = overrides.logger ?? rootLogger;

  let redis: Redis | null = null;
  let backend = overrides.backend;
  if (!backend) {
    redis = new Redis(config.redisUrl, { lazyConnect: true });
    redis.on("error", (err) => logger.error({ err }, "Redis client error"));
    backend = new RedisBackend(redis);
  }

  const store = new TranscriptStore(backend, { keyPrefix: config.transcriptKeyPrefix, logger });
  const surface = new HttpTransportSurface({ logger });
  const engine = new PlaybackEngine({
    player,
    surface,
    skipForwardSeconds: config.skipForwardSeconds,
    skipBackwardSeconds: config.skipBackwardSeconds,
    positionIntervalMs: config.positionIntervalMs,
    readyPollIntervalMs: config.readyPollIntervalMs,
    readyTimeoutMs: config.readyTimeoutMs,
    logger,
  });
  const transcriber =
    overrides.transcriber ??
    new LocalAsrTranscriber({
      baseUrl: config.localAsrBaseUrl,
      model: config.localAsrModel,
      timeoutMs: config.localTimeoutMs,
      chunkSeconds: config.asrChunkSeconds,
      ffmpegCmd: config.ffmpegCmd,
      ffprobeCmd: config.ffprobeCmd,
      logger,
    });
  const pipeline = new TranscriptionPipeline({
    transcriber,
    fetcher: overrides.fetcher,
    audioDir: config.audioDir,
    preferredLocale: config.preferredLocale,
    fallbackLocale: config.fallbackLocale,
    downloadTimeoutMs: config.downloadTimeoutMs,
    assetInstallTimeoutMs: config.assetInstallTimeoutMs,
    logger,
  });

  return {
    config,
    engine,
    pipeline,
    store,
    surface,
    openSession: (episode) =>
      new EpisodeSession({
        episode,
        engine,
        pipeline,
        store,
        summarizer: overrides.summarizer,
        durationWaitMs: config.readyTimeoutMs,
        logger,
      }),
    async close() {
      pipeline.cancel();
      engine.dispose();
      await surface.close();
      if (redis) await redis.quit();
    },
  };
}
