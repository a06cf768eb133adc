import "dotenv/config";
import path from "node:path";
import fs from "node:fs";
import os from "node:os";
import {
  DEFAULT_FALLBACK_LOCALE,
  DEFAULT_SKIP_BACKWARD_SECONDS,
  DEFAULT_SKIP_FORWARD_SECONDS,
  DEFAULT_WHISPER_MODEL,
  POSITION_INTERVAL_MS,
} from "./constants.js";

export interface ServiceConfig {
  audioDir: string;
  logLevel: string;
  // Playback
  skipForwardSeconds: number;
  skipBackwardSeconds: number;
  positionIntervalMs: number;
  readyPollIntervalMs: number;
  readyTimeoutMs: number;
  // Transcription
  preferredLocale: string;
  fallbackLocale: string;
  downloadTimeoutMs: number;
  assetInstallTimeoutMs: number;
  // Persistence
  redisUrl: string;
  transcriptKeyPrefix: string;
  // Remote control surface
  remoteControlPort: number;
  remoteControlHost: string;
  // Local ASR service configuration
  localAsrBaseUrl: string; // e.g., http://localhost:5689
  localAsrModel: string;
  localTimeoutMs: number; // timeout for a single chunk upload
  asrChunkSeconds: number;
  ffmpegCmd: string;
  ffprobeCmd: string;
}

function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function intFromEnv(name: string, fallback: number, min = 0): number {
  const parsed = parseInt(process.env[name] || "", 10);
  return Math.max(min, Number.isFinite(parsed) ? parsed : fallback);
}

function runtimeLocale(): string {
  return Intl.DateTimeFormat().resolvedOptions().locale || DEFAULT_FALLBACK_LOCALE;
}

export function loadConfig(): ServiceConfig {
  const audioDir =
    process.env.AUDIO_DIR || path.join(os.tmpdir(), "episode-sync");

  // Only the download directory is created eagerly
  ensureDir(audioDir);

  return {
    audioDir,
    logLevel: process.env.LOG_LEVEL || "info",
    skipForwardSeconds: intFromEnv("SKIP_FORWARD_SECONDS", DEFAULT_SKIP_FORWARD_SECONDS, 1),
    skipBackwardSeconds: intFromEnv("SKIP_BACKWARD_SECONDS", DEFAULT_SKIP_BACKWARD_SECONDS, 1),
    positionIntervalMs: intFromEnv("POSITION_INTERVAL_MS", POSITION_INTERVAL_MS, 50),
    readyPollIntervalMs: intFromEnv("READY_POLL_INTERVAL_MS", 200, 10),
    readyTimeoutMs: intFromEnv("READY_TIMEOUT_MS", 30000, 1000),
    preferredLocale: process.env.TRANSCRIBE_LOCALE || runtimeLocale(),
    fallbackLocale: process.env.FALLBACK_LOCALE || DEFAULT_FALLBACK_LOCALE,
    downloadTimeoutMs: intFromEnv("DOWNLOAD_TIMEOUT_MS", 600000, 1000),
    assetInstallTimeoutMs: intFromEnv("ASSET_INSTALL_TIMEOUT_MS", 600000, 1000),
    redisUrl: process.env.REDIS_URL || "redis://localhost:6379",
    transcriptKeyPrefix: process.env.TRANSCRIPT_KEY_PREFIX || "transcript:",
    remoteControlPort: intFromEnv("REMOTE_CONTROL_PORT", 5690, 1),
    remoteControlHost: process.env.REMOTE_CONTROL_HOST || "127.0.0.1",
    localAsrBaseUrl: process.env.LOCAL_ASR_BASE_URL || "http://localhost:5689",
    localAsrModel: process.env.LOCAL_ASR_MODEL || DEFAULT_WHISPER_MODEL,
    // Default 2 hours per chunk upload
    localTimeoutMs: intFromEnv("LOCAL_TIMEOUT_MS", 7200000, 60000),
    asrChunkSeconds: intFromEnv("ASR_CHUNK_SECONDS", 120, 10),
    ffmpegCmd: process.env.FFMPEG_CMD || "ffmpeg",
    ffprobeCmd: process.env.FFPROBE_CMD || "ffprobe",
  };
}
