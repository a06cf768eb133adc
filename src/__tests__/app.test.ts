import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createServices, type EpisodeSyncServices } from "../app.js";
import type { ServiceConfig } from "../config.js";
import type { IncrementalTranscriber, RecognitionEvent } from "../pipeline/transcriber.js";
import { FakePlayer, episode } from "../playback/__tests__/fakes.js";
import { MemoryBackend } from "../store/backends.js";

const transcriber: IncrementalTranscriber = {
  isAvailable: async () => true,
  supportedLocale: async (locale) => (locale.startsWith("en") ? locale : undefined),
  installedLocales: async () => ["en-US"],
  assetInstallation: async () => undefined,
  openSession: async () => ({
    durationSeconds: 60,
    cancel: () => {},
    async *events(): AsyncGenerator<RecognitionEvent> {
      yield { kind: "result", text: "Welcome back.", startSeconds: 0 };
      yield { kind: "progress", processedSeconds: 60 };
    },
  }),
};

function testConfig(audioDir: string): ServiceConfig {
  return {
    audioDir,
    logLevel: "silent",
    skipForwardSeconds: 30,
    skipBackwardSeconds: 15,
    positionIntervalMs: 500,
    readyPollIntervalMs: 5,
    readyTimeoutMs: 1000,
    preferredLocale: "de-DE",
    fallbackLocale: "en-US",
    downloadTimeoutMs: 5000,
    assetInstallTimeoutMs: 5000,
    redisUrl: "redis://localhost:6379",
    transcriptKeyPrefix: "test:",
    remoteControlPort: 5690,
    remoteControlHost: "127.0.0.1",
    localAsrBaseUrl: "http://localhost:5689",
    localAsrModel: "large-v3",
    localTimeoutMs: 60000,
    asrChunkSeconds: 120,
    ffmpegCmd: "ffmpeg",
    ffprobeCmd: "ffprobe",
  };
}

describe("createServices", () => {
  let audioDir: string;
  let backend: MemoryBackend;
  let player: FakePlayer;
  let services: EpisodeSyncServices;

  beforeEach(() => {
    audioDir = fs.mkdtempSync(path.join(os.tmpdir(), "episode-sync-app-"));
    backend = new MemoryBackend();
    player = new FakePlayer();
    services = createServices(player, {
      config: testConfig(audioDir),
      backend,
      transcriber,
      fetcher: {
        download: async (_url, dest) => {
          fs.writeFileSync(dest, "fake-audio");
        },
      },
    });
  });

  afterEach(async () => {
    await services.close();
    fs.rmSync(audioDir, { recursive: true, force: true });
  });

  it("drives the shared engine from remote commands", async () => {
    await services.engine.play(episode("7"));

    const toggle = await services.surface.app.inject({
      method: "POST",
      url: "/commands",
      payload: { command: "togglePlayPause" },
    });
    const nowPlaying = await services.surface.app.inject({ method: "GET", url: "/now-playing" });

    expect(toggle.statusCode).toBe(202);
    expect(services.engine.getState().phase).toBe("paused");
    expect(nowPlaying.json()).toEqual({ title: "Episode 7", elapsed: 0, duration: 200, rate: 0 });
  });

  it("transcribes through a session and saves under the configured prefix", async () => {
    const session = services.openSession(episode("7"));

    for await (const _run of session.transcribe()) {
      // drain
    }

    expect(session.getState()).toMatchObject({ transcript: "Welcome back.", isSaved: true });
    expect(services.pipeline.getRun()).toMatchObject({ status: "done", locale: "en-US" });
    expect(await backend.keys("test:*")).toEqual(["test:https://cdn.example.com/7.mp3"]);
  });
});
