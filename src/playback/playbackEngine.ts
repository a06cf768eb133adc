import { createStore, type StoreApi } from "zustand/vanilla";
import {
  DEFAULT_SKIP_BACKWARD_SECONDS,
  DEFAULT_SKIP_FORWARD_SECONDS,
  NOW_PLAYING_FALLBACK_TITLE,
  POSITION_INTERVAL_MS,
} from "../constants.js";
import { MediaUnavailableError } from "../errors.js";
import { componentLogger, type Logger } from "../logger.js";
import type { Episode, PlaybackState, Unsubscribe } from "../types.js";
import { pollUntil } from "../utils/wait.js";
import type { MediaPlayer } from "./mediaPlayer.js";
import type { NowPlayingInfo, RemoteTransportSurface, TransportCommand } from "./transportSurface.js";

export interface PlaybackEngineOptions {
  player: MediaPlayer;
  surface?: RemoteTransportSurface;
  skipForwardSeconds?: number;
  skipBackwardSeconds?: number;
  positionIntervalMs?: number;
  readyPollIntervalMs?: number;
  readyTimeoutMs?: number;
  logger?: Logger;
}

const IDLE: PlaybackState = { episode: null, phase: "idle", position: 0, duration: null };

export function progressOf(state: Pick<PlaybackState, "position" | "duration">): number {
  if (!state.duration || state.duration <= 0) return 0;
  return Math.min(1, Math.max(0, state.position / state.duration));
}

function clampPosition(seconds: number, duration: number | null): number {
  const lower = Math.max(0, Number.isFinite(seconds) ? seconds : 0);
  return duration && duration > 0 ? Math.min(lower, duration) : lower;
}

/**
 * Owns what is playing and where. Every transport change is pushed to the
 * remote surface, and commands from the surface route back through the same
 * operations.
 */
export class PlaybackEngine {
  private readonly state: StoreApi<PlaybackState> = createStore<PlaybackState>()(() => ({ ...IDLE }));
  private readonly player: MediaPlayer;
  private readonly surface?: RemoteTransportSurface;
  private readonly log: Logger;
  private readonly skipForwardSeconds: number;
  private readonly skipBackwardSeconds: number;
  private readonly positionIntervalMs: number;
  private readonly readyPollIntervalMs: number;
  private readonly readyTimeoutMs: number;

  // Bumped on every teardown; callbacks from an older session compare and bail.
  private generation = 0;
  private loaded = false;
  private stopObserving: Unsubscribe | null = null;
  private loadController: AbortController | null = null;
  private readonly detachSurface: Unsubscribe | null;

  constructor(opts: PlaybackEngineOptions) {
    this.player = opts.player;
    this.surface = opts.surface;
    this.log = componentLogger("playback-engine", opts.logger);
    this.skipForwardSeconds = opts.skipForwardSeconds ?? DEFAULT_SKIP_FORWARD_SECONDS;
    this.skipBackwardSeconds = opts.skipBackwardSeconds ?? DEFAULT_SKIP_BACKWARD_SECONDS;
    this.positionIntervalMs = opts.positionIntervalMs ?? POSITION_INTERVAL_MS;
    this.readyPollIntervalMs = opts.readyPollIntervalMs ?? 200;
    this.readyTimeoutMs = opts.readyTimeoutMs ?? 30000;
    this.detachSurface = this.surface?.onCommand((command) => this.handleCommand(command)) ?? null;
  }

  getState(): Readonly<PlaybackState> {
    return this.state.getState();
  }

  subscribe(listener: (state: Readonly<PlaybackState>) => void): Unsubscribe {
    return this.state.subscribe(listener);
  }

  get playbackProgress(): number {
    return progressOf(this.getState());
  }

  /**
   * Starts an episode, or resumes it if it is already loaded. Resolves once
   * the duration is known (or given up on). Episodes without media are ignored.
   */
  async play(episode: Episode): Promise<void> {
    const mediaUrl = episode.mediaUrl;
    if (!mediaUrl) {
      this.log.debug({ episodeId: episode.id }, "episode has no media; ignoring play");
      return;
    }

    if (this.loaded && this.getState().episode?.id === episode.id) {
      this.resume();
      return;
    }

    this.teardown();
    const id = ++this.generation;
    const controller = new AbortController();
    this.loadController = controller;
    this.state.setState({ episode, phase: "loading", position: 0, duration: null });

    try {
      this.player.load(mediaUrl);
    } catch (err) {
      this.fail(new MediaUnavailableError(`Could not load ${mediaUrl}`, { cause: err }));
      return;
    }
    this.loaded = true;
    this.stopObserving = this.player.observePeriodicTime(this.positionIntervalMs, (seconds) => {
      if (id !== this.generation) return;
      this.state.setState((s) => ({ position: clampPosition(seconds, s.duration) }));
    });
    this.publishNowPlaying();

    try {
      await pollUntil(
        () => {
          const status = this.player.status();
          if (status === "failed") throw new MediaUnavailableError("Media failed to load.");
          return status === "readyToPlay";
        },
        {
          intervalMs: this.readyPollIntervalMs,
          timeoutMs: this.readyTimeoutMs,
          backoff: 2,
          maxIntervalMs: 1000,
          signal: controller.signal,
          label: "media readiness",
        }
      );
    } catch (err) {
      if (id === this.generation) this.fail(err);
      return;
    }
    if (id !== this.generation) return;

    // A pause during loading cancels autoplay
    if (this.getState().phase === "loading") {
      this.player.play();
      this.state.setState({ phase: "playing" });
    }
    this.publishNowPlaying();

    const duration = await this.resolveDuration();
    if (id !== this.generation) return;
    this.state.setState((s) => ({ duration, position: clampPosition(s.position, duration) }));
    this.publishNowPlaying();
  }

  pause(): void {
    const { phase } = this.getState();
    if (!this.loaded || (phase !== "playing" && phase !== "loading")) return;
    this.player.pause();
    this.state.setState({ phase: "paused" });
    this.publishNowPlaying();
  }

  resume(): void {
    const { phase } = this.getState();
    if (!this.loaded || phase === "loading") return;
    this.player.play();
    this.state.setState({ phase: "playing" });
    this.publishNowPlaying();
  }

  togglePlayPause(): void {
    const { phase } = this.getState();
    if (phase === "playing" || phase === "loading") {
      this.pause();
    } else {
      this.resume();
    }
  }

  /** `fraction` of the known duration. No-op until the duration is known. */
  seek(fraction: number): void {
    const { duration } = this.getState();
    if (!this.loaded || !duration || duration <= 0 || !Number.isFinite(fraction)) return;
    const target = Math.min(1, Math.max(0, fraction)) * duration;
    this.player.seek(target);
    this.publishNowPlaying();
  }

  skipForward(seconds: number = this.skipForwardSeconds): void {
    this.seekRelative(seconds);
  }

  skipBackward(seconds: number = this.skipBackwardSeconds): void {
    this.seekRelative(-seconds);
  }

  /** Unloads the current episode and returns to idle. */
  stop(): void {
    if (!this.loaded && this.getState().phase === "idle") return;
    this.teardown();
    this.state.setState({ ...IDLE });
    this.publishNowPlaying();
  }

  dispose(): void {
    this.teardown();
    this.detachSurface?.();
  }

  handleCommand(command: TransportCommand): boolean {
    if (!this.loaded) return false;
    switch (command.type) {
      case "play":
        this.resume();
        break;
      case "pause":
        this.pause();
        break;
      case "togglePlayPause":
        this.togglePlayPause();
        break;
      case "skipForward":
        this.skipForward(command.seconds);
        break;
      case "skipBackward":
        this.skipBackward(command.seconds);
        break;
      case "seekTo":
        this.seek(command.position / Math.max(this.getState().duration ?? 0, 1));
        break;
    }
    return true;
  }

  nowPlaying(): NowPlayingInfo {
    const s = this.getState();
    return {
      title: s.episode?.title ?? NOW_PLAYING_FALLBACK_TITLE,
      elapsed: s.position,
      duration: s.duration ?? 0,
      rate: s.phase === "playing" ? 1 : 0,
    };
  }

  private seekRelative(delta: number): void {
    if (!this.loaded) return;
    const target = clampPosition(this.player.currentTime() + delta, this.getState().duration);
    this.player.seek(target);
    this.publishNowPlaying();
  }

  private async resolveDuration(): Promise<number> {
    try {
      const seconds = await this.player.loadDuration();
      return Number.isFinite(seconds) && seconds > 0 ? seconds : 0;
    } catch (err) {
      this.log.warn({ err }, "could not resolve duration");
      return 0;
    }
  }

  private fail(err: unknown): void {
    this.log.warn({ err, episodeId: this.getState().episode?.id }, "media unavailable; playback not started");
    this.teardown();
    this.state.setState({ ...IDLE });
    this.publishNowPlaying();
  }

  private teardown(): void {
    this.generation++;
    this.loadController?.abort(new Error("Playback session replaced"));
    this.loadController = null;
    this.stopObserving?.();
    this.stopObserving = null;
    if (this.loaded) {
      this.player.unload();
      this.loaded = false;
    }
  }

  private publishNowPlaying(): void {
    this.surface?.publish(this.nowPlaying());
  }
}
