import fs from "node:fs";
import { createStore, type StoreApi } from "zustand/vanilla";
import {
  AssetInstallFailedError,
  DownloadFailedError,
  LocaleUnsupportedError,
  RecognitionFailedError,
  errorMessage,
} from "../errors.js";
import { componentLogger, type Logger } from "../logger.js";
import type { TranscriptSegment, TranscriptionRun, Unsubscribe } from "../types.js";
import { withDeadline } from "../utils/wait.js";
import { ephemeralAudioPath, HttpContentFetcher, type ContentFetcher } from "./download.js";
import { resolveLocale } from "./locale.js";
import type { IncrementalTranscriber, RecognitionSession } from "./transcriber.js";

export interface TranscriptionPipelineOptions {
  transcriber: IncrementalTranscriber;
  fetcher?: ContentFetcher;
  audioDir: string;
  preferredLocale: string;
  fallbackLocale: string;
  downloadTimeoutMs: number;
  assetInstallTimeoutMs: number;
  logger?: Logger;
}

interface PipelineState {
  run: TranscriptionRun | null;
}

function clamp01(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
}

function initialRun(mediaUrl: string): TranscriptionRun {
  return {
    mediaUrl,
    status: "preparing",
    statusText: "Preparing…",
    fractionComplete: 0,
    text: "",
    segments: [],
    locale: null,
    error: null,
  };
}

/**
 * Download → locale resolution → model install → incremental recognition.
 * The download and the model install each run against their own deadline;
 * the downloaded file is removed only after the download has settled.
 * Only the most recently started run publishes state; starting a new one
 * aborts the previous.
 */
export class TranscriptionPipeline {
  private readonly state: StoreApi<PipelineState> = createStore<PipelineState>()(() => ({ run: null }));
  private readonly fetcher: ContentFetcher;
  private readonly log: Logger;
  private generation = 0;
  private active: { id: number; controller: AbortController } | null = null;

  constructor(private readonly opts: TranscriptionPipelineOptions) {
    this.fetcher = opts.fetcher ?? new HttpContentFetcher();
    this.log = componentLogger("transcription-pipeline", opts.logger);
  }

  getRun(): TranscriptionRun | null {
    return this.state.getState().run;
  }

  subscribe(listener: (run: TranscriptionRun | null) => void): Unsubscribe {
    return this.state.subscribe((s) => listener(s.run));
  }

  get isRunning(): boolean {
    return this.active !== null;
  }

  cancel(): void {
    if (!this.active) return;
    this.active.controller.abort(new Error("Transcription superseded"));
    this.active = null;
  }

  /** Drains a run and resolves with its final snapshot. */
  async run(mediaUrl: string): Promise<TranscriptionRun> {
    let last: TranscriptionRun = initialRun(mediaUrl);
    for await (const snapshot of this.transcribe(mediaUrl)) {
      last = snapshot;
    }
    return last;
  }

  /**
   * Lazily starts a run when iterated. Each yielded value is an immutable
   * snapshot; the sequence ends at "done" or "failed", or silently when the
   * run is superseded.
   */
  async *transcribe(mediaUrl: string): AsyncGenerator<TranscriptionRun, void, undefined> {
    this.cancel();
    const id = ++this.generation;
    const controller = new AbortController();
    this.active = { id, controller };
    const { signal } = controller;
    const isCurrent = () => this.active?.id === id && !signal.aborted;
    const log = this.log.child({ run: id, mediaUrl });

    let run = initialRun(mediaUrl);
    const update = (patch: Partial<TranscriptionRun>): TranscriptionRun => {
      const next = { ...run, ...patch };
      next.fractionComplete = Math.max(run.fractionComplete, clamp01(next.fractionComplete));
      run = next;
      if (isCurrent()) this.state.setState({ run });
      return run;
    };
    this.state.setState({ run });
    yield run;
    if (!isCurrent()) return;

    const audioPath = ephemeralAudioPath(this.opts.audioDir, mediaUrl);
    let session: RecognitionSession | undefined;
    let finished = false;

    try {
      yield update({ status: "downloading", statusText: "Downloading audio…" });
      if (!isCurrent()) return;
      try {
        await withDeadline((stepSignal) => this.fetcher.download(mediaUrl, audioPath, stepSignal), {
          timeoutMs: this.opts.downloadTimeoutMs,
          label: "audio download",
          signal,
        });
      } catch (err) {
        throw err instanceof DownloadFailedError
          ? err
          : new DownloadFailedError(`Audio download failed: ${errorMessage(err)}`, { cause: err });
      }
      if (!isCurrent()) return;

      if (!(await this.opts.transcriber.isAvailable())) {
        throw new RecognitionFailedError("Speech transcription is not available.");
      }
      const locale = await resolveLocale(
        this.opts.transcriber,
        this.opts.preferredLocale,
        this.opts.fallbackLocale
      );
      if (!locale) throw new LocaleUnsupportedError();
      if (!isCurrent()) return;
      update({ locale });

      const installation = await this.opts.transcriber.assetInstallation(locale);
      if (installation) {
        yield update({ status: "installingModel", statusText: "Downloading speech model…" });
        try {
          await withDeadline((stepSignal) => installation.downloadAndInstall(stepSignal), {
            timeoutMs: this.opts.assetInstallTimeoutMs,
            label: "speech model installation",
            signal,
          });
        } catch (err) {
          throw new AssetInstallFailedError(`Speech model installation failed: ${errorMessage(err)}`, {
            cause: err,
          });
        }
        if (!isCurrent()) return;
      }

      try {
        session = await this.opts.transcriber.openSession(audioPath, locale, signal);
      } catch (err) {
        throw new RecognitionFailedError(`Could not open audio for recognition: ${errorMessage(err)}`, {
          cause: err,
        });
      }
      const total = session.durationSeconds;
      yield update({ status: "transcribing", statusText: "Transcribing… 0%" });
      log.info({ locale, durationSeconds: total }, "recognition started");

      let processed = 0;
      let cursor = 0; // processed seconds as of the previous result
      try {
        for await (const event of session.events()) {
          if (!isCurrent()) return;
          if (event.kind === "progress") {
            processed = Math.max(processed, event.processedSeconds);
            const fraction = total > 0 ? clamp01(processed / total) : 0;
            if (fraction > run.fractionComplete) {
              yield update({
                fractionComplete: fraction,
                statusText: `Transcribing… ${Math.floor(fraction * 100)}%`,
              });
            }
            continue;
          }

          const text = event.text.trim();
          const start = event.startSeconds ?? cursor;
          cursor = processed;
          if (!text) continue;

          const previous = run.segments[run.segments.length - 1];
          const segment: TranscriptSegment = {
            text,
            startSeconds: Math.max(start, previous?.startSeconds ?? 0),
            ordinal: run.segments.length,
          };
          yield update({
            text: run.text ? `${run.text} ${text}` : text,
            segments: [...run.segments, segment],
          });
        }
      } catch (err) {
        if (!isCurrent()) return;
        throw new RecognitionFailedError(`Recognition failed: ${errorMessage(err)}`, { cause: err });
      }
      finished = true;
      if (!isCurrent()) return;

      log.info({ segments: run.segments.length }, "recognition finished");
      yield update({ status: "done", statusText: "Done", fractionComplete: 1 });
    } catch (err) {
      if (!isCurrent()) return;
      const reason = errorMessage(err);
      log.error({ err }, "transcription failed");
      yield update({ status: "failed", statusText: reason, error: reason });
    } finally {
      if (session && !finished) session.cancel();
      try {
        fs.rmSync(audioPath, { force: true });
      } catch (error) {
        log.warn({ err: error, audioPath }, "cleanup warning");
      }
      if (this.active?.id === id) this.active = null;
    }
  }
}
