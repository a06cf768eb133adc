import { createStore, type StoreApi } from "zustand/vanilla";
import { errorMessage } from "../errors.js";
import { componentLogger, type Logger } from "../logger.js";
import type { TranscriptionPipeline } from "../pipeline/transcriptionPipeline.js";
import type { PlaybackEngine } from "../playback/playbackEngine.js";
import type { TranscriptStore } from "../store/transcriptStore.js";
import { parseSummaryLines, type SummaryLine } from "../timecode/parseTimecodes.js";
import type {
  Episode,
  TranscriptRecord,
  TranscriptSegment,
  TranscriptionRun,
  Unsubscribe,
} from "../types.js";
import { pollUntil } from "../utils/wait.js";
import { summarizeEpisode, type Summarizer } from "./summarizer.js";

export interface SessionState {
  transcript: string;
  segments: readonly TranscriptSegment[];
  summary: string;
  run: TranscriptionRun | null;
  isSaved: boolean;
  isSummarizing: boolean;
  summaryError: string | null;
}

export interface EpisodeSessionOptions {
  episode: Episode;
  engine: PlaybackEngine;
  pipeline: TranscriptionPipeline;
  store: TranscriptStore;
  summarizer?: Summarizer;
  durationWaitMs?: number;
  logger?: Logger;
}

/**
 * Ties one episode's transcript and summary to the shared playback engine:
 * tapping a timecode seeks the episode, starting it first if needed.
 */
export class EpisodeSession {
  readonly episode: Episode;
  private readonly state: StoreApi<SessionState> = createStore<SessionState>()(() => ({
    transcript: "",
    segments: [],
    summary: "",
    run: null,
    isSaved: false,
    isSummarizing: false,
    summaryError: null,
  }));
  private readonly engine: PlaybackEngine;
  private readonly pipeline: TranscriptionPipeline;
  private readonly store: TranscriptStore;
  private readonly summarizer?: Summarizer;
  private readonly durationWaitMs: number;
  private readonly log: Logger;
  private transcribing = false;

  constructor(opts: EpisodeSessionOptions) {
    this.episode = opts.episode;
    this.engine = opts.engine;
    this.pipeline = opts.pipeline;
    this.store = opts.store;
    this.summarizer = opts.summarizer;
    this.durationWaitMs = opts.durationWaitMs ?? 30000;
    this.log = componentLogger("episode-session", opts.logger).child({ episodeId: opts.episode.id });
  }

  getState(): Readonly<SessionState> {
    return this.state.getState();
  }

  subscribe(listener: (state: Readonly<SessionState>) => void): Unsubscribe {
    return this.state.subscribe(listener);
  }

  /** Loads a previously saved transcript/summary, if any. */
  async restore(): Promise<TranscriptRecord | undefined> {
    const mediaUrl = this.episode.mediaUrl;
    if (!mediaUrl) return undefined;
    let record: TranscriptRecord | undefined;
    try {
      record = await this.store.load(mediaUrl);
    } catch (err) {
      this.log.warn({ err }, "could not load saved transcript");
      return undefined;
    }
    if (!record) return undefined;
    this.state.setState({
      transcript: record.transcript,
      segments: record.segments ?? [],
      summary: record.summary ?? "",
      isSaved: true,
    });
    return record;
  }

  /**
   * Transcribes the episode, mirroring each snapshot into session state.
   * A finished transcript is saved; a failed run keeps its partial text in
   * state for an explicit save().
   */
  async *transcribe(): AsyncGenerator<TranscriptionRun, void, undefined> {
    const mediaUrl = this.episode.mediaUrl;
    if (!mediaUrl) {
      this.log.debug("episode has no media; nothing to transcribe");
      return;
    }
    this.transcribing = true;
    try {
      for await (const run of this.pipeline.transcribe(mediaUrl)) {
        this.state.setState({ run, transcript: run.text, segments: run.segments, isSaved: false });
        if (run.status === "done") await this.save();
        yield run;
      }
    } finally {
      this.transcribing = false;
    }
  }

  async summarize(): Promise<string> {
    if (!this.summarizer) {
      throw new Error("No summarizer configured");
    }
    const { transcript, segments } = this.getState();
    this.state.setState({ isSummarizing: true, summaryError: null });
    try {
      const summary = await summarizeEpisode(this.summarizer, transcript, segments);
      this.state.setState({ summary });
      await this.save();
      return summary;
    } catch (err) {
      this.state.setState({ summaryError: errorMessage(err) });
      throw err;
    } finally {
      this.state.setState({ isSummarizing: false });
    }
  }

  summaryLines(): SummaryLine[] {
    return parseSummaryLines(this.getState().summary);
  }

  /** Seeks this episode to an absolute position, starting playback first if it is not active. */
  async seekToTimecode(seconds: number): Promise<void> {
    const current = this.engine.getState();
    if (current.episode?.id === this.episode.id && current.duration && current.duration > 0) {
      this.engine.seek(seconds / current.duration);
      return;
    }
    if (!this.episode.mediaUrl) return;

    await this.engine.play(this.episode);
    try {
      await pollUntil(
        () => {
          const s = this.engine.getState();
          return s.episode?.id !== this.episode.id || s.duration !== null;
        },
        { intervalMs: 100, timeoutMs: this.durationWaitMs, label: "episode duration" }
      );
    } catch (err) {
      this.log.warn({ err, seconds }, "duration never resolved; seek skipped");
      return;
    }

    const after = this.engine.getState();
    if (after.episode?.id !== this.episode.id) return;
    this.engine.seek(seconds / Math.max(after.duration ?? 0, 1));
  }

  async seekToSummaryLine(line: SummaryLine): Promise<boolean> {
    if (!line.firstTimecode) return false;
    await this.seekToTimecode(line.firstTimecode.seconds);
    return true;
  }

  /** Best-effort persistence of the current transcript, summary and segments. */
  async save(): Promise<boolean> {
    const mediaUrl = this.episode.mediaUrl;
    const { transcript, summary, segments } = this.getState();
    if (!mediaUrl || !transcript) return false;
    try {
      await this.store.save(mediaUrl, transcript, summary, segments);
      this.state.setState({ isSaved: true });
      return true;
    } catch (err) {
      this.log.warn({ err }, "saving transcript failed");
      return false;
    }
  }

  dispose(): void {
    if (this.transcribing) this.pipeline.cancel();
  }
}
