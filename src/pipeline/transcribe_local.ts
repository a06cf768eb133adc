import fs from "node:fs";
import path from "node:path";
import { fetch, FormData, File, type Dispatcher } from "undici";
import { z } from "zod";
import { isEnglishOnlyModel, isValidModel } from "../constants.js";
import { componentLogger, type Logger } from "../logger.js";
import { runCommand } from "../utils/process.js";
import { withDeadline } from "../utils/wait.js";
import type {
  AssetInstallation,
  IncrementalTranscriber,
  RecognitionEvent,
  RecognitionSession,
} from "./transcriber.js";

export interface LocalAsrTranscriberOptions {
  baseUrl: string; // e.g., http://localhost:5689
  model: string;
  timeoutMs: number; // per chunk upload
  chunkSeconds: number;
  ffmpegCmd: string;
  ffprobeCmd: string;
  dispatcher?: Dispatcher;
  logger?: Logger;
}

// OpenAI-compatible verbose_json
const VerboseJsonSchema = z.object({
  text: z.string().optional(),
  language: z.string().optional(),
  duration: z.number().optional(),
  segments: z
    .array(
      z.object({
        start: z.number().optional(),
        end: z.number().optional(),
        text: z.string().optional(),
      })
    )
    .optional(),
});

export type VerboseJson = z.infer<typeof VerboseJsonSchema>;

export interface AudioChunk {
  index: number;
  startSeconds: number;
  endSeconds: number;
}

export function planChunks(totalSeconds: number, chunkSeconds: number): AudioChunk[] {
  const chunks: AudioChunk[] = [];
  let start = 0;
  while (start < totalSeconds) {
    const end = Math.min(start + chunkSeconds, totalSeconds);
    chunks.push({ index: chunks.length, startSeconds: start, endSeconds: end });
    start = end;
  }
  return chunks;
}

export function baseLanguage(locale: string): string {
  return locale.split(/[-_]/)[0].toLowerCase();
}

function getAudioMimeType(fileName: string): string {
  const ext = path.extname(fileName).toLowerCase();
  const mimeTypes: Record<string, string> = {
    ".mp3": "audio/mpeg",
    ".wav": "audio/wav",
    ".m4a": "audio/mp4",
    ".aac": "audio/aac",
    ".ogg": "audio/ogg",
    ".flac": "audio/flac",
  };
  return mimeTypes[ext] || "audio/mpeg";
}

/**
 * Recognition through the local Whisper service. The file is cut into
 * fixed-length chunks with ffmpeg and uploaded one at a time, so results
 * arrive incrementally with a progress marker after each chunk.
 */
export class LocalAsrTranscriber implements IncrementalTranscriber {
  private readonly log: Logger;

  constructor(private readonly opts: LocalAsrTranscriberOptions) {
    if (!isValidModel(opts.model)) {
      throw new Error(`Unknown Whisper model: ${opts.model}`);
    }
    this.log = componentLogger("local-asr", opts.logger);
  }

  async isAvailable(): Promise<boolean> {
    try {
      const res = await fetch(`${this.opts.baseUrl}/healthz`, { dispatcher: this.opts.dispatcher });
      await res.text();
      if (!res.ok) {
        this.log.warn({ status: res.status }, "local ASR health check failed");
      }
      return res.ok;
    } catch (err) {
      this.log.warn({ err, baseUrl: this.opts.baseUrl }, "local ASR service is not reachable");
      return false;
    }
  }

  async supportedLocale(locale: string): Promise<string | undefined> {
    const language = baseLanguage(locale);
    if (!/^[a-z]{2,3}$/.test(language)) return undefined;
    if (isEnglishOnlyModel(this.opts.model) && language !== "en") return undefined;
    return locale.replace(/_/g, "-");
  }

  async installedLocales(): Promise<string[]> {
    return ["en-US"];
  }

  // The service manages its own model files
  async assetInstallation(): Promise<AssetInstallation | undefined> {
    return undefined;
  }

  async openSession(audioPath: string, locale: string, signal?: AbortSignal): Promise<RecognitionSession> {
    const durationSeconds = await this.probeDuration(audioPath, signal);
    const chunks = planChunks(durationSeconds, this.opts.chunkSeconds);
    this.log.info({ durationSeconds, chunks: chunks.length }, "audio probed");
    return new LocalAsrSession(this, audioPath, baseLanguage(locale), durationSeconds, chunks, signal);
  }

  async probeDuration(audioPath: string, signal?: AbortSignal): Promise<number> {
    const { stdout } = await runCommand(
      this.opts.ffprobeCmd,
      ["-v", "quiet", "-show_entries", "format=duration", "-of", "csv=p=0", audioPath],
      { signal }
    );
    const seconds = parseFloat(stdout.trim());
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new Error(`Could not determine audio duration for ${path.basename(audioPath)}`);
    }
    return seconds;
  }

  chunkPathFor(audioPath: string, chunk: AudioChunk): string {
    const ext = path.extname(audioPath);
    return path.join(path.dirname(audioPath), `${path.basename(audioPath, ext)}_chunk_${chunk.index}${ext}`);
  }

  async extractChunk(audioPath: string, chunk: AudioChunk, signal?: AbortSignal): Promise<string> {
    const chunkPath = this.chunkPathFor(audioPath, chunk);
    await runCommand(
      this.opts.ffmpegCmd,
      [
        "-y",
        "-i", audioPath,
        "-ss", chunk.startSeconds.toString(),
        "-t", (chunk.endSeconds - chunk.startSeconds).toString(),
        "-c", "copy",
        chunkPath,
      ],
      { signal }
    );
    return chunkPath;
  }

  async transcribeFile(filePath: string, language: string, signal?: AbortSignal): Promise<VerboseJson> {
    const form = new FormData();
    const fileName = path.basename(filePath);
    const file = new File([fs.readFileSync(filePath)], fileName, { type: getAudioMimeType(fileName) });
    form.append("file", file);
    form.append("model", this.opts.model);
    form.append("task", "transcribe");
    form.append("language", language);
    form.append("response_format", "verbose_json");

    const payload = await withDeadline(
      async (requestSignal) => {
        const response = await fetch(`${this.opts.baseUrl}/openai/v1/audio/transcriptions`, {
          method: "POST",
          body: form,
          signal: requestSignal,
          dispatcher: this.opts.dispatcher,
        });
        if (!response.ok) {
          const errorText = await response.text();
          throw new Error(`Local ASR transcription failed: ${response.status} ${errorText}`);
        }
        return response.json();
      },
      { timeoutMs: this.opts.timeoutMs, label: "local ASR transcription", signal }
    );

    const parsed = VerboseJsonSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error(`Local ASR returned an unexpected payload: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  logCleanupFailure(chunkPath: string, error: unknown): void {
    this.log.warn({ err: error, chunkPath }, "failed to clean up chunk file");
  }
}

class LocalAsrSession implements RecognitionSession {
  private readonly controller = new AbortController();

  constructor(
    private readonly transcriber: LocalAsrTranscriber,
    private readonly audioPath: string,
    private readonly language: string,
    readonly durationSeconds: number,
    private readonly chunks: AudioChunk[],
    signal?: AbortSignal
  ) {
    signal?.addEventListener("abort", () => this.cancel(), { once: true });
  }

  cancel(): void {
    if (!this.controller.signal.aborted) this.controller.abort(new Error("Recognition cancelled"));
  }

  async *events(): AsyncGenerator<RecognitionEvent> {
    const { signal } = this.controller;
    for (const chunk of this.chunks) {
      if (signal.aborted) return;
      const chunkPath = this.transcriber.chunkPathFor(this.audioPath, chunk);
      try {
        await this.transcriber.extractChunk(this.audioPath, chunk, signal);
        const raw = await this.transcriber.transcribeFile(chunkPath, this.language, signal);
        const segments = raw.segments ?? [];
        if (segments.length > 0) {
          for (const seg of segments) {
            yield {
              kind: "result",
              text: (seg.text ?? "").trim(),
              startSeconds: chunk.startSeconds + (seg.start ?? 0),
            };
          }
        } else if (raw.text) {
          yield { kind: "result", text: raw.text.trim(), startSeconds: chunk.startSeconds };
        }
        yield { kind: "progress", processedSeconds: chunk.endSeconds };
      } finally {
        try {
          fs.rmSync(chunkPath, { force: true });
        } catch (error) {
          this.transcriber.logCleanupFailure(chunkPath, error);
        }
      }
    }
  }
}
