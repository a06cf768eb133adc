import { z } from "zod";
import { PersistenceError, errorMessage } from "../errors.js";
import { componentLogger, type Logger } from "../logger.js";
import type { TranscriptRecord, TranscriptSegment } from "../types.js";
import type { KeyValueBackend } from "./backends.js";

const SegmentSchema = z.object({
  text: z.string(),
  startSeconds: z.number().nonnegative(),
  ordinal: z.number().int().nonnegative(),
});

const RecordSchema = z.object({
  mediaUrl: z.string(),
  transcript: z.string(),
  summary: z.string().nullable(),
  segments: z.array(SegmentSchema).nullable(),
  savedAt: z.string(),
});

export interface TranscriptStoreOptions {
  keyPrefix?: string;
  now?: () => Date;
  logger?: Logger;
}

/** The media URL's canonical string form: URL.href when it parses, else trimmed. */
export function canonicalMediaKey(mediaUrl: string): string {
  const trimmed = mediaUrl.trim();
  try {
    return new URL(trimmed).href;
  } catch {
    return trimmed;
  }
}

/**
 * Transcript + summary persistence keyed by media URL. One record per URL;
 * saves upsert in place.
 */
export class TranscriptStore {
  private readonly keyPrefix: string;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly backend: KeyValueBackend, opts: TranscriptStoreOptions = {}) {
    this.keyPrefix = opts.keyPrefix ?? "transcript:";
    this.now = opts.now ?? (() => new Date());
    this.log = componentLogger("transcript-store", opts.logger);
  }

  private keyFor(mediaUrl: string): string {
    return `${this.keyPrefix}${canonicalMediaKey(mediaUrl)}`;
  }

  async save(
    mediaUrl: string,
    transcript: string,
    summary?: string | null,
    segments?: readonly TranscriptSegment[] | null
  ): Promise<TranscriptRecord> {
    const existing = await this.load(mediaUrl);
    const savedAt = this.nextSavedAt(existing?.savedAt);
    const newSummary = summary ? summary : null;
    const newSegments = segments && segments.length > 0 ? segments.map((s) => ({ ...s })) : null;

    const record: TranscriptRecord = existing
      ? {
          ...existing,
          transcript,
          summary: newSummary ?? existing.summary,
          segments: newSegments ?? existing.segments,
          savedAt,
        }
      : {
          mediaUrl: canonicalMediaKey(mediaUrl),
          transcript,
          summary: newSummary,
          segments: newSegments,
          savedAt,
        };

    try {
      await this.backend.set(this.keyFor(mediaUrl), JSON.stringify(record));
    } catch (err) {
      throw new PersistenceError(`Failed to save transcript: ${errorMessage(err)}`, { cause: err });
    }
    this.log.debug({ mediaUrl: record.mediaUrl, updated: Boolean(existing) }, "transcript saved");
    return record;
  }

  /** Resolves undefined when nothing is stored for the URL. */
  async load(mediaUrl: string): Promise<TranscriptRecord | undefined> {
    let raw: string | null;
    try {
      raw = await this.backend.get(this.keyFor(mediaUrl));
    } catch (err) {
      throw new PersistenceError(`Failed to load transcript: ${errorMessage(err)}`, { cause: err });
    }
    if (raw === null) return undefined;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.log.warn({ err, mediaUrl }, "stored transcript is not valid JSON; ignoring");
      return undefined;
    }
    const parsed = RecordSchema.safeParse(json);
    if (!parsed.success) {
      this.log.warn({ issues: parsed.error.issues, mediaUrl }, "stored transcript failed validation; ignoring");
      return undefined;
    }
    return parsed.data;
  }

  async list(): Promise<string[]> {
    if (!this.backend.keys) return [];
    const keys = await this.backend.keys(`${this.keyPrefix}*`);
    return keys.map((k) => k.slice(this.keyPrefix.length)).sort();
  }

  private nextSavedAt(previous: string | undefined): string {
    const now = this.now();
    if (previous) {
      const prev = new Date(previous);
      if (!Number.isNaN(prev.getTime()) && prev > now) return prev.toISOString();
    }
    return now.toISOString();
  }
}
