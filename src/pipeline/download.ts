import path from "node:path";
import fs from "node:fs";
import crypto from "node:crypto";
import { pipeline } from "node:stream/promises";
import { request, type Dispatcher } from "undici";
import { DownloadFailedError, errorMessage } from "../errors.js";

export interface ContentFetcher {
  /** Must settle promptly once `signal` aborts; callers clean up only after it does. */
  download(mediaUrl: string, destinationPath: string, signal?: AbortSignal): Promise<void>;
}

export interface HttpContentFetcherOptions {
  dispatcher?: Dispatcher;
  maxRedirections?: number;
  headersTimeoutMs?: number;
}

/** Streams a remote file to disk. Podcast hosts redirect through trackers, so redirects are followed. */
export class HttpContentFetcher implements ContentFetcher {
  constructor(private readonly opts: HttpContentFetcherOptions = {}) {}

  async download(mediaUrl: string, destinationPath: string, signal?: AbortSignal): Promise<void> {
    let response: Dispatcher.ResponseData;
    try {
      response = await request(mediaUrl, {
        method: "GET",
        dispatcher: this.opts.dispatcher,
        maxRedirections: this.opts.maxRedirections ?? 5,
        headersTimeout: this.opts.headersTimeoutMs,
        signal,
      });
    } catch (err) {
      throw new DownloadFailedError(`Audio download failed: ${errorMessage(err)}`, { cause: err });
    }

    if (response.statusCode >= 400) {
      await response.body.dump();
      throw new DownloadFailedError(`Audio download failed: HTTP ${response.statusCode}`, {
        statusCode: response.statusCode,
      });
    }

    try {
      await pipeline(response.body, fs.createWriteStream(destinationPath), { signal });
    } catch (err) {
      throw new DownloadFailedError(`Audio download interrupted: ${errorMessage(err)}`, { cause: err });
    }
  }
}

const AUDIO_EXTENSIONS = new Set([".mp3", ".m4a", ".aac", ".wav", ".ogg", ".opus", ".flac"]);

/** A fresh, unique path under `baseDir`, keeping the URL's audio extension. */
export function ephemeralAudioPath(baseDir: string, mediaUrl: string): string {
  let ext = ".mp3";
  try {
    const candidate = path.extname(new URL(mediaUrl).pathname).toLowerCase();
    if (AUDIO_EXTENSIONS.has(candidate)) ext = candidate;
  } catch {
    // not a URL; keep the default extension
  }
  return path.join(baseDir, `${crypto.randomUUID()}${ext}`);
}
