import { describe, expect, it } from "vitest";
import { PersistenceError } from "../../errors.js";
import { MemoryBackend, type KeyValueBackend } from "../backends.js";
import { TranscriptStore, canonicalMediaKey } from "../transcriptStore.js";

const URL_A = "https://cdn.example.com/shows/ep-1.mp3";

function clock(...isoTimes: string[]) {
  let i = 0;
  return () => new Date(isoTimes[Math.min(i++, isoTimes.length - 1)]);
}

describe("TranscriptStore", () => {
  it("returns what was just saved", async () => {
    const store = new TranscriptStore(new MemoryBackend(), { now: clock("2026-01-01T00:00:00.000Z") });
    await store.save(URL_A, "hello world", "a summary");

    expect(await store.load(URL_A)).toEqual({
      mediaUrl: URL_A,
      transcript: "hello world",
      summary: "a summary",
      segments: null,
      savedAt: "2026-01-01T00:00:00.000Z",
    });
  });

  it("resolves undefined for an unknown URL", async () => {
    const store = new TranscriptStore(new MemoryBackend());
    await expect(store.load("https://cdn.example.com/missing.mp3")).resolves.toBeUndefined();
  });

  it("upserts in place instead of adding a second record", async () => {
    const backend = new MemoryBackend();
    const store = new TranscriptStore(backend, {
      now: clock("2026-01-01T00:00:00.000Z", "2026-01-01T00:05:00.000Z"),
    });
    const first = await store.save(URL_A, "T1");
    const second = await store.save(URL_A, "T1");

    expect(backend.size).toBe(1);
    expect(second.savedAt >= first.savedAt).toBe(true);
    expect(second).toEqual({ ...first, savedAt: "2026-01-01T00:05:00.000Z" });
  });

  it("keeps the previous summary and segments when the new ones are empty", async () => {
    const store = new TranscriptStore(new MemoryBackend());
    const segments = [{ text: "hi", startSeconds: 0, ordinal: 0 }];
    await store.save(URL_A, "T1", "S1", segments);
    await store.save(URL_A, "T2", "", []);

    const record = await store.load(URL_A);
    expect(record?.transcript).toBe("T2");
    expect(record?.summary).toBe("S1");
    expect(record?.segments).toEqual(segments);
  });

  it("leaves summary unset when an empty summary follows a transcript-only save", async () => {
    const store = new TranscriptStore(new MemoryBackend());
    await store.save(URL_A, "T1");
    await store.save(URL_A, "T2", "");
    expect((await store.load(URL_A))?.summary).toBeNull();
  });

  it("overwrites summary and segments when new values are given", async () => {
    const store = new TranscriptStore(new MemoryBackend());
    await store.save(URL_A, "T1", "S1", [{ text: "a", startSeconds: 0, ordinal: 0 }]);
    await store.save(URL_A, "T1", "S2", [{ text: "b", startSeconds: 4, ordinal: 0 }]);
    const record = await store.load(URL_A);
    expect(record?.summary).toBe("S2");
    expect(record?.segments).toEqual([{ text: "b", startSeconds: 4, ordinal: 0 }]);
  });

  it("never moves savedAt backwards", async () => {
    const store = new TranscriptStore(new MemoryBackend(), {
      now: clock("2026-03-01T12:00:00.000Z", "2026-03-01T11:00:00.000Z"),
    });
    await store.save(URL_A, "T1");
    const second = await store.save(URL_A, "T1");
    expect(second.savedAt).toBe("2026-03-01T12:00:00.000Z");
  });

  it("keys records by the canonical URL form", async () => {
    const backend = new MemoryBackend();
    const store = new TranscriptStore(backend);
    await store.save("HTTPS://CDN.example.com/shows/ep-1.mp3", "T1");
    await store.save(`  ${URL_A}  `, "T2");

    expect(backend.size).toBe(1);
    expect((await store.load(URL_A))?.transcript).toBe("T2");
    expect(await store.list()).toEqual([URL_A]);
  });

  it("treats a corrupt record as missing", async () => {
    const backend = new MemoryBackend();
    await backend.set(`transcript:${URL_A}`, "{not json");
    await backend.set("transcript:https://cdn.example.com/other.mp3", JSON.stringify({ transcript: 3 }));
    const store = new TranscriptStore(backend);

    await expect(store.load(URL_A)).resolves.toBeUndefined();
    await expect(store.load("https://cdn.example.com/other.mp3")).resolves.toBeUndefined();
  });

  it("wraps backend failures in PersistenceError", async () => {
    const failing: KeyValueBackend = {
      get: async () => null,
      set: async () => {
        throw new Error("connection reset");
      },
    };
    const store = new TranscriptStore(failing);
    await expect(store.save(URL_A, "T1")).rejects.toBeInstanceOf(PersistenceError);
  });
});

describe("canonicalMediaKey", () => {
  it("normalizes URLs and trims other strings", () => {
    expect(canonicalMediaKey("https://Example.com:443/a b.mp3")).toBe("https://example.com/a%20b.mp3");
    expect(canonicalMediaKey("  local-file.mp3 ")).toBe("local-file.mp3");
  });
});
