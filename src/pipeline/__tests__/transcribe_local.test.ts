import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { MockAgent } from "undici";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { RecognitionEvent } from "../transcriber.js";
import { LocalAsrTranscriber, baseLanguage, planChunks } from "../transcribe_local.js";

const mockRunCommand = vi.hoisted(() => vi.fn());

vi.mock("../../utils/process.js", () => ({
  runCommand: (...args: unknown[]) => mockRunCommand(...args),
}));

const BASE = "http://asr.test:5689";

function transcriber(agent: MockAgent, model = "large-v3") {
  return new LocalAsrTranscriber({
    baseUrl: BASE,
    model,
    timeoutMs: 60000,
    chunkSeconds: 120,
    ffmpegCmd: "ffmpeg",
    ffprobeCmd: "ffprobe",
    dispatcher: agent,
  });
}

describe("planChunks", () => {
  it("covers the whole duration with a short final chunk", () => {
    expect(planChunks(250, 120)).toEqual([
      { index: 0, startSeconds: 0, endSeconds: 120 },
      { index: 1, startSeconds: 120, endSeconds: 240 },
      { index: 2, startSeconds: 240, endSeconds: 250 },
    ]);
    expect(planChunks(0, 120)).toEqual([]);
  });
});

describe("LocalAsrTranscriber", () => {
  let agent: MockAgent;
  let dir: string;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "episode-sync-asr-"));
    mockRunCommand.mockReset();
  });

  afterEach(async () => {
    await agent.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("rejects unknown models", () => {
    expect(() => transcriber(agent, "whisper-9000")).toThrow("Unknown Whisper model: whisper-9000");
  });

  it("reports availability from the health endpoint", async () => {
    agent.get(BASE).intercept({ path: "/healthz", method: "GET" }).reply(200, { ok: true });
    agent.get(BASE).intercept({ path: "/healthz", method: "GET" }).reply(503, "starting");
    const asr = transcriber(agent);

    expect(await asr.isAvailable()).toBe(true);
    expect(await asr.isAvailable()).toBe(false);
  });

  it("limits English-only models to English locales", async () => {
    const english = transcriber(agent, "small.en");
    const multilingual = transcriber(agent, "large-v3");

    expect(await english.supportedLocale("fr_FR")).toBeUndefined();
    expect(await english.supportedLocale("en_GB")).toBe("en-GB");
    expect(await multilingual.supportedLocale("fr_FR")).toBe("fr-FR");
    expect(await multilingual.supportedLocale("C")).toBeUndefined();
    expect(await multilingual.assetInstallation()).toBeUndefined();
    expect(baseLanguage("pt-BR")).toBe("pt");
  });

  it("uploads each chunk and yields offset results followed by progress", async () => {
    const audioPath = path.join(dir, "episode.mp3");
    fs.writeFileSync(audioPath, "fake");
    const chunkFiles: string[] = [];
    mockRunCommand.mockImplementation(async (command: string, args: string[]) => {
      if (command === "ffprobe") return { stdout: "250.0\n", stderr: "", exitCode: 0 };
      const out = args[args.length - 1];
      chunkFiles.push(out);
      fs.writeFileSync(out, "chunk");
      return { stdout: "", stderr: "", exitCode: 0 };
    });

    const pool = agent.get(BASE);
    const route = { path: "/openai/v1/audio/transcriptions", method: "POST" };
    pool.intercept(route).reply(200, { text: "Hi. There.", segments: [{ start: 0, end: 4, text: " Hi." }, { start: 60.5, end: 62, text: " There." }] });
    pool.intercept(route).reply(200, { text: "Middle chunk.", segments: [] });
    pool.intercept(route).reply(200, { text: "", segments: [{ start: 2, end: 5, text: "End." }] });

    const session = await transcriber(agent).openSession(audioPath, "en-US");
    const events: RecognitionEvent[] = [];
    for await (const event of session.events()) events.push(event);

    expect(session.durationSeconds).toBe(250);
    expect(events).toEqual([
      { kind: "result", text: "Hi.", startSeconds: 0 },
      { kind: "result", text: "There.", startSeconds: 60.5 },
      { kind: "progress", processedSeconds: 120 },
      { kind: "result", text: "Middle chunk.", startSeconds: 120 },
      { kind: "progress", processedSeconds: 240 },
      { kind: "result", text: "End.", startSeconds: 242 },
      { kind: "progress", processedSeconds: 250 },
    ]);
    expect(chunkFiles.map((f) => path.basename(f))).toEqual([
      "episode_chunk_0.mp3",
      "episode_chunk_1.mp3",
      "episode_chunk_2.mp3",
    ]);
    expect(chunkFiles.some((f) => fs.existsSync(f))).toBe(false);
    expect(mockRunCommand).toHaveBeenCalledWith(
      "ffmpeg",
      ["-y", "-i", audioPath, "-ss", "240", "-t", "10", "-c", "copy", chunkFiles[2]],
      expect.anything()
    );
  });

  it("fails the session when the service rejects a chunk", async () => {
    const audioPath = path.join(dir, "episode.mp3");
    fs.writeFileSync(audioPath, "fake");
    mockRunCommand.mockImplementation(async (command: string, args: string[]) => {
      if (command === "ffprobe") return { stdout: "30\n", stderr: "", exitCode: 0 };
      fs.writeFileSync(args[args.length - 1], "chunk");
      return { stdout: "", stderr: "", exitCode: 0 };
    });
    agent
      .get(BASE)
      .intercept({ path: "/openai/v1/audio/transcriptions", method: "POST" })
      .reply(500, "model crashed");

    const session = await transcriber(agent).openSession(audioPath, "en-US");
    const drain = async () => {
      for await (const _event of session.events()) {
        // drain
      }
    };

    await expect(drain()).rejects.toThrow("Local ASR transcription failed: 500 model crashed");
    expect(fs.existsSync(path.join(dir, "episode_chunk_0.mp3"))).toBe(false);
  });

  it("removes a partially written chunk when extraction fails", async () => {
    const audioPath = path.join(dir, "episode.mp3");
    fs.writeFileSync(audioPath, "fake");
    mockRunCommand.mockImplementation(async (command: string, args: string[]) => {
      if (command === "ffprobe") return { stdout: "30\n", stderr: "", exitCode: 0 };
      fs.writeFileSync(args[args.length - 1], "half a chunk");
      throw new Error("ffmpeg exited with code 1");
    });

    const session = await transcriber(agent).openSession(audioPath, "en-US");
    const drain = async () => {
      for await (const _event of session.events()) {
        // drain
      }
    };

    await expect(drain()).rejects.toThrow("ffmpeg exited with code 1");
    expect(fs.readdirSync(dir)).toEqual(["episode.mp3"]);
  });

  it("rejects audio whose duration cannot be probed", async () => {
    mockRunCommand.mockResolvedValue({ stdout: "N/A\n", stderr: "", exitCode: 0 });
    await expect(transcriber(agent).probeDuration(path.join(dir, "bad.mp3"))).rejects.toThrow(
      "Could not determine audio duration for bad.mp3"
    );
  });
});
