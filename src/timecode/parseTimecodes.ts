import type { SummaryTimecode, TranscriptSegment } from "../types.js";

export type TimecodeToken =
  | { kind: "text"; text: string }
  | ({ kind: "timecode" } & SummaryTimecode);

// [M:SS], [MM:SS], [H:MM:SS], [HH:MM:SS]
const TIMECODE_PATTERN = /\[(\d{1,2}):(\d{2})(?::(\d{2}))?\]/g;

/**
 * Splits text into literal and timecode tokens. Concatenating each token's
 * `text` / `display` reproduces the input exactly.
 */
export function parseTimecodes(text: string): TimecodeToken[] {
  const tokens: TimecodeToken[] = [];
  let lastEnd = 0;

  for (const match of text.matchAll(TIMECODE_PATTERN)) {
    const start = match.index ?? 0;
    if (start > lastEnd) {
      tokens.push({ kind: "text", text: text.slice(lastEnd, start) });
    }
    const [display, first, second, third] = match;
    const seconds =
      third === undefined
        ? Number(first) * 60 + Number(second)
        : Number(first) * 3600 + Number(second) * 60 + Number(third);
    tokens.push({ kind: "timecode", display, seconds });
    lastEnd = start + display.length;
  }

  if (lastEnd < text.length) {
    tokens.push({ kind: "text", text: text.slice(lastEnd) });
  }
  return tokens;
}

export function tokenSource(token: TimecodeToken): string {
  return token.kind === "text" ? token.text : token.display;
}

export function timecodesIn(text: string): SummaryTimecode[] {
  return parseTimecodes(text).flatMap((t) =>
    t.kind === "timecode" ? [{ display: t.display, seconds: t.seconds }] : []
  );
}

export interface SummaryLine {
  line: string;
  tokens: TimecodeToken[];
  firstTimecode: SummaryTimecode | null;
}

/** One entry per non-blank line; a tap on the line seeks to its first timecode. */
export function parseSummaryLines(summary: string): SummaryLine[] {
  return summary
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line) => {
      const tokens = parseTimecodes(line);
      const first = tokens.find((t) => t.kind === "timecode");
      return {
        line,
        tokens,
        firstTimecode:
          first && first.kind === "timecode"
            ? { display: first.display, seconds: first.seconds }
            : null,
      };
    });
}

function pad2(n: number) {
  return n.toString().padStart(2, "0");
}

export function formatClock(seconds: number): string {
  if (!Number.isFinite(seconds)) return "--:--";
  const total = Math.max(0, Math.floor(seconds));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return h > 0 ? `${h}:${pad2(m)}:${pad2(s)}` : `${m}:${pad2(s)}`;
}

export function formatTimecode(seconds: number): string {
  return `[${formatClock(seconds)}]`;
}

export function buildTimestampedTranscript(segments: readonly TranscriptSegment[]): string {
  return segments.map((s) => `${formatTimecode(s.startSeconds)} ${s.text}`).join("\n");
}
