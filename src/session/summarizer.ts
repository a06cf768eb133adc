import { EmptySummaryResponseError } from "../errors.js";
import { buildTimestampedTranscript } from "../timecode/parseTimecodes.js";
import type { TranscriptSegment } from "../types.js";

/**
 * Text-in/text-out summarization. Implementations are expected to keep the
 * `[M:SS]` markers of timestamped input in their output.
 */
export interface Summarizer {
  summarizeTranscript(transcript: string): Promise<string | null | undefined>;
  summarizeSegments(timestampedTranscript: string): Promise<string | null | undefined>;
}

/** Prefers timestamped segments so the summary can carry timecodes. */
export async function summarizeEpisode(
  summarizer: Summarizer,
  transcript: string,
  segments: readonly TranscriptSegment[]
): Promise<string> {
  const response =
    segments.length > 0
      ? await summarizer.summarizeSegments(buildTimestampedTranscript(segments))
      : await summarizer.summarizeTranscript(transcript);
  if (!response || !response.trim()) {
    throw new EmptySummaryResponseError();
  }
  return response;
}
