import type { Segment } from "../../domain/entities/segment";
import type { SegmentResult, SegmentTranscription, TimedText } from "../../domain/entities/transcript";

/**
 * Anchor an engine result on the stream timeline.
 */
export function toSegmentResult(segment: Segment, transcription: SegmentTranscription): SegmentResult {
  const text = transcription.text.trim();
  const cues: TimedText[] =
    transcription.cues.length > 0
      ? transcription.cues.map((cue) => ({
          text: cue.text.trim(),
          startSec: segment.startSec + cue.startSec,
          endSec: Math.min(segment.endSec, segment.startSec + cue.endSec),
        }))
      : text
        ? [{ text, startSec: segment.startSec, endSec: segment.endSec }]
        : [];

  return {
    index: segment.index,
    startSec: segment.startSec,
    endSec: segment.endSec,
    text,
    cues,
    language: transcription.language,
  };
}

/**
 * Segment texts in index order, one per line; segments without speech are skipped.
 */
export function assembleTranscript(results: readonly SegmentResult[]): string {
  return [...results]
    .sort((a, b) => a.index - b.index)
    .map((result) => result.text.trim())
    .filter((text) => text.length > 0)
    .join("\n");
}

export function outputBaseName(originalFilename: string): string {
  const name = originalFilename.split(/[\\/]/).pop() ?? "";
  const dot = name.lastIndexOf(".");
  const base = dot > 0 ? name.slice(0, dot) : name;
  return base || "transcript";
}

function isTimedText(value: unknown): value is TimedText {
  return (
    typeof value === "object" &&
    value !== null &&
    "text" in value &&
    typeof value.text === "string" &&
    "startSec" in value &&
    typeof value.startSec === "number" &&
    "endSec" in value &&
    typeof value.endSec === "number"
  );
}

export function isSegmentResult(value: unknown): value is SegmentResult {
  return (
    typeof value === "object" &&
    value !== null &&
    "index" in value &&
    typeof value.index === "number" &&
    "startSec" in value &&
    typeof value.startSec === "number" &&
    "endSec" in value &&
    typeof value.endSec === "number" &&
    "text" in value &&
    typeof value.text === "string" &&
    "cues" in value &&
    Array.isArray(value.cues) &&
    value.cues.every(isTimedText)
  );
}
