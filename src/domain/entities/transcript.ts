export interface TimedText {
  text: string;
  startSec: number;
  endSec: number;
}

export interface SegmentTranscription {
  text: string;
  cues: TimedText[]; // Relative to the segment start
  language?: string;
}

/**
 * Result of one segment, as persisted in a chunk artifact.
 * Cue times here are absolute (already offset by the segment start).
 */
export interface SegmentResult {
  index: number;
  startSec: number;
  endSec: number;
  text: string;
  cues: TimedText[];
  language?: string;
}
