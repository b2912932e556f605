import type { Segment } from "../entities/segment";
import type { SegmentTranscription } from "../entities/transcript";

export type TargetLanguageMode = "translate" | "source";

export interface TranscriptionRequest {
  segment: Segment;
  audio: Buffer; // WAV encoded slice of the decoded stream
  model: string;
  targetLanguageMode: TargetLanguageMode;
}

/**
 * Turns one audio segment into text. Implementations throw on failure:
 * a FatalEngineError is never retried, anything else counts as transient.
 */
export interface ITranscriptionEngine {
  transcribe(request: TranscriptionRequest): Promise<SegmentTranscription>;
}
