/**
 * Transcription models accepted on submission.
 * Only whisper-1 can translate to English and return segment timestamps.
 */
export const SUPPORTED_MODELS = [
  "whisper-1",
  "gpt-4o-transcribe",
  "gpt-4o-mini-transcribe",
] as const;

export type SupportedModel = (typeof SUPPORTED_MODELS)[number];

export const TRANSLATION_MODELS: readonly SupportedModel[] = ["whisper-1"];

export function isSupportedModel(model: string): model is SupportedModel {
  return SUPPORTED_MODELS.some((candidate) => candidate === model);
}

export function supportsTranslation(model: string): boolean {
  return TRANSLATION_MODELS.some((candidate) => candidate === model);
}

export function supportsTimestamps(model: string): boolean {
  return model === "whisper-1";
}
