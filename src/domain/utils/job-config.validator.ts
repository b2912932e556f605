import type { TranscriptionJobConfig } from "../entities/transcription-job";
import { ValidationError } from "../errors/job.errors";
import { isSupportedModel, supportsTranslation, SUPPORTED_MODELS } from "../constants/models";

export const MIN_SEGMENT_LENGTH_SEC = 5;
export const MAX_SEGMENT_LENGTH_SEC = 600;

/**
 * Validates a job configuration before anything is stored
 * @throws ValidationError describing the first problem found
 */
export function validateJobConfig(config: TranscriptionJobConfig): TranscriptionJobConfig {
  const model = config.model.trim();
  if (!isSupportedModel(model)) {
    throw new ValidationError(
      `Unknown model requested: ${config.model}. Supported models: ${SUPPORTED_MODELS.join(", ")}`
    );
  }

  if (!config.keepSourceLanguage && !supportsTranslation(model)) {
    throw new ValidationError(
      `Model ${model} cannot translate; enable keepSourceLanguage or use whisper-1`
    );
  }

  const segmentLengthSec = config.segmentLengthSec;
  if (
    !Number.isFinite(segmentLengthSec) ||
    segmentLengthSec < MIN_SEGMENT_LENGTH_SEC ||
    segmentLengthSec > MAX_SEGMENT_LENGTH_SEC
  ) {
    throw new ValidationError(
      `segmentLength must be between ${MIN_SEGMENT_LENGTH_SEC} and ${MAX_SEGMENT_LENGTH_SEC} seconds`
    );
  }

  return { ...config, model };
}
