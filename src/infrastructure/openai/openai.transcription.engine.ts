import OpenAI, { toFile } from "openai";
import type { TimedText, SegmentTranscription } from "../../domain/entities/transcript";
import type { ITranscriptionEngine, TranscriptionRequest } from "../../domain/interfaces/itranscription.engine";
import { supportsTimestamps, supportsTranslation } from "../../domain/constants/models";
import { FatalEngineError, TransientEngineError } from "../../domain/errors/job.errors";

type UploadFile = Awaited<ReturnType<typeof toFile>>;

// Request errors that repeat identically on retry
const NON_RETRYABLE_STATUS = new Set([400, 401, 403, 404, 413, 415, 422]);

interface VerboseSegment {
  start: number;
  end: number;
  text: string;
}

export class OpenAITranscriptionEngine implements ITranscriptionEngine {
  private client: OpenAI;

  constructor(apiKey: string, client?: OpenAI) {
    this.client = client ?? new OpenAI({ apiKey });
  }

  async transcribe(request: TranscriptionRequest): Promise<SegmentTranscription> {
    const { segment, model, targetLanguageMode } = request;
    const label = `segment ${segment.index + 1} (${segment.startSec}s-${segment.endSec}s)`;

    if (request.audio.length === 0) {
      throw new FatalEngineError(`Audio for ${label} is empty`);
    }
    if (targetLanguageMode === "translate" && !supportsTranslation(model)) {
      throw new FatalEngineError(`Model ${model} cannot translate`);
    }

    const file = await toFile(request.audio, `segment-${segment.index}.wav`, { type: "audio/wav" });
    const verbose = supportsTimestamps(model);
    console.log(`[OpenAITranscriptionEngine] ${targetLanguageMode === "translate" ? "Translating" : "Transcribing"} ${label} with ${model}`);

    let response: unknown;
    try {
      response = await this.request(model, file, targetLanguageMode === "translate", verbose);
    } catch (error) {
      throw classifyError(error, label);
    }

    return parseResponse(response);
  }

  private async request(model: string, file: UploadFile, translate: boolean, verbose: boolean): Promise<unknown> {
    // Only whisper-1 translates, and it always returns timestamps
    if (translate) {
      return this.client.audio.translations.create({ model, file, response_format: "verbose_json" });
    }
    if (verbose) {
      return this.client.audio.transcriptions.create({
        model,
        file,
        response_format: "verbose_json",
        timestamp_granularities: ["segment"],
      });
    }
    return this.client.audio.transcriptions.create({ model, file, response_format: "json" });
  }
}

function classifyError(error: unknown, label: string): Error {
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    const message = `OpenAI request for ${label} failed${status ? ` (${status})` : ""}: ${error.message}`;
    if (status !== undefined && NON_RETRYABLE_STATUS.has(status)) {
      return new FatalEngineError(message, { cause: error });
    }
    return new TransientEngineError(message, { cause: error });
  }
  if (error instanceof Error) {
    return new TransientEngineError(`OpenAI request for ${label} failed: ${error.message}`, { cause: error });
  }
  return new TransientEngineError(`OpenAI request for ${label} failed: ${String(error)}`);
}

/**
 * Reads text, language and segment timestamps from a json or verbose_json response.
 * Timestamps are relative to the start of the submitted audio.
 */
export function parseResponse(response: unknown): SegmentTranscription {
  if (typeof response !== "object" || response === null || !("text" in response) || typeof response.text !== "string") {
    throw new TransientEngineError("OpenAI returned a response without text");
  }

  const cues: TimedText[] = [];
  if ("segments" in response && Array.isArray(response.segments)) {
    for (const item of response.segments) {
      if (isVerboseSegment(item) && item.text.trim()) {
        cues.push({ text: item.text.trim(), startSec: item.start, endSec: item.end });
      }
    }
  }

  const language = "language" in response && typeof response.language === "string" ? response.language : undefined;
  return { text: response.text.trim(), cues, ...(language ? { language } : {}) };
}

function isVerboseSegment(value: unknown): value is VerboseSegment {
  return (
    typeof value === "object" &&
    value !== null &&
    "start" in value &&
    typeof value.start === "number" &&
    "end" in value &&
    typeof value.end === "number" &&
    "text" in value &&
    typeof value.text === "string"
  );
}
