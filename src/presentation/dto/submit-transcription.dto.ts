import type { DispatchOutcome } from "../../application/dispatcher/job-dispatcher";
import type { JobStatus } from "../../domain/enums/job.status";
import { ValidationError } from "../../domain/errors/job.errors";

/**
 * Multipart form fields accompanying the uploaded file. Values arrive as strings.
 */
export interface SubmitTranscriptionRequest {
  model?: string;
  keepSourceLanguage?: boolean;
  skipSubtitle?: boolean;
  segmentLength?: number; // Seconds
}

export interface SubmitTranscriptionResponse {
  jobId: string;
  status: JobStatus;
  message: string;
  dispatch: DispatchOutcome;
}

const TRUE_VALUES = ["true", "1", "yes", "on"];
const FALSE_VALUES = ["false", "0", "no", "off", ""];

function parseBoolean(name: string, value: unknown): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.includes(normalized)) return true;
    if (FALSE_VALUES.includes(normalized)) return false;
  }
  throw new ValidationError(`${name} must be a boolean`);
}

function parseSeconds(name: string, value: unknown): number | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = typeof value === "number" ? value : typeof value === "string" ? Number(value.trim()) : NaN;
  if (!Number.isInteger(parsed)) {
    throw new ValidationError(`${name} must be a whole number of seconds`);
  }
  return parsed;
}

export function parseSubmitTranscriptionRequest(body: unknown): SubmitTranscriptionRequest {
  if (body === undefined || body === null) {
    return {};
  }
  if (typeof body !== "object") {
    throw new ValidationError("Request body must be form fields");
  }

  const field = (name: string): unknown => (name in body ? Reflect.get(body, name) : undefined);

  const rawModel = field("model");
  let model: string | undefined;
  if (typeof rawModel === "string") {
    model = rawModel.trim() || undefined;
  } else if (rawModel !== undefined) {
    throw new ValidationError("model must be a string");
  }

  return {
    model,
    keepSourceLanguage: parseBoolean("keepSourceLanguage", field("keepSourceLanguage")),
    skipSubtitle: parseBoolean("skipSubtitle", field("skipSubtitle")),
    segmentLength: parseSeconds("segmentLength", field("segmentLength")),
  };
}
