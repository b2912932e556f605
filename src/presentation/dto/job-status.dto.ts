import type { TranscriptionJob } from "../../domain/entities/transcription-job";
import type { JobStatus } from "../../domain/enums/job.status";

export interface JobStatusResponse {
  jobId: string;
  status: JobStatus;
  progress: number; // 0-100
  message: string;
  paused: boolean; // true only while status is "paused"
  pauseRequested: boolean;
  outputReady: boolean;
  outputLocation?: string; // Download path: subtitle when produced, transcript otherwise
  transcriptLocation?: string; // Download path of the plain transcript
  subtitleFilename?: string;
  model: string;
  keepSourceLanguage: boolean;
  skipSubtitle: boolean;
  segmentCount?: number;
  completedSegments: number;
  error?: string;
  createdAt: Date;
  updatedAt: Date;
}

export const TRANSCRIPTIONS_PATH = "/api/transcriptions";

/**
 * Path clients download an output from. Storage locations stay internal.
 */
export function outputPath(jobId: string, kind?: "transcript"): string {
  const path = `${TRANSCRIPTIONS_PATH}/${encodeURIComponent(jobId)}/output`;
  return kind ? `${path}?kind=${kind}` : path;
}

export function toJobStatusResponse(job: TranscriptionJob): JobStatusResponse {
  const outputs = job.status === "completed" ? job.outputs : undefined;

  return {
    jobId: job.id,
    status: job.status,
    progress: job.progress,
    message: job.message,
    paused: job.status === "paused",
    pauseRequested: job.pauseRequested,
    outputReady: outputs !== undefined,
    outputLocation: outputs ? outputPath(job.id) : undefined,
    transcriptLocation: outputs ? outputPath(job.id, "transcript") : undefined,
    subtitleFilename: outputs?.subtitle?.filename,
    model: job.config.model,
    keepSourceLanguage: job.config.keepSourceLanguage,
    skipSubtitle: job.config.skipSubtitle,
    segmentCount: job.segmentCount,
    completedSegments: job.lastCompletedSegmentIndex + 1,
    error: job.error,
    createdAt: job.createdAt,
    updatedAt: job.updatedAt,
  };
}
