import type { JobStatus } from "../enums/job.status";
import type { ArtifactRef, JobOutputs } from "./artifact";

export interface TranscriptionJobConfig {
  model: string;
  keepSourceLanguage: boolean; // false: translate to English, true: transcribe in the spoken language
  skipSubtitle: boolean;
  segmentLengthSec: number;
}

export interface TranscriptionJob {
  id: string;
  config: TranscriptionJobConfig;
  status: JobStatus;
  progress: number; // 0-100
  message: string;
  pauseRequested: boolean; // Polled by the runner at segment boundaries
  originalFilename: string;
  inputArtifact?: ArtifactRef; // Removed once the job is terminal
  chunkArtifacts: ArtifactRef[]; // One per completed segment, index order
  outputs?: JobOutputs;
  segmentCount?: number;
  lastCompletedSegmentIndex: number; // -1 until the first segment completes
  error?: string;
  lockedBy?: string; // Runner currently holding the job
  lockedAt?: Date;
  lockTimeout?: number; // Lock timeout in milliseconds
  version: number; // Incremented on every committed update
  startedAt?: Date;
  completedAt?: Date;
  outputRetrievedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * A job as submitted. The input is stored before the record exists, so a job
 * is never visible to runners without its media. A job created with an error
 * is recorded as already failed.
 */
export type NewTranscriptionJob = Pick<TranscriptionJob, "config" | "originalFilename"> &
  Partial<Pick<TranscriptionJob, "id" | "inputArtifact" | "error">>;
