import type { TranscriptionJob } from "../entities/transcription-job";

export interface RetentionCutoffs {
  finishedBefore: Date; // Terminal jobs finished at or before this are expired
  retrievedBefore: Date; // Completed jobs first downloaded at or before this are expired
}

export function retentionCutoffs(now: Date, retentionMs: number, downloadGraceMs: number): RetentionCutoffs {
  return {
    finishedBefore: new Date(now.getTime() - retentionMs),
    retrievedBefore: new Date(now.getTime() - downloadGraceMs),
  };
}

export function isExpired(job: TranscriptionJob, cutoffs: RetentionCutoffs): boolean {
  if (job.status !== "completed" && job.status !== "error") {
    return false;
  }
  const finishedAt = job.completedAt ?? job.updatedAt;
  if (finishedAt.getTime() <= cutoffs.finishedBefore.getTime()) {
    return true;
  }
  return (
    job.status === "completed" &&
    job.outputRetrievedAt !== undefined &&
    job.outputRetrievedAt.getTime() <= cutoffs.retrievedBefore.getTime()
  );
}
