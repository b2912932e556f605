import type { TranscriptionJob } from "../entities/transcription-job";
import type { JobStatus } from "../enums/job.status";
import type { RetentionCutoffs } from "../utils/job-retention";

/**
 * Durable backing of the job ledger.
 */
export interface IJobStore {
    insert(job: TranscriptionJob): Promise<void>;
    findById(id: string): Promise<TranscriptionJob | null>;
    /**
     * Replace the stored record only if its version still equals expectedVersion.
     * @returns false when another writer committed first
     */
    compareAndSwap(job: TranscriptionJob, expectedVersion: number): Promise<boolean>;
    findByStatus(statuses: readonly JobStatus[], limit: number): Promise<TranscriptionJob[]>;
    /**
     * Terminal jobs past either retention cutoff, oldest update first.
     */
    findExpired(cutoffs: RetentionCutoffs, limit: number): Promise<TranscriptionJob[]>;
    delete(id: string): Promise<boolean>;
}
