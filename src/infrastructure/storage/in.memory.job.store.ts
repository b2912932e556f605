import type { TranscriptionJob } from "../../domain/entities/transcription-job";
import type { JobStatus } from "../../domain/enums/job.status";
import type { IJobStore } from "../../domain/interfaces/ijob.store";
import { isExpired, type RetentionCutoffs } from "../../domain/utils/job-retention";

/**
 * Job backing for JOB_STORE=memory and tests. Records are copied on the way
 * in and out so callers never share a mutable reference with the store.
 */
export class InMemoryJobStore implements IJobStore {
  private jobs = new Map<string, TranscriptionJob>();

  async insert(job: TranscriptionJob): Promise<void> {
    if (this.jobs.has(job.id)) {
      throw new Error(`Job ${job.id} already exists`);
    }
    this.jobs.set(job.id, structuredClone(job));
  }

  async findById(id: string): Promise<TranscriptionJob | null> {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : null;
  }

  async compareAndSwap(job: TranscriptionJob, expectedVersion: number): Promise<boolean> {
    const current = this.jobs.get(job.id);
    if (!current || current.version !== expectedVersion) {
      return false;
    }
    this.jobs.set(job.id, structuredClone(job));
    return true;
  }

  async findByStatus(statuses: readonly JobStatus[], limit: number): Promise<TranscriptionJob[]> {
    return this.oldestFirst((job) => statuses.includes(job.status), limit);
  }

  async findExpired(cutoffs: RetentionCutoffs, limit: number): Promise<TranscriptionJob[]> {
    return this.oldestFirst((job) => isExpired(job, cutoffs), limit);
  }

  private oldestFirst(predicate: (job: TranscriptionJob) => boolean, limit: number): TranscriptionJob[] {
    return [...this.jobs.values()]
      .filter(predicate)
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime())
      .slice(0, limit)
      .map((job) => structuredClone(job));
  }

  async delete(id: string): Promise<boolean> {
    return this.jobs.delete(id);
  }
}
