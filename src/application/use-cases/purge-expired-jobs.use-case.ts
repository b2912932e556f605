import { errorMessage } from "../../domain/errors/job.errors";
import { retentionCutoffs } from "../../domain/utils/job-retention";
import { JobLedger } from "../ledger/job-ledger";
import { JobArtifactsService } from "../services/job-artifacts.service";

export interface PurgeExpiredJobsUseCaseParams {
  retentionMs: number; // Terminal jobs older than this are removed
  downloadGraceMs: number; // Completed jobs are removed this long after their output was first fetched
  limit?: number;
  now?: Date;
}

export interface PurgeExpiredJobsResult {
  purged: number;
  errors: number;
}

export class PurgeExpiredJobsUseCase {
  constructor(
    private ledger: JobLedger,
    private jobArtifacts: JobArtifactsService
  ) {}

  async execute(params: PurgeExpiredJobsUseCaseParams): Promise<PurgeExpiredJobsResult> {
    const { retentionMs, downloadGraceMs, limit = 100 } = params;
    const now = params.now ?? new Date();

    const expired = await this.ledger.findExpired(retentionCutoffs(now, retentionMs, downloadGraceMs), limit);
    let purged = 0;
    let errors = 0;

    for (const job of expired) {
      try {
        await this.jobArtifacts.discardOutputs(job);
        await this.jobArtifacts.deleteAll(job.id, [
          ...(job.inputArtifact ? [job.inputArtifact] : []),
          ...job.chunkArtifacts,
        ]);
        await this.ledger.remove(job.id);
        purged++;
        console.log(`[PurgeExpiredJobs] Removed ${job.status} job ${job.id}`);
      } catch (error) {
        errors++;
        console.error(`[PurgeExpiredJobs] Failed to purge job ${job.id}: ${errorMessage(error)}`);
      }
    }

    return { purged, errors };
  }
}

