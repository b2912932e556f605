import type { TranscriptionJob } from "../../domain/entities/transcription-job";
import { IllegalTransitionError } from "../../domain/errors/job.errors";
import { JobLedger } from "../ledger/job-ledger";
import { JobArtifactsService } from "../services/job-artifacts.service";

export class CancelJobUseCase {
  constructor(
    private ledger: JobLedger,
    private jobArtifacts: JobArtifactsService
  ) {}

  /**
   * Operator cancel: moves any non-terminal job to error. A running segment
   * finishes, but its result is discarded and the runner stops.
   */
  async execute(jobId: string, reason = "Cancelled by operator"): Promise<TranscriptionJob> {
    const result = await this.ledger.fail(jobId, reason);
    if (!result.ok) {
      throw new IllegalTransitionError(jobId, result.currentStatus, "cancel");
    }

    await this.jobArtifacts.discardWorkingArtifacts(result.job);
    console.log(`[CancelJob] Job ${jobId} cancelled`);
    return this.ledger.get(jobId);
  }
}
