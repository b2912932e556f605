import type { TranscriptionJob } from "../../domain/entities/transcription-job";
import { IllegalTransitionError } from "../../domain/errors/job.errors";
import { JobLedger } from "../ledger/job-ledger";

export class PauseJobUseCase {
  constructor(private ledger: JobLedger) {}

  /**
   * Request a pause. The job keeps processing until its runner reaches the next
   * segment boundary; asking again before that is accepted and changes nothing.
   */
  async execute(jobId: string): Promise<TranscriptionJob> {
    const result = await this.ledger.requestPause(jobId);
    if (!result.ok) {
      throw new IllegalTransitionError(jobId, result.currentStatus, "pause");
    }
    console.log(`[PauseJob] Pause requested for job ${jobId} at ${result.job.progress}%`);
    return result.job;
  }
}
