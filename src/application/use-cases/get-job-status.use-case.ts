import type { TranscriptionJob } from "../../domain/entities/transcription-job";
import { JobLedger } from "../ledger/job-ledger";

export class GetJobStatusUseCase {
  constructor(private ledger: JobLedger) {}

  /**
   * @throws NotFoundError for an unknown job id
   */
  async execute(jobId: string): Promise<TranscriptionJob> {
    return this.ledger.get(jobId);
  }
}
