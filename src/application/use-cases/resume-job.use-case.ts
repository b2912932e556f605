import type { TranscriptionJob } from "../../domain/entities/transcription-job";
import { IllegalTransitionError } from "../../domain/errors/job.errors";
import { JobDispatcher, type DispatchOutcome } from "../dispatcher/job-dispatcher";
import { JobLedger } from "../ledger/job-ledger";

export class ResumeJobUseCase {
  constructor(
    private ledger: JobLedger,
    private dispatcher: JobDispatcher
  ) {}

  async execute(jobId: string): Promise<{ job: TranscriptionJob; dispatch: DispatchOutcome }> {
    const result = await this.ledger.requestResume(jobId);
    if (!result.ok) {
      throw new IllegalTransitionError(jobId, result.currentStatus, "resume");
    }

    const dispatch = await this.dispatcher.dispatch(jobId);
    console.log(
      `[ResumeJob] Job ${jobId} resumed from segment ${result.job.lastCompletedSegmentIndex + 2} (${dispatch})`
    );
    return { job: await this.ledger.get(jobId), dispatch };
  }
}
