import { errorMessage } from "../../domain/errors/job.errors";
import { JobDispatcher, type DispatchOutcome } from "../dispatcher/job-dispatcher";
import { JobLedger } from "../ledger/job-ledger";

export interface ResumeIncompleteJobsUseCaseParams {
  limit?: number; // Maximum number of jobs to dispatch in one run
}

export interface ResumeIncompleteJobsResult {
  processed: number;
  skipped: number;
  errors: number;
  results: Array<{ jobId: string; status: DispatchOutcome | "error"; error?: string }>;
}

/**
 * Re-dispatches queued or processing jobs that no runner holds, such as jobs
 * interrupted by a restart. Paused jobs stay paused until a client resumes them.
 */
export class ResumeIncompleteJobsUseCase {
  constructor(
    private ledger: JobLedger,
    private dispatcher: JobDispatcher
  ) {}

  async execute(params: ResumeIncompleteJobsUseCaseParams = {}): Promise<ResumeIncompleteJobsResult> {
    const { limit = 50 } = params;

    const incompleteJobs = await this.ledger.findRecoverable(limit);
    console.log(`[ResumeIncompleteJobs] Found ${incompleteJobs.length} incomplete, unclaimed jobs`);

    const results: ResumeIncompleteJobsResult["results"] = [];
    let processed = 0;
    let skipped = 0;
    let errors = 0;

    for (const job of incompleteJobs) {
      // Jobs already running in this process are refreshed by their runner
      if (this.dispatcher.isRunning(job.id)) {
        results.push({ jobId: job.id, status: "already-running" });
        skipped++;
        continue;
      }

      try {
        const outcome = await this.dispatcher.dispatch(job.id);
        results.push({ jobId: job.id, status: outcome });
        if (outcome === "started" || outcome === "deferred") {
          processed++;
        } else {
          skipped++;
        }
      } catch (error) {
        console.error(`[ResumeIncompleteJobs] Error resuming job ${job.id}:`, error);
        results.push({ jobId: job.id, status: "error", error: errorMessage(error) });
        errors++;
      }
    }

    console.log(`[ResumeIncompleteJobs] Completed: ${processed} resumed, ${skipped} skipped, ${errors} errors`);
    return { processed, skipped, errors, results };
  }
}
