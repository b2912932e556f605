import * as cron from "node-cron";
import {
  ResumeIncompleteJobsUseCase,
  type ResumeIncompleteJobsResult,
} from "../../application/use-cases/resume-incomplete-jobs.use-case";

export class JobRecoveryCron {
  private task: cron.ScheduledTask | null = null;
  private isRunning = false;

  constructor(
    private resumeIncompleteJobsUseCase: ResumeIncompleteJobsUseCase,
    private limit = 50
  ) {}

  /**
   * Start the cron job to run every minute
   */
  start(): void {
    if (this.task) {
      console.log("[JobRecoveryCron] Cron job is already running");
      return;
    }

    this.task = cron.schedule("* * * * *", async () => {
      await this.runOnce();
    });

    console.log("[JobRecoveryCron] Started cron job to recover incomplete jobs (runs every minute)");
  }

  /**
   * One recovery cycle. Skipped while the previous cycle is still in progress.
   */
  async runOnce(): Promise<ResumeIncompleteJobsResult | null> {
    if (this.isRunning) {
      console.log("[JobRecoveryCron] Previous run is still in progress, skipping this execution");
      return null;
    }

    this.isRunning = true;
    const startTime = Date.now();

    try {
      console.log("[JobRecoveryCron] Starting job recovery cycle...");
      const result = await this.resumeIncompleteJobsUseCase.execute({ limit: this.limit });

      const duration = Date.now() - startTime;
      console.log(
        `[JobRecoveryCron] Job recovery cycle completed in ${duration}ms: ` +
          `${result.processed} resumed, ${result.skipped} skipped, ${result.errors} errors`
      );

      if (result.errors > 0) {
        const errorJobs = result.results.filter((r) => r.status === "error");
        console.error(`[JobRecoveryCron] Jobs with errors:`, errorJobs);
      }
      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      console.error(`[JobRecoveryCron] Error in job recovery cycle (${duration}ms):`, error);
      return null;
    } finally {
      this.isRunning = false;
    }
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log("[JobRecoveryCron] Stopped cron job");
    }
  }

  isActive(): boolean {
    return this.task !== null;
  }
}
