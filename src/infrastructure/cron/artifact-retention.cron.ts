import * as cron from "node-cron";
import {
  PurgeExpiredJobsUseCase,
  type PurgeExpiredJobsResult,
} from "../../application/use-cases/purge-expired-jobs.use-case";

export interface ArtifactRetentionOptions {
  retentionMs: number;
  downloadGraceMs: number;
}

/**
 * Removes finished jobs and their outputs once they have been downloaded or have aged out.
 */
export class ArtifactRetentionCron {
  private task: cron.ScheduledTask | null = null;
  private isRunning = false;

  constructor(
    private purgeExpiredJobsUseCase: PurgeExpiredJobsUseCase,
    private options: ArtifactRetentionOptions
  ) {}

  /**
   * Start the cron job to run every 10 minutes
   */
  start(): void {
    if (this.task) {
      console.log("[ArtifactRetentionCron] Cron job is already running");
      return;
    }

    // Run every 10 minutes: "*/10 * * * *"
    this.task = cron.schedule("*/10 * * * *", async () => {
      await this.runOnce();
    });

    console.log("[ArtifactRetentionCron] Started cron job to purge expired jobs (runs every 10 minutes)");
  }

  async runOnce(): Promise<PurgeExpiredJobsResult | null> {
    if (this.isRunning) {
      console.log("[ArtifactRetentionCron] Previous run is still in progress, skipping this execution");
      return null;
    }

    this.isRunning = true;
    try {
      const result = await this.purgeExpiredJobsUseCase.execute({
        retentionMs: this.options.retentionMs,
        downloadGraceMs: this.options.downloadGraceMs,
      });
      if (result.purged > 0 || result.errors > 0) {
        console.log(`[ArtifactRetentionCron] Purged ${result.purged} job(s), ${result.errors} error(s)`);
      }
      return result;
    } catch (error) {
      console.error("[ArtifactRetentionCron] Error in retention cycle:", error);
      return null;
    } finally {
      this.isRunning = false;
    }
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log("[ArtifactRetentionCron] Stopped cron job");
    }
  }

  isActive(): boolean {
    return this.task !== null;
  }
}
