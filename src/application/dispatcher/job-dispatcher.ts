import { hostname } from "os";
import { errorMessage } from "../../domain/errors/job.errors";
import type { TranscriptionJob } from "../../domain/entities/transcription-job";
import { JobLedger } from "../ledger/job-ledger";
import { KeyedMutex } from "../ledger/keyed-mutex";
import { JobRunner } from "../runner/job-runner";

export type DispatchOutcome = "started" | "already-running" | "deferred" | "not-runnable";

export interface JobDispatcherOptions {
  maxConcurrentJobs: number;
  lockTimeoutMs: number; // Claims not refreshed within this window can be taken over
}

/**
 * Starts job runners. At most one runner holds a job at a time: every
 * activation claims the job in the ledger first, so a second activation of a
 * running job (duplicate resume, recovery sweep, another process) is refused.
 */
export class JobDispatcher {
  private readonly workerId: string;
  private readonly mutex = new KeyedMutex();
  private readonly active = new Map<string, Promise<void>>();
  private readonly pending: string[] = [];
  private idleWaiters: Array<() => void> = [];
  private occupied = 0;
  private dispatching = 0;
  private sequence = 0;
  private stopped = false;

  constructor(
    private ledger: JobLedger,
    private runner: JobRunner,
    private options: JobDispatcherOptions
  ) {
    // Unique per process instance: hostname + process ID
    this.workerId = `${hostname()}-${process.pid}`;
  }

  async dispatch(jobId: string): Promise<DispatchOutcome> {
    this.dispatching++;
    try {
      return await this.mutex.runExclusive(jobId, () => this.activate(jobId));
    } finally {
      this.dispatching--;
      this.notifyIfIdle();
    }
  }

  /**
   * Resolves once no runner is active and nothing waits for a slot.
   */
  waitForIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop starting jobs and let running ones release at their next segment boundary.
   */
  async shutdown(): Promise<void> {
    this.stopped = true;
    this.pending.length = 0;
    this.runner.stop();
    await this.waitForIdle();
  }

  isRunning(jobId: string): boolean {
    return this.active.has(jobId);
  }

  get activeCount(): number {
    return this.active.size;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  private async activate(jobId: string): Promise<DispatchOutcome> {
    if (this.stopped) {
      return "deferred";
    }
    if (this.pending.includes(jobId)) {
      return "deferred";
    }

    const job = await this.ledger.get(jobId);
    if (!isRunnable(job)) {
      return "not-runnable";
    }

    if (this.occupied >= Math.max(1, this.options.maxConcurrentJobs)) {
      this.pending.push(jobId);
      console.log(`[JobDispatcher] All ${this.occupied} slot(s) busy, job ${jobId} waits (${this.pending.length} pending)`);
      return "deferred";
    }

    this.occupied++;
    const runnerId = `${this.workerId}-${++this.sequence}`;
    let claimed: boolean;
    try {
      claimed = await this.ledger.claim(jobId, runnerId, this.options.lockTimeoutMs);
    } catch (error) {
      this.releaseSlot();
      throw error;
    }

    if (!claimed) {
      this.releaseSlot();
      const current = await this.ledger.get(jobId);
      return isRunnable(current) ? "already-running" : "not-runnable";
    }

    this.start(jobId, runnerId);
    return "started";
  }

  private start(jobId: string, runnerId: string): void {
    // A paused runner may still be unwinding; the new one starts after it settles
    const prior = this.active.get(jobId) ?? Promise.resolve();
    console.log(`[JobDispatcher] Starting runner ${runnerId} for job ${jobId}`);

    const run: Promise<void> = prior
      .then(() => this.runner.run(jobId, runnerId))
      .then(
        (outcome) => {
          console.log(`[JobDispatcher] Runner ${runnerId} for job ${jobId} finished: ${outcome}`);
        },
        (error: unknown) => {
          console.error(`[JobDispatcher] Runner ${runnerId} for job ${jobId} crashed: ${errorMessage(error)}`);
        }
      )
      .finally(() => {
        if (this.active.get(jobId) === run) {
          this.active.delete(jobId);
        }
        this.releaseSlot();
      });

    this.active.set(jobId, run);
  }

  private releaseSlot(): void {
    this.occupied--;
    this.drain();
    this.notifyIfIdle();
  }

  private drain(): void {
    let free = Math.max(1, this.options.maxConcurrentJobs) - this.occupied;
    while (free > 0 && this.pending.length > 0) {
      const next = this.pending.shift();
      if (next === undefined) {
        break;
      }
      free--;
      this.dispatch(next).then(
        (outcome) => {
          console.log(`[JobDispatcher] Pending job ${next}: ${outcome}`);
        },
        (error: unknown) => {
          console.error(`[JobDispatcher] Could not start pending job ${next}: ${errorMessage(error)}`);
        }
      );
    }
  }

  private isIdle(): boolean {
    return this.occupied === 0 && this.pending.length === 0 && this.dispatching === 0 && this.active.size === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}

function isRunnable(job: TranscriptionJob): boolean {
  return job.status === "queued" || job.status === "processing";
}
