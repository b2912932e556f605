import { randomUUID } from "crypto";
import type { NewTranscriptionJob, TranscriptionJob } from "../../domain/entities/transcription-job";
import type { JobStatus } from "../../domain/enums/job.status";
import type { IJobStore } from "../../domain/interfaces/ijob.store";
import { NotFoundError } from "../../domain/errors/job.errors";
import { canTransition, isTerminal } from "../../domain/utils/job-state-machine";
import type { RetentionCutoffs } from "../../domain/utils/job-retention";
import { KeyedMutex } from "./keyed-mutex";

export type JobPatch = Partial<Omit<TranscriptionJob, "id" | "version" | "createdAt" | "updatedAt">>;

/**
 * Returns the changes to apply, or undefined when the update does not apply to the job as it is now.
 */
export type JobMutator = (job: Readonly<TranscriptionJob>) => JobPatch | undefined;

export type UpdateResult =
  | { applied: true; job: TranscriptionJob }
  | { applied: false; job: TranscriptionJob; reason: string };

export type TransitionResult =
  | { ok: true; job: TranscriptionJob }
  | { ok: false; job: TranscriptionJob; currentStatus: JobStatus };

export interface JobLedgerOptions {
  maxCommitAttempts?: number; // Version conflicts tolerated per update (default: 5)
  now?: () => Date;
}

const DEFAULT_LOCK_TIMEOUT_MS = 30 * 60 * 1000;

/**
 * A claim is live while its holder has refreshed it within the lock timeout.
 */
export function hasLiveClaim(job: TranscriptionJob, now: Date): boolean {
  if (!job.lockedBy || !job.lockedAt) {
    return false;
  }
  const timeout = job.lockTimeout || DEFAULT_LOCK_TIMEOUT_MS;
  return now.getTime() - job.lockedAt.getTime() < timeout;
}

/**
 * Authoritative owner of transcription job records.
 *
 * Updates to one job are serialized in-process and committed to the backing
 * store with a version check, so two writers never interleave on a record
 * even across processes. Readers always get a fully committed snapshot.
 */
export class JobLedger {
  private readonly mutex = new KeyedMutex();
  private readonly maxCommitAttempts: number;
  private readonly now: () => Date;

  constructor(private store: IJobStore, options: JobLedgerOptions = {}) {
    this.maxCommitAttempts = options.maxCommitAttempts ?? 5;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Id for a job whose artifacts are written before its record is created.
   */
  nextJobId(): string {
    return randomUUID();
  }

  async create(params: NewTranscriptionJob): Promise<TranscriptionJob> {
    const now = this.now();
    const failed = params.error !== undefined;
    const job: TranscriptionJob = {
      id: params.id ?? this.nextJobId(),
      config: { ...params.config },
      status: failed ? "error" : "queued",
      progress: 0,
      message: params.error ?? "Task queued",
      pauseRequested: false,
      originalFilename: params.originalFilename,
      inputArtifact: params.inputArtifact,
      chunkArtifacts: [],
      lastCompletedSegmentIndex: -1,
      error: params.error,
      version: 0,
      completedAt: failed ? now : undefined,
      createdAt: now,
      updatedAt: now,
    };
    await this.store.insert(job);
    console.log(`[JobLedger] Created ${job.status} job ${job.id} (model: ${job.config.model}, segment length: ${job.config.segmentLengthSec}s)`);
    return job;
  }

  async get(jobId: string): Promise<TranscriptionJob> {
    const job = await this.store.findById(jobId);
    if (!job) {
      throw new NotFoundError(`Transcription job ${jobId} not found`);
    }
    return job;
  }

  /**
   * Atomically apply a mutation. Inapplicable mutations and illegal status
   * transitions leave the record untouched and report the current state.
   */
  async update(jobId: string, mutator: JobMutator): Promise<UpdateResult> {
    return this.mutex.runExclusive(jobId, async () => {
      for (let attempt = 1; attempt <= this.maxCommitAttempts; attempt++) {
        const current = await this.get(jobId);
        const patch = mutator(current);
        if (!patch) {
          return { applied: false, job: current, reason: "Update not applicable" };
        }

        const nextStatus = patch.status ?? current.status;
        if (!canTransition(current.status, nextStatus)) {
          return {
            applied: false,
            job: current,
            reason: `Illegal transition ${current.status} -> ${nextStatus}`,
          };
        }

        const next: TranscriptionJob = {
          ...current,
          ...patch,
          id: current.id,
          status: nextStatus,
          // Progress never moves backwards
          progress: Math.max(current.progress, Math.min(100, Math.round(patch.progress ?? current.progress))),
          version: current.version + 1,
          createdAt: current.createdAt,
          updatedAt: this.now(),
        };

        if (await this.store.compareAndSwap(next, current.version)) {
          return { applied: true, job: next };
        }
        console.warn(`[JobLedger] Concurrent update on job ${jobId}, retrying (${attempt}/${this.maxCommitAttempts})`);
      }
      throw new Error(`Could not commit update to job ${jobId} after ${this.maxCommitAttempts} attempts`);
    });
  }

  /**
   * Ask the runner to stop at its next segment boundary. Only a processing job can be paused;
   * the status itself flips to paused when the runner observes the request.
   */
  async requestPause(jobId: string): Promise<TransitionResult> {
    const result = await this.update(jobId, (job) =>
      job.status === "processing" ? { pauseRequested: true, message: "Pause requested" } : undefined
    );
    return this.toTransition(result);
  }

  /**
   * Return a paused job to processing. The caller is responsible for dispatching a runner.
   */
  async requestResume(jobId: string): Promise<TransitionResult> {
    const result = await this.update(jobId, (job) =>
      job.status === "paused"
        ? { status: "processing", pauseRequested: false, message: "Resuming task" }
        : undefined
    );
    return this.toTransition(result);
  }

  /**
   * Move a job to the terminal error state.
   * @param heldBy When given, only the runner holding the claim may fail the job
   */
  async fail(jobId: string, message: string, heldBy?: string): Promise<TransitionResult> {
    const result = await this.update(jobId, (job) => {
      if (isTerminal(job.status)) {
        return undefined;
      }
      if (heldBy !== undefined && job.lockedBy !== heldBy) {
        return undefined;
      }
      return {
        status: "error",
        error: message,
        message,
        pauseRequested: false,
        completedAt: this.now(),
        lockedBy: undefined,
        lockedAt: undefined,
        lockTimeout: undefined,
      };
    });
    if (result.applied) {
      console.log(`[JobLedger] Job ${jobId} failed: ${message}`);
    }
    return this.toTransition(result);
  }

  /**
   * Claim a job for one runner. Succeeds when nobody holds a live claim (a stale claim is taken over).
   */
  async claim(jobId: string, runnerId: string, lockTimeoutMs: number): Promise<boolean> {
    const now = this.now();
    const result = await this.update(jobId, (job) => {
      if (job.status !== "queued" && job.status !== "processing") {
        return undefined;
      }
      if (job.lockedBy && job.lockedBy !== runnerId && hasLiveClaim(job, now)) {
        return undefined;
      }
      if (job.lockedBy && job.lockedBy !== runnerId) {
        console.log(`[JobLedger] Job ${jobId} has stale claim by ${job.lockedBy}, taking over`);
      }
      return { lockedBy: runnerId, lockedAt: now, lockTimeout: lockTimeoutMs };
    });
    return result.applied;
  }

  async release(jobId: string, runnerId: string): Promise<boolean> {
    const result = await this.update(jobId, (job) =>
      job.lockedBy === runnerId
        ? { lockedBy: undefined, lockedAt: undefined, lockTimeout: undefined }
        : undefined
    );
    return result.applied;
  }

  /**
   * Queued or processing jobs nobody is working on, e.g. after a restart.
   */
  async findRecoverable(limit = 50): Promise<TranscriptionJob[]> {
    const now = this.now();
    const candidates = await this.store.findByStatus(["queued", "processing"], limit * 3);
    return candidates.filter((job) => !hasLiveClaim(job, now)).slice(0, limit);
  }

  /**
   * Terminal jobs past their retention or download grace period.
   */
  async findExpired(cutoffs: RetentionCutoffs, limit = 100): Promise<TranscriptionJob[]> {
    return this.store.findExpired(cutoffs, limit);
  }

  async remove(jobId: string): Promise<boolean> {
    return this.mutex.runExclusive(jobId, () => this.store.delete(jobId));
  }

  private toTransition(result: UpdateResult): TransitionResult {
    return result.applied
      ? { ok: true, job: result.job }
      : { ok: false, job: result.job, currentStatus: result.job.status };
  }
}
