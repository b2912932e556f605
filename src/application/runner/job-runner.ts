import { setTimeout as sleep } from "timers/promises";
import type { ArtifactRef } from "../../domain/entities/artifact";
import type { DecodedAudio, Segment } from "../../domain/entities/segment";
import type { TranscriptionJob } from "../../domain/entities/transcription-job";
import type { SegmentResult, SegmentTranscription } from "../../domain/entities/transcript";
import type { IArtifactStore } from "../../domain/interfaces/iartifact.store";
import type { IAudioDecoder } from "../../domain/interfaces/iaudio.decoder";
import type { ITranscriptionEngine, TranscriptionRequest } from "../../domain/interfaces/itranscription.engine";
import {
  errorMessage,
  FatalEngineError,
  NotFoundError,
  ValidationError,
} from "../../domain/errors/job.errors";
import { cuesToSrt } from "../../domain/utils/subtitle";
import { segmentToWav } from "../../domain/utils/wav";
import { JobLedger, type UpdateResult } from "../ledger/job-ledger";
import { segmentAudio } from "../segmenter/segmenter";
import { JobArtifactsService } from "../services/job-artifacts.service";
import { assembleTranscript, isSegmentResult, outputBaseName, toSegmentResult } from "./transcript-assembly";

export type RunOutcome = "completed" | "paused" | "interrupted" | "failed" | "cancelled" | "lost-claim";

export interface JobRunnerOptions {
  maxAttempts: number; // Engine attempts per segment before the job fails
  backoffMs: number; // Linear: attempt n waits n * backoffMs before the next try
  now?: () => Date;
}

type StopOutcome = "cancelled" | "lost-claim";
type Checkpoint = "continue" | "paused" | "interrupted" | StopOutcome;

/**
 * Drives one job's segments through the transcription engine, strictly in order.
 *
 * The only suspension point is the checkpoint before each segment: a pause
 * request never interrupts an engine call that is already running. All state
 * that a later run needs (progress, resume index, chunk artifacts) is committed
 * to the ledger after every segment, so a run can resume in another process.
 */
export class JobRunner {
  private readonly now: () => Date;
  private stopping = false;

  constructor(
    private ledger: JobLedger,
    private artifactStore: IArtifactStore,
    private jobArtifacts: JobArtifactsService,
    private decoder: IAudioDecoder,
    private engine: ITranscriptionEngine,
    private options: JobRunnerOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Make every run stop at its next segment boundary and release its job, leaving it
   * processing for recovery to pick up after a restart.
   */
  stop(): void {
    this.stopping = true;
  }

  /**
   * Run a job the caller has already claimed under runnerId.
   */
  async run(jobId: string, runnerId: string): Promise<RunOutcome> {
    try {
      return await this.execute(jobId, runnerId);
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[JobRunner] Job ${jobId} failed:`, error);

      const failed = await this.ledger.fail(jobId, message, runnerId);
      if (failed.ok) {
        await this.jobArtifacts.discardWorkingArtifacts(failed.job);
        return "failed";
      }
      return this.stopOutcome(failed.job);
    }
  }

  private async execute(jobId: string, runnerId: string): Promise<RunOutcome> {
    const started = await this.ledger.update(jobId, (job) => {
      if (job.lockedBy !== runnerId) {
        return undefined;
      }
      if (job.status === "queued") {
        return { status: "processing", startedAt: job.startedAt ?? this.now(), message: "Preparing audio", lockedAt: this.now() };
      }
      if (job.status === "processing") {
        const resumeIndex = job.lastCompletedSegmentIndex + 1;
        return {
          message: resumeIndex > 0 ? `Resuming from segment ${resumeIndex + 1}` : "Preparing audio",
          lockedAt: this.now(),
        };
      }
      return undefined;
    });
    if (!started.applied) {
      console.log(`[JobRunner] Job ${jobId} is not runnable by ${runnerId} (status: ${started.job.status})`);
      return this.stopOutcome(started.job);
    }

    let job = started.job;
    const audio = await this.decodeInput(job);
    const segments = segmentAudio(audio, job.config.segmentLengthSec);
    if (segments.length === 0) {
      throw new ValidationError(`No audio found in ${job.originalFilename}`);
    }
    if (job.segmentCount !== undefined && job.segmentCount !== segments.length) {
      throw new Error(
        `Input now splits into ${segments.length} segments but ${job.segmentCount} were recorded; cannot resume`
      );
    }

    const results = await this.loadCompletedSegments(job);
    const resumeIndex = job.lastCompletedSegmentIndex + 1;
    console.log(
      `[JobRunner] Job ${jobId}: ${segments.length} segment(s) of ${job.config.segmentLengthSec}s, starting at segment ${resumeIndex + 1}`
    );

    if (job.segmentCount === undefined) {
      const counted = await this.ledger.update(jobId, (current) =>
        this.holds(current, runnerId) ? { segmentCount: segments.length } : undefined
      );
      if (!counted.applied) {
        return this.stopOutcome(counted.job);
      }
      job = counted.job;
    }

    for (let index = resumeIndex; index < segments.length; index++) {
      const segment = segments[index];

      const checkpoint = await this.checkpoint(jobId, runnerId, segment, segments.length);
      if (checkpoint !== "continue") {
        return checkpoint;
      }

      const transcription = await this.transcribeWithRetry(job, audio, segment, segments.length);
      const result = toSegmentResult(segment, transcription);
      const chunk = await this.artifactStore.put(
        "chunk",
        jobId,
        `segment-${String(index).padStart(5, "0")}.json`,
        Buffer.from(JSON.stringify(result), "utf-8"),
        "application/json"
      );

      const progress = Math.round((100 * (index + 1)) / segments.length);
      const committed = await this.ledger.update(jobId, (current) =>
        this.holds(current, runnerId)
          ? {
              progress,
              message: `Transcribed segment ${index + 1} of ${segments.length}`,
              lastCompletedSegmentIndex: index,
              chunkArtifacts: [...current.chunkArtifacts, chunk],
              lockedAt: this.now(),
            }
          : undefined
      );
      if (!committed.applied) {
        await this.jobArtifacts.deleteAll(jobId, [chunk]);
        return this.stopOutcome(committed.job);
      }

      results.push(result);
      job = committed.job;
    }

    return this.finish(job, runnerId, results);
  }

  /**
   * Segment boundary: observe a pending pause, refresh the claim otherwise.
   */
  private async checkpoint(jobId: string, runnerId: string, segment: Segment, total: number): Promise<Checkpoint> {
    const result = await this.ledger.update(jobId, (job) => {
      if (!this.holds(job, runnerId)) {
        return undefined;
      }
      if (this.stopping && !job.pauseRequested) {
        return {
          message: `Interrupted after ${job.lastCompletedSegmentIndex + 1} of ${total} segments`,
          lockedBy: undefined,
          lockedAt: undefined,
          lockTimeout: undefined,
        };
      }
      if (job.pauseRequested) {
        return {
          status: "paused",
          pauseRequested: false,
          message: `Paused after ${job.lastCompletedSegmentIndex + 1} of ${total} segments`,
          lockedBy: undefined,
          lockedAt: undefined,
          lockTimeout: undefined,
        };
      }
      return {
        message: `Transcribing segment ${segment.index + 1} of ${total}`,
        lockedAt: this.now(),
      };
    });

    if (!result.applied) {
      return this.stopOutcome(result.job);
    }
    if (result.job.status === "paused") {
      console.log(`[JobRunner] Job ${jobId} paused before segment ${segment.index + 1}/${total} at ${result.job.progress}%`);
      return "paused";
    }
    if (!result.job.lockedBy) {
      console.log(`[JobRunner] Job ${jobId} released before segment ${segment.index + 1}/${total} for shutdown`);
      return "interrupted";
    }
    return "continue";
  }

  private async transcribeWithRetry(
    job: TranscriptionJob,
    audio: DecodedAudio,
    segment: Segment,
    total: number
  ): Promise<SegmentTranscription> {
    const request: TranscriptionRequest = {
      segment,
      audio: segmentToWav(audio, segment),
      model: job.config.model,
      targetLanguageMode: job.config.keepSourceLanguage ? "source" : "translate",
    };
    const maxAttempts = Math.max(1, this.options.maxAttempts);
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await this.engine.transcribe(request);
      } catch (error) {
        if (error instanceof FatalEngineError) {
          throw error;
        }
        lastError = error;
        console.warn(
          `[JobRunner] Segment ${segment.index + 1}/${total} of job ${job.id} failed (attempt ${attempt}/${maxAttempts}): ${errorMessage(error)}`
        );
        if (attempt < maxAttempts && this.options.backoffMs > 0) {
          await sleep(this.options.backoffMs * attempt);
        }
      }
    }

    throw new FatalEngineError(
      `Segment ${segment.index + 1} of ${total} failed after ${maxAttempts} attempts: ${errorMessage(lastError)}`,
      { cause: lastError }
    );
  }

  private async finish(job: TranscriptionJob, runnerId: string, results: SegmentResult[]): Promise<RunOutcome> {
    const transcriptText = assembleTranscript(results);
    if (!transcriptText) {
      throw new FatalEngineError("Transcription produced no text");
    }

    const baseName = outputBaseName(job.originalFilename);
    const written: ArtifactRef[] = [];
    try {
      const transcript = await this.artifactStore.put(
        "transcript",
        job.id,
        `${baseName}.txt`,
        Buffer.from(transcriptText + "\n", "utf-8"),
        "text/plain; charset=utf-8"
      );
      written.push(transcript);

      let subtitle: ArtifactRef | undefined;
      if (!job.config.skipSubtitle) {
        const srt = cuesToSrt(results.flatMap((result) => result.cues));
        if (!srt) {
          throw new FatalEngineError("No subtitle content generated");
        }
        subtitle = await this.artifactStore.put(
          "subtitle",
          job.id,
          `${baseName}.srt`,
          Buffer.from(srt, "utf-8"),
          "application/x-subrip"
        );
        written.push(subtitle);
      }

      const completed: UpdateResult = await this.ledger.update(job.id, (current) =>
        this.holds(current, runnerId)
          ? {
              status: "completed",
              progress: 100,
              message: "Transcription complete",
              outputs: subtitle ? { transcript, subtitle } : { transcript },
              pauseRequested: false,
              completedAt: this.now(),
              lockedBy: undefined,
              lockedAt: undefined,
              lockTimeout: undefined,
            }
          : undefined
      );
      if (!completed.applied) {
        await this.jobArtifacts.deleteAll(job.id, written);
        return this.stopOutcome(completed.job);
      }

      console.log(`[JobRunner] Job ${job.id} completed (${results.length} segments, ${transcriptText.length} chars)`);
      await this.jobArtifacts.discardWorkingArtifacts(completed.job);
      return "completed";
    } catch (error) {
      // Never leave half-written outputs behind a failed job
      await this.jobArtifacts.deleteAll(job.id, written);
      throw error;
    }
  }

  private async decodeInput(job: TranscriptionJob): Promise<DecodedAudio> {
    if (!job.inputArtifact) {
      throw new ValidationError(`Job ${job.id} has no input media`);
    }

    let media: Buffer;
    try {
      media = await this.artifactStore.get(job.inputArtifact.location);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new ValidationError(`Input media for job ${job.id} is no longer available`, { cause: error });
      }
      throw error;
    }

    try {
      return await this.decoder.decode(media, job.originalFilename);
    } catch (error) {
      throw new ValidationError(`Could not decode ${job.originalFilename}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Results of segments committed by earlier runs, read back from their chunk artifacts.
   */
  private async loadCompletedSegments(job: TranscriptionJob): Promise<SegmentResult[]> {
    const expected = job.lastCompletedSegmentIndex + 1;
    if (job.chunkArtifacts.length !== expected) {
      throw new Error(`Job ${job.id} records ${expected} completed segments but has ${job.chunkArtifacts.length} chunks`);
    }

    const results: SegmentResult[] = [];
    for (const chunk of job.chunkArtifacts) {
      const parsed: unknown = JSON.parse((await this.artifactStore.get(chunk.location)).toString("utf-8"));
      if (!isSegmentResult(parsed) || parsed.index !== results.length) {
        throw new Error(`Chunk ${chunk.location} of job ${job.id} is corrupt`);
      }
      results.push(parsed);
    }
    return results;
  }

  private holds(job: TranscriptionJob, runnerId: string): boolean {
    return job.lockedBy === runnerId && job.status === "processing";
  }

  private stopOutcome(job: TranscriptionJob): StopOutcome {
    if (job.status === "error") {
      console.log(`[JobRunner] Job ${job.id} was cancelled, stopping`);
      return "cancelled";
    }
    console.log(`[JobRunner] Lost claim on job ${job.id} (status: ${job.status}, held by: ${job.lockedBy ?? "nobody"}), stopping`);
    return "lost-claim";
  }
}
