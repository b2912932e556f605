import type { ArtifactRef } from "../../domain/entities/artifact";
import type { TranscriptionJob } from "../../domain/entities/transcription-job";
import type { IArtifactStore } from "../../domain/interfaces/iartifact.store";
import { errorMessage, ValidationError } from "../../domain/errors/job.errors";
import { validateJobConfig } from "../../domain/utils/job-config.validator";
import { JobDispatcher, type DispatchOutcome } from "../dispatcher/job-dispatcher";
import { JobLedger } from "../ledger/job-ledger";

export interface SubmitTranscriptionDefaults {
  model: string;
  segmentLengthSec: number;
}

export interface SubmitTranscriptionUseCaseParams {
  file: {
    buffer: Buffer;
    originalname: string;
    mimetype?: string;
  };
  model?: string;
  keepSourceLanguage?: boolean; // Default: false (translate to English)
  skipSubtitle?: boolean;
  segmentLengthSec?: number;
}

export interface SubmitTranscriptionResult {
  job: TranscriptionJob;
  dispatch: DispatchOutcome;
}

export class SubmitTranscriptionUseCase {
  constructor(
    private ledger: JobLedger,
    private artifactStore: IArtifactStore,
    private dispatcher: JobDispatcher,
    private defaults: SubmitTranscriptionDefaults
  ) {}

  async execute(params: SubmitTranscriptionUseCaseParams): Promise<SubmitTranscriptionResult> {
    const { file } = params;
    if (!file.buffer || file.buffer.length === 0) {
      throw new ValidationError("No media uploaded");
    }

    const config = validateJobConfig({
      model: params.model || this.defaults.model,
      keepSourceLanguage: params.keepSourceLanguage ?? false,
      skipSubtitle: params.skipSubtitle ?? false,
      segmentLengthSec: params.segmentLengthSec ?? this.defaults.segmentLengthSec,
    });

    const jobId = this.ledger.nextJobId();
    const originalFilename = file.originalname || "upload";

    // A job record never exists without its stored input
    let inputArtifact: ArtifactRef;
    try {
      inputArtifact = await this.artifactStore.put(
        "input",
        jobId,
        originalFilename,
        file.buffer,
        file.mimetype || "application/octet-stream"
      );
    } catch (error) {
      console.error(`[SubmitTranscription] Failed to store input for job ${jobId}:`, error);
      await this.ledger.create({
        id: jobId,
        config,
        originalFilename,
        error: `Failed to store uploaded media: ${errorMessage(error)}`,
      });
      throw error;
    }

    const created = await this.ledger.create({ id: jobId, config, originalFilename, inputArtifact });

    const dispatch = await this.dispatcher.dispatch(created.id);
    console.log(`[SubmitTranscription] Job ${created.id} submitted for ${created.originalFilename} (${dispatch})`);

    return { job: await this.ledger.get(created.id), dispatch };
  }
}
