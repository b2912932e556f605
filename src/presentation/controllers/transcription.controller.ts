import { SubmitTranscriptionUseCase } from "../../application/use-cases/submit-transcription.use-case";
import { GetJobStatusUseCase } from "../../application/use-cases/get-job-status.use-case";
import { PauseJobUseCase } from "../../application/use-cases/pause-job.use-case";
import { ResumeJobUseCase } from "../../application/use-cases/resume-job.use-case";
import { CancelJobUseCase } from "../../application/use-cases/cancel-job.use-case";
import { FetchOutputUseCase, type OutputKind } from "../../application/use-cases/fetch-output.use-case";
import { SUPPORTED_MODELS, supportsTimestamps, supportsTranslation } from "../../domain/constants/models";
import {
  errorMessage,
  IllegalTransitionError,
  NotFoundError,
  ValidationError,
} from "../../domain/errors/job.errors";
import { toJobStatusResponse } from "../dto/job-status.dto";
import { parseSubmitTranscriptionRequest, type SubmitTranscriptionResponse } from "../dto/submit-transcription.dto";

/**
 * The parts of an Express request the controller reads.
 */
export interface HttpRequest {
  params: Record<string, string>;
  query: Record<string, unknown>;
  body: unknown;
  file?: {
    buffer: Buffer;
    originalname: string;
    mimetype: string;
  };
}

export interface HttpResponse {
  status(code: number): HttpResponse;
  json(body: unknown): unknown;
  setHeader(name: string, value: string): unknown;
  send(body: Buffer): unknown;
}

export class TranscriptionController {
  constructor(
    private submitTranscriptionUseCase: SubmitTranscriptionUseCase,
    private getJobStatusUseCase: GetJobStatusUseCase,
    private pauseJobUseCase: PauseJobUseCase,
    private resumeJobUseCase: ResumeJobUseCase,
    private cancelJobUseCase: CancelJobUseCase,
    private fetchOutputUseCase: FetchOutputUseCase,
    private defaultModel: string
  ) {}

  async submit(req: HttpRequest, res: HttpResponse): Promise<void> {
    try {
      if (!req.file) {
        res.status(400).json({ error: "No file uploaded" });
        return;
      }

      const body = parseSubmitTranscriptionRequest(req.body);
      const { job, dispatch } = await this.submitTranscriptionUseCase.execute({
        file: req.file,
        model: body.model,
        keepSourceLanguage: body.keepSourceLanguage,
        skipSubtitle: body.skipSubtitle,
        segmentLengthSec: body.segmentLength,
      });

      const response: SubmitTranscriptionResponse = {
        jobId: job.id,
        status: job.status,
        message: job.message,
        dispatch,
      };
      res.status(202).json(response);
    } catch (error) {
      this.sendError(res, error, "Failed to submit transcription");
    }
  }

  async getStatus(req: HttpRequest, res: HttpResponse): Promise<void> {
    try {
      const job = await this.getJobStatusUseCase.execute(this.jobId(req));
      res.status(200).json(toJobStatusResponse(job));
    } catch (error) {
      this.sendError(res, error, "Failed to get job status");
    }
  }

  async pause(req: HttpRequest, res: HttpResponse): Promise<void> {
    try {
      const job = await this.pauseJobUseCase.execute(this.jobId(req));
      res.status(202).json(toJobStatusResponse(job));
    } catch (error) {
      this.sendError(res, error, "Failed to pause job");
    }
  }

  async resume(req: HttpRequest, res: HttpResponse): Promise<void> {
    try {
      const { job } = await this.resumeJobUseCase.execute(this.jobId(req));
      res.status(202).json(toJobStatusResponse(job));
    } catch (error) {
      this.sendError(res, error, "Failed to resume job");
    }
  }

  async cancel(req: HttpRequest, res: HttpResponse): Promise<void> {
    try {
      const job = await this.cancelJobUseCase.execute(this.jobId(req));
      res.status(200).json(toJobStatusResponse(job));
    } catch (error) {
      this.sendError(res, error, "Failed to cancel job");
    }
  }

  async fetchOutput(req: HttpRequest, res: HttpResponse): Promise<void> {
    try {
      const { artifact, content } = await this.fetchOutputUseCase.execute({
        jobId: this.jobId(req),
        kind: parseOutputKind(req.query.kind),
      });

      res.setHeader("Content-Type", artifact.contentType);
      res.setHeader("Content-Disposition", `attachment; filename="${artifact.filename.replace(/["\\\r\n]/g, "_")}"`);
      res.status(200).send(content);
    } catch (error) {
      this.sendError(res, error, "Failed to fetch output");
    }
  }

  listModels(_req: HttpRequest, res: HttpResponse): void {
    res.status(200).json({
      defaultModel: this.defaultModel,
      models: SUPPORTED_MODELS.map((id) => ({
        id,
        translation: supportsTranslation(id),
        timestamps: supportsTimestamps(id),
      })),
    });
  }

  private jobId(req: HttpRequest): string {
    const jobId = req.params.jobId?.trim();
    if (!jobId) {
      throw new ValidationError("jobId is required");
    }
    return jobId;
  }

  private sendError(res: HttpResponse, error: unknown, fallback: string): void {
    if (error instanceof ValidationError) {
      res.status(400).json({ error: error.message });
      return;
    }
    if (error instanceof NotFoundError) {
      res.status(404).json({ error: error.message });
      return;
    }
    if (error instanceof IllegalTransitionError) {
      res.status(409).json({ error: error.message, currentStatus: error.currentStatus });
      return;
    }
    console.error(`[TranscriptionController] ${fallback}:`, error);
    res.status(500).json({ error: errorMessage(error) || fallback });
  }
}

function parseOutputKind(value: unknown): OutputKind | undefined {
  if (value === undefined || value === "") {
    return undefined;
  }
  if (value === "subtitle" || value === "transcript") {
    return value;
  }
  throw new ValidationError('kind must be "subtitle" or "transcript"');
}
