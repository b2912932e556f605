import express from "express";
import cors from "cors";
import multer from "multer";
import type { Server } from "http";
import { config } from "./infrastructure/config/app.config";
import { connectToMongoDB, closeMongoDBConnection } from "./infrastructure/database/mongodb.connection";
import { TranscriptionJobRepository } from "./infrastructure/database/repositories/transcription-job.repository";
import { InMemoryJobStore } from "./infrastructure/storage/in.memory.job.store";
import { InMemoryArtifactStore } from "./infrastructure/storage/in.memory.artifact.store";
import { LocalArtifactStore } from "./infrastructure/storage/local.artifact.store";
import { S3ArtifactStorage } from "./infrastructure/aws/s3.artifact.storage";
import { OpenAITranscriptionEngine } from "./infrastructure/openai/openai.transcription.engine";
import { FfmpegAudioDecoder } from "./infrastructure/audio/ffmpeg.audio.decoder";
import { JobRecoveryCron } from "./infrastructure/cron/job-recovery.cron";
import { ArtifactRetentionCron } from "./infrastructure/cron/artifact-retention.cron";
import { JobLedger } from "./application/ledger/job-ledger";
import { JobRunner } from "./application/runner/job-runner";
import { JobDispatcher } from "./application/dispatcher/job-dispatcher";
import { JobArtifactsService } from "./application/services/job-artifacts.service";
import { SubmitTranscriptionUseCase } from "./application/use-cases/submit-transcription.use-case";
import { GetJobStatusUseCase } from "./application/use-cases/get-job-status.use-case";
import { PauseJobUseCase } from "./application/use-cases/pause-job.use-case";
import { ResumeJobUseCase } from "./application/use-cases/resume-job.use-case";
import { CancelJobUseCase } from "./application/use-cases/cancel-job.use-case";
import { FetchOutputUseCase } from "./application/use-cases/fetch-output.use-case";
import { ResumeIncompleteJobsUseCase } from "./application/use-cases/resume-incomplete-jobs.use-case";
import { PurgeExpiredJobsUseCase } from "./application/use-cases/purge-expired-jobs.use-case";
import { TranscriptionController } from "./presentation/controllers/transcription.controller";
import { createTranscriptionRoutes } from "./presentation/routes/transcription.routes";
import { TRANSCRIPTIONS_PATH } from "./presentation/dto/job-status.dto";
import { errorMessage } from "./domain/errors/job.errors";
import type { IJobStore } from "./domain/interfaces/ijob.store";
import type { IArtifactStore } from "./domain/interfaces/iartifact.store";

async function createJobStore(): Promise<IJobStore> {
  if (config.storage.jobStore === "memory") {
    console.warn("Warning: JOB_STORE=memory, jobs will not survive a restart");
    return new InMemoryJobStore();
  }
  const db = await connectToMongoDB();
  return new TranscriptionJobRepository(db);
}

function createArtifactStore(): IArtifactStore {
  switch (config.storage.artifacts) {
    case "memory":
      return new InMemoryArtifactStore();
    case "local":
      return new LocalArtifactStore(config.storage.workDir);
    case "s3": {
      const bucket = config.aws.s3Bucket;
      if (!bucket) {
        throw new Error("S3_BUCKET environment variable is required when ARTIFACT_BACKEND=s3");
      }
      return new S3ArtifactStorage({
        bucket,
        prefix: config.aws.s3Prefix,
        region: config.aws.region,
        credentials:
          config.aws.accessKeyId && config.aws.secretAccessKey
            ? { accessKeyId: config.aws.accessKeyId, secretAccessKey: config.aws.secretAccessKey }
            : undefined,
        endpoint: config.aws.s3Endpoint,
        forcePathStyle: config.aws.s3ForcePathStyle,
      });
    }
  }
}

async function main() {
  // Initialize storage
  const jobStore = await createJobStore();
  const artifactStore = createArtifactStore();

  // Initialize orchestration
  const ledger = new JobLedger(jobStore);
  const jobArtifacts = new JobArtifactsService(ledger, artifactStore);
  const runner = new JobRunner(
    ledger,
    artifactStore,
    jobArtifacts,
    new FfmpegAudioDecoder({ ffmpegPath: config.ffmpegPath }),
    new OpenAITranscriptionEngine(config.openaiApiKey),
    {
      maxAttempts: config.transcription.maxAttempts,
      backoffMs: config.transcription.retryBackoffMs,
    }
  );
  const dispatcher = new JobDispatcher(ledger, runner, {
    maxConcurrentJobs: config.jobs.maxConcurrent,
    lockTimeoutMs: config.jobs.lockTimeoutMs,
  });

  // Initialize use cases
  const submitTranscriptionUseCase = new SubmitTranscriptionUseCase(ledger, artifactStore, dispatcher, {
    model: config.transcription.defaultModel,
    segmentLengthSec: config.transcription.segmentLengthSec,
  });
  const getJobStatusUseCase = new GetJobStatusUseCase(ledger);
  const pauseJobUseCase = new PauseJobUseCase(ledger);
  const resumeJobUseCase = new ResumeJobUseCase(ledger, dispatcher);
  const cancelJobUseCase = new CancelJobUseCase(ledger, jobArtifacts);
  const fetchOutputUseCase = new FetchOutputUseCase(ledger, artifactStore);
  const resumeIncompleteJobsUseCase = new ResumeIncompleteJobsUseCase(ledger, dispatcher);
  const purgeExpiredJobsUseCase = new PurgeExpiredJobsUseCase(ledger, jobArtifacts);

  // Initialize controllers
  const transcriptionController = new TranscriptionController(
    submitTranscriptionUseCase,
    getJobStatusUseCase,
    pauseJobUseCase,
    resumeJobUseCase,
    cancelJobUseCase,
    fetchOutputUseCase,
    config.transcription.defaultModel
  );

  // Initialize Express app
  const app = express();

  // Enable CORS for all origins
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      activeJobs: dispatcher.activeCount,
      pendingJobs: dispatcher.pendingCount,
      timestamp: new Date().toISOString(),
    });
  });

  // Routes
  app.use(
    TRANSCRIPTIONS_PATH,
    createTranscriptionRoutes(transcriptionController, { maxUploadBytes: config.maxUploadBytes })
  );

  // Error handling middleware
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof multer.MulterError) {
      res.status(err.code === "LIMIT_FILE_SIZE" ? 413 : 400).json({ error: err.message });
      return;
    }
    console.error("Error:", err);
    res.status(500).json({ error: errorMessage(err) || "Internal server error" });
  });

  // Background maintenance
  const jobRecoveryCron = new JobRecoveryCron(resumeIncompleteJobsUseCase);
  const artifactRetentionCron = new ArtifactRetentionCron(purgeExpiredJobsUseCase, {
    retentionMs: config.jobs.outputRetentionMs,
    downloadGraceMs: config.jobs.downloadGraceMs,
  });

  // Pick up jobs interrupted by the previous shutdown before accepting new ones
  await jobRecoveryCron.runOnce();
  jobRecoveryCron.start();
  artifactRetentionCron.start();

  const server: Server = app.listen(config.port, () => {
    console.log(`Transcription service running on port ${config.port}`);
    console.log(`Health check: http://localhost:${config.port}/health`);
    console.log(`API endpoints: http://localhost:${config.port}/api/transcriptions`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`${signal} received, shutting down gracefully`);

    jobRecoveryCron.stop();
    artifactRetentionCron.stop();
    server.close();

    // Runners finish their current segment; unfinished jobs are recovered on the next start
    await dispatcher.shutdown();
    await closeMongoDBConnection();
    process.exit(0);
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error("Error during shutdown:", error);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
