/**
 * Application configuration
 * Centralizes all environment variables with type safety and default values
 */

import dotenv from "dotenv";

// Load environment variables from .env file
dotenv.config();

export type JobStoreBackend = "mongodb" | "memory";
export type ArtifactBackend = "s3" | "local" | "memory";

export interface AppConfig {
  // Server
  port: number;
  maxUploadBytes: number;

  // OpenAI
  openaiApiKey: string;

  // AWS S3
  aws: {
    accessKeyId?: string;
    secretAccessKey?: string;
    region: string;
    s3Bucket?: string;
    s3Prefix: string;
    s3Endpoint?: string; // For S3-compatible services
    s3ForcePathStyle?: boolean; // Use path-style addressing
  };

  // MongoDB
  mongodb: {
    uri: string;
    dbName: string;
  };

  storage: {
    jobStore: JobStoreBackend;
    artifacts: ArtifactBackend;
    workDir: string; // Root directory of the local artifact backend
  };

  ffmpegPath: string;

  transcription: {
    defaultModel: string;
    segmentLengthSec: number;
    maxAttempts: number; // Engine attempts per segment
    retryBackoffMs: number;
  };

  jobs: {
    lockTimeoutMs: number;
    maxConcurrent: number;
    outputRetentionMs: number;
    downloadGraceMs: number;
  };
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function oneOf<T extends string>(name: string, allowed: readonly T[], fallback: T): T {
  const raw = process.env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const match = allowed.find((candidate) => candidate === raw);
  if (!match) {
    throw new Error(`${name} must be one of ${allowed.join(", ")}, got "${raw}"`);
  }
  return match;
}

export function getConfig(): AppConfig {
  // Validate required environment variables
  const openaiApiKey = process.env.OPENAI_API_KEY;
  if (!openaiApiKey) {
    throw new Error("OPENAI_API_KEY environment variable is required");
  }

  const artifacts = oneOf<ArtifactBackend>("ARTIFACT_BACKEND", ["s3", "local", "memory"], "local");
  if (artifacts === "s3" && !process.env.S3_BUCKET) {
    throw new Error("S3_BUCKET environment variable is required when ARTIFACT_BACKEND=s3");
  }

  return {
    port: intFromEnv("PORT", 3000),
    maxUploadBytes: intFromEnv("MAX_UPLOAD_MB", 500) * 1024 * 1024,

    openaiApiKey,

    aws: {
      accessKeyId: process.env.AWS_ACCESS_KEY_ID,
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY,
      region: (process.env.AWS_REGION || process.env.AWS_DEFAULT_REGION || "us-east-1").trim(),
      s3Bucket: process.env.S3_BUCKET,
      s3Prefix: process.env.S3_PREFIX || "transcriptions",
      s3Endpoint: process.env.S3_ENDPOINT,
      s3ForcePathStyle: process.env.S3_FORCE_PATH_STYLE === "true",
    },

    mongodb: {
      uri: process.env.MONGODB_URI || "mongodb://localhost:27017",
      dbName: process.env.MONGODB_DB_NAME || "transcription-service",
    },

    storage: {
      jobStore: oneOf<JobStoreBackend>("JOB_STORE", ["mongodb", "memory"], "mongodb"),
      artifacts,
      workDir: process.env.WORK_DIR || "./data/artifacts",
    },

    ffmpegPath: process.env.FFMPEG_PATH || "ffmpeg",

    transcription: {
      defaultModel: process.env.DEFAULT_MODEL || "whisper-1",
      segmentLengthSec: intFromEnv("TRANSCRIPT_SEGMENT_LENGTH", 60),
      maxAttempts: intFromEnv("ENGINE_MAX_ATTEMPTS", 3),
      retryBackoffMs: intFromEnv("ENGINE_RETRY_BACKOFF_MS", 1000),
    },

    jobs: {
      lockTimeoutMs: intFromEnv("JOB_LOCK_TIMEOUT_MS", 30 * 60 * 1000),
      maxConcurrent: intFromEnv("MAX_CONCURRENT_JOBS", 2),
      outputRetentionMs: intFromEnv("OUTPUT_RETENTION_HOURS", 24) * 60 * 60 * 1000,
      downloadGraceMs: intFromEnv("DOWNLOAD_GRACE_MINUTES", 10) * 60 * 1000,
    },
  };
}

export const config = getConfig();
