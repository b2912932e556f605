import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

const OPTIONAL_VARIABLES = [
  "PORT",
  "MAX_UPLOAD_MB",
  "ARTIFACT_BACKEND",
  "JOB_STORE",
  "S3_BUCKET",
  "DEFAULT_MODEL",
  "TRANSCRIPT_SEGMENT_LENGTH",
  "ENGINE_MAX_ATTEMPTS",
  "ENGINE_RETRY_BACKOFF_MS",
  "JOB_LOCK_TIMEOUT_MS",
  "MAX_CONCURRENT_JOBS",
  "OUTPUT_RETENTION_HOURS",
  "DOWNLOAD_GRACE_MINUTES",
];

async function loadGetConfig() {
  vi.resetModules();
  const loaded = await import("../app.config");
  return loaded.getConfig;
}

describe("getConfig", () => {
  beforeEach(() => {
    vi.stubEnv("OPENAI_API_KEY", "test-secret");
    for (const name of OPTIONAL_VARIABLES) {
      vi.stubEnv(name, "");
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("falls back to defaults for unset variables", async () => {
    const config = (await loadGetConfig())();

    expect(config.port).toBe(3000);
    expect(config.maxUploadBytes).toBe(500 * 1024 * 1024);
    expect(config.storage).toMatchObject({ jobStore: "mongodb", artifacts: "local" });
    expect(config.transcription).toEqual({
      defaultModel: "whisper-1",
      segmentLengthSec: 60,
      maxAttempts: 3,
      retryBackoffMs: 1000,
    });
    expect(config.jobs).toEqual({
      lockTimeoutMs: 30 * 60 * 1000,
      maxConcurrent: 2,
      outputRetentionMs: 24 * 60 * 60 * 1000,
      downloadGraceMs: 10 * 60 * 1000,
    });
  });

  it("reads overrides from the environment", async () => {
    const getConfig = await loadGetConfig();
    vi.stubEnv("TRANSCRIPT_SEGMENT_LENGTH", "30");
    vi.stubEnv("JOB_STORE", "memory");
    vi.stubEnv("ARTIFACT_BACKEND", "s3");
    vi.stubEnv("S3_BUCKET", "media-bucket");

    const config = getConfig();

    expect(config.transcription.segmentLengthSec).toBe(30);
    expect(config.storage.jobStore).toBe("memory");
    expect(config.storage.artifacts).toBe("s3");
    expect(config.aws.s3Bucket).toBe("media-bucket");
  });

  it("requires an OpenAI API key", async () => {
    const getConfig = await loadGetConfig();
    vi.stubEnv("OPENAI_API_KEY", "");

    expect(() => getConfig()).toThrow("OPENAI_API_KEY environment variable is required");
  });

  it("requires a bucket for the S3 backend", async () => {
    const getConfig = await loadGetConfig();
    vi.stubEnv("ARTIFACT_BACKEND", "s3");

    expect(() => getConfig()).toThrow("S3_BUCKET environment variable is required when ARTIFACT_BACKEND=s3");
  });

  it("rejects malformed values", async () => {
    const getConfig = await loadGetConfig();

    vi.stubEnv("MAX_CONCURRENT_JOBS", "many");
    expect(() => getConfig()).toThrow('MAX_CONCURRENT_JOBS must be an integer, got "many"');

    vi.stubEnv("MAX_CONCURRENT_JOBS", "");
    vi.stubEnv("JOB_STORE", "redis");
    expect(() => getConfig()).toThrow('JOB_STORE must be one of mongodb, memory, got "redis"');
  });
});
