import { describe, it, expect, beforeEach, vi } from "vitest";
import { createHarness, fakeMedia, EXPECTED_TRANSCRIPT_90S, type Harness } from "../../../__tests__/fakes";
import { TranscriptionController, type HttpRequest, type HttpResponse } from "../transcription.controller";
import { GetJobStatusUseCase } from "../../../application/use-cases/get-job-status.use-case";

class FakeResponse implements HttpResponse {
  statusCode = 0;
  body: unknown;
  sent?: Buffer;
  headers: Record<string, string> = {};

  status(code: number): HttpResponse {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): void {
    this.body = body;
  }

  setHeader(name: string, value: string): void {
    this.headers[name] = value;
  }

  send(body: Buffer): void {
    this.sent = body;
  }
}

function request(overrides: Partial<HttpRequest> = {}): HttpRequest {
  return { params: {}, query: {}, body: {}, ...overrides };
}

describe("TranscriptionController", () => {
  let harness: Harness;
  let controller: TranscriptionController;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    harness = createHarness();
    controller = new TranscriptionController(
      harness.submit,
      harness.getStatus,
      harness.pause,
      harness.resume,
      harness.cancel,
      harness.fetchOutput,
      "whisper-1"
    );
  });

  async function submitted(durationSec: number, body: unknown = {}): Promise<string> {
    const res = new FakeResponse();
    await controller.submit(
      request({ body, file: { buffer: fakeMedia(durationSec), originalname: "talk.mp3", mimetype: "audio/mpeg" } }),
      res
    );
    expect(res.statusCode).toBe(202);
    const responseBody = res.body;
    if (typeof responseBody !== "object" || responseBody === null || !("jobId" in responseBody) || typeof responseBody.jobId !== "string") {
      throw new Error("submit did not return a job id");
    }
    return responseBody.jobId;
  }

  describe("submit", () => {
    it("answers 202 with the job id and dispatch outcome", async () => {
      const res = new FakeResponse();

      await controller.submit(
        request({
          body: { keepSourceLanguage: "false", segmentLength: "30" },
          file: { buffer: fakeMedia(30), originalname: "talk.mp3", mimetype: "audio/mpeg" },
        }),
        res
      );
      await harness.dispatcher.waitForIdle();

      expect(res.statusCode).toBe(202);
      expect(res.body).toMatchObject({ dispatch: "started" });
      expect((await harness.jobStore.findByStatus(["completed", "error"], 10)).map((job) => job.status)).toEqual(["completed"]);
    });

    it("answers 400 without a file", async () => {
      const res = new FakeResponse();

      await controller.submit(request(), res);

      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({ error: "No file uploaded" });
    });

    it("answers 400 for malformed options", async () => {
      const res = new FakeResponse();

      await controller.submit(
        request({
          body: { skipSubtitle: "maybe" },
          file: { buffer: fakeMedia(30), originalname: "talk.mp3", mimetype: "audio/mpeg" },
        }),
        res
      );

      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({ error: "skipSubtitle must be a boolean" });
    });

    it("answers 400 for a segment length out of range", async () => {
      const res = new FakeResponse();

      await controller.submit(
        request({
          body: { segmentLength: "1" },
          file: { buffer: fakeMedia(30), originalname: "talk.mp3", mimetype: "audio/mpeg" },
        }),
        res
      );

      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({ error: "segmentLength must be between 5 and 600 seconds" });
    });
  });

  describe("getStatus", () => {
    it("reports a completed job with its outputs", async () => {
      const jobId = await submitted(90);
      await harness.dispatcher.waitForIdle();
      const res = new FakeResponse();

      await controller.getStatus(request({ params: { jobId } }), res);

      expect(res.statusCode).toBe(200);
      expect(res.body).toMatchObject({
        jobId,
        status: "completed",
        progress: 100,
        message: "Transcription complete",
        paused: false,
        outputReady: true,
        subtitleFilename: "talk.srt",
        segmentCount: 3,
        completedSegments: 3,
      });
    });

    it("answers 404 for an unknown job", async () => {
      const res = new FakeResponse();

      await controller.getStatus(request({ params: { jobId: "missing" } }), res);

      expect(res.statusCode).toBe(404);
      expect(res.body).toEqual({ error: "Transcription job missing not found" });
    });

    it("answers 400 without a job id", async () => {
      const res = new FakeResponse();

      await controller.getStatus(request({ params: { jobId: "  " } }), res);

      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({ error: "jobId is required" });
    });

    it("answers 500 when the store fails", async () => {
      const failing = new GetJobStatusUseCase(harness.ledger);
      vi.spyOn(failing, "execute").mockRejectedValue(new Error("connection reset"));
      controller = new TranscriptionController(
        harness.submit,
        failing,
        harness.pause,
        harness.resume,
        harness.cancel,
        harness.fetchOutput,
        "whisper-1"
      );
      const res = new FakeResponse();

      await controller.getStatus(request({ params: { jobId: "any" } }), res);

      expect(res.statusCode).toBe(500);
      expect(res.body).toEqual({ error: "connection reset" });
    });
  });

  describe("pause and resume", () => {
    it("answers 202 for a pause request and 409 for a second resume", async () => {
      harness.engine.hold(0);
      const jobId = await submitted(90);
      await harness.engine.waitUntilCalled(0);

      const pauseRes = new FakeResponse();
      await controller.pause(request({ params: { jobId } }), pauseRes);
      expect(pauseRes.statusCode).toBe(202);
      expect(pauseRes.body).toMatchObject({ status: "processing", pauseRequested: true, paused: false });

      harness.engine.release(0);
      await harness.dispatcher.waitForIdle();

      const statusRes = new FakeResponse();
      await controller.getStatus(request({ params: { jobId } }), statusRes);
      expect(statusRes.body).toMatchObject({ status: "paused", paused: true, progress: 33 });

      harness.engine.hold(1);
      const resumeRes = new FakeResponse();
      await controller.resume(request({ params: { jobId } }), resumeRes);
      expect(resumeRes.statusCode).toBe(202);

      const again = new FakeResponse();
      await controller.resume(request({ params: { jobId } }), again);
      expect(again.statusCode).toBe(409);
      expect(again.body).toMatchObject({ currentStatus: "processing" });

      harness.engine.release(1);
      await harness.dispatcher.waitForIdle();
    });

    it("answers 409 when pausing a completed job", async () => {
      const jobId = await submitted(30);
      await harness.dispatcher.waitForIdle();
      const res = new FakeResponse();

      await controller.pause(request({ params: { jobId } }), res);

      expect(res.statusCode).toBe(409);
      expect(res.body).toEqual({
        error: `Cannot pause job ${jobId} while it is completed`,
        currentStatus: "completed",
      });
    });
  });

  describe("cancel", () => {
    it("answers 200 with the failed job", async () => {
      const job = await harness.ledger.create({
        config: { model: "whisper-1", keepSourceLanguage: false, skipSubtitle: false, segmentLengthSec: 30 },
        originalFilename: "talk.mp3",
      });
      const res = new FakeResponse();

      await controller.cancel(request({ params: { jobId: job.id } }), res);

      expect(res.statusCode).toBe(200);
      expect(res.body).toMatchObject({ status: "error", error: "Cancelled by operator" });
    });
  });

  describe("fetchOutput", () => {
    it("sends the transcript as an attachment", async () => {
      const jobId = await submitted(90);
      await harness.dispatcher.waitForIdle();
      const res = new FakeResponse();

      await controller.fetchOutput(request({ params: { jobId }, query: { kind: "transcript" } }), res);

      expect(res.statusCode).toBe(200);
      expect(res.headers).toEqual({
        "Content-Type": "text/plain; charset=utf-8",
        "Content-Disposition": 'attachment; filename="talk.txt"',
      });
      expect(res.sent?.toString("utf-8")).toBe(EXPECTED_TRANSCRIPT_90S);
    });

    it("answers 404 while the job is still running", async () => {
      harness.engine.hold(0);
      const jobId = await submitted(30);
      await harness.engine.waitUntilCalled(0);
      const res = new FakeResponse();

      await controller.fetchOutput(request({ params: { jobId } }), res);

      expect(res.statusCode).toBe(404);
      expect(res.body).toEqual({ error: `Output for job ${jobId} is not ready (status: processing)` });
      harness.engine.release(0);
      await harness.dispatcher.waitForIdle();
    });

    it("answers 400 for an unknown output kind", async () => {
      const res = new FakeResponse();

      await controller.fetchOutput(request({ params: { jobId: "any" }, query: { kind: "video" } }), res);

      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({ error: 'kind must be "subtitle" or "transcript"' });
    });
  });

  describe("listModels", () => {
    it("lists the supported models and their capabilities", () => {
      const res = new FakeResponse();

      controller.listModels(request(), res);

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({
        defaultModel: "whisper-1",
        models: [
          { id: "whisper-1", translation: true, timestamps: true },
          { id: "gpt-4o-transcribe", translation: false, timestamps: false },
          { id: "gpt-4o-mini-transcribe", translation: false, timestamps: false },
        ],
      });
    });
  });
});
