import { describe, it, expect, beforeEach, vi } from "vitest";
import * as cron from "node-cron";
import { JobRecoveryCron } from "../job-recovery.cron";
import { ArtifactRetentionCron } from "../artifact-retention.cron";
import { createHarness, submitMedia, type Harness } from "../../../__tests__/fakes";

vi.mock("node-cron", () => ({
  schedule: vi.fn(() => ({ stop: vi.fn() })),
}));

const RETENTION = { retentionMs: 24 * 60 * 60 * 1000, downloadGraceMs: 10 * 60 * 1000 };

describe("JobRecoveryCron", () => {
  let harness: Harness;

  beforeEach(() => {
    vi.mocked(cron.schedule).mockClear();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    harness = createHarness();
  });

  it("schedules one recovery cycle per minute", () => {
    const recovery = new JobRecoveryCron(harness.resumeIncomplete);

    recovery.start();
    recovery.start();

    expect(cron.schedule).toHaveBeenCalledTimes(1);
    expect(vi.mocked(cron.schedule).mock.calls[0][0]).toBe("* * * * *");
    expect(recovery.isActive()).toBe(true);

    const task = vi.mocked(cron.schedule).mock.results[0].value;
    recovery.stop();

    expect(task.stop).toHaveBeenCalledTimes(1);
    expect(recovery.isActive()).toBe(false);
  });

  it("dispatches unclaimed jobs", async () => {
    const job = await harness.ledger.create({
      config: { model: "whisper-1", keepSourceLanguage: false, skipSubtitle: false, segmentLengthSec: 30 },
      originalFilename: "talk.mp3",
    });
    const input = await harness.artifactStore.put("input", job.id, "talk.mp3", Buffer.from("audio:30"));
    await harness.ledger.update(job.id, () => ({ inputArtifact: input }));

    const result = await new JobRecoveryCron(harness.resumeIncomplete).runOnce();
    await harness.dispatcher.waitForIdle();

    expect(result?.processed).toBe(1);
    expect((await harness.ledger.get(job.id)).status).toBe("completed");
  });

  it("skips a cycle while the previous one is still running", async () => {
    let finish: () => void = () => {};
    vi.spyOn(harness.resumeIncomplete, "execute").mockImplementation(
      () =>
        new Promise((resolve) => {
          finish = () => resolve({ processed: 0, skipped: 0, errors: 0, results: [] });
        })
    );
    const recovery = new JobRecoveryCron(harness.resumeIncomplete);

    const first = recovery.runOnce();
    expect(await recovery.runOnce()).toBeNull();
    finish();

    expect(await first).toEqual({ processed: 0, skipped: 0, errors: 0, results: [] });
  });

  it("reports a failed cycle as null", async () => {
    vi.spyOn(harness.resumeIncomplete, "execute").mockRejectedValue(new Error("database unavailable"));

    expect(await new JobRecoveryCron(harness.resumeIncomplete).runOnce()).toBeNull();
  });
});

describe("ArtifactRetentionCron", () => {
  let harness: Harness;

  beforeEach(() => {
    vi.mocked(cron.schedule).mockClear();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    harness = createHarness();
  });

  it("schedules a sweep every ten minutes", () => {
    const retention = new ArtifactRetentionCron(harness.purge, RETENTION);

    retention.start();

    expect(vi.mocked(cron.schedule).mock.calls[0][0]).toBe("*/10 * * * *");
    retention.stop();
    expect(retention.isActive()).toBe(false);
  });

  it("passes the retention settings to the purge", async () => {
    const execute = vi.spyOn(harness.purge, "execute");
    await submitMedia(harness, 30);
    await harness.dispatcher.waitForIdle();

    const result = await new ArtifactRetentionCron(harness.purge, RETENTION).runOnce();

    expect(execute).toHaveBeenCalledWith(RETENTION);
    expect(result).toEqual({ purged: 0, errors: 0 });
  });
});
