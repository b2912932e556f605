import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath, pathToFileURL } from "url";
import { artifactPath, sanitizeFilename } from "../artifact-path";
import { InMemoryArtifactStore } from "../in.memory.artifact.store";
import { LocalArtifactStore } from "../local.artifact.store";
import { NotFoundError } from "../../../domain/errors/job.errors";

describe("artifactPath", () => {
  it("lays artifacts out by kind and job", () => {
    expect(artifactPath("chunk", "job-1", "segment-00002.json")).toBe("chunk/job-1/segment-00002.json");
  });

  it("reduces filenames to one safe path segment", () => {
    expect(sanitizeFilename("../../etc/passwd")).toBe("passwd");
    expect(sanitizeFilename("C:\\uploads\\my talk (final).mp3")).toBe("my_talk__final_.mp3");
    expect(sanitizeFilename("..hidden")).toBe("hidden");
    expect(sanitizeFilename("")).toBe("artifact");
    expect(sanitizeFilename("a".repeat(300))).toHaveLength(200);
  });
});

describe("InMemoryArtifactStore", () => {
  it("returns a copy of what was stored", async () => {
    const store = new InMemoryArtifactStore();
    const bytes = Buffer.from("hello");

    const ref = await store.put("transcript", "job-1", "talk.txt", bytes, "text/plain");
    bytes.write("HELLO");

    expect(ref).toMatchObject({
      kind: "transcript",
      location: "memory://transcript/job-1/talk.txt",
      filename: "talk.txt",
      contentType: "text/plain",
      size: 5,
    });
    expect((await store.get(ref.location)).toString()).toBe("hello");
  });

  it("throws NotFoundError once an artifact is deleted", async () => {
    const store = new InMemoryArtifactStore();
    const ref = await store.put("input", "job-1", "talk.mp3", Buffer.from("audio"));

    await store.delete(ref.location);
    await store.delete(ref.location);

    expect(store.has(ref.location)).toBe(false);
    await expect(store.get(ref.location)).rejects.toThrow(NotFoundError);
  });
});

describe("LocalArtifactStore", () => {
  let workDir: string;
  let store: LocalArtifactStore;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "artifact-store-"));
    store = new LocalArtifactStore(workDir);
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("writes artifacts below the working directory", async () => {
    const ref = await store.put("subtitle", "job-1", "talk.srt", Buffer.from("1\n"), "application/x-subrip");

    expect(ref.location).toBe(pathToFileURL(join(workDir, "subtitle", "job-1", "talk.srt")).href);
    expect(ref.size).toBe(2);
    expect((await readFile(fileURLToPath(ref.location))).toString()).toBe("1\n");
    expect((await store.get(ref.location)).toString()).toBe("1\n");
  });

  it("deletes artifacts and ignores ones already gone", async () => {
    const ref = await store.put("chunk", "job-1", "segment-00000.json", Buffer.from("{}"));

    await store.delete(ref.location);
    await store.delete(ref.location);

    await expect(store.get(ref.location)).rejects.toThrow(NotFoundError);
  });

  it("refuses locations it did not hand out", async () => {
    await expect(store.get("memory://input/job-1/talk.mp3")).rejects.toThrow("Not a local artifact location");
    await expect(store.get(pathToFileURL(join(tmpdir(), "elsewhere.txt")).href)).rejects.toThrow(NotFoundError);
  });
});
