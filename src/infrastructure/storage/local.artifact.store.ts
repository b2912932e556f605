import { mkdir, readFile, rm, writeFile } from "fs/promises";
import { dirname, resolve, sep } from "path";
import { fileURLToPath, pathToFileURL } from "url";
import type { ArtifactRef } from "../../domain/entities/artifact";
import type { ArtifactKind } from "../../domain/enums/artifact.kind";
import type { IArtifactStore } from "../../domain/interfaces/iartifact.store";
import { NotFoundError } from "../../domain/errors/job.errors";
import { artifactPath } from "./artifact-path";

/**
 * Stores artifacts as files below a working directory, addressed by file:// URLs.
 */
export class LocalArtifactStore implements IArtifactStore {
  private readonly root: string;

  constructor(workDir: string) {
    this.root = resolve(workDir);
  }

  async put(
    kind: ArtifactKind,
    jobId: string,
    filename: string,
    bytes: Buffer,
    contentType = "application/octet-stream"
  ): Promise<ArtifactRef> {
    const path = resolve(this.root, artifactPath(kind, jobId, filename));
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, bytes);

    return {
      kind,
      location: pathToFileURL(path).href,
      filename,
      contentType,
      size: bytes.length,
      createdAt: new Date(),
    };
  }

  async get(location: string): Promise<Buffer> {
    const path = this.toPath(location);
    try {
      return await readFile(path);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError(`Artifact not found: ${location}`, { cause: error });
      }
      throw error;
    }
  }

  async delete(location: string): Promise<void> {
    await rm(this.toPath(location), { force: true });
  }

  private toPath(location: string): string {
    if (!location.startsWith("file://")) {
      throw new NotFoundError(`Not a local artifact location: ${location}`);
    }
    const path = fileURLToPath(location);
    // Only locations this store handed out are readable
    if (!path.startsWith(this.root + sep)) {
      throw new NotFoundError(`Artifact outside of ${this.root}: ${location}`);
    }
    return path;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
