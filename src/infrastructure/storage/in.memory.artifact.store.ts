import type { ArtifactRef } from "../../domain/entities/artifact";
import type { ArtifactKind } from "../../domain/enums/artifact.kind";
import type { IArtifactStore } from "../../domain/interfaces/iartifact.store";
import { NotFoundError } from "../../domain/errors/job.errors";
import { artifactPath } from "./artifact-path";

const SCHEME = "memory://";

/**
 * Process-local artifact backend for development and tests.
 */
export class InMemoryArtifactStore implements IArtifactStore {
  private objects = new Map<string, Buffer>();

  async put(
    kind: ArtifactKind,
    jobId: string,
    filename: string,
    bytes: Buffer,
    contentType = "application/octet-stream"
  ): Promise<ArtifactRef> {
    const location = `${SCHEME}${artifactPath(kind, jobId, filename)}`;
    this.objects.set(location, Buffer.from(bytes));
    return {
      kind,
      location,
      filename,
      contentType,
      size: bytes.length,
      createdAt: new Date(),
    };
  }

  async get(location: string): Promise<Buffer> {
    const bytes = this.objects.get(location);
    if (!bytes) {
      throw new NotFoundError(`Artifact not found: ${location}`);
    }
    return Buffer.from(bytes);
  }

  async delete(location: string): Promise<void> {
    this.objects.delete(location);
  }

  has(location: string): boolean {
    return this.objects.has(location);
  }

  get size(): number {
    return this.objects.size;
  }
}
