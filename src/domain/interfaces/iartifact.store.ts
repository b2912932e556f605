import type { ArtifactRef } from "../entities/artifact";
import type { ArtifactKind } from "../enums/artifact.kind";

export interface IArtifactStore {
    put(
      kind: ArtifactKind,
      jobId: string,
      filename: string,
      bytes: Buffer,
      contentType?: string
    ): Promise<ArtifactRef>;
    /** Throws NotFoundError when nothing is stored at the location. */
    get(location: string): Promise<Buffer>;
    /** Deleting a missing artifact is not an error. */
    delete(location: string): Promise<void>;
}
