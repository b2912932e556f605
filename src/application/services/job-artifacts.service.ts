import type { ArtifactRef } from "../../domain/entities/artifact";
import type { TranscriptionJob } from "../../domain/entities/transcription-job";
import type { IArtifactStore } from "../../domain/interfaces/iartifact.store";
import { errorMessage } from "../../domain/errors/job.errors";
import { JobLedger } from "../ledger/job-ledger";

/**
 * Lifecycle rules for a job's artifacts: input and chunks go away once the job
 * is terminal, outputs stay until retention purges them.
 */
export class JobArtifactsService {
  constructor(
    private ledger: JobLedger,
    private artifactStore: IArtifactStore
  ) {}

  /**
   * Delete the input media and intermediate chunks of a terminal job and drop the references.
   */
  async discardWorkingArtifacts(job: TranscriptionJob): Promise<void> {
    const artifacts = [
      ...(job.inputArtifact ? [job.inputArtifact] : []),
      ...job.chunkArtifacts,
    ];
    if (artifacts.length === 0) {
      return;
    }

    await this.deleteAll(job.id, artifacts);
    await this.ledger.update(job.id, () => ({ inputArtifact: undefined, chunkArtifacts: [] }));
    console.log(`[JobArtifacts] Discarded ${artifacts.length} working artifact(s) of job ${job.id}`);
  }

  async discardOutputs(job: TranscriptionJob): Promise<void> {
    if (!job.outputs) {
      return;
    }
    const outputs = [job.outputs.transcript, ...(job.outputs.subtitle ? [job.outputs.subtitle] : [])];
    await this.deleteAll(job.id, outputs);
    console.log(`[JobArtifacts] Purged ${outputs.length} output artifact(s) of job ${job.id}`);
  }

  async deleteAll(jobId: string, artifacts: readonly ArtifactRef[]): Promise<void> {
    for (const artifact of artifacts) {
      try {
        await this.artifactStore.delete(artifact.location);
      } catch (error) {
        // Leftovers are retried by the retention sweep
        console.warn(`[JobArtifacts] Failed to delete ${artifact.location} of job ${jobId}: ${errorMessage(error)}`);
      }
    }
  }
}
