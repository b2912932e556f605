import type { ArtifactRef } from "../../domain/entities/artifact";
import type { IArtifactStore } from "../../domain/interfaces/iartifact.store";
import { NotFoundError } from "../../domain/errors/job.errors";
import { JobLedger } from "../ledger/job-ledger";

export type OutputKind = "subtitle" | "transcript";

export interface FetchOutputUseCaseParams {
  jobId: string;
  kind?: OutputKind; // Default: subtitle when one was produced, transcript otherwise
}

export interface FetchOutputResult {
  artifact: ArtifactRef;
  content: Buffer;
}

export interface FetchOutputUseCaseOptions {
  now?: () => Date;
}

export class FetchOutputUseCase {
  private readonly now: () => Date;

  constructor(
    private ledger: JobLedger,
    private artifactStore: IArtifactStore,
    options: FetchOutputUseCaseOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * @throws NotFoundError for unknown jobs, jobs that have not completed and purged outputs
   */
  async execute(params: FetchOutputUseCaseParams): Promise<FetchOutputResult> {
    const { jobId } = params;
    const job = await this.ledger.get(jobId);

    if (job.status !== "completed" || !job.outputs) {
      throw new NotFoundError(`Output for job ${jobId} is not ready (status: ${job.status})`);
    }

    const kind = params.kind ?? (job.outputs.subtitle ? "subtitle" : "transcript");
    const artifact = kind === "subtitle" ? job.outputs.subtitle : job.outputs.transcript;
    if (!artifact) {
      throw new NotFoundError(`Job ${jobId} has no ${kind} output`);
    }

    const content = await this.artifactStore.get(artifact.location);

    // Starts the download grace period after which retention purges the outputs
    if (!job.outputRetrievedAt) {
      await this.ledger.update(jobId, (current) =>
        current.outputRetrievedAt ? undefined : { outputRetrievedAt: this.now() }
      );
    }

    return { artifact, content };
  }
}
