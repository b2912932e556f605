import type { Collection, Db, WithId } from "mongodb";
import type { TranscriptionJob } from "../../../domain/entities/transcription-job";
import type { JobStatus } from "../../../domain/enums/job.status";
import type { IJobStore } from "../../../domain/interfaces/ijob.store";
import type { RetentionCutoffs } from "../../../domain/utils/job-retention";

/**
 * MongoDB backing of the job ledger. Records are keyed by the job's UUID in
 * the id field (not _id) and replaced whole on every committed update.
 */
export class TranscriptionJobRepository implements IJobStore {
  private collection: Collection<TranscriptionJob>;

  constructor(db: Db, collectionName = "transcriptionJobs") {
    this.collection = db.collection<TranscriptionJob>(collectionName);
    // Create indexes for efficient queries (fire and forget)
    this.ensureIndexes().catch((error: unknown) => {
      console.error(`[TranscriptionJobRepository] Failed to create indexes for ${collectionName}:`, error);
    });
  }

  private async ensureIndexes(): Promise<void> {
    await this.collection.createIndex({ id: 1 }, { unique: true });
    // Recovery and retention sweeps select by status, oldest update first
    await this.collection.createIndex({ status: 1, updatedAt: 1 });
  }

  private toDomain(doc: WithId<TranscriptionJob>): TranscriptionJob {
    const { _id, ...job } = doc;
    return job;
  }

  async insert(job: TranscriptionJob): Promise<void> {
    // insertOne adds _id to the document it is given
    await this.collection.insertOne({ ...job });
  }

  async findById(id: string): Promise<TranscriptionJob | null> {
    // Query by id field (UUID), not _id
    const doc = await this.collection.findOne({ id });
    return doc ? this.toDomain(doc) : null;
  }

  async compareAndSwap(job: TranscriptionJob, expectedVersion: number): Promise<boolean> {
    const result = await this.collection.replaceOne({ id: job.id, version: expectedVersion }, { ...job });
    return result.matchedCount === 1;
  }

  async findByStatus(statuses: readonly JobStatus[], limit: number): Promise<TranscriptionJob[]> {
    const docs = await this.collection
      .find({ status: { $in: [...statuses] } })
      .sort({ updatedAt: 1 })
      .limit(limit)
      .toArray();
    return docs.map((doc) => this.toDomain(doc));
  }

  async findExpired(cutoffs: RetentionCutoffs, limit: number): Promise<TranscriptionJob[]> {
    const terminal: JobStatus[] = ["completed", "error"];
    const docs = await this.collection
      .find({
        $or: [
          { status: { $in: terminal }, completedAt: { $lte: cutoffs.finishedBefore } },
          { status: { $in: terminal }, completedAt: { $exists: false }, updatedAt: { $lte: cutoffs.finishedBefore } },
          { status: "completed", outputRetrievedAt: { $lte: cutoffs.retrievedBefore } },
        ],
      })
      .sort({ updatedAt: 1 })
      .limit(limit)
      .toArray();
    return docs.map((doc) => this.toDomain(doc));
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.collection.deleteOne({ id });
    return result.deletedCount > 0;
  }
}
