import {
  S3Client,
  CreateMultipartUploadCommand,
  UploadPartCommand,
  CompleteMultipartUploadCommand,
  AbortMultipartUploadCommand,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectCommand,
  NoSuchKey,
} from "@aws-sdk/client-s3";
import type { ArtifactRef } from "../../domain/entities/artifact";
import type { ArtifactKind } from "../../domain/enums/artifact.kind";
import type { IArtifactStore } from "../../domain/interfaces/iartifact.store";
import { errorMessage, NotFoundError } from "../../domain/errors/job.errors";
import { artifactPath } from "../storage/artifact-path";

/**
 * Sanitizes metadata values to remove invalid characters for HTTP headers.
 * Only alphanumerics, spaces, hyphens, underscores, periods and commas are kept.
 */
function sanitizeMetadataValue(value: string): string {
  if (!value) return "";

  const str = value
    .replace(/[^a-zA-Z0-9\s\-_.,]/g, "_")
    .replace(/\s+/g, " ")
    .trim();

  // AWS metadata value limit (2KB)
  return str.length > 2000 ? str.substring(0, 2000) : str;
}

// Multipart upload threshold: use multipart for files larger than 5MB
const MULTIPART_UPLOAD_THRESHOLD = 5 * 1024 * 1024;
const MULTIPART_PART_SIZE = 5 * 1024 * 1024;

export interface S3ArtifactStorageConfig {
  bucket: string;
  prefix?: string; // Key prefix, default "transcriptions"
  region?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  endpoint?: string; // For S3-compatible services like MinIO
  forcePathStyle?: boolean; // Use path-style addressing (required for some S3-compatible services)
}

/**
 * Artifact backend on S3. Locations are "s3://<bucket>/<prefix>/<kind>/<jobId>/<filename>".
 */
export class S3ArtifactStorage implements IArtifactStore {
  private s3Client: S3Client;
  private readonly bucket: string;
  private readonly prefix: string;

  constructor(config: S3ArtifactStorageConfig, client?: S3Client) {
    const region = config.region || "us-east-1";
    console.log(`[S3ArtifactStorage] Initializing with bucket: ${config.bucket}, region: ${region}`);

    this.s3Client =
      client ??
      new S3Client({
        region,
        credentials: config.credentials,
        endpoint: config.endpoint,
        forcePathStyle: config.forcePathStyle || false,
      });
    this.bucket = config.bucket;
    this.prefix = (config.prefix ?? "transcriptions").replace(/^\/+|\/+$/g, "");
  }

  async put(
    kind: ArtifactKind,
    jobId: string,
    filename: string,
    bytes: Buffer,
    contentType = "application/octet-stream"
  ): Promise<ArtifactRef> {
    const relative = artifactPath(kind, jobId, filename);
    const key = this.prefix ? `${this.prefix}/${relative}` : relative;
    const metadata = {
      jobId: sanitizeMetadataValue(jobId),
      originalFilename: sanitizeMetadataValue(filename),
    };

    try {
      if (bytes.length > MULTIPART_UPLOAD_THRESHOLD) {
        await this.multipartUpload(bytes, key, contentType, metadata);
      } else {
        await this.s3Client.send(
          new PutObjectCommand({
            Bucket: this.bucket,
            Key: key,
            Body: bytes,
            ContentType: contentType,
            Metadata: metadata,
          })
        );
      }
    } catch (error) {
      throw this.describeUploadError(error);
    }

    return {
      kind,
      location: `s3://${this.bucket}/${key}`,
      filename,
      contentType,
      size: bytes.length,
      createdAt: new Date(),
    };
  }

  async get(location: string): Promise<Buffer> {
    const { bucket, key } = parseS3Location(location);
    try {
      const response = await this.s3Client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      if (!response.Body) {
        throw new NotFoundError(`Artifact not found: ${location}`);
      }
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      if (error instanceof NoSuchKey) {
        throw new NotFoundError(`Artifact not found: ${location}`, { cause: error });
      }
      throw error;
    }
  }

  async delete(location: string): Promise<void> {
    const { bucket, key } = parseS3Location(location);
    // S3 reports success for keys that do not exist
    await this.s3Client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
  }

  /**
   * Perform multipart upload for large files.
   */
  private async multipartUpload(
    buffer: Buffer,
    key: string,
    contentType: string,
    metadata: Record<string, string>
  ): Promise<void> {
    let uploadId: string | undefined;

    try {
      const createResponse = await this.s3Client.send(
        new CreateMultipartUploadCommand({
          Bucket: this.bucket,
          Key: key,
          ContentType: contentType,
          Metadata: metadata,
        })
      );
      uploadId = createResponse.UploadId;
      if (!uploadId) {
        throw new Error("Failed to create multipart upload");
      }

      const parts: Array<{ ETag: string; PartNumber: number }> = [];
      const totalParts = Math.ceil(buffer.length / MULTIPART_PART_SIZE);

      for (let partNumber = 1; partNumber <= totalParts; partNumber++) {
        const start = (partNumber - 1) * MULTIPART_PART_SIZE;
        const end = Math.min(start + MULTIPART_PART_SIZE, buffer.length);

        const partResponse = await this.s3Client.send(
          new UploadPartCommand({
            Bucket: this.bucket,
            Key: key,
            PartNumber: partNumber,
            UploadId: uploadId,
            Body: buffer.subarray(start, end),
          })
        );
        if (!partResponse.ETag) {
          throw new Error(`Failed to upload part ${partNumber}`);
        }
        parts.push({ ETag: partResponse.ETag, PartNumber: partNumber });
      }

      await this.s3Client.send(
        new CompleteMultipartUploadCommand({
          Bucket: this.bucket,
          Key: key,
          UploadId: uploadId,
          MultipartUpload: { Parts: parts },
        })
      );
    } catch (error) {
      if (uploadId) {
        try {
          await this.s3Client.send(
            new AbortMultipartUploadCommand({ Bucket: this.bucket, Key: key, UploadId: uploadId })
          );
        } catch (abortError) {
          // Log but don't throw - original error is more important
          console.error("[S3ArtifactStorage] Failed to abort multipart upload:", abortError);
        }
      }
      throw error;
    }
  }

  private describeUploadError(error: unknown): unknown {
    const message = errorMessage(error);
    if (message.includes("endpoint") || message.includes("region")) {
      const region = typeof this.s3Client.config.region === "string" ? this.s3Client.config.region : "unknown";
      return new Error(
        `S3 upload failed: ${message}. Please verify the bucket region matches the configured region (${region}). Ensure AWS_REGION is set correctly in your .env file.`,
        { cause: error }
      );
    }
    return error;
  }
}

export function parseS3Location(location: string): { bucket: string; key: string } {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(location);
  if (!match) {
    throw new NotFoundError(`Not an S3 artifact location: ${location}`);
  }
  return { bucket: match[1], key: match[2] };
}
