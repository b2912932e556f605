import type { ArtifactKind } from "../enums/artifact.kind";

export interface ArtifactRef {
  kind: ArtifactKind;
  location: string; // e.g. "s3://bucket/transcriptions/subtitle/<jobId>/talk.srt" or "file:///work/..."
  filename: string;
  contentType: string;
  size: number; // bytes
  createdAt: Date;
}

export interface JobOutputs {
  transcript: ArtifactRef;
  subtitle?: ArtifactRef; // Absent when subtitle generation was skipped
}
