import type { ArtifactKind } from "../../domain/enums/artifact.kind";

/**
 * Reduces an uploaded filename to a single safe path segment.
 */
export function sanitizeFilename(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? "";
  const cleaned = base
    .replace(/[^a-zA-Z0-9._-]/g, "_")
    .replace(/^\.+/, "")
    .slice(0, 200);
  return cleaned || "artifact";
}

/**
 * Relative path of an artifact: "<kind>/<jobId>/<filename>".
 */
export function artifactPath(kind: ArtifactKind, jobId: string, filename: string): string {
  return `${kind}/${sanitizeFilename(jobId)}/${sanitizeFilename(filename)}`;
}
