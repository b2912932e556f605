import type { Segment } from "../../domain/entities/segment";
import { ValidationError } from "../../domain/errors/job.errors";

export interface SegmentableStream {
  durationSec: number;
}

/**
 * Split a decoded stream into ordered fixed-length segments.
 *
 * Boundaries are computed in whole milliseconds so the same stream and length
 * always produce the same list, which is what makes resuming from a segment
 * index safe. The last segment may be shorter; a stream shorter than one
 * segment yields a single segment; an empty stream yields none.
 */
export function segmentAudio(stream: SegmentableStream, segmentLengthSec: number): Segment[] {
  if (!Number.isFinite(segmentLengthSec) || segmentLengthSec <= 0) {
    throw new ValidationError(`Segment length must be a positive number of seconds, got ${segmentLengthSec}`);
  }

  const segmentMs = Math.round(segmentLengthSec * 1000);
  if (segmentMs === 0) {
    throw new ValidationError(`Segment length ${segmentLengthSec}s is shorter than one millisecond`);
  }

  const durationMs = Number.isFinite(stream.durationSec)
    ? Math.max(0, Math.round(stream.durationSec * 1000))
    : 0;

  const segments: Segment[] = [];
  for (let startMs = 0; startMs < durationMs; startMs += segmentMs) {
    const endMs = Math.min(startMs + segmentMs, durationMs);
    segments.push({
      index: segments.length,
      startSec: startMs / 1000,
      endSec: endMs / 1000,
    });
  }
  return segments;
}
