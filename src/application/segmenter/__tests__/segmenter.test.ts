import { describe, it, expect } from "vitest";
import { segmentAudio } from "../segmenter";
import { ValidationError } from "../../../domain/errors/job.errors";

describe("segmentAudio", () => {
  it("splits a stream into equal segments", () => {
    expect(segmentAudio({ durationSec: 90 }, 30)).toEqual([
      { index: 0, startSec: 0, endSec: 30 },
      { index: 1, startSec: 30, endSec: 60 },
      { index: 2, startSec: 60, endSec: 90 },
    ]);
  });

  it("keeps a shorter final segment", () => {
    const segments = segmentAudio({ durationSec: 95 }, 30);
    expect(segments).toHaveLength(4);
    expect(segments[3]).toEqual({ index: 3, startSec: 90, endSec: 95 });
  });

  it("returns one segment for a stream shorter than the segment length", () => {
    expect(segmentAudio({ durationSec: 10 }, 30)).toEqual([{ index: 0, startSec: 0, endSec: 10 }]);
  });

  it("returns no segments for an empty stream", () => {
    expect(segmentAudio({ durationSec: 0 }, 30)).toEqual([]);
    expect(segmentAudio({ durationSec: Number.NaN }, 30)).toEqual([]);
  });

  it("drops a remainder that rounds to zero milliseconds", () => {
    expect(segmentAudio({ durationSec: 60.0002 }, 30)).toHaveLength(2);
  });

  it("produces contiguous segments covering the whole stream", () => {
    const segments = segmentAudio({ durationSec: 123.456 }, 7);
    expect(segments[0].startSec).toBe(0);
    expect(segments[segments.length - 1].endSec).toBe(123.456);
    for (let i = 1; i < segments.length; i++) {
      expect(segments[i].startSec).toBe(segments[i - 1].endSec);
      expect(segments[i].index).toBe(i);
    }
  });

  it("is deterministic for the same input", () => {
    expect(segmentAudio({ durationSec: 3601.25 }, 60)).toEqual(segmentAudio({ durationSec: 3601.25 }, 60));
  });

  it("rejects non-positive or non-finite segment lengths", () => {
    expect(() => segmentAudio({ durationSec: 10 }, 0)).toThrow(ValidationError);
    expect(() => segmentAudio({ durationSec: 10 }, -5)).toThrow(ValidationError);
    expect(() => segmentAudio({ durationSec: 10 }, Number.POSITIVE_INFINITY)).toThrow(ValidationError);
    expect(() => segmentAudio({ durationSec: 10 }, 0.0004)).toThrow(ValidationError);
  });
});
