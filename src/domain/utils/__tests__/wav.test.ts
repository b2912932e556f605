import { describe, it, expect } from "vitest";
import { encodeWav, pcmDurationSec, segmentToWav, slicePcm } from "../wav";
import type { DecodedAudio } from "../../entities/segment";

function rampAudio(frames: number, sampleRate: number): DecodedAudio {
  const pcm = Buffer.alloc(frames * 2);
  for (let i = 0; i < frames; i++) {
    pcm.writeInt16LE(i, i * 2);
  }
  return { sampleRate, channels: 1, pcm, durationSec: frames / sampleRate };
}

describe("wav utils", () => {
  it("encodeWav writes a 44-byte PCM header", () => {
    const wav = encodeWav(Buffer.alloc(4), 16000, 1);
    expect(wav.length).toBe(48);
    expect(wav.toString("ascii", 0, 4)).toBe("RIFF");
    expect(wav.readUInt32LE(4)).toBe(40);
    expect(wav.toString("ascii", 8, 12)).toBe("WAVE");
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(16000);
    expect(wav.readUInt32LE(28)).toBe(32000);
    expect(wav.readUInt16LE(32)).toBe(2);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.toString("ascii", 36, 40)).toBe("data");
    expect(wav.readUInt32LE(40)).toBe(4);
  });

  it("slicePcm cuts the frames covered by a segment", () => {
    const audio = rampAudio(20, 10);
    const slice = slicePcm(audio, { index: 0, startSec: 0.5, endSec: 1.5 });
    expect(slice.length).toBe(20);
    expect(slice.readInt16LE(0)).toBe(5);
    expect(slice.readInt16LE(18)).toBe(14);
  });

  it("slicePcm stops at the end of the stream", () => {
    const audio = rampAudio(20, 10);
    expect(slicePcm(audio, { index: 1, startSec: 1.5, endSec: 3 }).length).toBe(10);
  });

  it("segmentToWav wraps the slice", () => {
    const audio = rampAudio(20, 10);
    const wav = segmentToWav(audio, { index: 0, startSec: 0, endSec: 1 });
    expect(wav.length).toBe(44 + 20);
    expect(wav.readInt16LE(44 + 2)).toBe(1);
  });

  it("pcmDurationSec derives seconds from byte count", () => {
    expect(pcmDurationSec(32000, 16000, 1)).toBe(1);
    expect(pcmDurationSec(16000, 16000, 2)).toBe(0.25);
  });
});
