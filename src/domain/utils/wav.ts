import type { DecodedAudio, Segment } from "../entities/segment";

const BYTES_PER_SAMPLE = 2; // s16le
const WAV_HEADER_SIZE = 44;

/**
 * Wrap raw s16le PCM in a canonical 44-byte RIFF/WAVE header.
 */
export function encodeWav(pcm: Buffer, sampleRate: number, channels: number): Buffer {
  const header = Buffer.alloc(WAV_HEADER_SIZE);
  const byteRate = sampleRate * channels * BYTES_PER_SAMPLE;

  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16); // PCM chunk size
  header.writeUInt16LE(1, 20); // PCM format
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(channels * BYTES_PER_SAMPLE, 32);
  header.writeUInt16LE(BYTES_PER_SAMPLE * 8, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}

/**
 * Cut the PCM frames covered by a segment out of the decoded stream.
 */
export function slicePcm(audio: DecodedAudio, segment: Segment): Buffer {
  const frameSize = audio.channels * BYTES_PER_SAMPLE;
  const totalFrames = Math.floor(audio.pcm.length / frameSize);
  const startFrame = Math.min(totalFrames, Math.round(segment.startSec * audio.sampleRate));
  const endFrame = Math.min(totalFrames, Math.round(segment.endSec * audio.sampleRate));
  return audio.pcm.subarray(startFrame * frameSize, endFrame * frameSize);
}

export function segmentToWav(audio: DecodedAudio, segment: Segment): Buffer {
  return encodeWav(slicePcm(audio, segment), audio.sampleRate, audio.channels);
}

export function pcmDurationSec(pcmBytes: number, sampleRate: number, channels: number): number {
  return pcmBytes / (sampleRate * channels * BYTES_PER_SAMPLE);
}
