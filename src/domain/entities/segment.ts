/**
 * A contiguous slice of decoded audio. Times are seconds from the start of the stream.
 */
export interface Segment {
  index: number;
  startSec: number;
  endSec: number;
}

export interface DecodedAudio {
  sampleRate: number; // e.g. 16000
  channels: number;
  pcm: Buffer; // signed 16-bit little-endian, interleaved
  durationSec: number;
}
