import { execFile } from "child_process";
import { promisify } from "util";
import { randomUUID } from "crypto";
import { writeFile, readFile, rm } from "fs/promises";
import { extname, join } from "path";
import { tmpdir } from "os";
import type { DecodedAudio } from "../../domain/entities/segment";
import type { IAudioDecoder } from "../../domain/interfaces/iaudio.decoder";
import { errorMessage } from "../../domain/errors/job.errors";
import { pcmDurationSec } from "../../domain/utils/wav";

const execFileAsync = promisify(execFile);

export interface FfmpegAudioDecoderOptions {
  ffmpegPath?: string;
  sampleRate?: number; // Default 16 kHz, what Whisper resamples to anyway
}

/**
 * Decodes any container ffmpeg understands (audio or video) to 16-bit mono PCM.
 */
export class FfmpegAudioDecoder implements IAudioDecoder {
  private readonly ffmpegPath: string;
  private readonly sampleRate: number;

  constructor(options: FfmpegAudioDecoderOptions = {}) {
    this.ffmpegPath = options.ffmpegPath || "ffmpeg";
    this.sampleRate = options.sampleRate ?? 16000;
  }

  async decode(media: Buffer, filename: string): Promise<DecodedAudio> {
    const id = randomUUID();
    const extension = extname(filename).replace(/[^a-zA-Z0-9.]/g, "");
    const inputPath = join(tmpdir(), `${id}-input${extension}`);
    const outputPath = join(tmpdir(), `${id}-output.pcm`);

    try {
      await writeFile(inputPath, media);

      // Arguments are passed without a shell, so paths need no quoting
      await execFileAsync(this.ffmpegPath, [
        "-hide_banner",
        "-loglevel", "error",
        "-i", inputPath,
        "-vn", // No video
        "-ac", "1",
        "-ar", String(this.sampleRate),
        "-f", "s16le",
        "-acodec", "pcm_s16le",
        "-y", // Overwrite output file
        outputPath,
      ]);

      const pcm = await readFile(outputPath);
      const durationSec = pcmDurationSec(pcm.length, this.sampleRate, 1);
      console.log(`[FfmpegAudioDecoder] Decoded ${filename}: ${durationSec.toFixed(2)}s of audio`);

      return { sampleRate: this.sampleRate, channels: 1, pcm, durationSec };
    } catch (error) {
      console.error(`[FfmpegAudioDecoder] Error decoding ${filename}:`, error);
      throw new Error(`Audio decoding failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      await Promise.all([
        rm(inputPath, { force: true }),
        rm(outputPath, { force: true }),
      ]).catch((cleanupError: unknown) => {
        console.warn("[FfmpegAudioDecoder] Failed to clean up temp files:", cleanupError);
      });
    }
  }
}
