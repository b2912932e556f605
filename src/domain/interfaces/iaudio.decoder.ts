import type { DecodedAudio } from "../entities/segment";

// Abstraction for turning uploaded media (audio or video container) into raw PCM

export interface IAudioDecoder {
    decode(media: Buffer, filename: string): Promise<DecodedAudio>;
}
