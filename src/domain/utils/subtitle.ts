import type { TimedText } from "../entities/transcript";

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/**
 * Convert seconds to an SRT timestamp (HH:MM:SS,mmm)
 */
export function formatSrtTimestamp(seconds: number): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const secs = Math.floor((totalMs % 60_000) / 1000);
  const millis = totalMs % 1000;
  return `${pad(hours)}:${pad(minutes)}:${pad(secs)},${pad(millis, 3)}`;
}

/**
 * Render cues as SRT. Cues with no text are dropped and numbering stays contiguous.
 * Returns an empty string when nothing is left.
 */
export function cuesToSrt(cues: readonly TimedText[]): string {
  const blocks: string[] = [];
  for (const cue of cues) {
    const text = cue.text.trim();
    if (!text) {
      continue;
    }
    blocks.push(
      `${blocks.length + 1}\n${formatSrtTimestamp(cue.startSec)} --> ${formatSrtTimestamp(cue.endSec)}\n${text}`
    );
  }
  return blocks.length > 0 ? blocks.join("\n\n") + "\n" : "";
}
