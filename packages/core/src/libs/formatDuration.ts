/**
 * Formats a duration as zero-padded minutes and seconds.
 * @param ms - Duration in milliseconds
 * @returns e.g. "02:45", "125:03"
 */
export function formatMinutesSeconds(ms: number): string {
  const { minutes, seconds } = split(ms);
  return `${String(minutes).padStart(2, "0")}:${String(seconds).padStart(2, "0")}`;
}

/** Shorter variant without minute padding, e.g. "2:45". */
export function formatShortMinutesSeconds(ms: number): string {
  const { minutes, seconds } = split(ms);
  return `${minutes}:${String(seconds).padStart(2, "0")}`;
}

function split(ms: number): { minutes: number; seconds: number } {
  const total = Math.max(0, Math.floor(ms / 1000));
  return { minutes: Math.floor(total / 60), seconds: total % 60 };
}
