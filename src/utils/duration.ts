/**
 * Parse a video time string ("MM:SS" or "HH:MM:SS") to seconds
 *
 * @returns Seconds, or 0 when the string is not a time
 *
 * @example
 * timeStrToSeconds('01:05')   // 65
 * timeStrToSeconds('1:02:03') // 3723
 */
export function timeStrToSeconds(value: string): number {
  const parts = value.trim().split(':').map((p) => parseInt(p, 10));
  if (parts.some((p) => Number.isNaN(p))) return 0;

  switch (parts.length) {
    case 2:
      return parts[0] * 60 + parts[1];
    case 3:
      return parts[0] * 3600 + parts[1] * 60 + parts[2];
    default:
      return 0;
  }
}

/**
 * Format seconds as a video time string
 *
 * @example
 * formatTimestamp(65.4) // "01:05"
 * formatTimestamp(3723) // "1:02:03"
 */
export function formatTimestamp(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;

  const mm = String(minutes).padStart(2, '0');
  const ss = String(secs).padStart(2, '0');
  return hours > 0 ? `${hours}:${mm}:${ss}` : `${mm}:${ss}`;
}
