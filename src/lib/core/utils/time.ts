/**
 * Format seconds as `MM:SS`.
 *
 * @example
 * ```ts
 * formatClock(61.9); // "01:01"
 * formatClock(3600); // "60:00"
 * ```
 */
export function formatClock(seconds: number): string {
  // NaN, Infinity and negatives render as zero
  if (!Number.isFinite(seconds) || seconds < 0) {
    return "00:00";
  }

  const whole = Math.floor(seconds);
  const minutes = Math.floor(whole / 60);
  const secs = whole % 60;

  return `${minutes.toString().padStart(2, "0")}:${secs
    .toString()
    .padStart(2, "0")}`;
}

/**
 * Build the `elapsed/total` label shown next to the seek bar.
 *
 * Once playback runs past the end of the file the elapsed part sticks to the
 * total so the label never reads e.g. `03:02/03:00`.
 *
 * @param time   - Current playback position in seconds
 * @param length - MIDI length in seconds, or null when it is not known yet
 *
 * @example
 * ```ts
 * formatProgressLabel(75, 180);  // "01:15/03:00"
 * formatProgressLabel(200, 180); // "03:00/03:00"
 * formatProgressLabel(5, null);  // "00:05/--:--"
 * ```
 */
export function formatProgressLabel(time: number, length: number | null): string {
  if (length === null) {
    return `${formatClock(time)}/--:--`;
  }
  const shown = Math.floor(time) > Math.floor(length) ? length : time;
  return `${formatClock(shown)}/${formatClock(length)}`;
}
