import type { VelocityRange } from "./types";

/**
 * Whether a note-on velocity falls in the ignore range. Velocity 0 is a
 * note-off and is never ignored.
 */
export function isIgnoredVelocity(velocity: number, range: VelocityRange | null): boolean {
  if (range === null || velocity === 0) return false;
  return velocity >= range.lo && velocity <= range.hi;
}

/**
 * A range that ignores nothing is treated as no filter at all.
 */
export function normalizeVelocityRange(range: VelocityRange | null | undefined): VelocityRange | null {
  if (!range || range.hi < 1 || range.hi < range.lo) return null;
  return { lo: Math.max(1, range.lo), hi: range.hi };
}
