export { formatClock, formatProgressLabel } from "./time";
export { ListenerManager } from "./listener-manager";

/**
 * Clamp a number into the inclusive range [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
