/**
 * PlaybackClock - seekable, pausable logical clock
 *
 * While running, time advances with the time source; while paused it is
 * frozen. `position` is exact at `anchor`, and every state change re-anchors
 * so the reading never jumps on play/pause.
 */

/** Monotonic time source in seconds. */
export type TimeSource = () => number;

export const performanceTimeSource: TimeSource = () => performance.now() / 1000;

export class PlaybackClock {
  private position = 0;
  private anchor: number;
  private running = false;

  constructor(private readonly now: TimeSource = performanceTimeSource) {
    this.anchor = now();
  }

  /**
   * Current logical time in seconds, never negative.
   */
  getTime(): number {
    if (!this.running) {
      return this.position;
    }
    // A time source that steps backwards must not move playback backwards
    const elapsed = this.now() - this.anchor;
    return this.position + Math.max(0, elapsed);
  }

  isRunning(): boolean {
    return this.running;
  }

  play(): void {
    if (this.running) return;
    this.anchor = this.now();
    this.running = true;
  }

  pause(): void {
    if (!this.running) return;
    this.position = this.getTime();
    this.anchor = this.now();
    this.running = false;
  }

  togglePause(): void {
    if (this.running) {
      this.pause();
    } else {
      this.play();
    }
  }

  /**
   * Jump to `target` seconds, keeping the run state. Negative targets clamp
   * to 0; non-finite targets are ignored.
   */
  seek(target: number): void {
    if (!Number.isFinite(target)) return;
    this.position = Math.max(0, target);
    this.anchor = this.now();
  }
}
