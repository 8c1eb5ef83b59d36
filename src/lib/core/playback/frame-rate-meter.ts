import { FPS_WINDOW_SECONDS } from "@/core/constants";

/**
 * Frames per second over a sliding window of recent frame timestamps.
 */
export class FrameRateMeter {
  private readonly frames: number[] = [];

  constructor(private readonly windowSeconds: number = FPS_WINDOW_SECONDS) {}

  /** Record a frame rendered at `time` (seconds). */
  update(time: number): void {
    this.frames.push(time);
    const cutoff = time - this.windowSeconds;
    let drop = 0;
    while (drop < this.frames.length && this.frames[drop] <= cutoff) drop++;
    if (drop > 0) this.frames.splice(0, drop);
  }

  get fps(): number {
    return this.frames.length / this.windowSeconds;
  }

  reset(): void {
    this.frames.length = 0;
  }
}
