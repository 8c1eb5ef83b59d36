import { DEFAULT_CHECKPOINT_STRIDE } from "@/core/constants";
import type { DecoderState, SmfDecoder } from "@/core/parsers/smf-decoder";

/**
 * Decoder positions recorded every `stride` events during a forward pass.
 *
 * Entries are appended in event order, so their `lastTime` values are
 * non-decreasing and can be binary searched.
 */
export class CheckpointIndex {
  private readonly entries: DecoderState[] = [];

  constructor(readonly stride: number = DEFAULT_CHECKPOINT_STRIDE) {
    if (!Number.isInteger(stride) || stride < 1) {
      throw new RangeError(`Checkpoint stride must be a positive integer, got ${stride}`);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  /** Highest event index covered by a checkpoint, or -1 when empty. */
  get lastEventIndex(): number {
    const last = this.entries[this.entries.length - 1];
    return last ? last.eventIndex : -1;
  }

  /**
   * Record the decoder's current position when it sits on a stride boundary
   * not seen before.
   */
  record(decoder: SmfDecoder): void {
    const index = decoder.eventIndex;
    if (index % this.stride !== 0 || index <= this.lastEventIndex) return;
    this.entries.push(decoder.snapshot());
  }

  /**
   * Latest checkpoint whose last handed-out event lies strictly before
   * `time`; every event at or after `time` comes after it.
   */
  before(time: number): DecoderState | null {
    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.entries[mid].lastTime < time) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo > 0 ? this.entries[lo - 1] : null;
  }
}
