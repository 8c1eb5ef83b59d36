/**
 * BufferedTimeline - every event of the file held in memory
 *
 * Built once at load time. Seeking is a binary search on absolute time, so
 * any jump costs O(log n) regardless of direction.
 */

import type { MidiEvent } from "@/core/midi/types";
import type { EventTimeline } from "./types";

export class BufferedTimeline implements EventTimeline {
  readonly kind = "buffered" as const;
  private cursor = 0;
  private events: MidiEvent[];

  /**
   * @param events - Events sorted by time (ties in file order)
   * @param skippedEvents - Malformed events dropped while decoding
   */
  constructor(events: MidiEvent[], readonly skippedEvents: number = 0) {
    this.events = events;
  }

  get cursorIndex(): number {
    return this.cursor;
  }

  /** Total number of events held. */
  get length(): number {
    return this.events.length;
  }

  pullUntil(end: number, sink: (event: MidiEvent) => void): number {
    const events = this.events;
    const from = this.cursor;
    let i = from;
    while (i < events.length && events[i].time <= end) {
      sink(events[i]);
      i++;
    }
    this.cursor = i;
    return i - from;
  }

  seek(time: number): void {
    this.cursor = this.lowerBound(time);
  }

  nextEventTime(): number | null {
    return this.cursor < this.events.length ? this.events[this.cursor].time : null;
  }

  close(): void {
    this.events = [];
    this.cursor = 0;
  }

  /** Index of the first event with time >= `time`. */
  private lowerBound(time: number): number {
    let lo = 0;
    let hi = this.events.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.events[mid].time < time) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }
}
