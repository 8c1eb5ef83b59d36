/**
 * StreamedTimeline - events decoded from the open file as playback advances
 *
 * Keeps a small lookahead buffer ahead of the last pulled time. Seeks are
 * answered in place while nothing at or after the target has been consumed;
 * otherwise decoding resumes from the nearest checkpoint before the target
 * (or from the start of the file when there is none).
 */

import { DEFAULT_LOOKAHEAD_SECONDS } from "@/core/constants";
import type { MidiDecodeError } from "@/core/errors";
import type { MidiEvent } from "@/core/midi/types";
import type { ByteSource } from "@/core/parsers/byte-source";
import { SmfDecoder, type DecoderState } from "@/core/parsers/smf-decoder";
import type { SmfLayout } from "@/core/parsers/smf-layout";
import { CheckpointIndex } from "./checkpoint-index";
import type { EventTimeline } from "./types";

/** Compact the buffer once this many consumed events pile up at its head. */
const COMPACT_THRESHOLD = 1024;

export interface StreamedTimelineOptions {
  /** Seconds of events kept decoded past the last pulled time */
  lookaheadSeconds?: number;
  /** Shared checkpoint index (usually filled by the load-time scan) */
  checkpoints?: CheckpointIndex;
}

export class StreamedTimeline implements EventTimeline {
  readonly kind = "streamed" as const;
  readonly checkpoints: CheckpointIndex;

  private readonly decoder: SmfDecoder;
  private readonly lookaheadSeconds: number;
  private buffer: MidiEvent[] = [];
  private head = 0;
  private exhausted = false;
  /** Time of the last event handed out or discarded since the decoder position was set */
  private consumedUpTo = Number.NEGATIVE_INFINITY;
  private readonly skipped = new Set<string>();

  constructor(
    private readonly source: ByteSource,
    layout: SmfLayout,
    options: StreamedTimelineOptions = {}
  ) {
    this.lookaheadSeconds = options.lookaheadSeconds ?? DEFAULT_LOOKAHEAD_SECONDS;
    this.checkpoints = options.checkpoints ?? new CheckpointIndex();
    this.decoder = new SmfDecoder(source, layout, {
      onRecoverableError: (error) => this.handleRecoverable(error),
    });
  }

  get cursorIndex(): number {
    return this.decoder.eventIndex - (this.buffer.length - this.head);
  }

  get skippedEvents(): number {
    return this.skipped.size;
  }

  /** Events decoded but not yet handed out. */
  get bufferedCount(): number {
    return this.buffer.length - this.head;
  }

  pullUntil(end: number, sink: (event: MidiEvent) => void): number {
    let count = 0;
    for (;;) {
      const event = this.peek();
      if (event === null || event.time > end) break;
      this.head++;
      this.consumedUpTo = event.time;
      sink(event);
      count++;
    }
    this.fill(end + this.lookaheadSeconds);
    return count;
  }

  seek(time: number): void {
    const checkpoint = this.checkpoints.before(time);
    if (time > this.consumedUpTo) {
      // Nothing at or after `time` was consumed; skip ahead, jumping to a
      // checkpoint when one lies beyond the current decode position
      if (checkpoint && checkpoint.eventIndex > this.decoder.eventIndex) {
        this.resetTo(checkpoint);
      }
    } else {
      this.resetTo(checkpoint);
    }
    this.discardBefore(time);
  }

  nextEventTime(): number | null {
    const event = this.peek();
    return event ? event.time : null;
  }

  close(): void {
    this.buffer = [];
    this.head = 0;
    this.exhausted = true;
    this.source.close();
  }

  private peek(): MidiEvent | null {
    if (this.head >= this.buffer.length) {
      this.compact();
      if (!this.decodeOne()) return null;
    }
    return this.buffer[this.head];
  }

  private decodeOne(): boolean {
    if (this.exhausted) return false;
    this.checkpoints.record(this.decoder);
    const event = this.decoder.next();
    if (event === null) {
      this.exhausted = true;
      return false;
    }
    this.buffer.push(event);
    return true;
  }

  private fill(until: number): void {
    while (!this.exhausted && (this.bufferedCount === 0 || this.decoder.lastTime <= until)) {
      if (!this.decodeOne()) break;
    }
    this.compact();
  }

  private discardBefore(time: number): void {
    for (;;) {
      const event = this.peek();
      if (event === null || event.time >= time) break;
      this.head++;
      this.consumedUpTo = event.time;
    }
    this.fill(time + this.lookaheadSeconds);
  }

  private resetTo(checkpoint: DecoderState | null): void {
    this.buffer = [];
    this.head = 0;
    this.exhausted = false;
    if (checkpoint) {
      this.decoder.restore(checkpoint);
      this.consumedUpTo = checkpoint.lastTime;
    } else {
      this.decoder.rewind();
      this.consumedUpTo = Number.NEGATIVE_INFINITY;
    }
  }

  private compact(): void {
    if (this.head === 0) return;
    if (this.head >= this.buffer.length) {
      this.buffer = [];
      this.head = 0;
    } else if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.buffer.length) {
      this.buffer = this.buffer.slice(this.head);
      this.head = 0;
    }
  }

  private handleRecoverable(error: MidiDecodeError): void {
    const key = `${error.track}:${error.offset}`;
    if (this.skipped.has(key)) return;
    this.skipped.add(key);
    console.warn(`[StreamedTimeline] Skipping malformed event: ${error.message}`);
  }
}
