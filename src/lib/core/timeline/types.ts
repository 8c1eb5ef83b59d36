import type { MidiEvent } from "@/core/midi/types";

export type TimelineKind = "buffered" | "streamed";

/**
 * Ordered source of time-tagged MIDI events.
 *
 * The cursor marks the next undispatched event. `pullUntil` consumes from the
 * cursor; `seek` repositions it on the first event at or after a time, in
 * either direction, without handing out anything.
 */
export interface EventTimeline {
  readonly kind: TimelineKind;

  /**
   * Hand every event from the cursor whose time is <= `end` to `sink`, in
   * order, and advance past them.
   *
   * @returns number of events handed out
   * @throws MidiDecodeError (fatal) on a corrupt stream (streamed variant)
   */
  pullUntil(end: number, sink: (event: MidiEvent) => void): number;

  /** Move the cursor to the first event with time >= `time`. */
  seek(time: number): void;

  /** Time of the event under the cursor, or null at the end. */
  nextEventTime(): number | null;

  /** Number of events before the cursor. */
  readonly cursorIndex: number;

  /** Malformed events skipped so far (always 0 once loaded in RAM). */
  readonly skippedEvents: number;

  /** Release file handles and buffers. */
  close(): void;
}
