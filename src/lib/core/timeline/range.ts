import type { MidiEvent } from "@/core/midi/types";
import type { EventTimeline } from "./types";

/**
 * Events whose time lies in `(start, end]`, in timeline order.
 *
 * Moves the timeline cursor; callers that play from the same timeline must
 * seek it again afterwards.
 */
export function readRange(timeline: EventTimeline, start: number, end: number): MidiEvent[] {
  const events: MidiEvent[] = [];
  timeline.seek(start);
  timeline.pullUntil(end, (event) => {
    if (event.time > start) {
      events.push({ ...event });
    }
  });
  return events;
}
