/**
 * Whole-file passes over an SMF: the RAM decode behind BufferedTimeline and
 * the load-time scan behind StreamedTimeline.
 */

import { MidiDecodeError } from "@/core/errors";
import type { MidiEvent } from "@/core/midi/types";
import type { ByteSource } from "@/core/parsers/byte-source";
import { SmfDecoder } from "@/core/parsers/smf-decoder";
import type { SmfLayout } from "@/core/parsers/smf-layout";
import type { CheckpointIndex } from "./checkpoint-index";

export interface DecodedEvents {
  events: MidiEvent[];
  /** Latest time reached by any event, meta events included */
  length: number;
  skippedEvents: number;
}

export interface StreamScanResult {
  /** Events for which `countsAsNote` returned true */
  totalNotes: number;
  /** Length in seconds, or null when the scan stopped early */
  length: number | null;
  skippedEvents: number;
  /** Fatal error that stopped the scan, if any */
  error: MidiDecodeError | null;
}

/**
 * Decode every channel event into memory.
 *
 * @throws MidiDecodeError (fatal) on a truncated or corrupt file
 */
export function decodeAllEvents(source: ByteSource, layout: SmfLayout): DecodedEvents {
  let skippedEvents = 0;
  const decoder = new SmfDecoder(source, layout, {
    onRecoverableError: (error) => {
      skippedEvents++;
      console.warn(`[decodeAllEvents] Skipping malformed event: ${error.message}`);
    },
  });

  const events: MidiEvent[] = [];
  for (let event = decoder.next(); event !== null; event = decoder.next()) {
    events.push(event);
  }
  return { events, length: decoder.endTime, skippedEvents };
}

/**
 * Single forward pass without keeping events: counts notes, measures the
 * length and records checkpoints.
 *
 * A fatal error ends the scan early instead of throwing; playback can still
 * run up to the damaged point and fails there.
 */
export function scanStream(
  source: ByteSource,
  layout: SmfLayout,
  checkpoints: CheckpointIndex,
  countsAsNote: (event: MidiEvent) => boolean
): StreamScanResult {
  let skippedEvents = 0;
  let totalNotes = 0;

  try {
    const decoder = new SmfDecoder(source, layout, {
      onRecoverableError: () => {
        skippedEvents++;
      },
    });
    for (;;) {
      checkpoints.record(decoder);
      const event = decoder.next();
      if (event === null) break;
      if (countsAsNote(event)) totalNotes++;
    }
    return { totalNotes, length: decoder.endTime, skippedEvents, error: null };
  } catch (error) {
    if (error instanceof MidiDecodeError && error.fatal) {
      return { totalNotes, length: null, skippedEvents, error };
    }
    throw error;
  }
}
