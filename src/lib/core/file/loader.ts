/**
 * MIDI file loading
 *
 * Reads the chunk layout, then builds the timeline variant selected by
 * `loading`: a fully decoded BufferedTimeline, or a StreamedTimeline over the
 * open source with checkpoints from a load-time scan.
 */

import { readFile } from "node:fs/promises";
import { DEFAULT_CHECKPOINT_STRIDE, DEFAULT_LOOKAHEAD_SECONDS } from "@/core/constants";
import { MidiDecodeError, MidiLoadError } from "@/core/errors";
import { isNoteOn } from "@/core/midi/messages";
import type { MidiEvent } from "@/core/midi/types";
import { isIgnoredVelocity, normalizeVelocityRange } from "@/core/midi/velocity-filter";
import { BufferByteSource, FileByteSource, type ByteSource } from "@/core/parsers/byte-source";
import { readSmfLayout, type SmfLayout } from "@/core/parsers/smf-layout";
import {
  BufferedTimeline,
  CheckpointIndex,
  StreamedTimeline,
  decodeAllEvents,
  scanStream,
  type DecodedEvents,
} from "@/core/timeline";
import { readMidiInfo } from "./metadata";
import type { LoadedMidi, MidiLoadOptions } from "./types";

function noteCounter(options: MidiLoadOptions): (event: MidiEvent) => boolean {
  const range = normalizeVelocityRange(options.velIgnore);
  return (event) => isNoteOn(event) && !isIgnoredVelocity(event.data2, range);
}

function loadBuffered(
  source: ByteSource,
  layout: SmfLayout,
  path: string | null,
  bytes: Uint8Array,
  options: MidiLoadOptions
): LoadedMidi {
  let decoded: DecodedEvents;
  try {
    decoded = decodeAllEvents(source, layout);
  } catch (error) {
    if (error instanceof MidiDecodeError) {
      throw new MidiLoadError(error.message, path, { cause: error });
    }
    throw error;
  } finally {
    source.close();
  }

  const countsAsNote = noteCounter(options);
  let totalNotes = 0;
  for (const event of decoded.events) {
    if (countsAsNote(event)) totalNotes++;
  }

  return {
    timeline: new BufferedTimeline(decoded.events, decoded.skippedEvents),
    totalNotes,
    length: decoded.length,
    info: readMidiInfo(layout, path, bytes),
  };
}

function loadStreamed(
  source: ByteSource,
  layout: SmfLayout,
  path: string | null,
  bytes: Uint8Array | null,
  options: MidiLoadOptions
): LoadedMidi {
  const checkpoints = new CheckpointIndex(options.checkpointStride ?? DEFAULT_CHECKPOINT_STRIDE);
  const scan = scanStream(source, layout, checkpoints, noteCounter(options));
  if (scan.error) {
    console.warn(
      `[loadMidiFile] ${path ?? "buffer"} is damaged, playback will stop at the damaged point: ${scan.error.message}`
    );
  }

  let timeline: StreamedTimeline;
  try {
    timeline = new StreamedTimeline(source, layout, {
      lookaheadSeconds: options.lookaheadSeconds ?? DEFAULT_LOOKAHEAD_SECONDS,
      checkpoints,
    });
  } catch (error) {
    source.close();
    if (error instanceof MidiDecodeError) {
      throw new MidiLoadError(error.message, path, { cause: error });
    }
    throw error;
  }

  return {
    timeline,
    totalNotes: scan.totalNotes,
    length: scan.length,
    info: readMidiInfo(layout, path, bytes),
  };
}

function loadFromSource(
  source: ByteSource,
  path: string | null,
  bytes: Uint8Array | null,
  options: MidiLoadOptions
): LoadedMidi {
  let layout: SmfLayout;
  try {
    layout = readSmfLayout(source, path);
  } catch (error) {
    source.close();
    throw error;
  }

  const loaded =
    options.loading === "live" || bytes === null
      ? loadStreamed(source, layout, path, bytes, options)
      : loadBuffered(source, layout, path, bytes, options);

  if (options.debug) {
    console.log(`[loadMidiFile] Loaded ${path ?? "buffer"}`, {
      mode: loaded.timeline.kind,
      tracks: layout.tracks.length,
      notes: loaded.totalNotes,
      length: loaded.length,
    });
  }
  return loaded;
}

/**
 * Load a MIDI file from disk.
 *
 * @throws MidiLoadError when the file cannot be read or is not a usable SMF
 */
export async function loadMidiFile(path: string, options: MidiLoadOptions = {}): Promise<LoadedMidi> {
  if (options.loading === "live") {
    let source: FileByteSource;
    try {
      source = new FileByteSource(path);
    } catch (error) {
      throw new MidiLoadError(`Cannot open ${path}`, path, { cause: error });
    }
    return loadFromSource(source, path, null, options);
  }

  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (error) {
    throw new MidiLoadError(`Cannot read ${path}`, path, { cause: error });
  }
  return loadFromSource(new BufferByteSource(bytes), path, bytes, options);
}

/**
 * Load a MIDI file that is already in memory. `live` streams from the
 * buffer instead of decoding it up front.
 *
 * @throws MidiLoadError when the bytes are not a usable SMF
 */
export function loadMidiBuffer(bytes: Uint8Array, options: MidiLoadOptions = {}): LoadedMidi {
  return loadFromSource(new BufferByteSource(bytes), null, bytes, options);
}
