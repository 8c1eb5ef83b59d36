import { Midi } from "@tonejs/midi";
import type { SmfLayout } from "@/core/parsers/smf-layout";
import type { MidiFileInfo } from "./types";

/**
 * Build file info from the chunk layout and, when the bytes are at hand,
 * the track metadata @tonejs/midi reads from them.
 */
export function readMidiInfo(
  layout: SmfLayout,
  path: string | null,
  bytes: Uint8Array | null
): MidiFileInfo {
  const info: MidiFileInfo = {
    path,
    format: layout.format,
    division: layout.division,
    trackCount: layout.tracks.length,
    title: null,
    trackNames: [],
    instruments: [],
  };
  if (bytes === null) return info;

  try {
    const midi = new Midi(bytes);
    const tracks = midi.tracks.map((track) => ({
      name: track.name,
      instrument: track.notes.length > 0 ? track.instrument.name : null,
    }));
    // @tonejs/midi drops a note-less conductor track in format 1 files; its
    // name is the one it reports as the file name
    if (tracks.length === layout.tracks.length - 1) {
      tracks.unshift({ name: midi.name, instrument: null });
    }
    info.title = midi.name || null;
    info.trackNames = layout.tracks.map((_, index) => tracks[index]?.name ?? "");
    info.instruments = layout.tracks.map((_, index) => tracks[index]?.instrument ?? null);
  } catch (error) {
    console.warn(`[readMidiInfo] Could not read track metadata of ${path ?? "buffer"}:`, error);
  }
  return info;
}
