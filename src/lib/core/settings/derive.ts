import type { MidiLoadOptions } from "@/core/file/types";
import type { PlaybackEngineConfig } from "@/core/playback/playback-engine";
import type { PlayerSettings } from "./types";

/**
 * Load options for a file played with `settings`. The velocity-ignore range
 * comes from the synth settings, so `totalNotes` counts exactly the note-ons
 * the audio dispatch will send.
 */
export function midiLoadOptionsFrom(settings: PlayerSettings): MidiLoadOptions {
  return {
    loading: settings.midi.loading,
    velIgnore: settings.synth.velIgnore,
    checkpointStride: settings.midi.checkpointStride,
    lookaheadSeconds: settings.midi.lookaheadSeconds,
    debug: settings.debug,
  };
}

export function engineConfigFrom(settings: PlayerSettings): PlaybackEngineConfig {
  return {
    randomColors: settings.midi.randomColors,
    paletteId: settings.midi.palette,
    keyRange: settings.midi.keyRange,
    seekStep: settings.midi.seekStep,
    debug: settings.debug,
  };
}
