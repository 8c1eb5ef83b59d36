import {
  DEFAULT_CHECKPOINT_STRIDE,
  DEFAULT_LAYER_COUNT,
  DEFAULT_LOOKAHEAD_SECONDS,
  DEFAULT_QUEUE_CAPACITY,
  DEFAULT_SEEK_STEP_SECONDS,
  DEFAULT_SYNTH_BUFFER_MS,
} from "@/core/constants";
import { DEFAULT_PALETTE_ID } from "@/core/midi/palette";
import type { MidiSettings, PlayerSettings, SynthSettings } from "./types";

export const DEFAULT_SYNTH_SETTINGS: SynthSettings = {
  synth: "xsynth",
  bufferMs: DEFAULT_SYNTH_BUFFER_MS,
  soundfontPath: "",
  limitLayers: true,
  layerCount: DEFAULT_LAYER_COUNT,
  // 0..0 only touches note-ons that are really note-offs: no-op
  velIgnore: { lo: 0, hi: 0 },
  fadeOutKill: false,
  linearEnvelope: false,
  useEffects: true,
  queueCapacity: DEFAULT_QUEUE_CAPACITY,
};

export const DEFAULT_MIDI_SETTINGS: MidiSettings = {
  loading: "ram",
  randomColors: false,
  palette: DEFAULT_PALETTE_ID,
  keyRange: { first: 0, last: 127 },
  checkpointStride: DEFAULT_CHECKPOINT_STRIDE,
  lookaheadSeconds: DEFAULT_LOOKAHEAD_SECONDS,
  seekStep: DEFAULT_SEEK_STEP_SECONDS,
};

export const DEFAULT_PLAYER_SETTINGS: PlayerSettings = {
  synth: DEFAULT_SYNTH_SETTINGS,
  midi: DEFAULT_MIDI_SETTINGS,
  debug: false,
};
