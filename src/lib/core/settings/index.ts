export type {
  KeyRange,
  MidiLoading,
  MidiSettings,
  PlayerSettings,
  PlayerSettingsInput,
  SynthKind,
  SynthSettings,
} from "./types";
export { DEFAULT_MIDI_SETTINGS, DEFAULT_PLAYER_SETTINGS, DEFAULT_SYNTH_SETTINGS } from "./defaults";
export { resolvePlayerSettings, SettingsValidation } from "./validation";
export { engineConfigFrom, midiLoadOptionsFrom } from "./derive";
