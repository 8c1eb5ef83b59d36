/**
 * Settings validation
 */

import { SettingsError } from "@/core/errors";
import { DEFAULT_PALETTES } from "@/core/midi/palette";
import { DEFAULT_MIDI_SETTINGS, DEFAULT_SYNTH_SETTINGS } from "./defaults";
import type { MidiSettings, PlayerSettings, PlayerSettingsInput, SynthSettings } from "./types";

/**
 * Ensure a value is within valid range
 */
export function ensureInRange(value: number, min: number, max: number, name: string): void {
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new SettingsError(name, `must be between ${min} and ${max}, got ${value}`);
  }
}

/**
 * Ensure a value is an integer within valid range
 */
export function ensureIntegerInRange(value: number, min: number, max: number, name: string): void {
  if (!Number.isInteger(value)) {
    throw new SettingsError(name, `must be an integer, got ${value}`);
  }
  ensureInRange(value, min, max, name);
}

/**
 * Validation helpers for each settings group
 */
export const SettingsValidation = {
  validateSynth(synth: SynthSettings): void {
    if (synth.synth !== "xsynth" && synth.synth !== "kdmapi") {
      throw new SettingsError("synth.synth", `expected "xsynth" or "kdmapi", got "${String(synth.synth)}"`);
    }
    ensureInRange(synth.bufferMs, 1, 1000, "synth.bufferMs");
    ensureIntegerInRange(synth.layerCount, 1, 1024, "synth.layerCount");
    ensureIntegerInRange(synth.velIgnore.lo, 0, 127, "synth.velIgnore.lo");
    ensureIntegerInRange(synth.velIgnore.hi, 0, 127, "synth.velIgnore.hi");
    if (synth.velIgnore.lo > synth.velIgnore.hi) {
      throw new SettingsError(
        "synth.velIgnore",
        `lo (${synth.velIgnore.lo}) must not exceed hi (${synth.velIgnore.hi})`
      );
    }
    ensureIntegerInRange(synth.queueCapacity, 1, 1 << 24, "synth.queueCapacity");
  },

  validateMidi(midi: MidiSettings): void {
    if (midi.loading !== "ram" && midi.loading !== "live") {
      throw new SettingsError("midi.loading", `expected "ram" or "live", got "${String(midi.loading)}"`);
    }
    if (!DEFAULT_PALETTES.some((palette) => palette.id === midi.palette)) {
      throw new SettingsError("midi.palette", `unknown palette "${midi.palette}"`);
    }
    ensureIntegerInRange(midi.keyRange.first, 0, 127, "midi.keyRange.first");
    ensureIntegerInRange(midi.keyRange.last, 0, 127, "midi.keyRange.last");
    if (midi.keyRange.first > midi.keyRange.last) {
      throw new SettingsError(
        "midi.keyRange",
        `first (${midi.keyRange.first}) must not exceed last (${midi.keyRange.last})`
      );
    }
    ensureIntegerInRange(midi.checkpointStride, 1, 1 << 24, "midi.checkpointStride");
    ensureInRange(midi.lookaheadSeconds, 0, 60, "midi.lookaheadSeconds");
    ensureInRange(midi.seekStep, 0.001, 3600, "midi.seekStep");
  },
};

/**
 * Merge partial settings over the defaults and validate the result.
 *
 * @throws SettingsError for the first invalid value
 */
export function resolvePlayerSettings(input: PlayerSettingsInput = {}): PlayerSettings {
  const synth: SynthSettings = {
    ...DEFAULT_SYNTH_SETTINGS,
    ...input.synth,
    velIgnore: { ...DEFAULT_SYNTH_SETTINGS.velIgnore, ...input.synth?.velIgnore },
  };
  const midi: MidiSettings = {
    ...DEFAULT_MIDI_SETTINGS,
    ...input.midi,
    keyRange: { ...DEFAULT_MIDI_SETTINGS.keyRange, ...input.midi?.keyRange },
  };

  SettingsValidation.validateSynth(synth);
  SettingsValidation.validateMidi(midi);

  return { synth, midi, debug: input.debug ?? false };
}
