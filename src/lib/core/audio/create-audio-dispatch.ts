import { AudioBackendError } from "@/core/errors";
import type { SynthSettings } from "@/core/settings";
import { AudioDispatch } from "./audio-dispatch";
import { MidiPortBackend } from "./backends/pass-through-backend";
import { ToneSynthBackend } from "./backends/tone-synth-backend";
import type { AudioBackend, MidiOutputPort } from "./types";

export interface AudioDispatchEnvironment {
  /** Required for the kdmapi backend */
  outputPort?: MidiOutputPort;
  debug?: boolean;
}

function createBackend(settings: SynthSettings, environment: AudioDispatchEnvironment): AudioBackend {
  switch (settings.synth) {
    case "xsynth":
      try {
        return {
          kind: "xsynth",
          backend: new ToneSynthBackend({
            bufferMs: settings.bufferMs,
            soundfontPath: settings.soundfontPath,
            layerCount: settings.limitLayers ? settings.layerCount : null,
            fadeOutKill: settings.fadeOutKill,
            linearEnvelope: settings.linearEnvelope,
            useEffects: settings.useEffects,
            queueCapacity: settings.queueCapacity,
            debug: environment.debug ?? false,
          }),
        };
      } catch (error) {
        throw new AudioBackendError("Failed to start the Tone.js synthesizer", { cause: error });
      }
    case "kdmapi":
      if (!environment.outputPort) {
        throw new AudioBackendError("The kdmapi backend needs a MIDI output port");
      }
      return { kind: "kdmapi", backend: new MidiPortBackend(environment.outputPort) };
  }
}

/**
 * Build the audio dispatch selected by the synth settings.
 *
 * @throws AudioBackendError when the backend cannot be created
 */
export function createAudioDispatch(
  settings: SynthSettings,
  environment: AudioDispatchEnvironment = {}
): AudioDispatch {
  return new AudioDispatch(createBackend(settings, environment), {
    velIgnore: settings.velIgnore,
    debug: environment.debug ?? false,
  });
}
