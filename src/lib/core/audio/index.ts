export { AudioDispatch } from "./audio-dispatch";
export type { AudioDispatchOptions } from "./audio-dispatch";
export { createAudioDispatch } from "./create-audio-dispatch";
export type { AudioDispatchEnvironment } from "./create-audio-dispatch";
export { BoundedEventQueue } from "./bounded-event-queue";
export { MidiPortBackend } from "./backends/pass-through-backend";
export { ToneSynthBackend } from "./backends/tone-synth-backend";
export type { ToneSynthConfig } from "./backends/tone-synth-backend";
export type {
  AudioBackend,
  DispatchOutcome,
  MidiOutputPort,
  PassThroughBackend,
  XSynthBackend,
} from "./types";
