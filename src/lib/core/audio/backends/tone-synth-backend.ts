/**
 * Tone.js synthesizer backend
 *
 * Messages are queued by the engine and rendered from a context interval
 * every `bufferMs`, so the frame loop never waits on the audio graph.
 *
 * Signal path: instrument -> gate -> [low-pass -> limiter] -> destination
 */

import * as Tone from "tone";
import {
  DEFAULT_LAYER_COUNT,
  DEFAULT_QUEUE_CAPACITY,
  DEFAULT_SAMPLE_MAP,
  DEFAULT_SYNTH_BUFFER_MS,
  EFFECTS_CUTOFF_HZ,
  EFFECTS_LIMITER_DB,
  KILL_FADE_SECONDS,
  MIDI_CHANNEL_COUNT,
  MIDI_KEY_COUNT,
} from "@/core/constants";
import {
  CC_ALL_NOTES_OFF,
  CC_ALL_SOUND_OFF,
  CONTROL_CHANGE,
  commandOf,
  channelOf,
  isNoteOffMessage,
  isNoteOnMessage,
  messageData1,
  messageData2,
  messageStatus,
} from "@/core/midi/messages";
import { midiToNoteName } from "@/core/utils/midi/pitch";
import { BoundedEventQueue } from "../bounded-event-queue";
import type { XSynthBackend } from "../types";

export interface ToneSynthConfig {
  /** Render interval in milliseconds */
  bufferMs?: number;
  /** Sample directory; empty uses a PolySynth */
  soundfontPath?: string;
  /** Voices per key and channel; null disables the limit */
  layerCount?: number | null;
  fadeOutKill?: boolean;
  linearEnvelope?: boolean;
  useEffects?: boolean;
  queueCapacity?: number;
  debug?: boolean;
}

const DEFAULT_CONFIG: Required<ToneSynthConfig> = {
  bufferMs: DEFAULT_SYNTH_BUFFER_MS,
  soundfontPath: "",
  layerCount: DEFAULT_LAYER_COUNT,
  fadeOutKill: false,
  linearEnvelope: false,
  useEffects: true,
  queueCapacity: DEFAULT_QUEUE_CAPACITY,
  debug: false,
};

/**
 * The part of an instrument the backend drives. Sampler and PolySynth both
 * fit behind it.
 */
interface InstrumentHandle {
  /** @returns false when the note could not sound */
  attack(note: string, time: number, velocity: number): boolean;
  release(note: string, time: number): void;
  releaseAll(time: number): void;
  /** Resolves once the instrument can sound */
  loaded(): Promise<void>;
  dispose(): void;
}

function sampleBaseUrl(path: string): string {
  return path.endsWith("/") ? path : `${path}/`;
}

function createSamplerInstrument(
  path: string,
  curve: "linear" | "exponential",
  output: Tone.Gain
): InstrumentHandle {
  let loadError: Error | null = null;
  const sampler = new Tone.Sampler({
    urls: DEFAULT_SAMPLE_MAP,
    baseUrl: sampleBaseUrl(path),
    curve,
    onerror: (error: Error) => {
      loadError = error;
      console.error(`[ToneSynthBackend] Failed to load samples from ${path}:`, error);
    },
  }).connect(output);

  return {
    attack: (note, time, velocity) => {
      // Notes arriving before the buffers are in would throw inside Tone
      if (!sampler.loaded) return false;
      sampler.triggerAttack(note, time, velocity);
      return true;
    },
    release: (note, time) => {
      if (!sampler.loaded) return;
      sampler.triggerRelease(note, time);
    },
    releaseAll: (time) => {
      sampler.releaseAll(time);
    },
    loaded: async () => {
      await Tone.loaded();
      if (loadError) throw loadError;
    },
    dispose: () => {
      sampler.dispose();
    },
  };
}

function createPolySynthInstrument(
  curve: "linear" | "exponential",
  output: Tone.Gain
): InstrumentHandle {
  const synth = new Tone.PolySynth(Tone.Synth, {
    envelope: { releaseCurve: curve },
  }).connect(output);

  return {
    attack: (note, time, velocity) => {
      synth.triggerAttack(note, time, velocity);
      return true;
    },
    release: (note, time) => {
      synth.triggerRelease(note, time);
    },
    releaseAll: (time) => {
      synth.releaseAll(time);
    },
    loaded: async () => {},
    dispose: () => {
      synth.dispose();
    },
  };
}

export class ToneSynthBackend implements XSynthBackend {
  private readonly config: Required<ToneSynthConfig>;
  private readonly queue: BoundedEventQueue;
  /** Held voices per channel * 128 + key */
  private readonly layers = new Uint16Array(MIDI_CHANNEL_COUNT * MIDI_KEY_COUNT);
  private voices = 0;

  private readonly gate: Tone.Gain;
  private readonly effects: Array<Tone.Filter | Tone.Limiter> = [];
  private instrument: InstrumentHandle;
  private intervalId: number | null = null;
  private disposed = false;

  constructor(config: ToneSynthConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.queue = new BoundedEventQueue(this.config.queueCapacity);

    this.gate = new Tone.Gain(1);
    if (this.config.useEffects) {
      const filter = new Tone.Filter(EFFECTS_CUTOFF_HZ, "lowpass");
      const limiter = new Tone.Limiter(EFFECTS_LIMITER_DB);
      this.gate.chain(filter, limiter, Tone.getDestination());
      this.effects.push(filter, limiter);
    } else {
      this.gate.toDestination();
    }

    this.instrument = this.createInstrument(this.config.soundfontPath);
    this.intervalId = Tone.getContext().setInterval(
      () => this.render(),
      this.config.bufferMs / 1000
    );

    if (this.config.debug) {
      console.log("[ToneSynthBackend] Created", {
        bufferMs: this.config.bufferMs,
        soundfont: this.config.soundfontPath || "(oscillator)",
        layers: this.config.layerCount,
        effects: this.config.useEffects,
      });
    }
  }

  pushEvent(message: number): boolean {
    if (this.disposed) return false;
    return this.queue.push(message);
  }

  getVoiceCount(): number {
    return this.voices;
  }

  /** Messages waiting for the next render pass. */
  get pendingEvents(): number {
    return this.queue.size;
  }

  /**
   * Render every queued message now. Called from the context interval; also
   * usable to flush before a reset.
   */
  render(): void {
    if (this.disposed) return;
    const time = Tone.now();
    this.queue.drain((message) => this.apply(message, time));
  }

  reset(): void {
    this.queue.clear();
    this.silence(Tone.now());
  }

  setLayerCount(count: number | null): void {
    if (count !== null && (!Number.isInteger(count) || count < 1)) {
      throw new RangeError(`Layer count must be a positive integer or null, got ${count}`);
    }
    this.config.layerCount = count;
    if (this.config.debug) {
      console.log(`[ToneSynthBackend] Layer limit ${count ?? "off"}`);
    }
  }

  setSoundfont(path: string): void {
    if (this.disposed || path === this.config.soundfontPath) return;
    const previous = this.instrument;
    // Held voices belong to the old instrument
    previous.releaseAll(Tone.now());
    this.layers.fill(0);
    this.voices = 0;
    this.config.soundfontPath = path;
    this.instrument = this.createInstrument(path);
    previous.dispose();
    if (this.config.debug) {
      console.log(`[ToneSynthBackend] Soundfont ${path || "(oscillator)"}`);
    }
  }

  async ready(): Promise<void> {
    if (Tone.getContext().state !== "running") {
      await Tone.start();
    }
    await this.instrument.loaded();
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    if (this.intervalId !== null) {
      Tone.getContext().clearInterval(this.intervalId);
      this.intervalId = null;
    }
    this.queue.clear();
    this.instrument.dispose();
    this.effects.forEach((node) => node.dispose());
    this.gate.dispose();
  }

  private createInstrument(path: string): InstrumentHandle {
    const curve = this.config.linearEnvelope ? "linear" : "exponential";
    return path
      ? createSamplerInstrument(path, curve, this.gate)
      : createPolySynthInstrument(curve, this.gate);
  }

  private apply(message: number, time: number): void {
    const status = messageStatus(message);
    const channel = channelOf(status);
    const key = messageData1(message);

    if (isNoteOnMessage(message)) {
      this.noteOn(channel, key, messageData2(message), time);
    } else if (isNoteOffMessage(message)) {
      this.noteOff(channel, key, time);
    } else if (commandOf(status) === CONTROL_CHANGE && (key === CC_ALL_NOTES_OFF || key === CC_ALL_SOUND_OFF)) {
      this.channelOff(channel, time);
    }
  }

  private noteOn(channel: number, key: number, velocity: number, time: number): void {
    const slot = channel * MIDI_KEY_COUNT + key;
    const name = midiToNoteName(key);
    const limit = this.config.layerCount;
    if (limit !== null && this.layers[slot] >= limit) {
      // Oldest layer of this note goes first
      this.instrument.release(name, time);
      this.layers[slot] -= 1;
      this.voices -= 1;
    }
    if (!this.instrument.attack(name, time, velocity / 127)) return;
    this.layers[slot] += 1;
    this.voices += 1;
  }

  private noteOff(channel: number, key: number, time: number): void {
    const slot = channel * MIDI_KEY_COUNT + key;
    if (this.layers[slot] === 0) return;
    this.instrument.release(midiToNoteName(key), time);
    this.layers[slot] -= 1;
    this.voices -= 1;
  }

  private channelOff(channel: number, time: number): void {
    for (let key = 0; key < MIDI_KEY_COUNT; key++) {
      while (this.layers[channel * MIDI_KEY_COUNT + key] > 0) {
        this.noteOff(channel, key, time);
      }
    }
  }

  /**
   * Kill every voice. The gate either cuts or fades, then reopens once the
   * kill window has passed.
   */
  private silence(time: number): void {
    const gain = this.gate.gain;
    gain.cancelScheduledValues(time);
    if (this.config.fadeOutKill) {
      gain.setValueAtTime(1, time);
      gain.linearRampToValueAtTime(0, time + KILL_FADE_SECONDS);
    } else {
      gain.setValueAtTime(0, time);
    }
    this.instrument.releaseAll(time);
    gain.setValueAtTime(1, time + KILL_FADE_SECONDS);
    this.layers.fill(0);
    this.voices = 0;
  }
}
