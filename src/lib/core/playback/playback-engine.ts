/**
 * PlaybackEngine - drives the timeline from the playback clock
 *
 * The renderer calls `tick()` once per frame. Every event that became due
 * since the previous tick is dispatched to audio in one go and mirrored into
 * the key colors, so a stalled frame or a forward seek plays the skipped
 * range as a burst. Time moving backwards resets audio and colors and
 * repositions the timeline; notes already sounding at the target stay silent
 * until their next note-on.
 */

import type { AudioDispatch } from "@/core/audio/audio-dispatch";
import { MidiDecodeError } from "@/core/errors";
import type { LoadedMidi } from "@/core/file/types";
import { ChannelColorPolicy } from "@/core/midi/color-policy";
import { channelOf, isNoteOff, isNoteOn, packMessage } from "@/core/midi/messages";
import type { MidiEvent, NoteColor } from "@/core/midi/types";
import { DEFAULT_PLAYER_SETTINGS, type KeyRange } from "@/core/settings";
import { clamp, formatProgressLabel, ListenerManager } from "@/core/utils";
import { FrameRateMeter } from "./frame-rate-meter";
import { NoteColorState } from "./note-color-state";
import { PlaybackClock, performanceTimeSource, type TimeSource } from "./playback-clock";
import type { PlaybackState, PlaybackStats } from "./types";

/**
 * Playback engine configuration
 */
export interface PlaybackEngineConfig {
  /** Wall-clock source in seconds, shared by the clock and the FPS meter */
  timeSource?: TimeSource;
  /** Random per-channel colors instead of the palette */
  randomColors?: boolean;
  /** Randomness for random colors */
  random?: () => number;
  /** Channel palette id */
  paletteId?: string;
  /** Default range returned by `keyColors()` */
  keyRange?: KeyRange;
  /** Default step of `seekBy()` in seconds */
  seekStep?: number;
  /** Log lifecycle messages */
  debug?: boolean;
}

/**
 * Default configuration values
 */
const DEFAULT_CONFIG: Required<PlaybackEngineConfig> = {
  timeSource: performanceTimeSource,
  randomColors: DEFAULT_PLAYER_SETTINGS.midi.randomColors,
  random: Math.random,
  paletteId: DEFAULT_PLAYER_SETTINGS.midi.palette,
  keyRange: DEFAULT_PLAYER_SETTINGS.midi.keyRange,
  seekStep: DEFAULT_PLAYER_SETTINGS.midi.seekStep,
  debug: false,
};

export class PlaybackEngine {
  private readonly config: Required<PlaybackEngineConfig>;
  private readonly colors = new NoteColorState();
  private readonly colorPolicy: ChannelColorPolicy;
  private readonly fpsMeter = new FrameRateMeter();
  private readonly stateListeners = new ListenerManager<[PlaybackState, PlaybackState]>();

  private state: PlaybackState = "idle";
  private midi: LoadedMidi | null = null;
  private clock: PlaybackClock | null = null;

  /** Clock reading at the end of the previous tick */
  private lastTime = 0;
  /** A seek since the previous tick targeted a time before `lastTime` */
  private backwardSeekPending = false;
  private notesRendered = 0;
  private voiceCount = 0;

  constructor(
    private readonly audio: AudioDispatch,
    config: PlaybackEngineConfig = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.colorPolicy = new ChannelColorPolicy({
      randomColors: this.config.randomColors,
      paletteId: this.config.paletteId,
      random: this.config.random,
    });
  }

  getState(): PlaybackState {
    return this.state;
  }

  isLoaded(): boolean {
    return this.midi !== null;
  }

  isPlaying(): boolean {
    return this.state === "loaded-playing";
  }

  /**
   * Subscribe to state transitions.
   * @returns unsubscribe function
   */
  onStateChange(listener: (next: PlaybackState, previous: PlaybackState) => void): () => void {
    return this.stateListeners.add(listener);
  }

  /**
   * Open a loaded file, closing the current one first. Playback starts
   * paused at 0.
   */
  open(midi: LoadedMidi): void {
    this.ensureNotDisposed();
    if (this.midi) {
      this.close();
    }
    this.midi = midi;
    this.clock = new PlaybackClock(this.config.timeSource);
    this.lastTime = 0;
    this.backwardSeekPending = false;
    this.notesRendered = 0;
    this.colors.clear();
    this.colorPolicy.reshuffle();
    this.audio.reset();

    if (this.config.debug) {
      console.log("[PlaybackEngine] Opened", {
        path: midi.info.path,
        mode: midi.timeline.kind,
        totalNotes: midi.totalNotes,
        length: midi.length,
      });
    }
    this.setState("loaded-paused");
  }

  play(): void {
    if (!this.clock) return;
    this.clock.play();
    this.setState("loaded-playing");
  }

  pause(): void {
    if (!this.clock) return;
    this.clock.pause();
    this.setState("loaded-paused");
  }

  togglePause(): void {
    if (this.isPlaying()) {
      this.pause();
    } else {
      this.play();
    }
  }

  /**
   * Move playback to `seconds`. Applied at the next tick; negative targets
   * clamp to 0 and non-finite ones are ignored.
   */
  seek(seconds: number): void {
    if (!this.clock) return;
    this.clock.seek(seconds);
    if (this.clock.getTime() < this.lastTime) {
      this.backwardSeekPending = true;
    }
  }

  /** Seek relative to the current time; defaults to one `seekStep` forward. */
  seekBy(delta: number = this.config.seekStep): void {
    this.seek(this.getTime() + delta);
  }

  /** Seek to a fraction (0..1) of the file length. */
  seekToProgress(fraction: number): void {
    const length = this.midiLength();
    if (length === null || !Number.isFinite(fraction)) return;
    this.seek(clamp(fraction, 0, 1) * length);
  }

  getTime(): number {
    return this.clock?.getTime() ?? 0;
  }

  /** Length in seconds, null when unknown or nothing is open. */
  midiLength(): number | null {
    return this.midi?.length ?? null;
  }

  /** Position as a fraction of the length, 0 when the length is unknown. */
  progress(): number {
    const length = this.midiLength();
    if (length === null || length <= 0) return 0;
    return clamp(this.getTime() / length, 0, 1);
  }

  progressLabel(): string {
    return formatProgressLabel(this.getTime(), this.midiLength());
  }

  /**
   * Advance one frame: dispatch every event due up to the clock time.
   *
   * @throws MidiDecodeError when a streamed file turns out to be corrupt;
   *   the file is closed before the error is rethrown
   */
  tick(): PlaybackStats {
    this.fpsMeter.update(this.config.timeSource());

    const midi = this.midi;
    const clock = this.clock;
    if (midi && clock) {
      const now = clock.getTime();
      try {
        if (this.backwardSeekPending || now < this.lastTime) {
          this.resync(midi, now);
        }
        midi.timeline.pullUntil(now, (event) => this.handleEvent(event));
      } catch (error) {
        if (error instanceof MidiDecodeError) {
          console.error("[PlaybackEngine] Playback stopped on a corrupt stream:", error.message);
          this.close();
        }
        throw error;
      }
      this.lastTime = now;
    }

    this.voiceCount = this.audio.getVoiceCount();
    return this.stats();
  }

  stats(): PlaybackStats {
    return {
      totalNotes: this.midi?.totalNotes ?? 0,
      notesRendered: this.notesRendered,
      voiceCount: this.voiceCount,
      droppedEvents: this.audio.droppedEvents,
      skippedEvents: this.midi?.timeline.skippedEvents ?? 0,
      fps: this.fpsMeter.fps,
    };
  }

  /**
   * Key colors for `range` (inclusive), null for silent keys.
   */
  keyColors(range: KeyRange = this.config.keyRange): Array<NoteColor | null> {
    return this.colors.slice(range.first, range.last);
  }

  /** Color of a single key, null when silent. */
  keyColor(key: number): NoteColor | null {
    return this.colors.get(key);
  }

  /**
   * Close the current file. Audio is reset before the timeline is released.
   */
  close(): void {
    if (!this.midi) return;
    const midi = this.midi;
    this.audio.reset();
    this.colors.clear();
    this.midi = null;
    this.clock = null;
    this.lastTime = 0;
    this.backwardSeekPending = false;
    this.notesRendered = 0;
    this.voiceCount = 0;
    midi.timeline.close();

    if (this.config.debug) {
      console.log("[PlaybackEngine] Closed", midi.info.path);
    }
    this.setState("idle");
  }

  /**
   * Close any file and stop accepting calls. The audio dispatch is owned by
   * the caller and stays alive.
   */
  dispose(): void {
    if (this.state === "closed") return;
    this.close();
    this.setState("closed");
    this.stateListeners.clear();
  }

  private ensureNotDisposed(): void {
    if (this.state === "closed") {
      throw new Error("[PlaybackEngine] Engine has been disposed");
    }
  }

  private resync(midi: LoadedMidi, now: number): void {
    this.audio.reset();
    this.colors.clear();
    this.notesRendered = 0;
    midi.timeline.seek(now);
    this.backwardSeekPending = false;
  }

  private handleEvent(event: MidiEvent): void {
    const outcome = this.audio.dispatch(packMessage(event));
    if (outcome === "suppressed") return;

    if (isNoteOn(event)) {
      if (outcome === "sent") this.notesRendered++;
      this.colors.noteOn(event.data1, this.colorPolicy.colorFor(channelOf(event.status)));
    } else if (isNoteOff(event)) {
      this.colors.noteOff(event.data1);
    }
  }

  private setState(next: PlaybackState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    this.stateListeners.notify(next, previous);
  }
}

/**
 * Factory function to create a PlaybackEngine
 */
export function createPlaybackEngine(
  audio: AudioDispatch,
  config?: PlaybackEngineConfig
): PlaybackEngine {
  return new PlaybackEngine(audio, config);
}
