/**
 * AudioDispatch - fans timeline events out to the selected synth backend
 *
 * The backend variant is fixed at construction. Every operation switches on
 * it; operations a variant does not support are no-ops.
 */

import { MIDI_KEY_COUNT, MIDI_CHANNEL_COUNT } from "@/core/constants";
import {
  channelOf,
  isNoteOffMessage,
  isNoteOnMessage,
  messageData1,
  messageData2,
  messageStatus,
} from "@/core/midi/messages";
import type { VelocityRange } from "@/core/midi/types";
import { isIgnoredVelocity, normalizeVelocityRange } from "@/core/midi/velocity-filter";
import type { SynthKind } from "@/core/settings";
import type { AudioBackend, DispatchOutcome } from "./types";

export interface AudioDispatchOptions {
  /** Note-ons with a velocity in this range are not sent */
  velIgnore?: VelocityRange | null;
  debug?: boolean;
}

/** Log one warning per this many dropped events */
const DROP_WARNING_INTERVAL = 1000;

export class AudioDispatch {
  private readonly velIgnore: VelocityRange | null;
  private readonly debug: boolean;
  /** Suppressed note-ons still waiting for their note-off, per channel * 128 + key */
  private readonly suppressed = new Uint16Array(MIDI_CHANNEL_COUNT * MIDI_KEY_COUNT);
  private dropped = 0;
  private disposed = false;

  constructor(private readonly backend: AudioBackend, options: AudioDispatchOptions = {}) {
    this.velIgnore = normalizeVelocityRange(options.velIgnore);
    this.debug = options.debug ?? false;
    if (this.debug) {
      console.log(`[AudioDispatch] Using ${backend.kind} backend`);
    }
  }

  get kind(): SynthKind {
    return this.backend.kind;
  }

  /** Messages rejected by a full backend queue since construction. */
  get droppedEvents(): number {
    return this.dropped;
  }

  /**
   * Hand a packed message to the backend as is.
   * @returns false when the backend dropped it
   */
  pushEvent(message: number): boolean {
    if (this.disposed) return false;
    const accepted = this.backend.backend.pushEvent(message);
    if (!accepted) {
      this.dropped += 1;
      if (this.dropped % DROP_WARNING_INTERVAL === 1) {
        console.warn(`[AudioDispatch] Synth queue full, ${this.dropped} event(s) dropped so far`);
      }
    }
    return accepted;
  }

  /**
   * Apply the velocity-ignore filter, then push.
   */
  dispatch(message: number): DispatchOutcome {
    if (this.velIgnore !== null) {
      const slot = channelOf(messageStatus(message)) * MIDI_KEY_COUNT + messageData1(message);
      if (isNoteOnMessage(message) && isIgnoredVelocity(messageData2(message), this.velIgnore)) {
        this.suppressed[slot] += 1;
        return "suppressed";
      }
      if (isNoteOffMessage(message) && this.suppressed[slot] > 0) {
        this.suppressed[slot] -= 1;
        return "suppressed";
      }
    }
    return this.pushEvent(message) ? "sent" : "dropped";
  }

  /** Silence the backend and forget pending suppressions. */
  reset(): void {
    this.suppressed.fill(0);
    if (this.disposed) return;
    switch (this.backend.kind) {
      case "xsynth":
        this.backend.backend.reset();
        break;
      case "kdmapi":
        this.backend.backend.reset();
        break;
    }
  }

  getVoiceCount(): number {
    switch (this.backend.kind) {
      case "xsynth":
        return this.backend.backend.getVoiceCount();
      case "kdmapi":
        return 0;
    }
  }

  setLayerCount(count: number | null): void {
    switch (this.backend.kind) {
      case "xsynth":
        this.backend.backend.setLayerCount(count);
        break;
      case "kdmapi":
        if (this.debug) console.log("[AudioDispatch] Layer limit is not supported by kdmapi");
        break;
    }
  }

  setSoundfont(path: string): void {
    switch (this.backend.kind) {
      case "xsynth":
        this.backend.backend.setSoundfont(path);
        break;
      case "kdmapi":
        if (this.debug) console.log("[AudioDispatch] Soundfonts are not supported by kdmapi");
        break;
    }
  }

  async ready(): Promise<void> {
    switch (this.backend.kind) {
      case "xsynth":
        await this.backend.backend.ready();
        break;
      case "kdmapi":
        break;
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.backend.backend.dispose();
  }
}
