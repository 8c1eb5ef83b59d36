import { MIDI_CHANNEL_COUNT } from "@/core/constants";
import {
  CC_ALL_SOUND_OFF,
  CC_RESET_ALL_CONTROLLERS,
  CONTROL_CHANGE,
  messageBytes,
} from "@/core/midi/messages";
import type { MidiOutputPort, PassThroughBackend } from "../types";

/**
 * Forwards every message to an external synthesizer through a host port.
 * The receiver renders the audio; nothing here tracks voices.
 */
export class MidiPortBackend implements PassThroughBackend {
  private closed = false;

  constructor(private readonly port: MidiOutputPort) {}

  pushEvent(message: number): boolean {
    if (this.closed) return false;
    this.port.send(messageBytes(message));
    return true;
  }

  reset(): void {
    if (this.closed) return;
    for (let channel = 0; channel < MIDI_CHANNEL_COUNT; channel++) {
      this.port.send([CONTROL_CHANGE | channel, CC_ALL_SOUND_OFF, 0]);
      this.port.send([CONTROL_CHANGE | channel, CC_RESET_ALL_CONTROLLERS, 0]);
    }
  }

  dispose(): void {
    if (this.closed) return;
    this.reset();
    this.closed = true;
    this.port.close?.();
  }
}
