import { MIDI_CHANNEL_COUNT } from "@/core/constants";
import { getPalette, paletteColor } from "./palette";
import type { ColorPalette, NoteColor } from "./types";

export interface ChannelColorPolicyOptions {
  /** Assign each channel a random color on first use */
  randomColors?: boolean;
  paletteId?: string;
  /** Source of randomness in [0, 1) */
  random?: () => number;
}

/**
 * Decides which color a channel's notes light up with.
 *
 * Random colors are drawn once per channel and kept until `reshuffle()`,
 * so a channel keeps its color across seeks.
 */
export class ChannelColorPolicy {
  private readonly palette: ColorPalette;
  private readonly randomColors: boolean;
  private readonly random: () => number;
  private readonly cache: Array<NoteColor | undefined> = new Array(MIDI_CHANNEL_COUNT);

  constructor(options: ChannelColorPolicyOptions = {}) {
    this.palette = getPalette(options.paletteId);
    this.randomColors = options.randomColors ?? false;
    this.random = options.random ?? Math.random;
  }

  get isRandom(): boolean {
    return this.randomColors;
  }

  colorFor(channel: number): NoteColor {
    const cached = this.cache[channel];
    if (cached !== undefined) return cached;

    const color = this.randomColors
      ? Math.floor(this.random() * 0x1000000) & 0xffffff
      : paletteColor(this.palette, channel);
    this.cache[channel] = color;
    return color;
  }

  /** Forget random colors so the next file gets fresh ones. */
  reshuffle(): void {
    this.cache.fill(undefined);
  }
}
