import type { ColorPalette, NoteColor } from "./types";

export const DEFAULT_PALETTE_ID = "channels";

/**
 * Key highlight palettes, one color per MIDI channel
 */
export const DEFAULT_PALETTES: ColorPalette[] = [
  {
    id: "channels",
    name: "Channels",
    /**
     * Tableau-inspired base set followed by lighter companions,
     * so channels 1-8 and 9-16 stay distinguishable.
     */
    colors: [
      0x4e79a7, // Blue
      0xf28e2b, // Orange
      0x59a14f, // Green
      0xe15759, // Red
      0xb07aa1, // Purple
      0x76b7b2, // Teal
      0xedc948, // Mustard
      0x9c755f, // Brown
      0xa0cbe8, // Light blue
      0xffbe7d, // Light orange
      0x8cd17d, // Light green
      0xff9d9a, // Salmon
      0xd4a6c8, // Lilac
      0x86bcb6, // Sea green
      0xf1ce63, // Sand
      0xd7b5a6, // Tan
    ],
  },
  {
    id: "vibrant",
    name: "Vibrant (Accessible)",
    // Okabe-Ito based, repeated darker for the upper channels
    colors: [
      0xb91c1c, // Red (dark)
      0x3b82f6, // Blue (brighter)
      0x0d9488, // Teal
      0x009e73, // Bluish green
      0xcc79a7, // Reddish purple
      0x2c7fb8, // Sky blue (darker)
      0xb35c00, // Burnt orange
      0x56b4e9, // Sky blue
      0x7f1d1d,
      0x1d4ed8,
      0x115e59,
      0x006d50,
      0x9d4f7c,
      0x1f5a82,
      0x804200,
      0x3a86b0,
    ],
  },
];

/**
 * Look up a palette by id, falling back to the default one.
 */
export function getPalette(id: string = DEFAULT_PALETTE_ID): ColorPalette {
  return DEFAULT_PALETTES.find((p) => p.id === id) ?? DEFAULT_PALETTES[0];
}

/**
 * Palette color for a channel, wrapping when the palette is shorter than 16.
 */
export function paletteColor(palette: ColorPalette, channel: number): NoteColor {
  return palette.colors[channel % palette.colors.length];
}
