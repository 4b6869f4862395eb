import type { Palette } from "@pocket-quest/sprite-schema";

/** "#RRGGBB" to 0xRRGGBB */
export function hexToColor(hex: string): number {
  return Number.parseInt(hex.slice(1), 16);
}

/** Build an immutable palette from validated hex strings. */
export function buildPalette(colors: readonly string[]): Palette {
  return Object.freeze(colors.map(hexToColor));
}
