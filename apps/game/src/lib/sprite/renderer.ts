import type { Palette, PixelGrid } from "@pocket-quest/sprite-schema";
import { COLOR_INDEX } from "@pocket-quest/sprite-schema";
import { gridSize } from "../grid/transform";

/** Anything that can fill an axis-aligned rectangle with a 0xRRGGBB color. */
export interface RectPainter {
  fillRect(x: number, y: number, width: number, height: number, color: number): void;
}

export type PaintOptions = {
  scale: number;
  originX: number;
  originY: number;
};

/** Offset that centers the grid on its owner's position. */
export function centeredOrigin(grid: PixelGrid, scale: number): { originX: number; originY: number } {
  const { width, height } = gridSize(grid);
  return { originX: -(width * scale) / 2, originY: -(height * scale) / 2 };
}

/**
 * Paint one `scale`-sized square per opaque cell.
 * Index 0 and indices past the end of the palette are skipped.
 *
 * @returns the number of rectangles painted
 */
export function paintGrid(
  painter: RectPainter,
  grid: PixelGrid,
  palette: Palette,
  options: PaintOptions,
): number {
  const { scale, originX, originY } = options;
  let painted = 0;
  grid.forEach((row, r) => {
    row.forEach((index, c) => {
      if (index === COLOR_INDEX.transparent) return;
      const color = palette[index];
      if (color === undefined) return;
      painter.fillRect(originX + c * scale, originY + r * scale, scale, scale, color);
      painted++;
    });
  });
  return painted;
}
