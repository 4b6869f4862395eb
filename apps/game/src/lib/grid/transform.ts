import type { PixelGrid } from "@pocket-quest/sprite-schema";
import { GridShapeError } from "../../utils/errors";

export type GridSize = { width: number; height: number };

/** Width and height of a rectangular grid. Throws on ragged or empty rows. */
export function gridSize(grid: PixelGrid): GridSize {
  const height = grid.length;
  const width = grid[0]?.length ?? 0;
  if (height === 0 || width === 0) {
    throw new GridShapeError("grid must have at least one row and one column");
  }
  for (let r = 1; r < height; r++) {
    const row = grid[r];
    if (row?.length !== width) {
      throw new GridShapeError(`row ${r} has ${row?.length ?? 0} columns, expected ${width}`);
    }
  }
  return { width, height };
}

/** Same grid read right to left: out[r][c] = grid[r][W-1-c] */
export function mirrorHorizontal(grid: PixelGrid): PixelGrid {
  gridSize(grid);
  return grid.map((row) => [...row].reverse());
}

/**
 * Rows [0, splitRow) from `headSource`, rows [splitRow, H) from `legSource`.
 *
 * Mirroring an already mirrored grid gives the original back, so a frame
 * that needs one facing's head over the other leg phase has to be spliced.
 */
export function compositeRows(
  headSource: PixelGrid,
  legSource: PixelGrid,
  splitRow: number,
): PixelGrid {
  const head = gridSize(headSource);
  const legs = gridSize(legSource);
  if (head.width !== legs.width || head.height !== legs.height) {
    throw new GridShapeError(
      `cannot composite ${head.width}x${head.height} head over ${legs.width}x${legs.height} legs`,
    );
  }
  if (!Number.isInteger(splitRow) || splitRow <= 0 || splitRow >= head.height) {
    throw new GridShapeError(`split row ${splitRow} outside (0, ${head.height})`);
  }
  return [...headSource.slice(0, splitRow), ...legSource.slice(splitRow)].map((row) => [...row]);
}

/** Parse authored digit rows ("0011...") into a grid. */
export function parseRows(lines: readonly string[]): PixelGrid {
  const grid = lines.map((line) => Array.from(line, (ch) => Number.parseInt(ch, 10)));
  gridSize(grid);
  return grid;
}
