import type { Direction, PixelGrid } from "@pocket-quest/sprite-schema";

/* Walk cycle timing */
export const WALK_FRAMES = 4;
export const FRAME_DURATION = 1 / 6; // 6 fps

/** [idle, step, idle, alternate step] */
export type WalkCycle = readonly [PixelGrid, PixelGrid, PixelGrid, PixelGrid];

export interface DirectionAnimation {
  readonly idle: PixelGrid;
  /** null when the template has no step pose for this facing */
  readonly walkCycle: WalkCycle | null;
}

/* Directions the template cannot provide have no entry */
export type DirectionalAnimationSet = Readonly<Partial<Record<Direction, DirectionAnimation>>>;
