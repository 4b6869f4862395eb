import type { Direction, Palette, PixelGrid } from "@pocket-quest/sprite-schema";
import { logger } from "../../utils/logging";
import {
  FRAME_DURATION,
  WALK_FRAMES,
  type DirectionalAnimationSet,
  type WalkCycle,
} from "../character/types";

const log = logger.child({ component: "animator" });

export type RedrawListener = (grid: PixelGrid) => void;

/**
 * Facing and walk-cycle state for one displayed sprite.
 *
 * `currentGrid` always points into the assigned animation set; nothing is
 * copied. Listeners hear about a redraw only when the shown grid changes.
 */
export class SpriteAnimator {
  private animations: DirectionalAnimationSet = {};
  private _palette: Palette | null = null;
  private _facing: Direction = "down";
  private idleGrid: PixelGrid | null = null;
  private walkCycle: WalkCycle | null = null;
  private _walking = false;
  private _animTimer = 0;
  private _animFrame = 0;
  private _currentGrid: PixelGrid | null = null;
  private readonly listeners = new Set<RedrawListener>();
  private readonly frameDuration: number;

  constructor(frameDuration: number = FRAME_DURATION) {
    if (!Number.isFinite(frameDuration) || frameDuration <= 0) {
      throw new RangeError(`frame duration must be a positive number of seconds, got ${frameDuration}`);
    }
    this.frameDuration = frameDuration;
  }

  get facing(): Direction {
    return this._facing;
  }

  get walking(): boolean {
    return this._walking;
  }

  get animTimer(): number {
    return this._animTimer;
  }

  get animFrame(): number {
    return this._animFrame;
  }

  get currentGrid(): PixelGrid | null {
    return this._currentGrid;
  }

  get palette(): Palette | null {
    return this._palette;
  }

  /** The idle pose for the current facing. */
  get idle(): PixelGrid | null {
    return this.idleGrid;
  }

  /** The walk cycle for the current facing, if it has one. */
  get cycle(): WalkCycle | null {
    return this.walkCycle;
  }

  /** False until a character with at least a down pose is assigned. */
  hasContent(): boolean {
    return this._currentGrid !== null;
  }

  addRedrawListener(listener: RedrawListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Replace the animation set and reset to standing, facing down. */
  assignCharacter(animations: DirectionalAnimationSet, palette?: Palette): void {
    this.animations = animations;
    this._palette = palette ?? null;
    this._facing = "down";
    const down = animations.down;
    this.idleGrid = down?.idle ?? null;
    this.walkCycle = down?.walkCycle ?? null;
    this._walking = false;
    this._animTimer = 0;
    this._animFrame = 0;
    this._currentGrid = this.idleGrid;
    if (!down) {
      log.warn("assigned animation set has no down entry");
    }
    this.emitRedraw();
  }

  /**
   * Turn to `direction`. Ignored when already facing it or when the set has
   * no entry for it. Frame and timer carry over so a turn mid-stride keeps
   * the same leg phase.
   *
   * @returns whether the facing changed
   */
  setFacing(direction: Direction): boolean {
    if (direction === this._facing) return false;
    const entry = this.animations[direction];
    if (!entry) {
      log.debug({ direction, facing: this._facing }, "no animation data for direction, keeping facing");
      return false;
    }

    this._facing = direction;
    this.idleGrid = entry.idle;
    this.walkCycle = entry.walkCycle;
    const next = this._walking && this.walkCycle ? this.walkCycle[this.frameIndex()] : this.idleGrid;
    this.show(next);
    return true;
  }

  /** Stopping snaps straight back to the idle pose; starting waits for the next tick. */
  setWalking(walking: boolean): void {
    if (walking === this._walking) return;
    this._walking = walking;
    if (walking) return;

    this._animTimer = 0;
    this._animFrame = 0;
    this.show(this.idleGrid);
  }

  /**
   * Advance the walk cycle by `deltaSeconds`. Leftover time carries into
   * the next call, so many small steps add up to the same frames as one
   * large one. Deltas that are not finite or not positive are ignored.
   *
   * @returns whether the frame changed
   */
  tick(deltaSeconds: number): boolean {
    if (!this._walking || !this.walkCycle) return false;
    if (!Number.isFinite(deltaSeconds) || deltaSeconds <= 0) return false;

    this._animTimer += deltaSeconds;
    const startFrame = this._animFrame;
    let advanced = false;
    while (this._animTimer >= this.frameDuration) {
      this._animTimer -= this.frameDuration;
      this._animFrame = (this._animFrame + 1) % WALK_FRAMES;
      advanced = true;
    }
    if (!advanced) return false;

    this._currentGrid = this.walkCycle[this.frameIndex()];
    // A whole number of cycles lands back on the same grid
    if (this._animFrame !== startFrame) {
      this.emitRedraw();
    }
    return this._animFrame !== startFrame;
  }

  private frameIndex(): 0 | 1 | 2 | 3 {
    switch (this._animFrame) {
      case 1:
        return 1;
      case 2:
        return 2;
      case 3:
        return 3;
      default:
        return 0;
    }
  }

  private show(grid: PixelGrid | null): void {
    if (grid === this._currentGrid) return;
    this._currentGrid = grid;
    this.emitRedraw();
  }

  private emitRedraw(): void {
    const grid = this._currentGrid;
    if (!grid) return;
    for (const listener of this.listeners) listener(grid);
  }
}
