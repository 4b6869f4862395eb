import { Container, Graphics } from "pixi.js";
import type { CharacterRecord } from "@pocket-quest/sprite-schema";
import { buildAnimationSet } from "../lib/character/builder";
import { SpriteAnimator } from "../lib/sprite/animator";
import { centeredOrigin, paintGrid } from "../lib/sprite/renderer";
import { GraphicsPainter } from "./GraphicsPainter";
import { Z_INDEX } from "./constants";

/**
 * A pixel-grid character on the stage.
 *
 * Owns one SpriteAnimator and repaints its Graphics only when the animator
 * reports a new grid; nothing is redrawn on frames where the pose holds.
 */
export class CharacterSprite {
  readonly container: Container;
  readonly animator: SpriteAnimator;

  private readonly graphics: Graphics;
  private readonly painter: GraphicsPainter;
  private readonly scale: number;
  private readonly unsubscribe: () => void;
  private _character: CharacterRecord | null = null;

  constructor(scale: number, animator: SpriteAnimator = new SpriteAnimator()) {
    this.scale = scale;
    this.animator = animator;
    this.graphics = new Graphics();
    this.painter = new GraphicsPainter(this.graphics);
    this.container = new Container();
    this.container.zIndex = Z_INDEX.CHARACTER;
    this.container.addChild(this.graphics);
    this.unsubscribe = this.animator.addRedrawListener(() => this.repaint());
  }

  get character(): CharacterRecord | null {
    return this._character;
  }

  /** Build the character's animation set and show it standing, facing down. */
  setCharacter(character: CharacterRecord): void {
    this._character = character;
    this.animator.assignCharacter(buildAnimationSet(character), character.palette);
  }

  moveTo(x: number, y: number): void {
    this.container.position.set(x, y);
  }

  private repaint(): void {
    this.graphics.clear();
    const grid = this.animator.currentGrid;
    const palette = this.animator.palette;
    if (!grid || !palette) return;
    paintGrid(this.painter, grid, palette, { scale: this.scale, ...centeredOrigin(grid, this.scale) });
  }

  destroy(): void {
    this.unsubscribe();
    this.container.destroy({ children: true });
  }
}
