import type { Graphics } from "pixi.js";
import type { RectPainter } from "../lib/sprite/renderer";

/** RectPainter backed by a pixi.js Graphics context */
export class GraphicsPainter implements RectPainter {
  private readonly graphics: Graphics;

  constructor(graphics: Graphics) {
    this.graphics = graphics;
  }

  fillRect(x: number, y: number, width: number, height: number, color: number): void {
    this.graphics.rect(x, y, width, height).fill(color);
  }
}
