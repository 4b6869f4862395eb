import type { Direction } from "@pocket-quest/sprite-schema";
import type { SpriteAnimator } from "./sprite/animator";

/** Held movement keys for one frame, as reported by the input layer */
export type MovementInput = {
  left: boolean;
  right: boolean;
  up: boolean;
  down: boolean;
};

export type Point = { x: number; y: number };

/** Unit-length direction of travel; opposite keys cancel out. */
export function movementVector(input: MovementInput): Point {
  const x = (input.right ? 1 : 0) - (input.left ? 1 : 0);
  const y = (input.down ? 1 : 0) - (input.up ? 1 : 0);
  if (x === 0 && y === 0) return { x: 0, y: 0 };
  const length = Math.hypot(x, y);
  return { x: x / length, y: y / length };
}

/** Horizontal wins ties, so diagonal movement shows a profile. */
export function resolveFacing(dx: number, dy: number, current: Direction): Direction {
  if (dx === 0 && dy === 0) return current;
  if (Math.abs(dx) >= Math.abs(dy)) return dx < 0 ? "left" : "right";
  return dy < 0 ? "up" : "down";
}

/**
 * Moves the player and keeps its sprite's facing and walk cycle in step.
 */
export class PlayerController {
  readonly position: Point;
  private readonly animator: SpriteAnimator;
  private readonly speed: number;

  constructor(animator: SpriteAnimator, speed: number, start: Point = { x: 0, y: 0 }) {
    this.animator = animator;
    this.speed = speed;
    this.position = { ...start };
  }

  update(input: MovementInput, deltaSeconds: number): void {
    const v = movementVector(input);
    const moving = v.x !== 0 || v.y !== 0;

    if (moving) {
      this.position.x += v.x * this.speed * deltaSeconds;
      this.position.y += v.y * this.speed * deltaSeconds;
      this.animator.setFacing(resolveFacing(v.x, v.y, this.animator.facing));
    }
    this.animator.setWalking(moving);
    this.animator.tick(deltaSeconds);
  }
}
