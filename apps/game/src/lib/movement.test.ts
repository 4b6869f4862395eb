import { characterWith, fullTemplate, patternGrid } from "../testing/grids";
import { buildAnimationSet } from "./character/builder";
import { PlayerController, movementVector, resolveFacing, type MovementInput } from "./movement";
import { SpriteAnimator } from "./sprite/animator";

const NONE: MovementInput = { left: false, right: false, up: false, down: false };

describe("movementVector", () => {
  test("is zero with no keys held", () => {
    expect(movementVector(NONE)).toEqual({ x: 0, y: 0 });
  });

  test("opposite keys cancel", () => {
    expect(movementVector({ ...NONE, left: true, right: true })).toEqual({ x: 0, y: 0 });
  });

  test("diagonals have unit length", () => {
    const v = movementVector({ ...NONE, right: true, up: true });
    expect(v.x).toBeCloseTo(Math.SQRT1_2, 10);
    expect(v.y).toBeCloseTo(-Math.SQRT1_2, 10);
  });
});

describe("resolveFacing", () => {
  test("horizontal wins ties", () => {
    expect(resolveFacing(1, 1, "up")).toBe("right");
    expect(resolveFacing(-1, -1, "down")).toBe("left");
  });

  test("mostly vertical movement faces up or down", () => {
    expect(resolveFacing(0.2, -0.9, "left")).toBe("up");
    expect(resolveFacing(-0.5, 0.8, "left")).toBe("down");
  });

  test("standing still keeps the current facing", () => {
    expect(resolveFacing(0, 0, "left")).toBe("left");
  });
});

describe("PlayerController", () => {
  function setup(set = buildAnimationSet(characterWith(fullTemplate()))) {
    const animator = new SpriteAnimator();
    animator.assignCharacter(set);
    const controller = new PlayerController(animator, 100, { x: 10, y: 10 });
    return { animator, controller, set };
  }

  test("moves, turns and walks while a key is held", () => {
    const { animator, controller, set } = setup();
    controller.update({ ...NONE, right: true }, 0.25);

    expect(controller.position).toEqual({ x: 35, y: 10 });
    expect(animator.facing).toBe("right");
    expect(animator.walking).toBe(true);
    expect(animator.animFrame).toBe(1);
    expect(animator.currentGrid).toBe(set.right?.walkCycle?.[1]);
  });

  test("releasing the keys stops on the idle pose", () => {
    const { animator, controller, set } = setup();
    controller.update({ ...NONE, right: true }, 0.25);
    controller.update(NONE, 0.1);

    expect(controller.position).toEqual({ x: 35, y: 10 });
    expect(animator.walking).toBe(false);
    expect(animator.animFrame).toBe(0);
    expect(animator.currentGrid).toBe(set.right?.idle);
  });

  test("diagonal movement shows the profile", () => {
    const { animator, controller } = setup();
    controller.update({ ...NONE, left: true, up: true }, 0.1);
    expect(animator.facing).toBe("left");
  });

  test("a missing facing keeps walking the current one", () => {
    const set = buildAnimationSet(characterWith({ down_idle: patternGrid(0), down_step: patternGrid(1) }));
    const { animator, controller } = setup(set);
    controller.update({ ...NONE, left: true }, 0.25);

    expect(controller.position).toEqual({ x: -15, y: 10 });
    expect(animator.facing).toBe("down");
    expect(animator.currentGrid).toBe(set.down?.walkCycle?.[1]);
  });
});
