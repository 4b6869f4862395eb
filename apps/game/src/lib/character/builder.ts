import { HEAD_SPLIT_ROW, type CharacterRecord, type Direction, type PixelGrid } from "@pocket-quest/sprite-schema";
import { logger } from "../../utils/logging";
import { compositeRows, mirrorHorizontal } from "../grid/transform";
import type { DirectionAnimation, DirectionalAnimationSet, WalkCycle } from "./types";

const log = logger.child({ component: "animation-builder" });

function cycle(idle: PixelGrid, step: PixelGrid, alternate: PixelGrid): WalkCycle {
  return [idle, step, idle, alternate];
}

/** Front and back: the other leg forward is the step pose mirrored. */
function buildSymmetric(idle: PixelGrid, step: PixelGrid | undefined): DirectionAnimation {
  return {
    idle,
    walkCycle: step ? cycle(idle, step, mirrorHorizontal(step)) : null,
  };
}

/*
 * Profiles. Mirroring a whole grid turns the head too, so the alternate
 * step keeps the facing's own head and takes only the leg rows:
 *   left  = left head  + legs of mirror(left_step)
 *   right = right head + legs of left_step (mirroring right_step again
 *           would bring back the left-facing head)
 */
function buildLeft(idle: PixelGrid, step: PixelGrid | undefined): DirectionAnimation {
  if (!step) return { idle, walkCycle: null };
  const mirroredStep = mirrorHorizontal(step);
  return {
    idle,
    walkCycle: cycle(idle, step, compositeRows(idle, mirroredStep, HEAD_SPLIT_ROW)),
  };
}

function buildRight(leftIdle: PixelGrid, leftStep: PixelGrid | undefined): DirectionAnimation {
  const idle = mirrorHorizontal(leftIdle);
  if (!leftStep) return { idle, walkCycle: null };
  return {
    idle,
    walkCycle: cycle(idle, mirrorHorizontal(leftStep), compositeRows(idle, leftStep, HEAD_SPLIT_ROW)),
  };
}

/**
 * Derive every facing the character's template supports.
 *
 * Right is never authored; it always comes from the left profile. A
 * template without `up_idle` or `left_idle` yields no entry for those
 * facings. Grid shape errors propagate and abort the whole set.
 */
export function buildAnimationSet(character: CharacterRecord): DirectionalAnimationSet {
  const t = character.template;
  const set: Partial<Record<Direction, DirectionAnimation>> = {
    down: buildSymmetric(t.down_idle, t.down_step),
  };

  if (t.up_idle) {
    set.up = buildSymmetric(t.up_idle, t.up_step);
  }
  if (t.left_idle) {
    set.left = buildLeft(t.left_idle, t.left_step);
    set.right = buildRight(t.left_idle, t.left_step);
  }

  log.debug({ character: character.name, directions: Object.keys(set) }, "animation set built");
  return Object.freeze(set);
}
