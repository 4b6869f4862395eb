/** Z-index constants */
export const Z_INDEX = {
  CHARACTER: 10,
} as const;

/** Keyboard codes the stage maps to movement */
export const MOVEMENT_KEYS = {
  left: ["ArrowLeft", "KeyA"],
  right: ["ArrowRight", "KeyD"],
  up: ["ArrowUp", "KeyW"],
  down: ["ArrowDown", "KeyS"],
} as const;
