export { config } from "./config";
export { GridShapeError, CatalogDataError } from "./utils/errors";
export { compositeRows, gridSize, mirrorHorizontal, parseRows } from "./lib/grid/transform";
export { CharacterCatalog, getCharacterCatalog, listCharacters } from "./lib/character/catalog";
export type { ArchetypeInfo, CatalogSource } from "./lib/character/catalog";
export { buildAnimationSet } from "./lib/character/builder";
export { buildPalette, hexToColor } from "./lib/character/palette";
export { FRAME_DURATION, WALK_FRAMES } from "./lib/character/types";
export type { DirectionAnimation, DirectionalAnimationSet, WalkCycle } from "./lib/character/types";
export { SpriteAnimator } from "./lib/sprite/animator";
export type { RedrawListener } from "./lib/sprite/animator";
export { centeredOrigin, paintGrid } from "./lib/sprite/renderer";
export type { PaintOptions, RectPainter } from "./lib/sprite/renderer";
export { PlayerController, movementVector, resolveFacing } from "./lib/movement";
export type { MovementInput, Point } from "./lib/movement";
export { createSessionStore } from "./stores/session-store";
export type { SaveSlot, Screen, SessionState, SessionStore } from "./stores/session-store";
export { CharacterSprite } from "./pixi/CharacterSprite";
export { GameStage } from "./pixi/GameStage";
