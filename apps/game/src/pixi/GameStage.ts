import { Application, type Ticker } from "pixi.js";
import { defaultSettings, type GameSettings } from "@pocket-quest/sprite-schema";
import { config } from "../config";
import { getCharacterCatalog, type CharacterCatalog } from "../lib/character/catalog";
import { PlayerController, type MovementInput } from "../lib/movement";
import { createSessionStore, type SessionStore } from "../stores/session-store";
import { logger, serializeError } from "../utils/logging";
import { CharacterSprite } from "./CharacterSprite";
import { MOVEMENT_KEYS } from "./constants";

const log = logger.child({ component: "stage" });

/**
 * Top-down scene: owns the pixi Application, the keyboard snapshot and the
 * player's sprite once the session reaches the playing screen.
 */
export class GameStage {
  readonly app: Application;
  readonly session: SessionStore;

  private readonly catalog: CharacterCatalog;
  private readonly settings: GameSettings;
  private readonly pixelScale: number;
  private readonly moveSpeed: number;
  private readonly held = new Set<string>();
  private player: { sprite: CharacterSprite; controller: PlayerController } | null = null;
  private unsubscribeSession: (() => void) | null = null;
  private tickerCallback: ((ticker: Ticker) => void) | null = null;
  private keyHandlers: { down: (e: KeyboardEvent) => void; up: (e: KeyboardEvent) => void } | null = null;

  constructor(catalog: CharacterCatalog = getCharacterCatalog(), settings: GameSettings = defaultSettings) {
    this.app = new Application();
    this.catalog = catalog;
    this.settings = settings;
    this.pixelScale = config.pixelScale ?? settings.sprite.pixel_scale;
    this.moveSpeed = config.moveSpeed ?? settings.movement.move_speed_px_per_sec;
    this.session = createSessionStore(catalog, {
      slotCount: settings.session.save_slots,
      nameMaxLength: settings.session.name_max_length,
    });
  }

  async init(container: HTMLElement): Promise<void> {
    await this.app.init({
      width: this.settings.stage.canvas_width,
      height: this.settings.stage.canvas_height,
      background: this.settings.stage.background,
      antialias: false,
    });
    container.appendChild(this.app.canvas as HTMLCanvasElement);
    this.app.stage.sortableChildren = true;

    this.keyHandlers = {
      down: (e) => this.held.add(e.code),
      up: (e) => this.held.delete(e.code),
    };
    window.addEventListener("keydown", this.keyHandlers.down);
    window.addEventListener("keyup", this.keyHandlers.up);

    this.unsubscribeSession = this.session.subscribe((state) => {
      if (state.screen === "playing" && state.player && !this.player) {
        this.spawnPlayer(state.player.characterName);
      }
    });

    this.tickerCallback = (ticker) => this.update(ticker.deltaMS / 1000);
    this.app.ticker.add(this.tickerCallback);
  }

  private spawnPlayer(characterName: string): void {
    const character = this.catalog.find(characterName);
    if (!character) {
      log.error({ characterName }, "saved character is not in the catalog");
      return;
    }

    const sprite = new CharacterSprite(this.pixelScale);
    try {
      sprite.setCharacter(character);
    } catch (error) {
      log.error({ characterName, error: serializeError(error) }, "failed to build character sprite");
      sprite.destroy();
      throw error;
    }

    const start = {
      x: this.settings.stage.canvas_width / 2,
      y: this.settings.stage.canvas_height / 2,
    };
    const controller = new PlayerController(sprite.animator, this.moveSpeed, start);
    sprite.moveTo(start.x, start.y);
    this.app.stage.addChild(sprite.container);
    this.player = { sprite, controller };
    log.info({ character: character.name }, "player spawned");
  }

  private readInput(): MovementInput {
    const isHeld = (codes: readonly string[]) => codes.some((code) => this.held.has(code));
    return {
      left: isHeld(MOVEMENT_KEYS.left),
      right: isHeld(MOVEMENT_KEYS.right),
      up: isHeld(MOVEMENT_KEYS.up),
      down: isHeld(MOVEMENT_KEYS.down),
    };
  }

  private update(deltaSeconds: number): void {
    if (!this.player) return;
    const { sprite, controller } = this.player;
    controller.update(this.readInput(), deltaSeconds);
    sprite.moveTo(controller.position.x, controller.position.y);
  }

  destroy(): void {
    if (this.tickerCallback) {
      this.app.ticker.remove(this.tickerCallback);
      this.tickerCallback = null;
    }
    if (this.keyHandlers) {
      window.removeEventListener("keydown", this.keyHandlers.down);
      window.removeEventListener("keyup", this.keyHandlers.up);
      this.keyHandlers = null;
    }
    this.unsubscribeSession?.();
    this.player?.sprite.destroy();
    this.player = null;
    this.app.destroy(true);
  }
}
