import { createStore } from "zustand/vanilla";
import { z } from "zod";
import { defaultSettings, type CharacterRecord } from "@pocket-quest/sprite-schema";
import type { CharacterCatalog } from "../lib/character/catalog";
import { logger } from "../utils/logging";

const log = logger.child({ component: "session" });

export type Screen = "file_select" | "character_select" | "name_entry" | "playing";

export interface SaveSlot {
  slot: number;
  playerName: string;
  characterName: string;
}

export interface SessionState {
  screen: Screen;
  /** In-memory save slots; null = empty */
  slots: (SaveSlot | null)[];
  selectedSlot: number;
  characterIndex: number;
  nameDraft: string;
  nameError: string | null;
  player: SaveSlot | null;

  selectSlot: (slot: number) => void;
  confirmSlot: () => void;
  cycleCharacter: (step: number) => void;
  confirmCharacter: () => void;
  setNameDraft: (name: string) => void;
  confirmName: () => void;
  back: () => void;
  selectedCharacter: () => CharacterRecord | undefined;
}

export type SessionOptions = {
  slotCount?: number;
  nameMaxLength?: number;
};

export function playerNameSchema(maxLength: number) {
  return z
    .string()
    .trim()
    .min(1, "name is empty")
    .max(maxLength, `name is longer than ${maxLength} characters`);
}

const PREVIOUS_SCREEN: Record<Screen, Screen> = {
  file_select: "file_select",
  character_select: "file_select",
  name_entry: "character_select",
  playing: "playing",
};

/**
 * Character creation flow: file select -> character select -> name entry.
 * A slot that already holds a save skips straight to playing.
 */
export function createSessionStore(catalog: CharacterCatalog, options: SessionOptions = {}) {
  const slotCount = options.slotCount ?? defaultSettings.session.save_slots;
  const nameSchema = playerNameSchema(options.nameMaxLength ?? defaultSettings.session.name_max_length);

  return createStore<SessionState>((set, get) => ({
    screen: "file_select",
    slots: Array.from({ length: slotCount }, () => null),
    selectedSlot: 0,
    characterIndex: 0,
    nameDraft: "",
    nameError: null,
    player: null,

    selectSlot: (slot) => {
      if (get().screen !== "file_select") return;
      const count = get().slots.length;
      set({ selectedSlot: ((slot % count) + count) % count });
    },

    confirmSlot: () => {
      const { screen, slots, selectedSlot } = get();
      if (screen !== "file_select") return;
      const existing = slots[selectedSlot] ?? null;
      if (existing) {
        set({ screen: "playing", player: existing });
        return;
      }
      set({ screen: "character_select", characterIndex: 0 });
    },

    cycleCharacter: (step) => {
      if (get().screen !== "character_select") return;
      const count = catalog.size;
      set((state) => ({ characterIndex: (((state.characterIndex + step) % count) + count) % count }));
    },

    confirmCharacter: () => {
      if (get().screen !== "character_select") return;
      set({ screen: "name_entry", nameDraft: "", nameError: null });
    },

    setNameDraft: (name) => {
      if (get().screen !== "name_entry") return;
      set({ nameDraft: name, nameError: null });
    },

    confirmName: () => {
      const { screen, nameDraft, selectedSlot, slots } = get();
      if (screen !== "name_entry") return;
      const parsed = nameSchema.safeParse(nameDraft);
      if (!parsed.success) {
        set({ nameError: parsed.error.issues[0]?.message ?? "invalid name" });
        return;
      }
      const character = get().selectedCharacter();
      if (!character) return;

      const save: SaveSlot = { slot: selectedSlot, playerName: parsed.data, characterName: character.name };
      const nextSlots = [...slots];
      nextSlots[selectedSlot] = save;
      log.info({ slot: selectedSlot, character: character.name }, "new game started");
      set({ screen: "playing", slots: nextSlots, player: save, nameError: null });
    },

    back: () => set((state) => ({ screen: PREVIOUS_SCREEN[state.screen] })),

    selectedCharacter: () => catalog.get(get().characterIndex),
  }));
}

export type SessionStore = ReturnType<typeof createSessionStore>;
