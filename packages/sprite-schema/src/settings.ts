import { z } from "zod";

// --- Settings schema ---

export const gameSettingsSchema = z.object({
  /** Sprite rendering */
  sprite: z.object({
    pixel_scale: z.number().int().min(1).max(16),
  }),

  /** Player movement */
  movement: z.object({
    move_speed_px_per_sec: z.number().min(10).max(1000),
  }),

  /** Character creation flow */
  session: z.object({
    save_slots: z.number().int().min(1).max(9),
    name_max_length: z.number().int().min(1).max(32),
  }),

  /** Stage */
  stage: z.object({
    canvas_width: z.number().int().min(160).max(4096),
    canvas_height: z.number().int().min(120).max(4096),
    background: z.number().int().min(0).max(0xffffff),
  }),
});

export type GameSettings = z.infer<typeof gameSettingsSchema>;

// --- Default values ---

export const defaultSettings: GameSettings = {
  sprite: {
    pixel_scale: 4,
  },
  movement: {
    move_speed_px_per_sec: 120,
  },
  session: {
    save_slots: 3,
    name_max_length: 12,
  },
  stage: {
    canvas_width: 640,
    canvas_height: 480,
    background: 0x0b0d17,
  },
};
