import { z } from "zod";

/* Grid convention shared by every body template */
export const GRID_WIDTH = 14;
export const GRID_HEIGHT = 20;
/** Rows above this index belong to the head/torso, rows from it on to the legs */
export const HEAD_SPLIT_ROW = 12;
export const PALETTE_SIZE = 8;

// --- Color indices ---

export const colorIndexSchema = z.number().int().min(0).max(PALETTE_SIZE - 1);

/** 0 is transparent; the rest are looked up in the palette. */
export const COLOR_INDEX = {
  transparent: 0,
  outline: 1,
  primary: 2,
  highlight: 3,
  skin: 4,
  skin_shadow: 5,
  secondary: 6,
  accent: 7,
} as const;

export const pixelGridSchema = z
  .array(z.array(colorIndexSchema).min(1))
  .min(1)
  .refine((rows) => rows.every((row) => row.length === rows[0]?.length), {
    message: "all grid rows must have the same length",
  });

export type PixelGrid = readonly (readonly number[])[];

/**
 * Authored form of a grid: one string of digits per row, e.g. "00011110000000".
 * Exactly GRID_HEIGHT rows of GRID_WIDTH digits in the palette range.
 */
export const gridRowsSchema = z
  .array(z.string().regex(new RegExp(`^[0-${PALETTE_SIZE - 1}]{${GRID_WIDTH}}$`)))
  .length(GRID_HEIGHT);

// --- Palette ---

export const hexColorSchema = z.string().regex(/^#[0-9a-fA-F]{6}$/);

export const paletteSourceSchema = z.array(hexColorSchema).length(PALETTE_SIZE);

/** Eight 0xRRGGBB colors indexed by grid values. */
export type Palette = readonly number[];

// --- Body templates ---

export const bodyTemplateSourceSchema = z.object({
  down_idle: gridRowsSchema,
  down_step: gridRowsSchema.optional(),
  up_idle: gridRowsSchema.optional(),
  up_step: gridRowsSchema.optional(),
  left_idle: gridRowsSchema.optional(),
  left_step: gridRowsSchema.optional(),
});

export const archetypeSourceSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  grids: bodyTemplateSourceSchema,
});

export const templateFileSchema = z.object({
  archetypes: z.array(archetypeSourceSchema).min(1),
});

export interface BodyTemplate {
  readonly down_idle: PixelGrid;
  readonly down_step?: PixelGrid;
  readonly up_idle?: PixelGrid;
  readonly up_step?: PixelGrid;
  readonly left_idle?: PixelGrid;
  readonly left_step?: PixelGrid;
}

export type BodyTemplateSource = z.infer<typeof bodyTemplateSourceSchema>;
export type ArchetypeSource = z.infer<typeof archetypeSourceSchema>;
export type TemplateFile = z.infer<typeof templateFileSchema>;

// --- Characters ---

export const characterSourceSchema = z.object({
  name: z.string().min(1),
  archetype: z.string().min(1),
  palette: paletteSourceSchema,
});

export const characterFileSchema = z.object({
  characters: z.array(characterSourceSchema).min(1),
});

export type CharacterSource = z.infer<typeof characterSourceSchema>;
export type CharacterFile = z.infer<typeof characterFileSchema>;

export interface CharacterRecord {
  readonly name: string;
  readonly archetype: string;
  readonly template: BodyTemplate;
  readonly palette: Palette;
}
