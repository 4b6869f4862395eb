import {
  characterFileSchema,
  templateFileSchema,
  type BodyTemplate,
  type BodyTemplateSource,
  type CharacterRecord,
} from "@pocket-quest/sprite-schema";
import templateData from "../../data/templates.json";
import characterData from "../../data/characters.json";
import { CatalogDataError } from "../../utils/errors";
import { logger } from "../../utils/logging";
import { parseRows } from "../grid/transform";
import { buildPalette } from "./palette";

const log = logger.child({ component: "catalog" });

/** Raw catalog data, validated on first build */
export interface CatalogSource {
  templates: unknown;
  characters: unknown;
}

export interface ArchetypeInfo {
  id: string;
  label: string;
  template: BodyTemplate;
}

const defaultSource: CatalogSource = { templates: templateData, characters: characterData };

function toTemplate(source: BodyTemplateSource): BodyTemplate {
  const template: {
    -readonly [K in keyof BodyTemplate]: BodyTemplate[K];
  } = { down_idle: parseRows(source.down_idle) };
  if (source.down_step) template.down_step = parseRows(source.down_step);
  if (source.up_idle) template.up_idle = parseRows(source.up_idle);
  if (source.up_step) template.up_step = parseRows(source.up_step);
  if (source.left_idle) template.left_idle = parseRows(source.left_idle);
  if (source.left_step) template.left_step = parseRows(source.left_step);
  return Object.freeze(template);
}

/**
 * Named characters paired with their body archetype.
 *
 * Built on the first query and kept for the lifetime of the instance.
 * Characters of the same archetype share one template object.
 */
export class CharacterCatalog {
  private readonly source: CatalogSource;
  private records: readonly CharacterRecord[] | null = null;
  private archetypeList: readonly ArchetypeInfo[] = [];
  private building = false;

  constructor(source: CatalogSource = defaultSource) {
    this.source = source;
  }

  /** All characters, in data order. */
  list(): readonly CharacterRecord[] {
    if (this.records) return this.records;
    if (this.building) {
      throw new Error("CharacterCatalog: list() called while the catalog is being built");
    }
    this.building = true;
    try {
      this.records = this.build();
    } finally {
      this.building = false;
    }
    return this.records;
  }

  archetypes(): readonly ArchetypeInfo[] {
    this.list();
    return this.archetypeList;
  }

  get(index: number): CharacterRecord | undefined {
    return this.list()[index];
  }

  find(name: string): CharacterRecord | undefined {
    return this.list().find((c) => c.name === name);
  }

  get size(): number {
    return this.list().length;
  }

  private build(): readonly CharacterRecord[] {
    const templates = templateFileSchema.parse(this.source.templates);
    const characters = characterFileSchema.parse(this.source.characters);

    const byId = new Map<string, ArchetypeInfo>();
    for (const archetype of templates.archetypes) {
      if (byId.has(archetype.id)) {
        throw new CatalogDataError(`duplicate archetype "${archetype.id}"`);
      }
      byId.set(archetype.id, {
        id: archetype.id,
        label: archetype.label,
        template: toTemplate(archetype.grids),
      });
    }

    const records: CharacterRecord[] = [];
    for (const entry of characters.characters) {
      const archetype = byId.get(entry.archetype);
      if (!archetype) {
        throw new CatalogDataError(`character "${entry.name}" uses unknown archetype "${entry.archetype}"`);
      }
      records.push(
        Object.freeze({
          name: entry.name,
          archetype: archetype.id,
          template: archetype.template,
          palette: buildPalette(entry.palette),
        }),
      );
    }

    this.archetypeList = Object.freeze([...byId.values()]);
    log.info({ archetypes: byId.size, characters: records.length }, "character catalog built");
    return Object.freeze(records);
  }
}

let shared: CharacterCatalog | null = null;

/** Process-wide catalog for callers that do not inject their own. */
export function getCharacterCatalog(): CharacterCatalog {
  if (!shared) shared = new CharacterCatalog();
  return shared;
}

export function listCharacters(): readonly CharacterRecord[] {
  return getCharacterCatalog().list();
}
