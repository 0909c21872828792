export const TARGET_KINDS = ['npc', 'object', 'item'] as const;
export type TargetKind = (typeof TARGET_KINDS)[number];

export interface Target {
  kind: TargetKind;
  id: number;
}

/**
 * Quality tiers in the order of the site's numeric quality codes (0-6).
 */
export const QUALITIES = ['poor', 'common', 'green', 'rare', 'epic', 'legendary', 'artifact'] as const;
export type Quality = (typeof QUALITIES)[number] | 'unknown';

export const PROFESSIONS = [
  'alchemy',
  'enchanting',
  'jewelcrafting',
  'inscription',
  'leatherworking',
  'blacksmithing',
  'engineering',
  'tailoring',
  'herbalism',
  'cooking',
] as const;
export type Profession = (typeof PROFESSIONS)[number];

export function qualityFromCode(code: number | undefined): Quality {
  if (code === undefined) return 'unknown';
  return QUALITIES[code] ?? 'unknown';
}

export function isProfession(value: string): value is Profession {
  return PROFESSIONS.some((prof) => prof === value);
}

/**
 * Raw page payload for one target, as fetched or read from cache.
 */
export interface SourcePage {
  kind: TargetKind;
  identifier: number;
  content: string;
  fromCache: boolean;
}

/**
 * One candidate drop. Created by the page parser, completed by the
 * classifier, read once by the renderer.
 */
export interface LootEntry {
  itemId: number;
  /** Percentage; negative once classified as a quest item. */
  dropChance: number;
  quality: Quality;
  name?: string;
  classId?: number;
  subclassId?: number;
  flags?: string;
  minCount?: number;
  maxCount?: number;
  isQuestItem: boolean;
  isRecipe: boolean;
  professions: Profession[];
  isLegendary: boolean;
  needsEnrichment: boolean;
}

/**
 * Metadata read from an individual item page during enrichment.
 */
export interface ItemDetails {
  itemId: number;
  name?: string;
  qualityCode?: number;
  classId?: number;
  /** Description texts found on the page (meta, og, ld+json). */
  descriptions: string[];
  mentionsQuestItem: boolean;
}

export interface ExclusionRules {
  itemIds: ReadonlySet<number>;
  qualities: ReadonlySet<Quality>;
  professions: ReadonlySet<Profession>;
}
