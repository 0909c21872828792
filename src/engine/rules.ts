import type { Config } from '../shared/config.js';
import type { Profession } from '../shared/types.js';

export interface LootRowDefaults {
  lootmode: number;
  groupid: number;
  mincount: number;
  maxcount: number;
  shared: number;
}

/**
 * Immutable view of the loot section of the config, built once per run and
 * handed to the parser, classifier, filter and renderer.
 */
export interface LootRules {
  readonly maxItemId: number;
  readonly excludedItemIds: ReadonlySet<number>;
  readonly questItemClass: number;
  readonly recipeKeywords: readonly string[];
  readonly professions: readonly Profession[];
  readonly professionSkillIds: Readonly<Record<Profession, number>>;
  readonly row: Readonly<LootRowDefaults>;
}

export function buildLootRules(loot: Config['loot']): LootRules {
  return Object.freeze({
    maxItemId: loot.max_item_id,
    excludedItemIds: new Set(loot.excluded_item_ids),
    questItemClass: loot.quest_item_class,
    recipeKeywords: Object.freeze(loot.recipe_keywords.map((kw) => kw.toLowerCase())),
    professions: Object.freeze([...new Set(loot.professions)]),
    professionSkillIds: Object.freeze({ ...loot.profession_skill_ids }),
    row: Object.freeze({
      lootmode: loot.lootmode,
      groupid: loot.groupid,
      mincount: loot.mincount,
      maxcount: loot.maxcount,
      shared: loot.shared,
    }),
  });
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function containsWord(text: string, word: string): boolean {
  return new RegExp(`\\b${escapeRegExp(word)}\\b`, 'i').test(text);
}

export function hasRecipeKeyword(text: string, rules: LootRules): boolean {
  return rules.recipeKeywords.some((kw) => containsWord(text, kw));
}

/**
 * Supported professions named in any of the texts, in list order.
 */
export function professionsNamedIn(texts: readonly string[], rules: LootRules): Profession[] {
  return rules.professions.filter((prof) => texts.some((text) => containsWord(text, prof)));
}

export function mentionsQuest(text: string): boolean {
  return containsWord(text, 'quest');
}
