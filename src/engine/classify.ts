import type { ItemDetails, LootEntry } from '../shared/types.js';
import { qualityFromCode } from '../shared/types.js';
import { CacheError, FetchError, ParseError, type LootWarning } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { hasRecipeKeyword, mentionsQuest, professionsNamedIn, type LootRules } from './rules.js';

/**
 * Single-item lookup used for enrichment: fetch the item page (through the
 * cache) and read its details.
 */
export type FetchItemDetails = (itemId: number) => Promise<ItemDetails>;

/** Smallest rendered chance; a chance that rounds to zero is raised to it. */
export const MIN_DROP_CHANCE = 0.1;

export interface ClassifyResult {
  entries: LootEntry[];
  warnings: LootWarning[];
}

function mergeDetails(entry: LootEntry, details: ItemDetails): void {
  entry.name ??= details.name;
  if (entry.quality === 'unknown') entry.quality = qualityFromCode(details.qualityCode);
  entry.classId ??= details.classId;
}

/**
 * Derive quest, recipe, profession and legendary flags, and fix the sign of
 * the drop chance. Any single quest signal is enough.
 */
export function deriveFlags(entry: LootEntry, details: ItemDetails | undefined, rules: LootRules): void {
  const name = entry.name ?? '';
  const pageTexts = details?.descriptions ?? [];

  entry.isQuestItem =
    entry.classId === rules.questItemClass ||
    mentionsQuest(name) ||
    (entry.flags !== undefined && /quest/i.test(entry.flags)) ||
    (details?.mentionsQuestItem ?? false);

  entry.isRecipe = hasRecipeKeyword(name, rules) || pageTexts.some((text) => hasRecipeKeyword(text, rules));
  // every matching profession is kept; exclusion decides on ambiguous ones
  entry.professions = entry.isRecipe ? professionsNamedIn([name, ...pageTexts], rules) : [];
  entry.isLegendary = entry.quality === 'legendary';

  const rounded = Math.round(Math.abs(entry.dropChance) * 100) / 100;
  const magnitude = rounded === 0 ? MIN_DROP_CHANCE : rounded;
  entry.dropChance = entry.isQuestItem ? -magnitude : magnitude;
}

/**
 * Complete the entries in place. Entries the listing page left incomplete
 * are looked up on their own item page first; a failed lookup keeps the
 * listing data and yields a warning.
 */
export async function classifyEntries(
  entries: LootEntry[],
  fetchItemDetails: FetchItemDetails,
  rules: LootRules,
): Promise<ClassifyResult> {
  const warnings: LootWarning[] = [];
  const pending = entries.filter((e) => e.needsEnrichment).length;
  if (pending > 0) {
    logger.info({ count: pending }, 'Fetching item pages to complete classification');
  }

  let done = 0;
  for (const entry of entries) {
    let details: ItemDetails | undefined;

    if (entry.needsEnrichment) {
      done++;
      logger.debug({ itemId: entry.itemId, progress: `${done}/${pending}` }, 'Enriching item');
      try {
        details = await fetchItemDetails(entry.itemId);
        mergeDetails(entry, details);
        entry.needsEnrichment = false;
      } catch (err) {
        if (!(err instanceof FetchError) && !(err instanceof ParseError) && !(err instanceof CacheError)) {
          throw err;
        }
        logger.warn({ itemId: entry.itemId, error: err.message }, 'Enrichment failed, using listing data');
        warnings.push({
          code: 'ENRICHMENT_WARNING',
          message: `Item ${entry.itemId} could not be enriched: ${err.message}`,
          itemId: entry.itemId,
        });
      }
    }

    deriveFlags(entry, details, rules);
  }

  return { entries, warnings };
}
