import { describe, it, expect, vi } from 'vitest';
import { classifyEntries, deriveFlags } from '../classify.js';
import { buildLootRules } from '../rules.js';
import { generateDefaultConfig } from '../../shared/config.js';
import { CacheError, FetchError } from '../../shared/errors.js';
import type { ItemDetails, LootEntry } from '../../shared/types.js';

const rules = buildLootRules(generateDefaultConfig().loot);

function makeEntry(overrides: Partial<LootEntry> = {}): LootEntry {
  return {
    itemId: 1000,
    dropChance: 10,
    quality: 'common',
    name: 'Felslate',
    classId: 7,
    isQuestItem: false,
    isRecipe: false,
    professions: [],
    isLegendary: false,
    needsEnrichment: false,
    ...overrides,
  };
}

function details(overrides: Partial<ItemDetails> = {}): ItemDetails {
  return { itemId: 1000, descriptions: [], mentionsQuestItem: false, ...overrides };
}

const noLookup = vi.fn(async (): Promise<ItemDetails> => {
  throw new Error('not expected');
});

describe('deriveFlags', () => {
  it('marks the quest item class and negates the chance', () => {
    const entry = makeEntry({ classId: 12, dropChance: 4.11 });
    deriveFlags(entry, undefined, rules);
    expect(entry.isQuestItem).toBe(true);
    expect(entry.dropChance).toBe(-4.11);
  });

  it('marks quest items by name, flags or page text', () => {
    const byName = makeEntry({ name: 'Quest Scroll' });
    const byFlags = makeEntry({ flags: 'QuestItem' });
    const byPage = makeEntry();
    deriveFlags(byName, undefined, rules);
    deriveFlags(byFlags, undefined, rules);
    deriveFlags(byPage, details({ mentionsQuestItem: true }), rules);
    expect([byName.isQuestItem, byFlags.isQuestItem, byPage.isQuestItem]).toEqual([true, true, true]);
  });

  it('does not treat "Conquest" as a quest marker', () => {
    const entry = makeEntry({ name: 'Conquest Badge' });
    deriveFlags(entry, undefined, rules);
    expect(entry.isQuestItem).toBe(false);
    expect(entry.dropChance).toBe(10);
  });

  it('keeps the chance positive for non-quest items', () => {
    const entry = makeEntry({ dropChance: -3 });
    deriveFlags(entry, undefined, rules);
    expect(entry.dropChance).toBe(3);
  });

  it('raises a zero chance on a quest item to the negative minimum', () => {
    const entry = makeEntry({ classId: 12, dropChance: 0 });
    deriveFlags(entry, undefined, rules);
    expect(entry.dropChance).toBe(-0.1);
  });

  it('raises a chance that rounds to zero to the minimum', () => {
    const entry = makeEntry({ dropChance: 0.004 });
    deriveFlags(entry, undefined, rules);
    expect(entry.dropChance).toBe(0.1);
  });

  it('records every profession a recipe names, in list order', () => {
    const entry = makeEntry({ name: 'Pattern: Dreadleather Cape' });
    deriveFlags(entry, details({ descriptions: ['Requires Tailoring or Leatherworking'] }), rules);
    expect(entry.isRecipe).toBe(true);
    expect(entry.professions).toEqual(['leatherworking', 'tailoring']);
  });

  it('ignores profession names on non-recipes', () => {
    const entry = makeEntry({ name: 'Alchemy Stone' });
    deriveFlags(entry, undefined, rules);
    expect(entry.isRecipe).toBe(false);
    expect(entry.professions).toEqual([]);
  });

  it('flags legendary quality', () => {
    const entry = makeEntry({ quality: 'legendary' });
    deriveFlags(entry, undefined, rules);
    expect(entry.isLegendary).toBe(true);
  });
});

describe('classifyEntries', () => {
  it('does not look up complete entries', async () => {
    const entries = [makeEntry()];
    const result = await classifyEntries(entries, noLookup, rules);
    expect(noLookup).not.toHaveBeenCalled();
    expect(result.warnings).toEqual([]);
  });

  it('enriches recipes that name no profession', async () => {
    const lookup = vi.fn(async (itemId: number) =>
      details({ itemId, descriptions: ['Teaches you how to make a potion. Requires Alchemy (800).'] }),
    );
    const entry = makeEntry({
      itemId: 127929,
      dropChance: 1.33,
      name: 'Recipe: X',
      classId: 9,
      needsEnrichment: true,
    });

    await classifyEntries([entry], lookup, rules);

    expect(lookup).toHaveBeenCalledWith(127929);
    expect(entry.isRecipe).toBe(true);
    expect(entry.professions).toEqual(['alchemy']);
    expect(entry.needsEnrichment).toBe(false);
    expect(entry.dropChance).toBe(1.33);
  });

  it('fills missing fields from the item page', async () => {
    const lookup = vi.fn(async (itemId: number) => details({ itemId, name: 'Glowing Orb', qualityCode: 5, classId: 15 }));
    const entry = makeEntry({ name: undefined, quality: 'unknown', classId: undefined, needsEnrichment: true });

    await classifyEntries([entry], lookup, rules);

    expect(entry.name).toBe('Glowing Orb');
    expect(entry.quality).toBe('legendary');
    expect(entry.classId).toBe(15);
    expect(entry.isLegendary).toBe(true);
  });

  it('keeps listing data and warns when enrichment fails', async () => {
    const lookup = vi.fn(async (): Promise<ItemDetails> => {
      throw new FetchError('gone', 'not_found');
    });
    const entry = makeEntry({ itemId: 140000, name: 'Recipe: Y', classId: 9, needsEnrichment: true });

    const result = await classifyEntries([entry], lookup, rules);

    expect(result.warnings).toEqual([
      { code: 'ENRICHMENT_WARNING', message: 'Item 140000 could not be enriched: gone', itemId: 140000 },
    ]);
    expect(entry.needsEnrichment).toBe(true);
    expect(entry.isRecipe).toBe(true);
    expect(entry.professions).toEqual([]);
  });

  it('treats an unreadable cached item page as an enrichment failure', async () => {
    const lookup = vi.fn(async (): Promise<ItemDetails> => {
      throw new CacheError('Cache read failed: EACCES');
    });
    const entry = makeEntry({ itemId: 140001, name: undefined, needsEnrichment: true });

    const result = await classifyEntries([entry], lookup, rules);

    expect(result.warnings.map((w) => [w.code, w.itemId])).toEqual([['ENRICHMENT_WARNING', 140001]]);
    expect(entry.needsEnrichment).toBe(true);
  });

  it('rethrows unexpected errors', async () => {
    const entry = makeEntry({ needsEnrichment: true });
    await expect(classifyEntries([entry], noLookup, rules)).rejects.toThrow('not expected');
  });

  it('returns the same entries in order', async () => {
    const entries = [makeEntry({ itemId: 3 }), makeEntry({ itemId: 1 }), makeEntry({ itemId: 2 })];
    const result = await classifyEntries(entries, noLookup, rules);
    expect(result.entries.map((e) => e.itemId)).toEqual([3, 1, 2]);
  });
});
