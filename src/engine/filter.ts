import type { ExclusionRules, LootEntry, Profession, Quality } from '../shared/types.js';
import { QUALITIES, isProfession, qualityFromCode } from '../shared/types.js';
import type { LootWarning } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { LootRules } from './rules.js';

export interface ExclusionTokens {
  itemIds?: ReadonlyArray<string | number>;
  qualities?: ReadonlyArray<string | number>;
  professions?: ReadonlyArray<string | number>;
}

export const NO_EXCLUSIONS: ExclusionRules = Object.freeze({
  itemIds: new Set<number>(),
  qualities: new Set<Quality>(),
  professions: new Set<Profession>(),
});

function parseQuality(token: string): Quality | undefined {
  if (/^\d+$/.test(token)) {
    const quality = qualityFromCode(Number(token));
    return quality === 'unknown' ? undefined : quality;
  }
  return QUALITIES.find((q) => q === token);
}

/**
 * Build exclusion rules from caller tokens. Tokens that name no item id,
 * quality tier or supported profession are reported and ignored.
 */
export function parseExclusionRules(
  tokens: ExclusionTokens,
  rules: LootRules,
): { exclusions: ExclusionRules; warnings: LootWarning[] } {
  const itemIds = new Set<number>();
  const qualities = new Set<Quality>();
  const professions = new Set<Profession>();
  const warnings: LootWarning[] = [];

  const reject = (token: string, what: string): void => {
    logger.warn({ token }, `Ignoring invalid ${what} exclusion`);
    warnings.push({ code: 'INVALID_EXCLUSION_TOKEN', message: `Invalid ${what} exclusion: "${token}"`, token });
  };

  for (const raw of tokens.itemIds ?? []) {
    const token = String(raw).trim();
    if (/^\d+$/.test(token) && Number(token) > 0) itemIds.add(Number(token));
    else reject(token, 'item id');
  }

  for (const raw of tokens.qualities ?? []) {
    const token = String(raw).trim().toLowerCase();
    const quality = parseQuality(token);
    if (quality) qualities.add(quality);
    else reject(token, 'quality');
  }

  for (const raw of tokens.professions ?? []) {
    const token = String(raw).trim().toLowerCase();
    if (isProfession(token) && rules.professions.includes(token)) professions.add(token);
    else reject(token, 'profession');
  }

  return { exclusions: { itemIds, qualities, professions }, warnings };
}

export function isExcluded(entry: LootEntry, exclusions: ExclusionRules): boolean {
  return (
    exclusions.itemIds.has(entry.itemId) ||
    exclusions.qualities.has(entry.quality) ||
    entry.professions.some((prof) => exclusions.professions.has(prof))
  );
}

/**
 * Drop excluded entries, keeping source order. Runs on classified entries
 * only, so quality and profession checks see resolved data.
 */
export function applyExclusions(entries: readonly LootEntry[], exclusions: ExclusionRules): LootEntry[] {
  const kept = entries.filter((entry) => !isExcluded(entry, exclusions));
  if (kept.length !== entries.length) {
    logger.debug({ removed: entries.length - kept.length }, 'Entries excluded');
  }
  return kept;
}
