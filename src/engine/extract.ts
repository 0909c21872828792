import type { ExclusionRules, LootEntry, SourcePage, Target, TargetKind } from '../shared/types.js';
import {
  CacheError,
  FetchError,
  ParseError,
  type FetchFailureReason,
  type LootWarning,
  type ParseFailureReason,
} from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { parseLootPage } from '../parse/lootPage.js';
import { parseItemDetails, parsePageTitle } from '../parse/itemPage.js';
import { renderLootSql } from '../sql/render.js';
import { classifyEntries } from './classify.js';
import { applyExclusions } from './filter.js';
import type { LootRules } from './rules.js';

/**
 * Anything that yields a page for (kind, identifier); the PageFetcher in
 * production.
 */
export interface PageSource {
  fetch(kind: TargetKind, identifier: number): Promise<SourcePage>;
}

export interface ExtractDeps {
  pages: PageSource;
  rules: LootRules;
  exclusions: ExclusionRules;
}

export type TargetFailureReason = FetchFailureReason | ParseFailureReason | 'cache_error';

export type TargetResult =
  | {
      status: 'ok';
      target: Target;
      targetName?: string;
      sql: string;
      entries: LootEntry[];
      warnings: LootWarning[];
    }
  | {
      status: 'failed';
      target: Target;
      reason: TargetFailureReason;
      message: string;
    };

function failureReason(err: unknown): TargetFailureReason | null {
  if (err instanceof FetchError || err instanceof ParseError) return err.reason;
  if (err instanceof CacheError) return 'cache_error';
  return null;
}

/**
 * Fetch, parse, classify, filter and render one target.
 */
export async function extractTarget(target: Target, deps: ExtractDeps): Promise<TargetResult> {
  const { pages, rules, exclusions } = deps;

  try {
    const page = await pages.fetch(target.kind, target.id);
    const parsed = parseLootPage(page, rules);
    const targetName = parsePageTitle(page);

    const classified = await classifyEntries(
      parsed.entries,
      async (itemId) => parseItemDetails(await pages.fetch('item', itemId)),
      rules,
    );
    const entries = applyExclusions(classified.entries, exclusions);
    const sql = renderLootSql(target, entries, rules, targetName);

    logger.info(
      { kind: target.kind, id: target.id, parsed: parsed.entries.length, kept: entries.length },
      'Target extracted',
    );

    return {
      status: 'ok',
      target,
      targetName,
      sql,
      entries,
      warnings: [...parsed.warnings, ...classified.warnings],
    };
  } catch (err) {
    const reason = failureReason(err);
    if (reason === null || !(err instanceof Error)) throw err;
    logger.error({ kind: target.kind, id: target.id, reason }, err.message);
    return { status: 'failed', target, reason, message: err.message };
  }
}

/**
 * Process targets strictly one after another through the same page source,
 * so its throttling spans the whole batch. A failed target does not stop the
 * remaining ones.
 */
export async function extractTargets(
  targets: readonly Target[],
  deps: ExtractDeps,
  onResult?: (result: TargetResult) => Promise<void> | void,
): Promise<TargetResult[]> {
  const results: TargetResult[] = [];
  for (const target of targets) {
    const result = await extractTarget(target, deps);
    results.push(result);
    if (onResult) await onResult(result);
  }
  return results;
}
