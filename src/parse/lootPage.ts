import type { LootEntry, SourcePage, TargetKind } from '../shared/types.js';
import { qualityFromCode } from '../shared/types.js';
import type { LootRules } from '../engine/rules.js';
import { hasRecipeKeyword, professionsNamedIn } from '../engine/rules.js';
import { ParseError, type LootWarning } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { cleanJsString, depthAt, findMatchingBracket, splitTopLevelObjects } from './scanner.js';

export interface ParsedLoot {
  entries: LootEntry[];
  warnings: LootWarning[];
}

/**
 * Fields of one Listview data object. Every field is optional because the
 * embedded payload is loosely structured.
 */
export interface RawLootObject {
  id?: number;
  name?: string;
  qualityCode?: number;
  classId?: number;
  subclassId?: number;
  flags?: string;
  chance?: number;
  minCount?: number;
  maxCount?: number;
}

/**
 * Entry from the item metadata table (`WH.Gatherer.addData(3, ...)`).
 */
export interface ItemMetadata {
  name?: string;
  qualityCode?: number;
  classId?: number;
  subclassId?: number;
}

export interface ListviewBlock {
  id: string | undefined;
  objects: string[];
}

const STRING_LITERAL = String.raw`('(?:[^'\\]|\\.)*'|"(?:[^"\\]|\\.)*")`;

function keyPattern(names: string): string {
  return String.raw`(?:['"](?:${names})['"]|\b(?:${names}))\s*:\s*`;
}

/**
 * First match of `pattern` that is a direct member of the object literal.
 */
function matchTopLevel(objectText: string, pattern: string, flags = ''): RegExpExecArray | null {
  const re = new RegExp(pattern, `g${flags}`);
  let match: RegExpExecArray | null;
  while ((match = re.exec(objectText)) !== null) {
    if (depthAt(objectText, match.index) === 1) return match;
  }
  return null;
}

function topLevelInt(objectText: string, names: string): number | undefined {
  const match = matchTopLevel(objectText, keyPattern(names) + String.raw`(-?\d+)`);
  return match?.[1] !== undefined ? Number(match[1]) : undefined;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function percent(count: number, outOf: number): number | undefined {
  if (outOf <= 0 || count < 0) return undefined;
  return (count / outOf) * 100;
}

/**
 * Chance from the `modes` table: mode "0" (all data) when present, else the
 * mode with the largest sample.
 */
function chanceFromModes(objectText: string): number | undefined {
  const modes = matchTopLevel(objectText, keyPattern('modes') + String.raw`\{`);
  if (!modes) return undefined;
  const open = objectText.indexOf('{', modes.index + modes[0].length - 1);
  const close = findMatchingBracket(objectText, open, '{', '}');
  if (close === -1) return undefined;

  const body = objectText.slice(open + 1, close);
  const modeRe =
    /["']?(\d+)["']?\s*:\s*\{[^}]*?["']?count["']?\s*:\s*(-?\d+)[^}]*?["']?outof["']?\s*:\s*(-?\d+)[^}]*?\}/gs;
  const samples = new Map<string, { count: number; outOf: number }>();
  for (const m of body.matchAll(modeRe)) {
    const count = Number(m[2]);
    const outOf = Number(m[3]);
    if (m[1] !== undefined && outOf > 0 && count >= 0) samples.set(m[1], { count, outOf });
  }

  const all = samples.get('0');
  if (all) return percent(all.count, all.outOf);

  let best: { count: number; outOf: number } | undefined;
  for (const sample of samples.values()) {
    if (!best || sample.outOf > best.outOf) best = sample;
  }
  return best ? percent(best.count, best.outOf) : undefined;
}

function extractChance(objectText: string): number | undefined {
  const explicit = matchTopLevel(
    objectText,
    keyPattern('dropChance|drop_chance|chance|pct|percent') + String.raw`(\d+(?:\.\d+)?)`,
    'i',
  );
  if (explicit?.[1] !== undefined) return round2(Number(explicit[1]));

  const count = topLevelInt(objectText, 'count');
  const outOf = topLevelInt(objectText, 'outof');
  if (count !== undefined && outOf !== undefined) {
    const pct = percent(count, outOf);
    if (pct !== undefined) return round2(pct);
  }

  const fromModes = chanceFromModes(objectText);
  return fromModes !== undefined ? round2(fromModes) : undefined;
}

export function parseLootObject(objectText: string): RawLootObject {
  const raw: RawLootObject = {};

  raw.id = topLevelInt(objectText, 'id');

  const name = matchTopLevel(objectText, keyPattern('name|displayName') + STRING_LITERAL, 's');
  if (name?.[1] !== undefined) {
    const cleaned = cleanJsString(name[1]);
    if (cleaned) raw.name = cleaned;
  }

  raw.qualityCode = topLevelInt(objectText, 'quality');
  raw.classId = topLevelInt(objectText, 'classs');
  raw.subclassId = topLevelInt(objectText, 'subclass');

  const flags = matchTopLevel(
    objectText,
    keyPattern('flags') + String.raw`(${STRING_LITERAL.slice(1, -1)}|\[[^\]]*\]|-?\d+)`,
    's',
  );
  if (flags?.[1] !== undefined) raw.flags = cleanJsString(flags[1]);

  raw.chance = extractChance(objectText);

  const stack = matchTopLevel(objectText, keyPattern('stack') + String.raw`\[\s*(\d+)\s*(?:,\s*(\d+)\s*)?\]`);
  if (stack?.[1] !== undefined) {
    raw.minCount = Number(stack[1]);
    raw.maxCount = Number(stack[2] ?? stack[1]);
  }

  return raw;
}

/**
 * Every `new Listview({...})` block that carries data, inline or through a
 * variable assigned elsewhere in the page.
 */
export function findListviewBlocks(html: string): ListviewBlock[] {
  const blocks: ListviewBlock[] = [];

  for (const m of html.matchAll(/new Listview\s*\(/g)) {
    const open = html.indexOf('{', (m.index ?? 0) + m[0].length);
    if (open === -1) continue;
    const close = findMatchingBracket(html, open, '{', '}');
    if (close === -1) continue;
    const block = html.slice(open, close + 1);

    const idMatch = matchTopLevel(block, String.raw`\bid\s*:\s*['"]([^'"]*)['"]`);
    const dataMatch = matchTopLevel(block, String.raw`\bdata\s*:\s*(\[|[A-Za-z_$][\w$.]*)`);
    if (!dataMatch?.[1]) continue;

    let body: string | undefined;
    if (dataMatch[1] === '[') {
      const start = dataMatch.index + dataMatch[0].length - 1;
      const end = findMatchingBracket(block, start);
      if (end !== -1) body = block.slice(start + 1, end);
    } else {
      body = resolveArrayVariable(html, dataMatch[1]);
    }
    if (body === undefined) continue;

    blocks.push({ id: idMatch?.[1], objects: splitTopLevelObjects(body) });
  }

  return blocks;
}

function resolveArrayVariable(html: string, name: string): string | undefined {
  const escaped = name.replace(/[.$]/g, '\\$&');
  const assign = new RegExp(String.raw`(?:var\s+|let\s+|const\s+|window\.)?${escaped}\s*=\s*\[`).exec(html);
  if (!assign) return undefined;
  const start = assign.index + assign[0].length - 1;
  const end = findMatchingBracket(html, start);
  return end === -1 ? undefined : html.slice(start + 1, end);
}

/**
 * Blocks relevant to a target kind: `drops` for creatures, `contains` blocks
 * (or any block when none is labelled so) for objects and container items.
 */
function candidateBlocks(blocks: ListviewBlock[], kind: TargetKind): ListviewBlock[] {
  if (kind === 'npc') return blocks.filter((b) => b.id === 'drops');
  const contains = blocks.filter((b) => b.id !== undefined && /contains/i.test(b.id));
  return contains.length > 0 ? contains : blocks;
}

function countWithId(block: ListviewBlock): number {
  return block.objects.filter((o) => topLevelInt(o, 'id') !== undefined).length;
}

/**
 * Item metadata table keyed by item id, from `WH.Gatherer.addData(3, ...)`.
 */
export function parseItemMetadata(html: string): Map<number, ItemMetadata> {
  const table = new Map<number, ItemMetadata>();

  for (const m of html.matchAll(/WH\.Gatherer\.addData\(\s*3\s*,\s*\d+\s*,\s*/g)) {
    const open = (m.index ?? 0) + m[0].length;
    if (html[open] !== '{') continue;
    const close = findMatchingBracket(html, open, '{', '}');
    if (close === -1) continue;

    let data: unknown;
    try {
      data = JSON.parse(html.slice(open, close + 1));
    } catch (err) {
      logger.debug({ error: err instanceof Error ? err.message : String(err) }, 'Unreadable item metadata table');
      continue;
    }
    if (data === null || typeof data !== 'object') continue;

    for (const [key, entry] of Object.entries(data)) {
      const value: unknown = entry;
      const itemId = Number(key);
      if (!Number.isInteger(itemId) || value === null || typeof value !== 'object') continue;
      const meta: ItemMetadata = {};
      const fields = new Map<string, unknown>(Object.entries(value));
      const name = fields.get('name_enus') ?? fields.get('name');
      if (typeof name === 'string' && name.trim()) meta.name = name.trim();
      const quality = fields.get('quality');
      if (typeof quality === 'number') meta.qualityCode = quality;
      const classs = fields.get('classs');
      if (typeof classs === 'number') meta.classId = classs;
      const subclass = fields.get('subclass');
      if (typeof subclass === 'number') meta.subclassId = subclass;
      if (!table.has(itemId)) table.set(itemId, meta);
    }
  }

  return table;
}

/**
 * Whether the listing page alone leaves the entry unclassifiable.
 */
export function needsEnrichment(raw: RawLootObject, rules: LootRules): boolean {
  if (raw.name === undefined || raw.qualityCode === undefined || raw.classId === undefined) return true;
  return hasRecipeKeyword(raw.name, rules) && professionsNamedIn([raw.name], rules).length === 0;
}

function joinMetadata(raw: RawLootObject, meta: ItemMetadata | undefined): RawLootObject {
  if (!meta) return raw;
  return {
    ...raw,
    name: raw.name ?? meta.name,
    qualityCode: raw.qualityCode ?? meta.qualityCode,
    classId: raw.classId ?? meta.classId,
    subclassId: raw.subclassId ?? meta.subclassId,
  };
}

/**
 * Extract the loot entries of a target page in order of first appearance.
 * Duplicate item ids keep their first occurrence.
 */
export function parseLootPage(page: SourcePage, rules: LootRules): ParsedLoot {
  const label = `${page.kind} ${page.identifier}`;
  const candidates = candidateBlocks(findListviewBlocks(page.content), page.kind);

  if (candidates.length === 0) {
    throw new ParseError(`No loot data block found for ${label}`, 'missing_data_block', {
      kind: page.kind,
      identifier: page.identifier,
    });
  }

  const chosen = candidates.reduce((best, block) => (countWithId(block) > countWithId(best) ? block : best));
  const objects = chosen.objects;
  const metadata = parseItemMetadata(page.content);

  const entries: LootEntry[] = [];
  const warnings: LootWarning[] = [];
  const seen = new Set<number>();
  let wellFormed = 0;

  const warn = (warning: LootWarning): void => {
    logger.warn({ target: label, itemId: warning.itemId }, warning.message);
    warnings.push(warning);
  };

  for (const objectText of objects) {
    const raw = parseLootObject(objectText);
    if (raw.id === undefined || raw.id <= 0) {
      warn({ code: 'MALFORMED_ENTRY', message: `Loot object without an item id on ${label}` });
      continue;
    }
    if (raw.chance === undefined) {
      warn({
        code: 'MALFORMED_ENTRY',
        message: `Item ${raw.id} on ${label} has no drop chance`,
        itemId: raw.id,
      });
      continue;
    }
    wellFormed++;

    if (raw.id > rules.maxItemId || rules.excludedItemIds.has(raw.id)) {
      logger.debug({ itemId: raw.id, target: label }, 'Item discarded by id');
      continue;
    }
    if (seen.has(raw.id)) {
      warn({
        code: 'DUPLICATE_ITEM',
        message: `Item ${raw.id} appears more than once on ${label}; first occurrence kept`,
        itemId: raw.id,
      });
      continue;
    }
    seen.add(raw.id);

    const joined = joinMetadata(raw, metadata.get(raw.id));
    entries.push({
      itemId: raw.id,
      dropChance: raw.chance,
      quality: qualityFromCode(joined.qualityCode),
      name: joined.name,
      classId: joined.classId,
      subclassId: joined.subclassId,
      flags: joined.flags,
      minCount: joined.minCount,
      maxCount: joined.maxCount,
      isQuestItem: false,
      isRecipe: false,
      professions: [],
      isLegendary: false,
      needsEnrichment: needsEnrichment(joined, rules),
    });
  }

  if (objects.length > 0 && wellFormed === 0) {
    throw new ParseError(`No usable loot entries for ${label}`, 'malformed_entry', {
      kind: page.kind,
      identifier: page.identifier,
      objects: objects.length,
    });
  }

  return { entries, warnings };
}
