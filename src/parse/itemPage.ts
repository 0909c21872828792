import { JSDOM } from 'jsdom';
import type { ItemDetails, SourcePage } from '../shared/types.js';
import { logger } from '../shared/logger.js';
import { parseItemMetadata } from './lootPage.js';

const PAGE_INFO_SCRIPT_IDS = ['data.page.info', 'data.pageMeta', 'data.page'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function parseJson(text: string | null | undefined): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch (err) {
    logger.debug({ error: err instanceof Error ? err.message : String(err) }, 'Skipping unreadable JSON block');
    return undefined;
  }
}

function nonEmpty(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/**
 * Strip the site suffix from a page title ("Name - Item - Site").
 */
export function cleanTitle(title: string): string | undefined {
  let name = title.trim();
  for (const sep of [' — ', ' - ', ' – ']) {
    const idx = name.indexOf(sep);
    if (idx !== -1) name = name.slice(0, idx);
  }
  name = name.replace(/[\s\-–—]+$/, '').trim();
  return name || undefined;
}

function headingName(document: Document): string | undefined {
  const og = document.querySelector('meta[property="og:title"]')?.getAttribute('content');
  const ogName = og ? cleanTitle(og) : undefined;
  if (ogName) return ogName;

  const heading = document.querySelector('h1')?.textContent;
  const headingText = heading ? heading.replace(/\s+/g, ' ').trim() : '';
  if (headingText) return headingText;

  const title = document.querySelector('title')?.textContent;
  return title ? cleanTitle(title) : undefined;
}

/**
 * Display name of a target page (NPC, object or item), from its OpenGraph
 * title, first heading or title tag.
 */
export function parsePageTitle(page: SourcePage): string | undefined {
  const dom = new JSDOM(page.content);
  return headingName(dom.window.document);
}

/**
 * Read the metadata an individual item page exposes: name, quality, item
 * class, descriptive texts and quest markers.
 */
export function parseItemDetails(page: SourcePage): ItemDetails {
  const dom = new JSDOM(page.content);
  const document = dom.window.document;
  const details: ItemDetails = {
    itemId: page.identifier,
    descriptions: [],
    mentionsQuestItem: /quest item/i.test(document.body?.textContent ?? ''),
  };

  for (const id of PAGE_INFO_SCRIPT_IDS) {
    const info = parseJson(document.getElementById(id)?.textContent);
    if (!isRecord(info)) continue;
    const tooltip = isRecord(info['tooltip']) ? info['tooltip'] : {};
    details.name = nonEmpty(tooltip['name']) ?? nonEmpty(info['name']);
    if (typeof info['quality'] === 'number') details.qualityCode = info['quality'];
    if (typeof info['classs'] === 'number') details.classId = info['classs'];
    break;
  }

  for (const script of document.querySelectorAll('script[type="application/ld+json"]')) {
    const ld = parseJson(script.textContent);
    const nodes = Array.isArray(ld) ? ld : [ld];
    for (const node of nodes) {
      if (!isRecord(node)) continue;
      details.name ??= nonEmpty(node['name']);
      const description = nonEmpty(node['description']);
      if (description) details.descriptions.push(description);
    }
  }

  for (const selector of ['meta[name="description"]', 'meta[property="og:description"]']) {
    const content = nonEmpty(document.querySelector(selector)?.getAttribute('content'));
    if (content) details.descriptions.push(content);
  }

  // other items' data on the page (reagent-for, dropped-by lists) is ignored
  const own = parseItemMetadata(page.content).get(page.identifier);
  details.name ??= own?.name;
  details.qualityCode ??= own?.qualityCode;
  details.classId ??= own?.classId;
  details.name ??= headingName(document);

  if (details.qualityCode === undefined && details.name) {
    details.qualityCode = qualityClassNear(document, details.name);
  }

  return details;
}

/**
 * Quality from a `q<N>` CSS class on the element showing the item name.
 */
function qualityClassNear(document: Document, name: string): number | undefined {
  for (const el of document.querySelectorAll('[class]')) {
    if (el.textContent?.trim() !== name) continue;
    for (const cls of el.classList) {
      const match = /^q(\d)$/.exec(cls);
      if (match?.[1] !== undefined) return Number(match[1]);
    }
  }
  return undefined;
}
