/**
 * Quote-aware scanning helpers for the object literals embedded in page
 * scripts. The payload is JavaScript rather than strict JSON, so structure is
 * recovered by bracket matching instead of JSON.parse.
 */

const QUOTES = new Set(['"', "'"]);

/**
 * Index of the bracket closing the one at `start`, or -1 when unbalanced.
 */
export function findMatchingBracket(text: string, start: number, open = '[', close = ']'): number {
  let depth = 0;
  let quote: string | null = null;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch !== undefined && QUOTES.has(ch)) {
      quote = ch;
    } else if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Split the body of an array literal into its top-level `{...}` members.
 */
export function splitTopLevelObjects(body: string): string[] {
  const objects: string[] = [];
  let i = 0;
  while (i < body.length) {
    if (body[i] === '{') {
      const end = findMatchingBracket(body, i, '{', '}');
      if (end === -1) {
        // unterminated trailing object
        objects.push(body.slice(i));
        break;
      }
      objects.push(body.slice(i, end + 1));
      i = end + 1;
    } else {
      i++;
    }
  }
  return objects;
}

/**
 * Brace depth at `index`, ignoring braces inside strings. A direct member of
 * an object literal starting at 0 sits at depth 1.
 */
export function depthAt(text: string, index: number): number {
  let depth = 0;
  let quote: string | null = null;
  let escaped = false;

  for (let i = 0; i < index && i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch !== undefined && QUOTES.has(ch)) quote = ch;
    else if (ch === '{') depth++;
    else if (ch === '}') depth--;
  }
  return depth;
}

/**
 * Turn a quoted JS string literal into display text: quotes stripped, common
 * escapes resolved, markup removed, whitespace collapsed.
 */
export function cleanJsString(raw: string): string {
  let text = raw;
  if (text.length >= 2 && text[0] === text[text.length - 1] && QUOTES.has(text[0] ?? '')) {
    text = text.slice(1, -1);
  }
  text = text
    .replace(/\\[nrt]/g, ' ')
    .replace(/\\(["'\\/])/g, '$1')
    .replace(/<[^>]+>/g, '');
  return text.replace(/\s+/g, ' ').trim();
}
