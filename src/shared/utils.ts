import path from 'node:path';
import { homedir } from 'node:os';

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

export function getLootsmithDir(): string {
  return resolvePath('~/.lootsmith');
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Split a comma-separated list, trimming blanks away.
 */
export function splitList(input: string | undefined): string[] {
  if (!input) return [];
  return input
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Parse a comma-separated id list. Tokens that are not positive integers
 * come back in `invalid` so the caller can report them.
 */
export function parseIdList(input: string | undefined): { ids: number[]; invalid: string[] } {
  const ids: number[] = [];
  const invalid: string[] = [];
  for (const token of splitList(input)) {
    if (/^\d+$/.test(token) && Number(token) > 0) {
      ids.push(Number(token));
    } else {
      invalid.push(token);
    }
  }
  return { ids, invalid };
}

export function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}
