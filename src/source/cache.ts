import fs from 'node:fs/promises';
import path from 'node:path';
import type { TargetKind } from '../shared/types.js';
import { CacheError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * Store of raw page payloads keyed by (kind, identifier). Records never
 * expire; they go away only through clear().
 */
export interface CacheStore {
  get(kind: TargetKind, identifier: number): Promise<string | null>;
  put(kind: TargetKind, identifier: number, content: string): Promise<void>;
}

export function cacheFileName(kind: TargetKind, identifier: number): string {
  return `${kind}-${identifier}.html`;
}

export class FileCacheStore implements CacheStore {
  constructor(private readonly dir: string) {}

  async get(kind: TargetKind, identifier: number): Promise<string | null> {
    const file = path.join(this.dir, cacheFileName(kind, identifier));
    try {
      return await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new CacheError(`Cache read failed: ${errorMessage(err)}`, { file });
    }
  }

  async put(kind: TargetKind, identifier: number, content: string): Promise<void> {
    const file = path.join(this.dir, cacheFileName(kind, identifier));
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(file, content, 'utf-8');
    } catch (err) {
      throw new CacheError(`Cache write failed: ${errorMessage(err)}`, { file });
    }
  }

  /**
   * Delete stored records, optionally only those of one kind. Returns the
   * number of files removed.
   */
  async clear(kind?: TargetKind): Promise<number> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return 0;
      throw new CacheError(`Cache listing failed: ${errorMessage(err)}`, { dir: this.dir });
    }

    const prefix = kind ? `${kind}-` : '';
    const targets = names.filter((name) => name.endsWith('.html') && name.startsWith(prefix));
    for (const name of targets) {
      await fs.rm(path.join(this.dir, name), { force: true });
    }
    logger.debug({ dir: this.dir, kind, removed: targets.length }, 'Cache cleared');
    return targets.length;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
