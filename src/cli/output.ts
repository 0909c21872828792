import fs from 'node:fs';
import path from 'node:path';
import type { Target } from '../shared/types.js';

export function outputFileName(target: Target): string {
  return `loot_${target.kind}_${target.id}.sql`;
}

/**
 * Write one target's SQL into outDir and return the file path. An existing
 * file for the same target is replaced.
 */
export function writeSqlFile(outDir: string, target: Target, sql: string): string {
  fs.mkdirSync(outDir, { recursive: true });
  const file = path.join(outDir, outputFileName(target));
  fs.writeFileSync(file, sql, 'utf-8');
  return file;
}
