#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { defaultConfigPath, loadConfig, writeDefaultConfig } from '../shared/config.js';
import { parseIdList, resolvePath, splitList } from '../shared/utils.js';
import { TARGET_KINDS, type Target, type TargetKind } from '../shared/types.js';
import { buildLootRules } from '../engine/rules.js';
import { parseExclusionRules } from '../engine/filter.js';
import { extractTargets, type TargetResult } from '../engine/extract.js';
import { FileCacheStore } from '../source/cache.js';
import { PageFetcher, fetcherOptionsFromConfig } from '../source/fetcher.js';
import { writeSqlFile } from './output.js';

const program = new Command();

program
  .name('lootsmith')
  .description('Extract loot tables from game-database pages into SQL')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create the default config file')
  .action(() => {
    const configPath = defaultConfigPath();
    if (fs.existsSync(configPath)) {
      log(`✓ ${configPath} already exists`);
      return;
    }
    writeDefaultConfig(configPath);
    log(`✓ ${configPath} created`);
  });

// === config ===
program
  .command('config')
  .description('Print the effective configuration')
  .action(async () => {
    const config = await loadConfig();
    log(yamlStringify(config));
  });

// === extract ===
interface ExtractOptions {
  npc?: string;
  object?: string;
  item?: string;
  excludeItems?: string;
  excludeQualities?: string;
  excludeProfessions?: string;
  outdir?: string;
  cacheDir?: string;
}

program
  .command('extract')
  .description('Generate loot SQL for NPCs, game objects and container items')
  .option('--npc <ids>', 'Comma-separated NPC ids')
  .option('--object <ids>', 'Comma-separated game object ids')
  .option('--item <ids>', 'Comma-separated container item ids')
  .option('--exclude-items <ids>', 'Item ids to leave out')
  .option('--exclude-qualities <list>', 'Quality tiers to leave out (e.g. poor,epic)')
  .option('--exclude-professions <list>', 'Professions whose recipes to leave out')
  .option('-o, --outdir <dir>', 'Directory for the SQL files')
  .option('--cache-dir <dir>', 'Directory of the page cache')
  .action(async (opts: ExtractOptions) => {
    const config = await loadConfig();
    const rules = buildLootRules(config.loot);

    const targets: Target[] = [];
    const idsByKind: Record<TargetKind, string | undefined> = {
      npc: opts.npc,
      object: opts.object,
      item: opts.item,
    };
    for (const kind of TARGET_KINDS) {
      const { ids, invalid } = parseIdList(idsByKind[kind]);
      for (const token of invalid) log(`! Invalid ${kind} id skipped: ${token}`);
      for (const id of ids) targets.push({ kind, id });
    }

    if (targets.length === 0) {
      log('No valid ids given. Use e.g. --npc 96028 or --object 252452,252453');
      process.exitCode = 1;
      return;
    }

    const { exclusions, warnings } = parseExclusionRules(
      {
        itemIds: [...config.exclusions.item_ids, ...splitList(opts.excludeItems)],
        qualities: [...config.exclusions.qualities, ...splitList(opts.excludeQualities)],
        professions: [...config.exclusions.professions, ...splitList(opts.excludeProfessions)],
      },
      rules,
    );
    for (const w of warnings) log(`! ${w.message} (ignored)`);

    const outDir = resolvePath(opts.outdir ?? config.output.dir);
    const cache = new FileCacheStore(resolvePath(opts.cacheDir ?? config.cache.dir));
    const fetcher = new PageFetcher(cache, fetcherOptionsFromConfig(config.source));

    const results = await extractTargets(targets, { pages: fetcher, rules, exclusions }, (result) =>
      report(result, outDir),
    );

    const failed = results.filter((r) => r.status === 'failed').length;
    log(`\nExtract complete:`);
    log(`  Targets written:  ${results.length - failed}`);
    log(`  Targets failed:   ${failed}`);
    log(`  Network requests: ${fetcher.stats.networkRequests}`);
    log(`  Cache hits:       ${fetcher.stats.cacheHits}`);
    if (failed > 0) process.exitCode = 1;
  });

function report(result: TargetResult, outDir: string): void {
  const { kind, id } = result.target;
  if (result.status === 'failed') {
    log(`✗ ${kind} ${id}: ${result.reason} (${result.message})`);
    return;
  }
  const file = writeSqlFile(outDir, result.target, result.sql);
  const label = result.targetName ? ` (${result.targetName})` : '';
  log(`✓ ${kind} ${id}${label}: ${result.entries.length} entries → ${path.relative(process.cwd(), file)}`);
  for (const w of result.warnings) log(`  ! ${w.message}`);
}

// === cache ===
const cacheCmd = program.command('cache').description('Manage the page cache');

cacheCmd
  .command('clear')
  .description('Delete cached pages')
  .option('-k, --kind <kind>', 'Only pages of this kind (npc, object, item)')
  .option('--cache-dir <dir>', 'Directory of the page cache')
  .action(async (opts: { kind?: string; cacheDir?: string }) => {
    const kind = TARGET_KINDS.find((k) => k === opts.kind);
    if (opts.kind !== undefined && kind === undefined) {
      log(`Unknown kind: ${opts.kind}`);
      process.exitCode = 1;
      return;
    }
    const config = await loadConfig();
    const cache = new FileCacheStore(resolvePath(opts.cacheDir ?? config.cache.dir));
    const removed = await cache.clear(kind);
    log(`✓ ${removed} cached pages removed`);
  });

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
