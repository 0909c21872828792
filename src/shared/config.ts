import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getLootsmithDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';
import { PROFESSIONS } from './types.js';

export const ConfigSchema = z.object({
  source: z
    .object({
      base_url: z.string().url().default('https://www.wowhead.com'),
      user_agent: z
        .string()
        .default(
          'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
        ),
      timeout_ms: z.number().int().positive().default(10000),
      max_attempts: z.number().int().min(1).default(3),
      backoff_base_ms: z.number().int().nonnegative().default(1000),
      min_interval_ms: z.number().int().nonnegative().default(500),
    })
    .default({}),

  cache: z
    .object({
      dir: z.string().default('~/.lootsmith/cache'),
    })
    .default({}),

  loot: z
    .object({
      // Highest item id of the targeted content era (Legion)
      max_item_id: z.number().int().positive().default(157831),
      excluded_item_ids: z
        .array(z.number().int())
        .default([
          124124, 138482, 138786, 141689, 141690, 147579, 138781, 138782, 140220, 140221,
          140222, 140224, 140225, 140226, 140227, 144345, 147869, 138019, -1275,
        ]),
      quest_item_class: z.number().int().default(12),
      recipe_keywords: z
        .array(z.string().min(1))
        .default(['recipe', 'pattern', 'plans', 'technique', 'design', 'formula', 'schematic']),
      professions: z.array(z.enum(PROFESSIONS)).default([...PROFESSIONS]),
      profession_skill_ids: z
        .object({
          alchemy: z.number().int().default(171),
          enchanting: z.number().int().default(333),
          jewelcrafting: z.number().int().default(755),
          inscription: z.number().int().default(773),
          leatherworking: z.number().int().default(165),
          blacksmithing: z.number().int().default(164),
          engineering: z.number().int().default(202),
          tailoring: z.number().int().default(197),
          herbalism: z.number().int().default(182),
          cooking: z.number().int().default(185),
        })
        .default({}),
      lootmode: z.number().int().default(23),
      groupid: z.number().int().default(0),
      mincount: z.number().int().default(1),
      maxcount: z.number().int().default(1),
      shared: z.number().int().default(0),
    })
    .default({}),

  // Defaults for the caller-supplied exclusion lists; validated token by token
  exclusions: z
    .object({
      item_ids: z.array(z.union([z.number(), z.string()])).default([]),
      qualities: z.array(z.union([z.number(), z.string()])).default([]),
      professions: z.array(z.string()).default([]),
    })
    .default({}),

  output: z
    .object({
      dir: z.string().default('output'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

export function defaultConfigPath(): string {
  return path.join(getLootsmithDir(), 'config.yaml');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Load and validate the configuration. Every call reads the file again; the
 * caller builds one config per run and passes it down.
 */
export async function loadConfig(): Promise<Config> {
  const explorer = cosmiconfig('lootsmith', {
    searchPlaces: [
      'lootsmith.config.yaml',
      'lootsmith.config.yml',
      '.lootsmithrc.yaml',
      '.lootsmithrc.yml',
    ],
  });

  const envConfigPath = process.env['LOOTSMITH_CONFIG'];
  const fallbackPath = defaultConfigPath();

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const loaded: unknown = (await explorer.load(resolved))?.config;
    if (isRecord(loaded)) rawConfig = loaded;
  } else if (fs.existsSync(fallbackPath)) {
    const loaded: unknown = (await explorer.load(fallbackPath))?.config;
    if (isRecord(loaded)) rawConfig = loaded;
  } else {
    logger.debug('No config file found, using defaults');
  }

  applyEnvOverrides(rawConfig);

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  return parsed.data;
}

function applyEnvOverrides(rawConfig: Record<string, unknown>): void {
  const envBaseUrl = process.env['LOOTSMITH_BASE_URL'];
  const envCacheDir = process.env['LOOTSMITH_CACHE_DIR'];

  if (envBaseUrl) {
    const current = rawConfig['source'];
    const source: Record<string, unknown> = isRecord(current) ? current : {};
    source['base_url'] = envBaseUrl;
    rawConfig['source'] = source;
  }
  if (envCacheDir) {
    const current = rawConfig['cache'];
    const cache: Record<string, unknown> = isRecord(current) ? current : {};
    cache['dir'] = envCacheDir;
    rawConfig['cache'] = cache;
  }
}
