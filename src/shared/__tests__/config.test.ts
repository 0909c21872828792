import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ConfigSchema, generateDefaultConfig, generateDefaultConfigYaml, loadConfig } from '../config.js';
import { ConfigError } from '../errors.js';

describe('ConfigSchema', () => {
  it('produces valid defaults from empty object', () => {
    const result = ConfigSchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.source.base_url).toBe('https://www.wowhead.com');
      expect(result.data.source.max_attempts).toBe(3);
      expect(result.data.source.backoff_base_ms).toBe(1000);
      expect(result.data.loot.max_item_id).toBe(157831);
      expect(result.data.cache.dir).toBe('~/.lootsmith/cache');
    }
  });

  it('accepts valid overrides', () => {
    const result = ConfigSchema.safeParse({
      source: { min_interval_ms: 0 },
      loot: { lootmode: 1 },
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.source.min_interval_ms).toBe(0);
      expect(result.data.loot.lootmode).toBe(1);
      // defaults still apply for other fields
      expect(result.data.source.timeout_ms).toBe(10000);
      expect(result.data.loot.groupid).toBe(0);
    }
  });

  it('rejects unsupported professions', () => {
    const result = ConfigSchema.safeParse({ loot: { professions: ['fishing'] } });
    expect(result.success).toBe(false);
  });

  it('rejects invalid types', () => {
    const result = ConfigSchema.safeParse({ source: { max_attempts: 'three' } });
    expect(result.success).toBe(false);
  });

  it('applies nested defaults for profession skill ids', () => {
    const result = ConfigSchema.safeParse({ loot: { profession_skill_ids: { alchemy: 1 } } });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.loot.profession_skill_ids.alchemy).toBe(1);
      expect(result.data.loot.profession_skill_ids.tailoring).toBe(197);
    }
  });
});

describe('generateDefaultConfig', () => {
  it('returns a full Config object', () => {
    const config = generateDefaultConfig();
    expect(config.loot.quest_item_class).toBe(12);
    expect(config.loot.professions).toHaveLength(10);
    expect(config.output.dir).toBe('output');
  });
});

describe('generateDefaultConfigYaml', () => {
  it('returns a YAML string', () => {
    const yaml = generateDefaultConfigYaml();
    expect(yaml).toContain('source:');
    expect(yaml).toContain('max_item_id: 157831');
  });
});

describe('loadConfig', () => {
  const saved = { ...process.env };
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lootsmith-config-'));
    delete process.env['LOOTSMITH_BASE_URL'];
    delete process.env['LOOTSMITH_CACHE_DIR'];
  });

  afterEach(() => {
    process.env = { ...saved };
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reads the file named by LOOTSMITH_CONFIG', async () => {
    const file = path.join(tmpDir, 'lootsmith.config.yaml');
    fs.writeFileSync(file, 'source:\n  min_interval_ms: 0\nloot:\n  max_item_id: 200000\n');
    process.env['LOOTSMITH_CONFIG'] = file;

    const config = await loadConfig();
    expect(config.source.min_interval_ms).toBe(0);
    expect(config.loot.max_item_id).toBe(200000);
    expect(config.loot.lootmode).toBe(23);
  });

  it('applies env overrides on top of the file', async () => {
    const file = path.join(tmpDir, 'lootsmith.config.yaml');
    fs.writeFileSync(file, 'cache:\n  dir: /from/file\n');
    process.env['LOOTSMITH_CONFIG'] = file;
    process.env['LOOTSMITH_BASE_URL'] = 'http://localhost:8080';
    process.env['LOOTSMITH_CACHE_DIR'] = '/from/env';

    const config = await loadConfig();
    expect(config.source.base_url).toBe('http://localhost:8080');
    expect(config.cache.dir).toBe('/from/env');
  });

  it('throws ConfigError for a missing file', async () => {
    process.env['LOOTSMITH_CONFIG'] = path.join(tmpDir, 'nope.yaml');
    await expect(loadConfig()).rejects.toBeInstanceOf(ConfigError);
  });

  it('throws ConfigError for invalid values', async () => {
    const file = path.join(tmpDir, 'lootsmith.config.yaml');
    fs.writeFileSync(file, 'source:\n  max_attempts: 0\n');
    process.env['LOOTSMITH_CONFIG'] = file;
    await expect(loadConfig()).rejects.toThrow('Invalid configuration');
  });
});
