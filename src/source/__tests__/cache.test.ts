import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { FileCacheStore, cacheFileName } from '../cache.js';
import { CacheError } from '../../shared/errors.js';

describe('cacheFileName', () => {
  it('keys by kind and identifier', () => {
    expect(cacheFileName('npc', 96028)).toBe('npc-96028.html');
  });
});

describe('FileCacheStore', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lootsmith-cache-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns null for unknown records', async () => {
    const cache = new FileCacheStore(path.join(tmpDir, 'missing'));
    expect(await cache.get('npc', 1)).toBeNull();
  });

  it('stores and returns content, creating the directory', async () => {
    const cache = new FileCacheStore(path.join(tmpDir, 'nested', 'cache'));
    await cache.put('object', 252452, '<html>chest</html>');
    expect(await cache.get('object', 252452)).toBe('<html>chest</html>');
    expect(await cache.get('npc', 252452)).toBeNull();
  });

  it('overwrites an existing record', async () => {
    const cache = new FileCacheStore(tmpDir);
    await cache.put('item', 5, 'old');
    await cache.put('item', 5, 'new');
    expect(await cache.get('item', 5)).toBe('new');
  });

  it('clears one kind or everything', async () => {
    const cache = new FileCacheStore(tmpDir);
    await cache.put('npc', 1, 'a');
    await cache.put('item', 2, 'b');
    await cache.put('item', 3, 'c');
    fs.writeFileSync(path.join(tmpDir, 'notes.txt'), 'keep');

    expect(await cache.clear('item')).toBe(2);
    expect(await cache.get('npc', 1)).toBe('a');
    expect(await cache.clear()).toBe(1);
    expect(fs.readdirSync(tmpDir)).toEqual(['notes.txt']);
  });

  it('clears nothing when the directory does not exist', async () => {
    const cache = new FileCacheStore(path.join(tmpDir, 'missing'));
    expect(await cache.clear()).toBe(0);
  });

  it('wraps write failures in CacheError', async () => {
    const blocker = path.join(tmpDir, 'file');
    fs.writeFileSync(blocker, 'x');
    const cache = new FileCacheStore(path.join(blocker, 'cache'));
    await expect(cache.put('npc', 1, 'a')).rejects.toBeInstanceOf(CacheError);
  });
});
