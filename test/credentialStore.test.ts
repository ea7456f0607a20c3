import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { FileCredentialStore } from '../src/auth/credential-store.js';
import { createSilentLogger } from '../src/utils/logger.js';

describe('FileCredentialStore', () => {
  it('loads nothing on first run', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'todo-export-cache-'));
    const store = new FileCredentialStore(path.join(dir, 'cache.json'), createSilentLogger());

    await expect(store.load()).resolves.toBeNull();
  });

  it('saves into a new directory and loads it back', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'todo-export-cache-'));
    const file = path.join(dir, 'credentials', 'cache.json');
    const store = new FileCredentialStore(file, createSilentLogger());

    await store.save('{"Account":{}}');

    await expect(store.load()).resolves.toBe('{"Account":{}}');
    await expect(readFile(file, 'utf-8')).resolves.toBe('{"Account":{}}');
  });

  it('replaces the previous contents entirely', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'todo-export-cache-'));
    const file = path.join(dir, 'cache.json');
    const store = new FileCredentialStore(file, createSilentLogger());

    await store.save('first-version-with-more-text');
    await store.save('second');

    await expect(store.load()).resolves.toBe('second');
  });

  it('treats an empty file as no cache', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'todo-export-cache-'));
    const file = path.join(dir, 'cache.json');
    await writeFile(file, '  \n');
    const store = new FileCredentialStore(file, createSilentLogger());

    await expect(store.load()).resolves.toBeNull();
  });

  it('treats an unreadable path as no cache', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'todo-export-cache-'));
    // A directory exists at the path, so reading it fails
    const store = new FileCredentialStore(dir, createSilentLogger());

    await expect(store.load()).resolves.toBeNull();
  });
});
