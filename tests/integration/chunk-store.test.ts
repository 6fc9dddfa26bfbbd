import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ChunkStore } from '../../src/infrastructure/cache/ChunkStore.js';
import { InvalidCacheKeyError } from '../../src/domain/errors/DomainErrors.js';
import type { FileEntry } from '../../src/domain/entities/CacheRecord.js';

function fileEntry(contentHash: string, chunkIds: string[]): FileEntry {
  return { kind: 'file', contentHash, chunkIds, chunkCount: chunkIds.length };
}

describe('ChunkStore', () => {
  let tmpDir: string;
  let store: ChunkStore;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mdsift-store-'));
    store = await ChunkStore.open(path.join(tmpDir, 'cache'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const recordFile = (key: string): string => path.join(tmpDir, 'cache', `${key}.json`);

  describe('put / get', () => {
    it('should return the same data and meta that were stored', async () => {
      const put = await store.put('c1', { text: 'hello', n: 1 }, { type: 'chunk' });
      expect(put.ok).toBe(true);

      const record = await store.get('c1');
      expect(record?.data).toEqual({ text: 'hello', n: 1 });
      expect(record?.meta).toEqual({ type: 'chunk' });
      expect(record?.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
      expect(await store.getManifestEntry('c1')).toMatchObject({ kind: 'chunk', meta: { type: 'chunk' } });
    });

    it('should return null for missing or corrupted records', async () => {
      expect(await store.get('nothing')).toBeNull();

      fs.writeFileSync(recordFile('broken'), 'not json');
      expect(await store.get('broken')).toBeNull();
    });

    it('should refuse keys that are not safe file names', async () => {
      const escaped = await store.put('../escape', { x: 1 });
      expect(escaped.ok).toBe(false);
      if (!escaped.ok) expect(escaped.error).toBeInstanceOf(InvalidCacheKeyError);

      expect((await store.put('manifest', { x: 1 })).ok).toBe(false);
      expect(await store.get('../escape')).toBeNull();
      expect(fs.existsSync(path.join(tmpDir, 'escape.json'))).toBe(false);
    });

    it('should keep every entry when puts run concurrently', async () => {
      const keys = Array.from({ length: 20 }, (_, i) => `k${i}`);
      await Promise.all(keys.map((key) => store.put(key, { key })));

      const stats = await store.getCacheStats();
      expect(stats.chunkEntries).toBe(20);
      expect(stats.totalFiles).toBe(20);
    });
  });

  describe('needsUpdate', () => {
    it('should compare against the stored file hash', async () => {
      await store.updateManifestEntry('file.md', fileEntry('hash-A', []));

      expect(await store.needsUpdate('file.md', 'hash-A')).toBe(false);
      expect(await store.needsUpdate('file.md', 'hash-B')).toBe(true);
      expect(await store.needsUpdate('other.md', 'hash-A')).toBe(true);
    });

    it('should treat a chunk entry under the same key as needing an update', async () => {
      await store.put('file_md', { x: 1 });
      expect(await store.needsUpdate('file_md', 'hash-A')).toBe(true);
    });
  });

  describe('cleanupOrphanedChunks', () => {
    it('should delete chunks no longer produced by the file', async () => {
      for (const key of ['c1', 'c2', 'c3']) await store.put(key, { key });
      await store.updateManifestEntry('/docs/a.md', fileEntry('h', ['c1', 'c2', 'c3']));

      const orphaned = await store.cleanupOrphanedChunks(['c1', 'c3'], '/docs/a.md');

      expect(orphaned).toBe(1);
      expect(fs.existsSync(recordFile('c2'))).toBe(false);
      expect(await store.getManifestEntry('c2')).toBeNull();
      expect(await store.get('c1')).not.toBeNull();
      expect(await store.get('c3')).not.toBeNull();
    });

    it('should do nothing for a file without an entry', async () => {
      expect(await store.cleanupOrphanedChunks(['c1'], '/docs/unknown.md')).toBe(0);
    });
  });

  describe('verifyAndCleanupManifest', () => {
    it('should drop dangling entries and prune file entries', async () => {
      await store.put('c1', { key: 'c1' });
      await store.put('c9', { key: 'c9' });
      fs.rmSync(recordFile('c9'));

      await store.updateManifestEntry('/docs/a.md', fileEntry('h', ['c1', 'missing']));
      await store.updateManifestEntry('/docs/b.md', fileEntry('h', ['gone']));
      await store.updateManifestEntry('/docs/empty.md', fileEntry('h', []));

      const result = await store.verifyAndCleanupManifest();
      expect(result).toEqual({
        ok: true,
        value: { chunkEntriesRemoved: 1, fileEntriesRemoved: 1, fileEntriesPruned: 1 },
      });

      expect(await store.getManifestEntry('c9')).toBeNull();
      expect(await store.getManifestEntry('/docs/b.md')).toBeNull();
      expect(await store.getManifestEntry('/docs/a.md')).toEqual(fileEntry('h', ['c1']));
      // 空檔案的項目沒有 chunk 可核對，保留
      expect(await store.getManifestEntry('/docs/empty.md')).toEqual(fileEntry('h', []));
    });

    it('should report nothing for a consistent manifest', async () => {
      await store.put('c1', { key: 'c1' });
      await store.updateManifestEntry('/docs/a.md', fileEntry('h', ['c1']));

      const result = await store.verifyAndCleanupManifest();
      expect(result).toEqual({
        ok: true,
        value: { chunkEntriesRemoved: 0, fileEntriesRemoved: 0, fileEntriesPruned: 0 },
      });
    });
  });

  describe('manifest recovery', () => {
    it('should rebuild chunk entries but not file groupings', async () => {
      await store.put('c1', { key: 'c1' }, { type: 'chunk' });
      await store.put('c2', { key: 'c2' }, { type: 'chunk' });
      await store.updateManifestEntry('/docs/a.md', fileEntry('h', ['c1', 'c2']));

      fs.rmSync(path.join(tmpDir, 'cache', 'manifest.json'));
      const reopened = await ChunkStore.open(path.join(tmpDir, 'cache'));

      expect(await reopened.getManifestEntry('c1')).toMatchObject({ kind: 'chunk', meta: { type: 'chunk' } });
      expect(await reopened.getManifestEntry('c2')).toMatchObject({ kind: 'chunk' });
      expect(await reopened.getManifestEntry('/docs/a.md')).toBeNull();
      expect(await reopened.needsUpdate('/docs/a.md', 'h')).toBe(true);
      expect(fs.existsSync(path.join(tmpDir, 'cache', 'manifest.json'))).toBe(true);
    });

    it('should recover from a corrupted manifest', async () => {
      await store.put('c1', { key: 'c1' });
      fs.writeFileSync(path.join(tmpDir, 'cache', 'manifest.json'), '{ oops');

      const stats = await store.getCacheStats();
      expect(stats.chunkEntries).toBe(1);
      expect(stats.fileEntries).toBe(0);
    });

    it('should fall back when asked for a missing entry', async () => {
      expect(await store.getManifestEntry('absent', 'fallback')).toBe('fallback');
    });
  });

  describe('removeOld', () => {
    it('should delete record files matching the pattern', async () => {
      await store.put('query_aaa', { x: 1 });
      await store.put('query_bbb', { x: 2 });
      await store.put('c1', { x: 3 });

      expect(await store.removeOld('query_*')).toBe(2);
      expect(await store.get('query_aaa')).toBeNull();
      expect(await store.getManifestEntry('query_bbb')).toBeNull();
      expect(await store.get('c1')).not.toBeNull();
    });

    it('should never delete the manifest', async () => {
      await store.put('c1', { x: 1 });
      expect(await store.removeOld('*')).toBe(1);
      expect(fs.existsSync(path.join(tmpDir, 'cache', 'manifest.json'))).toBe(true);
    });
  });

  describe('forgetFile', () => {
    it('should remove a file entry and all its chunks', async () => {
      await store.put('c1', { x: 1 });
      await store.put('c2', { x: 2 });
      await store.updateManifestEntry('/docs/a.md', fileEntry('h', ['c1', 'c2']));

      expect(await store.forgetFile('/docs/a.md')).toBe(2);
      expect(await store.getManifestEntry('/docs/a.md')).toBeNull();
      expect(await store.get('c1')).toBeNull();
      expect(await store.listFileEntryKeys()).toEqual([]);
    });
  });

  describe('getCacheStats', () => {
    it('should count entries by kind', async () => {
      await store.put('c1', { x: 1 });
      await store.put('c2', { x: 2 });
      await store.updateManifestEntry('/docs/a.md', fileEntry('h', ['c1', 'c2']));

      const stats = await store.getCacheStats();
      expect(stats).toEqual({
        totalEntries: 3,
        fileEntries: 1,
        chunkEntries: 2,
        totalFiles: 2,
        totalSizeMb: 0,
        cachePath: path.join(tmpDir, 'cache'),
      });
    });
  });
});
