import fs from 'node:fs/promises';
import path from 'node:path';
import type {
  CacheRecord,
  CacheStats,
  Manifest,
  ManifestEntry,
  ReconcileReport,
} from '../../domain/entities/CacheRecord.js';
import { isFileEntry } from '../../domain/entities/CacheRecord.js';
import {
  CacheWriteError,
  InvalidCacheKeyError,
  ManifestCorruptError,
  type MdSiftError,
} from '../../domain/errors/DomainErrors.js';
import { AsyncLock } from '../../shared/AsyncLock.js';
import { matchesFlatGlob } from '../../shared/FlatGlob.js';
import { Logger, errorMessage, silentLogger } from '../../shared/Logger.js';
import { Err, Ok, type Result } from '../../shared/Result.js';
import { isPlainRecord } from '../../shared/TypeGuards.js';
import { decodeManifest, encodeManifest } from './ManifestCodec.js';

export const MANIFEST_FILE = 'manifest.json';
const RECORD_EXT = '.json';
const SAFE_KEY = /^[A-Za-z0-9_-][A-Za-z0-9_.-]*$/;
const BYTES_PER_MB = 1024 * 1024;

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/**
 * 以檔案為單位的快取：每個 key 一個 `{key}.json`（`{data, meta, timestamp}`），
 * 另有 manifest.json 記錄檔案 → chunk id 的對應。
 *
 * 所有會修改 manifest、或先讀後寫的操作都持有同一把鎖，並在操作前從磁碟重新載入
 * manifest；`get` 只讀單一記錄，不需要鎖（記錄以暫存檔 + rename 寫入，不會半寫）。
 * manifest 遺失或損毀時，從現有記錄檔重建「記錄項目」；檔案 → chunk 的分組不會重建，
 * 下一次 discovery 會將所有來源檔視為需要重新處理。
 */
export class ChunkStore {
  private manifest: Manifest = new Map();
  private readonly lock = new AsyncLock();
  private tmpCounter = 0;

  private constructor(
    readonly cachePath: string,
    private readonly logger: Logger,
  ) {}

  /** 建立目錄並載入 manifest（必要時 recovery） */
  static async open(cachePath: string, logger: Logger = silentLogger()): Promise<ChunkStore> {
    await fs.mkdir(cachePath, { recursive: true });
    const store = new ChunkStore(cachePath, logger);
    await store.lock.runExclusive(() => store.reloadManifest());
    return store;
  }

  get manifestPath(): string {
    return path.join(this.cachePath, MANIFEST_FILE);
  }

  static isSafeKey(key: string): boolean {
    return SAFE_KEY.test(key) && key !== MANIFEST_FILE.slice(0, -RECORD_EXT.length);
  }

  /** 讀取單一記錄；不存在或損毀時回傳 null */
  async get(key: string): Promise<CacheRecord | null> {
    if (!ChunkStore.isSafeKey(key)) {
      this.logger.warn('Refusing to read unsafe cache key', { key });
      return null;
    }

    let raw: string;
    try {
      raw = await fs.readFile(this.recordPath(key), 'utf-8');
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) {
        this.logger.debug('Cache record not found', { key });
      } else {
        this.logger.warn('Cache record unreadable', { key, error: errorMessage(err) });
      }
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.logger.warn('Cache record corrupted', { key, error: errorMessage(err) });
      return null;
    }
    if (!isPlainRecord(parsed) || !('data' in parsed)) {
      this.logger.warn('Cache record has no data field', { key });
      return null;
    }

    return {
      data: parsed.data,
      meta: isPlainRecord(parsed.meta) ? parsed.meta : {},
      timestamp: typeof parsed.timestamp === 'string' ? parsed.timestamp : '',
    };
  }

  /** 寫入記錄並更新其 manifest 項目 */
  async put(key: string, data: unknown, meta: Record<string, unknown> = {}): Promise<Result<void, MdSiftError>> {
    if (!ChunkStore.isSafeKey(key)) {
      this.logger.warn('Refusing to write unsafe cache key', { key });
      return Err(new InvalidCacheKeyError(key));
    }

    return this.lock.runExclusive(async () => {
      const timestamp = new Date().toISOString();
      try {
        await this.writeJsonAtomic(this.recordPath(key), JSON.stringify({ data, meta, timestamp }, null, 2));
        await this.reloadManifest();
        this.manifest.set(key, { kind: 'chunk', timestamp, meta });
        await this.saveManifest();
        return Ok(undefined);
      } catch (err) {
        this.logger.error('Failed to save cache entry', { key, error: errorMessage(err) });
        return Err(new CacheWriteError(`Failed to save cache entry ${key}: ${errorMessage(err)}`, { cause: err }));
      }
    });
  }

  /** 重新載入後覆寫單一 manifest 項目（檔案項目使用） */
  async updateManifestEntry(key: string, entry: ManifestEntry): Promise<Result<void, MdSiftError>> {
    return this.lock.runExclusive(async () => {
      try {
        await this.reloadManifest();
        this.manifest.set(key, entry);
        await this.saveManifest();
        return Ok(undefined);
      } catch (err) {
        this.logger.error('Failed to update manifest entry', { key, error: errorMessage(err) });
        return Err(new CacheWriteError(`Failed to update manifest entry ${key}: ${errorMessage(err)}`, { cause: err }));
      }
    });
  }

  async getManifestEntry(key: string): Promise<ManifestEntry | null>;
  async getManifestEntry<T>(key: string, fallback: T): Promise<ManifestEntry | T>;
  async getManifestEntry<T>(key: string, fallback?: T): Promise<ManifestEntry | T | null> {
    return this.lock.runExclusive(async () => {
      await this.reloadManifest();
      return this.manifest.get(key) ?? fallback ?? null;
    });
  }

  /** 檔案雜湊與 manifest 記錄不同時回傳 true；任何失敗都視為需要更新 */
  async needsUpdate(key: string, hash: string): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      try {
        await this.reloadManifest();
        const entry = this.manifest.get(key);
        return !(isFileEntry(entry) && entry.contentHash === hash);
      } catch (err) {
        this.logger.error('Failed to check update status', { key, error: errorMessage(err) });
        return true;
      }
    });
  }

  /** 刪除檔名符合 pattern 的記錄檔（manifest 除外），回傳刪除數量 */
  async removeOld(pattern: string): Promise<number> {
    return this.lock.runExclusive(async () => {
      await this.reloadManifest();
      let removed = 0;

      for (const name of await this.listRecordFiles()) {
        if (!matchesFlatGlob(name, pattern)) continue;
        try {
          await fs.unlink(path.join(this.cachePath, name));
          removed++;
          this.manifest.delete(name.slice(0, -RECORD_EXT.length));
        } catch (err) {
          this.logger.warn('Failed to remove cache file', { file: name, error: errorMessage(err) });
        }
      }

      if (removed > 0) {
        await this.saveManifestLogged();
        this.logger.info('Removed cache files', { pattern, removed });
      }
      return removed;
    });
  }

  /**
   * 移除某檔案先前產生、但這次已不再產生的 chunk（記錄檔與 manifest 項目）。
   * 回傳孤兒 chunk id 的數量。
   */
  async cleanupOrphanedChunks(currentChunkIds: readonly string[], fileKey: string): Promise<number> {
    return this.lock.runExclusive(async () => {
      await this.reloadManifest();
      const entry = this.manifest.get(fileKey);
      if (!isFileEntry(entry)) return 0;

      const current = new Set(currentChunkIds);
      const orphaned = entry.chunkIds.filter((id) => !current.has(id));
      if (orphaned.length === 0) return 0;

      let removed = 0;
      for (const chunkId of orphaned) {
        if (await this.removeRecord(chunkId)) removed++;
      }

      await this.saveManifestLogged();
      this.logger.info('Cleaned up orphaned chunks', { fileKey, orphaned: orphaned.length, removed });
      return orphaned.length;
    });
  }

  /**
   * 全面核對 manifest：
   * - 記錄項目：記錄檔不存在 → 移除
   * - 檔案項目：chunk id 過濾為仍存在者；有刪減則改寫，刪減後為 0 → 移除
   * 所有變更最後一次寫回。
   */
  async verifyAndCleanupManifest(): Promise<Result<ReconcileReport, MdSiftError>> {
    return this.lock.runExclusive(async () => {
      const report: ReconcileReport = { chunkEntriesRemoved: 0, fileEntriesRemoved: 0, fileEntriesPruned: 0 };
      try {
        await this.reloadManifest();
        const present = new Set(await this.listRecordFiles());
        const exists = (key: string): boolean => present.has(`${key}${RECORD_EXT}`);
        const removals: string[] = [];

        for (const [key, entry] of this.manifest) {
          if (!isFileEntry(entry)) {
            if (!exists(key)) {
              removals.push(key);
              report.chunkEntriesRemoved++;
            }
            continue;
          }

          const remaining = entry.chunkIds.filter(exists);
          if (remaining.length === entry.chunkIds.length) continue;

          if (remaining.length === 0) {
            removals.push(key);
            report.fileEntriesRemoved++;
          } else {
            this.logger.info('Pruning missing chunks from file entry', {
              fileKey: key,
              before: entry.chunkIds.length,
              after: remaining.length,
            });
            this.manifest.set(key, { ...entry, chunkIds: remaining, chunkCount: remaining.length });
            report.fileEntriesPruned++;
          }
        }

        for (const key of removals) this.manifest.delete(key);

        if (removals.length > 0 || report.fileEntriesPruned > 0) {
          await this.saveManifest();
          this.logger.info('Cleaned up manifest', { ...report });
        }
        return Ok(report);
      } catch (err) {
        this.logger.error('Manifest verification failed', { error: errorMessage(err) });
        return Err(new CacheWriteError(`Manifest verification failed: ${errorMessage(err)}`, { cause: err }));
      }
    });
  }

  async getCacheStats(): Promise<CacheStats> {
    return this.lock.runExclusive(async () => {
      await this.reloadManifest();
      const records = await this.listRecordFiles();

      let totalBytes = 0;
      for (const name of [...records, MANIFEST_FILE]) {
        try {
          totalBytes += (await fs.stat(path.join(this.cachePath, name))).size;
        } catch (err) {
          this.logger.debug('Skipping unreadable file in stats', { file: name, error: errorMessage(err) });
        }
      }

      let fileEntries = 0;
      let chunkEntries = 0;
      for (const entry of this.manifest.values()) {
        if (isFileEntry(entry)) fileEntries++;
        else chunkEntries++;
      }

      return {
        totalEntries: this.manifest.size,
        fileEntries,
        chunkEntries,
        totalFiles: records.length,
        totalSizeMb: Math.round((totalBytes / BYTES_PER_MB) * 100) / 100,
        cachePath: this.cachePath,
      };
    });
  }

  /** manifest 中所有檔案項目的 key */
  async listFileEntryKeys(): Promise<string[]> {
    return this.lock.runExclusive(async () => {
      await this.reloadManifest();
      return [...this.manifest].filter(([, entry]) => isFileEntry(entry)).map(([key]) => key);
    });
  }

  /** 來源檔已刪除：移除檔案項目與其所有 chunk，回傳刪除的記錄數 */
  async forgetFile(fileKey: string): Promise<number> {
    return this.lock.runExclusive(async () => {
      await this.reloadManifest();
      const entry = this.manifest.get(fileKey);
      if (!isFileEntry(entry)) return 0;

      let removed = 0;
      for (const chunkId of entry.chunkIds) {
        if (await this.removeRecord(chunkId)) removed++;
      }
      this.manifest.delete(fileKey);
      await this.saveManifestLogged();
      this.logger.info('Forgot deleted source file', { fileKey, removed });
      return removed;
    });
  }

  // --- 以下皆須在鎖內呼叫 ---

  private recordPath(key: string): string {
    return path.join(this.cachePath, `${key}${RECORD_EXT}`);
  }

  private async listRecordFiles(): Promise<string[]> {
    try {
      const names = await fs.readdir(this.cachePath);
      return names.filter((n) => n.endsWith(RECORD_EXT) && n !== MANIFEST_FILE).sort();
    } catch (err) {
      this.logger.warn('Cache directory unreadable', { cachePath: this.cachePath, error: errorMessage(err) });
      return [];
    }
  }

  /** 刪除記錄檔與其 manifest 項目；記錄檔本來就不存在時回傳 false */
  private async removeRecord(key: string): Promise<boolean> {
    this.manifest.delete(key);
    if (!ChunkStore.isSafeKey(key)) return false;
    try {
      await fs.unlink(this.recordPath(key));
      return true;
    } catch (err) {
      if (!isErrnoCode(err, 'ENOENT')) {
        this.logger.warn('Failed to remove cache record', { key, error: errorMessage(err) });
      }
      return false;
    }
  }

  private async reloadManifest(): Promise<void> {
    const loaded = await this.readManifest();
    if (loaded.ok) {
      this.manifest = loaded.value;
      return;
    }
    if (isErrnoCode(loaded.error.cause, 'ENOENT')) {
      this.logger.info('No manifest found, rebuilding from cache files', { cachePath: this.cachePath });
    } else {
      this.logger.warn('Manifest unavailable, recovering from cache files', { error: loaded.error.message });
    }
    this.manifest = await this.recoverManifest();
  }

  private async readManifest(): Promise<Result<Manifest, ManifestCorruptError>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.manifestPath, 'utf-8');
    } catch (err) {
      return Err(new ManifestCorruptError(`Manifest not readable: ${errorMessage(err)}`, { cause: err }));
    }

    const decoded = decodeManifest(raw);
    if (!decoded.ok) return decoded;
    if (decoded.value.dropped.length > 0) {
      this.logger.warn('Dropped malformed manifest entries', { keys: decoded.value.dropped });
    }
    return Ok(decoded.value.manifest);
  }

  /** 由記錄檔重建記錄項目（key = 檔名主幹） */
  private async recoverManifest(): Promise<Manifest> {
    const manifest: Manifest = new Map();

    for (const name of await this.listRecordFiles()) {
      const key = name.slice(0, -RECORD_EXT.length);
      try {
        const parsed: unknown = JSON.parse(await fs.readFile(path.join(this.cachePath, name), 'utf-8'));
        if (!isPlainRecord(parsed)) {
          this.logger.warn('Could not recover cache file', { file: name, error: 'record is not an object' });
          continue;
        }
        manifest.set(key, {
          kind: 'chunk',
          timestamp: typeof parsed.timestamp === 'string' ? parsed.timestamp : new Date().toISOString(),
          meta: isPlainRecord(parsed.meta) ? parsed.meta : {},
        });
      } catch (err) {
        this.logger.warn('Could not recover cache file', { file: name, error: errorMessage(err) });
      }
    }

    this.manifest = manifest;
    await this.saveManifestLogged();
    this.logger.info('Recovered manifest', { entries: manifest.size });
    return manifest;
  }

  private async saveManifest(): Promise<void> {
    await this.writeJsonAtomic(this.manifestPath, encodeManifest(this.manifest));
  }

  /** 寫回失敗只記錄，下一次 reload 會再讀到舊狀態 */
  private async saveManifestLogged(): Promise<void> {
    try {
      await this.saveManifest();
    } catch (err) {
      this.logger.error('Failed to save manifest', { error: errorMessage(err) });
    }
  }

  private async writeJsonAtomic(target: string, json: string): Promise<void> {
    const tmp = `${target}.${process.pid}.${++this.tmpCounter}.tmp`;
    try {
      await fs.writeFile(tmp, json, 'utf-8');
      await fs.rename(tmp, target);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
  }
}
