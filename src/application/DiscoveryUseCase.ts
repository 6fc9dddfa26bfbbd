import path from 'node:path';
import type { DocumentChunk } from '../domain/entities/DocumentChunk.js';
import { sortByChunkIndex, withEmbedding } from '../domain/entities/DocumentChunk.js';
import { isFileEntry } from '../domain/entities/CacheRecord.js';
import type { MarkdownListing, VaultPort } from '../domain/ports/VaultPort.js';
import { ContentHash } from '../domain/value-objects/ContentHash.js';
import type { ChunkStore } from '../infrastructure/cache/ChunkStore.js';
import {
  chunkMeta,
  fromChunkRecord,
  readEmbeddingStamp,
  toChunkRecord,
  type EmbeddingStamp,
} from '../infrastructure/cache/ChunkRecordCodec.js';
import type { SemanticChunker } from '../infrastructure/vault/SemanticChunker.js';
import { Logger, errorMessage, silentLogger } from '../shared/Logger.js';
import { runPool } from '../shared/WorkerPool.js';
import { type DiscoveryResult, emptyDiscoveryStats } from './dto/DiscoveryStats.js';

function isInside(dir: string, filePath: string): boolean {
  const rel = path.relative(dir, filePath);
  return rel !== '' && !rel.startsWith('..') && !path.isAbsolute(rel);
}

export interface DiscoveryOptions {
  /** 同時處理的檔案數 */
  concurrency: number;
}

interface PendingFile {
  filePath: string;
  content: string;
  hash: string;
}

interface ProcessedFile {
  chunks: DocumentChunk[];
  orphansRemoved: number;
}

/**
 * Discovery 用例：列出工作目錄下的 Markdown，hash 未變者從快取載入，
 * 其餘重新切塊、寫入快取並清除孤兒 chunk。
 *
 * 單檔失敗只記錄並排除，不中斷整批。這裡不計算向量（見 EmbeddingUseCase）。
 */
export class DiscoveryUseCase {
  constructor(
    private readonly store: ChunkStore,
    private readonly chunker: SemanticChunker,
    private readonly vault: VaultPort,
    private readonly options: DiscoveryOptions = { concurrency: 4 },
    private readonly logger: Logger = silentLogger(),
  ) {}

  async discover(workingDir: string): Promise<DiscoveryResult> {
    const start = Date.now();
    const stats = emptyDiscoveryStats();
    const root = path.resolve(workingDir);

    const reconciled = await this.store.verifyAndCleanupManifest();
    if (!reconciled.ok) {
      stats.warnings.push(`Manifest verification failed: ${reconciled.error.message}`);
    }

    if (!(await this.vault.directoryExists(root))) {
      this.logger.error('Working directory not found', { workingDir: root });
      stats.warnings.push(`Working directory not found: ${root}`);
      stats.durationMs = Date.now() - start;
      return { chunks: [], stats };
    }

    let listing: MarkdownListing;
    try {
      listing = await this.vault.listMarkdownFiles(root);
    } catch (err) {
      this.logger.error('Failed to list working directory', { workingDir: root, error: errorMessage(err) });
      stats.warnings.push(`Failed to list ${root}: ${errorMessage(err)}`);
      stats.durationMs = Date.now() - start;
      return { chunks: [], stats };
    }
    for (const dir of listing.unreadable) {
      this.logger.warn('Skipped unreadable directory', { dirPath: dir.path, error: dir.error });
      stats.warnings.push(`Skipped unreadable directory ${dir.path}: ${dir.error}`);
    }

    const files = listing.files;
    stats.filesFound = files.length;
    stats.filesForgotten = await this.forgetDeletedFiles(
      root,
      new Set(files),
      listing.unreadable.map((d) => d.path),
    );

    // 1. 檢查快取
    const cached: DocumentChunk[] = [];
    const pending: PendingFile[] = [];
    for (const filePath of files) {
      let content: string;
      try {
        content = await this.vault.readFile(filePath);
      } catch (err) {
        this.logger.error('Failed to read file', { filePath, error: errorMessage(err) });
        stats.warnings.push(`Failed to read ${filePath}: ${errorMessage(err)}`);
        stats.filesFailed++;
        continue;
      }

      const hash = ContentHash.fromText(content).value;
      if (!(await this.store.needsUpdate(filePath, hash))) {
        const loaded = await this.loadCachedChunks(filePath);
        if (loaded) {
          cached.push(...loaded);
          stats.filesCached++;
          stats.chunksLoaded += loaded.length;
          continue;
        }
        stats.warnings.push(`Cached chunks incomplete for ${filePath}, reprocessing`);
      }
      pending.push({ filePath, content, hash });
    }

    // 2. 重新處理變更的檔案
    const outcomes = await runPool(pending, this.options.concurrency, (file) => this.processFile(file));
    const order = new Map(files.map((f, i) => [f, i]));
    outcomes.sort((a, b) => (order.get(a.item.filePath) ?? 0) - (order.get(b.item.filePath) ?? 0));

    const fresh: DocumentChunk[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        fresh.push(...outcome.value.chunks);
        stats.filesProcessed++;
        stats.chunksCreated += outcome.value.chunks.length;
        stats.orphansRemoved += outcome.value.orphansRemoved;
      } else {
        const message = errorMessage(outcome.error);
        this.logger.error('Failed to process file', { filePath: outcome.item.filePath, error: message });
        stats.warnings.push(`Failed to process ${outcome.item.filePath}: ${message}`);
        stats.filesFailed++;
      }
    }

    stats.durationMs = Date.now() - start;
    this.logger.info('Discovery complete', {
      filesFound: stats.filesFound,
      filesCached: stats.filesCached,
      filesProcessed: stats.filesProcessed,
      filesFailed: stats.filesFailed,
      durationMs: stats.durationMs,
    });

    return { chunks: [...cached, ...fresh], stats };
  }

  /**
   * 依 manifest 的檔案項目載入 chunk。
   * 任何記錄缺漏、損毀或筆數不符都回傳 null，由呼叫端重新處理整個檔案。
   */
  async loadCachedChunks(filePath: string): Promise<DocumentChunk[] | null> {
    const entry = await this.store.getManifestEntry(filePath);
    if (!isFileEntry(entry)) return null;

    const chunks: DocumentChunk[] = [];
    for (const chunkId of entry.chunkIds) {
      const record = await this.store.get(chunkId);
      if (!record) {
        this.logger.warn('Cached chunk missing', { filePath, chunkId });
        return null;
      }
      const chunk = fromChunkRecord(chunkId, record.data);
      if (!chunk.ok) {
        this.logger.warn('Cached chunk invalid', { filePath, chunkId, reason: chunk.error.reason });
        return null;
      }
      chunks.push(chunk.value);
    }

    if (chunks.length !== entry.chunkCount) {
      this.logger.warn('Cached chunk count mismatch', {
        filePath,
        expected: entry.chunkCount,
        actual: chunks.length,
      });
      return null;
    }
    return sortByChunkIndex(chunks);
  }

  private async processFile(file: PendingFile): Promise<ProcessedFile> {
    const chunks: DocumentChunk[] = [];

    for (const fresh of this.chunker.chunk(file.filePath, file.content)) {
      const { chunk, stamp } = await this.carryOverEmbedding(fresh);
      const saved = await this.store.put(chunk.chunkId, toChunkRecord(chunk, stamp), chunkMeta(chunk));
      if (!saved.ok) throw saved.error;
      chunks.push(chunk);
    }

    const chunkIds = chunks.map((c) => c.chunkId);
    const orphansRemoved = await this.store.cleanupOrphanedChunks(chunkIds, file.filePath);

    const updated = await this.store.updateManifestEntry(file.filePath, {
      kind: 'file',
      contentHash: file.hash,
      chunkIds,
      chunkCount: chunks.length,
    });
    if (!updated.ok) throw updated.error;

    this.logger.debug('Processed file', { filePath: file.filePath, chunks: chunks.length, orphansRemoved });
    return { chunks, orphansRemoved };
  }

  /** 同 id 且 contentHash 相同的既有記錄若已有向量，沿用之 */
  private async carryOverEmbedding(
    chunk: DocumentChunk,
  ): Promise<{ chunk: DocumentChunk; stamp?: EmbeddingStamp }> {
    const record = await this.store.get(chunk.chunkId);
    if (!record) return { chunk };

    const previous = fromChunkRecord(chunk.chunkId, record.data);
    if (!previous.ok || previous.value.contentHash !== chunk.contentHash || !previous.value.embedding) {
      return { chunk };
    }
    return {
      chunk: withEmbedding(chunk, previous.value.embedding),
      stamp: readEmbeddingStamp(record.data),
    };
  }

  /** manifest 中位於 root 之下、但已不存在的來源檔 */
  private async forgetDeletedFiles(
    root: string,
    listed: ReadonlySet<string>,
    unreadableDirs: readonly string[],
  ): Promise<number> {
    let forgotten = 0;
    for (const key of await this.store.listFileEntryKeys()) {
      if (!isInside(root, key) || listed.has(key)) continue;
      // 讀不到的目錄下的檔案無法判斷是否已刪除，保留快取
      if (unreadableDirs.some((dir) => isInside(dir, key))) continue;
      await this.store.forgetFile(key);
      forgotten++;
    }
    return forgotten;
  }
}
