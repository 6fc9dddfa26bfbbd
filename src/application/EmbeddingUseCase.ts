import type { DocumentChunk } from '../domain/entities/DocumentChunk.js';
import { withEmbedding } from '../domain/entities/DocumentChunk.js';
import { EmbeddingRateLimitError } from '../domain/errors/DomainErrors.js';
import type { EmbeddingPort } from '../domain/ports/EmbeddingPort.js';
import type { ChunkStore } from '../infrastructure/cache/ChunkStore.js';
import { chunkMeta, toChunkRecord } from '../infrastructure/cache/ChunkRecordCodec.js';
import { EmbeddingBatcher, type EmbeddingBatcherOptions } from '../infrastructure/embedding/EmbeddingBatcher.js';
import { Logger, errorMessage, silentLogger } from '../shared/Logger.js';
import { withRetry } from '../shared/RetryPolicy.js';

export interface EmbeddingFillOptions extends EmbeddingBatcherOptions {
  /** rate limit 時的重試次數與退避基準 */
  maxRetries: number;
  baseDelayMs: number;
  /** 單次 retry 等待上限 */
  maxRetryDelayMs: number;
}

export const DEFAULT_EMBEDDING_FILL_OPTIONS: EmbeddingFillOptions = {
  maxBatchSize: 100,
  maxInputChars: 8000,
  maxRetries: 3,
  baseDelayMs: 1000,
  maxRetryDelayMs: 30_000,
};

export interface EmbeddingFillResult {
  /** 與輸入同順序；失敗批次的 chunk 維持 embedding = null */
  chunks: DocumentChunk[];
  embedded: number;
  failed: number;
  warnings: string[];
}

/**
 * 補齊 chunk 向量：只處理 embedding 為 null 的 chunk，
 * 依批次呼叫 provider，rate limit 依錯誤建議的時間重試，
 * 成功的批次立即寫回快取。單批失敗不影響其他批次，也不拋出。
 */
export class EmbeddingUseCase {
  private readonly options: EmbeddingFillOptions;
  private readonly batcher: EmbeddingBatcher;

  constructor(
    private readonly store: ChunkStore,
    private readonly embedding: EmbeddingPort,
    options: Partial<EmbeddingFillOptions> = {},
    private readonly logger: Logger = silentLogger(),
  ) {
    this.options = { ...DEFAULT_EMBEDDING_FILL_OPTIONS, ...options };
    this.batcher = new EmbeddingBatcher(embedding, this.options);
  }

  async embedMissing(chunks: readonly DocumentChunk[]): Promise<EmbeddingFillResult> {
    const result: EmbeddingFillResult = { chunks: [...chunks], embedded: 0, failed: 0, warnings: [] };

    const missing = chunks.flatMap((chunk, index) => (chunk.embedding === null ? [index] : []));
    if (missing.length === 0) return result;

    const batches = this.batcher.plan(missing.map((i) => chunks[i].embeddingContent));
    let offset = 0;

    for (const batch of batches) {
      const indices = missing.slice(offset, offset + batch.length);
      offset += batch.length;

      let vectors: number[][];
      try {
        const embedded = await withRetry(() => this.batcher.embedOneBatch(batch), {
          maxRetries: this.options.maxRetries,
          baseDelayMs: this.options.baseDelayMs,
          maxDelayMs: this.options.maxRetryDelayMs,
          isRetryable: (err) => err instanceof EmbeddingRateLimitError,
          delayHint: (err) => (err instanceof EmbeddingRateLimitError ? err.retryAfterMs : undefined),
          onRetry: (attempt, err, delayMs) => {
            this.logger.warn('Embedding rate limited, retrying', { attempt, delayMs, error: errorMessage(err) });
          },
        });
        vectors = embedded.map((e) => e.vector);
      } catch (err) {
        this.logger.error('Embedding batch failed', { size: batch.length, error: errorMessage(err) });
        result.warnings.push(`Embedding batch of ${batch.length} failed: ${errorMessage(err)}`);
        result.failed += batch.length;
        continue;
      }

      const stamp = { model: this.embedding.modelId, generatedAt: new Date().toISOString() };
      for (const [j, index] of indices.entries()) {
        const chunk = withEmbedding(result.chunks[index], vectors[j]);
        result.chunks[index] = chunk;
        result.embedded++;

        const saved = await this.store.put(chunk.chunkId, toChunkRecord(chunk, stamp), chunkMeta(chunk));
        if (!saved.ok) {
          result.warnings.push(`Embedding for ${chunk.chunkId} not cached: ${saved.error.message}`);
        }
      }
    }

    this.logger.info('Embedding fill complete', { embedded: result.embedded, failed: result.failed });
    return result;
  }
}
