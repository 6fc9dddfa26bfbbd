import type { EmbeddingPort, EmbeddingResult } from '../../domain/ports/EmbeddingPort.js';
import { EmbeddingUnavailableError } from '../../domain/errors/DomainErrors.js';

export interface EmbeddingBatcherOptions {
  maxBatchSize: number;
  /** 單筆輸入字元上限，超過即截斷 */
  maxInputChars: number;
}

export const DEFAULT_BATCHER_OPTIONS: EmbeddingBatcherOptions = {
  maxBatchSize: 100,
  maxInputChars: 8000,
};

/**
 * 將大量文字拆成批次送入 EmbeddingPort
 * 輸出順序與輸入一致；provider 回傳筆數不符時整批視為失敗
 */
export class EmbeddingBatcher {
  private readonly options: EmbeddingBatcherOptions;

  constructor(
    private readonly provider: EmbeddingPort,
    options: Partial<EmbeddingBatcherOptions> = {},
  ) {
    this.options = { ...DEFAULT_BATCHER_OPTIONS, ...options };
  }

  /** 依 maxBatchSize 切分，回傳每批的輸入文字（已截斷） */
  plan(texts: readonly string[]): string[][] {
    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += this.options.maxBatchSize) {
      batches.push(texts.slice(i, i + this.options.maxBatchSize).map((t) => this.truncate(t)));
    }
    return batches;
  }

  async embedBatch(texts: readonly string[]): Promise<EmbeddingResult[]> {
    if (texts.length === 0) return [];

    const results: EmbeddingResult[] = [];
    for (const batch of this.plan(texts)) {
      results.push(...(await this.embedOneBatch(batch)));
    }
    return results;
  }

  /** 送出單一批次並檢查回傳筆數 */
  async embedOneBatch(batch: string[]): Promise<EmbeddingResult[]> {
    const batchResults = await this.provider.embed(batch);
    if (batchResults.length !== batch.length) {
      throw new EmbeddingUnavailableError(
        `Embedding provider returned ${batchResults.length} vectors for ${batch.length} inputs`,
      );
    }
    return batchResults;
  }

  private truncate(text: string): string {
    return text.length > this.options.maxInputChars ? text.slice(0, this.options.maxInputChars) : text;
  }
}
