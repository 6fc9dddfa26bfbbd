import type { EmbeddingPort, EmbeddingResult } from '../../domain/ports/EmbeddingPort.js';
import { EmbeddingUnavailableError } from '../../domain/errors/DomainErrors.js';

/**
 * 未設定 embedding provider（embedding.provider: 'none'）時使用。
 * discover / stats / verify 不需要向量；rank 與補齊向量會收到 EmbeddingUnavailableError 並降級。
 */
export class NullEmbeddingAdapter implements EmbeddingPort {
  readonly providerId = 'none';
  readonly modelId = 'none';

  async embed(_texts: string[]): Promise<EmbeddingResult[]> {
    throw new EmbeddingUnavailableError('No embedding provider configured');
  }

  async embedOne(_text: string): Promise<EmbeddingResult> {
    throw new EmbeddingUnavailableError('No embedding provider configured');
  }
}
