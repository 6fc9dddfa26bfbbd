import OpenAI from 'openai';
import type { EmbeddingPort, EmbeddingResult } from '../../domain/ports/EmbeddingPort.js';
import { EmbeddingUnavailableError, EmbeddingRateLimitError } from '../../domain/errors/DomainErrors.js';

export interface OpenAIEmbeddingConfig {
  apiKey: string;
  model?: string;
  dimension?: number;
  baseUrl?: string;
  /** SDK 內建重試；rate limit 另由 EmbeddingUseCase 的 withRetry 處理 */
  maxRetries?: number;
}

/** 由 429 回應的 retry-after（秒）或 retry-after-ms 標頭換算等待毫秒數 */
function retryAfterMs(err: InstanceType<typeof OpenAI.APIError>): number | undefined {
  const ms = Number(err.headers?.['retry-after-ms']);
  if (Number.isFinite(ms) && ms > 0) return ms;
  const seconds = Number(err.headers?.['retry-after']);
  if (Number.isFinite(seconds) && seconds > 0) return seconds * 1000;
  return undefined;
}

export class OpenAIEmbeddingAdapter implements EmbeddingPort {
  readonly providerId = 'openai';
  readonly dimension: number;
  readonly modelId: string;
  private client: OpenAI;

  constructor(config: OpenAIEmbeddingConfig) {
    this.dimension = config.dimension ?? 1536;
    this.modelId = config.model ?? 'text-embedding-3-small';
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: config.maxRetries ?? 0,
    });
  }

  async embed(texts: string[]): Promise<EmbeddingResult[]> {
    if (texts.length === 0) return [];

    try {
      const response = await this.client.embeddings.create({
        model: this.modelId,
        input: texts,
        encoding_format: 'float',
        // 只有 text-embedding-3 系列接受 dimensions
        ...(this.modelId.startsWith('text-embedding-3') ? { dimensions: this.dimension } : {}),
      });

      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => ({
          vector: item.embedding,
          tokensUsed: response.usage?.total_tokens ?? 0,
        }));
    } catch (err) {
      if (err instanceof OpenAI.APIError && err.status === 429) {
        throw new EmbeddingRateLimitError('Rate limited by OpenAI', retryAfterMs(err), { cause: err });
      }
      const message = err instanceof Error ? err.message : 'unknown error';
      throw new EmbeddingUnavailableError(`OpenAI embedding failed: ${message}`, { cause: err });
    }
  }

  async embedOne(text: string): Promise<EmbeddingResult> {
    const [result] = await this.embed([text]);
    if (!result) {
      throw new EmbeddingUnavailableError('OpenAI returned no embedding');
    }
    return result;
  }
}
