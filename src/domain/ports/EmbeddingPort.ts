export interface EmbeddingResult {
  vector: number[];
  tokensUsed: number;
}

/**
 * 向量嵌入的外部能力。核心流程只在計算查詢向量與補齊 chunk 向量時呼叫。
 */
export interface EmbeddingPort {
  readonly providerId: string;
  readonly modelId: string;
  embed(texts: string[]): Promise<EmbeddingResult[]>;
  embedOne(text: string): Promise<EmbeddingResult>;
}
