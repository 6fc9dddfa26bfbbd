import type { BoostConstants } from '../domain/value-objects/RelevanceBoost.js';
import type { LogLevel } from '../shared/Logger.js';

/** 快取目錄設定 */
export interface StoreConfig {
  /** 相對於工作目錄（或絕對路徑） */
  dir: string;
}

/** 切塊設定 */
export interface ChunkingConfig {
  maxChars: number;
  minChars: number;
}

/** Discovery 設定 */
export interface DiscoveryConfig {
  /** 同時處理的檔案數 */
  concurrency: number;
}

/** Embedding 提供者設定 */
export interface EmbeddingConfig {
  /** 'none' 時不呼叫任何 API；rank 會回報 embedding 不可用 */
  provider: 'openai' | 'none';
  model: string;
  dimension: number;
  maxBatchSize: number;
  /** 單筆輸入字元上限 */
  maxInputChars: number;
  apiKey?: string;
  baseUrl?: string;
}

/** 相關性排序設定 */
export interface RelevanceConfig {
  topK: number;
  maxSections: number;
  boosts: BoostConstants;
}

/** Log 設定 */
export interface LoggingConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface MdSiftConfig {
  version: number;
  store: StoreConfig;
  chunking: ChunkingConfig;
  discovery: DiscoveryConfig;
  embedding: EmbeddingConfig;
  relevance: RelevanceConfig;
  logging: LoggingConfig;
}

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

/** 部分設定（用於 merge） */
export type PartialConfig = DeepPartial<MdSiftConfig>;
