export { ChunkStore, MANIFEST_FILE } from './infrastructure/cache/ChunkStore.js';
export { SemanticChunker, DEFAULT_CHUNKER_OPTIONS, type ChunkerOptions } from './infrastructure/vault/SemanticChunker.js';
export { MarkdownParser } from './infrastructure/vault/MarkdownParser.js';
export { FileSystemVaultAdapter } from './infrastructure/vault/FileSystemVaultAdapter.js';
export { OpenAIEmbeddingAdapter, type OpenAIEmbeddingConfig } from './infrastructure/embedding/OpenAIEmbeddingAdapter.js';
export { NullEmbeddingAdapter } from './infrastructure/embedding/NullEmbeddingAdapter.js';

export { DiscoveryUseCase, type DiscoveryOptions } from './application/DiscoveryUseCase.js';
export { RelevanceUseCase, DEFAULT_RELEVANCE_OPTIONS, type RelevanceOptions } from './application/RelevanceUseCase.js';
export { EmbeddingUseCase, type EmbeddingFillOptions, type EmbeddingFillResult } from './application/EmbeddingUseCase.js';
export { HealthCheckUseCase, type HealthReport } from './application/HealthCheckUseCase.js';
export type { DiscoveryResult, DiscoveryStats } from './application/dto/DiscoveryStats.js';
export type { RankedFile, MatchedSection } from './application/dto/RankedFile.js';
export type { QueryContext, QueryContextInput, MaterialSummary } from './application/dto/QueryContext.js';

export type { DocumentChunk } from './domain/entities/DocumentChunk.js';
export type { CacheRecord, CacheStats, ManifestEntry, ReconcileReport } from './domain/entities/CacheRecord.js';
export type { EmbeddingPort, EmbeddingResult } from './domain/ports/EmbeddingPort.js';
export type { MarkdownListing, UnreadableDirectory, VaultPort } from './domain/ports/VaultPort.js';
export { DEFAULT_BOOSTS, RelevanceBoost, type BoostConstants } from './domain/value-objects/RelevanceBoost.js';
export * from './domain/errors/DomainErrors.js';

export { loadConfig, resolveStorePath, type MdSiftConfig, type PartialConfig } from './config/ConfigLoader.js';
export { Logger, type LogLevel } from './shared/Logger.js';
export type { Result } from './shared/Result.js';
