import { DiscoveryUseCase } from '../application/DiscoveryUseCase.js';
import { EmbeddingUseCase } from '../application/EmbeddingUseCase.js';
import { HealthCheckUseCase } from '../application/HealthCheckUseCase.js';
import { RelevanceUseCase } from '../application/RelevanceUseCase.js';
import { loadConfig, resolveStorePath, type MdSiftConfig } from '../config/ConfigLoader.js';
import type { EmbeddingPort } from '../domain/ports/EmbeddingPort.js';
import { ChunkStore } from '../infrastructure/cache/ChunkStore.js';
import { NullEmbeddingAdapter } from '../infrastructure/embedding/NullEmbeddingAdapter.js';
import { OpenAIEmbeddingAdapter } from '../infrastructure/embedding/OpenAIEmbeddingAdapter.js';
import { FileSystemVaultAdapter } from '../infrastructure/vault/FileSystemVaultAdapter.js';
import { MarkdownParser } from '../infrastructure/vault/MarkdownParser.js';
import { SemanticChunker } from '../infrastructure/vault/SemanticChunker.js';
import { Logger } from '../shared/Logger.js';
import { ConfigInvalidError } from '../domain/errors/DomainErrors.js';
import { isDetailLevel, isOutputFormat, type DetailLevel, type OutputFormat } from './formatters/ProgressiveDisclosureFormatter.js';

/** 一次指令執行所需的所有依賴 */
export interface Runtime {
  workingDir: string;
  config: MdSiftConfig;
  logger: Logger;
  store: ChunkStore;
  embedding: EmbeddingPort;
  discovery: DiscoveryUseCase;
  embeddings: EmbeddingUseCase;
  relevance: RelevanceUseCase;
  health: HealthCheckUseCase;
}

function createEmbedding(config: MdSiftConfig, logger: Logger): EmbeddingPort {
  if (config.embedding.provider === 'none') return new NullEmbeddingAdapter();

  const apiKey = config.embedding.apiKey ?? process.env.OPENAI_API_KEY;
  if (!apiKey) {
    logger.warn('OPENAI_API_KEY not set, embeddings disabled');
    return new NullEmbeddingAdapter();
  }
  return new OpenAIEmbeddingAdapter({
    apiKey,
    model: config.embedding.model,
    dimension: config.embedding.dimension,
    baseUrl: config.embedding.baseUrl,
  });
}

/** 載入設定並組裝 store 與各用例 */
export async function createRuntime(workingDir: string): Promise<Runtime> {
  const config = loadConfig(workingDir);
  const logger = new Logger('mdsift', config.logging.level);
  const store = await ChunkStore.open(resolveStorePath(workingDir, config), logger.child('ChunkStore'));
  const embedding = createEmbedding(config, logger);
  const parser = new MarkdownParser();

  return {
    workingDir,
    config,
    logger,
    store,
    embedding,
    discovery: new DiscoveryUseCase(
      store,
      new SemanticChunker(parser, config.chunking, logger.child('SemanticChunker')),
      new FileSystemVaultAdapter(),
      { concurrency: config.discovery.concurrency },
      logger.child('Discovery'),
    ),
    embeddings: new EmbeddingUseCase(
      store,
      embedding,
      { maxBatchSize: config.embedding.maxBatchSize, maxInputChars: config.embedding.maxInputChars },
      logger.child('Embedding'),
    ),
    relevance: new RelevanceUseCase(store, embedding, config.relevance, parser, logger.child('Relevance')),
    health: new HealthCheckUseCase(store),
  };
}

export function parseFormat(value: unknown): OutputFormat {
  if (!isOutputFormat(value)) throw new ConfigInvalidError(`--format must be json or text`);
  return value;
}

export function parseLevel(value: unknown): DetailLevel {
  if (!isDetailLevel(value)) throw new ConfigInvalidError(`--level must be brief, normal or full`);
  return value;
}
