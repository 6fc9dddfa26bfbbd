import type { DocumentChunk } from '../domain/entities/DocumentChunk.js';
import { sortByChunkIndex } from '../domain/entities/DocumentChunk.js';
import {
  EmbeddingUnavailableError,
  MdSiftError,
  QueryContextInvalidError,
} from '../domain/errors/DomainErrors.js';
import type { EmbeddingPort } from '../domain/ports/EmbeddingPort.js';
import { breadcrumb, queryCacheKey } from '../domain/value-objects/ChunkIdentity.js';
import {
  DEFAULT_BOOSTS,
  RelevanceBoost,
  type BoostConstants,
  type ScoredChunk,
} from '../domain/value-objects/RelevanceBoost.js';
import { cosineSimilarity, mean } from '../domain/value-objects/Similarity.js';
import type { ChunkStore } from '../infrastructure/cache/ChunkStore.js';
import { MarkdownParser } from '../infrastructure/vault/MarkdownParser.js';
import { isPlainRecord } from '../shared/TypeGuards.js';
import { Logger, errorMessage, silentLogger } from '../shared/Logger.js';
import { Err, Ok, type Result } from '../shared/Result.js';
import {
  queryContextSchema,
  type MaterialSummary,
  type QueryContext,
  type QueryContextInput,
} from './dto/QueryContext.js';
import type { MatchedSection, RankedFile } from './dto/RankedFile.js';

export interface RelevanceOptions {
  topK: number;
  maxSections: number;
  boosts: BoostConstants;
}

export const DEFAULT_RELEVANCE_OPTIONS: RelevanceOptions = {
  topK: 3,
  maxSections: 3,
  boosts: DEFAULT_BOOSTS,
};

const SEARCH_SEPARATOR = ' | ';
const VALUES_PER_COMPONENT = 10;
const PREVIEW_CHARS = 200;
const QUERY_PREVIEW_CHARS = 200;

const MATERIAL_COMPONENTS: ReadonlyArray<[string, (m: MaterialSummary) => Array<string | undefined>]> = [
  ['Topics', (m) => [m.mainTopic]],
  ['Technologies', (m) => m.technologies],
  ['Key concepts', (m) => m.keyConcepts],
  ['Content types', (m) => [m.documentType]],
];

function distinct(values: Iterable<string | undefined>): string[] {
  const seen = new Set<string>();
  for (const v of values) {
    const trimmed = v?.trim();
    if (trimmed) seen.add(trimmed);
  }
  return [...seen];
}

function scalarOr(value: unknown, fallback: string): string {
  if (typeof value === 'string' && value) return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return fallback;
}

function preview(content: string): string {
  return content.length > PREVIEW_CHARS ? `${content.slice(0, PREVIEW_CHARS)}...` : content;
}

function isVector(value: unknown): value is number[] {
  return Array.isArray(value) && value.length > 0 && value.every((v) => typeof v === 'number');
}

/**
 * 相關性排序用例：以查詢向量計算 chunk 的餘弦相似度，
 * 依檔案 / 前後鄰居 / 上層 heading 結構加分後彙整為檔案排序。
 *
 * 沒有向量的 chunk 不計分（不當作 0 分），沒有可計分 chunk 的檔案不進入排序。
 */
export class RelevanceUseCase {
  private readonly options: RelevanceOptions;

  constructor(
    private readonly store: ChunkStore,
    private readonly embedding: EmbeddingPort,
    options: Partial<RelevanceOptions> = {},
    private readonly parser: MarkdownParser = new MarkdownParser(),
    private readonly logger: Logger = silentLogger(),
  ) {
    this.options = { ...DEFAULT_RELEVANCE_OPTIONS, ...options };
  }

  /** `Goal: … | Audience: … | Service: … | Topics: …` */
  buildSearchText(context: QueryContext): string {
    const parts = [`Goal: ${context.goal}`];
    if (context.audience) parts.push(`Audience: ${context.audience}`);
    if (context.service) parts.push(`Service: ${context.service}`);

    for (const [label, pick] of MATERIAL_COMPONENTS) {
      const values = distinct(context.materials.flatMap(pick)).slice(0, VALUES_PER_COMPONENT);
      if (values.length > 0) parts.push(`${label}: ${values.join(', ')}`);
    }
    return parts.join(SEARCH_SEPARATOR);
  }

  /** 查詢向量以搜尋文字的 hash 快取；快取不可用時直接呼叫 embedding */
  async getQueryVector(searchText: string): Promise<Result<number[], MdSiftError>> {
    const key = queryCacheKey(searchText, this.embedding.modelId);

    const cached = await this.store.get(key);
    if (cached && isPlainRecord(cached.data) && isVector(cached.data.embedding)) {
      this.logger.debug('Using cached query vector', { key });
      return Ok(cached.data.embedding);
    }

    let vector: number[];
    try {
      vector = (await this.embedding.embedOne(searchText)).vector;
    } catch (err) {
      this.logger.error('Failed to embed query', { error: errorMessage(err) });
      return Err(toMdSiftError(err));
    }

    const saved = await this.store.put(
      key,
      { embedding: vector, model: this.embedding.modelId },
      { type: 'query', text_preview: searchText.slice(0, QUERY_PREVIEW_CHARS) },
    );
    if (!saved.ok) {
      this.logger.warn('Query vector not cached', { key, error: saved.error.message });
    }
    return Ok(vector);
  }

  /** 只計算有向量的 chunk */
  /** 沒有向量或維度與查詢不同（舊模型產生）的 chunk 不計分 */
  scoreChunks(queryVector: readonly number[], chunks: readonly DocumentChunk[]): ScoredChunk[] {
    const base = chunks.flatMap((chunk) =>
      chunk.embedding && chunk.embedding.length === queryVector.length
        ? [{ chunk, baseScore: cosineSimilarity(queryVector, chunk.embedding) }]
        : [],
    );
    return RelevanceBoost.apply(base, this.options.boosts);
  }

  /**
   * 以檔案彙整：combinedScore = 加分後分數平均，取前 topK。
   * allChunks 用於重建全文（包含沒有向量的 chunk）。
   */
  rankFiles(scored: readonly ScoredChunk[], allChunks: readonly DocumentChunk[]): RankedFile[] {
    const byFile = new Map<string, ScoredChunk[]>();
    for (const s of scored) {
      const list = byFile.get(s.chunk.filePath) ?? [];
      list.push(s);
      byFile.set(s.chunk.filePath, list);
    }

    const chunksByFile = new Map<string, DocumentChunk[]>();
    for (const chunk of allChunks) {
      const list = chunksByFile.get(chunk.filePath) ?? [];
      list.push(chunk);
      chunksByFile.set(chunk.filePath, list);
    }

    const aggregated = [...byFile].map(([file, fileScores]) => ({
      file,
      fileScores,
      combinedScore: mean(fileScores.map((s) => s.boostedScore)),
    }));
    aggregated.sort((a, b) => b.combinedScore - a.combinedScore || a.file.localeCompare(b.file));

    return aggregated.slice(0, this.options.topK).map(({ file, fileScores, combinedScore }) => {
      const fileChunks = sortByChunkIndex(chunksByFile.get(file) ?? fileScores.map((s) => s.chunk));
      const frontmatter = fileChunks[0]?.frontmatter ?? {};

      return {
        file,
        combinedScore,
        title: scalarOr(frontmatter.title, 'Unknown'),
        contentType: scalarOr(frontmatter['ms.topic'], 'unknown'),
        description: scalarOr(frontmatter.description, ''),
        matchedSections: this.topSections(fileScores),
        reconstructedContent: this.reconstruct(fileChunks),
      };
    });
  }

  /** 驗證語境（形狀同 QueryContextInput）、取得查詢向量並排序 */
  async rank(
    context: QueryContextInput | Record<string, unknown>,
    chunks: readonly DocumentChunk[],
  ): Promise<Result<RankedFile[], MdSiftError>> {
    const parsed = queryContextSchema.safeParse(context);
    if (!parsed.success) {
      const reason = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      return Err(new QueryContextInvalidError(`Invalid query context: ${reason}`));
    }

    const searchText = this.buildSearchText(parsed.data);
    const vector = await this.getQueryVector(searchText);
    if (!vector.ok) return vector;

    const scored = this.scoreChunks(vector.value, chunks);
    const skipped = chunks.length - scored.length;
    if (skipped > 0) {
      this.logger.info('Chunks without usable embeddings excluded from scoring', { skipped });
    }

    const ranked = this.rankFiles(scored, chunks);
    this.logger.info('Ranked files', { candidates: scored.length, returned: ranked.length });
    return Ok(ranked);
  }

  private topSections(fileScores: readonly ScoredChunk[]): MatchedSection[] {
    return [...fileScores]
      .sort((a, b) => b.boostedScore - a.boostedScore)
      .slice(0, this.options.maxSections)
      .map((s) => ({
        heading: s.chunk.headingPath.length > 0 ? breadcrumb(s.chunk.headingPath) : 'Main Content',
        score: s.boostedScore,
        preview: preview(s.chunk.content),
      }));
  }

  private reconstruct(fileChunks: readonly DocumentChunk[]): string {
    const body = fileChunks.map((c) => c.content).join('\n\n');
    return this.parser.stringify(body, fileChunks[0]?.frontmatter ?? {});
  }
}

function toMdSiftError(err: unknown): MdSiftError {
  if (err instanceof MdSiftError) return err;
  return new EmbeddingUnavailableError(`Query embedding failed: ${errorMessage(err)}`, { cause: err });
}
