import { z } from 'zod';
import type { DocumentChunk } from '../../domain/entities/DocumentChunk.js';
import type { ChunkMeta } from '../../domain/entities/CacheRecord.js';
import { ChunkRecordInvalidError } from '../../domain/errors/DomainErrors.js';
import { Err, Ok, type Result } from '../../shared/Result.js';

/** 寫入磁碟的 chunk 資料（snake_case 鍵值文件） */
export interface ChunkRecordData {
  content: string;
  file_path: string;
  file_id: string;
  heading_path: string[];
  section_level: number;
  chunk_index: number;
  frontmatter: Record<string, unknown>;
  embedding_content: string;
  embedding: number[] | null;
  embedding_model: string | null;
  embedding_generated_at: string | null;
  content_hash: string;
  chunk_id: string;
  prev_chunk_id: string | null;
  next_chunk_id: string | null;
  parent_heading_chunk_id: string | null;
  total_chunks_in_file: number;
}

const nullableId = z.string().min(1).nullable().default(null);

/** 讀取時的結構驗證；未知欄位保留，向前相容 */
const chunkRecordSchema = z.object({
  content: z.string(),
  file_path: z.string().min(1),
  file_id: z.string().min(1),
  heading_path: z.array(z.string()),
  section_level: z.number().int().nonnegative(),
  chunk_index: z.number().int().nonnegative(),
  frontmatter: z.record(z.unknown()).default({}),
  embedding_content: z.string(),
  embedding: z.array(z.number()).nullable().default(null),
  content_hash: z.string().min(1),
  chunk_id: z.string().min(1),
  prev_chunk_id: nullableId,
  next_chunk_id: nullableId,
  parent_heading_chunk_id: nullableId,
  total_chunks_in_file: z.number().int().positive(),
}).passthrough().refine(
  (r) => r.section_level === r.heading_path.length,
  { message: 'section_level must equal heading_path length' },
);

export interface EmbeddingStamp {
  model: string;
  generatedAt: string;
}

export function toChunkRecord(chunk: DocumentChunk, stamp?: EmbeddingStamp): ChunkRecordData {
  return {
    content: chunk.content,
    file_path: chunk.filePath,
    file_id: chunk.fileId,
    heading_path: [...chunk.headingPath],
    section_level: chunk.sectionLevel,
    chunk_index: chunk.chunkIndex,
    frontmatter: { ...chunk.frontmatter },
    embedding_content: chunk.embeddingContent,
    embedding: chunk.embedding ? [...chunk.embedding] : null,
    embedding_model: chunk.embedding ? stamp?.model ?? null : null,
    embedding_generated_at: chunk.embedding ? stamp?.generatedAt ?? null : null,
    content_hash: chunk.contentHash,
    chunk_id: chunk.chunkId,
    prev_chunk_id: chunk.prevChunkId,
    next_chunk_id: chunk.nextChunkId,
    parent_heading_chunk_id: chunk.parentHeadingChunkId,
    total_chunks_in_file: chunk.totalChunksInFile,
  };
}

export function chunkMeta(chunk: DocumentChunk): ChunkMeta {
  return {
    type: 'chunk',
    file: chunk.filePath,
    section: [...chunk.headingPath],
    has_embedding: chunk.embedding !== null,
  };
}

/** 由快取記錄的 data 重建 chunk；缺欄位或 id 不符回傳 Err */
export function fromChunkRecord(key: string, data: unknown): Result<DocumentChunk, ChunkRecordInvalidError> {
  const parsed = chunkRecordSchema.safeParse(data);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return Err(new ChunkRecordInvalidError(key, reason));
  }

  const r = parsed.data;
  if (r.chunk_id !== key) {
    return Err(new ChunkRecordInvalidError(key, `chunk_id mismatch (${r.chunk_id})`));
  }

  return Ok({
    content: r.content,
    filePath: r.file_path,
    fileId: r.file_id,
    headingPath: r.heading_path,
    sectionLevel: r.section_level,
    chunkIndex: r.chunk_index,
    frontmatter: r.frontmatter,
    embeddingContent: r.embedding_content,
    embedding: r.embedding,
    contentHash: r.content_hash,
    chunkId: r.chunk_id,
    prevChunkId: r.prev_chunk_id,
    nextChunkId: r.next_chunk_id,
    parentHeadingChunkId: r.parent_heading_chunk_id,
    totalChunksInFile: r.total_chunks_in_file,
  });
}

/** 讀出記錄中既有向量的模型與產生時間（兩者皆有才回傳） */
export function readEmbeddingStamp(data: unknown): EmbeddingStamp | undefined {
  if (typeof data !== 'object' || data === null) return undefined;
  const model: unknown = 'embedding_model' in data ? data.embedding_model : undefined;
  const generatedAt: unknown = 'embedding_generated_at' in data ? data.embedding_generated_at : undefined;
  if (typeof model !== 'string' || typeof generatedAt !== 'string') return undefined;
  return { model, generatedAt };
}
