/** 文件的語意切塊。建立後不可變；內容改變會產生新的物件。 */
export interface DocumentChunk {
  readonly content: string;
  readonly filePath: string;
  readonly fileId: string;
  readonly headingPath: readonly string[];
  readonly sectionLevel: number;
  readonly chunkIndex: number;
  readonly frontmatter: Readonly<Record<string, unknown>>;
  readonly embeddingContent: string;
  readonly embedding: readonly number[] | null;
  readonly contentHash: string;
  readonly chunkId: string;
  readonly prevChunkId: string | null;
  readonly nextChunkId: string | null;
  readonly parentHeadingChunkId: string | null;
  readonly totalChunksInFile: number;
}

/** 以新的向量建立副本 */
export function withEmbedding(chunk: DocumentChunk, embedding: readonly number[]): DocumentChunk {
  return { ...chunk, embedding };
}

/** 依 chunkIndex 排序（不改動輸入） */
export function sortByChunkIndex(chunks: readonly DocumentChunk[]): DocumentChunk[] {
  return [...chunks].sort((a, b) => a.chunkIndex - b.chunkIndex);
}
