import type { DocumentChunk } from '../../domain/entities/DocumentChunk.js';
import { ContentHash } from '../../domain/value-objects/ContentHash.js';
import {
  breadcrumb,
  fileIdFor,
  headingChunkId,
  splitChunkId,
} from '../../domain/value-objects/ChunkIdentity.js';
import { Logger, silentLogger } from '../../shared/Logger.js';
import { MarkdownParser } from './MarkdownParser.js';

const HEADING_RE = /^(#{1,6})\s+(.*?)\s*$/;
const FENCE_RE = /^(```|~~~)/;
const EMBEDDING_SEPARATOR = ' | ';
const DESCRIPTION_CHARS = 100;

export interface ChunkerOptions {
  /** 超過此長度的段落才會再切分 */
  maxChars: number;
  /** 切出的子塊（最後一塊除外）至少要有的長度 */
  minChars: number;
}

export const DEFAULT_CHUNKER_OPTIONS: ChunkerOptions = {
  maxChars: 3000,
  minChars: 500,
};

interface ChunkDraft {
  content: string;
  headingPath: string[];
  parentId: string | null;
  chunkId: string;
}

interface SectionState {
  path: string[];
  headingId: string | null;
  parentId: string | null;
}

/**
 * Heading-based 語意切塊：以 Markdown heading 為界，過長段落依空行二次切分，
 * 並建立前後鏈結與上層 heading 鏈結。
 * code block 內的 heading-like 行不視為 heading。
 */
export class SemanticChunker {
  private readonly options: ChunkerOptions;

  constructor(
    private readonly parser: MarkdownParser = new MarkdownParser(),
    options: Partial<ChunkerOptions> = {},
    private readonly logger: Logger = silentLogger(),
  ) {
    this.options = { ...DEFAULT_CHUNKER_OPTIONS, ...options };
  }

  chunk(filePath: string, rawMarkdown: string): DocumentChunk[] {
    const parsed = this.parser.parse(rawMarkdown);
    if (parsed.frontmatterError) {
      this.logger.warn('Invalid frontmatter, treating whole document as body', {
        filePath,
        error: parsed.frontmatterError,
      });
    }

    const fileId = fileIdFor(filePath);
    const drafts = this.walkBody(fileId, parsed.body.replace(/\r\n/g, '\n'));
    const total = drafts.length;

    return drafts.map((draft, i) => {
      const embeddingContent = buildEmbeddingContent(draft.content, parsed.frontmatter, draft.headingPath);
      return {
        content: draft.content,
        filePath,
        fileId,
        headingPath: draft.headingPath,
        sectionLevel: draft.headingPath.length,
        chunkIndex: i,
        frontmatter: parsed.frontmatter,
        embeddingContent,
        embedding: null,
        contentHash: ContentHash.fromText(embeddingContent).value,
        chunkId: draft.chunkId,
        prevChunkId: i > 0 ? drafts[i - 1].chunkId : null,
        nextChunkId: i < total - 1 ? drafts[i + 1].chunkId : null,
        parentHeadingChunkId: draft.parentId,
        totalChunksInFile: total,
      };
    });
  }

  /**
   * 依段落（空行）切分過長文字，逐段貪婪累積：
   * - 加入後不超過 maxChars → 加入
   * - 已達 minChars → 輸出目前內容，新段落另起
   * - 未達 minChars → 強制加入，加入後達標即輸出
   */
  smartSplit(text: string): string[] {
    const { maxChars, minChars } = this.options;
    if (text.length <= maxChars) return [text];

    const pieces: string[] = [];
    let current = '';

    const emit = (): void => {
      const trimmed = current.trim();
      if (trimmed) pieces.push(trimmed);
      current = '';
    };

    for (const para of text.split('\n\n')) {
      if (current.length + para.length + 2 <= maxChars) {
        current += para + '\n\n';
        continue;
      }
      if (current.length >= minChars) {
        emit();
        current = para + '\n\n';
        continue;
      }
      current += para + '\n\n';
      if (current.length >= minChars) emit();
    }
    emit();

    return pieces.length > 0 ? pieces : [text];
  }

  private walkBody(fileId: string, body: string): ChunkDraft[] {
    const drafts: ChunkDraft[] = [];
    const breadcrumbIds = new Map<string, string>();
    const usedIds = new Set<string>();

    let buffer = '';
    let stack: string[] = [];
    let section: SectionState = { path: [], headingId: null, parentId: null };
    let fence: string | null = null;

    const flush = (): void => {
      const text = buffer.trim();
      buffer = '';
      if (!text) return;

      this.smartSplit(text).forEach((piece, i) => {
        // 同一檔案出現重複麵包屑時，第二次起改用序號 id
        const chunkId = i === 0 && section.headingId && !usedIds.has(section.headingId)
          ? section.headingId
          : splitChunkId(fileId, drafts.length, piece);
        usedIds.add(chunkId);
        if (i === 0 && section.path.length > 0) {
          breadcrumbIds.set(breadcrumb(section.path), chunkId);
        }
        drafts.push({
          content: piece,
          headingPath: [...section.path],
          parentId: section.parentId,
          chunkId,
        });
      });
    };

    for (const line of body.split('\n')) {
      const fenceMatch = FENCE_RE.exec(line.trimStart());
      if (fenceMatch) {
        if (fence === null) fence = fenceMatch[1];
        else if (fence === fenceMatch[1]) fence = null;
      }

      const heading = fence === null && !fenceMatch ? HEADING_RE.exec(line) : null;
      if (!heading) {
        buffer += line + '\n';
        continue;
      }

      flush();

      const level = heading[1].length;
      const title = heading[2].replace(/\s+#+$/, '').trim();
      stack = [...stack.slice(0, level - 1), title];

      const parentId = level > 1 && stack.length > 1
        ? breadcrumbIds.get(breadcrumb(stack.slice(0, -1))) ?? null
        : null;
      section = {
        path: [...stack],
        headingId: headingChunkId(fileId, stack),
        parentId,
      };
      buffer = line + '\n';
    }

    flush();
    return drafts;
  }
}

function scalarText(value: unknown): string | null {
  if (typeof value === 'string') return value || null;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return null;
}

/** frontmatter 摘要：標題、主題、描述（前 100 字） */
export function frontmatterHighlights(frontmatter: Readonly<Record<string, unknown>>): string[] {
  const parts: string[] = [];

  const title = scalarText(frontmatter.title);
  if (title) parts.push(`Document: ${title}`);

  const topic = scalarText(frontmatter['ms.topic'] ?? frontmatter.topic);
  if (topic) parts.push(`Topic: ${topic}`);

  const description = scalarText(frontmatter.description);
  if (description) parts.push(`Description: ${description.slice(0, DESCRIPTION_CHARS)}`);

  return parts;
}

/** 嵌入用文字：frontmatter 摘要 + `Section: A > B` + 原文，以 ` | ` 串接 */
export function buildEmbeddingContent(
  content: string,
  frontmatter: Readonly<Record<string, unknown>>,
  headingPath: readonly string[],
): string {
  const parts = frontmatterHighlights(frontmatter);
  if (headingPath.length > 0) {
    parts.push(`Section: ${breadcrumb(headingPath)}`);
  }
  parts.push(content);
  return parts.filter(Boolean).join(EMBEDDING_SEPARATOR);
}
