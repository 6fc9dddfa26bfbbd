import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { RelevanceUseCase } from '../../../src/application/RelevanceUseCase.js';
import { queryContextSchema } from '../../../src/application/dto/QueryContext.js';
import type { DocumentChunk } from '../../../src/domain/entities/DocumentChunk.js';
import type { EmbeddingPort, EmbeddingResult } from '../../../src/domain/ports/EmbeddingPort.js';
import { queryCacheKey } from '../../../src/domain/value-objects/ChunkIdentity.js';
import {
  EmbeddingUnavailableError,
  QueryContextInvalidError,
} from '../../../src/domain/errors/DomainErrors.js';
import { ChunkStore } from '../../../src/infrastructure/cache/ChunkStore.js';
import { NullEmbeddingAdapter } from '../../../src/infrastructure/embedding/NullEmbeddingAdapter.js';

function makeChunk(
  file: string,
  index: number,
  embedding: number[] | null,
  extra: Partial<DocumentChunk> = {},
): DocumentChunk {
  return {
    content: `content ${file} ${index}`,
    filePath: file,
    fileId: `id-${file}`,
    headingPath: [],
    sectionLevel: 0,
    chunkIndex: index,
    frontmatter: {},
    embeddingContent: `content ${file} ${index}`,
    embedding,
    contentHash: `hash-${file}-${index}`,
    chunkId: `${file}-${index}`,
    prevChunkId: null,
    nextChunkId: null,
    parentHeadingChunkId: null,
    totalChunksInFile: 1,
    ...extra,
  };
}

function fakeEmbedding(vector: number[] = [1, 0]) {
  const embedOne = vi.fn(async (_text: string): Promise<EmbeddingResult> => ({ vector, tokensUsed: 1 }));
  const port: EmbeddingPort = {
    providerId: 'fake',
    modelId: 'fake-model',
    embed: async (texts) => texts.map(() => ({ vector, tokensUsed: 1 })),
    embedOne,
  };
  return { port, embedOne };
}

/** a.md：一段完全相符、一段無關；b.md：45 度；c.md：沒有向量 */
function corpus(): DocumentChunk[] {
  const frontmatter = { title: 'Guide A', 'ms.topic': 'how-to' };
  return [
    makeChunk('a.md', 0, [1, 0], {
      content: 'Overview text',
      frontmatter,
      nextChunkId: 'a.md-1',
      totalChunksInFile: 2,
    }),
    makeChunk('a.md', 1, [0, 1], {
      content: '## Docker\nRun it',
      headingPath: ['Setup', 'Docker'],
      sectionLevel: 2,
      frontmatter,
      prevChunkId: 'a.md-0',
      totalChunksInFile: 2,
    }),
    makeChunk('b.md', 0, [1, 1], { frontmatter: { description: 'Second guide' } }),
    makeChunk('c.md', 0, null),
  ];
}

describe('RelevanceUseCase', () => {
  let tmpDir: string;
  let store: ChunkStore;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mdsift-relevance-'));
    store = await ChunkStore.open(tmpDir);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('buildSearchText', () => {
    it('should join goal, audience and distinct material values', () => {
      const useCase = new RelevanceUseCase(store, fakeEmbedding().port);
      const context = queryContextSchema.parse({
        goal: 'Deploy an app',
        audience: 'developers',
        materials: [
          { mainTopic: 'Containers', technologies: ['Docker', ' Docker ', 'Kubernetes'] },
          { mainTopic: 'Containers', documentType: 'how-to' },
        ],
      });

      expect(useCase.buildSearchText(context)).toBe(
        'Goal: Deploy an app | Audience: developers | Topics: Containers'
        + ' | Technologies: Docker, Kubernetes | Content types: how-to',
      );
    });

    it('should cap each component at ten values', () => {
      const useCase = new RelevanceUseCase(store, fakeEmbedding().port);
      const keyConcepts = Array.from({ length: 12 }, (_, i) => `k${i}`);
      const context = queryContextSchema.parse({ goal: 'g', materials: [{ keyConcepts }] });

      expect(useCase.buildSearchText(context)).toBe(`Goal: g | Key concepts: ${keyConcepts.slice(0, 10).join(', ')}`);
    });
  });

  describe('rank', () => {
    it('should rank files by mean boosted score and skip chunks without vectors', async () => {
      const useCase = new RelevanceUseCase(store, fakeEmbedding().port);
      const result = await useCase.rank({ goal: 'Deploy' }, corpus());

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.map((r) => r.file)).toEqual(['b.md', 'a.md']);

      // b.md：0.7071 + 檔案加分 0.1 × 0.7071
      expect(result.value[0].combinedScore).toBeCloseTo(Math.SQRT1_2 * 1.1, 6);
      expect(result.value[0].title).toBe('Unknown');
      expect(result.value[0].description).toBe('Second guide');

      // a.md：(1 + (0 + 鄰居加分 0.05)) / 2，平均 0.5 未超過檔案門檻
      const a = result.value[1];
      expect(a.combinedScore).toBeCloseTo(0.525, 6);
      expect(a.title).toBe('Guide A');
      expect(a.contentType).toBe('how-to');
      expect(a.matchedSections.map((s) => s.heading)).toEqual(['Main Content', 'Setup > Docker']);
      expect(a.matchedSections[1].score).toBeCloseTo(0.05, 6);
      expect(a.reconstructedContent.startsWith('---\ntitle: Guide A\n')).toBe(true);
      expect(a.reconstructedContent.endsWith('---\nOverview text\n\n## Docker\nRun it\n')).toBe(true);
    });

    it('should honour topK and maxSections', async () => {
      const useCase = new RelevanceUseCase(store, fakeEmbedding().port, { topK: 1, maxSections: 1 });
      const result = await useCase.rank({ goal: 'Deploy' }, corpus());

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toHaveLength(1);
      expect(result.value[0].matchedSections).toHaveLength(1);
    });

    it('should truncate long section previews', async () => {
      const useCase = new RelevanceUseCase(store, fakeEmbedding().port);
      const long = makeChunk('long.md', 0, [1, 0], { content: 'x'.repeat(250) });
      const result = await useCase.rank({ goal: 'Deploy' }, [long]);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value[0].matchedSections[0].preview).toBe(`${'x'.repeat(200)}...`);
      expect(result.value[0].contentType).toBe('unknown');
    });

    it('should leave out chunks whose vector dimension differs from the query', async () => {
      const useCase = new RelevanceUseCase(store, fakeEmbedding().port);
      const stale = makeChunk('a.md', 2, [1, 0, 0]);
      const result = await useCase.rank({ goal: 'Deploy' }, [...corpus(), stale, makeChunk('d.md', 0, [0, 0, 1])]);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.map((r) => r.file)).toEqual(['b.md', 'a.md']);
      expect(result.value[1].combinedScore).toBeCloseTo(0.525, 6);
      expect(result.value[1].matchedSections).toHaveLength(2);
    });

    it('should score only chunks with a vector of the query dimension', () => {
      const useCase = new RelevanceUseCase(store, fakeEmbedding().port);
      const scored = useCase.scoreChunks([1, 0], [
        makeChunk('a.md', 0, [1, 0]),
        makeChunk('a.md', 1, [1, 0, 0]),
        makeChunk('a.md', 2, null),
      ]);
      expect(scored.map((s) => s.chunk.chunkId)).toEqual(['a.md-0']);
    });

    it('should return an empty list when no chunk has a vector', async () => {
      const useCase = new RelevanceUseCase(store, fakeEmbedding().port);
      const result = await useCase.rank({ goal: 'Deploy' }, [makeChunk('c.md', 0, null)]);
      expect(result).toEqual({ ok: true, value: [] });
    });

    it('should reject a context without a goal', async () => {
      const useCase = new RelevanceUseCase(store, fakeEmbedding().port);

      const missing = await useCase.rank({ audience: 'devs' }, corpus());
      expect(missing.ok).toBe(false);
      if (!missing.ok) expect(missing.error).toBeInstanceOf(QueryContextInvalidError);

      const blank = await useCase.rank({ goal: '   ' }, corpus());
      expect(blank.ok).toBe(false);
    });

    it('should report embedding failures as unavailable', async () => {
      const { port, embedOne } = fakeEmbedding();
      embedOne.mockRejectedValueOnce(new Error('connection reset'));
      const useCase = new RelevanceUseCase(store, port);

      const result = await useCase.rank({ goal: 'Deploy' }, corpus());
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(EmbeddingUnavailableError);
        expect(result.error.message).toBe('Query embedding failed: connection reset');
      }
    });

    it('should pass through errors from a disabled provider', async () => {
      const useCase = new RelevanceUseCase(store, new NullEmbeddingAdapter());
      const result = await useCase.rank({ goal: 'Deploy' }, corpus());

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error).toBeInstanceOf(EmbeddingUnavailableError);
    });
  });

  describe('getQueryVector', () => {
    it('should cache the query vector by search text', async () => {
      const { port, embedOne } = fakeEmbedding([0.5, 0.5]);
      const useCase = new RelevanceUseCase(store, port);

      const first = await useCase.getQueryVector('Goal: Deploy');
      const second = await useCase.getQueryVector('Goal: Deploy');

      expect(first).toEqual({ ok: true, value: [0.5, 0.5] });
      expect(second).toEqual({ ok: true, value: [0.5, 0.5] });
      expect(embedOne).toHaveBeenCalledTimes(1);

      const record = await store.get(queryCacheKey('Goal: Deploy', 'fake-model'));
      expect(record?.data).toEqual({ embedding: [0.5, 0.5], model: 'fake-model' });
      expect(record?.meta).toEqual({ type: 'query', text_preview: 'Goal: Deploy' });
    });
  });
});
