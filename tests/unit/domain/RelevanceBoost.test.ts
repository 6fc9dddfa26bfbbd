import { describe, it, expect } from 'vitest';
import type { DocumentChunk } from '../../../src/domain/entities/DocumentChunk.js';
import {
  DEFAULT_BOOSTS,
  RelevanceBoost,
  type BaseScore,
} from '../../../src/domain/value-objects/RelevanceBoost.js';

function chunk(id: string, overrides: Partial<DocumentChunk> = {}): DocumentChunk {
  return {
    content: id,
    filePath: '/docs/a.md',
    fileId: 'file-a',
    headingPath: [],
    sectionLevel: 0,
    chunkIndex: 0,
    frontmatter: {},
    embeddingContent: id,
    embedding: [1, 0],
    contentHash: `hash-${id}`,
    chunkId: id,
    prevChunkId: null,
    nextChunkId: null,
    parentHeadingChunkId: null,
    totalChunksInFile: 1,
    ...overrides,
  };
}

describe('RelevanceBoost', () => {
  it('should add no boost to an isolated low-scoring chunk', () => {
    const [scored] = RelevanceBoost.apply([{ chunk: chunk('a'), baseScore: 0.4 }]);
    expect(scored.fileBoost).toBe(0);
    expect(scored.proximityBoost).toBe(0);
    expect(scored.parentBoost).toBe(0);
    expect(scored.boostedScore).toBe(0.4);
  });

  it('should add 0.1 x file average when the average exceeds 0.5', () => {
    const scores: BaseScore[] = [
      { chunk: chunk('a'), baseScore: 0.8 },
      { chunk: chunk('b'), baseScore: 0.6 },
    ];
    const [a, b] = RelevanceBoost.apply(scores);
    expect(a.fileBoost).toBeCloseTo(0.07, 10);
    expect(b.fileBoost).toBeCloseTo(0.07, 10);
  });

  it('should not add a file boost at exactly the threshold', () => {
    const [a] = RelevanceBoost.apply([{ chunk: chunk('a'), baseScore: 0.5 }]);
    expect(a.fileBoost).toBe(0);
  });

  it('should add 0.05 for each neighbour above 0.6', () => {
    const scores: BaseScore[] = [
      { chunk: chunk('a', { fileId: 'f1', nextChunkId: 'b' }), baseScore: 0.65 },
      { chunk: chunk('b', { fileId: 'f2', prevChunkId: 'a', nextChunkId: 'c' }), baseScore: 0.1 },
      { chunk: chunk('c', { fileId: 'f3', prevChunkId: 'b' }), baseScore: 0.61 },
    ];
    const [, middle] = RelevanceBoost.apply(scores);
    expect(middle.proximityBoost).toBeCloseTo(0.1, 10);
  });

  it('should add 0.03 when the parent scores above 0.7', () => {
    const scores: BaseScore[] = [
      { chunk: chunk('parent', { fileId: 'f1' }), baseScore: 0.75 },
      { chunk: chunk('child', { fileId: 'f2', parentHeadingChunkId: 'parent' }), baseScore: 0.2 },
    ];
    const [, child] = RelevanceBoost.apply(scores);
    expect(child.parentBoost).toBe(0.03);
    expect(child.boostedScore).toBeCloseTo(0.23, 10);
  });

  it('should ignore references to chunks that were not scored', () => {
    const [a] = RelevanceBoost.apply([
      { chunk: chunk('a', { prevChunkId: 'gone', nextChunkId: 'gone', parentHeadingChunkId: 'gone' }), baseScore: 0.3 },
    ]);
    expect(a.boostedScore).toBe(0.3);
  });

  it('should compute boosts from base scores only', () => {
    // b 的加分後分數超過 0.6，但 base 沒有，所以 a 與 c 不會因 b 得到鄰居加分
    const scores: BaseScore[] = [
      { chunk: chunk('a', { fileId: 'f1', nextChunkId: 'b' }), baseScore: 0.9 },
      { chunk: chunk('b', { fileId: 'f2', prevChunkId: 'a', nextChunkId: 'c' }), baseScore: 0.58 },
      { chunk: chunk('c', { fileId: 'f3', prevChunkId: 'b' }), baseScore: 0.1 },
    ];
    const [, b, c] = RelevanceBoost.apply(scores);
    expect(b.boostedScore).toBeGreaterThan(0.6);
    expect(c.proximityBoost).toBe(0);
  });

  it('should never lower a score and stay within the maximum total boost', () => {
    const ids = ['a', 'b', 'c', 'd', 'e'];
    const bases = [0.99, 0.95, 1, 0.97, 0.98];
    const scores: BaseScore[] = ids.map((id, i) => ({
      chunk: chunk(id, {
        chunkIndex: i,
        prevChunkId: i > 0 ? ids[i - 1] : null,
        nextChunkId: i < ids.length - 1 ? ids[i + 1] : null,
        parentHeadingChunkId: i > 0 ? 'a' : null,
      }),
      baseScore: bases[i],
    }));

    for (const s of RelevanceBoost.apply(scores)) {
      expect(s.boostedScore).toBeGreaterThanOrEqual(s.baseScore);
      expect(s.boostedScore - s.baseScore).toBeLessThanOrEqual(RelevanceBoost.maxTotalBoost() + 1e-12);
    }
    expect(RelevanceBoost.maxTotalBoost()).toBeCloseTo(0.23, 10);
  });

  it('should accept overridden constants', () => {
    const [a] = RelevanceBoost.apply(
      [{ chunk: chunk('a'), baseScore: 0.4 }],
      { ...DEFAULT_BOOSTS, fileThreshold: 0.3, fileWeight: 0.5 },
    );
    expect(a.fileBoost).toBeCloseTo(0.2, 10);
  });
});
