import type { DocumentChunk } from '../entities/DocumentChunk.js';
import { mean } from './Similarity.js';

/** 結構加分的門檻與幅度（經驗值，可由設定覆蓋） */
export interface BoostConstants {
  /** 檔案平均分數超過此值才給檔案加分 */
  fileThreshold: number;
  /** 檔案加分 = fileWeight × 檔案平均 */
  fileWeight: number;
  neighborThreshold: number;
  /** 每個高分前後鄰居的加分 */
  neighborBoost: number;
  parentThreshold: number;
  parentBoost: number;
}

export const DEFAULT_BOOSTS: BoostConstants = {
  fileThreshold: 0.5,
  fileWeight: 0.1,
  neighborThreshold: 0.6,
  neighborBoost: 0.05,
  parentThreshold: 0.7,
  parentBoost: 0.03,
};

export interface BaseScore {
  chunk: DocumentChunk;
  baseScore: number;
}

export interface ScoredChunk extends BaseScore {
  fileBoost: number;
  proximityBoost: number;
  parentBoost: number;
  boostedScore: number;
}

/**
 * 結構加分：檔案、前後鄰居、上層 heading。
 * 所有加分都只讀 base score，不讀已加分的結果，避免連鎖放大。
 */
export class RelevanceBoost {
  static apply(
    scores: readonly BaseScore[],
    constants: BoostConstants = DEFAULT_BOOSTS,
  ): ScoredChunk[] {
    const baseById = new Map<string, number>();
    const byFile = new Map<string, number[]>();
    for (const { chunk, baseScore } of scores) {
      baseById.set(chunk.chunkId, baseScore);
      const list = byFile.get(chunk.fileId) ?? [];
      list.push(baseScore);
      byFile.set(chunk.fileId, list);
    }

    const fileAverage = new Map<string, number>();
    for (const [fileId, list] of byFile) {
      fileAverage.set(fileId, mean(list));
    }

    return scores.map(({ chunk, baseScore }) => {
      const fileBoost = RelevanceBoost.fileBoost(fileAverage.get(chunk.fileId) ?? 0, constants);
      const proximityBoost =
        RelevanceBoost.neighborBoost(chunk.prevChunkId, baseById, constants)
        + RelevanceBoost.neighborBoost(chunk.nextChunkId, baseById, constants);
      const parentBoost = RelevanceBoost.parentBoost(chunk.parentHeadingChunkId, baseById, constants);

      return {
        chunk,
        baseScore,
        fileBoost,
        proximityBoost,
        parentBoost,
        boostedScore: baseScore + fileBoost + proximityBoost + parentBoost,
      };
    });
  }

  /** 加分總和的上限（檔案平均最高為 1） */
  static maxTotalBoost(constants: BoostConstants = DEFAULT_BOOSTS): number {
    return constants.fileWeight + 2 * constants.neighborBoost + constants.parentBoost;
  }

  private static fileBoost(fileAvg: number, c: BoostConstants): number {
    if (fileAvg <= c.fileThreshold) return 0;
    return c.fileWeight * fileAvg;
  }

  private static neighborBoost(
    neighborId: string | null,
    baseById: ReadonlyMap<string, number>,
    c: BoostConstants,
  ): number {
    if (!neighborId) return 0;
    const score = baseById.get(neighborId);
    return score !== undefined && score > c.neighborThreshold ? c.neighborBoost : 0;
  }

  private static parentBoost(
    parentId: string | null,
    baseById: ReadonlyMap<string, number>,
    c: BoostConstants,
  ): number {
    if (!parentId) return 0;
    const score = baseById.get(parentId);
    return score !== undefined && score > c.parentThreshold ? c.parentBoost : 0;
  }
}
