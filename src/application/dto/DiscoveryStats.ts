import type { DocumentChunk } from '../../domain/entities/DocumentChunk.js';

/** discovery 操作統計 */
export interface DiscoveryStats {
  filesFound: number;
  /** hash 未變且快取完整，直接載入 */
  filesCached: number;
  filesProcessed: number;
  filesFailed: number;
  /** 來源檔已刪除、從 manifest 移除的檔案 */
  filesForgotten: number;
  chunksLoaded: number;
  chunksCreated: number;
  orphansRemoved: number;
  warnings: string[];
  durationMs: number;
}

export interface DiscoveryResult {
  /** 快取載入的 chunk 在前，新處理的在後 */
  chunks: DocumentChunk[];
  stats: DiscoveryStats;
}

export function emptyDiscoveryStats(): DiscoveryStats {
  return {
    filesFound: 0, filesCached: 0, filesProcessed: 0, filesFailed: 0, filesForgotten: 0,
    chunksLoaded: 0, chunksCreated: 0, orphansRemoved: 0,
    warnings: [], durationMs: 0,
  };
}
