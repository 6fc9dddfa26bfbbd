/** 快取目錄中每個 `{key}.json` 的內容 */
export interface CacheRecord {
  data: unknown;
  meta: Record<string, unknown>;
  /** ISO-8601 */
  timestamp: string;
}

/** chunk 記錄的 meta */
export type ChunkMeta = {
  type: 'chunk';
  file: string;
  section: string[];
  has_embedding: boolean;
};

/** manifest 中的檔案項目：檔案路徑 → chunk id 清單 */
export interface FileEntry {
  kind: 'file';
  contentHash: string;
  chunkIds: string[];
  chunkCount: number;
}

/** manifest 中的記錄項目：每個快取記錄一筆 */
export interface ChunkEntry {
  kind: 'chunk';
  timestamp: string;
  meta: Record<string, unknown>;
}

export type ManifestEntry = FileEntry | ChunkEntry;

export type Manifest = Map<string, ManifestEntry>;

export function isFileEntry(entry: ManifestEntry | null | undefined): entry is FileEntry {
  return entry?.kind === 'file';
}

/** 快取統計 */
export interface CacheStats {
  totalEntries: number;
  fileEntries: number;
  chunkEntries: number;
  /** 目錄中 json 檔數（不含 manifest） */
  totalFiles: number;
  totalSizeMb: number;
  cachePath: string;
}

/** verifyAndCleanupManifest 的結果 */
export interface ReconcileReport {
  chunkEntriesRemoved: number;
  fileEntriesRemoved: number;
  fileEntriesPruned: number;
}
