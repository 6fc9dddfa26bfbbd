import { ContentHash } from './ContentHash.js';

/** 子切塊 id 取用的內容前綴長度 */
export const CHUNK_ID_PREFIX_CHARS = 50;

/** heading 麵包屑：`A > B > C` */
export function breadcrumb(headingPath: readonly string[]): string {
  return headingPath.join(' > ');
}

/** 檔案識別：由路徑決定，檔案內容改變時維持不變 */
export function fileIdFor(filePath: string): string {
  return ContentHash.fromText(filePath).value;
}

/** 以 heading 開頭的 chunk：fileId + 麵包屑 */
export function headingChunkId(fileId: string, headingPath: readonly string[]): string {
  return ContentHash.fromParts(fileId, breadcrumb(headingPath)).value;
}

/** 過長段落切出的後續子塊：fileId + 序號 + 內容前綴 */
export function splitChunkId(fileId: string, index: number, content: string): string {
  return ContentHash.fromParts(fileId, index, content.slice(0, CHUNK_ID_PREFIX_CHARS)).value;
}

/** 查詢向量的快取 key；含模型 id，換模型後不會取到舊維度的向量 */
export function queryCacheKey(searchText: string, modelId: string): string {
  return `query_${ContentHash.fromParts(modelId, searchText).value}`;
}
