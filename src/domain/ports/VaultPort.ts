/** 無法讀取而略過的目錄 */
export interface UnreadableDirectory {
  path: string;
  error: string;
}

export interface MarkdownListing {
  /** 絕對路徑，已排序 */
  files: string[];
  unreadable: UnreadableDirectory[];
}

/** 讀取待分析的 markdown 目錄 */
export interface VaultPort {
  directoryExists(dirPath: string): Promise<boolean>;
  readFile(filePath: string): Promise<string>;
  /** 遞迴列出 markdown 檔；讀不到的子目錄記入 `unreadable`，不中斷走訪 */
  listMarkdownFiles(dirPath: string): Promise<MarkdownListing>;
}
