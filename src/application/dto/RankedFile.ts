/** 檔案中分數最高的段落 */
export interface MatchedSection {
  /** 麵包屑；無 heading 時為 'Main Content' */
  heading: string;
  score: number;
  preview: string;
}

/** 排序結果中的一個檔案 */
export interface RankedFile {
  file: string;
  combinedScore: number;
  title: string;
  contentType: string;
  description: string;
  matchedSections: MatchedSection[];
  /** frontmatter + 全部 chunk 依序串接 */
  reconstructedContent: string;
}
