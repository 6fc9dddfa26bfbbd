import type { RankedFile } from '../../application/dto/RankedFile.js';
import { isPlainRecord } from '../../shared/TypeGuards.js';

export type OutputFormat = 'json' | 'text';
export type DetailLevel = 'brief' | 'normal' | 'full';

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'text';
}

export function isDetailLevel(value: unknown): value is DetailLevel {
  return value === 'brief' || value === 'normal' || value === 'full';
}

/**
 * 漸進式揭露格式化器：根據 level 控制輸出細節
 *
 * - brief：僅檔案 + 分數
 * - normal：加上標題、類型與命中段落（預設）
 * - full：含重建後的全文
 */
export class ProgressiveDisclosureFormatter {
  formatRankedFiles(
    results: RankedFile[],
    format: OutputFormat,
    level: DetailLevel = 'normal',
  ): string {
    if (format === 'json') {
      return JSON.stringify(this.shapeResults(results, level), null, 2);
    }
    return this.textResults(results, level);
  }

  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  /** 根據 level 篩選欄位 */
  private shapeResults(results: RankedFile[], level: DetailLevel): unknown[] {
    return results.map((r) => {
      if (level === 'brief') {
        return { file: r.file, combinedScore: r.combinedScore };
      }
      if (level === 'full') {
        return { ...r };
      }
      // normal
      return {
        file: r.file,
        combinedScore: r.combinedScore,
        title: r.title,
        contentType: r.contentType,
        description: r.description,
        matchedSections: r.matchedSections,
      };
    });
  }

  /** 人類可讀的排序結果 */
  private textResults(results: RankedFile[], level: DetailLevel): string {
    if (results.length === 0) return 'No relevant files found.';

    return results
      .map((r, i) => {
        const header = `[${i + 1}] ${r.title} (${r.file}) score: ${r.combinedScore.toFixed(4)}`;
        if (level === 'brief') return header;

        const lines = [header, `    Type: ${r.contentType}`];
        if (r.description) lines.push(`    Description: ${r.description}`);
        for (const section of r.matchedSections) {
          lines.push(`    - ${section.heading} (${section.score.toFixed(4)})`);
        }

        if (level === 'full') {
          lines.push('    ---');
          lines.push(r.reconstructedContent.split('\n').map((l) => `    ${l}`).join('\n'));
        }
        return lines.join('\n');
      })
      .join('\n\n');
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }
    if (!isPlainRecord(data)) return String(data);

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${String(val)}`;
      })
      .join('\n');
  }
}
