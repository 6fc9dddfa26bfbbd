import matter from 'gray-matter';
import { isPlainRecord } from '../../shared/TypeGuards.js';

/** 開頭的 `---` 分隔行（不含 `---yaml` 這類指定語言的寫法） */
const FRONTMATTER_OPEN = /^---[^\S\r\n]*\r?\n/;
/** 以換行開頭的結束分隔行 */
const FRONTMATTER_CLOSE = /\r?\n---[^\S\r\n]*(?:\r?\n|$)/;

export interface ParsedMarkdown {
  frontmatter: Record<string, unknown>;
  body: string;
  /** frontmatter 區塊存在但無法解析時的錯誤訊息 */
  frontmatterError?: string;
}

/** YAML 產生的值轉為可 JSON 往返的形式（Date → ISO 字串） */
export function toJsonSafe(value: unknown): unknown {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (Array.isArray(value)) return value.map(toJsonSafe);
  if (isPlainRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = toJsonSafe(v);
    return out;
  }
  if (typeof value === 'number' && !Number.isFinite(value)) return null;
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') return null;
  return value;
}

function invalidFrontmatter(rawMarkdown: string, reason: string): ParsedMarkdown {
  return { frontmatter: {}, body: rawMarkdown, frontmatterError: reason };
}

export class MarkdownParser {
  /**
   * 拆出 frontmatter 與本文。frontmatter 解析失敗時整份文件視為本文，
   * frontmatter 為空物件，不拋出例外。
   */
  parse(rawMarkdown: string): ParsedMarkdown {
    if (!rawMarkdown.trim()) {
      return { frontmatter: {}, body: '' };
    }

    // 沒有結束分隔行時 gray-matter 會把整份文件當成 YAML，本文變成空字串
    const open = FRONTMATTER_OPEN.exec(rawMarkdown);
    if (open && !FRONTMATTER_CLOSE.test(rawMarkdown.slice(open[0].length - 1))) {
      return invalidFrontmatter(rawMarkdown, 'Frontmatter block is not closed');
    }

    let data: unknown;
    let content: string;
    try {
      // 傳入 options 以略過 gray-matter 的全域快取（解析失敗的輸入也會留在快取中）
      ({ data, content } = matter(rawMarkdown, {}));
    } catch (err) {
      return invalidFrontmatter(rawMarkdown, err instanceof Error ? err.message : String(err));
    }

    const safe = toJsonSafe(data);
    if (!isPlainRecord(safe)) {
      return invalidFrontmatter(rawMarkdown, 'Frontmatter must be a mapping');
    }
    return { frontmatter: safe, body: content ?? '' };
  }

  /** 將 frontmatter 寫回 `---` 區塊並接上本文；frontmatter 為空時只輸出本文 */
  stringify(body: string, frontmatter: Readonly<Record<string, unknown>>): string {
    // 以物件傳入本文，避免本文開頭的 `---` 被當成 frontmatter 再解析一次
    return matter.stringify({ content: body }, { ...frontmatter });
  }
}
