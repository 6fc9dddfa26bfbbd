import { createHash } from 'node:crypto';

/** 不可變的 SHA-256 內容雜湊值物件 */
export class ContentHash {
  private constructor(public readonly value: string) {}

  /** 從原始文字計算 SHA-256 */
  static fromText(text: string): ContentHash {
    const hash = createHash('sha256').update(text, 'utf-8').digest('hex');
    return new ContentHash(hash);
  }

  /** 以 `_` 串接各段後計算，chunk id 的組成方式 */
  static fromParts(...parts: Array<string | number>): ContentHash {
    return ContentHash.fromText(parts.map(String).join('_'));
  }

  toString(): string {
    return this.value;
  }
}
