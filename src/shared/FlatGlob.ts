/**
 * 將單層檔名 glob（只支援 `*` 與 `?`）轉為 RegExp。
 * 快取目錄是扁平的，不需要 `**` 或路徑分隔。
 */
export function flatGlobToRegExp(pattern: string): RegExp {
  let source = '';
  for (const ch of pattern) {
    if (ch === '*') source += '[^/]*';
    else if (ch === '?') source += '[^/]';
    else source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  }
  return new RegExp(`^${source}$`);
}

export function matchesFlatGlob(fileName: string, pattern: string): boolean {
  return flatGlobToRegExp(pattern).test(fileName);
}
