/** 以第一個 sep 切開字串；找不到時 ok 為 false */
export function cut(s: string, sep: string): [before: string, after: string, ok: boolean] {
  const i = s.indexOf(sep);
  if (i < 0) return [s, '', false];
  return [s.slice(0, i), s.slice(i + sep.length), true];
}

/** 以 chars 中任一字元切開字串 */
export function cutAny(s: string, chars: string): [before: string, after: string, ok: boolean] {
  for (let i = 0; i < s.length; i++) {
    if (chars.includes(s[i])) {
      return [s.slice(0, i), s.slice(i + 1), true];
    }
  }
  return [s, '', false];
}

/** 以空白切成欄位，忽略空欄位 */
export function fields(s: string): string[] {
  return s.split(/\s+/).filter(Boolean);
}
