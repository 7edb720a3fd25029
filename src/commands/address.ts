import type { ItemNode } from '../domain/entities/Item.js';
import type { TsSnapshot } from '../infrastructure/typescript/TsSnapshot.js';
import { cut } from '../shared/strings.js';

export interface ResolvedAddress {
  /** 絕對路徑 */
  file: string;
  rel: string;
  item?: ItemNode;
}

/**
 * 解析 `file.ts` 或 `file.ts:Name.member` 形式的位址
 * 失敗時以 errorf 回報並回傳 undefined。
 */
export function resolveAddress(snap: TsSnapshot, addr: string): ResolvedAddress | undefined {
  const [rel, itemPath, hasItem] = cut(addr, ':');
  const file = snap.resolveFile(rel);
  if (!file) {
    snap.errorf(`unknown file ${rel}`);
    return undefined;
  }
  if (!hasItem) return { file, rel };

  const names = itemPath.split('.');
  if (names.some((n) => n === '')) {
    snap.errorf(`invalid address ${addr}`, { file: rel });
    return undefined;
  }

  const item = snap.items().find(snap.relative(file), names);
  if (!item) {
    snap.errorf(`cannot find ${itemPath}`, { file: rel });
    return undefined;
  }
  return { file, rel, item };
}
