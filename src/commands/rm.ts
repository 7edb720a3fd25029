import type { TsSnapshot } from '../infrastructure/typescript/TsSnapshot.js';
import { fields } from '../shared/strings.js';
import { resolveAddress } from './address.js';

/** rm address... 移除宣告（含前置註解與空白） */
export function cmdRm(snap: TsSnapshot, args: string): void {
  const addrs = fields(args);
  if (addrs.length === 0) {
    snap.errorf('usage: rm address...');
    return;
  }

  for (const addr of addrs) {
    const target = resolveAddress(snap, addr);
    if (!target) continue;
    if (!target.item) {
      snap.errorf(`rm needs a declaration, not a file: ${addr}`);
      continue;
    }
    if (!target.item.removable) {
      const name = snap.items().qualifiedName(target.item.id);
      snap.errorf(`cannot remove ${name}: declared together with other variables`, { file: target.rel });
      continue;
    }
    snap.edit(target.file).delete(target.item.pos, target.item.end);
  }
}
