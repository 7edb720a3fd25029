import type { TsSnapshot } from '../infrastructure/typescript/TsSnapshot.js';
import { cutAny } from '../shared/strings.js';
import { resolveAddress } from './address.js';

/**
 * add address text
 *
 * 位址指向宣告時，插入在包住它的頂層宣告之後（中間空一行）；
 * 只有檔案時附加到檔尾。
 */
export function cmdAdd(snap: TsSnapshot, args: string): void {
  const [addr, rest] = cutAny(args, ' \t\n');
  const text = rest.trim();
  if (addr === '' || text === '') {
    snap.errorf('usage: add address text');
    return;
  }

  const target = resolveAddress(snap, addr);
  if (!target) return;

  const buf = snap.edit(target.file);
  if (target.item) {
    const top = snap.items().top(target.item.id);
    buf.insert(top.statementEnd ?? top.end, '\n\n' + text);
    return;
  }

  const loaded = snap.text(target.file);
  const sep = loaded === '' ? '' : loaded.endsWith('\n') ? '\n' : '\n\n';
  buf.insert(loaded.length, sep + text + '\n');
}
