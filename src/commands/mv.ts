import ts from 'typescript';
import type { TsSnapshot } from '../infrastructure/typescript/TsSnapshot.js';
import { fields } from '../shared/strings.js';
import { resolveAddress } from './address.js';

/**
 * mv address NewName
 * 透過 language service 的 rename locations 改名宣告及所有參照。
 */
export function cmdMv(snap: TsSnapshot, args: string): void {
  const parts = fields(args);
  if (parts.length !== 2) {
    snap.errorf('usage: mv address NewName');
    return;
  }
  const [addr, newName] = parts;
  if (!ts.isIdentifierText(newName, ts.ScriptTarget.Latest)) {
    snap.errorf(`invalid name ${newName}`);
    return;
  }

  const target = resolveAddress(snap, addr);
  if (!target) return;
  if (!target.item) {
    snap.errorf(`mv needs a declaration, not a file: ${addr}`);
    return;
  }

  const locations = snap.languageService().findRenameLocations(target.file, target.item.nameStart, false, false, {});
  if (!locations || locations.length === 0) {
    snap.errorf(`cannot rename ${addr}`, { file: target.rel });
    return;
  }

  const outside = locations.find((loc) => !snap.hasFile(loc.fileName));
  if (outside) {
    snap.errorf(`cannot rename ${addr}: referenced outside the workspace in ${outside.fileName}`);
    return;
  }

  for (const loc of locations) {
    const { start, length } = loc.textSpan;
    snap.edit(loc.fileName).replace(start, start + length, `${loc.prefixText ?? ''}${newName}${loc.suffixText ?? ''}`);
  }
}
