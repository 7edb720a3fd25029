import type { Snapshot } from '../domain/ports/LoaderPort.js';
import { cut, fields } from '../shared/strings.js';

/** debug key=value key2 … 只有 key 時值為 "1" */
export function cmdDebug(snap: Snapshot, args: string): void {
  for (const field of fields(args)) {
    const [key, value, ok] = cut(field, '=');
    snap.session.debug.set(key, ok ? value : '1');
  }
}
