import { CommandRegistry } from '../application/CommandRegistry.js';
import type { TsSnapshot } from '../infrastructure/typescript/TsSnapshot.js';
import { cmdAdd } from './add.js';
import { cmdDebug } from './debug.js';
import { cmdMv } from './mv.js';
import { cmdRm } from './rm.js';

/** 預設指令集 */
export function createDefaultRegistry(): CommandRegistry<TsSnapshot> {
  return new CommandRegistry<TsSnapshot>([
    ['add', cmdAdd],
    ['debug', cmdDebug],
    ['mv', cmdMv],
    ['rm', cmdRm],
  ]);
}
