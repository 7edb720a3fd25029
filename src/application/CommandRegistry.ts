import type { Snapshot } from '../domain/ports/LoaderPort.js';
import { UnknownCommandError } from '../domain/errors/DomainErrors.js';

/**
 * 指令 handler：修改 snapshot 的待處理編輯，或以 errorf 回報錯誤
 * 執行是同步的，不需要重新載入。
 */
export type CommandHandler<S extends Snapshot = Snapshot> = (snap: S, args: string) => void;

/** 指令名稱 → handler；由呼叫端建立，不同 pipeline 互不影響 */
export class CommandRegistry<S extends Snapshot = Snapshot> {
  private readonly handlers = new Map<string, CommandHandler<S>>();

  constructor(entries: Iterable<readonly [string, CommandHandler<S>]> = []) {
    for (const [name, handler] of entries) {
      this.register(name, handler);
    }
  }

  register(name: string, handler: CommandHandler<S>): this {
    if (this.handlers.has(name)) {
      throw new Error(`command ${name} already registered`);
    }
    this.handlers.set(name, handler);
    return this;
  }

  dispatch(name: string): CommandHandler<S> {
    const handler = this.handlers.get(name);
    if (!handler) throw new UnknownCommandError(name);
    return handler;
  }
}
