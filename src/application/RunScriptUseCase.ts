import type { ScriptCommand } from '../domain/entities/Command.js';
import type { Session } from '../domain/entities/Session.js';
import { formatDiagnostic } from '../domain/entities/Diagnostic.js';
import type { ChainSnapshot, Loader, Snapshot } from '../domain/ports/LoaderPort.js';
import {
  CommandIntroducedErrorsError,
  FinalValidationFailedError,
  HandlerFailedError,
  HardLoadError,
  PreexistingErrorsError,
  RefactorError,
} from '../domain/errors/DomainErrors.js';
import { Logger } from '../shared/Logger.js';
import type { CommandHandler, CommandRegistry } from './CommandRegistry.js';
import { tokenizeScript } from './ScriptTokenizer.js';

export interface RunResult {
  commandsRun: number;
  diffEmitted: boolean;
  filesWritten: string[];
}

/** 目前的 chain base：初始 workspace 或上一個 Snapshot */
type ChainBase<S extends ChainSnapshot<S>> =
  | { kind: 'workspace'; loader: Loader<S> }
  | { kind: 'snapshot'; snapshot: S };

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run Script Use Case
 *
 * 設計意圖：以 snapshot chain 逐一執行腳本指令。
 * 每一步先重新載入上一步的結果，再執行 handler；
 * 因此某個指令造成的型別錯誤要到下一次載入才會被發現，
 * 並歸屬給上一個開始執行的指令。最後一個指令由 finalize 的重新載入檢查。
 */
export class RunScriptUseCase<S extends ChainSnapshot<S>> {
  constructor(
    private readonly workspace: Loader<S>,
    private readonly registry: CommandRegistry<S>,
    private readonly session: Session,
    private readonly logger: Logger = new Logger('RunScriptUseCase', 'warn'),
  ) {}

  async run(script: string): Promise<RunResult> {
    const commands = tokenizeScript(script);
    let base: ChainBase<S> = { kind: 'workspace', loader: this.workspace };
    let snap: S | null = null;
    let lastCmd = '';

    for (const cmd of commands) {
      this.trace(cmd);

      const next = await this.acquire(base);
      if (next.errors() > 0) {
        this.report(next);
        if (base.kind === 'workspace') {
          throw new PreexistingErrorsError(next.errors());
        }
        await this.finalizeLastGood(base.snapshot);
        throw new CommandIntroducedErrorsError(lastCmd, next.errors());
      }

      lastCmd = cmd.label;
      const handler = this.registry.dispatch(cmd.name);
      this.logger.debug('executing command', { command: cmd.label });
      this.execute(handler, next, cmd);

      next.format();
      base = { kind: 'snapshot', snapshot: next };
      snap = next;
    }

    if (snap === null) {
      this.logger.debug('script has no commands');
      return { commandsRun: 0, diffEmitted: false, filesWritten: [] };
    }

    return this.finalize(snap, lastCmd, commands.length);
  }

  // ── 私有方法 ──

  private async acquire(base: ChainBase<S>): Promise<S> {
    const loader: Loader<S> = base.kind === 'workspace' ? base.loader : base.snapshot;
    try {
      return await loader.load();
    } catch (err) {
      if (err instanceof RefactorError) throw err;
      throw new HardLoadError(messageOf(err), { cause: err });
    }
  }

  /** 執行 handler；丟出的例外轉為 diagnostic，與 errorf 回報的錯誤一併檢查 */
  private execute(handler: CommandHandler<S>, snap: S, cmd: ScriptCommand): void {
    let cause: unknown;
    try {
      handler(snap, cmd.args);
    } catch (err) {
      cause = err;
      snap.errorf(messageOf(err));
    }

    if (snap.errors() > 0) {
      this.report(snap);
      throw new HandlerFailedError(cmd.label, cause === undefined ? undefined : { cause });
    }
  }

  /**
   * 上一個指令引入錯誤時，輸出最後一個通過檢查的狀態
   * （上一個 snapshot 載入時的內容，不含其待處理編輯）
   */
  private async finalizeLastGood(prev: S): Promise<void> {
    try {
      if (this.session.diffMode) {
        const d = await prev.diff('loaded');
        if (d) this.session.stdout.write(d);
      } else {
        const files = await prev.write('loaded');
        this.logger.info('wrote last good state', { files });
      }
    } catch (err) {
      this.logger.warn('could not finalize last good state', { error: messageOf(err) });
    }
  }

  private async finalize(snap: S, lastCmd: string, commandsRun: number): Promise<RunResult> {
    // 先輸出 diff，即使最後檢查失敗也能看到改了什麼
    let diffEmitted = false;
    if (this.session.diffMode) {
      const d = await snap.diff('pending');
      if (d) {
        this.session.stdout.write(d);
        diffEmitted = true;
      }
    }

    let checked: Snapshot;
    try {
      checked = await snap.load();
    } catch (err) {
      throw new FinalValidationFailedError(messageOf(err), { cause: err });
    }
    if (checked.errors() > 0) {
      this.report(checked);
      throw new FinalValidationFailedError(`errors found after executing: ${lastCmd}`);
    }

    if (this.session.diffMode) {
      return { commandsRun, diffEmitted, filesWritten: [] };
    }

    const filesWritten = await snap.write('pending');
    this.logger.info('wrote files', { files: filesWritten });
    return { commandsRun, diffEmitted, filesWritten };
  }

  private trace(cmd: ScriptCommand): void {
    if (!this.session.debug.get('trace')) return;
    this.session.stderr.write(`> ${cmd.line.replaceAll('\n', '\\\n')}\n`);
  }

  private report(snap: Snapshot): void {
    for (const d of snap.diagnostics()) {
      this.session.stderr.write(formatDiagnostic(d) + '\n');
    }
  }
}
