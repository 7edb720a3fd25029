import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RunScriptUseCase } from '../../../src/application/RunScriptUseCase.js';
import { CommandRegistry, type CommandHandler } from '../../../src/application/CommandRegistry.js';
import { cmdDebug } from '../../../src/commands/debug.js';
import { createSession, type Session } from '../../../src/domain/entities/Session.js';
import {
  CommandIntroducedErrorsError,
  FinalValidationFailedError,
  HandlerFailedError,
  HardLoadError,
  PreexistingErrorsError,
  UnknownCommandError,
} from '../../../src/domain/errors/DomainErrors.js';
import { cut } from '../../../src/shared/strings.js';
import { CaptureSink, FakeWorkspace, type FakeSnapshot } from '../../helpers/FakeWorkspace.js';

const set: CommandHandler<FakeSnapshot> = (snap, args) => {
  const [file, text] = cut(args, ' ');
  snap.set(file, text);
};

const fail: CommandHandler<FakeSnapshot> = (snap, args) => {
  snap.errorf(`refused: ${args}`, { file: 'a.ts' });
};

const explode: CommandHandler<FakeSnapshot> = () => {
  throw new Error('handler exploded');
};

/**
 * Feature: Snapshot chain 執行腳本
 *
 * 每個指令在前一個指令的結果重新載入並通過檢查後才執行；
 * 指令造成的錯誤在下一次載入時被發現並歸屬給該指令。
 */
describe('RunScriptUseCase', () => {
  let stdout: CaptureSink;
  let stderr: CaptureSink;

  function setup(files: Record<string, string>, diffMode = false) {
    stdout = new CaptureSink();
    stderr = new CaptureSink();
    const session: Session = createSession({ diffMode, stdout, stderr });
    const ws = new FakeWorkspace(files, session);
    const registry = new CommandRegistry<FakeSnapshot>([
      ['set', set],
      ['fail', fail],
      ['explode', explode],
      ['debug', cmdDebug],
    ]);
    return { ws, session, useCase: new RunScriptUseCase(ws, registry, session) };
  }

  beforeEach(() => {
    vi.restoreAllMocks();
  });

  /**
   * Scenario: 空腳本
   * Given 只有註解與空白行的腳本
   * When 執行
   * Then 成功且沒有任何載入、寫入或 diff
   */
  it('should succeed without I/O when the script has no commands', async () => {
    const { ws, useCase } = setup({ 'a.ts': 'start' });

    const result = await useCase.run('# nothing here\n\n   \n');

    expect(result).toEqual({ commandsRun: 0, diffEmitted: false, filesWritten: [] });
    expect(ws.loads).toBe(0);
    expect(ws.writes).toHaveLength(0);
    expect(stdout.text).toBe('');
  });

  it('should neither load nor diff an empty script in diff mode', async () => {
    const { ws, useCase } = setup({ 'a.ts': 'start' }, true);

    const result = await useCase.run('\n# comment only\n');

    expect(result).toEqual({ commandsRun: 0, diffEmitted: false, filesWritten: [] });
    expect(ws.loads).toBe(0);
    expect(stdout.text).toBe('');
  });

  it('should persist the normalized result of every command in order', async () => {
    const { ws, useCase } = setup({ 'a.ts': 'start', 'b.ts': 'other' });

    const result = await useCase.run('set a.ts one   two\nset b.ts three\nset a.ts four    five\n');

    expect(result).toEqual({ commandsRun: 3, diffEmitted: false, filesWritten: ['a.ts', 'b.ts'] });
    expect(ws.disk.get('a.ts')).toBe('four five');
    expect(ws.disk.get('b.ts')).toBe('three');
    // 初始載入 + 每個後續指令一次 + 最後檢查
    expect(ws.loads).toBe(4);
  });

  it('should emit the final diff without writing in diff mode', async () => {
    const { ws, useCase } = setup({ 'a.ts': 'start' }, true);

    const result = await useCase.run('set a.ts one   two');

    expect(result).toEqual({ commandsRun: 1, diffEmitted: true, filesWritten: [] });
    expect(stdout.text).toBe('--- a/a.ts\n+++ b/a.ts\n-start\n+one two\n');
    expect(ws.writes).toHaveLength(0);
    expect(ws.disk.get('a.ts')).toBe('start');
  });

  /**
   * Scenario: 指令引入只能在重新載入時發現的錯誤
   * Given 第二個指令寫入 BROKEN
   * When 第三個指令開始前重新載入
   * Then 錯誤歸屬給第二個指令，並寫回第一個指令後的狀態
   */
  it('should attribute reload diagnostics to the previous command and persist the last good state', async () => {
    const { ws, useCase } = setup({ 'a.ts': 'start', 'b.ts': 'other' });

    const run = useCase.run('set a.ts fine\nset a.ts BROKEN\nset b.ts later\n');

    await expect(run).rejects.toThrow(CommandIntroducedErrorsError);
    await expect(run).rejects.toThrow('errors found after executing: set a.ts BROKEN');
    expect(ws.writes).toEqual([{ file: 'a.ts', text: 'fine' }]);
    expect(ws.disk.get('b.ts')).toBe('other');
    expect(stderr.text).toBe('a.ts:1:1: broken\n');
  });

  it('should diff the last good state when a command introduces errors in diff mode', async () => {
    const { ws, useCase } = setup({ 'a.ts': 'start' }, true);

    await expect(useCase.run('set a.ts fine\nset a.ts BROKEN\nset a.ts again\n')).rejects.toThrow(
      CommandIntroducedErrorsError,
    );

    expect(stdout.text).toBe('--- a/a.ts\n+++ b/a.ts\n-start\n+fine\n');
    expect(ws.writes).toHaveLength(0);
  });

  it('should name only the first physical line of a continued command', async () => {
    const { useCase } = setup({ 'a.ts': 'start' });

    const run = useCase.run('set a.ts BROKEN \\\n  more\nset a.ts next\n');

    await expect(run).rejects.toThrow('errors found after executing: set a.ts BROKEN  \\ ...');
  });

  /**
   * Scenario: 最後一個指令引入錯誤
   * Given 沒有後續指令可以觸發重新載入
   * When finalize 重新載入
   * Then 回報 FinalValidationFailed 且不寫檔
   */
  it('should catch errors from the last command in the final validation', async () => {
    const { ws, useCase } = setup({ 'a.ts': 'start' });

    const run = useCase.run('set a.ts fine\nset a.ts BROKEN\n');

    await expect(run).rejects.toThrow(FinalValidationFailedError);
    await expect(run).rejects.toThrow('checking rewritten files: errors found after executing: set a.ts BROKEN');
    expect(ws.writes).toHaveLength(0);
    expect(stderr.text).toBe('a.ts:1:1: broken\n');
  });

  it('should emit the diff before the final validation fails', async () => {
    const { useCase } = setup({ 'a.ts': 'start' }, true);

    await expect(useCase.run('set a.ts BROKEN')).rejects.toThrow(FinalValidationFailedError);

    expect(stdout.text).toBe('--- a/a.ts\n+++ b/a.ts\n-start\n+BROKEN\n');
  });

  it('should report a failing final reload as FinalValidationFailed', async () => {
    const { ws, useCase } = setup({ 'a.ts': 'start' });
    ws.failLoads.add(2);

    const run = useCase.run('set a.ts one');

    await expect(run).rejects.toThrow(FinalValidationFailedError);
    await expect(run).rejects.toThrow('checking rewritten files: disk unavailable');
    expect(ws.writes).toHaveLength(0);
  });

  it('should abort with PreexistingErrors before dispatching any command', async () => {
    const { useCase } = setup({ 'a.ts': 'BROKEN' });
    const spy = vi.spyOn(CommandRegistry.prototype, 'dispatch');

    await expect(useCase.run('set a.ts fixed')).rejects.toThrow(PreexistingErrorsError);

    expect(spy).not.toHaveBeenCalled();
    expect(stderr.text).toBe('a.ts:1:1: broken\n');
  });

  it('should wrap an initial loader failure as HardLoadError', async () => {
    const { ws, useCase } = setup({ 'a.ts': 'start' });
    ws.failLoads.add(1);

    await expect(useCase.run('set a.ts one')).rejects.toThrow(HardLoadError);
  });

  it('should surface a reload failure in the middle of the chain as HardLoadError', async () => {
    const { ws, useCase } = setup({ 'a.ts': 'start' });
    ws.failLoads.add(2);

    const run = useCase.run('set a.ts one\nset a.ts two\nset a.ts three\n');

    await expect(run).rejects.toThrow(HardLoadError);
    await expect(run).rejects.toThrow('disk unavailable');
    expect(ws.loads).toBe(2);
    expect(ws.writes).toHaveLength(0);
    expect(ws.disk.get('a.ts')).toBe('start');
  });

  it('should abort on an unknown command without persisting anything', async () => {
    const { ws, useCase } = setup({ 'a.ts': 'start' });

    const run = useCase.run('set a.ts one\nfrobnicate a.ts\n');

    await expect(run).rejects.toThrow(UnknownCommandError);
    await expect(run).rejects.toThrow('unknown command frobnicate');
    expect(ws.writes).toHaveLength(0);
  });

  it('should fail with a fresh error naming the command when a handler reports diagnostics', async () => {
    const { ws, useCase } = setup({ 'a.ts': 'start' });

    const run = useCase.run('set a.ts one\nfail now\n');

    await expect(run).rejects.toThrow(HandlerFailedError);
    await expect(run).rejects.toThrow('errors found while executing: fail now');
    expect(stderr.text).toBe('a.ts: refused: now\n');
    expect(ws.writes).toHaveLength(0);
  });

  it('should turn a throwing handler into a HandlerFailed error with the cause attached', async () => {
    const { useCase } = setup({ 'a.ts': 'start' });

    const err = await useCase.run('explode').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(HandlerFailedError);
    expect(err instanceof HandlerFailedError && err.cause instanceof Error && err.cause.message).toBe(
      'handler exploded',
    );
    expect(stderr.text).toBe('handler exploded\n');
  });

  it('should trace commands once the debug command enables it', async () => {
    const { session, useCase } = setup({ 'a.ts': 'start' });

    await useCase.run('debug trace\nset a.ts one \\\ntwo\n');

    expect(session.debug.get('trace')).toBe('1');
    expect(stderr.text).toBe('> set a.ts one \\\ntwo\n');
  });

  it('should keep pipelines with separate registries independent', async () => {
    const { ws, session } = setup({ 'a.ts': 'start' });
    const only = new RunScriptUseCase(ws, new CommandRegistry<FakeSnapshot>([['debug', cmdDebug]]), session);

    await expect(only.run('set a.ts one')).rejects.toThrow('unknown command set');
  });
});
