import type { Command } from 'commander';
import { RunScriptUseCase, type RunResult } from '../../application/RunScriptUseCase.js';
import { createDefaultRegistry } from '../../commands/index.js';
import { loadConfig } from '../../config/ConfigLoader.js';
import { createSession, type OutputSink } from '../../domain/entities/Session.js';
import { TsWorkspace } from '../../infrastructure/typescript/TsWorkspace.js';
import { Logger } from '../../shared/Logger.js';

export interface RunOptions {
  root: string;
  diff: boolean;
  stdout?: OutputSink;
  stderr?: OutputSink;
}

/** 組裝 workspace、指令集與 session 後執行腳本 */
export async function runScript(script: string, opts: RunOptions): Promise<RunResult> {
  const config = loadConfig(opts.root);
  const session = createSession({ diffMode: opts.diff, stdout: opts.stdout, stderr: opts.stderr });
  const logger = new Logger('tsrf', config.logLevel, session.stderr);

  const workspace = new TsWorkspace({
    root: opts.root,
    config,
    session,
    logger: logger.child('TsWorkspace'),
  });
  const useCase = new RunScriptUseCase(workspace, createDefaultRegistry(), session, logger.child('RunScriptUseCase'));
  return useCase.run(script);
}

/** 設定主程式：tsrf [--diff] [--root <path>] <script> */
export function registerRunCommand(program: Command): void {
  program
    .argument('<script>', 'refactoring script text (not a file path)')
    .option('--diff', 'show diff instead of writing files', false)
    .option('--root <path>', 'workspace root directory', '.')
    .allowExcessArguments(false)
    .action(async (script: string, opts: { diff: boolean; root: string }) => {
      await runScript(script, { root: opts.root, diff: opts.diff });
    });
}
