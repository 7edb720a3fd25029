#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { registerRunCommand } from './commands/run.js';
import { RefactorError, UsageError } from '../domain/errors/DomainErrors.js';

// 版本號取自 package.json
const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

const program = new Command();

program
  .name('tsrf')
  .description('Apply a refactoring script to a type-checked TypeScript workspace')
  .version(version);

registerRunCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        process.exit(0);
      }
      // commander 已輸出錯誤訊息；參數錯誤一律視為 usage error
      process.exit(new UsageError(err.message, { cause: err }).exitCode);
    }
    if (err instanceof RefactorError) {
      process.stderr.write(`tsrf: ${err.message}\n`);
      process.exit(err.exitCode);
    }
    process.stderr.write(`tsrf: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  }
}

void main();
