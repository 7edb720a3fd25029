import { describe, it, expect } from 'vitest';
import {
  UsageError,
  HardLoadError,
  PreexistingErrorsError,
  UnknownCommandError,
  CommandIntroducedErrorsError,
  HandlerFailedError,
  FinalValidationFailedError,
  EditConflictError,
  RefactorError,
} from '../../../src/domain/errors/DomainErrors.js';

describe('DomainErrors', () => {
  it('UsageError exits with the low usage code', () => {
    const err = new UsageError('missing script');
    expect(err.classification).toBe('usage');
    expect(err.code).toBe('USAGE');
    expect(err.exitCode).toBe(2);
    expect(err).toBeInstanceOf(RefactorError);
  });

  it('HardLoadError is a workspace error', () => {
    const err = new HardLoadError('cannot read');
    expect(err.classification).toBe('workspace');
    expect(err.code).toBe('LOAD_FAILED');
    expect(err.exitCode).toBe(1);
    expect(err.name).toBe('HardLoadError');
  });

  it('PreexistingErrorsError carries the diagnostic count', () => {
    const err = new PreexistingErrorsError(3);
    expect(err.message).toBe('errors found before executing script');
    expect(err.diagnosticCount).toBe(3);
  });

  it('UnknownCommandError names the command', () => {
    const err = new UnknownCommandError('frob');
    expect(err.classification).toBe('script');
    expect(err.message).toBe('unknown command frob');
    expect(err.commandName).toBe('frob');
  });

  it('CommandIntroducedErrorsError names the command that broke the workspace', () => {
    const err = new CommandIntroducedErrorsError('rm src/a.ts:foo', 2);
    expect(err.code).toBe('COMMAND_INTRODUCED_ERRORS');
    expect(err.message).toBe('errors found after executing: rm src/a.ts:foo');
    expect(err.command).toBe('rm src/a.ts:foo');
  });

  it('HandlerFailedError keeps its cause', () => {
    const cause = new Error('boom');
    const err = new HandlerFailedError('mv a b', { cause });
    expect(err.message).toBe('errors found while executing: mv a b');
    expect(err.cause).toBe(cause);
  });

  it('FinalValidationFailedError prefixes the detail', () => {
    const err = new FinalValidationFailedError('disk gone');
    expect(err.message).toBe('checking rewritten files: disk gone');
    expect(err.code).toBe('FINAL_VALIDATION_FAILED');
  });

  it('EditConflictError describes the range', () => {
    const err = new EditConflictError('src/a.ts', 4, 9);
    expect(err.message).toBe('overlapping edits in src/a.ts at [4, 9)');
    expect(err.file).toBe('src/a.ts');
  });
});
