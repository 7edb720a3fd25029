export type ErrorClassification = 'usage' | 'workspace' | 'script';

/** 所有 tsrf domain 錯誤的基底類別 */
export abstract class RefactorError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }

  /** 使用錯誤以較低的 exit code 結束，其餘皆為 1 */
  get exitCode(): number {
    return this.classification === 'usage' ? 2 : 1;
  }
}

// --- Usage ---

export class UsageError extends RefactorError {
  readonly classification = 'usage' as const;
  readonly code = 'USAGE';
}

// --- Workspace ---

export class HardLoadError extends RefactorError {
  readonly classification = 'workspace' as const;
  readonly code = 'LOAD_FAILED';
}

export class PreexistingErrorsError extends RefactorError {
  readonly classification = 'workspace' as const;
  readonly code = 'PREEXISTING_ERRORS';

  constructor(
    public readonly diagnosticCount: number,
    options?: ErrorOptions,
  ) {
    super('errors found before executing script', options);
  }
}

// --- Script ---

export class UnknownCommandError extends RefactorError {
  readonly classification = 'script' as const;
  readonly code = 'UNKNOWN_COMMAND';

  constructor(
    public readonly commandName: string,
    options?: ErrorOptions,
  ) {
    super(`unknown command ${commandName}`, options);
  }
}

export class CommandIntroducedErrorsError extends RefactorError {
  readonly classification = 'script' as const;
  readonly code = 'COMMAND_INTRODUCED_ERRORS';

  constructor(
    public readonly command: string,
    public readonly diagnosticCount: number,
    options?: ErrorOptions,
  ) {
    super(`errors found after executing: ${command}`, options);
  }
}

export class HandlerFailedError extends RefactorError {
  readonly classification = 'script' as const;
  readonly code = 'HANDLER_FAILED';

  constructor(
    public readonly command: string,
    options?: ErrorOptions,
  ) {
    super(`errors found while executing: ${command}`, options);
  }
}

export class FinalValidationFailedError extends RefactorError {
  readonly classification = 'script' as const;
  readonly code = 'FINAL_VALIDATION_FAILED';

  constructor(
    public readonly detail: string,
    options?: ErrorOptions,
  ) {
    super(`checking rewritten files: ${detail}`, options);
  }
}

export class EditConflictError extends RefactorError {
  readonly classification = 'script' as const;
  readonly code = 'EDIT_CONFLICT';

  constructor(
    public readonly file: string,
    public readonly start: number,
    public readonly end: number,
    options?: ErrorOptions,
  ) {
    super(`overlapping edits in ${file} at [${start}, ${end})`, options);
  }
}
