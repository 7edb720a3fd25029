export { tokenizeScript, trimComments } from './application/ScriptTokenizer.js';
export { CommandRegistry, type CommandHandler } from './application/CommandRegistry.js';
export { RunScriptUseCase, type RunResult } from './application/RunScriptUseCase.js';
export { createDefaultRegistry } from './commands/index.js';
export { loadConfig, type TsrfConfig } from './config/ConfigLoader.js';
export type { ScriptCommand } from './domain/entities/Command.js';
export { formatDiagnostic, type Diagnostic } from './domain/entities/Diagnostic.js';
export { ItemArena, type ItemNode, type ItemId, type ItemKind } from './domain/entities/Item.js';
export { createSession, type Session, type OutputSink } from './domain/entities/Session.js';
export type { ChainSnapshot, EditScope, Loader, Snapshot } from './domain/ports/LoaderPort.js';
export * from './domain/errors/DomainErrors.js';
export { TsWorkspace } from './infrastructure/typescript/TsWorkspace.js';
export { TsSnapshot, type TargetUnit } from './infrastructure/typescript/TsSnapshot.js';
export { runScript } from './cli/commands/run.js';
