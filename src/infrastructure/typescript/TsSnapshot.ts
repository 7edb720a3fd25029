import path from 'node:path';
import ts from 'typescript';
import { createTwoFilesPatch } from 'diff';
import type { Diagnostic } from '../../domain/entities/Diagnostic.js';
import { ItemArena } from '../../domain/entities/Item.js';
import type { Session } from '../../domain/entities/Session.js';
import type { ChainSnapshot, EditScope } from '../../domain/ports/LoaderPort.js';
import type { WorkspaceFsPort } from '../../domain/ports/WorkspaceFsPort.js';
import { HardLoadError } from '../../domain/errors/DomainErrors.js';
import type { Logger } from '../../shared/Logger.js';
import { EditBuffer } from './EditBuffer.js';
import { collectItems } from './collectItems.js';
import { formatSource } from './formatSource.js';

/** 同一次執行中所有 snapshot 共用的 workspace 資訊 */
export interface WorkspaceContext {
  /** 以 `/` 分隔的絕對路徑 */
  rootDir: string;
  configPath: string;
  options: ts.CompilerOptions;
  /** 執行開始時磁碟上的內容，diff 與 write 以此為基準 */
  originals: ReadonlyMap<string, string>;
  formatSettings: ts.FormatCodeSettings;
  session: Session;
  fs: WorkspaceFsPort;
  logger: Logger;
}

/** snapshot 目前聚焦的工作單位：一個 tsconfig 專案 */
export interface TargetUnit {
  rootDir: string;
  configPath: string;
  /** 相對於 rootDir */
  fileNames: string[];
}

export function toPosix(p: string): string {
  return p.replace(/\\/g, '/');
}

function createHost(ctx: WorkspaceContext, texts: ReadonlyMap<string, string>): ts.LanguageServiceHost {
  return {
    getCompilationSettings: () => ctx.options,
    getCurrentDirectory: () => ctx.rootDir,
    getDefaultLibFileName: (o) => ts.getDefaultLibFilePath(o),
    getScriptFileNames: () => [...texts.keys()],
    getScriptVersion: () => '1',
    getScriptSnapshot: (f) => {
      const text = texts.get(f) ?? ts.sys.readFile(f);
      return text === undefined ? undefined : ts.ScriptSnapshot.fromString(text);
    },
    fileExists: (f) => texts.has(f) || ts.sys.fileExists(f),
    readFile: (f) => texts.get(f) ?? ts.sys.readFile(f),
    readDirectory: (p, extensions, excludes, includes, depth) =>
      ts.sys.readDirectory(p, extensions, excludes, includes, depth),
    directoryExists: (p) => ts.sys.directoryExists(p),
    getDirectories: (p) => ts.sys.getDirectories(p),
    useCaseSensitiveFileNames: () => ts.sys.useCaseSensitiveFileNames,
  };
}

/**
 * TypeScript 專案在腳本某一步的 snapshot
 *
 * 載入時即完成型別檢查並記錄 diagnostics；
 * handler 的編輯先累積在各檔案的 EditBuffer，等下一次 load() 才套用並重新檢查。
 */
export class TsSnapshot implements ChainSnapshot<TsSnapshot> {
  private readonly buffers = new Map<string, EditBuffer>();
  private readonly reported: Diagnostic[] = [];
  private arena: ItemArena | null = null;

  private constructor(
    private readonly ctx: WorkspaceContext,
    private readonly texts: ReadonlyMap<string, string>,
    private readonly service: ts.LanguageService,
    private readonly loaded: readonly Diagnostic[],
  ) {}

  /** 對給定內容建立 language service 並收集 diagnostics */
  static check(ctx: WorkspaceContext, texts: ReadonlyMap<string, string>): TsSnapshot {
    const service = ts.createLanguageService(createHost(ctx, texts));
    const program = service.getProgram();
    if (!program) {
      throw new HardLoadError('type checker produced no program');
    }

    const diagnostics: Diagnostic[] = program.getGlobalDiagnostics().map((d) => toDiagnostic(ctx, d));
    for (const file of texts.keys()) {
      const sf = program.getSourceFile(file);
      if (!sf) {
        diagnostics.push({ file: relativeTo(ctx, file), message: 'file is not part of the program' });
        continue;
      }
      for (const d of program.getSyntacticDiagnostics(sf)) diagnostics.push(toDiagnostic(ctx, d));
      for (const d of program.getSemanticDiagnostics(sf)) diagnostics.push(toDiagnostic(ctx, d));
    }

    ctx.logger.debug('type-checked workspace', { files: texts.size, diagnostics: diagnostics.length });
    return new TsSnapshot(ctx, texts, service, diagnostics);
  }

  get session(): Session {
    return this.ctx.session;
  }

  errors(): number {
    return this.loaded.length + this.reported.length;
  }

  diagnostics(): readonly Diagnostic[] {
    return [...this.loaded, ...this.reported];
  }

  errorf(message: string, at: Omit<Diagnostic, 'message'> = {}): void {
    this.reported.push({ ...at, message });
  }

  target(): TargetUnit {
    return {
      rootDir: this.ctx.rootDir,
      configPath: this.ctx.configPath,
      fileNames: [...this.texts.keys()].map((f) => relativeTo(this.ctx, f)),
    };
  }

  languageService(): ts.LanguageService {
    return this.service;
  }

  sourceFile(file: string): ts.SourceFile | undefined {
    return this.service.getProgram()?.getSourceFile(file);
  }

  hasFile(file: string): boolean {
    return this.texts.has(file);
  }

  /** workspace 相對路徑 → 絕對路徑；不屬於專案時回傳 undefined */
  resolveFile(rel: string): string | undefined {
    const abs = toPosix(path.resolve(this.ctx.rootDir, rel));
    return this.texts.has(abs) ? abs : undefined;
  }

  relative(file: string): string {
    return relativeTo(this.ctx, file);
  }

  /** 載入時的內容 */
  text(file: string): string {
    const text = this.texts.get(file);
    if (text === undefined) throw new Error(`${this.relative(file)} is not part of the workspace`);
    return text;
  }

  edit(file: string): EditBuffer {
    let buf = this.buffers.get(file);
    if (!buf) {
      buf = new EditBuffer(this.relative(file), this.text(file).length);
      this.buffers.set(file, buf);
    }
    return buf;
  }

  pendingText(file: string): string {
    const text = this.text(file);
    return this.buffers.get(file)?.apply(text) ?? text;
  }

  /** 所有專案檔案中的具名宣告（第一次使用時建立） */
  items(): ItemArena {
    if (this.arena) return this.arena;
    const arena = new ItemArena();
    for (const file of this.texts.keys()) {
      const sf = this.sourceFile(file);
      if (sf) collectItems(arena, sf, this.relative(file));
    }
    this.arena = arena;
    return arena;
  }

  format(): void {
    for (const [file, buf] of this.buffers) {
      if (buf.size === 0) continue;
      const loaded = this.text(file);
      const formatted = formatSource(file, buf.apply(loaded), this.ctx.formatSettings);
      const normalized = new EditBuffer(buf.file, loaded.length);
      if (formatted !== loaded) normalized.replace(0, loaded.length, formatted);
      this.buffers.set(file, normalized);
    }
  }

  async diff(scope: EditScope = 'pending'): Promise<string> {
    const patches: string[] = [];
    for (const [file, text] of this.changed(scope)) {
      const rel = this.relative(file);
      patches.push(createTwoFilesPatch(`a/${rel}`, `b/${rel}`, this.original(file), text));
    }
    return patches.join('');
  }

  async write(scope: EditScope = 'pending'): Promise<string[]> {
    const written: string[] = [];
    for (const [file, text] of this.changed(scope)) {
      await this.ctx.fs.writeFile(file, text);
      written.push(this.relative(file));
    }
    this.ctx.logger.debug('wrote snapshot', { scope, files: written });
    return written;
  }

  async load(): Promise<TsSnapshot> {
    const next = new Map<string, string>();
    for (const file of this.texts.keys()) {
      next.set(file, this.pendingText(file));
    }
    return TsSnapshot.check(this.ctx, next);
  }

  // ── 私有方法 ──

  private original(file: string): string {
    return this.ctx.originals.get(file) ?? '';
  }

  /** 與執行開始時內容不同的檔案 */
  private changed(scope: EditScope): Array<[string, string]> {
    const result: Array<[string, string]> = [];
    for (const file of this.texts.keys()) {
      const text = scope === 'pending' ? this.pendingText(file) : this.text(file);
      if (text !== this.original(file)) result.push([file, text]);
    }
    return result;
  }
}

function relativeTo(ctx: WorkspaceContext, file: string): string {
  return path.posix.relative(ctx.rootDir, toPosix(file));
}

function toDiagnostic(ctx: WorkspaceContext, d: ts.Diagnostic): Diagnostic {
  const message = ts.flattenDiagnosticMessageText(d.messageText, '\n');
  if (!d.file) return { message, code: d.code };

  const file = relativeTo(ctx, d.file.fileName);
  if (d.start === undefined) return { file, message, code: d.code };

  const { line, character } = d.file.getLineAndCharacterOfPosition(d.start);
  return { file, line: line + 1, column: character + 1, message, code: d.code };
}
