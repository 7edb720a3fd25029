import path from 'node:path';
import ts from 'typescript';
import type { TsrfConfig } from '../../config/types.js';
import type { Session } from '../../domain/entities/Session.js';
import type { Loader } from '../../domain/ports/LoaderPort.js';
import type { WorkspaceFsPort } from '../../domain/ports/WorkspaceFsPort.js';
import { HardLoadError } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';
import { NodeWorkspaceFs } from '../fs/NodeWorkspaceFs.js';
import { toFormatSettings } from './formatSource.js';
import { TsSnapshot, toPosix, type WorkspaceContext } from './TsSnapshot.js';

export interface TsWorkspaceOptions {
  root: string;
  config: TsrfConfig;
  session: Session;
  fs?: WorkspaceFsPort;
  logger?: Logger;
}

interface ProjectConfig {
  configPath: string;
  options: ts.CompilerOptions;
  fileNames: string[];
}

function flatten(diagnostics: readonly ts.Diagnostic[]): string {
  return diagnostics
    .map((d) => ts.flattenDiagnosticMessageText(d.messageText, ' '))
    .filter(Boolean)
    .join('; ');
}

/**
 * 磁碟上的 TypeScript workspace，是 snapshot chain 的第一個 Loader
 *
 * 讀取 tsconfig 與專案檔案後交給 TsSnapshot 做第一次型別檢查。
 * tsconfig 或檔案讀取失敗屬於 HardLoadError，與 diagnostics 分開處理。
 */
export class TsWorkspace implements Loader<TsSnapshot> {
  private readonly rootDir: string;
  private readonly fs: WorkspaceFsPort;
  private readonly logger: Logger;

  constructor(private readonly opts: TsWorkspaceOptions) {
    this.rootDir = toPosix(path.resolve(opts.root));
    this.fs = opts.fs ?? new NodeWorkspaceFs();
    this.logger = opts.logger ?? new Logger('TsWorkspace', opts.config.logLevel);
  }

  async load(): Promise<TsSnapshot> {
    const project = this.readProject();

    const originals = new Map<string, string>();
    for (const file of project.fileNames) {
      try {
        originals.set(file, await this.fs.readFile(file));
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new HardLoadError(`reading ${path.posix.relative(this.rootDir, file)}: ${message}`, { cause: err });
      }
    }
    this.logger.info('loaded workspace', { root: this.rootDir, files: originals.size });

    const ctx: WorkspaceContext = {
      rootDir: this.rootDir,
      configPath: project.configPath,
      options: project.options,
      originals,
      formatSettings: toFormatSettings(this.opts.config.format),
      session: this.opts.session,
      fs: this.fs,
      logger: this.logger,
    };
    return TsSnapshot.check(ctx, originals);
  }

  private readProject(): ProjectConfig {
    const configPath = toPosix(path.resolve(this.rootDir, this.opts.config.tsconfig));
    if (!ts.sys.fileExists(configPath)) {
      throw new HardLoadError(`cannot find ${this.opts.config.tsconfig} in ${this.rootDir}`);
    }

    const read = ts.readConfigFile(configPath, (file) => ts.sys.readFile(file));
    if (read.error) {
      throw new HardLoadError(`reading ${configPath}: ${flatten([read.error])}`);
    }

    const parseHost: ts.ParseConfigHost = {
      fileExists: (p) => ts.sys.fileExists(p),
      readFile: (p) => ts.sys.readFile(p),
      readDirectory: (p, extensions, excludes, includes, depth) =>
        ts.sys.readDirectory(p, extensions, excludes, includes, depth),
      useCaseSensitiveFileNames: ts.sys.useCaseSensitiveFileNames,
    };

    const parsed = ts.parseJsonConfigFileContent(read.config, parseHost, path.dirname(configPath), undefined, configPath);
    if (parsed.errors.length > 0) {
      throw new HardLoadError(`parsing ${configPath}: ${flatten(parsed.errors)}`);
    }

    this.logger.debug('parsed tsconfig', { configPath, files: parsed.fileNames.length });
    return {
      configPath,
      options: { ...parsed.options, noEmit: true },
      fileNames: parsed.fileNames.map(toPosix),
    };
  }
}
