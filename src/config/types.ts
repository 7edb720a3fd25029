import type { LogLevel } from '../shared/Logger.js';

export type SemicolonMode = 'ignore' | 'insert' | 'remove';

/** 格式正規化設定（傳給 TypeScript formatter） */
export interface FormatConfig {
  indentSize: number;
  tabSize: number;
  convertTabsToSpaces: boolean;
  newLineCharacter: string;
  semicolons: SemicolonMode;
}

/** 完整設定 */
export interface TsrfConfig {
  version: number;
  /** tsconfig 路徑，相對於 workspace root */
  tsconfig: string;
  format: FormatConfig;
  logLevel: LogLevel;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof TsrfConfig]?: TsrfConfig[K] extends object ? Partial<TsrfConfig[K]> : TsrfConfig[K];
};
