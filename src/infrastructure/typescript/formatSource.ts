import ts from 'typescript';
import type { FormatConfig } from '../../config/types.js';

const SEMICOLONS: Record<FormatConfig['semicolons'], ts.SemicolonPreference> = {
  ignore: ts.SemicolonPreference.Ignore,
  insert: ts.SemicolonPreference.Insert,
  remove: ts.SemicolonPreference.Remove,
};

export function toFormatSettings(config: FormatConfig): ts.FormatCodeSettings {
  return {
    ...ts.getDefaultFormatCodeSettings(config.newLineCharacter),
    indentSize: config.indentSize,
    tabSize: config.tabSize,
    convertTabsToSpaces: config.convertTabsToSpaces,
    semicolons: SEMICOLONS[config.semicolons],
  };
}

/**
 * 以 TypeScript formatter 正規化單一檔案
 * 只需要語法資訊，因此使用 syntactic 模式的 language service。
 */
export function formatSource(fileName: string, text: string, settings: ts.FormatCodeSettings): string {
  const host: ts.LanguageServiceHost = {
    getCompilationSettings: () => ({ noLib: true, noResolve: true }),
    getCurrentDirectory: () => '/',
    getDefaultLibFileName: (o) => ts.getDefaultLibFilePath(o),
    getScriptFileNames: () => [fileName],
    getScriptVersion: () => '1',
    getScriptSnapshot: (f) => (f === fileName ? ts.ScriptSnapshot.fromString(text) : undefined),
    fileExists: (f) => f === fileName,
    readFile: (f) => (f === fileName ? text : undefined),
  };

  const service = ts.createLanguageService(host, undefined, ts.LanguageServiceMode.Syntactic);
  try {
    const edits = service.getFormattingEditsForDocument(fileName, settings);
    return applyTextChanges(text, edits);
  } finally {
    service.dispose();
  }
}

/** 由後往前套用，避免位移 */
function applyTextChanges(text: string, changes: readonly ts.TextChange[]): string {
  let out = text;
  const sorted = [...changes].sort((a, b) => b.span.start - a.span.start);
  for (const change of sorted) {
    out = out.slice(0, change.span.start) + change.newText + out.slice(change.span.start + change.span.length);
  }
  return out;
}
