/** 型別檢查或指令執行所產生的錯誤 */
export interface Diagnostic {
  /** 相對於 workspace root 的路徑 */
  file?: string;
  /** 1-based */
  line?: number;
  /** 1-based */
  column?: number;
  message: string;
  code?: number;
}

export function formatDiagnostic(d: Diagnostic): string {
  if (!d.file) return d.message;
  if (d.line === undefined) return `${d.file}: ${d.message}`;
  return `${d.file}:${d.line}:${d.column ?? 1}: ${d.message}`;
}
