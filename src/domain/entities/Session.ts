/** 可寫入文字的輸出端（process.stdout / process.stderr 皆符合） */
export interface OutputSink {
  write(chunk: string): unknown;
}

/**
 * 單次執行的 session 設定
 * debug map 由 `debug` 指令寫入，controller 讀取以決定是否輸出 trace
 */
export interface Session {
  readonly diffMode: boolean;
  readonly debug: Map<string, string>;
  readonly stdout: OutputSink;
  readonly stderr: OutputSink;
}

export interface SessionOptions {
  diffMode?: boolean;
  stdout?: OutputSink;
  stderr?: OutputSink;
}

export function createSession(options: SessionOptions = {}): Session {
  return {
    diffMode: options.diffMode ?? false,
    debug: new Map(),
    stdout: options.stdout ?? process.stdout,
    stderr: options.stderr ?? process.stderr,
  };
}
