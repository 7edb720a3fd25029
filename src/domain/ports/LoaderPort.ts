import type { Diagnostic } from '../entities/Diagnostic.js';
import type { Session } from '../entities/Session.js';

/** 'pending'：已載入文字加上尚未驗證的編輯；'loaded'：僅載入時的狀態 */
export type EditScope = 'pending' | 'loaded';

/** 能產生下一個 Snapshot 的來源；初始 workspace 與任何 Snapshot 皆是 */
export interface Loader<S extends Snapshot> {
  load(): Promise<S>;
}

/**
 * Workspace 在腳本某一步的檢查點
 * errors() 反映「載入當下」的狀態，之後的編輯要等重新載入才會被檢查；
 * handler 透過 errorf() 同步回報的錯誤則會立即計入。
 * 實作同時是 Loader<自身型別>，見 ChainSnapshot。
 */
export interface Snapshot {
  readonly session: Session;
  errors(): number;
  diagnostics(): readonly Diagnostic[];
  errorf(message: string, at?: Omit<Diagnostic, 'message'>): void;
  /** 對有待處理編輯的檔案做格式正規化 */
  format(): void;
  /** 相對原始 workspace 的 unified diff；無變更時為空字串 */
  diff(scope?: EditScope): Promise<string>;
  /** 寫回有變更的檔案，回傳相對路徑 */
  write(scope?: EditScope): Promise<string[]>;
}

/** 可作為 chain base 的 Snapshot：重新載入後得到同型別的 Snapshot */
export type ChainSnapshot<S extends Snapshot> = Snapshot & Loader<S>;
