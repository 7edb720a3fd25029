import { EditConflictError } from '../../domain/errors/DomainErrors.js';

export interface TextEdit {
  start: number;
  end: number;
  text: string;
}

/**
 * 單一檔案的待處理文字編輯
 *
 * 位置皆以「載入時的文字」為準；多個編輯不可重疊，
 * 但同一位置的多個插入可以並存，套用時維持呼叫順序。
 */
export class EditBuffer {
  private readonly edits: TextEdit[] = [];

  constructor(
    readonly file: string,
    private readonly length: number,
  ) {}

  insert(pos: number, text: string): void {
    this.replace(pos, pos, text);
  }

  delete(start: number, end: number): void {
    this.replace(start, end, '');
  }

  replace(start: number, end: number, text: string): void {
    if (start < 0 || end < start || end > this.length) {
      throw new RangeError(`invalid edit range [${start}, ${end}) in ${this.file}`);
    }
    const conflict = this.edits.find((e) => overlaps(e, start, end));
    if (conflict) {
      throw new EditConflictError(this.file, start, end);
    }
    this.edits.push({ start, end, text });
  }

  get size(): number {
    return this.edits.length;
  }

  /** 套用所有編輯到 text（必須是載入時的文字） */
  apply(text: string): string {
    if (this.edits.length === 0) return text;

    // Array.prototype.sort 是 stable 的，同位置的插入保持原順序
    const sorted = [...this.edits].sort((a, b) => a.start - b.start || a.end - b.end);
    let out = '';
    let cursor = 0;
    for (const e of sorted) {
      out += text.slice(cursor, e.start) + e.text;
      cursor = Math.max(cursor, e.end);
    }
    return out + text.slice(cursor);
  }
}

/** 插入（空範圍）只在落入另一個編輯範圍內部時才算重疊 */
function overlaps(e: TextEdit, start: number, end: number): boolean {
  if (start === end) return start > e.start && start < e.end;
  if (e.start === e.end) return e.start > start && e.start < end;
  return start < e.end && e.start < end;
}
