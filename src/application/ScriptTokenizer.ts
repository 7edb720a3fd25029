import type { ScriptCommand } from '../domain/entities/Command.js';
import { cut, cutAny } from '../shared/strings.js';

const CONTINUATION = '\\';

/**
 * 在 `#` 處截斷註解，但略過引號內的 `#`
 *
 * - 引號開啟時遇到另一種引號字元，改由新的引號字元作為目前的引號
 * - `'` 與 `"` 內的 `\` 會跳過下一個字元；`` ` `` 內不處理跳脫
 * 回傳結果會去除前後空白。
 */
export function trimComments(line: string): string {
  let quote = '';
  for (let i = 0; i < line.length; i++) {
    const c = line[i];
    if (quote !== '' && c === quote) {
      quote = '';
    } else if (c === "'" || c === '"' || c === '`') {
      quote = c;
    } else if (c === '\\') {
      if (quote === "'" || quote === '"') i++;
    } else if (c === '#' && quote === '') {
      return line.slice(0, i).trim();
    }
  }
  return line.trim();
}

function trimLeading(s: string): string {
  return s.replace(/^[ \t\n]+/, '');
}

/** 錯誤歸屬用的標籤：只取第一個實體行 */
function labelOf(line: string): string {
  const [first, , multi] = cut(line, '\n');
  return multi ? `${first} ${CONTINUATION} ...` : first;
}

/**
 * 將腳本切成邏輯指令行
 *
 * 以 `\` 結尾的行會與下一行接續（保留換行），接續後重新去除註解；
 * 腳本最後一行的 `\` 不視為接續。空白行略過。
 */
export function tokenizeScript(script: string): ScriptCommand[] {
  const commands: ScriptCommand[] = [];
  let text = script;

  while (text !== '') {
    let line: string;
    [line, text] = cut(text, '\n');
    line = trimComments(line);
    while (line.endsWith(CONTINUATION) && text !== '') {
      let next: string;
      [next, text] = cut(text, '\n');
      line = line.slice(0, -1) + '\n' + next;
      line = trimComments(line);
    }

    line = trimLeading(line);
    if (line === '') continue;

    const [name, rest] = cutAny(line, ' \t\n');
    commands.push({
      name,
      args: trimLeading(rest),
      line,
      label: labelOf(line),
    });
  }

  return commands;
}
