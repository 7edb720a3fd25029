import fs from 'node:fs/promises';
import path from 'node:path';
import type { WorkspaceFsPort } from '../../domain/ports/WorkspaceFsPort.js';

/** 以 node:fs 讀寫 workspace 檔案；寫入時自動建立目錄 */
export class NodeWorkspaceFs implements WorkspaceFsPort {
  async readFile(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
  }
}
