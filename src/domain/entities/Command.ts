/** 腳本中的一個邏輯指令行（可能由多個實體行以 `\` 接續而成） */
export interface ScriptCommand {
  name: string;
  args: string;
  /** 完整的邏輯行，接續處保留換行 */
  line: string;
  /** 第一個實體行；跨多行時附加 ` \ ...`，僅用於錯誤歸屬 */
  label: string;
}
