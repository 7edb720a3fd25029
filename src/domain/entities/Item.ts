export type ItemId = number;

export type ItemKind =
  | 'function'
  | 'class'
  | 'interface'
  | 'type'
  | 'enum'
  | 'variable'
  | 'namespace'
  | 'method'
  | 'property'
  | 'accessor'
  | 'member';

/** 具名宣告節點，只保留指向外層 scope 的 outer 參照 */
export interface ItemNode {
  id: ItemId;
  name: string;
  kind: ItemKind;
  outer: ItemId | null;
  /** 相對於 workspace root 的檔案路徑 */
  file: string;
  /** 宣告範圍（含前置 trivia）的起點 */
  pos: number;
  end: number;
  /** 名稱 identifier 的位置，用於 rename */
  nameStart: number;
  /** 移除時是否必須連同整個 statement（多重宣告的 variable 不可單獨移除） */
  removable: boolean;
  /** 所屬 statement 的結尾；只在 end 沒有涵蓋整個 statement 時設定 */
  statementEnd?: number;
}

export type NewItem = Omit<ItemNode, 'id'>;

/**
 * Item arena：以 id 存放 parent-linked 節點
 *
 * 設計意圖：宣告樹只需要「往外走」一個方向，
 * 因此不維護 children 參照，需要時以 outer 反查。
 */
export class ItemArena {
  private readonly nodes: ItemNode[] = [];

  add(item: NewItem): ItemId {
    const id = this.nodes.length;
    this.nodes.push({ ...item, id });
    return id;
  }

  get(id: ItemId): ItemNode {
    const node = this.nodes[id];
    if (!node) throw new RangeError(`unknown item id ${id}`);
    return node;
  }

  get size(): number {
    return this.nodes.length;
  }

  /** 沿 outer 走到根，回傳包住該 item 的頂層宣告 */
  top(id: ItemId): ItemNode {
    let node = this.get(id);
    while (node.outer !== null) {
      node = this.get(node.outer);
    }
    return node;
  }

  children(id: ItemId | null, file: string): ItemNode[] {
    return this.nodes.filter((n) => n.outer === id && n.file === file);
  }

  /**
   * 依名稱路徑查找，例如 ["Cart", "total"]
   * 同名宣告（overload、declaration merging）取第一個
   */
  find(file: string, path: readonly string[]): ItemNode | undefined {
    let outer: ItemId | null = null;
    let found: ItemNode | undefined;
    for (const name of path) {
      found = this.children(outer, file).find((n) => n.name === name);
      if (!found) return undefined;
      outer = found.id;
    }
    return found;
  }

  /** 名稱路徑，例如 "Cart.total" */
  qualifiedName(id: ItemId): string {
    const names: string[] = [];
    let node: ItemNode | undefined = this.get(id);
    while (node) {
      names.unshift(node.name);
      node = node.outer === null ? undefined : this.get(node.outer);
    }
    return names.join('.');
  }
}
