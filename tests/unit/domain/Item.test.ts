import { describe, it, expect } from 'vitest';
import { ItemArena, type NewItem } from '../../../src/domain/entities/Item.js';

function item(name: string, outer: number | null, file = 'src/cart.ts'): NewItem {
  return { name, kind: outer === null ? 'class' : 'method', outer, file, pos: 0, end: 0, nameStart: 0, removable: true };
}

describe('ItemArena', () => {
  it('should walk outer references to the top-level declaration', () => {
    const arena = new ItemArena();
    const ns = arena.add(item('Shop', null));
    const cls = arena.add(item('Cart', ns));
    const method = arena.add(item('total', cls));

    expect(arena.top(method).name).toBe('Shop');
    expect(arena.top(ns).name).toBe('Shop');
  });

  it('should find items by name path within one file', () => {
    const arena = new ItemArena();
    const cls = arena.add(item('Cart', null));
    arena.add(item('total', cls));
    arena.add(item('Cart', null, 'src/other.ts'));

    expect(arena.find('src/cart.ts', ['Cart', 'total'])?.outer).toBe(cls);
    expect(arena.find('src/cart.ts', ['Cart', 'missing'])).toBeUndefined();
    expect(arena.find('src/other.ts', ['Cart'])?.file).toBe('src/other.ts');
  });

  it('should build qualified names', () => {
    const arena = new ItemArena();
    const cls = arena.add(item('Cart', null));
    const method = arena.add(item('total', cls));

    expect(arena.qualifiedName(method)).toBe('Cart.total');
    expect(arena.size).toBe(2);
  });

  it('should reject unknown ids', () => {
    const arena = new ItemArena();

    expect(() => arena.get(3)).toThrow('unknown item id 3');
  });
});
