import ts from 'typescript';
import type { ItemArena, ItemId, ItemKind } from '../../domain/entities/Item.js';

/** enum 成員之後的分隔逗號 */
const TRAILING_COMMA = /\s*,/y;

type NameNode = ts.Identifier | ts.PrivateIdentifier | ts.StringLiteral | ts.NumericLiteral;
type MemberNode = ts.ClassElement | ts.TypeElement | ts.EnumMember;

function nameText(name: ts.PropertyName | undefined): NameNode | undefined {
  if (!name) return undefined;
  if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
    return name;
  }
  return undefined;
}

function memberKind(member: MemberNode): ItemKind | undefined {
  if (ts.isMethodDeclaration(member) || ts.isMethodSignature(member)) return 'method';
  if (ts.isPropertyDeclaration(member) || ts.isPropertySignature(member)) return 'property';
  if (ts.isGetAccessorDeclaration(member) || ts.isSetAccessorDeclaration(member)) return 'accessor';
  if (ts.isEnumMember(member)) return 'member';
  return undefined;
}

/**
 * 將 source file 中的具名宣告加入 arena
 *
 * 收集範圍：頂層宣告、class / interface / enum 成員、namespace 內的宣告。
 */
export function collectItems(arena: ItemArena, sf: ts.SourceFile, file: string): void {
  const add = (node: ts.Node, nameNode: NameNode, kind: ItemKind, outer: ItemId | null, end = node.end): ItemId =>
    arena.add({
      name: nameNode.text,
      kind,
      outer,
      file,
      pos: node.getFullStart(),
      end,
      nameStart: nameNode.getStart(sf),
      removable: true,
    });

  // interface 成員的 `;` / `,` 屬於節點本身，enum 成員的逗號則不是
  const memberEnd = (member: MemberNode): number => {
    if (!ts.isEnumMember(member)) return member.end;
    TRAILING_COMMA.lastIndex = member.end;
    return TRAILING_COMMA.test(sf.text) ? TRAILING_COMMA.lastIndex : member.end;
  };

  const addMembers = (members: readonly MemberNode[], outer: ItemId): void => {
    for (const member of members) {
      const kind = memberKind(member);
      const name = nameText(member.name);
      if (kind && name) add(member, name, kind, outer, memberEnd(member));
    }
  };

  const visit = (stmt: ts.Statement, outer: ItemId | null): void => {
    if (ts.isFunctionDeclaration(stmt) && stmt.name) {
      add(stmt, stmt.name, 'function', outer);
    } else if (ts.isClassDeclaration(stmt) && stmt.name) {
      addMembers(stmt.members, add(stmt, stmt.name, 'class', outer));
    } else if (ts.isInterfaceDeclaration(stmt)) {
      addMembers(stmt.members, add(stmt, stmt.name, 'interface', outer));
    } else if (ts.isTypeAliasDeclaration(stmt)) {
      add(stmt, stmt.name, 'type', outer);
    } else if (ts.isEnumDeclaration(stmt)) {
      addMembers(stmt.members, add(stmt, stmt.name, 'enum', outer));
    } else if (ts.isVariableStatement(stmt)) {
      const decls = stmt.declarationList.declarations;
      const single = decls.length === 1;
      for (const decl of decls) {
        if (!ts.isIdentifier(decl.name)) continue;
        arena.add({
          name: decl.name.text,
          kind: 'variable',
          outer,
          file,
          pos: single ? stmt.getFullStart() : decl.getFullStart(),
          end: single ? stmt.end : decl.end,
          nameStart: decl.name.getStart(sf),
          removable: single,
          statementEnd: single ? undefined : stmt.end,
        });
      }
    } else if (ts.isModuleDeclaration(stmt) && ts.isIdentifier(stmt.name)) {
      const id = add(stmt, stmt.name, 'namespace', outer);
      if (stmt.body && ts.isModuleBlock(stmt.body)) {
        for (const inner of stmt.body.statements) visit(inner, id);
      }
    }
  };

  for (const stmt of sf.statements) visit(stmt, null);
}
