import { Node, type Identifier, type Type } from 'ts-morph';

/**
 * The first identifier of a (possibly qualified) name: `ns` in `ns.User`.
 */
export function leftmostIdentifier(node: Node): Identifier | undefined {
  if (Node.isIdentifier(node)) return node;
  if (Node.isQualifiedName(node)) return leftmostIdentifier(node.getLeft());
  if (Node.isPropertyAccessExpression(node)) return leftmostIdentifier(node.getExpression());
  return undefined;
}

/**
 * True when the identifier resolves to a declaration. An import of a module
 * that cannot be found yields an alias with nothing behind it.
 */
export function isResolvable(identifier: Identifier): boolean {
  const symbol = identifier.getSymbol();
  if (!symbol) return false;
  if (!symbol.isAlias()) return symbol.getDeclarations().length > 0;
  const target = symbol.getAliasedSymbol();
  return target !== undefined && target.getDeclarations().length > 0;
}

/**
 * True when every declaration of the type's symbol lives in the installed
 * package `packageName`.
 */
export function isDeclaredInPackage(type: Type, packageName: string): boolean {
  const declarations = type.getSymbol()?.getDeclarations() ?? [];
  const marker = `/node_modules/${packageName}/`;
  return (
    declarations.length > 0 &&
    declarations.every((declaration) => declaration.getSourceFile().getFilePath().includes(marker))
  );
}
