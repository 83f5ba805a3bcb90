import type { ImportDecl, ImportSet } from './types/fixer';
import type { Module, Stmt } from './types/nodes';
import { builders as b } from './tree/builders';

/**
 * `__future__` features in the order they were introduced.
 * Required future imports are emitted in this order, ahead of all others.
 */
export const FUTURE_IMPORT_ORDER: readonly string[] = [
  'nested_scopes',
  'generators',
  'division',
  'absolute_import',
  'with_statement',
  'print_function',
  'unicode_literals',
  'generator_stop'
];

/**
 * Canonical key of an import declaration: the JSON encoding of the
 * `(module, member)` pair. Position and request order do not matter.
 *
 * @example
 * importKey({ module: 'itertools', member: null }) // '["itertools",null]'
 */
export function importKey(decl: ImportDecl): string {
  return JSON.stringify([decl.module, decl.member]);
}

export function createImportSet(decls: Iterable<ImportDecl> = []): ImportSet {
  const set: ImportSet = new Map();
  for (const decl of decls) addImport(set, decl);
  return set;
}

/**
 * Adds a declaration unless an equal one is already present.
 * The first request fixes the position.
 */
export function addImport(set: ImportSet, decl: ImportDecl): void {
  const key = importKey(decl);
  if (!set.has(key)) set.set(key, { module: decl.module, member: decl.member });
}

/**
 * Unions several sets, keeping first-request order across them.
 */
export function mergeImportSets(sets: Iterable<ImportSet>): ImportSet {
  const merged: ImportSet = new Map();
  for (const set of sets) {
    for (const decl of set.values()) addImport(merged, decl);
  }
  return merged;
}

function futureRank(decl: ImportDecl): number {
  if (decl.module !== '__future__' || decl.member === null) return -1;
  const rank = FUTURE_IMPORT_ORDER.indexOf(decl.member);
  return rank === -1 ? FUTURE_IMPORT_ORDER.length : rank;
}

/**
 * Orders required imports for emission.
 *
 * 1. `__future__` member imports, by `FUTURE_IMPORT_ORDER` (unknown features
 *    after the known ones, in request order).
 * 2. Everything else, in first-request order.
 */
export function orderImports(decls: Iterable<ImportDecl>): ImportDecl[] {
  const unique = [...createImportSet(decls).values()];

  const future = unique
    .map((decl, index) => ({ decl, index, rank: futureRank(decl) }))
    .filter(entry => entry.rank >= 0)
    .sort((left, right) => left.rank - right.rank || left.index - right.index)
    .map(entry => entry.decl);

  const others = unique.filter(decl => futureRank(decl) < 0);

  return [...future, ...others];
}

function isDocstring(statement: Stmt | undefined): boolean {
  return (
    statement?.type === 'Expr' &&
    statement.value.type === 'Constant' &&
    typeof statement.value.value === 'string'
  );
}

/**
 * Collects the canonical keys of the imports a module already performs at its
 * top level.
 */
function collectExistingImports(tree: Module): Set<string> {
  const existing = new Set<string>();
  for (const statement of tree.body) {
    if (statement.type === 'Import') {
      for (const alias of statement.names) {
        if (alias.asname === null) {
          existing.add(importKey({ module: alias.name, member: null }));
        }
      }
    } else if (
      statement.type === 'ImportFrom' &&
      statement.module !== null &&
      statement.level === 0
    ) {
      for (const alias of statement.names) {
        if (alias.asname === null) {
          existing.add(
            importKey({ module: statement.module, member: alias.name })
          );
        }
      }
    }
  }
  return existing;
}

function toStatement(decl: ImportDecl): Stmt {
  return decl.member === null
    ? b.import([b.alias(decl.module)])
    : b.importFrom(decl.module, [b.alias(decl.member)]);
}

function isFutureImport(statement: Stmt | undefined): boolean {
  return statement?.type === 'ImportFrom' && statement.module === '__future__';
}

/**
 * Inserts import statements for `decls` at the top of the module, after a
 * leading docstring and any leading `__future__` imports, skipping those the
 * module already performs.
 *
 * `decls` are emitted in the given order; pass them through `orderImports`
 * first so that `__future__` imports come first.
 *
 * @returns The number of inserted statements.
 */
export function prependImports(
  tree: Module,
  decls: readonly ImportDecl[]
): number {
  const existing = collectExistingImports(tree);
  const statements = decls
    .filter(decl => !existing.has(importKey(decl)))
    .map(toStatement);

  if (statements.length === 0) return 0;

  let insertAt = isDocstring(tree.body[0]) ? 1 : 0;
  while (isFutureImport(tree.body[insertAt])) insertAt++;

  tree.body.splice(insertAt, 0, ...statements);
  return statements.length;
}
