import type { NodeOfType, NodeType } from '../types/nodes';

/**
 * How a child-bearing field holds its children.
 *
 * - `node`:     exactly one child node.
 * - `optional`: one child node or `null`.
 * - `list`:     ordered children; `null` entries are positional placeholders
 *               (e.g. `Dict.keys` for `**mapping` entries).
 * - `block`:    ordered statement list (`body`, `orelse`, `finalbody`).
 */
export type FieldKind = 'node' | 'optional' | 'list' | 'block';

export type NodeCategory = 'mod' | 'stmt' | 'expr' | 'helper';

type ChildFieldName<N> = Exclude<keyof N, 'type' | 'position' | 'data'>;

export type NodeSchema<T extends NodeType> = {
  category: NodeCategory;
  /**
   * Child-bearing fields in declaration (source) order.
   * Primitive fields (`id`, `attr`, `op`, `ctx`, ...) are not listed.
   */
  fields: { readonly [F in ChildFieldName<NodeOfType<T>>]?: FieldKind };
};

type SchemaTable = { readonly [T in NodeType]: NodeSchema<T> };

const functionFields = {
  decorator_list: 'list',
  args: 'node',
  returns: 'optional',
  body: 'block'
} as const;

/**
 * Field schema per node kind.
 *
 * The table is the single source of truth for generic traversal: the walker
 * and the transformer never look at fields that are not listed here.
 */
export const NODE_SCHEMAS: SchemaTable = {
  Module: { category: 'mod', fields: { body: 'block' } },

  FunctionDef: { category: 'stmt', fields: functionFields },
  AsyncFunctionDef: { category: 'stmt', fields: functionFields },
  ClassDef: {
    category: 'stmt',
    fields: {
      decorator_list: 'list',
      bases: 'list',
      keywords: 'list',
      body: 'block'
    }
  },
  Return: { category: 'stmt', fields: { value: 'optional' } },
  Delete: { category: 'stmt', fields: { targets: 'list' } },
  Assign: { category: 'stmt', fields: { targets: 'list', value: 'node' } },
  AugAssign: { category: 'stmt', fields: { target: 'node', value: 'node' } },
  AnnAssign: {
    category: 'stmt',
    fields: { target: 'node', annotation: 'node', value: 'optional' }
  },
  For: {
    category: 'stmt',
    fields: { target: 'node', iter: 'node', body: 'block', orelse: 'block' }
  },
  While: {
    category: 'stmt',
    fields: { test: 'node', body: 'block', orelse: 'block' }
  },
  If: {
    category: 'stmt',
    fields: { test: 'node', body: 'block', orelse: 'block' }
  },
  With: { category: 'stmt', fields: { items: 'list', body: 'block' } },
  Raise: { category: 'stmt', fields: { exc: 'optional', cause: 'optional' } },
  Try: {
    category: 'stmt',
    fields: {
      body: 'block',
      handlers: 'list',
      orelse: 'block',
      finalbody: 'block'
    }
  },
  Assert: { category: 'stmt', fields: { test: 'node', msg: 'optional' } },
  Import: { category: 'stmt', fields: { names: 'list' } },
  ImportFrom: { category: 'stmt', fields: { names: 'list' } },
  Global: { category: 'stmt', fields: {} },
  Nonlocal: { category: 'stmt', fields: {} },
  Expr: { category: 'stmt', fields: { value: 'node' } },
  Pass: { category: 'stmt', fields: {} },
  Break: { category: 'stmt', fields: {} },
  Continue: { category: 'stmt', fields: {} },

  BoolOp: { category: 'expr', fields: { values: 'list' } },
  BinOp: { category: 'expr', fields: { left: 'node', right: 'node' } },
  UnaryOp: { category: 'expr', fields: { operand: 'node' } },
  Lambda: { category: 'expr', fields: { args: 'node', body: 'node' } },
  IfExp: {
    category: 'expr',
    fields: { test: 'node', body: 'node', orelse: 'node' }
  },
  Dict: { category: 'expr', fields: { keys: 'list', values: 'list' } },
  Set: { category: 'expr', fields: { elts: 'list' } },
  ListComp: { category: 'expr', fields: { elt: 'node', generators: 'list' } },
  SetComp: { category: 'expr', fields: { elt: 'node', generators: 'list' } },
  DictComp: {
    category: 'expr',
    fields: { key: 'node', value: 'node', generators: 'list' }
  },
  GeneratorExp: {
    category: 'expr',
    fields: { elt: 'node', generators: 'list' }
  },
  Await: { category: 'expr', fields: { value: 'node' } },
  Yield: { category: 'expr', fields: { value: 'optional' } },
  YieldFrom: { category: 'expr', fields: { value: 'node' } },
  Compare: { category: 'expr', fields: { left: 'node', comparators: 'list' } },
  Call: {
    category: 'expr',
    fields: { func: 'node', args: 'list', keywords: 'list' }
  },
  FormattedValue: {
    category: 'expr',
    fields: { value: 'node', format_spec: 'optional' }
  },
  JoinedStr: { category: 'expr', fields: { values: 'list' } },
  Constant: { category: 'expr', fields: {} },
  Attribute: { category: 'expr', fields: { value: 'node' } },
  Subscript: { category: 'expr', fields: { value: 'node', slice: 'node' } },
  Starred: { category: 'expr', fields: { value: 'node' } },
  Name: { category: 'expr', fields: {} },
  List: { category: 'expr', fields: { elts: 'list' } },
  Tuple: { category: 'expr', fields: { elts: 'list' } },
  Slice: {
    category: 'expr',
    fields: { lower: 'optional', upper: 'optional', step: 'optional' }
  },

  arguments: {
    category: 'helper',
    fields: {
      posonlyargs: 'list',
      args: 'list',
      vararg: 'optional',
      kwonlyargs: 'list',
      kw_defaults: 'list',
      kwarg: 'optional',
      defaults: 'list'
    }
  },
  arg: { category: 'helper', fields: { annotation: 'optional' } },
  keyword: { category: 'helper', fields: { value: 'node' } },
  alias: { category: 'helper', fields: {} },
  withitem: {
    category: 'helper',
    fields: { context_expr: 'node', optional_vars: 'optional' }
  },
  comprehension: {
    category: 'helper',
    fields: { target: 'node', iter: 'node', ifs: 'list' }
  },
  ExceptHandler: {
    category: 'helper',
    fields: { exc_type: 'optional', body: 'block' }
  }
};

export type FieldEntry = readonly [name: string, kind: FieldKind];

/**
 * Returns the child-bearing fields of a node kind in declaration order.
 * This is the "document order" used by whole-tree scans.
 */
export function declarationOrderFields(type: NodeType): readonly FieldEntry[] {
  const entries: Array<[string, FieldKind | undefined]> = Object.entries(
    NODE_SCHEMAS[type].fields
  );
  const result: FieldEntry[] = [];
  for (const [name, kind] of entries) {
    if (kind) result.push([name, kind]);
  }
  return result;
}

const rewriteOrderCache = new Map<NodeType, readonly FieldEntry[]>();

/**
 * Returns the child-bearing fields of a node kind in rewrite order.
 *
 * Ordering contract:
 * 1. Non-block fields come before block fields, so expression-level
 *    expansions of a statement are hoisted before nested blocks are entered.
 * 2. Within each group, fields sort by name.
 */
export function rewriteOrderFields(type: NodeType): readonly FieldEntry[] {
  const cached = rewriteOrderCache.get(type);
  if (cached) return cached;

  const sorted = [...declarationOrderFields(type)].sort(
    ([nameA, kindA], [nameB, kindB]) => {
      const groupA = kindA === 'block' ? 1 : 0;
      const groupB = kindB === 'block' ? 1 : 0;
      if (groupA !== groupB) return groupA - groupB;
      return nameA < nameB ? -1 : nameA > nameB ? 1 : 0;
    }
  );

  rewriteOrderCache.set(type, sorted);
  return sorted;
}

/**
 * Returns `true` when the node kind has at least one block field.
 */
export function hasBlockFields(type: NodeType): boolean {
  return declarationOrderFields(type).some(([, kind]) => kind === 'block');
}
