import { defineFixer } from '../define';
import { ExpansionOverflowError, StructuralAssumptionError } from '../errors';
import { builders as b, withPositionOf } from '../tree/builders';
import { readField, writeField } from '../tree/fields';
import { isExpression, isStatement } from '../tree/guards';
import type { FieldKind } from '../tree/schema';
import { rewriteOrderFields } from '../tree/schema';
import type {
  Call,
  Dict,
  Expr,
  List,
  Node,
  SetExpr,
  Stmt,
  Tuple
} from '../types/nodes';

/**
 * A block may grow to this many times its initial length while it is being
 * expanded. Past that, expansion is assumed to diverge.
 */
export const EXPANSION_GROWTH_LIMIT = 100;

type PositionalUnpackNode = Call | List | Tuple | SetExpr;

type KeywordUnpackNode = Call | Dict;

/**
 * Result of rewriting one node:
 * - `prefix`: statements to run before the enclosing statement,
 * - `value`: the node that takes the original's place,
 * - `cleanup`: statements to run after the enclosing statement.
 */
type NodeUpdate = {
  prefix: Stmt[];
  value: Node;
  cleanup: Stmt[];
};

/**
 * Result of rewriting a field in place.
 */
type FieldUpdate = {
  prefix: Stmt[];
  cleanup: Stmt[];
};

const LITERAL_CONSTRUCTORS = {
  List: 'list',
  Tuple: 'tuple',
  Set: 'set'
} as const;

function isPositionalUnpackNode(node: Node): node is PositionalUnpackNode {
  return (
    node.type === 'Call' ||
    node.type === 'List' ||
    node.type === 'Tuple' ||
    node.type === 'Set'
  );
}

function isKeywordUnpackNode(node: Node): node is KeywordUnpackNode {
  return node.type === 'Call' || node.type === 'Dict';
}

/**
 * `true` when a spread entry is followed by any other entry. A single
 * trailing spread is supported by every target and needs no rewrite.
 */
function hasEntryAfterSpread<T>(
  entries: readonly T[],
  isSpread: (entry: T) => boolean
): boolean {
  let seenSpread = false;
  for (const entry of entries) {
    if (seenSpread) return true;
    seenSpread = isSpread(entry);
  }
  return false;
}

/**
 * Only calls and displays are rewritten. A list or tuple in `Store` or `Del`
 * context is an unpacking target such as `*a, b = xs` and stays as is.
 */
export function hasPositionalUnpacking(node: PositionalUnpackNode): boolean {
  if (node.type === 'Call') {
    return hasEntryAfterSpread(node.args, arg => arg.type === 'Starred');
  }
  if (node.type !== 'Set' && node.ctx !== 'Load') return false;
  return hasEntryAfterSpread(node.elts, element => element.type === 'Starred');
}

export function hasKeywordUnpacking(node: KeywordUnpackNode): boolean {
  return node.type === 'Call'
    ? hasEntryAfterSpread(node.keywords, keyword => keyword.arg === null)
    : hasEntryAfterSpread(node.keys, key => key === null);
}

/**
 * Expressions in these positions run later than the enclosing statement, or
 * not at all, so nothing they contain can be hoisted in front of it.
 * Assertions are skipped entirely under `-O`.
 * Lambdas are handled separately by converting them to functions.
 */
function isDeferredPosition(parent: Node, field: string, index: number): boolean {
  switch (parent.type) {
    case 'ListComp':
    case 'SetComp':
    case 'DictComp':
    case 'GeneratorExp':
      return true;
    case 'IfExp':
      return field !== 'test';
    case 'BoolOp':
      return index > 0;
    case 'While':
      return field === 'test';
    case 'Assert':
      return true;
    case 'ExceptHandler':
      return field === 'exc_type';
    default:
      return false;
  }
}

function statementsOf(node: Node, field: string): Stmt[] {
  const value = readField(node, field, 'block');
  const statements: Stmt[] = [];
  if (value.kind === 'many') {
    for (const child of value.nodes) {
      if (child && isStatement(child)) statements.push(child);
    }
  }
  return statements;
}

/**
 * Creates the expansion routines of one fixer instance. Temporary names are
 * numbered by a counter private to the instance.
 */
function createExpander() {
  let counter = 0;

  function nextName(kind: 'args' | 'kwargs' | 'lambda'): string {
    return `upg_${kind}_${counter++}`;
  }

  /**
   * `f(*a, 1, *b)` ->
   * ```python
   * upg_args_0 = []
   * upg_args_0.extend(a)
   * upg_args_0.append(1)
   * upg_args_0.extend(b)
   * f(*upg_args_0)
   * del upg_args_0
   * ```
   * List, tuple and set displays become calls of their constructor.
   */
  function expandPositional(node: PositionalUnpackNode): NodeUpdate {
    const temp = nextName('args');
    const prefix: Stmt[] = [b.assign([b.name(temp, 'Store')], b.list([]))];

    const elements = node.type === 'Call' ? node.args : node.elts;
    for (const element of elements) {
      const call =
        element.type === 'Starred'
          ? b.call(b.attribute(b.name(temp), 'extend'), [element.value])
          : b.call(b.attribute(b.name(temp), 'append'), [element]);
      prefix.push(b.expr(call));
    }

    const replacement =
      node.type === 'Call'
        ? b.call(node.func, [b.starred(b.name(temp))], node.keywords)
        : b.call(
            b.name(LITERAL_CONSTRUCTORS[node.type]),
            [b.starred(b.name(temp))]
          );

    return {
      prefix,
      value: withPositionOf(replacement, node),
      cleanup: [b.delete([b.name(temp, 'Del')])]
    };
  }

  /**
   * `f(**a, x=1)` ->
   * ```python
   * upg_kwargs_0 = {}
   * upg_kwargs_0.update(a)
   * upg_kwargs_0["x"] = 1
   * f(**upg_kwargs_0)
   * del upg_kwargs_0
   * ```
   * Dict displays become `dict(**temp)` and must have string keys.
   */
  function expandKeyword(node: KeywordUnpackNode): NodeUpdate {
    const temp = nextName('kwargs');
    const prefix: Stmt[] = [b.assign([b.name(temp, 'Store')], b.dict([], []))];

    const addEntry = (key: Expr | null, value: Expr) => {
      if (key === null) {
        prefix.push(
          b.expr(b.call(b.attribute(b.name(temp), 'update'), [value]))
        );
        return;
      }
      if (key.type !== 'Constant' || typeof key.value !== 'string') {
        throw new StructuralAssumptionError(
          `Cannot expand a mapping with a non-string key (${key.type}).`,
          key
        );
      }
      prefix.push(
        b.assign([b.subscript(b.name(temp), key, 'Store')], value)
      );
    };

    let replacement: Call;
    if (node.type === 'Call') {
      for (const keyword of node.keywords) {
        addEntry(
          keyword.arg === null ? null : b.constant(keyword.arg),
          keyword.value
        );
      }
      replacement = b.call(node.func, node.args, [
        b.keyword(null, b.name(temp))
      ]);
    } else {
      node.values.forEach((value, index) => {
        addEntry(node.keys[index] ?? null, value);
      });
      replacement = b.call(b.name('dict'), [], [b.keyword(null, b.name(temp))]);
    }

    return {
      prefix,
      value: withPositionOf(replacement, node),
      cleanup: [b.delete([b.name(temp, 'Del')])]
    };
  }

  /**
   * Expands the unpacking of `expr` itself, positional first. Nested
   * unpacking ends up in the generated statements and is expanded on the
   * next pass over the block.
   */
  function makeValueUpdate(expr: Node): NodeUpdate | null {
    const prefix: Stmt[] = [];
    const cleanup: Stmt[] = [];
    let value = expr;

    if (isPositionalUnpackNode(value) && hasPositionalUnpacking(value)) {
      const update = expandPositional(value);
      prefix.push(...update.prefix);
      cleanup.push(...update.cleanup);
      value = update.value;
    }

    if (isKeywordUnpackNode(value) && hasKeywordUnpacking(value)) {
      const update = expandKeyword(value);
      prefix.push(...update.prefix);
      cleanup.push(...update.cleanup);
      value = update.value;
    }

    return prefix.length > 0 ? { prefix, value, cleanup } : null;
  }

  function makeNodeUpdate(node: Node): NodeUpdate | null {
    if (isExpression(node)) {
      const update = makeValueUpdate(node);
      if (update) return update;
    }

    const prefix: Stmt[] = [];
    const cleanup: Stmt[] = [];
    let value = node;

    for (const [name, kind] of rewriteOrderFields(node.type)) {
      if (kind === 'block') {
        if (node.type !== 'ExceptHandler') {
          throw new StructuralAssumptionError(
            `Unexpected statement list "${name}" inside ${node.type}.`,
            node
          );
        }
        node.body = expandBlock(node.body);
        continue;
      }

      const update = makeFieldUpdate(node, name, kind);
      if (!update) continue;

      if (node.type === 'Lambda' && name === 'body') {
        // The hoisted statements may read the lambda's parameters and
        // must run on each call, so the lambda becomes a function.
        const functionName = nextName('lambda');
        prefix.push(
          b.functionDef(functionName, node.args, [
            ...update.prefix,
            b.return(node.body)
          ])
        );
        cleanup.push(b.delete([b.name(functionName, 'Del')]));
        value = withPositionOf(b.name(functionName), node);
      } else {
        prefix.push(...update.prefix);
        cleanup.push(...update.cleanup);
      }
    }

    return prefix.length > 0 ? { prefix, value, cleanup } : null;
  }

  function assertEager(parent: Node, field: string, index: number): void {
    if (isDeferredPosition(parent, field, index)) {
      throw new StructuralAssumptionError(
        `Cannot hoist unpacking out of the "${field}" field of ${parent.type}.`,
        parent
      );
    }
  }

  /**
   * Rewrites the children held by one non-block field of `parent`, writing
   * the replacements back into the field.
   */
  function makeFieldUpdate(
    parent: Node,
    field: string,
    kind: FieldKind
  ): FieldUpdate | null {
    const current = readField(parent, field, kind);

    if (current.kind === 'single') {
      if (!current.node) return null;
      const update = makeNodeUpdate(current.node);
      if (!update) return null;

      assertEager(parent, field, 0);
      writeField(parent, field, update.value);
      return { prefix: update.prefix, cleanup: update.cleanup };
    }

    const prefix: Stmt[] = [];
    const cleanup: Stmt[] = [];
    const next: Array<Node | null> = [];

    current.nodes.forEach((child, index) => {
      const update = child ? makeNodeUpdate(child) : null;
      if (!update) {
        next.push(child);
        return;
      }
      assertEager(parent, field, index);
      prefix.push(...update.prefix);
      cleanup.push(...update.cleanup);
      next.push(update.value);
    });

    if (prefix.length === 0) return null;

    writeField(parent, field, next);
    return { prefix, cleanup };
  }

  /**
   * Splices the hoisted statements of `statement` around it. Nested blocks
   * are expanded after the statement's own fields. Cleanup is dropped after
   * a `return`, where the temporaries go out of scope anyway.
   */
  function expandStatement(statement: Stmt): Stmt[] {
    const before: Stmt[] = [];
    const after: Stmt[] = [];

    for (const [name, kind] of rewriteOrderFields(statement.type)) {
      if (kind === 'block') {
        writeField(statement, name, expandBlock(statementsOf(statement, name)));
        continue;
      }

      const update = makeFieldUpdate(statement, name, kind);
      if (!update) continue;

      before.push(...update.prefix);
      if (statement.type !== 'Return') after.push(...update.cleanup);
    }

    return [...before, statement, ...after];
  }

  /**
   * Expands a block until a pass leaves its length unchanged.
   *
   * @throws ExpansionOverflowError once the block outgrows
   *         `EXPANSION_GROWTH_LIMIT` times its initial length.
   */
  function expandBlock(block: readonly Stmt[]): Stmt[] {
    const initialLength = block.length;
    let current = [...block];
    let previousLength = -1;

    while (current.length !== previousLength) {
      if (current.length > initialLength * EXPANSION_GROWTH_LIMIT) {
        throw new ExpansionOverflowError(initialLength, EXPANSION_GROWTH_LIMIT);
      }
      previousLength = current.length;
      current = current.flatMap(statement => expandStatement(statement));
    }

    return current;
  }

  return { expandBlock };
}

/**
 * Unpacking generalizations -> explicit temporaries.
 *
 * Calls and displays that have anything after a `*` or `**` entry are
 * rebuilt from a temporary list or dict filled by ordinary statements in
 * source order, and called with a single spread of it:
 *
 * ```python
 * print(*a, *b, sep="")
 * # becomes
 * upg_args_0 = []
 * upg_args_0.extend(a)
 * upg_args_0.extend(b)
 * print(*upg_args_0, sep="")
 * del upg_args_0
 * ```
 */
export const unpackingGeneralizations = defineFixer({
  name: 'unpacking-generalizations',
  description:
    'Hoists calls and displays with several unpackings into temporaries.',
  versionInfo: { applySince: '2.0', applyUntil: '3.4' },
  createTransform: () => {
    const { expandBlock } = createExpander();
    return tree => {
      tree.body = expandBlock(tree.body);
      return tree;
    };
  }
});
