import { StructuralAssumptionError } from '../errors';
import type { Module, Node } from '../types/nodes';
import { readField, writeField } from './fields';
import { isModule, isStatement } from './guards';
import { rewriteOrderFields } from './schema';

/**
 * Deletion marker.
 *
 * Returned by a visitor handler to drop the visited node: removed from a list
 * or block field, or nulled in an optional field.
 */
export const REMOVE: unique symbol = Symbol('py-backport.remove');

/**
 * Result of a visitor handler.
 *
 * - `undefined`: keep the node.
 * - `Node`: replace the node.
 * - `Node[]`: replace the node by several siblings (list/block fields only).
 * - `REMOVE`: drop the node.
 */
export type VisitResult = Node | readonly Node[] | typeof REMOVE | undefined;

export type VisitHandler = (node: Node) => VisitResult;

/**
 * Structural visitor.
 *
 * - `enter` runs before the node's children. A replacement returned by `enter`
 *   is not re-entered, but its children are traversed.
 * - `exit` runs after the node's children have been rewritten (bottom-up).
 *
 * Handlers switch on `node.type`; every kind is delivered to them.
 */
export type TreeVisitor = {
  enter?: VisitHandler;
  exit?: VisitHandler;
};

/**
 * Normalized outcome of visiting one node.
 */
type Replacement = readonly Node[] | typeof REMOVE;

/**
 * Structural transform over a tree.
 *
 * Children are visited in rewrite order (non-block fields first, then block
 * fields, each group by name). Replacements are written back into the
 * parent's field in place; the (possibly replaced) root is returned.
 *
 * @throws StructuralAssumptionError
 * - when a handler returns several nodes or `REMOVE` for a required single
 *   child, or for the root;
 * - when a non-statement node ends up in a block field.
 */
export function transform(root: Node, visitor: TreeVisitor): Node {
  const result = visitNode(root, visitor);

  if (result === REMOVE || result.length !== 1) {
    throw new StructuralAssumptionError(
      'The root node must be replaced by exactly one node.',
      root
    );
  }

  return result[0];
}

/**
 * `transform` for whole modules: the root must stay a `Module`.
 *
 * @throws StructuralAssumptionError if the visitor replaced the root by
 *         anything else.
 */
export function transformModule(tree: Module, visitor: TreeVisitor): Module {
  const result = transform(tree, visitor);
  if (!isModule(result)) {
    throw new StructuralAssumptionError(
      `The module root was replaced by ${result.type}.`,
      result
    );
  }
  return result;
}

function normalize(result: VisitResult, node: Node): Replacement {
  if (result === undefined) return [node];
  if (result === REMOVE) return REMOVE;
  if (isNodeList(result)) return result;
  return [result];
}

function isNodeList(value: Node | readonly Node[]): value is readonly Node[] {
  return Array.isArray(value);
}

function visitNode(node: Node, visitor: TreeVisitor): Replacement {
  const entered = normalize(visitor.enter?.(node), node);
  if (entered === REMOVE) return REMOVE;

  const output: Node[] = [];
  for (const current of entered) {
    visitChildren(current, visitor);
    const exited = normalize(visitor.exit?.(current), current);
    if (exited !== REMOVE) output.push(...exited);
  }

  return output;
}

function visitChildren(node: Node, visitor: TreeVisitor): void {
  for (const [name, kind] of rewriteOrderFields(node.type)) {
    const field = readField(node, name, kind);

    if (field.kind === 'single') {
      if (!field.node) continue;

      const replacement = visitNode(field.node, visitor);

      if (replacement === REMOVE || replacement.length === 0) {
        if (kind !== 'optional') {
          throw new StructuralAssumptionError(
            `Cannot remove the required "${name}" field of ${node.type}.`,
            node
          );
        }
        writeField(node, name, null);
        continue;
      }

      if (replacement.length > 1) {
        throw new StructuralAssumptionError(
          `The "${name}" field of ${node.type} holds a single node; got ${replacement.length}.`,
          node
        );
      }

      writeField(node, name, replacement[0]);
      continue;
    }

    const next: Array<Node | null> = [];
    for (const child of field.nodes) {
      if (!child) {
        next.push(null);
        continue;
      }
      const replacement = visitNode(child, visitor);
      if (replacement !== REMOVE) next.push(...replacement);
    }

    if (kind === 'block') {
      for (const statement of next) {
        if (statement && !isStatement(statement)) {
          throw new StructuralAssumptionError(
            `Statement list "${name}" of ${node.type} cannot hold ${statement.type}.`,
            statement
          );
        }
      }
    }

    writeField(node, name, next);
  }
}
