import type { Node, NodeOfType, NodeType } from '../types/nodes';
import { readField } from './fields';
import { isNodeOfType } from './guards';
import { declarationOrderFields } from './schema';

/**
 * Whole-tree scan.
 *
 * Yields every node reachable from `root` (including `root`) in document
 * order: pre-order, children in schema declaration order. When `type` is
 * given, only nodes of that kind are yielded and the result is narrowed.
 *
 * Scans are meant for lookups and in-place edits of primitive fields (renaming
 * an identifier, clearing an annotation). Replacing whole nodes or splicing
 * statement lists during a scan is not supported; use `transform` instead.
 *
 * @example
 * ```ts
 * for (const name of walk(tree, 'Name')) {
 *   if (name.id === 'range') name.id = 'xrange';
 * }
 * ```
 */
export function walk(root: Node): Generator<Node>;
export function walk<T extends NodeType>(
  root: Node,
  type: T
): Generator<NodeOfType<T>>;

export function* walk(root: Node, type?: NodeType): Generator<Node> {
  const stack: Node[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (type === undefined || isNodeOfType(node, type)) yield node;

    const children: Node[] = [];
    for (const [name, kind] of declarationOrderFields(node.type)) {
      const field = readField(node, name, kind);
      if (field.kind === 'single') {
        if (field.node) children.push(field.node);
      } else {
        for (const child of field.nodes) {
          if (child) children.push(child);
        }
      }
    }

    // Push in reverse so that the first child is visited next.
    for (let index = children.length - 1; index >= 0; index--) {
      stack.push(children[index]);
    }
  }
}
