import type { Node } from '../types/nodes';
import { isNode } from './guards';
import type { FieldKind } from './schema';

/**
 * Value held by a child-bearing field, as seen by generic traversal.
 */
export type FieldValue =
  | { kind: 'single'; node: Node | null }
  | { kind: 'many'; nodes: Array<Node | null> };

/**
 * Reads a child-bearing field generically.
 *
 * Nodes are plain objects, so the node is viewed as a string-keyed record.
 * Values that do not match the declared field kind are reported as empty so
 * that traversal never descends into foreign data.
 */
export function readField(
  node: Node,
  name: string,
  kind: FieldKind
): FieldValue {
  const record: Readonly<Record<string, unknown>> = node;
  const value = record[name];

  if (kind === 'list' || kind === 'block') {
    if (!Array.isArray(value)) return { kind: 'many', nodes: [] };
    const nodes: Array<Node | null> = [];
    for (const item of value) {
      nodes.push(isNode(item) ? item : null);
    }
    return { kind: 'many', nodes };
  }

  return { kind: 'single', node: isNode(value) ? value : null };
}

/**
 * Overwrites a child-bearing field in place.
 *
 * Ownership: the previous child is dropped from the parent outright; callers
 * must not keep aliasing it in another position of the tree.
 */
export function writeField(
  node: Node,
  name: string,
  value: Node | null | Array<Node | null>
): void {
  const record: Record<string, unknown> = node;
  record[name] = value;
}
