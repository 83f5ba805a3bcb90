import type {
  Expr,
  Module,
  Node,
  NodeOfType,
  NodeType,
  Stmt
} from '../types/nodes';
import { NODE_SCHEMAS } from './schema';

/**
 * Checks whether a value is a non-null, non-array object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks whether a string is one of the known node discriminants.
 *
 * Uses `Object.hasOwn` so that prototype keys (`toString`, `constructor`)
 * are never mistaken for node kinds.
 */
export function isNodeType(value: string): value is NodeType {
  return Object.hasOwn(NODE_SCHEMAS, value);
}

/**
 * Checks whether a runtime value is node-like: an object whose `type`
 * discriminant names a known node kind.
 *
 * This is a shallow guard; field shapes are not validated.
 */
export function isNode(value: unknown): value is Node {
  return (
    isRecord(value) && typeof value.type === 'string' && isNodeType(value.type)
  );
}

/**
 * Narrows a node to the variant carrying the discriminant `type`.
 *
 * @example
 * ```ts
 * if (isNodeOfType(node, 'Call')) node.args; // Call
 * ```
 */
export function isNodeOfType<T extends NodeType>(
  node: Node | null | undefined,
  type: T
): node is NodeOfType<T> {
  return !!node && node.type === type;
}

export function isStatement(node: Node): node is Stmt {
  return NODE_SCHEMAS[node.type].category === 'stmt';
}

export function isExpression(node: Node): node is Expr {
  return NODE_SCHEMAS[node.type].category === 'expr';
}

export function isModule(value: unknown): value is Module {
  return isNode(value) && value.type === 'Module';
}
