import { defineChecker } from '../define';
import { CheckerViolationError } from '../errors';
import { walk } from '../tree/walk';
import type { Node } from '../types/nodes';

const GUARDED_BUILTINS: ReadonlySet<string> = new Set([
  'map',
  'zip',
  'filter',
  'range'
]);

/**
 * Names a node binds in its scope.
 */
function boundNames(node: Node): string[] {
  switch (node.type) {
    case 'Name':
      return node.ctx === 'Load' ? [] : [node.id];
    case 'FunctionDef':
    case 'AsyncFunctionDef':
    case 'ClassDef':
      return [node.name];
    case 'arg':
      return [node.arg];
    case 'ExceptHandler':
      return node.name === null ? [] : [node.name];
    case 'Import':
      // `import a.b` binds `a`.
      return node.names.map(alias => alias.asname ?? alias.name.split('.')[0]);
    case 'ImportFrom':
      return node.names.map(alias => alias.asname ?? alias.name);
    default:
      return [];
  }
}

export const noOverriddenBuiltins = defineChecker({
  name: 'no-overridden-builtins',
  description:
    'Rejects rebinding `map`, `zip`, `filter` or `range`, which other fixers rename.',
  versionInfo: { applySince: '1.0', applyUntil: '2.7' },
  guards: ['range-to-xrange', 'itertools-builtins'],
  check: tree => {
    for (const node of walk(tree)) {
      for (const name of boundNames(node)) {
        if (!GUARDED_BUILTINS.has(name)) continue;
        throw new CheckerViolationError(
          'no-overridden-builtins',
          `The builtin "${name}" must not be rebound.`,
          node
        );
      }
    }
  }
});
