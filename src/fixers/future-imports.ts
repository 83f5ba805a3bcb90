import { defineFixer } from '../define';
import type { FixerDefinition, VersionInfoInit } from '../types/fixer';

/**
 * Builds a fixer that leaves the tree untouched and requires
 * `from __future__ import <feature>` in the output.
 *
 * Windows follow the `__future__` module documentation: the feature is
 * optional from the release that introduced it until the one that made it
 * mandatory.
 */
function defineFutureImportFixer(
  name: string,
  feature: string,
  versionInfo: VersionInfoInit
): FixerDefinition {
  return defineFixer({
    name,
    description: `Requires \`from __future__ import ${feature}\`.`,
    versionInfo,
    createTransform: () => (tree, requireImport) => {
      requireImport({ module: '__future__', member: feature });
      return tree;
    }
  });
}

export const nestedScopesFuture = defineFutureImportFixer(
  'nested-scopes-future',
  'nested_scopes',
  { applySince: '2.1', applyUntil: '2.1' }
);

export const generatorsFuture = defineFutureImportFixer(
  'generators-future',
  'generators',
  { applySince: '2.2', applyUntil: '2.2' }
);

export const divisionFuture = defineFutureImportFixer(
  'division-future',
  'division',
  { applySince: '2.2', applyUntil: '2.7' }
);

export const absoluteImportFuture = defineFutureImportFixer(
  'absolute-import-future',
  'absolute_import',
  { applySince: '2.5', applyUntil: '2.7' }
);

export const withStatementFuture = defineFutureImportFixer(
  'with-statement-future',
  'with_statement',
  { applySince: '2.5', applyUntil: '2.5' }
);

export const printFunctionFuture = defineFutureImportFixer(
  'print-function-future',
  'print_function',
  { applySince: '2.6', applyUntil: '2.7' }
);

export const unicodeLiteralsFuture = defineFutureImportFixer(
  'unicode-literals-future',
  'unicode_literals',
  { applySince: '2.6', applyUntil: '2.7' }
);

export const generatorStopFuture = defineFutureImportFixer(
  'generator-stop-future',
  'generator_stop',
  { applySince: '3.5', applyUntil: '3.6' }
);
