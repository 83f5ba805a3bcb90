import type { Plugin, Transformer } from 'unified';

import { parseBuildConfig } from './build-config';
import { prependImports } from './imports';
import { runBuild } from './pipeline';
import { resolveBuild } from './resolver';
import { isModule } from './tree/guards';
import type { PluginOptions } from './types/config';
import type { ImportDecl } from './types/fixer';
import type { Module } from './types/nodes';

declare module 'vfile' {
  interface DataMap {
    /** Imports the backported module depends on, in emission order. */
    pyBackportImports: ImportDecl[];
  }
}

export const MESSAGE_SOURCE = 'py-backport';

/**
 * unified plugin that backports a Python module tree to an older target.
 *
 * Options are validated and fixers resolved once, when the plugin is
 * attached; configuration errors surface before any file is processed.
 *
 * For each file:
 * 1. Run the active checkers, then the selected fixers in registry order.
 * 2. Record the required imports on `file.data.pyBackportImports` and, unless
 *    `prependImports` is `false`, insert them at the top of the module.
 * 3. Report each applied fixer as an info message (`ruleId` = fixer name).
 *
 * @example
 * ```ts
 * const processor = unified().use(pyBackport, { targetVersion: '2.7' });
 * const tree = processor.runSync(moduleTree, file);
 * ```
 */
export const pyBackport: Plugin<[PluginOptions?], Module> = (options = {}) => {
  const { prependImports: shouldPrepend = true, ...rawConfig } = options;
  const build = resolveBuild(parseBuildConfig(rawConfig));

  const transformer: Transformer<Module> = (tree, file) => {
    if (!isModule(tree)) return;

    const result = runBuild(build, tree, {
      onFixerApplied: fixer => {
        file.info(`Applied fixer "${fixer.definition.name}"`, {
          ruleId: fixer.definition.name,
          source: MESSAGE_SOURCE
        });
      }
    });

    file.data.pyBackportImports = result.imports;
    if (shouldPrepend) prependImports(result.tree, result.imports);

    return result.tree;
  };

  return transformer;
};

export { parseBuildConfig, validateWithSchema } from './build-config';
export { defineChecker, defineFixer } from './define';
export {
  BackportError,
  CheckerViolationError,
  ConfigurationError,
  ExpansionOverflowError,
  IncompatibleFixerSelectionError,
  StructuralAssumptionError
} from './errors';
export { EXPANSION_GROWTH_LIMIT } from './fixers/unpacking-generalizations';
export {
  FUTURE_IMPORT_ORDER,
  addImport,
  createImportSet,
  importKey,
  mergeImportSets,
  orderImports,
  prependImports
} from './imports';
export {
  applyPipeline,
  instantiateFixer,
  runBuild,
  runCheckers
} from './pipeline';
export type { BuildResult, PipelineHooks, PipelineResult } from './pipeline';
export { CHECKERS, DEFAULT_REGISTRIES, FIXERS } from './registry';
export { resolveBuild, resolveCheckers, resolveFixers } from './resolver';
export { builders, withPositionOf } from './tree/builders';
export { isExpression, isNode, isNodeOfType, isStatement } from './tree/guards';
export { NODE_SCHEMAS, rewriteOrderFields } from './tree/schema';
export { REMOVE, transform, transformModule } from './tree/transform';
export type { TreeVisitor, VisitHandler, VisitResult } from './tree/transform';
export { walk } from './tree/walk';
export type * from './types/config';
export type * from './types/fixer';
export type * from './types/nodes';
export {
  compareVersions,
  formatVersion,
  isCompatibleWith,
  isRequiredFor,
  parseVersion
} from './version';
export type { Version } from './version';
