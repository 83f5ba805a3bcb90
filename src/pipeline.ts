import { addImport, createImportSet, mergeImportSets, orderImports } from './imports';
import type { ResolvedBuild } from './types/config';
import type {
  CheckerDefinition,
  Fixer,
  FixerDefinition,
  ImportDecl,
  ImportSet
} from './types/fixer';
import type { Module } from './types/nodes';

export type PipelineHooks = {
  /** Called after each fixer has transformed the tree. */
  onFixerApplied?: (fixer: Fixer) => void;
};

export type PipelineResult = {
  tree: Module;
  /** Union of the imports required by every applied fixer. */
  imports: ImportSet;
};

export type BuildResult = {
  tree: Module;
  /** Required imports in emission order (see `orderImports`). */
  imports: ImportDecl[];
};

/**
 * Binds a fixer definition to one source unit: fresh per-unit state and an
 * empty import set.
 */
export function instantiateFixer(definition: FixerDefinition): Fixer {
  const requiredImports = createImportSet();
  const run = definition.createTransform();

  return {
    definition,
    requiredImports,
    transform: tree => run(tree, decl => addImport(requiredImports, decl))
  };
}

/**
 * Applies `fixers` to `tree` in order, each one consuming the previous
 * output. Errors propagate from the first failing fixer.
 */
export function applyPipeline(
  fixers: readonly FixerDefinition[],
  tree: Module,
  hooks: PipelineHooks = {}
): PipelineResult {
  const applied: Fixer[] = [];
  let current = tree;

  for (const definition of fixers) {
    const fixer = instantiateFixer(definition);
    current = fixer.transform(current);
    applied.push(fixer);
    hooks.onFixerApplied?.(fixer);
  }

  return {
    tree: current,
    imports: mergeImportSets(applied.map(fixer => fixer.requiredImports))
  };
}

/**
 * @throws CheckerViolationError from the first checker that rejects the tree.
 */
export function runCheckers(
  checkers: readonly CheckerDefinition[],
  tree: Module
): void {
  for (const checker of checkers) checker.check(tree);
}

/**
 * Processes one source unit: checkers first, then the fixers, then the
 * required imports are put in emission order.
 */
export function runBuild(
  build: ResolvedBuild,
  tree: Module,
  hooks: PipelineHooks = {}
): BuildResult {
  runCheckers(build.checkers, tree);
  const result = applyPipeline(build.fixers, tree, hooks);

  return {
    tree: result.tree,
    imports: orderImports(result.imports.values())
  };
}
