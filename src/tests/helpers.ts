import { orderImports } from '../imports';
import { instantiateFixer } from '../pipeline';
import { builders as b } from '../tree/builders';
import type { FixerDefinition, ImportDecl } from '../types/fixer';
import type { Module, Stmt } from '../types/nodes';
import { unparse } from './unparse';

export type FixerOutput = {
  /** Rendered output module. */
  lines: string[];
  /** Imports the fixer required, in emission order. */
  imports: ImportDecl[];
};

/**
 * Runs one fresh instance of `definition` over `tree`.
 */
export function runFixer(definition: FixerDefinition, tree: Module): FixerOutput {
  const fixer = instantiateFixer(definition);
  const output = fixer.transform(tree);
  return {
    lines: unparse(output),
    imports: orderImports(fixer.requiredImports.values())
  };
}

/**
 * Creates a runner that renders the output of `definition` for a module
 * built from `statements`.
 */
export function createFixerRunner(definition: FixerDefinition) {
  return (buildBody: () => Stmt[]): string[] =>
    runFixer(definition, b.module(buildBody())).lines;
}
