import type { Version } from '../version';
import type { Module } from './nodes';

/**
 * Authored applicability window of a fixer or checker (dotted version strings).
 */
export type VersionInfoInit = {
  /** First target version for which the rewrite is mandatory. */
  applySince: string;

  /** Last target version for which the rewrite is mandatory. */
  applyUntil: string;

  /**
   * First target version for which running the rewrite is harmless.
   * @default applySince
   */
  worksSince?: string;

  /**
   * Last target version for which running the rewrite is harmless.
   * Omit for an open-ended window.
   */
  worksUntil?: string;
};

/**
 * Validated applicability window.
 * Invariant: `applySince <= applyUntil`, and the apply window lies within the
 * works window.
 */
export type VersionInfo = {
  applySince: Version;
  applyUntil: Version;
  worksSince: Version;
  worksUntil: Version | null;
};

/**
 * An import statement that must exist in the output module.
 *
 * - `{ module: '__future__', member: 'division' }` -> `from __future__ import division`
 * - `{ module: 'itertools', member: null }`       -> `import itertools`
 *
 * Equality is by the `(module, member)` pair.
 */
export type ImportDecl = {
  module: string;
  member: string | null;
};

/**
 * Insertion-ordered, deduplicated set of import declarations keyed by
 * their canonical key (see `importKey`).
 */
export type ImportSet = Map<string, ImportDecl>;

export type RequireImport = (decl: ImportDecl) => void;

/**
 * Rewrites a module. May mutate the tree in place; returns the resulting root.
 * Calls `requireImport` for every import its output depends on.
 */
export type FixerTransform = (tree: Module, requireImport: RequireImport) => Module;

/**
 * Registry entry of a fixer.
 *
 * The definition is shared; per-source-unit state lives in the closure
 * returned by `createTransform`, which is called once per fixer instance.
 */
export type FixerDefinition = {
  /** Kebab-case identifier used by allowlists (e.g. `range-to-xrange`). */
  name: string;

  /** One-line summary of the rewrite. */
  description: string;

  versionInfo: VersionInfo;

  createTransform: () => FixerTransform;
};

/**
 * Authored form of a fixer definition, before window validation.
 */
export type FixerDefinitionInit = Omit<FixerDefinition, 'versionInfo'> & {
  versionInfo: VersionInfoInit;
};

/**
 * A fixer instance bound to one source unit.
 */
export type Fixer = {
  readonly definition: FixerDefinition;

  /** Populated while `transform` runs. */
  readonly requiredImports: ImportSet;

  transform: (tree: Module) => Module;
};

/**
 * Registry entry of a checker: a pre-flight validation that rejects
 * constructs the target cannot express and no fixer rewrites.
 */
export type CheckerDefinition = {
  name: string;

  description: string;

  /** Window in which the checked construct is unavailable. */
  versionInfo: VersionInfo;

  /**
   * Fixers whose output is only sound when this checker runs
   * (e.g. renaming builtins assumes they are not rebound).
   */
  guards: readonly string[];

  /**
   * @throws CheckerViolationError on the first offending node.
   */
  check: (tree: Module) => void;
};

export type CheckerDefinitionInit = Omit<
  CheckerDefinition,
  'versionInfo' | 'guards'
> & {
  versionInfo: VersionInfoInit;
  guards?: readonly string[];
};
