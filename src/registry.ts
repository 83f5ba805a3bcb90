import { noAsyncAwait } from './checkers/no-async-await';
import { noMatmulOp } from './checkers/no-matmul-op';
import { noOverriddenBuiltins } from './checkers/no-overridden-builtins';
import { noYieldFrom } from './checkers/no-yield-from';
import { fstringToFormat } from './fixers/fstring-to-format';
import {
  absoluteImportFuture,
  divisionFuture,
  generatorStopFuture,
  generatorsFuture,
  nestedScopesFuture,
  printFunctionFuture,
  unicodeLiteralsFuture,
  withStatementFuture
} from './fixers/future-imports';
import { inlineKwonlyArgs } from './fixers/inline-kwonly-args';
import { itertoolsBuiltins } from './fixers/itertools-builtins';
import { newStyleClasses } from './fixers/new-style-classes';
import { rangeToXrange } from './fixers/range-to-xrange';
import { removeAnnAssign } from './fixers/remove-ann-assign';
import { removeFunctionAnnotations } from './fixers/remove-function-annotations';
import { shortToLongSuper } from './fixers/short-to-long-super';
import { unpackingGeneralizations } from './fixers/unpacking-generalizations';
import type { CheckerDefinition, FixerDefinition } from './types/fixer';
import type { Registries } from './types/config';

/**
 * Every fixer, in application order.
 *
 * The resolver never reorders: a fixer whose output another fixer consumes
 * must come first. `range-to-xrange` runs before `itertools-builtins` and
 * `unpacking-generalizations` runs last, after every fixer that may emit
 * calls.
 */
export const FIXERS: readonly FixerDefinition[] = [
  nestedScopesFuture,
  generatorsFuture,
  divisionFuture,
  absoluteImportFuture,
  withStatementFuture,
  printFunctionFuture,
  unicodeLiteralsFuture,
  generatorStopFuture,
  rangeToXrange,
  removeFunctionAnnotations,
  removeAnnAssign,
  shortToLongSuper,
  inlineKwonlyArgs,
  fstringToFormat,
  newStyleClasses,
  itertoolsBuiltins,
  unpackingGeneralizations
];

export const CHECKERS: readonly CheckerDefinition[] = [
  noOverriddenBuiltins,
  noYieldFrom,
  noMatmulOp,
  noAsyncAwait
];

export const DEFAULT_REGISTRIES: Registries = {
  fixers: FIXERS,
  checkers: CHECKERS
};
