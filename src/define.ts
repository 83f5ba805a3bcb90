import { ConfigurationError } from './errors';
import type {
  CheckerDefinition,
  CheckerDefinitionInit,
  FixerDefinition,
  FixerDefinitionInit
} from './types/fixer';
import { defineVersionInfo } from './version';

const NAME_PATTERN = /^[a-z][a-z0-9]*(-[a-z0-9]+)*$/;

/**
 * Validates the identifier of a fixer or checker.
 *
 * Names are kebab-case so that they can be listed in a comma-separated
 * allowlist without quoting.
 */
function validateName(name: string, kind: 'fixer' | 'checker'): string {
  if (!NAME_PATTERN.test(name)) {
    throw new ConfigurationError(
      `Invalid ${kind} name "${name}": expected kebab-case (e.g. "range-to-xrange").`
    );
  }
  return name;
}

/**
 * Creates a fixer definition with a validated name and version window.
 *
 * @example
 * ```ts
 * export const newStyleClasses = defineFixer({
 *   name: 'new-style-classes',
 *   description: 'Adds `object` as the base of classes without bases.',
 *   versionInfo: { applySince: '2.0', applyUntil: '2.7' },
 *   createTransform: () => tree => tree
 * });
 * ```
 *
 * @throws ConfigurationError on an invalid name or an impossible window.
 */
export function defineFixer(init: FixerDefinitionInit): FixerDefinition {
  const name = validateName(init.name, 'fixer');
  return {
    name,
    description: init.description,
    versionInfo: defineVersionInfo(init.versionInfo, name),
    createTransform: init.createTransform
  };
}

/**
 * Creates a checker definition with a validated name and version window.
 *
 * @throws ConfigurationError on an invalid name or an impossible window.
 */
export function defineChecker(init: CheckerDefinitionInit): CheckerDefinition {
  const name = validateName(init.name, 'checker');
  return {
    name,
    description: init.description,
    versionInfo: defineVersionInfo(init.versionInfo, name),
    guards: init.guards ?? [],
    check: init.check
  };
}
