import { ConfigurationError, IncompatibleFixerSelectionError } from './errors';
import { DEFAULT_REGISTRIES } from './registry';
import type { BuildConfig, Registries, ResolvedBuild } from './types/config';
import type { CheckerDefinition, FixerDefinition, VersionInfo } from './types/fixer';
import { isCompatibleWith, isRequiredFor } from './version';

type RegistryEntry = { name: string; versionInfo: VersionInfo };

/**
 * Shared selection rule for fixers and checkers.
 *
 * - A non-empty allowlist selects exactly the named entries.
 * - An empty allowlist selects every entry required for the target.
 *
 * Registry order is kept.
 *
 * @throws ConfigurationError when the allowlist names an unknown entry.
 */
function selectEntries<T extends RegistryEntry>(
  registry: readonly T[],
  allowlist: ReadonlySet<string>,
  config: BuildConfig,
  kind: 'fixer' | 'checker'
): T[] {
  const known = new Set(registry.map(entry => entry.name));
  const unknown = [...allowlist].filter(name => !known.has(name));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `Unknown ${kind} name(s): ${unknown.join(', ')}. Known ${kind}s: ${[...known].join(', ')}.`
    );
  }

  if (allowlist.size > 0) {
    return registry.filter(entry => allowlist.has(entry.name));
  }
  return registry.filter(entry =>
    isRequiredFor(entry.versionInfo, config.targetVersion)
  );
}

/**
 * Selects the fixers to run for `config`, in registry order.
 *
 * @throws ConfigurationError on an unknown allowlist name.
 * @throws IncompatibleFixerSelectionError when a selected fixer does not work
 *         for the target version.
 */
export function resolveFixers(
  registry: readonly FixerDefinition[],
  config: BuildConfig
): FixerDefinition[] {
  const selected = selectEntries(registry, config.fixerAllowlist, config, 'fixer');

  for (const fixer of selected) {
    if (!isCompatibleWith(fixer.versionInfo, config.targetVersion)) {
      throw new IncompatibleFixerSelectionError(
        fixer.name,
        config.targetVersion.text
      );
    }
  }

  return selected;
}

/**
 * Selects the checkers to run for `config`, in registry order.
 *
 * @throws ConfigurationError on an unknown allowlist name.
 */
export function resolveCheckers(
  registry: readonly CheckerDefinition[],
  config: BuildConfig
): CheckerDefinition[] {
  return selectEntries(registry, config.checkerAllowlist, config, 'checker');
}

/**
 * Resolves fixers and checkers and validates that they agree.
 *
 * While checkers are active, a selected fixer that a registered checker
 * guards is only sound if that checker runs too.
 *
 * @throws ConfigurationError when a guarded fixer is selected but its
 *         checker is not active for the target.
 */
export function resolveBuild(
  config: BuildConfig,
  registries: Registries = DEFAULT_REGISTRIES
): ResolvedBuild {
  const fixers = resolveFixers(registries.fixers, config);
  const checkers = resolveCheckers(registries.checkers, config);

  if (checkers.length > 0) {
    const active = new Set(checkers.map(checker => checker.name));

    for (const checker of registries.checkers) {
      if (active.has(checker.name)) continue;

      const guarded = fixers.find(fixer => checker.guards.includes(fixer.name));
      if (guarded) {
        throw new ConfigurationError(
          `Fixer "${guarded.name}" requires checker "${checker.name}", which is not active for target version ${config.targetVersion.text}.`
        );
      }
    }
  }

  return { config, fixers, checkers };
}
