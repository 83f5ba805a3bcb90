import { ConfigurationError } from './errors';
import type { VersionInfo, VersionInfoInit } from './types/fixer';

/**
 * A dotted numeric version such as `2.7` or `3.10`.
 *
 * `components` holds the parsed integers; `text` keeps the authored spelling
 * for messages.
 */
export type Version = {
  readonly components: readonly number[];
  readonly text: string;
};

const VERSION_PATTERN = /^\d+(\.\d+)*$/;

/**
 * Parses a dotted numeric version string.
 *
 * @throws ConfigurationError if `text` is not a dotted sequence of integers.
 */
export function parseVersion(text: string): Version {
  const trimmed = text.trim();
  if (!VERSION_PATTERN.test(trimmed)) {
    throw new ConfigurationError(
      `Invalid version "${text}". Expected dotted numbers such as "2.7" or "3.10".`
    );
  }
  return {
    components: trimmed.split('.').map(part => Number.parseInt(part, 10)),
    text: trimmed
  };
}

/**
 * Total order over versions, component by component as integers.
 * Missing trailing components count as 0, so `3` equals `3.0`.
 *
 * @returns -1, 0 or 1
 */
export function compareVersions(a: Version, b: Version): -1 | 0 | 1 {
  const length = Math.max(a.components.length, b.components.length);
  for (let index = 0; index < length; index++) {
    const left = a.components[index] ?? 0;
    const right = b.components[index] ?? 0;
    if (left < right) return -1;
    if (left > right) return 1;
  }
  return 0;
}

export function formatVersion(version: Version): string {
  return version.text;
}

/**
 * Builds a validated applicability window.
 *
 * `worksSince` defaults to `applySince`; an absent `worksUntil` leaves the
 * works window open-ended.
 *
 * @param init - Authored window bounds.
 * @param owner - Fixer or checker name, for error messages.
 * @throws ConfigurationError when a bound is malformed, a range is inverted,
 *         or the apply window is not contained in the works window.
 */
export function defineVersionInfo(
  init: VersionInfoInit,
  owner: string
): VersionInfo {
  const applySince = parseVersion(init.applySince);
  const applyUntil = parseVersion(init.applyUntil);
  const worksSince = init.worksSince
    ? parseVersion(init.worksSince)
    : applySince;
  const worksUntil = init.worksUntil ? parseVersion(init.worksUntil) : null;

  if (compareVersions(applySince, applyUntil) > 0) {
    throw new ConfigurationError(
      `Impossible version window for "${owner}": applySince ${applySince.text} is after applyUntil ${applyUntil.text}.`
    );
  }

  if (worksUntil && compareVersions(worksSince, worksUntil) > 0) {
    throw new ConfigurationError(
      `Impossible version window for "${owner}": worksSince ${worksSince.text} is after worksUntil ${worksUntil.text}.`
    );
  }

  const info: VersionInfo = { applySince, applyUntil, worksSince, worksUntil };

  if (
    !isCompatibleWith(info, applySince) ||
    !isCompatibleWith(info, applyUntil)
  ) {
    throw new ConfigurationError(
      `Impossible version window for "${owner}": the apply window must lie within the works window.`
    );
  }

  return info;
}

/**
 * Apply check: the fixer must run for `version`.
 */
export function isRequiredFor(info: VersionInfo, version: Version): boolean {
  return (
    compareVersions(info.applySince, version) <= 0 &&
    compareVersions(version, info.applyUntil) <= 0
  );
}

/**
 * Works check: running the fixer for `version` does not break correctness.
 * An open-ended `worksUntil` is always satisfied.
 */
export function isCompatibleWith(
  info: VersionInfo,
  version: Version
): boolean {
  if (compareVersions(info.worksSince, version) > 0) return false;
  return info.worksUntil === null || compareVersions(version, info.worksUntil) <= 0;
}
