import type { StandardSchemaV1 } from '@standard-schema/spec';
import { z } from 'zod';

import { ConfigurationError } from './errors';
import type { BuildConfig } from './types/config';
import { parseVersion } from './version';

export const DEFAULT_TARGET_VERSION = '2.7';

function toNameSet(value: string | readonly string[] | undefined): Set<string> {
  const names: readonly string[] =
    typeof value === 'string' ? value.split(',') : (value ?? []);
  return new Set(names.map(name => name.trim()).filter(name => name !== ''));
}

const nameListSchema = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform(toNameSet);

/**
 * Raw build options. Unknown keys are rejected so that misspelled options
 * do not silently fall back to defaults.
 */
export const buildConfigSchema = z
  .object({
    targetVersion: z.string().default(DEFAULT_TARGET_VERSION),
    force: z
      .union([z.boolean(), z.enum(['0', '1', 'true', 'false'])])
      .default(false)
      .transform(flag => flag === true || flag === '1' || flag === 'true'),
    fixers: nameListSchema,
    checkers: nameListSchema
  })
  .strict();

function formatIssuePath(issue: StandardSchemaV1.Issue): string {
  if (!issue.path || issue.path.length === 0) return 'options';
  return issue.path
    .map(segment =>
      typeof segment === 'object' ? String(segment.key) : String(segment)
    )
    .join('.');
}

/**
 * Validates input against any Standard Schema V1 validator through its
 * `~standard` interface.
 *
 * @throws ConfigurationError
 * - if the validator is asynchronous (configuration is resolved synchronously);
 * - on the first reported issue, naming its path.
 */
export function validateWithSchema<S extends StandardSchemaV1>(
  schema: S,
  input: unknown
): StandardSchemaV1.InferOutput<S> {
  const result = schema['~standard'].validate(input);

  if (result instanceof Promise) {
    throw new ConfigurationError('Async option validation is not supported.');
  }

  if (result.issues) {
    const [firstIssue] = result.issues;
    throw new ConfigurationError(
      `Invalid option "${formatIssuePath(firstIssue)}": ${firstIssue.message}`
    );
  }

  return result.value;
}

/**
 * Turns raw options (from a command line, a config file or plugin options)
 * into a validated `BuildConfig`.
 *
 * @example
 * ```ts
 * parseBuildConfig({ targetVersion: '3.4', fixers: 'range-to-xrange, new-style-classes' });
 * ```
 *
 * @throws ConfigurationError on malformed options or target version.
 */
export function parseBuildConfig(raw: unknown = {}): BuildConfig {
  const options = validateWithSchema(buildConfigSchema, raw);

  return {
    targetVersion: parseVersion(options.targetVersion),
    force: options.force,
    fixerAllowlist: options.fixers,
    checkerAllowlist: options.checkers
  };
}
