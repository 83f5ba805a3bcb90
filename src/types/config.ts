import type { Version } from '../version';
import type { CheckerDefinition, FixerDefinition } from './fixer';

/**
 * Validated build configuration.
 */
export type BuildConfig = {
  targetVersion: Version;

  /**
   * Bypass any content cache kept by the caller.
   * Carried through for external drivers; the core does not cache.
   */
  force: boolean;

  /** Fixer names to run regardless of version; empty means "all required". */
  fixerAllowlist: ReadonlySet<string>;

  /** Checker names to run regardless of version; empty means "all required". */
  checkerAllowlist: ReadonlySet<string>;
};

/**
 * Raw configuration surface, as read from a command line or a config file.
 */
export type BuildConfigInput = {
  /**
   * Dotted target version.
   * @default '2.7'
   */
  targetVersion?: string;

  /**
   * Accepts booleans and the string flags `'0'`, `'1'`, `'true'`, `'false'`.
   * @default false
   */
  force?: boolean | '0' | '1' | 'true' | 'false';

  /** Comma-separated string or list of fixer names. */
  fixers?: string | readonly string[];

  /** Comma-separated string or list of checker names. */
  checkers?: string | readonly string[];
};

/**
 * Registries a build resolves against.
 */
export type Registries = {
  fixers: readonly FixerDefinition[];
  checkers: readonly CheckerDefinition[];
};

/**
 * The outcome of resolution: what runs, in which order, for one config.
 * Owns only references to registry entries.
 */
export type ResolvedBuild = {
  config: BuildConfig;
  fixers: readonly FixerDefinition[];
  checkers: readonly CheckerDefinition[];
};

export type PluginOptions = BuildConfigInput & {
  /**
   * Insert the required import statements at the top of each module.
   * Disable when the printer adds them itself from `file.data`.
   *
   * @default true
   */
  prependImports?: boolean;
};
