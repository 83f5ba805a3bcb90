import type { Node } from './types/nodes';

const MESSAGE_PREFIX = '[py-backport]';

/**
 * Formats the source location of a node as `line:column`, when known.
 */
export function formatNodeLocation(node: Node | null | undefined): string {
  const start = node?.position?.start;
  if (!start) return '';
  return ` at ${start.line}:${start.column}`;
}

/**
 * Base class of every error raised by the backport core.
 *
 * All errors are local to one source unit. The core never catches or retries;
 * the caller decides whether to abort a batch or skip and report.
 */
export class BackportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(`${MESSAGE_PREFIX} ${message}`, options);
    this.name = 'BackportError';
  }
}

/**
 * Invalid or contradictory build configuration: unknown fixer or checker name,
 * malformed version, impossible version window, a fixer whose guarding
 * checker is inactive for the target.
 *
 * Raised before any tree is touched.
 */
export class ConfigurationError extends BackportError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * A selected fixer is outside its own compatibility (works) window for the
 * requested target.
 */
export class IncompatibleFixerSelectionError extends BackportError {
  constructor(
    readonly fixerName: string,
    readonly targetVersion: string
  ) {
    super(
      `Fixer "${fixerName}" is selected but does not work for target version ${targetVersion}.`
    );
    this.name = 'IncompatibleFixerSelectionError';
  }
}

/**
 * A fixer met a tree shape it does not support: an unexpected node kind at a
 * position, a non-name assignment target, a non-literal default where a
 * literal is required.
 */
export class StructuralAssumptionError extends BackportError {
  constructor(
    message: string,
    readonly node: Node | null = null
  ) {
    super(`${message}${formatNodeLocation(node)}`);
    this.name = 'StructuralAssumptionError';
  }
}

/**
 * The fixed-point expansion of a statement block outgrew its bound.
 * Signals an unanticipated nesting pattern rather than a user error.
 */
export class ExpansionOverflowError extends BackportError {
  constructor(
    readonly initialLength: number,
    readonly limit: number
  ) {
    super(
      `Expansion overflow: a block of ${initialLength} statement(s) grew past ${limit}x its initial length.`
    );
    this.name = 'ExpansionOverflowError';
  }
}

/**
 * A checker found a construct the target version cannot express and no
 * fixer rewrites.
 */
export class CheckerViolationError extends BackportError {
  constructor(
    readonly checkerName: string,
    message: string,
    readonly node: Node | null = null
  ) {
    super(`${checkerName}: ${message}${formatNodeLocation(node)}`);
    this.name = 'CheckerViolationError';
  }
}
