import { defineChecker } from '../define';
import { CheckerViolationError } from '../errors';
import { walk } from '../tree/walk';

export const noYieldFrom = defineChecker({
  name: 'no-yield-from',
  description: 'Rejects `yield from`, which no fixer rewrites.',
  versionInfo: { applySince: '2.0', applyUntil: '3.2' },
  check: tree => {
    for (const node of walk(tree, 'YieldFrom')) {
      throw new CheckerViolationError(
        'no-yield-from',
        '`yield from` is not available on the target version.',
        node
      );
    }
  }
});
