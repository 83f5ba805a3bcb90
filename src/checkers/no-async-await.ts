import { defineChecker } from '../define';
import { CheckerViolationError } from '../errors';
import { walk } from '../tree/walk';

/**
 * Coroutines cannot be expressed before 3.5: `async def` and `await` are
 * rejected outright.
 */
export const noAsyncAwait = defineChecker({
  name: 'no-async-await',
  description: 'Rejects `async def` and `await`.',
  versionInfo: { applySince: '2.0', applyUntil: '3.4' },
  check: tree => {
    for (const node of walk(tree)) {
      if (node.type === 'AsyncFunctionDef') {
        throw new CheckerViolationError(
          'no-async-await',
          `Coroutine "${node.name}" is not supported on the target version.`,
          node
        );
      }
      if (node.type === 'Await') {
        throw new CheckerViolationError(
          'no-async-await',
          '`await` is not supported on the target version.',
          node
        );
      }
    }
  }
});
