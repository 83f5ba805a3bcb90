import { defineChecker } from '../define';
import { CheckerViolationError } from '../errors';
import { walk } from '../tree/walk';

export const noMatmulOp = defineChecker({
  name: 'no-matmul-op',
  description: 'Rejects the `@` matrix multiplication operator.',
  versionInfo: { applySince: '2.0', applyUntil: '3.4' },
  check: tree => {
    for (const node of walk(tree)) {
      const isMatmul =
        (node.type === 'BinOp' || node.type === 'AugAssign') &&
        node.op === 'MatMult';
      if (!isMatmul) continue;

      throw new CheckerViolationError(
        'no-matmul-op',
        'The `@` operator is not available on the target version.',
        node
      );
    }
  }
});
