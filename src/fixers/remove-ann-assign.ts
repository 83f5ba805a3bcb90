import { defineFixer } from '../define';
import { StructuralAssumptionError } from '../errors';
import { builders as b, withPositionOf } from '../tree/builders';
import { transformModule } from '../tree/transform';

/**
 * Annotated assignment -> plain assignment.
 *
 * - `x: int = 1` -> `x = 1`
 * - `x: int`     -> `x = None`
 *
 * Only bare-name targets are supported; attribute and subscript targets are
 * rejected rather than rewritten.
 */
export const removeAnnAssign = defineFixer({
  name: 'remove-ann-assign',
  description: 'Rewrites annotated assignments as plain assignments.',
  versionInfo: { applySince: '1.0', applyUntil: '3.5' },
  createTransform: () => tree => {
    return transformModule(tree, {
      exit(node) {
        if (node.type !== 'AnnAssign') return;

        if (node.target.type !== 'Name') {
          throw new StructuralAssumptionError(
            `Annotated assignment target must be a name, got ${node.target.type}.`,
            node.target
          );
        }

        return withPositionOf(
          b.assign([node.target], node.value ?? b.constant(null)),
          node
        );
      }
    });
  }
});
