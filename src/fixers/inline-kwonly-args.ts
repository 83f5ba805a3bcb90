import { defineFixer } from '../define';
import { StructuralAssumptionError } from '../errors';
import { builders as b } from '../tree/builders';
import { transformModule, type VisitResult } from '../tree/transform';
import type {
  Arg,
  AsyncFunctionDef,
  Expr,
  FunctionDef,
  Stmt
} from '../types/nodes';

/**
 * A default is inlined only when it is a literal: evaluating anything else at
 * call time instead of definition time would change behavior.
 */
function isLiteralDefault(expr: Expr): boolean {
  if (expr.type === 'Constant') return true;
  return (
    expr.type === 'UnaryOp' &&
    (expr.op === 'USub' || expr.op === 'UAdd') &&
    expr.operand.type === 'Constant' &&
    typeof expr.operand.value === 'number'
  );
}

function makeLookup(param: Arg, defaultValue: Expr | null, kwargsName: string): Stmt {
  const target = b.name(param.arg, 'Store');
  const mapping = b.name(kwargsName);

  if (defaultValue === null) {
    return b.assign([target], b.subscript(mapping, b.constant(param.arg)));
  }

  if (!isLiteralDefault(defaultValue)) {
    throw new StructuralAssumptionError(
      `Keyword-only parameter "${param.arg}" must have a literal default, got ${defaultValue.type}.`,
      defaultValue
    );
  }

  return b.assign(
    [target],
    b.call(b.attribute(mapping, 'get'), [b.constant(param.arg), defaultValue])
  );
}

function inlineKeywordOnly(node: FunctionDef | AsyncFunctionDef): void {
  const { args } = node;
  if (args.kwonlyargs.length === 0) return;

  if (!args.kwarg) args.kwarg = b.arg('kwargs');
  const kwargsName = args.kwarg.arg;

  // Inserted back to front at the top, so the body reads in declared order.
  for (let index = args.kwonlyargs.length - 1; index >= 0; index--) {
    const param = args.kwonlyargs[index];
    const defaultValue = args.kw_defaults[index] ?? null;
    node.body.unshift(makeLookup(param, defaultValue, kwargsName));
  }

  args.kwonlyargs = [];
  args.kw_defaults = [];
}

/**
 * Keyword-only parameters -> lookups in the catch-all keyword mapping.
 *
 * ```python
 * def f(a, *, x, y=2): ...
 * # becomes
 * def f(a, **kwargs):
 *     x = kwargs["x"]
 *     y = kwargs.get("y", 2)
 *     ...
 * ```
 *
 * An existing `**name` parameter is reused. Lambdas have no body to inline
 * into and are rejected.
 */
export const inlineKwonlyArgs = defineFixer({
  name: 'inline-kwonly-args',
  description: 'Replaces keyword-only parameters by reads from `**kwargs`.',
  versionInfo: { applySince: '1.0', applyUntil: '3.5' },
  createTransform: () => tree => {
    return transformModule(tree, {
      exit(node): VisitResult {
        if (node.type === 'FunctionDef' || node.type === 'AsyncFunctionDef') {
          inlineKeywordOnly(node);
        } else if (node.type === 'Lambda' && node.args.kwonlyargs.length > 0) {
          throw new StructuralAssumptionError(
            'Keyword-only parameters of a lambda cannot be inlined.',
            node
          );
        }
        return;
      }
    });
  }
});
