import { defineFixer } from '../define';
import { builders as b } from '../tree/builders';
import { transformModule, type VisitResult } from '../tree/transform';
import { walk } from '../tree/walk';
import type { ClassDef } from '../types/nodes';

/**
 * Fills in the arguments of every argument-less `super()` call found in the
 * methods of `classDef`. Methods without parameters are skipped.
 */
function expandSuperCalls(classDef: ClassDef): void {
  for (const method of walk(classDef, 'FunctionDef')) {
    const { posonlyargs, args } = method.args;
    const selfArg = posonlyargs[0] ?? args[0];
    if (!selfArg) continue;

    for (const call of walk(method, 'Call')) {
      if (call.func.type !== 'Name' || call.func.id !== 'super') continue;
      if (call.args.length > 0) continue;

      call.args = [b.name(classDef.name), b.name(selfArg.arg)];
    }
  }
}

/**
 * `super()` -> `super(ClassName, self)`.
 *
 * Runs on class exit, so nested classes are rewritten first and their
 * `super()` calls are bound to the innermost class.
 */
export const shortToLongSuper = defineFixer({
  name: 'short-to-long-super',
  description: 'Spells out the arguments of `super()` calls inside methods.',
  versionInfo: { applySince: '2.2', applyUntil: '2.7' },
  createTransform: () => tree => {
    return transformModule(tree, {
      exit(node): VisitResult {
        if (node.type === 'ClassDef') expandSuperCalls(node);
        return;
      }
    });
  }
});
