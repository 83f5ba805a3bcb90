import { defineFixer } from '../define';
import type { Arguments } from '../types/nodes';
import { walk } from '../tree/walk';

function clearParameterAnnotations(args: Arguments): void {
  for (const param of [...args.posonlyargs, ...args.args, ...args.kwonlyargs]) {
    param.annotation = null;
  }
  if (args.vararg) args.vararg.annotation = null;
  if (args.kwarg) args.kwarg.annotation = null;
}

export const removeFunctionAnnotations = defineFixer({
  name: 'remove-function-annotations',
  description: 'Drops return and parameter annotations of function definitions.',
  versionInfo: { applySince: '1.0', applyUntil: '2.7' },
  createTransform: () => tree => {
    for (const node of walk(tree)) {
      if (node.type !== 'FunctionDef' && node.type !== 'AsyncFunctionDef') {
        continue;
      }
      node.returns = null;
      clearParameterAnnotations(node.args);
    }
    return tree;
  }
});
