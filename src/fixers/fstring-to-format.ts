import { defineFixer } from '../define';
import { StructuralAssumptionError } from '../errors';
import { builders as b, withPositionOf } from '../tree/builders';
import { transformModule } from '../tree/transform';
import type { Expr, FormattedValue, JoinedStr } from '../types/nodes';

const CONVERSION_FLAGS: ReadonlyMap<number, string> = new Map([
  [-1, ''],
  [115, '!s'],
  [114, '!r'],
  [97, '!a']
]);

function escapeBraces(text: string): string {
  return text.replace(/[{}]/g, brace => brace + brace);
}

function formatReplacementField(node: FormattedValue, args: Expr[]): string {
  const index = args.length;
  args.push(node.value);

  const conversion = CONVERSION_FLAGS.get(node.conversion);
  if (conversion === undefined) {
    throw new StructuralAssumptionError(
      `Unknown conversion code ${node.conversion} in formatted value.`,
      node
    );
  }

  let spec = '';
  if (node.format_spec) {
    if (node.format_spec.type !== 'JoinedStr') {
      throw new StructuralAssumptionError(
        `Format spec must be a JoinedStr, got ${node.format_spec.type}.`,
        node.format_spec
      );
    }
    spec = ':' + formatTemplate(node.format_spec, args, false);
  }

  return `{${index}${conversion}${spec}}`;
}

/**
 * Renders the `str.format` template of an f-string, collecting the
 * substituted expressions into `args` in order of appearance. Arguments of a
 * nested format spec are numbered after the value that owns the spec.
 */
function formatTemplate(node: JoinedStr, args: Expr[], escape: boolean): string {
  let template = '';
  for (const part of node.values) {
    if (part.type === 'Constant' && typeof part.value === 'string') {
      template += escape ? escapeBraces(part.value) : part.value;
    } else if (part.type === 'FormattedValue') {
      template += formatReplacementField(part, args);
    } else {
      throw new StructuralAssumptionError(
        `Unexpected ${part.type} inside an f-string.`,
        part
      );
    }
  }
  return template;
}

/**
 * `f"{a!r:>{width}} and {b}"` -> `"{0!r:>{1}} and {2}".format(a, width, b)`
 */
export const fstringToFormat = defineFixer({
  name: 'fstring-to-format',
  description: 'Rewrites f-strings as `str.format` calls.',
  versionInfo: { applySince: '2.6', applyUntil: '3.5' },
  createTransform: () => tree => {
    return transformModule(tree, {
      enter(node) {
        if (node.type !== 'JoinedStr') return;

        const args: Expr[] = [];
        const template = formatTemplate(node, args, true);

        return withPositionOf(
          b.call(b.attribute(b.constant(template), 'format'), args),
          node
        );
      }
    });
  }
});
