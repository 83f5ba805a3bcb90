import { defineFixer } from '../define';
import { builders as b, withPositionOf } from '../tree/builders';
import { transformModule } from '../tree/transform';

const LAZY_BUILTINS: ReadonlyMap<string, string> = new Map([
  ['map', 'imap'],
  ['zip', 'izip'],
  ['filter', 'ifilter']
]);

/**
 * `map`, `zip`, `filter` -> `itertools.imap`, `itertools.izip`,
 * `itertools.ifilter`, so that they stay lazy on Python 2.
 *
 * Every loaded reference is rewritten, including ones that are never called.
 * Rebinding these names is rejected by the `no-overridden-builtins` checker.
 */
export const itertoolsBuiltins = defineFixer({
  name: 'itertools-builtins',
  description: 'Replaces `map`, `zip` and `filter` by their itertools versions.',
  versionInfo: { applySince: '2.0', applyUntil: '2.7', worksUntil: '2.7' },
  createTransform: () => (tree, requireImport) => {
    return transformModule(tree, {
      exit(node) {
        if (node.type !== 'Name' || node.ctx !== 'Load') return;

        const lazyName = LAZY_BUILTINS.get(node.id);
        if (!lazyName) return;

        requireImport({ module: 'itertools', member: null });
        return withPositionOf(b.attribute(b.name('itertools'), lazyName), node);
      }
    });
  }
});
