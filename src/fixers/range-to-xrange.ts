import { defineFixer } from '../define';
import { walk } from '../tree/walk';

/**
 * `range(...)` -> `xrange(...)`.
 *
 * Only loaded references are renamed; rebinding `range` is rejected by the
 * `no-overridden-builtins` checker. `xrange` does not exist on Python 3, so the
 * works window closes at 2.7.
 */
export const rangeToXrange = defineFixer({
  name: 'range-to-xrange',
  description: 'Renames loaded `range` references to `xrange`.',
  versionInfo: { applySince: '1.0', applyUntil: '2.7', worksUntil: '2.7' },
  createTransform: () => tree => {
    for (const name of walk(tree, 'Name')) {
      if (name.id === 'range' && name.ctx === 'Load') name.id = 'xrange';
    }
    return tree;
  }
});
