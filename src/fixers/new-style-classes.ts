import { defineFixer } from '../define';
import { builders as b } from '../tree/builders';
import { walk } from '../tree/walk';

export const newStyleClasses = defineFixer({
  name: 'new-style-classes',
  description: 'Adds `object` as the base of classes without bases.',
  versionInfo: { applySince: '2.0', applyUntil: '2.7' },
  createTransform: () => tree => {
    for (const classDef of walk(tree, 'ClassDef')) {
      if (classDef.bases.length === 0) classDef.bases.push(b.name('object'));
    }
    return tree;
  }
});
