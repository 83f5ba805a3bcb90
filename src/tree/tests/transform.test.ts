import { describe, expect, test } from 'vitest';

import { StructuralAssumptionError } from '../../errors';
import { unparse } from '../../tests/unparse';
import type { Module } from '../../types/nodes';
import { builders as b } from '../builders';
import {
  REMOVE,
  transform,
  transformModule,
  type VisitResult
} from '../transform';

/**
 * Structural transforms.
 * Focus: replacement, list splicing, removal, visiting order and the
 * structural errors raised for impossible replacements.
 */
describe('transform: replacement, splicing and removal.', () => {
  test('replaces a node in a single field', () => {
    const tree = b.module([b.expr(b.call(b.name('f'), [b.name('a')]))]);

    const result = transformModule(tree, {
      exit(node) {
        if (node.type === 'Name' && node.id === 'a') return b.name('renamed');
        return;
      }
    });

    expect(unparse(result)).toStrictEqual(['f(renamed)']);
  });

  test('splices several statements into a block', () => {
    const tree = b.module([b.expr(b.name('a')), b.pass()]);

    const result = transformModule(tree, {
      exit(node) {
        if (node.type !== 'Expr') return;
        return [b.expr(b.name('first')), b.expr(b.name('second'))];
      }
    });

    expect(unparse(result)).toStrictEqual(['first', 'second', 'pass']);
  });

  test('removes nodes from blocks and lists', () => {
    const tree = b.module([
      b.pass(),
      b.expr(b.call(b.name('f'), [b.name('drop'), b.name('keep')])),
      b.pass()
    ]);

    const result = transformModule(tree, {
      exit(node) {
        if (node.type === 'Pass') return REMOVE;
        if (node.type === 'Name' && node.id === 'drop') return REMOVE;
        return;
      }
    });

    expect(unparse(result)).toStrictEqual(['f(keep)']);
  });

  test('removing an optional child clears the field', () => {
    const tree = b.module([b.return(b.name('value'))]);

    const result = transformModule(tree, {
      exit: node => (node.type === 'Name' ? REMOVE : undefined)
    });

    expect(unparse(result)).toStrictEqual(['return']);
  });

  test('visits non-block fields by name before nested blocks', () => {
    const tree = b.module([
      b.for(b.name('t', 'Store'), b.name('xs'), [b.expr(b.name('body'))])
    ]);
    const exited: string[] = [];

    transform(tree, {
      exit(node): VisitResult {
        if (node.type === 'Name') exited.push(node.id);
        return;
      }
    });

    expect(exited).toStrictEqual(['xs', 't', 'body']);
  });

  test('descends into the replacement returned by enter', () => {
    const tree = b.module([b.expr(b.name('a'))]);
    const entered: string[] = [];

    transform(tree, {
      enter(node) {
        if (node.type !== 'Name') return;
        entered.push(node.id);
        if (node.id === 'a') return b.call(b.name('wrap'), [b.name('inner')]);
        return;
      }
    });

    // Call fields in rewrite order: args, func, keywords.
    expect(entered).toStrictEqual(['a', 'inner', 'wrap']);
  });

  test('returns the replaced root', () => {
    const result = transform(b.name('old'), {
      exit: node => (node.type === 'Name' ? b.name('new') : undefined)
    });

    expect(result).toStrictEqual(b.name('new'));
  });
});

describe('transform: structural errors.', () => {
  const buildTree = (): Module =>
    b.module([b.expr(b.binOp(b.name('a'), 'Add', b.name('b')))]);

  test('several nodes in a single required field', () => {
    expect(() =>
      transform(buildTree(), {
        exit: node =>
          node.type === 'Name' && node.id === 'a'
            ? [b.name('x'), b.name('y')]
            : undefined
      })
    ).toThrow(StructuralAssumptionError);
  });

  test('removal of a required field', () => {
    expect(() =>
      transform(buildTree(), {
        exit: node => (node.type === 'Name' ? REMOVE : undefined)
      })
    ).toThrow('Cannot remove the required "left" field of BinOp.');
  });

  test('an expression placed into a statement list', () => {
    expect(() =>
      transform(buildTree(), {
        exit: node => (node.type === 'Expr' ? b.name('loose') : undefined)
      })
    ).toThrow('Statement list "body" of Module cannot hold Name.');
  });

  test('removal of the root', () => {
    expect(() =>
      transform(buildTree(), {
        exit: node => (node.type === 'Module' ? REMOVE : undefined)
      })
    ).toThrow(
      'The root node must be replaced by exactly one node.'
    );
  });

  test('a module root replaced by another kind', () => {
    expect(() =>
      transformModule(buildTree(), {
        exit: node => (node.type === 'Module' ? b.pass() : undefined)
      })
    ).toThrow('The module root was replaced by Pass.');
  });
});
