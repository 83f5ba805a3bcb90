import { describe, expect, test } from 'vitest';

import type { TestScenario } from '../../tests/types';
import type { NodeType } from '../../types/nodes';
import type { FieldEntry } from '../schema';
import {
  declarationOrderFields,
  hasBlockFields,
  rewriteOrderFields
} from '../schema';

/**
 * Field ordering contracts.
 * Focus: non-block fields before block fields, by name within each group.
 */
describe('Field order: declaration order for scans, rewrite order for transforms.', () => {
  const rewriteScenarios: Array<TestScenario<NodeType, FieldEntry[]>> = [
    {
      id: 'For',
      description: 'Expressions sort by name, then both statement lists.',
      input: 'For',
      expected: [
        ['iter', 'node'],
        ['target', 'node'],
        ['body', 'block'],
        ['orelse', 'block']
      ]
    },
    {
      id: 'Try',
      description: 'Handlers are not a statement list and come first.',
      input: 'Try',
      expected: [
        ['handlers', 'list'],
        ['body', 'block'],
        ['finalbody', 'block'],
        ['orelse', 'block']
      ]
    },
    {
      id: 'FunctionDef',
      description: 'Signature, decorators and annotation precede the body.',
      input: 'FunctionDef',
      expected: [
        ['args', 'node'],
        ['decorator_list', 'list'],
        ['returns', 'optional'],
        ['body', 'block']
      ]
    },
    {
      id: 'Call',
      description: 'Plain fields sort by name.',
      input: 'Call',
      expected: [
        ['args', 'list'],
        ['func', 'node'],
        ['keywords', 'list']
      ]
    },
    {
      id: 'Name',
      description: 'Leaves have no child fields.',
      input: 'Name',
      expected: []
    }
  ];

  test.for(rewriteScenarios)('[$id] $description', ({ input, expected }) => {
    expect(rewriteOrderFields(input)).toStrictEqual(expected);
  });

  test('declaration order follows the node definition', () => {
    expect(declarationOrderFields('If')).toStrictEqual([
      ['test', 'node'],
      ['body', 'block'],
      ['orelse', 'block']
    ]);
  });

  test('rewrite order is cached per node kind', () => {
    expect(rewriteOrderFields('While')).toBe(rewriteOrderFields('While'));
  });

  test.for([
    ['ExceptHandler', true],
    ['Module', true],
    ['Call', false],
    ['Lambda', false]
  ] as const)('hasBlockFields(%s) is %s', ([type, expected]) => {
    expect(hasBlockFields(type)).toBe(expected);
  });
});
