import { describe, expect, test } from 'vitest';

import { StructuralAssumptionError } from '../../errors';
import { createFixerRunner, runFixer } from '../../tests/helpers';
import type { TestScenario } from '../../tests/types';
import { builders as b } from '../../tree/builders';
import type { Stmt } from '../../types/nodes';
import {
  absoluteImportFuture,
  divisionFuture,
  generatorStopFuture,
  generatorsFuture,
  nestedScopesFuture,
  printFunctionFuture,
  unicodeLiteralsFuture,
  withStatementFuture
} from '../future-imports';
import { itertoolsBuiltins } from '../itertools-builtins';
import { newStyleClasses } from '../new-style-classes';
import { rangeToXrange } from '../range-to-xrange';
import { removeAnnAssign } from '../remove-ann-assign';
import { removeFunctionAnnotations } from '../remove-function-annotations';

type FixerScenario = TestScenario<() => Stmt[], string[]>;

describe('Future import fixers: require the import, leave the tree alone.', () => {
  const scenarios = [
    { definition: nestedScopesFuture, feature: 'nested_scopes' },
    { definition: generatorsFuture, feature: 'generators' },
    { definition: divisionFuture, feature: 'division' },
    { definition: absoluteImportFuture, feature: 'absolute_import' },
    { definition: withStatementFuture, feature: 'with_statement' },
    { definition: printFunctionFuture, feature: 'print_function' },
    { definition: unicodeLiteralsFuture, feature: 'unicode_literals' },
    { definition: generatorStopFuture, feature: 'generator_stop' }
  ];

  test.for(scenarios)('requires __future__.$feature', ({ definition, feature }) => {
    const output = runFixer(definition, b.module([b.pass()]));

    expect(output.lines).toStrictEqual(['pass']);
    expect(output.imports).toStrictEqual([
      { module: '__future__', member: feature }
    ]);
  });
});

describe('range-to-xrange: loaded references only.', () => {
  const run = createFixerRunner(rangeToXrange);

  const scenarios: FixerScenario[] = [
    {
      id: 'Call',
      description: 'A call of range is renamed.',
      input: () => [
        b.assign([b.name('r', 'Store')], b.call(b.name('range'), [b.constant(3)]))
      ],
      expected: ['r = xrange(3)']
    },
    {
      id: 'Reference',
      description: 'A bare reference is renamed too.',
      input: () => [b.expr(b.call(b.name('apply'), [b.name('range')]))],
      expected: ['apply(xrange)']
    },
    {
      id: 'Store',
      description: 'Assignment targets are left to the checker.',
      input: () => [b.assign([b.name('range', 'Store')], b.constant(1))],
      expected: ['range = 1']
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(run(input)).toStrictEqual(expected);
  });
});

describe('remove-function-annotations: signatures lose every annotation.', () => {
  const run = createFixerRunner(removeFunctionAnnotations);

  const scenarios: FixerScenario[] = [
    {
      id: 'All parameter kinds',
      description: 'Positional, variadic, keyword-only and return annotations.',
      input: () => [
        b.functionDef(
          'f',
          b.arguments({
            args: [b.arg('a', b.name('int'))],
            vararg: b.arg('rest', b.name('str')),
            kwonlyargs: [b.arg('k', b.name('bool'))],
            kw_defaults: [null],
            kwarg: b.arg('kw', b.name('dict'))
          }),
          [b.pass()],
          [],
          b.name('int')
        )
      ],
      expected: ['def f(a, *rest, k, **kw):', '    pass']
    },
    {
      id: 'Async and nested',
      description: 'Coroutines and nested definitions are covered.',
      input: () => [
        b.asyncFunctionDef('outer', b.arguments({ args: [b.arg('x', b.name('T'))] }), [
          b.functionDef(
            'inner',
            b.arguments({ posonlyargs: [b.arg('y', b.name('U'))] }),
            [b.pass()]
          )
        ])
      ],
      expected: [
        'async def outer(x):',
        '    def inner(y, /):',
        '        pass'
      ]
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(run(input)).toStrictEqual(expected);
  });
});

describe('remove-ann-assign: annotated assignments become plain ones.', () => {
  const run = createFixerRunner(removeAnnAssign);

  const scenarios: FixerScenario[] = [
    {
      id: 'With value',
      description: 'The annotation is dropped.',
      input: () => [b.annAssign(b.name('x', 'Store'), b.name('int'), b.constant(1))],
      expected: ['x = 1']
    },
    {
      id: 'Without value',
      description: 'A bare declaration binds None.',
      input: () => [b.annAssign(b.name('y', 'Store'), b.name('str'))],
      expected: ['y = None']
    },
    {
      id: 'Nested',
      description: 'Declarations inside functions are rewritten as well.',
      input: () => [
        b.functionDef('f', b.arguments(), [
          b.annAssign(b.name('z', 'Store'), b.name('list'), b.list([]))
        ])
      ],
      expected: ['def f():', '    z = []']
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(run(input)).toStrictEqual(expected);
  });

  test('keeps the source position', () => {
    const position = {
      start: { line: 3, column: 1 },
      end: { line: 3, column: 11 }
    };
    const statement = b.annAssign(b.name('x', 'Store'), b.name('int'), b.constant(1));
    statement.position = position;

    const tree = b.module([statement]);
    const output = removeAnnAssign.createTransform()(tree, () => {});

    expect(output.body[0].type).toBe('Assign');
    expect(output.body[0].position).toStrictEqual(position);
  });

  test('rejects attribute targets', () => {
    expect(() =>
      run(() => [
        b.annAssign(b.attribute(b.name('self'), 'a', 'Store'), b.name('int'), b.constant(1))
      ])
    ).toThrow(StructuralAssumptionError);
  });
});

describe('new-style-classes: classes without bases inherit object.', () => {
  const run = createFixerRunner(newStyleClasses);

  test('adds object only where no base is given', () => {
    expect(
      run(() => [
        b.classDef('A', [], [b.pass()]),
        b.classDef('B', [b.name('A')], [b.classDef('Inner', [], [b.pass()])])
      ])
    ).toStrictEqual([
      'class A(object):',
      '    pass',
      'class B(A):',
      '    class Inner(object):',
      '        pass'
    ]);
  });
});

describe('itertools-builtins: lazy itertools versions of map, zip and filter.', () => {
  test('rewrites loaded references and requires itertools', () => {
    const output = runFixer(
      itertoolsBuiltins,
      b.module([
        b.expr(b.call(b.name('map'), [b.name('f'), b.name('xs')])),
        b.assign([b.name('pairs', 'Store')], b.name('zip'))
      ])
    );

    expect(output.lines).toStrictEqual([
      'itertools.imap(f, xs)',
      'pairs = itertools.izip'
    ]);
    expect(output.imports).toStrictEqual([{ module: 'itertools', member: null }]);
  });

  test('requires nothing when no builtin is used', () => {
    const output = runFixer(
      itertoolsBuiltins,
      b.module([b.expr(b.call(b.name('sorted'), [b.name('xs')]))])
    );

    expect(output.lines).toStrictEqual(['sorted(xs)']);
    expect(output.imports).toStrictEqual([]);
  });
});
