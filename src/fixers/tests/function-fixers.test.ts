import { describe, expect, test } from 'vitest';

import { StructuralAssumptionError } from '../../errors';
import { createFixerRunner } from '../../tests/helpers';
import type { TestScenario } from '../../tests/types';
import { builders as b } from '../../tree/builders';
import type { Expr, Stmt } from '../../types/nodes';
import { fstringToFormat } from '../fstring-to-format';
import { inlineKwonlyArgs } from '../inline-kwonly-args';
import { shortToLongSuper } from '../short-to-long-super';

type FixerScenario = TestScenario<() => Stmt[], string[]>;

const superCall = (method: string, args: Expr[] = []) =>
  b.expr(b.call(b.attribute(b.call(b.name('super'), args), method)));

describe('short-to-long-super: explicit super arguments.', () => {
  const run = createFixerRunner(shortToLongSuper);

  const scenarios: FixerScenario[] = [
    {
      id: 'Method',
      description: 'The class name and the first parameter are filled in.',
      input: () => [
        b.classDef('A', [b.name('Base')], [
          b.functionDef('__init__', b.arguments({ args: [b.arg('self')] }), [
            superCall('__init__')
          ])
        ])
      ],
      expected: [
        'class A(Base):',
        '    def __init__(self):',
        '        super(A, self).__init__()'
      ]
    },
    {
      id: 'Nested class',
      description: 'Calls bind to the innermost class.',
      input: () => [
        b.classDef('Outer', [], [
          b.classDef('Inner', [], [
            b.functionDef('m', b.arguments({ args: [b.arg('this')] }), [
              superCall('m')
            ])
          ])
        ])
      ],
      expected: [
        'class Outer:',
        '    class Inner:',
        '        def m(this):',
        '            super(Inner, this).m()'
      ]
    },
    {
      id: 'No parameters',
      description: 'A method without parameters has nothing to pass.',
      input: () => [
        b.classDef('A', [], [
          b.functionDef('s', b.arguments(), [superCall('s')])
        ])
      ],
      expected: ['class A:', '    def s():', '        super().s()']
    },
    {
      id: 'Explicit arguments',
      description: 'Calls that already pass arguments are kept.',
      input: () => [
        b.classDef('A', [], [
          b.functionDef('m', b.arguments({ args: [b.arg('self')] }), [
            superCall('m', [b.name('B'), b.name('self')])
          ])
        ])
      ],
      expected: ['class A:', '    def m(self):', '        super(B, self).m()']
    },
    {
      id: 'Module function',
      description: 'Functions outside classes are not touched.',
      input: () => [
        b.functionDef('f', b.arguments({ args: [b.arg('x')] }), [superCall('f')])
      ],
      expected: ['def f(x):', '    super().f()']
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(run(input)).toStrictEqual(expected);
  });
});

describe('inline-kwonly-args: keyword-only parameters read from **kwargs.', () => {
  const run = createFixerRunner(inlineKwonlyArgs);

  const scenarios: FixerScenario[] = [
    {
      id: 'Required and literal default',
      description: 'Lookups are inserted in declared order.',
      input: () => [
        b.functionDef(
          'f',
          b.arguments({
            kwonlyargs: [b.arg('x'), b.arg('y')],
            kw_defaults: [null, b.constant(2)]
          }),
          [b.pass()]
        )
      ],
      expected: [
        'def f(**kwargs):',
        '    x = kwargs["x"]',
        '    y = kwargs.get("y", 2)',
        '    pass'
      ]
    },
    {
      id: 'Existing catch-all',
      description: 'A declared **name is reused; signed numbers are literals.',
      input: () => [
        b.functionDef(
          'g',
          b.arguments({
            args: [b.arg('a')],
            kwonlyargs: [b.arg('flag')],
            kw_defaults: [b.unaryOp('USub', b.constant(1))],
            kwarg: b.arg('opts')
          }),
          [b.return(b.name('flag'))]
        )
      ],
      expected: [
        'def g(a, **opts):',
        '    flag = opts.get("flag", -1)',
        '    return flag'
      ]
    },
    {
      id: 'No keyword-only parameters',
      description: 'Other signatures are left alone.',
      input: () => [
        b.functionDef('h', b.arguments({ args: [b.arg('a')] }), [b.pass()])
      ],
      expected: ['def h(a):', '    pass']
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(run(input)).toStrictEqual(expected);
  });

  test('rejects a default that is not a literal', () => {
    expect(() =>
      run(() => [
        b.functionDef(
          'f',
          b.arguments({
            kwonlyargs: [b.arg('x')],
            kw_defaults: [b.call(b.name('make'))]
          }),
          [b.pass()]
        )
      ])
    ).toThrow('Keyword-only parameter "x" must have a literal default, got Call.');
  });

  test('rejects keyword-only parameters of a lambda', () => {
    expect(() =>
      run(() => [
        b.expr(
          b.lambda(
            b.arguments({ kwonlyargs: [b.arg('x')], kw_defaults: [null] }),
            b.name('x')
          )
        )
      ])
    ).toThrow(StructuralAssumptionError);
  });
});

describe('fstring-to-format: f-strings become str.format calls.', () => {
  const run = createFixerRunner(fstringToFormat);

  const scenarios: FixerScenario[] = [
    {
      id: 'Plain field',
      description: 'Literal text around one replacement field.',
      input: () => [
        b.expr(
          b.joinedStr([b.constant('a'), b.formattedValue(b.name('x')), b.constant('b')])
        )
      ],
      expected: ['"a{0}b".format(x)']
    },
    {
      id: 'Conversion and nested spec',
      description: 'Spec arguments are numbered after their owner.',
      input: () => [
        b.expr(
          b.joinedStr([
            b.formattedValue(
              b.name('a'),
              114,
              b.joinedStr([b.constant('>'), b.formattedValue(b.name('width'))])
            ),
            b.constant(' and '),
            b.formattedValue(b.name('b'))
          ])
        )
      ],
      expected: ['"{0!r:>{1}} and {2}".format(a, width, b)']
    },
    {
      id: 'Literal braces',
      description: 'Braces in literal text are doubled.',
      input: () => [
        b.expr(
          b.joinedStr([b.constant('{literal} '), b.formattedValue(b.name('v'), 115)])
        )
      ],
      expected: ['"{{literal}} {0!s}".format(v)']
    },
    {
      id: 'Nested f-string',
      description: 'An f-string inside a field is rewritten too.',
      input: () => [
        b.assign(
          [b.name('s', 'Store')],
          b.joinedStr([
            b.formattedValue(b.joinedStr([b.formattedValue(b.name('x'), 97)]))
          ])
        )
      ],
      expected: ['s = "{0}".format("{0!a}".format(x))']
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(run(input)).toStrictEqual(expected);
  });

  test('rejects a format spec that is not an f-string', () => {
    expect(() =>
      run(() => [
        b.expr(
          b.joinedStr([b.formattedValue(b.name('x'), -1, b.constant('>10'))])
        )
      ])
    ).toThrow('Format spec must be a JoinedStr, got Constant.');
  });
});
