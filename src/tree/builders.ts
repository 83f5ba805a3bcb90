import type {
  Alias,
  AnnAssign,
  Arg,
  Assert,
  Arguments,
  Assign,
  AsyncFunctionDef,
  Attribute,
  AugAssign,
  Await,
  BinOp,
  BinaryOperator,
  BoolOp,
  BoolOperator,
  Call,
  ClassDef,
  Comprehension,
  Constant,
  ConstantValue,
  Delete,
  Dict,
  ExceptHandler,
  Expr,
  ExprContext,
  ExprStmt,
  For,
  FormattedValue,
  FunctionDef,
  If,
  IfExp,
  Import,
  ImportFrom,
  JoinedStr,
  Keyword,
  Lambda,
  List,
  ListComp,
  Module,
  Name,
  Node,
  Pass,
  Return,
  SetExpr,
  Starred,
  Stmt,
  Subscript,
  Try,
  Tuple,
  UnaryOp,
  UnaryOperator,
  While,
  YieldFrom
} from '../types/nodes';

/**
 * Node constructors.
 *
 * One builder per node kind the fixers synthesize (and the tests construct),
 * named after the discriminant with a lowercase first letter. Optional
 * trailing parameters take the defaults a parser would produce for the
 * simplest source form.
 */
export const builders = {
  module: (body: Stmt[]): Module => ({ type: 'Module', body }),

  functionDef: (
    name: string,
    args: Arguments,
    body: Stmt[],
    decorator_list: Expr[] = [],
    returns: Expr | null = null
  ): FunctionDef => ({
    type: 'FunctionDef',
    name,
    args,
    body,
    decorator_list,
    returns
  }),

  asyncFunctionDef: (
    name: string,
    args: Arguments,
    body: Stmt[]
  ): AsyncFunctionDef => ({
    type: 'AsyncFunctionDef',
    name,
    args,
    body,
    decorator_list: [],
    returns: null
  }),

  classDef: (
    name: string,
    bases: Expr[],
    body: Stmt[],
    keywords: Keyword[] = []
  ): ClassDef => ({
    type: 'ClassDef',
    name,
    bases,
    keywords,
    body,
    decorator_list: []
  }),

  return: (value: Expr | null = null): Return => ({ type: 'Return', value }),

  delete: (targets: Expr[]): Delete => ({ type: 'Delete', targets }),

  assign: (targets: Expr[], value: Expr): Assign => ({
    type: 'Assign',
    targets,
    value
  }),

  augAssign: (target: Expr, op: BinaryOperator, value: Expr): AugAssign => ({
    type: 'AugAssign',
    target,
    op,
    value
  }),

  annAssign: (
    target: Expr,
    annotation: Expr,
    value: Expr | null = null
  ): AnnAssign => ({
    type: 'AnnAssign',
    target,
    annotation,
    value,
    simple: target.type === 'Name' ? 1 : 0
  }),

  if: (test: Expr, body: Stmt[], orelse: Stmt[] = []): If => ({
    type: 'If',
    test,
    body,
    orelse
  }),

  for: (target: Expr, iter: Expr, body: Stmt[], orelse: Stmt[] = []): For => ({
    type: 'For',
    target,
    iter,
    body,
    orelse
  }),

  while: (test: Expr, body: Stmt[], orelse: Stmt[] = []): While => ({
    type: 'While',
    test,
    body,
    orelse
  }),

  try: (
    body: Stmt[],
    handlers: ExceptHandler[],
    orelse: Stmt[] = [],
    finalbody: Stmt[] = []
  ): Try => ({ type: 'Try', body, handlers, orelse, finalbody }),

  exceptHandler: (
    exc_type: Expr | null,
    name: string | null,
    body: Stmt[]
  ): ExceptHandler => ({ type: 'ExceptHandler', exc_type, name, body }),

  assert: (test: Expr, msg: Expr | null = null): Assert => ({
    type: 'Assert',
    test,
    msg
  }),

  import: (names: Alias[]): Import => ({ type: 'Import', names }),

  importFrom: (module: string | null, names: Alias[], level = 0): ImportFrom => ({
    type: 'ImportFrom',
    module,
    names,
    level
  }),

  alias: (name: string, asname: string | null = null): Alias => ({
    type: 'alias',
    name,
    asname
  }),

  expr: (value: Expr): ExprStmt => ({ type: 'Expr', value }),

  pass: (): Pass => ({ type: 'Pass' }),

  boolOp: (op: BoolOperator, values: Expr[]): BoolOp => ({
    type: 'BoolOp',
    op,
    values
  }),

  binOp: (left: Expr, op: BinaryOperator, right: Expr): BinOp => ({
    type: 'BinOp',
    left,
    op,
    right
  }),

  unaryOp: (op: UnaryOperator, operand: Expr): UnaryOp => ({
    type: 'UnaryOp',
    op,
    operand
  }),

  lambda: (args: Arguments, body: Expr): Lambda => ({
    type: 'Lambda',
    args,
    body
  }),

  ifExp: (test: Expr, body: Expr, orelse: Expr): IfExp => ({
    type: 'IfExp',
    test,
    body,
    orelse
  }),

  dict: (keys: Array<Expr | null>, values: Expr[]): Dict => ({
    type: 'Dict',
    keys,
    values
  }),

  set: (elts: Expr[]): SetExpr => ({ type: 'Set', elts }),

  listComp: (elt: Expr, generators: Comprehension[]): ListComp => ({
    type: 'ListComp',
    elt,
    generators
  }),

  await: (value: Expr): Await => ({ type: 'Await', value }),

  yieldFrom: (value: Expr): YieldFrom => ({ type: 'YieldFrom', value }),

  call: (func: Expr, args: Expr[] = [], keywords: Keyword[] = []): Call => ({
    type: 'Call',
    func,
    args,
    keywords
  }),

  formattedValue: (
    value: Expr,
    conversion = -1,
    format_spec: Expr | null = null
  ): FormattedValue => ({
    type: 'FormattedValue',
    value,
    conversion,
    format_spec
  }),

  joinedStr: (values: Expr[]): JoinedStr => ({ type: 'JoinedStr', values }),

  constant: (value: ConstantValue): Constant => ({ type: 'Constant', value }),

  attribute: (
    value: Expr,
    attr: string,
    ctx: ExprContext = 'Load'
  ): Attribute => ({ type: 'Attribute', value, attr, ctx }),

  subscript: (
    value: Expr,
    slice: Expr,
    ctx: ExprContext = 'Load'
  ): Subscript => ({ type: 'Subscript', value, slice, ctx }),

  starred: (value: Expr, ctx: ExprContext = 'Load'): Starred => ({
    type: 'Starred',
    value,
    ctx
  }),

  name: (id: string, ctx: ExprContext = 'Load'): Name => ({
    type: 'Name',
    id,
    ctx
  }),

  list: (elts: Expr[], ctx: ExprContext = 'Load'): List => ({
    type: 'List',
    elts,
    ctx
  }),

  tuple: (elts: Expr[], ctx: ExprContext = 'Load'): Tuple => ({
    type: 'Tuple',
    elts,
    ctx
  }),

  arguments: (
    parts: Partial<Omit<Arguments, 'type'>> = {}
  ): Arguments => ({
    type: 'arguments',
    posonlyargs: parts.posonlyargs ?? [],
    args: parts.args ?? [],
    vararg: parts.vararg ?? null,
    kwonlyargs: parts.kwonlyargs ?? [],
    kw_defaults: parts.kw_defaults ?? [],
    kwarg: parts.kwarg ?? null,
    defaults: parts.defaults ?? []
  }),

  arg: (arg: string, annotation: Expr | null = null): Arg => ({
    type: 'arg',
    arg,
    annotation
  }),

  comprehension: (
    target: Expr,
    iter: Expr,
    ifs: Expr[] = []
  ): Comprehension => ({ type: 'comprehension', target, iter, ifs, is_async: 0 }),

  keyword: (arg: string | null, value: Expr): Keyword => ({
    type: 'keyword',
    arg,
    value
  })
};

/**
 * Copies the source position of `source` onto a synthesized `node`, if
 * `source` has one. Returns `node`.
 */
export function withPositionOf<T extends Node>(node: T, source: Node): T {
  if (source.position) node.position = source.position;
  return node;
}
