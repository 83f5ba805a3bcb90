import type { Data, Position } from 'unist';

/**
 * Python syntax tree, JSON-shaped.
 *
 * Node kinds and field names mirror the `ast` module of CPython 3.9+, with one
 * deviation: `ExceptHandler.type` is stored as `exc_type`, because `type` is
 * the discriminant shared by every node (which also makes every node a valid
 * unist node for unified).
 *
 * All node shapes are declared as type aliases (not interfaces) so that the
 * rewrite engine can treat any node as a string-keyed record when it reads
 * and writes fields generically.
 */

type NodeBase<T extends string> = {
  type: T;
  position?: Position;
  data?: Data;
};

export type ExprContext = 'Load' | 'Store' | 'Del';

export type BoolOperator = 'And' | 'Or';

export type BinaryOperator =
  | 'Add'
  | 'Sub'
  | 'Mult'
  | 'MatMult'
  | 'Div'
  | 'Mod'
  | 'Pow'
  | 'LShift'
  | 'RShift'
  | 'BitOr'
  | 'BitXor'
  | 'BitAnd'
  | 'FloorDiv';

export type UnaryOperator = 'Invert' | 'Not' | 'UAdd' | 'USub';

export type CompareOperator =
  | 'Eq'
  | 'NotEq'
  | 'Lt'
  | 'LtE'
  | 'Gt'
  | 'GtE'
  | 'Is'
  | 'IsNot'
  | 'In'
  | 'NotIn';

/**
 * Value of a `Constant` node.
 * `null` stands for `None`; byte strings and complex numbers are out of scope.
 */
export type ConstantValue = string | number | boolean | null;

// ---------------------------------------------------------------------------
// Module
// ---------------------------------------------------------------------------

export type Module = NodeBase<'Module'> & {
  body: Stmt[];
};

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

export type FunctionDef = NodeBase<'FunctionDef'> & {
  name: string;
  args: Arguments;
  body: Stmt[];
  decorator_list: Expr[];
  returns: Expr | null;
};

export type AsyncFunctionDef = NodeBase<'AsyncFunctionDef'> & {
  name: string;
  args: Arguments;
  body: Stmt[];
  decorator_list: Expr[];
  returns: Expr | null;
};

export type ClassDef = NodeBase<'ClassDef'> & {
  name: string;
  bases: Expr[];
  keywords: Keyword[];
  body: Stmt[];
  decorator_list: Expr[];
};

export type Return = NodeBase<'Return'> & {
  value: Expr | null;
};

export type Delete = NodeBase<'Delete'> & {
  targets: Expr[];
};

export type Assign = NodeBase<'Assign'> & {
  targets: Expr[];
  value: Expr;
};

export type AugAssign = NodeBase<'AugAssign'> & {
  target: Expr;
  op: BinaryOperator;
  value: Expr;
};

export type AnnAssign = NodeBase<'AnnAssign'> & {
  target: Expr;
  annotation: Expr;
  value: Expr | null;
  /** 1 when the target is a bare name that is not parenthesized. */
  simple: number;
};

export type For = NodeBase<'For'> & {
  target: Expr;
  iter: Expr;
  body: Stmt[];
  orelse: Stmt[];
};

export type While = NodeBase<'While'> & {
  test: Expr;
  body: Stmt[];
  orelse: Stmt[];
};

export type If = NodeBase<'If'> & {
  test: Expr;
  body: Stmt[];
  orelse: Stmt[];
};

export type With = NodeBase<'With'> & {
  items: WithItem[];
  body: Stmt[];
};

export type Raise = NodeBase<'Raise'> & {
  exc: Expr | null;
  cause: Expr | null;
};

export type Try = NodeBase<'Try'> & {
  body: Stmt[];
  handlers: ExceptHandler[];
  orelse: Stmt[];
  finalbody: Stmt[];
};

export type Assert = NodeBase<'Assert'> & {
  test: Expr;
  msg: Expr | null;
};

export type Import = NodeBase<'Import'> & {
  names: Alias[];
};

export type ImportFrom = NodeBase<'ImportFrom'> & {
  module: string | null;
  names: Alias[];
  level: number;
};

export type Global = NodeBase<'Global'> & {
  names: string[];
};

export type Nonlocal = NodeBase<'Nonlocal'> & {
  names: string[];
};

export type ExprStmt = NodeBase<'Expr'> & {
  value: Expr;
};

export type Pass = NodeBase<'Pass'>;

export type Break = NodeBase<'Break'>;

export type Continue = NodeBase<'Continue'>;

export type Stmt =
  | FunctionDef
  | AsyncFunctionDef
  | ClassDef
  | Return
  | Delete
  | Assign
  | AugAssign
  | AnnAssign
  | For
  | While
  | If
  | With
  | Raise
  | Try
  | Assert
  | Import
  | ImportFrom
  | Global
  | Nonlocal
  | ExprStmt
  | Pass
  | Break
  | Continue;

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

export type BoolOp = NodeBase<'BoolOp'> & {
  op: BoolOperator;
  values: Expr[];
};

export type BinOp = NodeBase<'BinOp'> & {
  left: Expr;
  op: BinaryOperator;
  right: Expr;
};

export type UnaryOp = NodeBase<'UnaryOp'> & {
  op: UnaryOperator;
  operand: Expr;
};

export type Lambda = NodeBase<'Lambda'> & {
  args: Arguments;
  body: Expr;
};

export type IfExp = NodeBase<'IfExp'> & {
  test: Expr;
  body: Expr;
  orelse: Expr;
};

/**
 * Mapping display. A `null` key marks a `**mapping` entry whose mapping is the
 * value at the same index.
 */
export type Dict = NodeBase<'Dict'> & {
  keys: Array<Expr | null>;
  values: Expr[];
};

export type SetExpr = NodeBase<'Set'> & {
  elts: Expr[];
};

export type ListComp = NodeBase<'ListComp'> & {
  elt: Expr;
  generators: Comprehension[];
};

export type SetComp = NodeBase<'SetComp'> & {
  elt: Expr;
  generators: Comprehension[];
};

export type DictComp = NodeBase<'DictComp'> & {
  key: Expr;
  value: Expr;
  generators: Comprehension[];
};

export type GeneratorExp = NodeBase<'GeneratorExp'> & {
  elt: Expr;
  generators: Comprehension[];
};

export type Await = NodeBase<'Await'> & {
  value: Expr;
};

export type Yield = NodeBase<'Yield'> & {
  value: Expr | null;
};

export type YieldFrom = NodeBase<'YieldFrom'> & {
  value: Expr;
};

export type Compare = NodeBase<'Compare'> & {
  left: Expr;
  ops: CompareOperator[];
  comparators: Expr[];
};

export type Call = NodeBase<'Call'> & {
  func: Expr;
  args: Expr[];
  keywords: Keyword[];
};

export type FormattedValue = NodeBase<'FormattedValue'> & {
  value: Expr;
  /** -1 (none), 115 (`!s`), 114 (`!r`) or 97 (`!a`). */
  conversion: number;
  format_spec: Expr | null;
};

export type JoinedStr = NodeBase<'JoinedStr'> & {
  values: Expr[];
};

export type Constant = NodeBase<'Constant'> & {
  value: ConstantValue;
};

export type Attribute = NodeBase<'Attribute'> & {
  value: Expr;
  attr: string;
  ctx: ExprContext;
};

export type Subscript = NodeBase<'Subscript'> & {
  value: Expr;
  slice: Expr;
  ctx: ExprContext;
};

export type Starred = NodeBase<'Starred'> & {
  value: Expr;
  ctx: ExprContext;
};

export type Name = NodeBase<'Name'> & {
  id: string;
  ctx: ExprContext;
};

export type List = NodeBase<'List'> & {
  elts: Expr[];
  ctx: ExprContext;
};

export type Tuple = NodeBase<'Tuple'> & {
  elts: Expr[];
  ctx: ExprContext;
};

export type Slice = NodeBase<'Slice'> & {
  lower: Expr | null;
  upper: Expr | null;
  step: Expr | null;
};

export type Expr =
  | BoolOp
  | BinOp
  | UnaryOp
  | Lambda
  | IfExp
  | Dict
  | SetExpr
  | ListComp
  | SetComp
  | DictComp
  | GeneratorExp
  | Await
  | Yield
  | YieldFrom
  | Compare
  | Call
  | FormattedValue
  | JoinedStr
  | Constant
  | Attribute
  | Subscript
  | Starred
  | Name
  | List
  | Tuple
  | Slice;

// ---------------------------------------------------------------------------
// Helper nodes
// ---------------------------------------------------------------------------

export type Arguments = NodeBase<'arguments'> & {
  posonlyargs: Arg[];
  args: Arg[];
  vararg: Arg | null;
  kwonlyargs: Arg[];
  /** Aligned with `kwonlyargs`; `null` where the parameter has no default. */
  kw_defaults: Array<Expr | null>;
  kwarg: Arg | null;
  /** Defaults of the trailing positional parameters. */
  defaults: Expr[];
};

export type Arg = NodeBase<'arg'> & {
  arg: string;
  annotation: Expr | null;
};

/** Keyword argument of a call or class definition; `arg: null` is `**mapping`. */
export type Keyword = NodeBase<'keyword'> & {
  arg: string | null;
  value: Expr;
};

export type Alias = NodeBase<'alias'> & {
  name: string;
  asname: string | null;
};

export type WithItem = NodeBase<'withitem'> & {
  context_expr: Expr;
  optional_vars: Expr | null;
};

export type Comprehension = NodeBase<'comprehension'> & {
  target: Expr;
  iter: Expr;
  ifs: Expr[];
  is_async: number;
};

export type ExceptHandler = NodeBase<'ExceptHandler'> & {
  exc_type: Expr | null;
  name: string | null;
  body: Stmt[];
};

export type Helper =
  | Arguments
  | Arg
  | Keyword
  | Alias
  | WithItem
  | Comprehension
  | ExceptHandler;

// ---------------------------------------------------------------------------
// Unions
// ---------------------------------------------------------------------------

export type Node = Module | Stmt | Expr | Helper;

export type NodeType = Node['type'];

/**
 * Narrows the node union to the variant carrying the discriminant `T`.
 *
 * @example
 * ```ts
 * type CallNode = NodeOfType<'Call'>; // Call
 * ```
 */
export type NodeOfType<T extends NodeType> = Extract<Node, { type: T }>;

export type StmtType = Stmt['type'];

export type ExprType = Expr['type'];
