/**
 * Node vocabulary shared by every stage after the parser. The tree is owned
 * top-down; a procedure refers to itself only by name.
 */

interface NodeBase {
  line: number;
  column: number;
}

export interface Program extends NodeBase {
  kind: 'Program';
  procedures: ProcedureDecl[];
  /** Trailing `begin ... end` block outside any procedure, if present. */
  main: Block | null;
}

export interface Parameter {
  name: string;
  /** Array-size annotation as written, e.g. `[1..n]`. */
  annotation?: string;
}

export interface ProcedureDecl extends NodeBase {
  kind: 'ProcedureDecl';
  name: string;
  parameters: Parameter[];
  body: Block;
}

export interface Block extends NodeBase {
  kind: 'Block';
  statements: Statement[];
  /** True when the block was written with `begin` ... `end`. */
  delimited: boolean;
}

export type LoopDirection = 'up' | 'down';

export interface ForLoop extends NodeBase {
  kind: 'ForLoop';
  variable: string;
  start: Expression;
  end: Expression;
  step: Expression | null;
  direction: LoopDirection;
  body: Block;
}

export type LoopControl =
  | { state: 'resolved'; variable: string; bound: Expression }
  | { state: 'unresolved'; reason: string };

export interface WhileLoop extends NodeBase {
  kind: 'WhileLoop';
  condition: Expression;
  control: LoopControl;
  body: Block;
}

export interface RepeatUntilLoop extends NodeBase {
  kind: 'RepeatUntilLoop';
  body: Block;
  condition: Expression;
  control: LoopControl;
}

export interface IfElse extends NodeBase {
  kind: 'IfElse';
  condition: Expression;
  consequent: Block;
  alternate: Block | null;
}

export interface Assignment extends NodeBase {
  kind: 'Assignment';
  target: Identifier | ArrayAccess | FieldAccess;
  value: Expression;
}

export interface Call extends NodeBase {
  kind: 'Call';
  callee: string;
  args: Expression[];
  /** Written with the `CALL` keyword. */
  explicit: boolean;
}

export interface ReturnStmt extends NodeBase {
  kind: 'ReturnStmt';
  value: Expression | null;
}

export interface ArrayAccess extends NodeBase {
  kind: 'ArrayAccess';
  target: Expression;
  indices: Expression[];
}

/** `A.length`; `length` and `size` fields stand for the input size. */
export interface FieldAccess extends NodeBase {
  kind: 'FieldAccess';
  target: Expression;
  field: string;
}

export type BinaryOperator =
  | 'or'
  | 'and'
  | '='
  | '<>'
  | '<'
  | '<='
  | '>'
  | '>='
  | '+'
  | '-'
  | '*'
  | '/'
  | 'div'
  | 'mod'
  | '^'
  | '..';

export interface BinaryExpr extends NodeBase {
  kind: 'BinaryExpr';
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

export type UnaryOperator = '-' | '+' | 'not' | 'ceil' | 'floor';

export interface UnaryExpr extends NodeBase {
  kind: 'UnaryExpr';
  operator: UnaryOperator;
  operand: Expression;
}

export type Literal = NodeBase & { kind: 'Literal' } & (
    | { literalType: 'number'; value: number }
    | { literalType: 'string'; value: string }
    | { literalType: 'boolean'; value: boolean }
    | { literalType: 'null'; value: null }
  );

export interface Identifier extends NodeBase {
  kind: 'Identifier';
  name: string;
}

export type Statement =
  | Block
  | ForLoop
  | WhileLoop
  | RepeatUntilLoop
  | IfElse
  | Assignment
  | Call
  | ReturnStmt;

export type Expression = Call | ArrayAccess | FieldAccess | BinaryExpr | UnaryExpr | Literal | Identifier;

export type ASTNode = Program | ProcedureDecl | Statement | Expression;

export type Loop = ForLoop | WhileLoop | RepeatUntilLoop;

export function isLoop(statement: Statement): statement is Loop {
  return (
    statement.kind === 'ForLoop' ||
    statement.kind === 'WhileLoop' ||
    statement.kind === 'RepeatUntilLoop'
  );
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled node: ${JSON.stringify(value)}`);
}
