import { assertNever } from '../parsing/ast.js';
import type {
  Assignment,
  Block,
  Call,
  Expression,
  ProcedureDecl,
  Program,
  ReturnStmt,
  Statement,
} from '../parsing/ast.js';

export const BUILTIN_FUNCTIONS: ReadonlySet<string> = new Set([
  'length',
  'len',
  'size',
  'floor',
  'ceil',
  'ceiling',
  'min',
  'max',
  'abs',
  'sqrt',
  'log',
  'print',
  'write',
  'swap',
  'exchange',
]);

/** Fields that read an array's size, as in `A.length`. */
export const SIZE_FIELDS: ReadonlySet<string> = new Set(['length', 'size']);

export type ProcedureTable = ReadonlyMap<string, ProcedureDecl>;

export function procedureKey(name: string): string {
  return name.toLowerCase();
}

export function buildProcedureTable(program: Program): ProcedureTable {
  const table = new Map<string, ProcedureDecl>();
  for (const procedure of program.procedures) {
    table.set(procedureKey(procedure.name), procedure);
  }
  return table;
}

export function isSelfCall(call: Call, procedure: ProcedureDecl): boolean {
  const callee = procedureKey(call.callee);
  return callee === 'self' || callee === procedureKey(procedure.name);
}

/** Expressions that appear directly in a statement, not in nested statements. */
export function statementExpressions(statement: Statement): Expression[] {
  switch (statement.kind) {
    case 'Block':
      return [];
    case 'ForLoop':
      return statement.step ? [statement.start, statement.end, statement.step] : [statement.start, statement.end];
    case 'WhileLoop':
    case 'RepeatUntilLoop':
    case 'IfElse':
      return [statement.condition];
    case 'Assignment':
      return [statement.target, statement.value];
    case 'Call':
      return statement.args;
    case 'ReturnStmt':
      return statement.value ? [statement.value] : [];
    default:
      return assertNever(statement);
  }
}

export function childBlocks(statement: Statement): Block[] {
  switch (statement.kind) {
    case 'Block':
      return [statement];
    case 'ForLoop':
    case 'WhileLoop':
    case 'RepeatUntilLoop':
      return [statement.body];
    case 'IfElse':
      return statement.alternate ? [statement.consequent, statement.alternate] : [statement.consequent];
    case 'Assignment':
    case 'Call':
    case 'ReturnStmt':
      return [];
    default:
      return assertNever(statement);
  }
}

/** Depth-first, pre-order walk over every statement under a block. */
export function walkStatements(block: Block, visit: (statement: Statement) => void): void {
  for (const statement of block.statements) {
    visit(statement);
    for (const child of childBlocks(statement)) {
      walkStatements(child, visit);
    }
  }
}

export function walkExpression(expression: Expression, visit: (expression: Expression) => void): void {
  visit(expression);
  switch (expression.kind) {
    case 'BinaryExpr':
      walkExpression(expression.left, visit);
      walkExpression(expression.right, visit);
      return;
    case 'UnaryExpr':
      walkExpression(expression.operand, visit);
      return;
    case 'ArrayAccess':
      walkExpression(expression.target, visit);
      expression.indices.forEach(index => walkExpression(index, visit));
      return;
    case 'FieldAccess':
      walkExpression(expression.target, visit);
      return;
    case 'Call':
      expression.args.forEach(arg => walkExpression(arg, visit));
      return;
    case 'Identifier':
    case 'Literal':
      return;
    default:
      assertNever(expression);
  }
}

/** Calls inside the statement's own expressions, including the statement itself when it is a call. */
export function callsInStatement(statement: Statement): Call[] {
  const calls: Call[] = [];
  if (statement.kind === 'Call') calls.push(statement);
  for (const expression of statement.kind === 'Call' ? statement.args : statementExpressions(statement)) {
    calls.push(...callsInExpression(expression));
  }
  return calls;
}

export function callsInExpression(expression: Expression): Call[] {
  const calls: Call[] = [];
  walkExpression(expression, node => {
    if (node.kind === 'Call') calls.push(node);
  });
  return calls;
}

export function callsInBlock(block: Block): Call[] {
  const calls: Call[] = [];
  walkStatements(block, statement => calls.push(...callsInStatement(statement)));
  return calls;
}

export function selfCalls(procedure: ProcedureDecl): Call[] {
  return callsInBlock(procedure.body).filter(call => isSelfCall(call, procedure));
}

export function isRecursive(procedure: ProcedureDecl): boolean {
  return selfCalls(procedure).length > 0;
}

export function identifiersIn(expression: Expression): Set<string> {
  const names = new Set<string>();
  walkExpression(expression, node => {
    if (node.kind === 'Identifier') names.add(node.name);
  });
  return names;
}

export function mentions(expression: Expression, name: string): boolean {
  return identifiersIn(expression).has(name);
}

/** Assignments whose target is the plain variable `name`, anywhere under the block. */
export function assignmentsTo(block: Block, name: string): Assignment[] {
  const found: Assignment[] = [];
  walkStatements(block, statement => {
    if (statement.kind === 'Assignment' && statement.target.kind === 'Identifier' && statement.target.name === name) {
      found.push(statement);
    }
  });
  return found;
}

export function returnsIn(block: Block): ReturnStmt[] {
  const found: ReturnStmt[] = [];
  walkStatements(block, statement => {
    if (statement.kind === 'ReturnStmt') found.push(statement);
  });
  return found;
}

/** Latest value assigned to each variable, in program order. */
export function assignmentEnvironment(block: Block): Map<string, Expression> {
  const environment = new Map<string, Expression>();
  walkStatements(block, statement => {
    if (statement.kind === 'Assignment' && statement.target.kind === 'Identifier') {
      environment.set(statement.target.name, statement.value);
    }
  });
  return environment;
}

/** Structural equality of two expressions, ignoring source positions. */
export function sameExpression(a: Expression, b: Expression): boolean {
  switch (a.kind) {
    case 'Identifier':
      return b.kind === 'Identifier' && a.name === b.name;
    case 'Literal':
      return b.kind === 'Literal' && a.literalType === b.literalType && a.value === b.value;
    case 'BinaryExpr':
      return (
        b.kind === 'BinaryExpr' &&
        a.operator === b.operator &&
        sameExpression(a.left, b.left) &&
        sameExpression(a.right, b.right)
      );
    case 'UnaryExpr':
      return b.kind === 'UnaryExpr' && a.operator === b.operator && sameExpression(a.operand, b.operand);
    case 'ArrayAccess':
      return (
        b.kind === 'ArrayAccess' &&
        sameExpression(a.target, b.target) &&
        a.indices.length === b.indices.length &&
        a.indices.every((index, i) => {
          const other = b.indices[i];
          return other !== undefined && sameExpression(index, other);
        })
      );
    case 'FieldAccess':
      return (
        b.kind === 'FieldAccess' &&
        procedureKey(a.field) === procedureKey(b.field) &&
        sameExpression(a.target, b.target)
      );
    case 'Call':
      return (
        b.kind === 'Call' &&
        procedureKey(a.callee) === procedureKey(b.callee) &&
        a.args.length === b.args.length &&
        a.args.every((arg, i) => {
          const other = b.args[i];
          return other !== undefined && sameExpression(arg, other);
        })
      );
    default:
      return assertNever(a);
  }
}

export function numericValue(expression: Expression): number | null {
  if (expression.kind === 'Literal' && expression.literalType === 'number') return expression.value;
  if (expression.kind === 'UnaryExpr' && expression.operator === '-') {
    const inner = numericValue(expression.operand);
    return inner === null ? null : -inner;
  }
  return null;
}
