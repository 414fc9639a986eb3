import { assertNever } from '../parsing/ast.js';
import type { Block, Call, Expression, ProcedureDecl, Statement } from '../parsing/ast.js';
import { formatExpression } from '../parsing/printer.js';
import {
  assignmentEnvironment,
  BUILTIN_FUNCTIONS,
  callsInExpression,
  callsInStatement,
  childBlocks,
  identifiersIn,
  isSelfCall,
  numericValue,
  procedureKey,
  SIZE_FIELDS,
  statementExpressions,
  walkExpression,
} from './ast-walk.js';
import { divisionFactor } from './loop-progress.js';

/** How a recursive call shrinks the input size n. */
export type SizeTransform =
  | { kind: 'subtract'; amount: number; text: string }
  | { kind: 'subtract-symbolic'; text: string }
  | { kind: 'divide'; divisor: number; text: string; assumed: boolean }
  | { kind: 'unknown'; text: string };

export interface SelfCallSite {
  call: Call;
  transform: SizeTransform;
  insideLoop: boolean;
  line: number;
  note?: string;
}

const TRANSFORM_RANK: Record<SizeTransform['kind'], number> = {
  divide: 3,
  subtract: 2,
  'subtract-symbolic': 1,
  unknown: 0,
};

export function subtractTransform(amount: number): SizeTransform {
  return { kind: 'subtract', amount, text: `n-${amount}` };
}

export function divideTransform(divisor: number, assumed = false): SizeTransform {
  return { kind: 'divide', divisor, text: `n/${divisor}`, assumed };
}

interface Deduction {
  transform: SizeTransform;
  note?: string;
}

interface DeductionContext {
  parameters: string[];
  environment: Map<string, Expression>;
}

function compact(expression: Expression): string {
  return formatExpression(expression).replace(/\s+/g, '');
}

function mentionsParameterOrLength(expression: Expression, parameters: readonly string[]): boolean {
  let found = false;
  walkExpression(expression, node => {
    if (node.kind === 'Identifier' && parameters.includes(node.name)) found = true;
    if (node.kind === 'Call' && BUILTIN_FUNCTIONS.has(procedureKey(node.callee))) found = true;
    if (node.kind === 'FieldAccess' && SIZE_FIELDS.has(procedureKey(node.field))) found = true;
  });
  return found;
}

/** A variable that splits the input: `mid <- (low + high) div 2`, or `q <- Partition(...)`. */
function splitPoint(name: string, context: DeductionContext): Deduction | null {
  const value = context.environment.get(name);
  if (!value) return null;

  const division = divisionFactor(value);
  if (division && mentionsParameterOrLength(division.operand, context.parameters)) {
    return { transform: divideTransform(division.divisor) };
  }
  if (value.kind === 'Call' && !BUILTIN_FUNCTIONS.has(procedureKey(value.callee))) {
    return {
      transform: divideTransform(2, true),
      note: `split point ${name} comes from ${value.callee}(); a balanced split is assumed`,
    };
  }
  return null;
}

/** `mid`, `mid + 1` or `mid - 1` where mid is a split point. */
function splitOffset(expression: Expression, context: DeductionContext): Deduction | null {
  if (expression.kind === 'Identifier') return splitPoint(expression.name, context);
  if (
    expression.kind === 'BinaryExpr' &&
    (expression.operator === '+' || expression.operator === '-') &&
    expression.left.kind === 'Identifier' &&
    numericValue(expression.right) !== null
  ) {
    return splitPoint(expression.left.name, context);
  }
  return null;
}

/** `n - a - b ...` with n leftmost; returns the subtrahends. */
function subtrahends(expression: Expression, parameter: string): Expression[] | null {
  if (expression.kind !== 'BinaryExpr' || expression.operator !== '-') return null;
  if (expression.left.kind === 'Identifier' && expression.left.name === parameter) return [expression.right];
  const inner = subtrahends(expression.left, parameter);
  return inner ? [...inner, expression.right] : null;
}

function rangeDeduction(range: Expression, context: DeductionContext): Deduction | null {
  if (range.kind !== 'BinaryExpr' || range.operator !== '..') return null;
  const split = splitOffset(range.left, context) ?? splitOffset(range.right, context);
  if (split) return split;

  const start = numericValue(range.left);
  if (start !== null && start > 1) return { transform: subtractTransform(start - 1) };
  if (range.right.kind === 'BinaryExpr' && range.right.operator === '-') {
    const amount = numericValue(range.right.right);
    if (amount !== null && amount > 0) return { transform: subtractTransform(amount) };
  }
  return { transform: { kind: 'subtract-symbolic', text: compact(range) } };
}

function argumentDeduction(
  arg: Expression,
  parameter: string | undefined,
  context: DeductionContext
): Deduction | null {
  if (parameter === undefined) return null;
  if (arg.kind === 'Identifier' && arg.name === parameter) return null;

  const parts = subtrahends(arg, parameter);
  if (parts) {
    const amounts = parts.map(numericValue);
    if (amounts.every((amount): amount is number => amount !== null)) {
      const total = amounts.reduce((sum, amount) => sum + amount, 0);
      if (total <= 0) {
        const text = compact(arg);
        return {
          transform: { kind: 'unknown', text },
          note: `argument ${text} does not shrink ${parameter}; the recursion may not terminate`,
        };
      }
      return { transform: subtractTransform(total) };
    }
    const rest = parts.map(compact).join('-');
    return {
      transform: { kind: 'subtract-symbolic', text: `n-${rest}` },
      note: `size shrinks by a non-constant amount (${rest})`,
    };
  }

  const division = divisionFactor(arg);
  if (division && identifiersIn(division.operand).has(parameter)) {
    return { transform: divideTransform(division.divisor) };
  }

  const split = splitOffset(arg, context);
  if (split) return split;

  if (arg.kind === 'ArrayAccess') {
    for (const index of arg.indices) {
      const deduction = rangeDeduction(index, context);
      if (deduction) return deduction;
    }
  }

  if (identifiersIn(arg).has(parameter)) {
    return { transform: { kind: 'unknown', text: compact(arg) } };
  }
  return null;
}

/** Size transform of one self-call, from its arguments matched against the parameters. */
export function deduceTransform(call: Call, procedure: ProcedureDecl, environment?: Map<string, Expression>): Deduction {
  const context: DeductionContext = {
    parameters: procedure.parameters.map(parameter => parameter.name),
    environment: environment ?? assignmentEnvironment(procedure.body),
  };

  let best: Deduction | null = null;
  for (const [index, arg] of call.args.entries()) {
    const deduction = argumentDeduction(arg, context.parameters[index], context);
    if (!deduction) continue;
    if (!best || TRANSFORM_RANK[deduction.transform.kind] > TRANSFORM_RANK[best.transform.kind]) {
      best = deduction;
    }
  }

  return (
    best ?? {
      transform: { kind: 'unknown', text: 'n' },
      note: `call to ${call.callee} on line ${call.line} does not shrink any parameter`,
    }
  );
}

/** Every self-call in the procedure with its deduced transform and loop nesting. */
export function selfCallSites(procedure: ProcedureDecl): SelfCallSite[] {
  const environment = assignmentEnvironment(procedure.body);
  const sites: SelfCallSite[] = [];

  const visitBlock = (block: Block, insideLoop: boolean): void => {
    for (const statement of block.statements) {
      for (const call of callsInStatement(statement)) {
        if (!isSelfCall(call, procedure)) continue;
        const deduction = deduceTransform(call, procedure, environment);
        sites.push({
          call,
          transform: deduction.transform,
          insideLoop,
          line: call.line,
          ...(deduction.note ? { note: deduction.note } : {}),
        });
      }
      const loop = statement.kind === 'ForLoop' || statement.kind === 'WhileLoop' || statement.kind === 'RepeatUntilLoop';
      for (const child of childBlocks(statement)) {
        visitBlock(child, insideLoop || loop);
      }
    }
  };

  visitBlock(procedure.body, false);
  return sites;
}

export interface CallRange {
  min: number;
  max: number;
}

interface PathCount {
  /** Paths that fall through to the next statement. */
  open: CallRange | null;
  /** Paths that already returned. */
  closed: CallRange | null;
}

function merge(a: CallRange | null, b: CallRange | null): CallRange | null {
  if (!a) return b;
  if (!b) return a;
  return { min: Math.min(a.min, b.min), max: Math.max(a.max, b.max) };
}

function shift(range: CallRange | null, by: CallRange): CallRange | null {
  return range ? { min: range.min + by.min, max: range.max + by.max } : null;
}

function countIn(expressions: Expression[], procedure: ProcedureDecl): number {
  return expressions
    .flatMap(callsInExpression)
    .filter(call => isSelfCall(call, procedure)).length;
}

function countStatement(statement: Statement, procedure: ProcedureDecl): PathCount {
  const own = countIn(statementExpressions(statement), procedure) + (statement.kind === 'Call' && isSelfCall(statement, procedure) ? 1 : 0);
  const here: CallRange = { min: own, max: own };

  switch (statement.kind) {
    case 'Block':
      return countBlock(statement, procedure);
    case 'Assignment':
    case 'Call':
      return { open: here, closed: null };
    case 'ReturnStmt':
      return { open: null, closed: here };
    case 'IfElse': {
      const consequent = countBlock(statement.consequent, procedure);
      const alternate = statement.alternate
        ? countBlock(statement.alternate, procedure)
        : { open: { min: 0, max: 0 }, closed: null };
      return {
        open: shift(merge(consequent.open, alternate.open), here),
        closed: shift(merge(consequent.closed, alternate.closed), here),
      };
    }
    case 'ForLoop':
    case 'WhileLoop':
    case 'RepeatUntilLoop': {
      const body = countBlock(statement.body, procedure);
      const inner = merge(body.open, body.closed);
      return { open: { min: own, max: own + (inner ? inner.max : 0) }, closed: null };
    }
    default:
      return assertNever(statement);
  }
}

function countBlock(block: Block, procedure: ProcedureDecl): PathCount {
  let open: CallRange | null = { min: 0, max: 0 };
  let closed: CallRange | null = null;

  for (const statement of block.statements) {
    if (!open) break;
    const count = countStatement(statement, procedure);
    closed = merge(closed, count.closed ? shift(count.closed, open) : null);
    open = count.open ? shift(count.open, open) : null;
  }
  return { open, closed };
}

/**
 * Fewest and most self-calls made along any single execution path through
 * the body. Calls in exclusive branches count once.
 */
export function selfCallPaths(procedure: ProcedureDecl): CallRange {
  const count = countBlock(procedure.body, procedure);
  return merge(count.open, count.closed) ?? { min: 0, max: 0 };
}
