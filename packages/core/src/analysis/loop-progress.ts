import { formatExpression } from '../parsing/printer.js';
import type { Block, Expression, ForLoop, Loop, LoopControl } from '../parsing/ast.js';
import {
  assignmentsTo,
  identifiersIn,
  mentions,
  numericValue,
  sameExpression,
  walkExpression,
  walkStatements,
} from './ast-walk.js';
import { CONSTANT, growth, LOGARITHMIC } from './growth.js';
import type { Growth } from './growth.js';

export type LoopProgress =
  | { kind: 'constant'; reason: string }
  | { kind: 'polynomial'; degree: number; reason: string }
  | { kind: 'logarithmic'; reason: string }
  | { kind: 'unresolved'; reason: string };

/** Variables known to hold a value before the loop starts. */
export type InitialValues = ReadonlyMap<string, Expression>;

/**
 * Polynomial degree of an expression in the input size. Every variable is
 * taken to be O(n); literals are constant.
 */
export function expressionDegree(expression: Expression): number {
  switch (expression.kind) {
    case 'Literal':
      return 0;
    case 'Identifier':
    case 'ArrayAccess':
    case 'FieldAccess':
    case 'Call':
      return 1;
    case 'UnaryExpr':
      return expression.operator === 'not' ? 0 : expressionDegree(expression.operand);
    case 'BinaryExpr': {
      const left = expressionDegree(expression.left);
      const right = expressionDegree(expression.right);
      switch (expression.operator) {
        case '+':
        case '-':
        case '..':
          return Math.max(left, right);
        case '*':
          return left + right;
        case '/':
        case 'div':
          return Math.max(0, left - right);
        case 'mod':
          return Math.min(left, right);
        case '^': {
          const exponent = numericValue(expression.right);
          return exponent !== null && exponent >= 0 ? left * exponent : left;
        }
        default:
          return 0;
      }
    }
  }
}

/** Returns c when `expression` is `base + c` or `base - c` for a numeric c. */
function constantOffset(base: Expression, expression: Expression): number | null {
  if (sameExpression(base, expression)) return 0;
  if (expression.kind !== 'BinaryExpr') return null;
  const amount = numericValue(expression.right);
  if (amount === null || !sameExpression(base, expression.left)) return null;
  if (expression.operator === '+') return amount;
  if (expression.operator === '-') return -amount;
  return null;
}

/** Divisor c when the expression halves-style shrinks a value: `x / c`, `x div c`, `⌊x / c⌋`. */
export function divisionFactor(expression: Expression): { divisor: number; operand: Expression } | null {
  if (expression.kind === 'UnaryExpr' && (expression.operator === 'floor' || expression.operator === 'ceil')) {
    return divisionFactor(expression.operand);
  }
  if (expression.kind !== 'BinaryExpr') return null;
  if (expression.operator === '/' || expression.operator === 'div') {
    const divisor = numericValue(expression.right);
    if (divisor !== null && divisor > 1) return { divisor, operand: expression.left };
  }
  // low + (high - low) div 2
  if (expression.operator === '+') {
    const inner = divisionFactor(expression.right);
    if (inner && inner.operand.kind === 'BinaryExpr' && inner.operand.operator === '-') return inner;
  }
  return null;
}

type UpdateShape = 'additive' | 'multiplicative' | 'other';

function updateShape(variable: string, value: Expression): UpdateShape {
  if (value.kind === 'UnaryExpr' && (value.operator === 'floor' || value.operator === 'ceil')) {
    return updateShape(variable, value.operand);
  }
  if (value.kind !== 'BinaryExpr') return 'other';

  const leftIsVariable = value.left.kind === 'Identifier' && value.left.name === variable;
  const rightIsVariable = value.right.kind === 'Identifier' && value.right.name === variable;
  const leftAmount = numericValue(value.left);
  const rightAmount = numericValue(value.right);

  switch (value.operator) {
    case '+':
      if ((leftIsVariable && rightAmount !== null) || (rightIsVariable && leftAmount !== null)) return 'additive';
      return 'other';
    case '-':
      return leftIsVariable && rightAmount !== null ? 'additive' : 'other';
    case '*':
      if ((leftIsVariable && rightAmount !== null && rightAmount > 1) || (rightIsVariable && leftAmount !== null && leftAmount > 1)) {
        return 'multiplicative';
      }
      return 'other';
    case '/':
    case 'div':
      return leftIsVariable && rightAmount !== null && rightAmount > 1 ? 'multiplicative' : 'other';
    default:
      return 'other';
  }
}

/**
 * Binary-search shape: some `mid <- (low + high) div 2` in the body, with the
 * control variable or its bound then reassigned from `mid`.
 */
export function hasMidpointShape(body: Block, variables: ReadonlySet<string>): boolean {
  const midpoints = new Set<string>();
  walkStatements(body, statement => {
    if (statement.kind !== 'Assignment' || statement.target.kind !== 'Identifier') return;
    const division = divisionFactor(statement.value);
    if (!division) return;
    const used = identifiersIn(division.operand);
    if ([...variables].some(name => used.has(name))) midpoints.add(statement.target.name);
  });
  if (midpoints.size === 0) return false;

  let narrowed = false;
  walkStatements(body, statement => {
    if (statement.kind !== 'Assignment' || statement.target.kind !== 'Identifier') return;
    if (!variables.has(statement.target.name)) return;
    if ([...midpoints].some(mid => mentions(statement.value, mid))) narrowed = true;
  });
  return narrowed;
}

function boundVariables(control: LoopControl & { state: 'resolved' }): Set<string> {
  const names = new Set<string>([control.variable]);
  if (control.bound.kind === 'Identifier') names.add(control.bound.name);
  return names;
}

function isBooleanLiteral(expression: Expression): boolean {
  return expression.kind === 'Literal' && expression.literalType === 'boolean';
}

function classifyFor(loop: ForLoop): LoopProgress {
  if (assignmentsTo(loop.body, loop.variable).length > 0) {
    return { kind: 'unresolved', reason: `loop variable ${loop.variable} is reassigned inside the body` };
  }

  const span =
    constantOffset(loop.start, loop.end) !== null || constantOffset(loop.end, loop.start) !== null
      ? 0
      : Math.max(expressionDegree(loop.start), expressionDegree(loop.end));
  const degree = Math.max(0, span - (loop.step ? expressionDegree(loop.step) : 0));

  if (degree === 0) {
    return { kind: 'constant', reason: `bounds of ${loop.variable} do not depend on the input` };
  }
  return {
    kind: 'polynomial',
    degree,
    reason: `${loop.variable} runs from ${formatExpression(loop.start)} to ${formatExpression(loop.end)}`,
  };
}

function classifyConditional(
  body: Block,
  control: LoopControl,
  initialValues: InitialValues
): LoopProgress {
  if (control.state === 'unresolved') {
    return { kind: 'unresolved', reason: control.reason };
  }

  const { variable, bound } = control;
  if (isBooleanLiteral(bound)) {
    return { kind: 'unresolved', reason: `${variable} is a flag; the number of passes depends on the data` };
  }
  if (hasMidpointShape(body, boundVariables(control))) {
    return { kind: 'logarithmic', reason: `the interval around ${variable} is halved each pass` };
  }

  const updates = assignmentsTo(body, variable);
  if (updates.length === 0) {
    return { kind: 'unresolved', reason: `${variable} is never updated inside the loop` };
  }

  const shapes = new Set(updates.map(update => updateShape(variable, update.value)));
  if (shapes.has('other') || shapes.size > 1) {
    const first = updates.find(update => updateShape(variable, update.value) === 'other') ?? updates[0];
    const shown = first ? `${variable} <- ${formatExpression(first.value)}` : variable;
    return { kind: 'unresolved', reason: `cannot classify the update ${shown}` };
  }

  const initial = initialValues.get(variable);
  const distance = Math.max(expressionDegree(bound), initial ? expressionDegree(initial) : 1);

  if (distance === 0) {
    return { kind: 'constant', reason: `${variable} moves between constant values` };
  }
  if (shapes.has('multiplicative')) {
    return { kind: 'logarithmic', reason: `${variable} is multiplied or divided by a constant each pass` };
  }
  return { kind: 'polynomial', degree: distance, reason: `${variable} changes by a constant step each pass` };
}

export function classifyLoop(loop: Loop, initialValues: InitialValues = new Map()): LoopProgress {
  switch (loop.kind) {
    case 'ForLoop':
      return classifyFor(loop);
    case 'WhileLoop':
    case 'RepeatUntilLoop':
      return classifyConditional(loop.body, loop.control, initialValues);
  }
}

/** Iteration count of a loop; unresolved progress is taken as linear. */
export function iterationGrowth(progress: LoopProgress): Growth {
  switch (progress.kind) {
    case 'constant':
      return CONSTANT;
    case 'polynomial':
      return growth(progress.degree);
    case 'logarithmic':
      return LOGARITHMIC;
    case 'unresolved':
      return growth(1);
  }
}

/**
 * Variables in a loop condition that behave as flags: a bare variable,
 * `not flag`, or a comparison against true/false.
 */
export function flagVariables(condition: Expression): Set<string> {
  const flags = new Set<string>();
  const visit = (expression: Expression): void => {
    if (expression.kind === 'Identifier') {
      flags.add(expression.name);
    } else if (expression.kind === 'UnaryExpr' && expression.operator === 'not') {
      visit(expression.operand);
    } else if (expression.kind === 'BinaryExpr') {
      if (expression.operator === 'and' || expression.operator === 'or') {
        visit(expression.left);
        visit(expression.right);
      } else if (expression.operator === '=' || expression.operator === '<>') {
        if (expression.left.kind === 'Identifier' && isBooleanLiteral(expression.right)) flags.add(expression.left.name);
        if (expression.right.kind === 'Identifier' && isBooleanLiteral(expression.left)) flags.add(expression.right.name);
      }
    }
  };
  visit(condition);
  return flags;
}

/**
 * A loop that can stop after its first pass: it returns from inside, or its
 * condition tests a flag the body sets.
 */
export function canExitEarly(loop: Loop): boolean {
  let exits = false;
  walkStatements(loop.body, statement => {
    if (statement.kind === 'ReturnStmt') exits = true;
  });
  if (exits || loop.kind === 'ForLoop') return exits;

  for (const flag of flagVariables(loop.condition)) {
    const sets = assignmentsTo(loop.body, flag).some(assignment => isBooleanLiteral(assignment.value));
    if (sets) return true;
  }

  // `while i <= n and A[i] <> x`: a data-dependent conjunct can end the loop at any pass.
  const joiner = loop.kind === 'WhileLoop' ? 'and' : 'or';
  const terms = splitOn(loop.condition, joiner);
  return terms.length > 1 && terms.some(readsData);
}

function splitOn(expression: Expression, operator: 'and' | 'or'): Expression[] {
  if (expression.kind === 'BinaryExpr' && expression.operator === operator) {
    return [...splitOn(expression.left, operator), ...splitOn(expression.right, operator)];
  }
  return [expression];
}

function readsData(expression: Expression): boolean {
  let reads = false;
  walkExpression(expression, node => {
    if (node.kind === 'ArrayAccess' || node.kind === 'Call') reads = true;
  });
  return reads;
}
