import { assertNever } from './ast.js';
import type { BinaryOperator, Block, Expression, LoopControl, Program, Statement } from './ast.js';

const PRECEDENCE: Record<BinaryOperator, number> = {
  '..': 0,
  or: 1,
  and: 2,
  '=': 4,
  '<>': 4,
  '<': 5,
  '<=': 5,
  '>': 5,
  '>=': 5,
  '+': 6,
  '-': 6,
  '*': 7,
  '/': 7,
  div: 7,
  mod: 7,
  '^': 8,
};

const UNARY_PRECEDENCE = 9;

function precedenceOf(expression: Expression): number {
  if (expression.kind === 'BinaryExpr') return PRECEDENCE[expression.operator];
  if (expression.kind === 'UnaryExpr' && expression.operator === 'not') return 3;
  return 10;
}

/** Renders an expression back to pseudocode with the minimum parentheses. */
export function formatExpression(expression: Expression): string {
  switch (expression.kind) {
    case 'Identifier':
      return expression.name;
    case 'Literal':
      switch (expression.literalType) {
        case 'number':
          return String(expression.value);
        case 'string':
          return `"${expression.value}"`;
        case 'boolean':
          return expression.value ? 'true' : 'false';
        case 'null':
          return 'null';
      }
      return assertNever(expression);
    case 'Call':
      return `${expression.callee}(${expression.args.map(formatExpression).join(', ')})`;
    case 'ArrayAccess':
      return `${wrap(expression.target, 10)}[${expression.indices.map(formatExpression).join(', ')}]`;
    case 'FieldAccess':
      return `${wrap(expression.target, 10)}.${expression.field}`;
    case 'UnaryExpr':
      switch (expression.operator) {
        case 'ceil':
          return `⌈${formatExpression(expression.operand)}⌉`;
        case 'floor':
          return `⌊${formatExpression(expression.operand)}⌋`;
        case 'not':
          return `not ${wrap(expression.operand, 3)}`;
        default:
          return `${expression.operator}${wrap(expression.operand, UNARY_PRECEDENCE)}`;
      }
    case 'BinaryExpr': {
      const precedence = PRECEDENCE[expression.operator];
      const left = wrap(expression.left, precedence);
      // Left-associative operators need parentheses on an equal-precedence right operand.
      const right = wrap(expression.right, expression.operator === '^' ? precedence : precedence + 1);
      if (expression.operator === '..') return `${left}..${right}`;
      return `${left} ${expression.operator} ${right}`;
    }
    default:
      return assertNever(expression);
  }
}

function wrap(expression: Expression, minimum: number): string {
  const text = formatExpression(expression);
  return precedenceOf(expression) < minimum ? `(${text})` : text;
}

function describeControl(control: LoopControl): string {
  return control.state === 'resolved'
    ? `control=${control.variable} bound=${formatExpression(control.bound)}`
    : `control=unresolved (${control.reason})`;
}

/**
 * Indented one-node-per-line dump of the tree, used for the report's
 * `parser.ast_dump` field.
 */
export function dumpAst(program: Program): string {
  const lines: string[] = ['Program'];
  for (const procedure of program.procedures) {
    const params = procedure.parameters
      .map(parameter => parameter.name + (parameter.annotation ?? ''))
      .join(', ');
    lines.push(`  ProcedureDecl ${procedure.name}(${params}) @${procedure.line}`);
    dumpBlock(procedure.body, 2, lines);
  }
  if (program.main) {
    lines.push('  Main');
    dumpBlock(program.main, 2, lines);
  }
  return lines.join('\n');
}

function dumpBlock(block: Block, depth: number, lines: string[]): void {
  lines.push(`${'  '.repeat(depth)}Block${block.delimited ? '' : ' (implicit)'}`);
  for (const statement of block.statements) {
    dumpStatement(statement, depth + 1, lines);
  }
}

function dumpStatement(statement: Statement, depth: number, lines: string[]): void {
  const indent = '  '.repeat(depth);
  const at = `@${statement.line}`;

  switch (statement.kind) {
    case 'Block':
      dumpBlock(statement, depth, lines);
      return;
    case 'ForLoop': {
      const keyword = statement.direction === 'up' ? 'to' : 'downto';
      const step = statement.step ? ` step ${formatExpression(statement.step)}` : '';
      lines.push(
        `${indent}ForLoop ${statement.variable} <- ${formatExpression(statement.start)} ${keyword} ${formatExpression(statement.end)}${step} ${at}`
      );
      dumpBlock(statement.body, depth + 1, lines);
      return;
    }
    case 'WhileLoop':
      lines.push(`${indent}WhileLoop ${formatExpression(statement.condition)} [${describeControl(statement.control)}] ${at}`);
      dumpBlock(statement.body, depth + 1, lines);
      return;
    case 'RepeatUntilLoop':
      lines.push(
        `${indent}RepeatUntilLoop until ${formatExpression(statement.condition)} [${describeControl(statement.control)}] ${at}`
      );
      dumpBlock(statement.body, depth + 1, lines);
      return;
    case 'IfElse':
      lines.push(`${indent}IfElse ${formatExpression(statement.condition)} ${at}`);
      dumpBlock(statement.consequent, depth + 1, lines);
      if (statement.alternate) {
        lines.push(`${indent}Else`);
        dumpBlock(statement.alternate, depth + 1, lines);
      }
      return;
    case 'Assignment':
      lines.push(`${indent}Assignment ${formatExpression(statement.target)} <- ${formatExpression(statement.value)} ${at}`);
      return;
    case 'Call':
      lines.push(`${indent}Call ${formatExpression(statement)} ${at}`);
      return;
    case 'ReturnStmt':
      lines.push(`${indent}ReturnStmt${statement.value ? ` ${formatExpression(statement.value)}` : ''} ${at}`);
      return;
    default:
      assertNever(statement);
  }
}
