import { ParseError } from './errors.js';
import { describeToken } from './tokens.js';
import type { Token } from './tokens.js';
import type {
  ArrayAccess,
  BinaryOperator,
  Block,
  Call,
  Expression,
  FieldAccess,
  ForLoop,
  Identifier,
  IfElse,
  LoopControl,
  Parameter,
  ProcedureDecl,
  Program,
  RepeatUntilLoop,
  ReturnStmt,
  Statement,
  WhileLoop,
} from './ast.js';

const PROCEDURE_KEYWORDS = ['algorithm', 'procedure', 'function'];
const COMPARISON_OPERATORS: ReadonlySet<string> = new Set(['=', '<>', '<', '<=', '>', '>=']);

/**
 * Recursive-descent parser with one token of lookahead. Each grammar
 * production is one method; nothing is ever backtracked.
 */
export class Parser {
  private position = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  parseProgram(): Program {
    const first = this.peek();
    const procedures: ProcedureDecl[] = [];
    let main: Block | null = null;

    while (!this.isAtEnd()) {
      if (this.checkKeyword('begin')) {
        main = this.parseBlock();
        break;
      }
      procedures.push(this.parseProcedure());
    }

    if (!this.isAtEnd()) {
      throw this.error('end of input');
    }
    if (procedures.length === 0 && main === null) {
      throw this.error("a procedure declaration or 'begin'");
    }

    return { kind: 'Program', procedures, main, line: first.line, column: first.column };
  }

  // Declarations

  private parseProcedure(): ProcedureDecl {
    const start = this.peek();
    const hasKeyword = PROCEDURE_KEYWORDS.some(keyword => this.checkKeyword(keyword));
    if (hasKeyword) this.advance();

    const name = this.expectIdentifier('a procedure name');
    let parameters: Parameter[] = [];
    if (this.checkPunctuation('(')) {
      parameters = this.parseParameters();
    } else if (!hasKeyword) {
      throw this.error("'('");
    }

    const body = this.parseBlock();
    return { kind: 'ProcedureDecl', name, parameters, body, line: start.line, column: start.column };
  }

  private parseParameters(): Parameter[] {
    this.expectPunctuation('(');
    const parameters: Parameter[] = [];
    if (this.checkPunctuation(')')) {
      this.advance();
      return parameters;
    }

    do {
      const name = this.expectIdentifier('a parameter name');
      const annotation = this.parseParameterAnnotation();
      parameters.push(annotation ? { name, annotation } : { name });
    } while (this.matchPunctuation(','));

    this.expectPunctuation(')');
    return parameters;
  }

  /** Skips `[n]`, `[1..n]` or `[n]..[m]` after a parameter name and returns it as text. */
  private parseParameterAnnotation(): string | undefined {
    let text = '';
    while (this.checkPunctuation('[')) {
      let depth = 0;
      do {
        const token = this.advance();
        if (token.kind === 'eof') throw this.error("']'");
        if (token.value === '[') depth++;
        if (token.value === ']') depth--;
        text += token.lexeme;
      } while (depth > 0);

      if (this.checkOperator('..') && this.peek(1).value === '[') {
        text += this.advance().lexeme;
      }
    }
    return text === '' ? undefined : text;
  }

  // Blocks

  private parseBlock(): Block {
    const start = this.expectKeyword('begin');
    const statements = this.parseStatementsUntil(['end']);
    this.expectKeyword('end');
    return { kind: 'Block', statements, delimited: true, line: start.line, column: start.column };
  }

  /** Loop bodies: either a `begin ... end` block or statements closed by `end`. */
  private parseBody(): Block {
    if (this.checkKeyword('begin')) {
      return this.parseBlock();
    }
    const start = this.peek();
    const statements = this.parseStatementsUntil(['end']);
    this.expectKeyword('end');
    return { kind: 'Block', statements, delimited: false, line: start.line, column: start.column };
  }

  private parseStatementsUntil(terminators: readonly string[]): Statement[] {
    const statements: Statement[] = [];
    while (!this.isAtEnd() && !terminators.some(keyword => this.checkKeyword(keyword))) {
      if (this.checkKeyword('let') || this.checkKeyword('declare')) {
        this.skipDeclaration();
      } else {
        statements.push(this.parseStatement());
      }
      while (this.matchPunctuation(';')) {
        // separators are optional
      }
    }
    return statements;
  }

  /** `let` and `declare` lines introduce names only; they are dropped up to the line end or `;`. */
  private skipDeclaration(): void {
    const line = this.advance().line;
    while (!this.isAtEnd() && this.peek().line === line && !this.checkPunctuation(';')) {
      this.advance();
    }
  }

  // Statements

  private parseStatement(): Statement {
    const token = this.peek();

    if (token.kind === 'keyword') {
      switch (token.value) {
        case 'begin':
          return this.parseBlock();
        case 'for':
          return this.parseFor();
        case 'while':
          return this.parseWhile();
        case 'repeat':
          return this.parseRepeat();
        case 'if':
          return this.parseIf();
        case 'call':
          this.advance();
          return this.parseCall(token, true);
        case 'return':
          return this.parseReturn();
        case 'swap':
          return this.parseSwap();
        case 'print':
          return this.parsePrint();
      }
    }

    if (token.kind === 'identifier') {
      if (this.peek(1).value === '(' && this.peek(1).kind === 'punctuation') {
        return this.parseCall(token, false);
      }
      return this.parseAssignment();
    }

    throw this.error('a statement');
  }

  private parseFor(): ForLoop {
    const start = this.expectKeyword('for');
    const variable = this.expectIdentifier('a loop variable');
    this.expectOperator('<-');
    const from = this.parseExpression();

    let direction: ForLoop['direction'];
    if (this.matchKeyword('to')) {
      direction = 'up';
    } else if (this.matchKeyword('downto')) {
      direction = 'down';
    } else {
      throw this.error("'to'");
    }

    const to = this.parseExpression();
    const step = this.matchKeyword('step') ? this.parseExpression() : null;
    this.expectKeyword('do');
    const body = this.parseBody();

    return {
      kind: 'ForLoop',
      variable,
      start: from,
      end: to,
      step,
      direction,
      body,
      line: start.line,
      column: start.column,
    };
  }

  private parseWhile(): WhileLoop {
    const start = this.expectKeyword('while');
    const condition = this.parseExpression();
    this.expectKeyword('do');
    const body = this.parseBody();
    return {
      kind: 'WhileLoop',
      condition,
      control: deriveLoopControl(condition),
      body,
      line: start.line,
      column: start.column,
    };
  }

  private parseRepeat(): RepeatUntilLoop {
    const start = this.expectKeyword('repeat');
    const bodyStart = this.peek();
    const statements = this.parseStatementsUntil(['until']);
    this.expectKeyword('until');
    const condition = this.parseExpression();
    return {
      kind: 'RepeatUntilLoop',
      body: {
        kind: 'Block',
        statements,
        delimited: true,
        line: bodyStart.line,
        column: bodyStart.column,
      },
      condition,
      control: deriveLoopControl(condition),
      line: start.line,
      column: start.column,
    };
  }

  private parseIf(): IfElse {
    const start = this.expectKeyword('if');
    const condition = this.parseExpression();
    this.expectKeyword('then');

    let consequent: Block;
    let alternate: Block | null = null;

    if (this.checkKeyword('begin')) {
      consequent = this.parseBlock();
      if (this.checkKeyword('else')) alternate = this.parseElse();
    } else {
      const bodyStart = this.peek();
      const statements = this.parseStatementsUntil(['else', 'end']);
      consequent = {
        kind: 'Block',
        statements,
        delimited: false,
        line: bodyStart.line,
        column: bodyStart.column,
      };
      if (this.checkKeyword('else')) {
        alternate = this.parseElse();
      } else {
        this.expectKeyword('end');
      }
    }

    return { kind: 'IfElse', condition, consequent, alternate, line: start.line, column: start.column };
  }

  private parseElse(): Block {
    this.expectKeyword('else');
    const start = this.peek();
    if (this.checkKeyword('if')) {
      const nested = this.parseIf();
      return { kind: 'Block', statements: [nested], delimited: false, line: start.line, column: start.column };
    }
    return this.parseBody();
  }

  private parseAssignment(): Statement {
    const start = this.peek();
    let target: Identifier | ArrayAccess | FieldAccess = {
      kind: 'Identifier',
      name: this.expectIdentifier('an assignment target'),
      line: start.line,
      column: start.column,
    };
    const at = { line: start.line, column: start.column };
    for (;;) {
      if (this.checkPunctuation('[')) {
        target = { kind: 'ArrayAccess', target, indices: this.parseIndexList(), ...at };
      } else if (this.matchPunctuation('.')) {
        target = { kind: 'FieldAccess', target, field: this.expectIdentifier('a field name'), ...at };
      } else {
        break;
      }
    }
    this.expectOperator('<-');
    const value = this.parseExpression();
    return { kind: 'Assignment', target, value, line: start.line, column: start.column };
  }

  private parseCall(start: Token, explicit: boolean): Call {
    const callee = this.expectIdentifier('a procedure name');
    const args = this.checkPunctuation('(') ? this.parseArguments() : [];
    return { kind: 'Call', callee, args, explicit, line: start.line, column: start.column };
  }

  /** `swap X with Y`, or the call form `swap(X, Y)`; both become a constant-cost builtin call. */
  private parseSwap(): Call {
    const start = this.expectKeyword('swap');
    let args: Expression[];
    if (this.checkPunctuation('(')) {
      args = this.parseArguments();
    } else {
      const first = this.parseExpression();
      this.expectKeyword('with');
      args = [first, this.parseExpression()];
    }
    return { kind: 'Call', callee: 'swap', args, explicit: false, line: start.line, column: start.column };
  }

  private parsePrint(): Call {
    const start = this.expectKeyword('print');
    const args = [this.parseExpression()];
    return { kind: 'Call', callee: 'print', args, explicit: false, line: start.line, column: start.column };
  }

  private parseReturn(): ReturnStmt {
    const start = this.expectKeyword('return');
    const next = this.peek();
    const bare =
      next.kind === 'eof' ||
      next.line !== start.line ||
      (next.kind === 'keyword' && ['end', 'else', 'until'].includes(next.value)) ||
      (next.kind === 'punctuation' && next.value === ';');
    const value = bare ? null : this.parseExpression();
    return { kind: 'ReturnStmt', value, line: start.line, column: start.column };
  }

  // Expressions, lowest precedence first

  parseExpression(): Expression {
    return this.parseOr();
  }

  private parseOr(): Expression {
    let left = this.parseAnd();
    while (this.checkKeyword('or')) {
      const op = this.advance();
      left = this.binary('or', left, this.parseAnd(), op);
    }
    return left;
  }

  private parseAnd(): Expression {
    let left = this.parseNot();
    while (this.checkKeyword('and')) {
      const op = this.advance();
      left = this.binary('and', left, this.parseNot(), op);
    }
    return left;
  }

  private parseNot(): Expression {
    if (this.checkKeyword('not')) {
      const op = this.advance();
      return { kind: 'UnaryExpr', operator: 'not', operand: this.parseNot(), line: op.line, column: op.column };
    }
    return this.parseEquality();
  }

  private parseEquality(): Expression {
    let left = this.parseComparison();
    while (this.checkOperator('=') || this.checkOperator('<>')) {
      const op = this.advance();
      left = this.binary(op.value === '=' ? '=' : '<>', left, this.parseComparison(), op);
    }
    return left;
  }

  private parseComparison(): Expression {
    let left = this.parseAdditive();
    for (;;) {
      const operator = this.matchOperatorOf(['<', '<=', '>', '>=']);
      if (!operator) return left;
      left = this.binary(operator.op, left, this.parseAdditive(), operator.token);
    }
  }

  private parseAdditive(): Expression {
    let left = this.parseMultiplicative();
    for (;;) {
      const operator = this.matchOperatorOf(['+', '-']);
      if (!operator) return left;
      left = this.binary(operator.op, left, this.parseMultiplicative(), operator.token);
    }
  }

  private parseMultiplicative(): Expression {
    let left = this.parsePower();
    for (;;) {
      const operator = this.matchOperatorOf(['*', '/']);
      if (operator) {
        left = this.binary(operator.op, left, this.parsePower(), operator.token);
      } else if (this.checkKeyword('div') || this.checkKeyword('mod')) {
        const token = this.advance();
        left = this.binary(token.value === 'div' ? 'div' : 'mod', left, this.parsePower(), token);
      } else {
        return left;
      }
    }
  }

  private parsePower(): Expression {
    const base = this.parseUnary();
    if (this.checkOperator('^')) {
      const op = this.advance();
      return this.binary('^', base, this.parsePower(), op);
    }
    return base;
  }

  private parseUnary(): Expression {
    const operator = this.matchOperatorOf(['-', '+']);
    if (operator) {
      return {
        kind: 'UnaryExpr',
        operator: operator.op,
        operand: this.parseUnary(),
        line: operator.token.line,
        column: operator.token.column,
      };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): Expression {
    let expression = this.parsePrimary();
    for (;;) {
      const at = { line: expression.line, column: expression.column };
      if (this.checkPunctuation('[')) {
        expression = { kind: 'ArrayAccess', target: expression, indices: this.parseIndexList(), ...at };
      } else if (this.matchPunctuation('.')) {
        expression = { kind: 'FieldAccess', target: expression, field: this.expectIdentifier('a field name'), ...at };
      } else {
        return expression;
      }
    }
  }

  private parsePrimary(): Expression {
    const token = this.peek();
    const at = { line: token.line, column: token.column };

    switch (token.kind) {
      case 'number':
        this.advance();
        return { kind: 'Literal', literalType: 'number', value: Number(token.value), ...at };
      case 'string':
        this.advance();
        return { kind: 'Literal', literalType: 'string', value: token.value, ...at };
      case 'boolean':
        this.advance();
        return { kind: 'Literal', literalType: 'boolean', value: token.value === 'true', ...at };
      case 'null':
        this.advance();
        return { kind: 'Literal', literalType: 'null', value: null, ...at };
      case 'identifier':
        if (this.peek(1).kind === 'punctuation' && this.peek(1).value === '(') {
          return this.parseCall(token, false);
        }
        this.advance();
        return { kind: 'Identifier', name: token.value, ...at };
      case 'keyword':
        if (token.value === 'call') {
          this.advance();
          return this.parseCall(token, true);
        }
        break;
      case 'punctuation':
        if (token.value === '(') {
          this.advance();
          const inner = this.parseExpression();
          this.expectPunctuation(')');
          return inner;
        }
        break;
      case 'operator':
        if (token.value === '⌈' || token.value === '⌊') {
          this.advance();
          const operand = this.parseExpression();
          const ceiling = token.value === '⌈';
          this.expectOperator(ceiling ? '⌉' : '⌋');
          return { kind: 'UnaryExpr', operator: ceiling ? 'ceil' : 'floor', operand, ...at };
        }
        break;
    }

    throw this.error('an expression');
  }

  private parseArguments(): Expression[] {
    this.expectPunctuation('(');
    const args: Expression[] = [];
    if (!this.checkPunctuation(')')) {
      do {
        args.push(this.parseRange());
      } while (this.matchPunctuation(','));
    }
    this.expectPunctuation(')');
    return args;
  }

  private parseIndexList(): Expression[] {
    this.expectPunctuation('[');
    const indices: Expression[] = [];
    do {
      indices.push(this.parseRange());
    } while (this.matchPunctuation(','));
    this.expectPunctuation(']');
    return indices;
  }

  private parseRange(): Expression {
    const left = this.parseExpression();
    if (this.checkOperator('..')) {
      const op = this.advance();
      return this.binary('..', left, this.parseExpression(), op);
    }
    return left;
  }

  private binary(operator: BinaryOperator, left: Expression, right: Expression, token: Token): Expression {
    return { kind: 'BinaryExpr', operator, left, right, line: token.line, column: token.column };
  }

  // Token helpers

  private peek(ahead = 0): Token {
    const index = Math.min(this.position + ahead, this.tokens.length - 1);
    const token = this.tokens[index];
    if (!token) {
      throw new ParseError('a token', 'an empty token stream', { offset: 0, line: 1, column: 1 });
    }
    return token;
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') this.position++;
    return token;
  }

  private isAtEnd(): boolean {
    return this.peek().kind === 'eof';
  }

  private checkKeyword(keyword: string): boolean {
    const token = this.peek();
    return token.kind === 'keyword' && token.value === keyword;
  }

  private checkOperator(operator: string): boolean {
    const token = this.peek();
    return token.kind === 'operator' && token.value === operator;
  }

  private checkPunctuation(symbol: string): boolean {
    const token = this.peek();
    return token.kind === 'punctuation' && token.value === symbol;
  }

  private matchKeyword(keyword: string): boolean {
    if (!this.checkKeyword(keyword)) return false;
    this.advance();
    return true;
  }

  private matchPunctuation(symbol: string): boolean {
    if (!this.checkPunctuation(symbol)) return false;
    this.advance();
    return true;
  }

  private matchOperatorOf<T extends string>(operators: readonly T[]): { op: T; token: Token } | null {
    const token = this.peek();
    if (token.kind !== 'operator') return null;
    const op = operators.find(candidate => candidate === token.value);
    if (op === undefined) return null;
    this.advance();
    return { op, token };
  }

  private expectKeyword(keyword: string): Token {
    if (!this.checkKeyword(keyword)) throw this.error(`'${keyword}'`);
    return this.advance();
  }

  private expectOperator(operator: string): Token {
    if (!this.checkOperator(operator)) throw this.error(`'${operator}'`);
    return this.advance();
  }

  private expectPunctuation(symbol: string): Token {
    if (!this.checkPunctuation(symbol)) throw this.error(`'${symbol}'`);
    return this.advance();
  }

  private expectIdentifier(what: string): string {
    const token = this.peek();
    if (token.kind !== 'identifier') throw this.error(what);
    this.advance();
    return token.value;
  }

  private error(expected: string): ParseError {
    const token = this.peek();
    return new ParseError(expected, describeToken(token), {
      offset: token.span.start,
      line: token.line,
      column: token.column,
    });
  }
}

/**
 * Picks the control variable of a while/repeat condition: the first
 * comparison, searching conjuncts left to right, with a plain variable on
 * one side.
 */
export function deriveLoopControl(condition: Expression): LoopControl {
  const comparison = findComparison(condition);
  if (!comparison) {
    return { state: 'unresolved', reason: 'condition does not compare a variable against a bound' };
  }
  return comparison;
}

function findComparison(expression: Expression): LoopControl | null {
  if (expression.kind === 'UnaryExpr' && expression.operator === 'not') {
    return findComparison(expression.operand);
  }
  if (expression.kind !== 'BinaryExpr') return null;

  if (expression.operator === 'and' || expression.operator === 'or') {
    return findComparison(expression.left) ?? findComparison(expression.right);
  }
  if (!COMPARISON_OPERATORS.has(expression.operator)) return null;

  if (expression.left.kind === 'Identifier') {
    return { state: 'resolved', variable: expression.left.name, bound: expression.right };
  }
  if (expression.right.kind === 'Identifier') {
    return { state: 'resolved', variable: expression.right.name, bound: expression.left };
  }
  return null;
}

export function parse(tokens: readonly Token[]): Program {
  return new Parser(tokens).parseProgram();
}
