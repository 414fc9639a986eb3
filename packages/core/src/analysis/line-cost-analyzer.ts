import type { Block, Expression, Loop, ProcedureDecl, Program, Statement } from '../parsing/ast.js';
import { assertNever } from '../parsing/ast.js';
import { Logger } from '../utils/logger.js';
import { callsInStatement, isSelfCall } from './ast-walk.js';
import { compareGrowth, CONSTANT, isConstant, multiplyGrowth, renderGrowth } from './growth.js';
import type { Growth } from './growth.js';
import { classifyLoop, iterationGrowth } from './loop-progress.js';

export type CostOrigin = 'structural' | 'recurrence';

export interface LineCost {
  line: number;
  code: string;
  cost: Growth;
  explanation: string;
  origin: CostOrigin;
  /** Procedure name, or `main` for the top-level block. */
  scope: string;
}

interface Frame {
  procedure: ProcedureDecl | null;
  scope: string;
  /** Product of the iteration counts of every enclosing loop. */
  factor: Growth;
  depth: number;
  initialValues: Map<string, Expression>;
}

/**
 * Attributes a cost to every source line from the loops around it. A line
 * holding several statements keeps the most expensive one.
 */
export class LineCostAnalyzer {
  private readonly rows = new Map<number, LineCost>();
  private readonly lines: string[];

  constructor(
    private readonly program: Program,
    source: string,
    private readonly logger: Logger = Logger.silent()
  ) {
    this.lines = source.split(/\r?\n/);
  }

  analyze(): LineCost[] {
    for (const procedure of this.program.procedures) {
      this.walkBlock(procedure.body, {
        procedure,
        scope: procedure.name,
        factor: CONSTANT,
        depth: 0,
        initialValues: new Map(),
      });
    }
    if (this.program.main) {
      this.walkBlock(this.program.main, {
        procedure: null,
        scope: 'main',
        factor: CONSTANT,
        depth: 0,
        initialValues: new Map(),
      });
    }

    const rows = [...this.rows.values()].sort((a, b) => a.line - b.line);
    this.logger.debug('Line costs computed', { rows: rows.length });
    return rows;
  }

  private walkBlock(block: Block, frame: Frame): void {
    const initialValues = new Map(frame.initialValues);
    for (const statement of block.statements) {
      this.walkStatement(statement, { ...frame, initialValues });
      if (statement.kind === 'Assignment' && statement.target.kind === 'Identifier') {
        initialValues.set(statement.target.name, statement.value);
      }
    }
  }

  private walkStatement(statement: Statement, frame: Frame): void {
    switch (statement.kind) {
      case 'Block':
        this.walkBlock(statement, frame);
        return;
      case 'Assignment':
      case 'Call':
      case 'ReturnStmt':
        this.recordSimple(statement, frame);
        return;
      case 'IfElse':
        this.record(statement.line, frame.factor, `condition ${this.executions(frame)}`, 'structural', frame.scope);
        this.walkBlock(statement.consequent, frame);
        if (statement.alternate) this.walkBlock(statement.alternate, frame);
        return;
      case 'ForLoop':
      case 'WhileLoop':
      case 'RepeatUntilLoop':
        this.walkLoop(statement, frame);
        return;
      default:
        assertNever(statement);
    }
  }

  private walkLoop(loop: Loop, frame: Frame): void {
    const progress = classifyLoop(loop, frame.initialValues);
    const iterations = iterationGrowth(progress);

    this.record(
      loop.line,
      frame.factor,
      `loop header ${this.executions(frame)}; body runs ${renderGrowth(iterations)} times (${progress.reason})`,
      'structural',
      frame.scope
    );

    const nested = isConstant(iterations);
    this.walkBlock(loop.body, {
      ...frame,
      factor: multiplyGrowth(frame.factor, iterations),
      depth: nested ? frame.depth : frame.depth + 1,
    });
  }

  private recordSimple(statement: Statement, frame: Frame): void {
    const procedure = frame.procedure;
    const recursive = procedure ? callsInStatement(statement).find(call => isSelfCall(call, procedure)) : undefined;

    if (recursive) {
      this.record(
        statement.line,
        frame.factor,
        `recursive call ${recursive.callee}(...); its cost is carried by the recurrence`,
        'recurrence',
        frame.scope
      );
      return;
    }
    this.record(statement.line, frame.factor, this.executions(frame), 'structural', frame.scope);
  }

  private executions(frame: Frame): string {
    if (frame.depth === 0 && isConstant(frame.factor)) return 'executes a constant number of times';
    return `executes ${renderGrowth(frame.factor)} times (loop depth ${frame.depth})`;
  }

  private record(line: number, cost: Growth, explanation: string, origin: CostOrigin, scope: string): void {
    const existing = this.rows.get(line);
    const row: LineCost = { line, code: (this.lines[line - 1] ?? '').trim(), cost, explanation, origin, scope };

    if (!existing) {
      this.rows.set(line, row);
      return;
    }
    const order = compareGrowth(cost, existing.cost);
    if (order > 0 || (order === 0 && origin === 'recurrence' && existing.origin === 'structural')) {
      this.rows.set(line, row);
    }
  }
}

export function lineCosts(program: Program, source: string, logger?: Logger): LineCost[] {
  return new LineCostAnalyzer(program, source, logger).analyze();
}
