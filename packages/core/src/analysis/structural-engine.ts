import type { Block, Call, Expression, Loop, ProcedureDecl, Program, Statement } from '../parsing/ast.js';
import { assertNever } from '../parsing/ast.js';
import { Logger } from '../utils/logger.js';
import {
  buildProcedureTable,
  callsInBlock,
  callsInExpression,
  callsInStatement,
  isRecursive,
  isSelfCall,
  procedureKey,
  returnsIn,
  statementExpressions,
} from './ast-walk.js';
import type { ProcedureTable } from './ast-walk.js';
import {
  branchCases,
  CONSTANT_CASES,
  EXPONENTIAL,
  FACTORIAL,
  growth,
  isConstant,
  LINEAR,
  LOGARITHMIC,
  multiplyGrowth,
  renderGrowth,
  scaleCases,
  sequenceCases,
  uniformCases,
} from './growth.js';
import type { CaseComplexity } from './growth.js';
import { canExitEarly, classifyLoop, iterationGrowth } from './loop-progress.js';
import { masterCase } from './recurrence-math.js';
import { selfCallPaths, selfCallSites } from './self-calls.js';
import type { SelfCallSite } from './self-calls.js';

export type AnnotationKind =
  | 'call-inside-loop'
  | 'divide-and-conquer'
  | 'unresolved-progress'
  | 'logarithmic-loop'
  | 'early-exit'
  | 'recursion-pattern'
  | 'fibonacci-pattern'
  | 'regularity-assumed'
  | 'recurrence-unsolved'
  | 'grammar-corrected';

export interface Annotation {
  kind: AnnotationKind;
  message: string;
  /** True when the annotation marks a guess rather than a derived fact. */
  assumption: boolean;
  line?: number;
  procedure?: string;
}

export interface ComplexityResult extends CaseComplexity {
  annotations: Annotation[];
  /** Set when any part of the bound rests on an assumption. */
  assumed: boolean;
}

export type RecursionPattern =
  | 'linear-recursion'
  | 'binary-search'
  | 'divide-and-conquer'
  | 'quicksort-like'
  | 'branching-recursion'
  | 'recursion-in-loop'
  | 'unclassified-recursion';

export interface ProcedureStructure {
  name: string;
  /** Cost of one call, including its recursion. */
  cases: CaseComplexity;
  /** Cost of the body with every self-call counted as constant. */
  localCases: CaseComplexity;
  recursive: boolean;
  pattern: RecursionPattern | null;
}

export interface StructuralFlags {
  callInsideLoop: boolean;
  logarithmicLoop: boolean;
  unresolvedProgress: boolean;
  divideAndConquer: boolean;
}

export interface StructuralResult extends ComplexityResult {
  procedures: ProcedureStructure[];
  flags: StructuralFlags;
  /** Procedure names (or `main`) whose cost forms the overall result. */
  entryPoints: string[];
}

interface Scope {
  procedure: ProcedureDecl | null;
  loopDepth: number;
  initialValues: Map<string, Expression>;
}

const PATTERN_LABELS: Record<RecursionPattern, string> = {
  'linear-recursion': 'linear recursion (one call on a smaller input per level)',
  'binary-search': 'binary-search recursion (one call on half the input)',
  'divide-and-conquer': 'divide and conquer (several calls on equal fractions)',
  'quicksort-like': 'divide and conquer around a computed pivot',
  'branching-recursion': 'branching recursion (several calls on slightly smaller inputs)',
  'recursion-in-loop': 'recursion nested inside iteration',
  'unclassified-recursion': 'recursion of an unrecognised shape',
};

/**
 * Derives best, worst and average bounds from control-flow shape alone:
 * loop nesting, loop progress, branches and the shape of self-calls.
 */
export class StructuralEngine {
  private readonly table: ProcedureTable;
  private readonly memo = new Map<string, ProcedureStructure>();
  private readonly active = new Set<string>();
  private readonly annotations: Annotation[] = [];
  private readonly flags: StructuralFlags = {
    callInsideLoop: false,
    logarithmicLoop: false,
    unresolvedProgress: false,
    divideAndConquer: false,
  };

  constructor(
    private readonly program: Program,
    private readonly logger: Logger = Logger.silent()
  ) {
    this.table = buildProcedureTable(program);
  }

  analyze(): StructuralResult {
    const procedures = this.program.procedures.map(procedure => this.analyzeProcedure(procedure));

    let overall: CaseComplexity;
    let entryPoints: string[];
    if (this.program.main) {
      overall = this.analyzeBlock(this.program.main, { procedure: null, loopDepth: 0, initialValues: new Map() });
      entryPoints = ['main'];
    } else {
      const entries = this.entryProcedures();
      overall = entries
        .map(procedure => this.analyzeProcedure(procedure).cases)
        .reduce(sequenceCases, CONSTANT_CASES);
      entryPoints = entries.map(procedure => procedure.name);
    }

    this.logger.debug('Structural analysis complete', {
      entryPoints,
      worst: renderGrowth(overall.worst),
      annotations: this.annotations.length,
    });

    return {
      ...overall,
      annotations: [...this.annotations],
      assumed: this.annotations.some(annotation => annotation.assumption),
      procedures,
      flags: { ...this.flags },
      entryPoints,
    };
  }

  /** Procedures no other procedure calls; all of them when every one is called. */
  private entryProcedures(): ProcedureDecl[] {
    const called = new Set<string>();
    for (const procedure of this.program.procedures) {
      for (const call of callsInBlock(procedure.body)) {
        if (!isSelfCall(call, procedure)) called.add(procedureKey(call.callee));
      }
    }
    const entries = this.program.procedures.filter(procedure => !called.has(procedureKey(procedure.name)));
    return entries.length > 0 ? entries : this.program.procedures;
  }

  analyzeProcedure(procedure: ProcedureDecl): ProcedureStructure {
    const key = procedureKey(procedure.name);
    const cached = this.memo.get(key);
    if (cached) return cached;

    this.active.add(key);
    const localCases = this.analyzeBlock(procedure.body, { procedure, loopDepth: 0, initialValues: new Map() });
    this.active.delete(key);

    const structure: ProcedureStructure = isRecursive(procedure)
      ? this.analyzeRecursion(procedure, localCases)
      : { name: procedure.name, cases: localCases, localCases, recursive: false, pattern: null };

    this.logger.debug('Analyzed procedure', {
      procedure: procedure.name,
      pattern: structure.pattern,
      worst: renderGrowth(structure.cases.worst),
    });
    this.memo.set(key, structure);
    return structure;
  }

  private analyzeBlock(block: Block, scope: Scope): CaseComplexity {
    const initialValues = new Map(scope.initialValues);
    let total = CONSTANT_CASES;

    for (const statement of block.statements) {
      total = sequenceCases(total, this.analyzeStatement(statement, { ...scope, initialValues }));
      if (statement.kind === 'Assignment' && statement.target.kind === 'Identifier') {
        initialValues.set(statement.target.name, statement.value);
      }
    }
    return total;
  }

  private analyzeStatement(statement: Statement, scope: Scope): CaseComplexity {
    switch (statement.kind) {
      case 'Block':
        return this.analyzeBlock(statement, scope);
      case 'Assignment':
      case 'Call':
      case 'ReturnStmt':
        return callsInStatement(statement)
          .map(call => this.callCost(call, scope))
          .reduce(sequenceCases, CONSTANT_CASES);
      case 'IfElse': {
        const condition = this.expressionCost(statement.condition, scope);
        const consequent = this.analyzeBlock(statement.consequent, scope);
        const alternate = statement.alternate ? this.analyzeBlock(statement.alternate, scope) : CONSTANT_CASES;
        return sequenceCases(condition, branchCases(consequent, alternate));
      }
      case 'ForLoop':
      case 'WhileLoop':
      case 'RepeatUntilLoop':
        return this.analyzeLoop(statement, scope);
      default:
        return assertNever(statement);
    }
  }

  private analyzeLoop(loop: Loop, scope: Scope): CaseComplexity {
    const progress = classifyLoop(loop, scope.initialValues);
    const procedure = scope.procedure?.name;

    if (progress.kind === 'logarithmic') {
      this.flags.logarithmicLoop = true;
      this.annotate({
        kind: 'logarithmic-loop',
        message: `Loop on line ${loop.line} runs O(log n) times: ${progress.reason}`,
        assumption: false,
        line: loop.line,
        procedure,
      });
    } else if (progress.kind === 'unresolved') {
      this.flags.unresolvedProgress = true;
      this.annotate({
        kind: 'unresolved-progress',
        message: `UnresolvedProgress on line ${loop.line}: ${progress.reason}; assuming a linear number of passes`,
        assumption: true,
        line: loop.line,
        procedure,
      });
    }

    const header = statementExpressions(loop)
      .map(expression => this.expressionCost(expression, scope))
      .reduce(sequenceCases, CONSTANT_CASES);
    const body = sequenceCases(
      header,
      this.analyzeBlock(loop.body, { ...scope, loopDepth: scope.loopDepth + 1 })
    );
    const repeated = scaleCases(body, uniformCases(iterationGrowth(progress)));

    if (!canExitEarly(loop)) return repeated;

    this.annotate({
      kind: 'early-exit',
      message: `Loop on line ${loop.line} can stop after its first pass; best case counts one pass`,
      assumption: false,
      line: loop.line,
      procedure,
    });
    return { ...repeated, best: body.best };
  }

  private expressionCost(expression: Expression, scope: Scope): CaseComplexity {
    return callsInExpression(expression)
      .map(call => this.callCost(call, scope))
      .reduce(sequenceCases, CONSTANT_CASES);
  }

  private callCost(call: Call, scope: Scope): CaseComplexity {
    const key = procedureKey(call.callee);
    const recursive = (scope.procedure !== null && isSelfCall(call, scope.procedure)) || this.active.has(key);

    if (recursive) {
      if (scope.loopDepth > 0) {
        this.flags.callInsideLoop = true;
        this.annotate({
          kind: 'call-inside-loop',
          message: `Recursive call to ${call.callee} on line ${call.line} sits inside a loop; its cost multiplies`,
          assumption: false,
          line: call.line,
          procedure: scope.procedure?.name,
        });
      }
      return CONSTANT_CASES;
    }

    const callee = this.table.get(key);
    return callee ? this.analyzeProcedure(callee).cases : CONSTANT_CASES;
  }

  private analyzeRecursion(procedure: ProcedureDecl, localCases: CaseComplexity): ProcedureStructure {
    const sites = selfCallSites(procedure);
    const paths = selfCallPaths(procedure);
    const local = localCases.worst;
    const earlyExit = this.returnsWithoutRecursion(procedure) >= 2;

    let pattern: RecursionPattern;
    let cases: CaseComplexity;

    if (sites.some(site => site.insideLoop)) {
      pattern = 'recursion-in-loop';
      const shrinksBySubtraction = sites.every(site => site.transform.kind === 'subtract');
      cases = uniformCases(shrinksBySubtraction ? FACTORIAL : EXPONENTIAL);
      this.annotate({
        kind: 'recursion-pattern',
        message: `${procedure.name}: recursive calls inside a loop; bound is a conservative upper estimate`,
        assumption: true,
        procedure: procedure.name,
      });
    } else if (sites.every(site => site.transform.kind === 'divide')) {
      ({ pattern, cases } = this.divideAndConquer(procedure, sites, paths.max, localCases, earlyExit));
    } else if (sites.every(site => site.transform.kind === 'subtract')) {
      ({ pattern, cases } = this.subtractive(procedure, sites, paths.max, localCases, earlyExit));
    } else {
      pattern = 'unclassified-recursion';
      cases = uniformCases(multiplyGrowth(local, LINEAR));
      this.annotate({
        kind: 'recursion-pattern',
        message: `${procedure.name}: size reduction could not be classified; assuming linear recursion depth`,
        assumption: true,
        procedure: procedure.name,
      });
    }

    if (pattern !== 'recursion-in-loop' && pattern !== 'unclassified-recursion') {
      this.annotate({
        kind: 'recursion-pattern',
        message: `${procedure.name}: ${PATTERN_LABELS[pattern]}`,
        assumption: false,
        procedure: procedure.name,
      });
    }

    return { name: procedure.name, cases, localCases, recursive: true, pattern };
  }

  private divideAndConquer(
    procedure: ProcedureDecl,
    sites: SelfCallSite[],
    calls: number,
    localCases: CaseComplexity,
    earlyExit: boolean
  ): { pattern: RecursionPattern; cases: CaseComplexity } {
    const divisors = sites.flatMap(site => (site.transform.kind === 'divide' ? [site.transform.divisor] : []));
    const divisor = Math.min(...divisors);
    const local = localCases.worst;

    this.flags.divideAndConquer = true;
    this.annotate({
      kind: 'divide-and-conquer',
      message: `${procedure.name} recurses on a subrange of size n/${divisor}`,
      assumption: false,
      procedure: procedure.name,
    });

    if (calls <= 1) {
      const depthBound = masterCase(1, divisor, local)?.bound ?? multiplyGrowth(local, LOGARITHMIC);
      return {
        pattern: 'binary-search',
        cases: { best: earlyExit ? localCases.best : depthBound, worst: depthBound, average: depthBound },
      };
    }

    const balanced = masterCase(calls, divisor, local)?.bound ?? multiplyGrowth(local, LINEAR);
    const pivoted = sites.some(site => site.transform.kind === 'divide' && site.transform.assumed);
    if (!pivoted) {
      return { pattern: 'divide-and-conquer', cases: uniformCases(balanced) };
    }

    this.annotate({
      kind: 'recursion-pattern',
      message: `${procedure.name}: worst case assumes every split is maximally unbalanced`,
      assumption: true,
      procedure: procedure.name,
    });
    return {
      pattern: 'quicksort-like',
      cases: { best: balanced, worst: multiplyGrowth(isConstant(local) ? LINEAR : local, LINEAR), average: balanced },
    };
  }

  private subtractive(
    procedure: ProcedureDecl,
    sites: SelfCallSite[],
    calls: number,
    localCases: CaseComplexity,
    earlyExit: boolean
  ): { pattern: RecursionPattern; cases: CaseComplexity } {
    if (calls <= 1) {
      const depthBound = multiplyGrowth(localCases.worst, LINEAR);
      return {
        pattern: 'linear-recursion',
        cases: { best: earlyExit ? localCases.best : depthBound, worst: depthBound, average: depthBound },
      };
    }

    const amounts = new Set(sites.flatMap(site => (site.transform.kind === 'subtract' ? [site.transform.amount] : [])));
    if (calls === 2 && amounts.has(1) && amounts.has(2) && amounts.size === 2) {
      this.annotate({
        kind: 'fibonacci-pattern',
        message: `${procedure.name}: Fibonacci-shaped recursion T(n-1) + T(n-2)`,
        assumption: false,
        procedure: procedure.name,
      });
    }
    return { pattern: 'branching-recursion', cases: uniformCases(growth(0, 0, calls)) };
  }

  private returnsWithoutRecursion(procedure: ProcedureDecl): number {
    return returnsIn(procedure.body).filter(
      statement => !statement.value || callsInExpression(statement.value).every(call => !isSelfCall(call, procedure))
    ).length;
  }

  private annotate(annotation: Annotation): void {
    const duplicate = this.annotations.some(
      existing =>
        existing.kind === annotation.kind &&
        existing.line === annotation.line &&
        existing.message === annotation.message
    );
    if (!duplicate) this.annotations.push(annotation);
  }
}

export function analyzeStructure(program: Program, logger?: Logger): StructuralResult {
  return new StructuralEngine(program, logger).analyze();
}
