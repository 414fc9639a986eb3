import { procedureKey } from '../analysis/ast-walk.js';
import { notation, renderGrowth, sameGrowth } from '../analysis/growth.js';
import type { CaseComplexity, Growth } from '../analysis/growth.js';
import { lineCosts } from '../analysis/line-cost-analyzer.js';
import type { LineCost } from '../analysis/line-cost-analyzer.js';
import { RecurrenceExtractor } from '../analysis/recurrence-extractor.js';
import type { RecurrenceRelation } from '../analysis/recurrence-extractor.js';
import { solveRecurrence } from '../analysis/recurrence-solver.js';
import type { SolverOutcome } from '../analysis/recurrence-solver.js';
import { buildTree } from '../analysis/recursion-tree-builder.js';
import type { RecursionTree, TreeOptions } from '../analysis/recursion-tree-builder.js';
import { resolve } from '../analysis/resolver.js';
import type { Resolution } from '../analysis/resolver.js';
import { analyzeStructure } from '../analysis/structural-engine.js';
import type { Annotation, StructuralResult } from '../analysis/structural-engine.js';
import type { Program } from '../parsing/ast.js';
import { ParseError } from '../parsing/errors.js';
import { tokenize } from '../parsing/lexer.js';
import { parse } from '../parsing/parser.js';
import { dumpAst } from '../parsing/printer.js';
import type { Token } from '../parsing/tokens.js';
import type { MathStep } from '../types/index.js';
import { Logger } from '../utils/logger.js';

export interface AnalyzeOptions {
  logger?: Logger;
  /** Recursion tree limits; `false` skips the tree. */
  tree?: Omit<TreeOptions, 'logger'> | false;
}

export interface Extraction {
  equation: string;
  explanation: string;
  baseCase: string;
  notes: string[];
}

export interface CaseBounds {
  best: string;
  average: string;
  worst: string;
}

export interface Solution {
  mainResult: string;
  cases: CaseBounds;
  method: string;
  justification: string;
  mathSteps: MathStep[];
}

export interface GrammarCorrection {
  originalSource: string;
  explanation: string;
}

export interface AnalysisReport {
  source: string;
  tokens: Token[];
  program: Program;
  astDump: string;
  lineCosts: LineCost[];
  structural: StructuralResult;
  /** One relation per recursive procedure, in declaration order. */
  recurrences: RecurrenceRelation[];
  /** The relation that decides the headline bound, if any. */
  primary: RecurrenceRelation | null;
  outcome: SolverOutcome | null;
  resolution: Resolution;
  extraction: Extraction;
  solution: Solution;
  recursionTree: RecursionTree | null;
  annotations: Annotation[];
  correction?: GrammarCorrection;
}

/** Something that can repair source text the parser rejected. */
export interface GrammarCorrector {
  correct(request: { source: string; error: ParseError }): Promise<{ source: string; explanation: string } | null>;
}

export function caseBounds(cases: CaseComplexity): CaseBounds {
  return {
    best: notation('Ω', cases.best),
    average: notation('Θ', cases.average),
    worst: notation('O', cases.worst),
  };
}

/**
 * The recursive procedure whose recurrence decides the result: a recursive
 * entry point first, otherwise the first recursive procedure declared.
 */
function primaryRelation(structural: StructuralResult, recurrences: RecurrenceRelation[]): RecurrenceRelation | null {
  const entries = new Set(structural.entryPoints.map(procedureKey));
  return recurrences.find(relation => entries.has(procedureKey(relation.procedure))) ?? recurrences[0] ?? null;
}

function isGoverning(structural: StructuralResult, relation: RecurrenceRelation): boolean {
  if (structural.entryPoints.length === 1 && procedureKey(structural.entryPoints[0] ?? '') === procedureKey(relation.procedure)) {
    return true;
  }
  const procedure = structural.procedures.find(entry => procedureKey(entry.name) === procedureKey(relation.procedure));
  return procedure !== undefined && sameGrowth(procedure.cases.worst, structural.worst);
}

function iterativeExtraction(structural: StructuralResult): Extraction {
  return {
    equation: `T(n) = ${renderGrowth(structural.worst)}`,
    explanation: 'No recursive calls; the cost follows from loop nesting and branches.',
    baseCase: 'not applicable',
    notes: structural.annotations.map(annotation => annotation.message),
  };
}

/**
 * Runs every stage on the source: tokens, AST, line costs, structural
 * bounds, recurrence extraction and solving, the recursion tree and the
 * final reconciliation. Only lexing and parsing can throw.
 */
export function analyze(source: string, options: AnalyzeOptions = {}): AnalysisReport {
  const logger = options.logger ?? Logger.silent();

  const tokens = tokenize(source);
  logger.debug('Tokenized source', { tokens: tokens.length });

  const program = parse(tokens);
  logger.debug('Parsed program', { procedures: program.procedures.length, main: program.main !== null });

  const costs = lineCosts(program, source, logger);
  const structural = analyzeStructure(program, logger);

  const calleeCosts = new Map(
    structural.procedures
      .filter(procedure => !procedure.recursive)
      .map((procedure): [string, Growth] => [procedureKey(procedure.name), procedure.cases.worst])
  );
  const extractor = new RecurrenceExtractor(program, {
    source,
    lineCosts: costs,
    calleeCost: name => calleeCosts.get(procedureKey(name)),
    logger,
  });
  const recurrences = extractor.extractAll();

  const primary = primaryRelation(structural, recurrences);
  const outcome = primary ? solveRecurrence(primary, logger) : null;
  const resolution = resolve({
    structural,
    relation: primary,
    outcome,
    governing: primary ? isGoverning(structural, primary) : undefined,
  });

  const recursionTree =
    primary && options.tree !== false ? buildTree(primary, { ...(options.tree ?? {}), logger }) : null;

  const extraction: Extraction = primary
    ? {
        equation: primary.equation,
        explanation: primary.explanation,
        baseCase: primary.baseCase,
        notes: primary.notes,
      }
    : iterativeExtraction(structural);

  logger.info('Analysis complete', { result: resolution.mainResult, method: resolution.method });

  return {
    source,
    tokens,
    program,
    astDump: dumpAst(program),
    lineCosts: costs,
    structural,
    recurrences,
    primary,
    outcome,
    resolution,
    extraction,
    solution: {
      mainResult: resolution.mainResult,
      cases: caseBounds(resolution.cases),
      method: resolution.method,
      justification: resolution.justification,
      mathSteps: resolution.mathSteps,
    },
    recursionTree,
    annotations: resolution.annotations,
  };
}

/**
 * Like {@link analyze}, but hands a parse failure to the corrector once and
 * analyses its repaired source. The original error is rethrown when no
 * repair is offered or the repair does not parse either.
 */
export async function analyzeWithCorrection(
  source: string,
  corrector: GrammarCorrector,
  options: AnalyzeOptions = {}
): Promise<AnalysisReport> {
  const logger = options.logger ?? Logger.silent();
  try {
    return analyze(source, options);
  } catch (error) {
    if (!(error instanceof ParseError)) throw error;

    logger.warn('Parse failed, requesting a correction', { message: error.message });
    const repair = await corrector.correct({ source, error });
    if (!repair) throw error;

    let report: AnalysisReport;
    try {
      report = analyze(repair.source, options);
    } catch (retryError) {
      logger.warn('Corrected source did not parse', {
        message: retryError instanceof Error ? retryError.message : String(retryError),
      });
      throw error;
    }

    const note: Annotation = {
      kind: 'grammar-corrected',
      message: `Source was corrected before analysis: ${repair.explanation}`,
      assumption: true,
    };
    return {
      ...report,
      annotations: [...report.annotations, note],
      correction: { originalSource: source, explanation: repair.explanation },
    };
  }
}
