import type { MathStep } from '../types/index.js';
import { isUniform, maxGrowth, minGrowth, notation, sameGrowth, uniformCases } from './growth.js';
import type { CaseComplexity } from './growth.js';
import type { RecurrenceRelation } from './recurrence-extractor.js';
import type { SolverOutcome } from './recurrence-solver.js';
import type { Annotation, StructuralResult } from './structural-engine.js';

export type ResolutionSource = 'structural' | 'recurrence';

export interface Resolution {
  cases: CaseComplexity;
  /**
   * Headline bound: Θ when all cases agree, otherwise the worst case as O.
   * A solved recurrence gives Θ of its bound, marked `average` when the worst case is slower.
   */
  mainResult: string;
  method: string;
  justification: string;
  mathSteps: MathStep[];
  annotations: Annotation[];
  decidedBy: ResolutionSource;
}

export interface ResolverInput {
  structural: StructuralResult;
  relation: RecurrenceRelation | null;
  outcome: SolverOutcome | null;
  /** False when the recursive procedure is not what dominates the program's cost. */
  governing?: boolean;
}

export function caseSteps(cases: CaseComplexity): MathStep[] {
  return [
    { label: 'Best case', value: notation('Ω', cases.best) },
    { label: 'Worst case', value: notation('O', cases.worst) },
    { label: 'Average case', value: notation('Θ', cases.average) },
  ];
}

function headline(cases: CaseComplexity): string {
  return isUniform(cases) ? notation('Θ', cases.worst) : notation('O', cases.worst);
}

function structuralJustification(structural: StructuralResult): string {
  const facts = structural.annotations.map(annotation => annotation.message);
  if (facts.length === 0) {
    return `Loop nesting and branches give a worst case of ${notation('O', structural.worst)}`;
  }
  return facts.join('; ');
}

/**
 * Reconciles the structural bound with the solved recurrence. Shapes the
 * recurrence cannot express (recursion inside loops, logarithmic or
 * unresolved loops) keep the structural bound.
 */
export function resolve(input: ResolverInput): Resolution {
  const { structural, relation, outcome } = input;
  const structuralCases: CaseComplexity = {
    best: structural.best,
    worst: structural.worst,
    average: structural.average,
  };
  const fromStructure = (extra: Annotation[], leadingSteps: MathStep[], note?: string): Resolution => ({
    cases: structuralCases,
    mainResult: headline(structuralCases),
    method: 'structural-analysis',
    justification: note ? `${note}. ${structuralJustification(structural)}` : structuralJustification(structural),
    mathSteps: [...leadingSteps, ...caseSteps(structuralCases)],
    annotations: [...structural.annotations, ...extra],
    decidedBy: 'structural',
  });

  if (!relation || !outcome) return fromStructure([], []);

  if (!outcome.solved) {
    return fromStructure(
      [
        {
          kind: 'recurrence-unsolved',
          message: `Recurrence ${relation.equation} could not be solved: ${outcome.reason}; using the structural bound`,
          assumption: true,
          procedure: relation.procedure,
        },
      ],
      outcome.mathSteps
    );
  }

  const { flags } = structural;
  if (flags.callInsideLoop || flags.logarithmicLoop || flags.unresolvedProgress) {
    return fromStructure(outcome.annotations, outcome.mathSteps, 'Loop structure takes precedence over the recurrence');
  }
  if (input.governing === false) {
    return fromStructure(
      outcome.annotations,
      outcome.mathSteps,
      `${relation.procedure} does not dominate the program's cost`
    );
  }

  const bound = outcome.bound;
  const cases = isUniform(structuralCases)
    ? uniformCases(bound)
    : {
        best: minGrowth(structural.best, bound),
        worst: maxGrowth(structural.worst, bound),
        average: bound,
      };

  return {
    cases,
    mainResult: sameGrowth(cases.worst, bound) ? notation('Θ', bound) : `${notation('Θ', bound)} average`,
    method: outcome.method,
    justification: outcome.justification,
    mathSteps: [...outcome.mathSteps, ...caseSteps(cases)],
    annotations: [...structural.annotations, ...outcome.annotations],
    decidedBy: 'recurrence',
  };
}
