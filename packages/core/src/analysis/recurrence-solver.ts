import type { MathStep } from '../types/index.js';
import { Logger } from '../utils/logger.js';
import {
  formatNumber,
  GOLDEN_RATIO,
  growth,
  isPolylog,
  LINEAR,
  maxGrowth,
  multiplyGrowth,
  renderGrowth,
} from './growth.js';
import type { Growth } from './growth.js';
import type { RecurrenceRelation, RecurrenceTerm } from './recurrence-extractor.js';
import { masterCase, snap } from './recurrence-math.js';
import type { Annotation } from './structural-engine.js';

export type SolverMethod = 'master-theorem' | 'linear-recurrence' | 'fibonacci-pattern' | 'substitution';

export interface SolvedRecurrence {
  solved: true;
  bound: Growth;
  method: SolverMethod;
  caseNumber?: 1 | 2 | 3;
  justification: string;
  mathSteps: MathStep[];
  annotations: Annotation[];
}

export interface UnsolvedRecurrence {
  solved: false;
  reason: string;
  mathSteps: MathStep[];
}

export type SolverOutcome = SolvedRecurrence | UnsolvedRecurrence;

interface DivideTerm {
  coefficient: number;
  divisor: number;
}

interface SubtractTerm {
  coefficient: number;
  amount: number;
}

const DIVIDE_SAMPLES = Array.from({ length: 10 }, (_, index) => 2 ** (11 + index));
const SUBTRACT_SAMPLES = Array.from({ length: 10 }, (_, index) => 11 + index);
const CONVERGENCE_WINDOW = 5;
const MAX_SPREAD = 1.1;
const RATIO_TOLERANCE = 0.01;
const MAX_DOUBLINGS = 64;

function step(label: string, value: string): MathStep {
  return { label, value };
}

function unsolved(reason: string, mathSteps: MathStep[] = []): UnsolvedRecurrence {
  return { solved: false, reason, mathSteps };
}

function evaluate(value: Growth, n: number): number {
  if (n < 2) return 1;
  return Math.max(1, n ** value.degree * Math.log2(n) ** value.logPower);
}

function spread(values: number[]): number {
  return Math.max(...values) / Math.min(...values);
}

/**
 * Solves T(n) for the relation's terms and local cost. The master theorem
 * handles a·T(n/b) + f(n); subtractive forms go through their
 * characteristic root; anything else is estimated numerically.
 */
export class RecurrenceSolver {
  constructor(private readonly logger: Logger = Logger.silent()) {}

  solve(relation: RecurrenceRelation): SolverOutcome {
    const { terms, localCost } = relation;
    if (terms.length === 0) return unsolved('the relation has no recursive term');

    for (const term of terms) {
      if (term.transform.kind === 'unknown' || term.transform.kind === 'subtract-symbolic') {
        return unsolved(`size transform ${term.transform.text} is not a constant shrink`, [
          step('Identify terms', relation.equation),
        ]);
      }
      if (term.transform.kind === 'subtract' && term.transform.amount <= 0) {
        return unsolved(`size transform ${term.transform.text} does not shrink the input`, [
          step('Identify terms', relation.equation),
        ]);
      }
    }

    const divides = terms.flatMap(term =>
      term.transform.kind === 'divide' ? [{ coefficient: term.coefficient, divisor: term.transform.divisor }] : []
    );
    const subtracts = terms.flatMap(term =>
      term.transform.kind === 'subtract' ? [{ coefficient: term.coefficient, amount: term.transform.amount }] : []
    );

    let outcome: SolverOutcome;
    if (subtracts.length === 0) {
      const divisors = new Set(divides.map(term => term.divisor));
      const [divisor] = [...divisors];
      outcome =
        divisors.size === 1 && divisor !== undefined
          ? this.master(divides.reduce((sum, term) => sum + term.coefficient, 0), divisor, localCost)
          : this.substituteDivide(divides, localCost);
    } else if (divides.length === 0) {
      outcome = this.subtractive(subtracts, localCost);
    } else {
      outcome = this.substituteMixed(terms, localCost);
    }

    this.logger.debug('Solved recurrence', {
      equation: relation.equation,
      solved: outcome.solved,
      bound: outcome.solved ? renderGrowth(outcome.bound) : undefined,
    });
    return outcome;
  }

  private master(a: number, b: number, f: Growth): SolverOutcome {
    const steps: MathStep[] = [step('Identify coefficients', `a = ${a}, b = ${b}, f(n) = ${renderGrowth(f)}`)];
    const result = masterCase(a, b, f);
    if (!result) {
      return unsolved(`f(n) = ${renderGrowth(f)} is not polynomial, so the master theorem does not apply`, steps);
    }

    const c = result.criticalExponent;
    const exponent = formatNumber(c);
    steps.push(step('Critical exponent', `c = log_${b}(${a}) = ${exponent}`));

    const annotations: Annotation[] = [];
    switch (result.caseNumber) {
      case 1:
        steps.push(step('Compare', `f(n) = ${renderGrowth(f)} grows slower than n^${exponent}`));
        break;
      case 2:
        steps.push(
          step('Compare', `f(n) = ${renderGrowth(f)} matches n^${exponent} up to (log n)^${f.logPower}`)
        );
        break;
      case 3:
        steps.push(step('Compare', `f(n) = ${renderGrowth(f)} grows faster than n^${exponent}`));
        steps.push(step('Regularity condition', `assumed: ${a}·f(n/${b}) <= k·f(n) for some k < 1`));
        annotations.push({
          kind: 'regularity-assumed',
          message: `Master theorem case 3 assumes ${a}·f(n/${b}) <= k·f(n) for some k < 1`,
          assumption: true,
        });
        break;
    }

    const bound = result.bound;
    steps.push(step('Conclusion', `Case ${result.caseNumber}: Θ(${renderGrowth(bound)})`));
    return {
      solved: true,
      bound,
      method: 'master-theorem',
      caseNumber: result.caseNumber,
      justification: `Master theorem case ${result.caseNumber}: a = ${a}, b = ${b}, f(n) = ${renderGrowth(f)} gives Θ(${renderGrowth(bound)})`,
      mathSteps: steps,
      annotations,
    };
  }

  private subtractive(terms: SubtractTerm[], f: Growth): SolverOutcome {
    const [single] = terms;
    if (terms.length === 1 && single !== undefined && single.coefficient === 1) {
      return this.linearChain(single.amount, f);
    }

    const isFibonacci =
      terms.length === 2 &&
      terms.every(term => term.coefficient === 1) &&
      terms.some(term => term.amount === 1) &&
      terms.some(term => term.amount === 2);
    if (isFibonacci && isPolylog(f)) {
      const bound = growth(0, 0, GOLDEN_RATIO);
      return {
        solved: true,
        bound,
        method: 'fibonacci-pattern',
        justification: `T(n-1) + T(n-2) grows like the Fibonacci numbers: Θ(φ^n) with φ = ${formatNumber(GOLDEN_RATIO)}`,
        mathSteps: [
          step('Identify terms', `T(n) = T(n-1) + T(n-2) + ${renderGrowth(f)}`),
          step('Characteristic equation', 'x^2 = x + 1'),
          step('Dominant root', `φ = (1 + √5) / 2 ≈ ${formatNumber(GOLDEN_RATIO)}`),
          step('Conclusion', 'Θ(φ^n)'),
        ],
        annotations: [
          {
            kind: 'fibonacci-pattern',
            message: 'Fibonacci-shaped recurrence T(n-1) + T(n-2); bound is Θ(φ^n)',
            assumption: false,
          },
        ],
      };
    }

    const root = dominantRoot(terms);
    if (root === null) {
      return unsolved('the characteristic equation has no root above 1', [
        step('Identify terms', terms.map(term => `${term.coefficient}·T(n-${term.amount})`).join(' + ')),
      ]);
    }
    const bound = maxGrowth(growth(0, 0, root), isPolylog(f) ? growth() : f);
    const equation = terms
      .map(term => `${term.coefficient > 1 ? term.coefficient : ''}x^-${term.amount}`)
      .join(' + ');
    return {
      solved: true,
      bound,
      method: 'linear-recurrence',
      justification: `Homogeneous part has dominant root ${formatNumber(root)}, so T(n) = Θ(${renderGrowth(bound)})`,
      mathSteps: [
        step('Identify terms', terms.map(term => `${term.coefficient}·T(n-${term.amount})`).join(' + ')),
        step('Characteristic equation', `${equation} = 1`),
        step('Dominant root', `x ≈ ${formatNumber(root)}`),
        step('Conclusion', `Θ(${renderGrowth(bound)})`),
      ],
      annotations: [],
    };
  }

  private linearChain(amount: number, f: Growth): SolverOutcome {
    // A geometric f(n) dominates its own partial sums.
    const bound = isPolylog(f) ? multiplyGrowth(f, LINEAR) : f;
    const work = renderGrowth(f);
    return {
      solved: true,
      bound,
      method: 'linear-recurrence',
      justification: `Each of the n/${amount} levels does ${work} work, so T(n) = Θ(${renderGrowth(bound)})`,
      mathSteps: [
        step('Unroll', `T(n) = T(n-${amount}) + ${work} = T(n-${2 * amount}) + 2·${work} = ...`),
        step('Depth', `n/${amount} levels before the base case`),
        step('Sum', `n/${amount} · ${work}`),
        step('Conclusion', `Θ(${renderGrowth(bound)})`),
      ],
      annotations: [],
    };
  }

  /** Numeric unrolling at n = 2^11 .. 2^20, fitted against n^d (log n)^k. */
  private substituteDivide(terms: DivideTerm[], f: Growth): SolverOutcome {
    const steps: MathStep[] = [
      step('Unroll numerically', `T(x) = 1 for x <= 1; sampled n = 2^11 .. 2^20`),
    ];
    if (!isPolylog(f)) {
      return unsolved(`f(n) = ${renderGrowth(f)} is not polynomial`, steps);
    }

    const memo = new Map<number, number>();
    const value = (n: number): number => {
      if (n <= 1) return 1;
      const cached = memo.get(n);
      if (cached !== undefined) return cached;
      const total =
        terms.reduce((sum, term) => sum + term.coefficient * value(Math.floor(n / term.divisor)), 0) + evaluate(f, n);
      memo.set(n, total);
      return total;
    };

    const samples = DIVIDE_SAMPLES.map(n => ({ n, t: value(n) }));
    const fit = bestFit(samples);
    if (!fit) {
      return unsolved('the sampled values do not settle on n^d (log n)^k', steps);
    }

    steps.push(
      step('Ratio test', `T(n) / ${renderGrowth(fit.growth)} stays within a factor of ${formatNumber(fit.spread)}`),
      step('Conclusion', `Θ(${renderGrowth(fit.growth)})`)
    );
    return {
      solved: true,
      bound: fit.growth,
      method: 'substitution',
      justification: `Unrolling the recurrence numerically fits Θ(${renderGrowth(fit.growth)})`,
      mathSteps: steps,
      annotations: [],
    };
  }

  /** Mixed shrink forms; only exponential growth can be read from consecutive ratios. */
  private substituteMixed(terms: RecurrenceTerm[], f: Growth): SolverOutcome {
    const steps: MathStep[] = [step('Unroll numerically', 'T(x) = 1 for x <= 1; sampled n = 11 .. 20')];
    if (!isPolylog(f)) return unsolved(`f(n) = ${renderGrowth(f)} is not polynomial`, steps);

    const memo = new Map<number, number>();
    const value = (n: number): number => {
      if (n <= 1) return 1;
      const cached = memo.get(n);
      if (cached !== undefined) return cached;
      let total = evaluate(f, n);
      for (const term of terms) {
        if (term.transform.kind === 'divide') total += term.coefficient * value(Math.floor(n / term.transform.divisor));
        if (term.transform.kind === 'subtract') total += term.coefficient * value(n - term.transform.amount);
      }
      memo.set(n, total);
      return total;
    };

    const ratios = SUBTRACT_SAMPLES.slice(1).map(n => value(n) / value(n - 1));
    const tail = ratios.slice(-CONVERGENCE_WINDOW);
    const last = tail[tail.length - 1];
    if (last === undefined || spread(tail) - 1 > RATIO_TOLERANCE || last <= 1 + RATIO_TOLERANCE) {
      return unsolved('consecutive values do not settle on a constant ratio', steps);
    }

    const bound = growth(0, 0, Math.round(last * 100) / 100);
    steps.push(
      step('Ratio test', `T(n) / T(n-1) settles near ${formatNumber(last)}`),
      step('Conclusion', `Θ(${renderGrowth(bound)})`)
    );
    return {
      solved: true,
      bound,
      method: 'substitution',
      justification: `Consecutive values grow by a factor of ${formatNumber(last)}, so T(n) = Θ(${renderGrowth(bound)})`,
      mathSteps: steps,
      annotations: [],
    };
  }
}

interface Fit {
  growth: Growth;
  spread: number;
}

function bestFit(samples: { n: number; t: number }[]): Fit | null {
  const first = samples[0];
  const last = samples[samples.length - 1];
  if (!first || !last) return null;

  const slope = Math.round((Math.log(last.t / first.t) / Math.log(last.n / first.n)) * 100) / 100;
  const degrees = [...Array.from({ length: 9 }, (_, index) => index / 2), slope];

  let best: Fit | null = null;
  for (const degree of degrees) {
    for (const logPower of [0, 1, 2]) {
      const candidate = growth(degree, logPower);
      const ratios = samples.slice(-CONVERGENCE_WINDOW).map(sample => sample.t / evaluate(candidate, sample.n));
      const candidateSpread = spread(ratios);
      if (candidateSpread > MAX_SPREAD) continue;
      if (!best || candidateSpread < best.spread - 1e-12) {
        best = { growth: candidate, spread: candidateSpread };
      }
    }
  }
  return best;
}

/** Largest x > 1 with Σ a_i · x^(-c_i) = 1, by bisection; null when no bracket is found. */
function dominantRoot(terms: SubtractTerm[]): number | null {
  if (terms.some(term => term.amount <= 0)) return null;
  const excess = (x: number): number =>
    terms.reduce((sum, term) => sum + term.coefficient * x ** -term.amount, 0) - 1;

  let low = 1;
  let high = 2;
  for (let doubling = 0; excess(high) > 0; doubling++) {
    if (doubling >= MAX_DOUBLINGS) return null;
    high *= 2;
  }
  for (let i = 0; i < 100; i++) {
    const mid = (low + high) / 2;
    if (excess(mid) > 0) {
      low = mid;
    } else {
      high = mid;
    }
  }
  return snap((low + high) / 2);
}

export function solveRecurrence(relation: RecurrenceRelation, logger?: Logger): SolverOutcome {
  return new RecurrenceSolver(logger).solve(relation);
}
