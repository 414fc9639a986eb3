/**
 * Symbolic growth rate n^degree · (log n)^logPower · expBase^n, or n! when
 * `factorial` is set. Only these shapes are ever rendered, so the ordering
 * below is total.
 */
export interface Growth {
  readonly degree: number;
  readonly logPower: number;
  /** 1 means no exponential factor. */
  readonly expBase: number;
  readonly factorial: boolean;
}

export type BoundSymbol = 'O' | 'Ω' | 'Θ';

export const EPSILON = 1e-9;
export const GOLDEN_RATIO = (1 + Math.sqrt(5)) / 2;

export function growth(degree = 0, logPower = 0, expBase = 1, factorial = false): Growth {
  return { degree, logPower, expBase, factorial };
}

export const CONSTANT = growth();
export const LOGARITHMIC = growth(0, 1);
export const LINEAR = growth(1);
export const LINEARITHMIC = growth(1, 1);
export const QUADRATIC = growth(2);
export const EXPONENTIAL = growth(0, 0, 2);
export const FACTORIAL = growth(0, 0, 1, true);

function nearlyEqual(a: number, b: number, tolerance = EPSILON): boolean {
  return Math.abs(a - b) < tolerance;
}

export function compareGrowth(a: Growth, b: Growth): number {
  if (a.factorial !== b.factorial) return a.factorial ? 1 : -1;
  if (!nearlyEqual(a.expBase, b.expBase, 1e-6)) return a.expBase - b.expBase;
  if (!nearlyEqual(a.degree, b.degree, 1e-6)) return a.degree - b.degree;
  return a.logPower - b.logPower;
}

export function sameGrowth(a: Growth, b: Growth): boolean {
  return compareGrowth(a, b) === 0;
}

export function maxGrowth(...values: Growth[]): Growth {
  return values.reduce((best, value) => (compareGrowth(value, best) > 0 ? value : best), CONSTANT);
}

export function minGrowth(first: Growth, ...rest: Growth[]): Growth {
  return rest.reduce((best, value) => (compareGrowth(value, best) < 0 ? value : best), first);
}

export function multiplyGrowth(a: Growth, b: Growth): Growth {
  return growth(a.degree + b.degree, a.logPower + b.logPower, a.expBase * b.expBase, a.factorial || b.factorial);
}

export function isConstant(value: Growth): boolean {
  return sameGrowth(value, CONSTANT);
}

export function isPolylog(value: Growth): boolean {
  return !value.factorial && nearlyEqual(value.expBase, 1, 1e-6);
}

export function formatNumber(value: number): string {
  const rounded = Math.round(value * 100) / 100;
  return Number.isInteger(rounded) ? String(rounded) : rounded.toFixed(2).replace(/0$/, '');
}

function formatBase(base: number): string {
  if (nearlyEqual(base, GOLDEN_RATIO, 1e-3)) return 'φ';
  return formatNumber(base);
}

export function renderGrowth(value: Growth): string {
  if (value.factorial) return 'n!';

  const parts: string[] = [];
  if (!nearlyEqual(value.degree, 0, 1e-6)) {
    parts.push(nearlyEqual(value.degree, 1, 1e-6) ? 'n' : `n^${formatNumber(value.degree)}`);
  }
  if (value.logPower === 1) {
    parts.push('log n');
  } else if (value.logPower > 1) {
    parts.push(`(log n)^${value.logPower}`);
  }
  if (!nearlyEqual(value.expBase, 1, 1e-6)) {
    parts.push(`${formatBase(value.expBase)}^n`);
  }
  return parts.length === 0 ? '1' : parts.join(' ');
}

export function notation(symbol: BoundSymbol, value: Growth): string {
  return `${symbol}(${renderGrowth(value)})`;
}

/** The three cases tracked for every construct. */
export interface CaseComplexity {
  best: Growth;
  worst: Growth;
  average: Growth;
}

export function uniformCases(value: Growth): CaseComplexity {
  return { best: value, worst: value, average: value };
}

export const CONSTANT_CASES: CaseComplexity = uniformCases(CONSTANT);

/** Statements in sequence: the slower part dominates in every case. */
export function sequenceCases(a: CaseComplexity, b: CaseComplexity): CaseComplexity {
  return {
    best: maxGrowth(a.best, b.best),
    worst: maxGrowth(a.worst, b.worst),
    average: maxGrowth(a.average, b.average),
  };
}

/**
 * Two-way branch. The average is the midpoint of the two branch costs with
 * equal weights; with constant weights its dominant term is the larger
 * branch, so that is what is kept.
 */
export function branchCases(a: CaseComplexity, b: CaseComplexity): CaseComplexity {
  return {
    best: minGrowth(a.best, b.best),
    worst: maxGrowth(a.worst, b.worst),
    average: maxGrowth(a.average, b.average),
  };
}

export function scaleCases(cases: CaseComplexity, factor: CaseComplexity): CaseComplexity {
  return {
    best: multiplyGrowth(cases.best, factor.best),
    worst: multiplyGrowth(cases.worst, factor.worst),
    average: multiplyGrowth(cases.average, factor.average),
  };
}

export function isUniform(cases: CaseComplexity): boolean {
  return sameGrowth(cases.best, cases.worst) && sameGrowth(cases.worst, cases.average);
}
