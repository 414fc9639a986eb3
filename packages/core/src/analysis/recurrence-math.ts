import { EPSILON, growth, isPolylog } from './growth.js';
import type { Growth } from './growth.js';

export interface MasterCase {
  caseNumber: 1 | 2 | 3;
  criticalExponent: number;
  bound: Growth;
}

export function snap(value: number): number {
  const rounded = Math.round(value);
  return Math.abs(value - rounded) < EPSILON ? rounded : value;
}

export function criticalExponent(a: number, b: number): number {
  return snap(Math.log(a) / Math.log(b));
}

/**
 * Case analysis for T(n) = a·T(n/b) + f(n). Returns null when f(n) is not
 * polylogarithmic times polynomial.
 */
export function masterCase(a: number, b: number, f: Growth): MasterCase | null {
  if (a < 1 || b <= 1 || !isPolylog(f)) return null;

  const c = criticalExponent(a, b);
  if (Math.abs(f.degree - c) < EPSILON) {
    return { caseNumber: 2, criticalExponent: c, bound: growth(c, f.logPower + 1) };
  }
  if (f.degree < c) {
    return { caseNumber: 1, criticalExponent: c, bound: growth(c) };
  }
  return { caseNumber: 3, criticalExponent: c, bound: f };
}
