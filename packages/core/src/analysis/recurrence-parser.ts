import { formatEquation } from './recurrence-extractor.js';
import type { RecurrenceRelation, RecurrenceTerm } from './recurrence-extractor.js';
import { CONSTANT, growth, maxGrowth } from './growth.js';
import type { Growth } from './growth.js';
import { divideTransform, subtractTransform } from './self-calls.js';

export class RecurrenceSyntaxError extends Error {
  constructor(
    message: string,
    public readonly input: string
  ) {
    super(message);
    this.name = 'RecurrenceSyntaxError';
  }
}

const TERM = /^(\d+)?\s*[*·]?\s*T\s*\(\s*n\s*([-/])\s*(\d+)\s*\)$/;
const BOUND_WRAPPER = /^[OΘΩ]\s*\((.*)\)$/;

/** Splits on `+` outside parentheses. */
function splitSum(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';
  for (const ch of text) {
    if (ch === '(') depth++;
    if (ch === ')') depth--;
    if (ch === '+' && depth === 0) {
      parts.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current.trim());
  return parts.filter(part => part.length > 0);
}

const FACTORS: ReadonlyArray<[RegExp, (match: RegExpMatchArray) => Growth]> = [
  [/^n!/, () => growth(0, 0, 1, true)],
  [/^\(log n\)\^(\d+)/, match => growth(0, Number(match[1]))],
  [/^log\^(\d+)\s*n/, match => growth(0, Number(match[1]))],
  [/^(?:log|lg)\s*\(?n\)?/, () => growth(0, 1)],
  [/^n\^(\d+(?:\.\d+)?)/, match => growth(Number(match[1]))],
  [/^n/, () => growth(1)],
  [/^(\d+(?:\.\d+)?)\^n/, match => growth(0, 0, Number(match[1]))],
  [/^φ\^n/, () => growth(0, 0, (1 + Math.sqrt(5)) / 2)],
  [/^(?:\d+(?:\.\d+)?|c)/, () => CONSTANT],
];

/** Reads a growth term such as `n log n`, `n^2`, `Θ(1)` or `3n`. */
export function parseGrowth(text: string): Growth {
  let rest = text.trim();
  const wrapped = BOUND_WRAPPER.exec(rest);
  if (wrapped?.[1] !== undefined) rest = wrapped[1].trim();

  let total = growth();
  let matched = false;
  while (rest.length > 0) {
    const factor = FACTORS.find(([pattern]) => pattern.test(rest));
    if (!factor) throw new RecurrenceSyntaxError(`Cannot read the growth term "${text}"`, text);
    const [pattern, build] = factor;
    const match = pattern.exec(rest);
    if (!match) break;
    const part = build(match);
    total = growth(
      total.degree + part.degree,
      total.logPower + part.logPower,
      total.expBase * part.expBase,
      total.factorial || part.factorial
    );
    matched = true;
    rest = rest.slice(match[0].length).replace(/^[\s*·]+/, '');
  }
  if (!matched) throw new RecurrenceSyntaxError(`Cannot read the growth term "${text}"`, text);
  return total;
}

/**
 * Parses text such as `T(n) = 2T(n/2) + n` or `T(n) = T(n-1) + T(n-2) + 1`
 * into a relation the solver accepts.
 */
export function parseRecurrence(text: string): RecurrenceRelation {
  const [left, right, ...extra] = text.split('=');
  if (left === undefined || right === undefined || extra.length > 0 || !/^\s*T\s*\(\s*n\s*\)\s*$/.test(left)) {
    throw new RecurrenceSyntaxError(`Expected an equation of the form "T(n) = ..." but got "${text}"`, text);
  }

  const terms: RecurrenceTerm[] = [];
  const work: Growth[] = [];
  for (const part of splitSum(right)) {
    const match = TERM.exec(part);
    if (!match) {
      work.push(parseGrowth(part));
      continue;
    }
    const coefficient = match[1] === undefined ? 1 : Number(match[1]);
    const amount = Number(match[3]);
    const transform = match[2] === '/' ? divideTransform(amount) : subtractTransform(amount);
    if (coefficient === 0 || (transform.kind === 'divide' && amount <= 1) || (transform.kind === 'subtract' && amount === 0)) {
      throw new RecurrenceSyntaxError(`Term "${part}" does not shrink the input`, text);
    }
    const existing = terms.find(term => term.transform.text === transform.text);
    if (existing) {
      existing.coefficient += coefficient;
    } else {
      terms.push({ coefficient, transform });
    }
  }

  if (terms.length === 0) {
    throw new RecurrenceSyntaxError(`"${text}" has no recursive T(...) term`, text);
  }

  const localCost = maxGrowth(...work);
  return {
    procedure: 'T',
    equation: formatEquation(terms, localCost),
    terms,
    localCost,
    baseCase: 'T(1) = 1',
    notes: [],
    explanation: `Recurrence read from "${text.trim()}".`,
    transforms: terms.map(term => term.transform),
  };
}
