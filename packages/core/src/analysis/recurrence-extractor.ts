import type { Block, Expression, IfElse, ProcedureDecl, Program } from '../parsing/ast.js';
import { formatExpression } from '../parsing/printer.js';
import { Logger } from '../utils/logger.js';
import {
  buildProcedureTable,
  callsInBlock,
  isSelfCall,
  procedureKey,
  walkStatements,
} from './ast-walk.js';
import { CONSTANT, maxGrowth, multiplyGrowth, renderGrowth } from './growth.js';
import type { Growth } from './growth.js';
import { lineCosts } from './line-cost-analyzer.js';
import type { LineCost } from './line-cost-analyzer.js';
import { selfCallPaths, selfCallSites } from './self-calls.js';
import type { SelfCallSite, SizeTransform } from './self-calls.js';

export interface RecurrenceTerm {
  coefficient: number;
  transform: SizeTransform;
}

export interface RecurrenceRelation {
  procedure: string;
  /** Canonical text, e.g. `T(n) = 2T(n/2) + n`. */
  equation: string;
  /** Self-call terms along the most expensive path. */
  terms: RecurrenceTerm[];
  /** f(n): work done outside the recursive calls. */
  localCost: Growth;
  baseCase: string;
  notes: string[];
  explanation: string;
  /** Every distinct size transform seen across the call sites. */
  transforms: SizeTransform[];
}

export interface ExtractOptions {
  source?: string;
  /** Precomputed rows for the whole program; computed from `source` when absent. */
  lineCosts?: LineCost[];
  /** Worst-case cost of a non-recursive procedure, by name. */
  calleeCost?: (name: string) => Growth | undefined;
  logger?: Logger;
}

const NEGATED: Record<string, string> = {
  '<': '>=',
  '<=': '>',
  '>': '<=',
  '>=': '<',
  '=': '<>',
  '<>': '=',
};

export function formatEquation(terms: readonly RecurrenceTerm[], localCost: Growth): string {
  const calls = terms.map(term => `${term.coefficient > 1 ? term.coefficient : ''}T(${term.transform.text})`);
  return `T(n) = ${[...calls, renderGrowth(localCost)].join(' + ')}`;
}

function negate(condition: Expression): string {
  if (condition.kind === 'BinaryExpr') {
    const opposite = NEGATED[condition.operator];
    if (opposite) {
      return `${formatExpression(condition.left)} ${opposite} ${formatExpression(condition.right)}`;
    }
  }
  if (condition.kind === 'UnaryExpr' && condition.operator === 'not') {
    return formatExpression(condition.operand);
  }
  return `not (${formatExpression(condition)})`;
}

function blockLines(block: Block): Set<number> {
  const lines = new Set<number>();
  walkStatements(block, statement => lines.add(statement.line));
  return lines;
}

/**
 * Extracts T(n) for one procedure from the size transforms of its
 * self-calls and the cost of the rest of its body.
 */
export class RecurrenceExtractor {
  private readonly logger: Logger;

  constructor(
    private readonly program: Program,
    private readonly options: ExtractOptions = {}
  ) {
    this.logger = options.logger ?? Logger.silent();
  }

  extract(procedureName: string): RecurrenceRelation | null {
    const procedure = buildProcedureTable(this.program).get(procedureKey(procedureName));
    if (!procedure) return null;

    const sites = selfCallSites(procedure);
    if (sites.length === 0) return null;

    const allRows = this.options.lineCosts ?? lineCosts(this.program, this.options.source ?? '');
    const rows = allRows.filter(row => row.scope === procedure.name);
    const notes: string[] = [];
    const paths = selfCallPaths(procedure);
    const terms = this.worstPathTerms(sites, paths.max, notes);
    const localCost = this.localCost(procedure, rows);
    const transforms = distinctTransforms(sites);

    for (const site of sites) {
      if (site.note) notes.push(site.note);
      if (site.insideLoop) {
        notes.push(`recursive call on line ${site.line} sits inside a loop; the recurrence does not count the loop's passes`);
      }
      if (site.transform.kind === 'unknown' || site.transform.kind === 'subtract-symbolic') {
        notes.push(`size transform ${site.transform.text} on line ${site.line} is not a constant shrink`);
      }
    }
    if (transforms.length > 1) {
      notes.push(`distinct size transforms: ${transforms.map(transform => transform.text).join(', ')}`);
    }

    const baseCase = this.baseCase(procedure, rows, notes);
    const equation = formatEquation(terms, localCost);
    const calls = terms.reduce((sum, term) => sum + term.coefficient, 0);
    const relation: RecurrenceRelation = {
      procedure: procedure.name,
      equation,
      terms,
      localCost,
      baseCase,
      notes: [...new Set(notes)],
      explanation:
        `${procedure.name} calls itself ${calls} time${calls === 1 ? '' : 's'} on its most expensive path ` +
        `(${terms.map(term => `T(${term.transform.text})`).join(', ')}) and does ${renderGrowth(localCost)} ` +
        `work outside the recursive calls.`,
      transforms,
    };

    this.logger.debug('Extracted recurrence', { procedure: procedure.name, equation });
    return relation;
  }

  extractAll(): RecurrenceRelation[] {
    return this.program.procedures
      .map(procedure => this.extract(procedure.name))
      .filter((relation): relation is RecurrenceRelation => relation !== null);
  }

  /**
   * Groups call sites by transform. When some calls sit on exclusive
   * branches only `pathCalls` of them happen together; the slowest-shrinking
   * transforms are kept first.
   */
  private worstPathTerms(sites: SelfCallSite[], pathCalls: number, notes: string[]): RecurrenceTerm[] {
    const groups: RecurrenceTerm[] = [];
    for (const site of sites) {
      const group = groups.find(term => term.transform.text === site.transform.text);
      if (group) {
        group.coefficient++;
      } else {
        groups.push({ coefficient: 1, transform: site.transform });
      }
    }

    if (pathCalls >= sites.length) return groups;

    notes.push(
      `${sites.length} recursive calls appear but at most ${pathCalls} run on one path; the others are on exclusive branches`
    );
    const ordered = [...groups].sort((a, b) => shrinkRank(a.transform) - shrinkRank(b.transform));
    const kept: RecurrenceTerm[] = [];
    let remaining = Math.max(pathCalls, 1);
    for (const group of ordered) {
      if (remaining === 0) break;
      const coefficient = Math.min(group.coefficient, remaining);
      kept.push({ coefficient, transform: group.transform });
      remaining -= coefficient;
    }
    return groups.flatMap(group => kept.filter(term => term.transform.text === group.transform.text));
  }

  private localCost(procedure: ProcedureDecl, rows: LineCost[]): Growth {
    const structural = rows.filter(row => row.origin === 'structural').map(row => row.cost);
    const calleeCosts = callsInBlock(procedure.body)
      .filter(call => !isSelfCall(call, procedure))
      .flatMap(call => {
        const cost = this.options.calleeCost?.(call.callee);
        if (!cost) return [];
        const around = rows.find(row => row.line === call.line)?.cost ?? CONSTANT;
        return [multiplyGrowth(around, cost)];
      });
    return maxGrowth(...structural, ...calleeCosts);
  }

  private baseCase(procedure: ProcedureDecl, rows: LineCost[], notes: string[]): string {
    const guard = procedure.body.statements.find((statement): statement is IfElse => statement.kind === 'IfElse');
    if (!guard) {
      notes.push('no leading conditional guard; base case assumed constant');
      return 'T(1) = 1';
    }

    const recursesIn = (block: Block | null): boolean =>
      block !== null && callsInBlock(block).some(call => isSelfCall(call, procedure));

    let condition: string;
    let branch: Block | null;
    if (!recursesIn(guard.consequent)) {
      condition = formatExpression(guard.condition);
      branch = guard.consequent;
    } else if (!recursesIn(guard.alternate)) {
      condition = negate(guard.condition);
      branch = guard.alternate;
    } else {
      notes.push(`both branches of the guard on line ${guard.line} recurse; base case assumed constant`);
      return 'T(1) = 1';
    }

    const lines = branch ? blockLines(branch) : new Set<number>();
    const cost = maxGrowth(...rows.filter(row => lines.has(row.line)).map(row => row.cost));
    return `T(n) = ${renderGrowth(cost)} for ${condition}`;
  }
}

function shrinkRank(transform: SizeTransform): number {
  switch (transform.kind) {
    case 'subtract':
      return transform.amount;
    case 'subtract-symbolic':
      return 100;
    case 'divide':
      return 1000 + transform.divisor;
    case 'unknown':
      return 10000;
  }
}

function distinctTransforms(sites: SelfCallSite[]): SizeTransform[] {
  const seen = new Map<string, SizeTransform>();
  for (const site of sites) {
    if (!seen.has(site.transform.text)) seen.set(site.transform.text, site.transform);
  }
  return [...seen.values()];
}

export function extract(program: Program, procedureName: string, options?: ExtractOptions): RecurrenceRelation | null {
  return new RecurrenceExtractor(program, options).extract(procedureName);
}
