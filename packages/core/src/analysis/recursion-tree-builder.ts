import { Logger } from '../utils/logger.js';
import { formatNumber, isConstant, renderGrowth } from './growth.js';
import type { Growth } from './growth.js';
import type { RecurrenceRelation } from './recurrence-extractor.js';

export interface TreeOptions {
  maxDepth?: number;
  /** Concrete n; nodes whose size drops to 1 or below become leaves. */
  inputSize?: number;
  maxNodes?: number;
  logger?: Logger;
}

/** Subproblem size n/divisor - offset. */
export interface NodeSize {
  divisor: number;
  offset: number;
}

export interface RecursionTreeNode {
  label: string;
  size: NodeSize;
  depth: number;
  /** Work done at this node, e.g. `n/2` or `1`. */
  cost: string;
  base: boolean;
  children: RecursionTreeNode[];
}

export interface RecursionTreeLevel {
  depth: number;
  nodes: number;
  /** Total work on this level, e.g. `2·n` or `8`. */
  cost: string;
  /** Level work as a multiple of f(n), with base leaves counted separately. */
  coefficient: number;
  baseNodes: number;
}

export interface RecursionTree {
  root: RecursionTreeNode;
  levels: RecursionTreeLevel[];
  totalCost: string;
  /** Set when depth or node limits cut the tree before every branch reached a base case. */
  truncated: boolean;
}

export const DEFAULT_TREE_OPTIONS = { maxDepth: 6, maxNodes: 2000 } as const;

export function sizeLabel(size: NodeSize): string {
  const scaled = size.divisor === 1 ? 'n' : `n/${formatNumber(size.divisor)}`;
  return size.offset === 0 ? scaled : `${scaled}-${formatNumber(size.offset)}`;
}

function applyCost(f: Growth, label: string): string {
  const text = renderGrowth(f);
  if (isConstant(f) || label === 'n') return text;
  if (text === 'n') return label;
  return text.replace(/\bn\b/g, `(${label})`);
}

function scaled(coefficient: number, f: Growth): string {
  const text = renderGrowth(f);
  if (isConstant(f)) return formatNumber(coefficient);
  return coefficient === 1 ? text : `${formatNumber(coefficient)}·${text}`;
}

function levelText(coefficient: number, baseNodes: number, f: Growth): string {
  if (coefficient === 0) return String(baseNodes);
  const work = scaled(coefficient, f);
  return baseNodes === 0 ? work : `${work} + ${baseNodes}`;
}

/**
 * Expands the relation breadth first, one node per subproblem, and sums
 * the work on every level.
 */
export class RecursionTreeBuilder {
  private readonly maxDepth: number;
  private readonly maxNodes: number;
  private readonly logger: Logger;

  constructor(private readonly options: TreeOptions = {}) {
    this.maxDepth = options.maxDepth ?? DEFAULT_TREE_OPTIONS.maxDepth;
    this.maxNodes = options.maxNodes ?? DEFAULT_TREE_OPTIONS.maxNodes;
    this.logger = options.logger ?? Logger.silent();
  }

  build(relation: RecurrenceRelation): RecursionTree | null {
    const shrinks = relation.terms.every(
      term => term.transform.kind === 'divide' || term.transform.kind === 'subtract'
    );
    if (relation.terms.length === 0 || !shrinks) return null;

    const f = relation.localCost;
    const root = this.node({ divisor: 1, offset: 0 }, 0, f);
    const levels: RecursionTreeLevel[] = [];
    let frontier = [root];
    let count = 1;
    let truncated = false;

    while (frontier.length > 0) {
      const depth = frontier[0]?.depth ?? 0;
      levels.push(this.level(depth, frontier, f));

      const next: RecursionTreeNode[] = [];
      for (const parent of frontier) {
        if (parent.base) continue;
        if (depth >= this.maxDepth) {
          truncated = true;
          continue;
        }
        for (const term of relation.terms) {
          for (let copy = 0; copy < term.coefficient; copy++) {
            if (count >= this.maxNodes) {
              truncated = true;
              break;
            }
            const size =
              term.transform.kind === 'divide'
                ? { divisor: parent.size.divisor * term.transform.divisor, offset: parent.size.offset / term.transform.divisor }
                : term.transform.kind === 'subtract'
                  ? { divisor: parent.size.divisor, offset: parent.size.offset + term.transform.amount }
                  : parent.size;
            const child = this.node(size, depth + 1, f);
            parent.children.push(child);
            next.push(child);
            count++;
          }
        }
      }
      frontier = next;
    }

    const coefficient = levels.reduce((sum, level) => sum + level.coefficient, 0);
    const baseNodes = levels.reduce((sum, level) => sum + level.baseNodes, 0);
    this.logger.debug('Built recursion tree', { levels: levels.length, nodes: count, truncated });

    return { root, levels, totalCost: levelText(coefficient, baseNodes, f), truncated };
  }

  private node(size: NodeSize, depth: number, f: Growth): RecursionTreeNode {
    const label = sizeLabel(size);
    const base = this.options.inputSize !== undefined && this.options.inputSize / size.divisor - size.offset <= 1;
    return { label, size, depth, cost: base ? '1' : applyCost(f, label), base, children: [] };
  }

  private level(depth: number, nodes: RecursionTreeNode[], f: Growth): RecursionTreeLevel {
    let coefficient = 0;
    let baseNodes = 0;
    for (const node of nodes) {
      if (node.base) {
        baseNodes++;
      } else {
        // Work at size n/d is (1/d)^degree of f(n); offsets and logs are lower order.
        coefficient += (1 / node.size.divisor) ** f.degree;
      }
    }
    coefficient = Math.round(coefficient * 1e6) / 1e6;
    return { depth, nodes: nodes.length, cost: levelText(coefficient, baseNodes, f), coefficient, baseNodes };
  }
}

export function buildTree(relation: RecurrenceRelation, options?: TreeOptions): RecursionTree | null {
  return new RecursionTreeBuilder(options).build(relation);
}

/** Indented text rendering, one node per line: `T(n/2): n/2`. */
export function treeLines(tree: RecursionTree): string[] {
  const lines: string[] = [];
  const visit = (node: RecursionTreeNode, prefix: string, last: boolean, root: boolean): void => {
    const branch = root ? '' : last ? '└─ ' : '├─ ';
    lines.push(`${prefix}${branch}T(${node.label}): ${node.cost}`);
    const childPrefix = root ? '' : `${prefix}${last ? '   ' : '│  '}`;
    node.children.forEach((child, index) => visit(child, childPrefix, index === node.children.length - 1, false));
  };
  visit(tree.root, '', true, true);
  return lines;
}
