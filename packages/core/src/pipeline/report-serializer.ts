import { renderGrowth } from '../analysis/growth.js';
import type { RecursionTree, RecursionTreeNode } from '../analysis/recursion-tree-builder.js';
import type { MathStep } from '../types/index.js';
import type { AnalysisReport } from './analyzer.js';

export interface SerializedToken {
  type: string;
  value: string;
  line: number;
  column: number;
}

export interface SerializedTreeNode {
  label: string;
  cost: string;
  level: number;
  children: SerializedTreeNode[];
}

export interface SerializedReport {
  lexer: { tokens: SerializedToken[] };
  parser: { ast_dump: string };
  line_costs: { rows: { line: number; code: string; cost: string }[] };
  extraction: { equation: string; explanation: string; base_case: string; notes: string[] };
  solution: {
    main_result: string;
    cases: { best: string; average: string; worst: string };
    method_used: string;
    justification: string;
    math_steps: MathStep[];
  };
  annotations: { kind: string; message: string; assumption: boolean; line?: number }[];
  recursion_tree?: {
    levels: { level: number; nodes: number; cost: string }[];
    total_cost: string;
    truncated: boolean;
    structure: SerializedTreeNode;
  };
}

function serializeNode(node: RecursionTreeNode): SerializedTreeNode {
  return {
    label: `T(${node.label})`,
    cost: node.cost,
    level: node.depth,
    children: node.children.map(serializeNode),
  };
}

function serializeTree(tree: RecursionTree): NonNullable<SerializedReport['recursion_tree']> {
  return {
    levels: tree.levels.map(level => ({ level: level.depth, nodes: level.nodes, cost: level.cost })),
    total_cost: tree.totalCost,
    truncated: tree.truncated,
    structure: serializeNode(tree.root),
  };
}

/** Converts a report into the snake_case wire shape consumed by front ends. */
export function serializeReport(report: AnalysisReport): SerializedReport {
  const serialized: SerializedReport = {
    lexer: {
      tokens: report.tokens
        .filter(token => token.kind !== 'eof')
        .map(token => ({ type: token.kind, value: token.value, line: token.line, column: token.column })),
    },
    parser: { ast_dump: report.astDump },
    line_costs: {
      rows: report.lineCosts.map(row => ({ line: row.line, code: row.code, cost: renderGrowth(row.cost) })),
    },
    extraction: {
      equation: report.extraction.equation,
      explanation: report.extraction.explanation,
      base_case: report.extraction.baseCase,
      notes: report.extraction.notes,
    },
    solution: {
      main_result: report.solution.mainResult,
      cases: report.solution.cases,
      method_used: report.solution.method,
      justification: report.solution.justification,
      math_steps: report.solution.mathSteps,
    },
    annotations: report.annotations.map(annotation => ({
      kind: annotation.kind,
      message: annotation.message,
      assumption: annotation.assumption,
      ...(annotation.line !== undefined ? { line: annotation.line } : {}),
    })),
  };

  if (report.recursionTree) {
    serialized.recursion_tree = serializeTree(report.recursionTree);
  }
  return serialized;
}
