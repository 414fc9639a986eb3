// Parsing exports
export * from './parsing/tokens.js';
export * from './parsing/errors.js';
export * from './parsing/lexer.js';
export * from './parsing/ast.js';
export * from './parsing/parser.js';
export * from './parsing/printer.js';

// Analysis exports
export * from './analysis/growth.js';
export * from './analysis/line-cost-analyzer.js';
export * from './analysis/structural-engine.js';
export * from './analysis/self-calls.js';
export * from './analysis/recurrence-extractor.js';
export * from './analysis/recurrence-parser.js';
export * from './analysis/recurrence-solver.js';
export * from './analysis/recursion-tree-builder.js';
export * from './analysis/resolver.js';

// Pipeline exports
export * from './pipeline/analyzer.js';
export * from './pipeline/report-serializer.js';

// Utility exports
export * from './utils/logger.js';

// Types
export * from './types/index.js';
