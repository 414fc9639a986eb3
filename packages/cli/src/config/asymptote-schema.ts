import { z } from 'zod';

export const OUTPUT_FORMATS = ['detailed', 'json', 'table'] as const;

/**
 * Asymptote configuration schema
 * Defines the structure of asymptote.yaml files
 */
export const AsymptoteConfigSchema = z.object({
  // Pipeline limits
  analysis: z
    .object({
      // Deepest recursion tree level to expand
      maxTreeDepth: z.number().int().min(1).max(12).default(6),
      // Node budget for the recursion tree
      maxTreeNodes: z.number().int().min(1).max(100000).default(2000),
      // Concrete n for base-case cut-offs in the tree
      treeInputSize: z.number().int().min(1).optional(),
      buildTree: z.boolean().default(true),
    })
    .strict()
    .optional(),

  // Report rendering
  output: z
    .object({
      format: z.enum(OUTPUT_FORMATS).default('detailed'),
      color: z.boolean().default(true),
      showTokens: z.boolean().default(false),
      showAst: z.boolean().default(false),
    })
    .strict()
    .optional(),

  logging: z
    .object({
      verbose: z.boolean().default(false),
    })
    .strict()
    .optional(),
});

export type AsymptoteConfig = z.infer<typeof AsymptoteConfigSchema>;

/** Configuration with every section present. */
export type ResolvedConfig = { [K in keyof AsymptoteConfig]-?: NonNullable<AsymptoteConfig[K]> };

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: ResolvedConfig = {
  analysis: {
    maxTreeDepth: 6,
    maxTreeNodes: 2000,
    buildTree: true,
  },
  output: {
    format: 'detailed',
    color: true,
    showTokens: false,
    showAst: false,
  },
  logging: {
    verbose: false,
  },
};
