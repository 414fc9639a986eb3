import { Logger } from '@asymptote/core';
import { AsymptoteConfigSchema, DEFAULT_CONFIG } from './asymptote-schema.js';
import type { AsymptoteConfig, ResolvedConfig } from './asymptote-schema.js';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import type { ZodError } from 'zod';

export const CONFIG_FILE_NAME = 'asymptote.yaml';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

function describeIssues(error: ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export class ConfigLoader {
  private logger: Logger;
  private configCache: Map<string, ResolvedConfig> = new Map();

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Load configuration for a directory
   * Uses `explicitPath` when given, otherwise searches for asymptote.yaml in
   * the directory and its parents
   */
  async loadConfig(projectPath: string, explicitPath?: string): Promise<ResolvedConfig> {
    const cacheKey = explicitPath ? path.resolve(explicitPath) : path.resolve(projectPath);
    const cached = this.configCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const configPath = explicitPath ? path.resolve(explicitPath) : await this.findConfigFile(projectPath);

    if (!configPath) {
      this.logger.info('No asymptote.yaml found, using default configuration', { projectPath });
      const config = this.mergeWithDefaults({});
      this.configCache.set(cacheKey, config);
      return config;
    }

    const config = await this.readConfigFile(configPath);
    this.logger.info('Loaded configuration', {
      configPath,
      format: config.output.format,
      maxTreeDepth: config.analysis.maxTreeDepth,
    });

    this.configCache.set(cacheKey, config);
    return config;
  }

  private async readConfigFile(configPath: string): Promise<ResolvedConfig> {
    let content: string;
    try {
      content = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
      throw new ConfigError(
        `Cannot read ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
        configPath
      );
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(content);
    } catch (error) {
      throw new ConfigError(
        `Invalid YAML in ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
        configPath
      );
    }

    // An empty file loads as undefined
    const result = AsymptoteConfigSchema.safeParse(parsed ?? {});
    if (!result.success) {
      throw new ConfigError(`Invalid configuration in ${configPath}: ${describeIssues(result.error)}`, configPath);
    }
    return this.mergeWithDefaults(result.data);
  }

  /**
   * Find asymptote.yaml in the directory hierarchy
   */
  private async findConfigFile(startPath: string): Promise<string | null> {
    let currentPath = path.resolve(startPath);

    while (true) {
      const configPath = path.join(currentPath, CONFIG_FILE_NAME);

      try {
        await fs.access(configPath);
        return configPath;
      } catch {
        // Not here, keep climbing
      }

      const parentPath = path.dirname(currentPath);
      if (parentPath === currentPath) {
        return null;
      }
      currentPath = parentPath;
    }
  }

  /**
   * Merge user configuration with defaults
   */
  private mergeWithDefaults(userConfig: AsymptoteConfig): ResolvedConfig {
    return {
      analysis: { ...DEFAULT_CONFIG.analysis, ...userConfig.analysis },
      output: { ...DEFAULT_CONFIG.output, ...userConfig.output },
      logging: { ...DEFAULT_CONFIG.logging, ...userConfig.logging },
    };
  }

  /**
   * Create a sample configuration file; returns its path
   */
  async createSampleConfig(projectPath: string): Promise<string> {
    const sampleConfig: AsymptoteConfig = {
      analysis: {
        maxTreeDepth: DEFAULT_CONFIG.analysis.maxTreeDepth,
        maxTreeNodes: DEFAULT_CONFIG.analysis.maxTreeNodes,
        treeInputSize: 16,
        buildTree: true,
      },
      output: { ...DEFAULT_CONFIG.output },
      logging: { ...DEFAULT_CONFIG.logging },
    };

    const configPath = path.join(projectPath, CONFIG_FILE_NAME);
    const yamlContent = yaml.dump(sampleConfig, {
      indent: 2,
      lineWidth: 100,
      noRefs: true,
    });

    await fs.writeFile(configPath, yamlContent);
    this.logger.info('Created sample configuration', { configPath });
    return configPath;
  }

  /**
   * Validate configuration
   */
  validateConfig(config: unknown): { valid: boolean; errors: string[] } {
    const result = AsymptoteConfigSchema.safeParse(config);
    if (result.success) {
      return { valid: true, errors: [] };
    }
    return { valid: false, errors: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) };
  }

  /**
   * Clear configuration cache
   */
  clearCache(): void {
    this.configCache.clear();
  }

  /**
   * Get cached configuration
   */
  getCachedConfig(projectPath: string): ResolvedConfig | null {
    return this.configCache.get(path.resolve(projectPath)) ?? null;
  }
}
