/**
 * Configuration file support for a11y-grade
 *
 * Supports loading config from:
 * - .a11ygraderc.json
 * - .a11ygraderc (JSON format)
 *
 * Searches current directory and parent directories (like eslint)
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { resolve, dirname, join } from 'path';
import { z } from 'zod';
import type { OutputFormat } from '../types/index.js';
import { DEFAULT_WEIGHTS } from './categories.js';
import { DEFAULT_RETRIES, DEFAULT_TIMEOUT } from './fetch.js';

/** Config file names to search for (in order of priority) */
export const CONFIG_FILES = ['.a11ygraderc.json', '.a11ygraderc'];

export const VALID_FORMATS = ['markdown', 'json', 'csv'] as const satisfies readonly OutputFormat[];

const weight = z.number().min(0, 'must be between 0 and 1').max(1, 'must be between 0 and 1');

// Unknown category names are rejected rather than ignored
const weightsSchema = z.object({
  images: weight.optional(),
  headings: weight.optional(),
  links: weight.optional(),
  forms: weight.optional(),
  structure: weight.optional(),
  contrast: weight.optional(),
  keyboard: weight.optional(),
}).strict();

const configSchema = z.object({
  check: z.object({
    /** Per-category weights, merged over the defaults */
    weights: weightsSchema.optional(),
    /** Minimum total score for CI (exit with error below it) */
    threshold: z.number().min(0, 'must be between 0 and 100').max(100, 'must be between 0 and 100').optional(),
  }).optional(),
  fetch: z.object({
    /** Request timeout in milliseconds */
    timeout: z.number().min(1000, 'must be at least 1000 (1 second)').optional(),
    /** Retry attempts for transient network errors */
    retries: z.number().int().min(0).optional(),
    userAgent: z.string().optional(),
  }).optional(),
  report: z.object({
    format: z.enum(VALID_FORMATS).optional(),
    /** Output directory */
    output: z.string().optional(),
  }).optional(),
});

export type GradeConfig = z.infer<typeof configSchema>;
export type CheckConfig = NonNullable<GradeConfig['check']>;
export type FetchConfig = NonNullable<GradeConfig['fetch']>;
export type ReportConfig = NonNullable<GradeConfig['report']>;

/** Written by `a11y-grade init` */
export const DEFAULT_CONFIG: GradeConfig = {
  check: {
    weights: { ...DEFAULT_WEIGHTS },
    threshold: 70,
  },
  fetch: {
    timeout: DEFAULT_TIMEOUT,
    retries: DEFAULT_RETRIES,
  },
  report: {
    format: 'markdown',
    output: '.a11y-grade',
  },
};

/** Result from loading config */
export interface ConfigResult {
  config: GradeConfig;
  configPath: string | null;
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return VALID_FORMATS.some(format => format === value);
}

/**
 * Search for config file starting from directory and moving up to root
 */
async function findConfigFile(startDir: string): Promise<string | null> {
  let currentDir = resolve(startDir);

  for (;;) {
    for (const configFile of CONFIG_FILES) {
      const configPath = join(currentDir, configFile);
      if (existsSync(configPath)) {
        return configPath;
      }
    }

    const parent = dirname(currentDir);
    if (parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}

function describeIssue(issue: z.ZodIssue): string {
  const where = issue.path.join('.');
  return where ? `${where}: ${issue.message}` : issue.message;
}

/**
 * Validate config structure and values
 *
 * @throws Error listing every problem, prefixed with the config path
 */
export function validateConfig(raw: unknown, configPath: string): GradeConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map(describeIssue).join('\n  ');
    throw new Error(`Invalid config ${configPath}:\n  ${problems}`);
  }
  return result.data;
}

/**
 * Load and parse a config file
 */
async function parseConfigFile(configPath: string): Promise<unknown> {
  try {
    const content = await readFile(configPath, 'utf-8');
    return JSON.parse(content);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file ${configPath}: ${error.message}`);
    }
    throw new Error(
      `Failed to read config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Load configuration from .a11ygraderc.json or .a11ygraderc
 *
 * Searches current directory and parent directories for config files.
 * Returns an empty config if no file is found.
 *
 * @param startDir - Directory to start searching from (defaults to cwd)
 */
export async function loadConfig(startDir: string = process.cwd()): Promise<ConfigResult> {
  const configPath = await findConfigFile(startDir);

  if (!configPath) {
    return { config: {}, configPath: null };
  }

  const raw = await parseConfigFile(configPath);
  return { config: validateConfig(raw, configPath), configPath };
}
