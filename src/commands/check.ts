/**
 * a11y-grade check command - Scores one page or local HTML file
 */

import { resolve } from 'path';
import { mkdir, writeFile } from 'fs/promises';
import type { Ora } from 'ora';
import {
  analyzeDocument,
  createFailedReport,
  resolveWeights,
} from '../utils/scanner.js';
import { createDocumentLoader, type DocumentLoader, type FetchOptions } from '../utils/fetch.js';
import {
  printBanner,
  createSpinner,
  printCategoryScores,
  printIssues,
  printSummary,
  printCiSummary,
  printError,
  printInfo,
  printWarning,
} from '../utils/ui.js';
import { diagnoseFetchError, formatError } from '../utils/errors.js';
import { loadConfig, type GradeConfig } from '../utils/config.js';
import {
  convertToJson,
  renderReport,
  FORMAT_EXTENSIONS,
  TOP_ISSUE_LIMIT,
} from '../utils/converters.js';
import type { OutputFormat, Report } from '../types/index.js';

export const DEFAULT_OUTPUT_DIR = '.a11y-grade';

export interface CheckCommandOptions {
  output?: string;
  format?: OutputFormat;
  json?: boolean;
  verbose?: boolean;
  threshold?: number;
  timeout?: number;
  retries?: number;
  ci?: boolean;
  /** Replaces the network/file loader */
  loadDocument?: DocumentLoader;
}

export interface CheckCommandResult {
  report: Report;
  /** False when the page failed to load or scored below the threshold */
  passed: boolean;
  threshold?: number;
}

async function saveReport(report: Report, outputDir: string, format?: OutputFormat): Promise<string[]> {
  const dir = resolve(outputDir);
  await mkdir(dir, { recursive: true });

  const written = [resolve(dir, 'report.json')];
  await writeFile(written[0], convertToJson(report));

  if (format && format !== 'json') {
    const path = resolve(dir, `report.${FORMAT_EXTENSIONS[format]}`);
    await writeFile(path, renderReport(report, format));
    written.push(path);
  }

  return written;
}

export async function checkCommand(
  target: string,
  options: CheckCommandOptions = {}
): Promise<CheckCommandResult | null> {
  const ci = options.ci ?? false;

  if (!ci) {
    printBanner();
  }

  // Load config file (if exists)
  let config: GradeConfig = {};
  try {
    const { config: loadedConfig, configPath } = await loadConfig();
    config = loadedConfig;
    if (configPath && !ci) {
      printInfo(`Using config from ${configPath}`);
    }
  } catch (error) {
    printError(`Config error: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }

  // CLI options take precedence over the config file
  const outputDir = options.output ?? config.report?.output ?? DEFAULT_OUTPUT_DIR;
  const format = options.format ?? config.report?.format;
  const threshold = options.threshold ?? config.check?.threshold;

  let spinner: Ora | null = null;

  const fetchOptions: FetchOptions = {
    timeout: options.timeout ?? config.fetch?.timeout,
    retries: options.retries ?? config.fetch?.retries,
    userAgent: config.fetch?.userAgent,
    onRetry: (attempt, error, delayMs) => {
      if (ci) return;
      spinner?.stop();
      printWarning(`Retry ${attempt} in ${delayMs}ms after: ${error.message}`);
      spinner?.start();
    },
  };
  const load = options.loadDocument ?? createDocumentLoader(fetchOptions);

  if (!ci) {
    spinner = createSpinner(`Checking ${target}...`);
    spinner.start();
  }

  let report: Report;
  try {
    const document = await load(target);
    report = analyzeDocument(document, target, resolveWeights(config.check?.weights));
    spinner?.succeed(`Checked ${target}`);
  } catch (error) {
    spinner?.fail(`Failed to load ${target}`);
    if (!ci) {
      formatError(diagnoseFetchError(error), `Failed to check: ${target}`);
    }
    report = createFailedReport(target, error);
  }

  if (ci) {
    printCiSummary(report);
  } else {
    printCategoryScores(report);
    printIssues(report, options.verbose ? undefined : TOP_ISSUE_LIMIT);
    printSummary(report);

    const written = await saveReport(report, outputDir, format);
    printInfo(`Report saved to ${written.join(', ')}`);
  }

  if (format) {
    console.log(renderReport(report, format));
  } else if (options.json) {
    console.log(convertToJson(report));
  }

  const belowThreshold = threshold !== undefined && report.totalScore < threshold;
  if (belowThreshold) {
    printError(`Score ${report.totalScore} is below the threshold of ${threshold}`);
  }

  return {
    report,
    passed: report.error === undefined && !belowThreshold,
    threshold,
  };
}
