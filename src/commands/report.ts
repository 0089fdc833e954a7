/**
 * a11y-grade report command - Re-renders a saved report
 */

import { readFile, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { resolve } from 'path';
import {
  printBanner,
  createSpinner,
  printError,
  printSuccess,
} from '../utils/ui.js';
import { suggestCheck, suggestRerun } from '../utils/errors.js';
import { parseReport, renderReport } from '../utils/converters.js';
import { DEFAULT_OUTPUT_DIR } from './check.js';
import type { OutputFormat, Report } from '../types/index.js';

export interface ReportOptions {
  input?: string;
  /** Output file; printed to stdout when omitted */
  output?: string;
  format?: OutputFormat;
}

export async function reportCommand(options: ReportOptions = {}): Promise<string | null> {
  const {
    input = `${DEFAULT_OUTPUT_DIR}/report.json`,
    output,
    format = 'markdown',
  } = options;

  // Keep stdout clean when the report itself goes there
  if (output) {
    printBanner();
  }

  const reportPath = resolve(input);

  if (!existsSync(reportPath)) {
    suggestCheck(reportPath);
    return null;
  }

  let report: Report;
  try {
    report = parseReport(await readFile(reportPath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      suggestRerun(reportPath);
    } else {
      printError(error instanceof Error ? error.message : String(error));
    }
    return null;
  }

  const content = renderReport(report, format);

  if (!output) {
    console.log(content);
    return content;
  }

  const spinner = createSpinner(`Writing ${format} report...`);
  spinner.start();
  try {
    await writeFile(resolve(output), content);
    spinner.stop();
    printSuccess(`Report written to ${output}`);
  } catch (error) {
    spinner.fail('Failed to write report');
    printError(error instanceof Error ? error.message : String(error));
    return null;
  }

  return content;
}
