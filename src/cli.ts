#!/usr/bin/env node

/**
 * a11y-grade - Heuristic accessibility scoring for web pages
 */

import { Command } from 'commander';
import { createRequire } from 'module';

// Read version from package.json to stay in sync
const require = createRequire(import.meta.url);
const { version } = require('../package.json');
import { checkCommand } from './commands/check.js';
import { reportCommand } from './commands/report.js';
import { initCommand } from './commands/init.js';
import { VALID_FORMATS, isOutputFormat } from './utils/config.js';
import type { OutputFormat } from './types/index.js';

function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new Error(`Invalid format: ${value}. Valid options: ${VALID_FORMATS.join(', ')}`);
  }
  return value;
}

const program = new Command();

program
  .name('a11y-grade')
  .description('Score a web page against heuristic accessibility rules.')
  .version(version);

// a11y-grade check <target>
program
  .command('check <target>')
  .description('Check a URL or local HTML file and print its accessibility score')
  .option('-o, --output <dir>', 'Output directory for saved reports')
  .option('-f, --format <type>', 'Also print the report as markdown, json or csv', parseFormat)
  .option('-j, --json', 'Print the raw JSON report')
  .option('-v, --verbose', 'List every issue instead of the top 10')
  .option('-t, --threshold <score>', 'Exit with error if the score is below this (for CI)')
  .option('-T, --timeout <ms>', 'Page load timeout in milliseconds (default: 30000)')
  .option('-r, --retries <n>', 'Retries for transient network errors (default: 2)')
  .option('--ci', 'CI mode: minimal output, exit code based on score')
  .action(async (target: string, options) => {
    try {
      let timeout: number | undefined;
      if (options.timeout !== undefined) {
        timeout = parseInt(options.timeout, 10);
        if (isNaN(timeout) || timeout < 1000) {
          console.error('Error: --timeout must be at least 1000 (1 second)');
          process.exit(1);
        }
      }

      let threshold: number | undefined;
      if (options.threshold !== undefined) {
        threshold = parseInt(options.threshold, 10);
        if (isNaN(threshold) || threshold < 0 || threshold > 100) {
          console.error('Error: --threshold must be a number from 0 to 100');
          process.exit(1);
        }
      }

      let retries: number | undefined;
      if (options.retries !== undefined) {
        retries = parseInt(options.retries, 10);
        if (isNaN(retries) || retries < 0) {
          console.error('Error: --retries must be a non-negative number');
          process.exit(1);
        }
      }

      const result = await checkCommand(target, {
        output: options.output,
        format: options.format,
        json: options.json,
        verbose: options.verbose,
        ci: options.ci,
        timeout,
        threshold,
        retries,
      });

      if (!result) {
        process.exit(1);
      }

      if (!result.passed) {
        if (options.ci && result.threshold !== undefined) {
          console.error(`\nCI FAILED: score ${result.report.totalScore} is below threshold of ${result.threshold}`);
        }
        process.exit(1);
      }
    } catch (error) {
      console.error('Check failed:', error);
      process.exit(1);
    }
  });

// a11y-grade report
program
  .command('report')
  .description('Re-render the last saved report')
  .option('-i, --input <file>', 'Path to saved report', '.a11y-grade/report.json')
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .option('-f, --format <type>', 'Report format (markdown, json, csv)', parseFormat, 'markdown')
  .action(async (options) => {
    try {
      const content = await reportCommand(options);
      if (content === null) {
        process.exit(1);
      }
    } catch (error) {
      console.error('Report generation failed:', error);
      process.exit(1);
    }
  });

// a11y-grade init
program
  .command('init')
  .description('Create a .a11ygraderc.json config in the current directory')
  .option('-f, --force', 'Overwrite existing configuration')
  .action(async (options) => {
    try {
      await initCommand(options);
    } catch (error) {
      console.error('Initialization failed:', error);
      process.exit(1);
    }
  });

// Parse and run
await program.parseAsync();
