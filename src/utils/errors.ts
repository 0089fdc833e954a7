/**
 * Error handling utilities with contextual hints for better user experience
 */

import chalk from 'chalk';
import boxen from 'boxen';
import { printError, printInfo } from './ui.js';

/**
 * Failure to load the page under test
 */
export class FetchError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FetchError';
  }
}

/**
 * Flatten an error, its name and its cause chain into one searchable string.
 * Node's fetch reports the socket error code only on `cause`.
 */
export function errorDetails(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;
  let depth = 0;

  while (current !== undefined && current !== null && depth < 5) {
    if (current instanceof Error) {
      parts.push(current.name, current.message);
      const code = 'code' in current ? current.code : undefined;
      if (typeof code === 'string') parts.push(code);
      current = current.cause;
    } else {
      parts.push(String(current));
      current = undefined;
    }
    depth++;
  }

  return parts.filter(Boolean).join(' ');
}

export interface Diagnosis {
  message: string;
  suggestion: string;
}

interface FetchDiagnostic extends Diagnosis {
  pattern: RegExp;
}

const FETCH_DIAGNOSTICS: FetchDiagnostic[] = [
  {
    pattern: /TimeoutError|ETIMEDOUT|ESOCKETTIMEDOUT|aborted due to timeout/i,
    message: 'Page took too long to load',
    suggestion: 'Check the URL is reachable, or raise the limit with --timeout',
  },
  {
    pattern: /ECONNREFUSED|Connection refused/i,
    message: 'Could not connect to the URL',
    suggestion: 'Check that the server is running and the URL is correct',
  },
  {
    pattern: /ENOTFOUND|EAI_AGAIN|getaddrinfo/i,
    message: 'Could not resolve hostname',
    suggestion: 'Check the URL is spelled correctly and the domain exists',
  },
  {
    pattern: /CERT_|certificate|SELF_SIGNED|UNABLE_TO_VERIFY|ERR_TLS|SSL/i,
    message: 'SSL certificate verification failed',
    suggestion: 'The site has an invalid certificate. Try http:// if the site allows it',
  },
  {
    pattern: /ECONNRESET|socket hang up/i,
    message: 'The connection was closed by the server',
    suggestion: 'The server may be blocking automated requests. Try again later',
  },
  {
    pattern: /Invalid URL|Unsupported protocol/i,
    message: 'Invalid URL',
    suggestion: 'URLs must start with http:// or https://',
  },
  {
    pattern: /ENOENT/i,
    message: 'File not found',
    suggestion: 'Check the path to the HTML file',
  },
  {
    pattern: /EPERM|EACCES|Permission denied/i,
    message: 'Permission denied',
    suggestion: 'Check file permissions',
  },
];

/**
 * Diagnose a fetch or load failure into a user-facing message
 */
export function diagnoseFetchError(error: unknown): Diagnosis {
  if (error instanceof FetchError && error.status !== undefined) {
    return {
      message: `Server responded with ${error.message}`,
      suggestion: error.status >= 500
        ? 'The server had an error. Try again later'
        : 'Check the URL points at a public page',
    };
  }

  const details = errorDetails(error);
  for (const diagnostic of FETCH_DIAGNOSTICS) {
    if (diagnostic.pattern.test(details)) {
      return { message: diagnostic.message, suggestion: diagnostic.suggestion };
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  return {
    message: `Request failed: ${message}`,
    suggestion: 'Check the URL and your network connection, then try again',
  };
}

/**
 * Format an error with context and suggestions in a nice box
 */
export function formatError(diagnosis: Diagnosis, context?: string): void {
  let content = `${chalk.red(diagnosis.message)}\n\n${chalk.dim('Suggestion:')} ${diagnosis.suggestion}`;

  if (context) {
    content = `${chalk.dim(context)}\n\n${content}`;
  }

  console.log(
    boxen(content, {
      padding: 1,
      margin: { top: 1, bottom: 1, left: 0, right: 0 },
      borderStyle: 'round',
      borderColor: 'red',
      title: 'Error',
      titleAlignment: 'left',
    })
  );
}

/**
 * Suggest running 'a11y-grade check' when saved results are missing
 */
export function suggestCheck(reportPath?: string): void {
  printError('No saved report found');
  printInfo(`Run 'a11y-grade check <url>' first to generate one`);
  if (reportPath) {
    console.log(chalk.dim(`  Expected file: ${reportPath}`));
  }
  console.log();
  console.log(chalk.dim('Quick start:'));
  console.log(chalk.cyan('  a11y-grade check https://example.com  ') + chalk.dim('# Score a live page'));
  console.log(chalk.cyan('  a11y-grade check ./public/index.html  ') + chalk.dim('# Score a local file'));
}

/**
 * Provide helpful message when the saved report is corrupted
 */
export function suggestRerun(reportPath: string): void {
  printError('Saved report appears to be corrupted');
  printInfo(`Delete ${reportPath} and run 'a11y-grade check' again`);
}
