/**
 * Terminal UI utilities for polished output
 */

import chalk, { type ChalkInstance } from 'chalk';
import boxen from 'boxen';
import ora, { type Ora } from 'ora';
import type { Rating, Report } from '../types/index.js';
import { getScoreRating } from './rating.js';
import { categoryEntries, categoryTitle } from './categories.js';

// Honor NO_COLOR environment variable (https://no-color.org/)
const noColor = process.env.NO_COLOR !== undefined || process.env.A11Y_GRADE_NO_COLOR !== undefined;
if (noColor) {
  chalk.level = 0;
}

const ratingColors: Record<Rating, ChalkInstance> = {
  Excellent: chalk.green,
  Good: chalk.cyan,
  Fair: chalk.yellow,
  Poor: chalk.hex('#FFA500'),
  'Very Poor': chalk.red,
};

const ratingBorders: Record<Rating, string> = {
  Excellent: 'green',
  Good: 'cyan',
  Fair: 'yellow',
  Poor: 'yellow',
  'Very Poor': 'red',
};

export function printBanner(): void {
  console.log(chalk.cyan.bold('\n  a11y-grade'));
  console.log(chalk.dim('  Heuristic accessibility scoring for web pages\n'));
}

export function createSpinner(text: string): Ora {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
  });
}

function getScoreBar(score: number): string {
  const width = 20;
  const filled = Math.round((score / 100) * width);
  const color = ratingColors[getScoreRating(score)];
  return color('█'.repeat(filled)) + chalk.gray('░'.repeat(width - filled));
}

export function printCategoryScores(report: Report): void {
  const entries = categoryEntries(report);
  if (entries.length === 0) return;

  console.log(chalk.bold('\nCategory scores'));
  for (const [category, result] of entries) {
    const score = Math.trunc(result.score * 100);
    const label = categoryTitle(category).padEnd(10);
    console.log(`  ${label} ${getScoreBar(score)} ${String(score).padStart(3)}/100`);
  }
}

export function printIssues(report: Report, limit?: number): void {
  if (report.issues.length === 0) return;

  const shown = limit === undefined ? report.issues : report.issues.slice(0, limit);
  console.log(chalk.bold('\nIssues'));
  shown.forEach((issue, i) => {
    console.log(chalk.dim(`  ${String(i + 1).padStart(2)}. `) + issue);
  });

  if (shown.length < report.issues.length) {
    console.log(chalk.dim(`  ... and ${report.issues.length - shown.length} more (use --verbose to see all)`));
  }

  for (const failure of report.failedChecks ?? []) {
    printWarning(`${categoryTitle(failure.category)} check did not run: ${failure.message}`);
  }
}

export function printSummary(report: Report): void {
  const rating = getScoreRating(report.totalScore);
  const color = ratingColors[rating];

  const summaryText = `
${chalk.bold('Accessibility Score:')} ${color.bold(`${report.totalScore}/100`)}
${chalk.bold('Rating:')} ${color(rating)}

${chalk.dim(`Total issues: ${report.issues.length}`)}
`;

  console.log(
    boxen(summaryText.trim(), {
      padding: 1,
      margin: 1,
      borderStyle: 'round',
      borderColor: ratingBorders[rating],
      title: report.url,
      titleAlignment: 'center',
    })
  );
}

/**
 * Single-line summary for CI logs
 */
export function printCiSummary(report: Report): void {
  const rating = getScoreRating(report.totalScore);
  const symbol = report.error ? '✗' : '✓';
  console.log(`${symbol} ${report.url}: ${report.totalScore}/100 (${rating}), ${report.issues.length} issue${report.issues.length !== 1 ? 's' : ''}`);
}

export function printSuccess(message: string): void {
  console.log(chalk.green('✓ ') + message);
}

export function printError(message: string): void {
  console.log(chalk.red('✗ ') + message);
}

export function printWarning(message: string): void {
  console.log(chalk.yellow('⚠ ') + message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('ℹ ') + message);
}
