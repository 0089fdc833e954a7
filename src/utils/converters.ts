/**
 * Format converters for accessibility reports
 * Converts a Report to markdown, CSV or JSON
 */

import { z } from 'zod';
import type { OutputFormat, Report } from '../types/index.js';
import { categoryEntries, categoryTitle } from './categories.js';
import { getScoreRating } from './rating.js';

/** Issues listed in the markdown summary before the "more" tail */
export const TOP_ISSUE_LIMIT = 10;

/**
 * Render the markdown summary: overall score, category scores, top issues
 */
export function formatResults(report: Report): string {
  const score = report.totalScore;
  const rating = getScoreRating(score);

  let output = `## Accessibility Report for ${report.url}\n\n`;
  output += `### Overall Score: ${score}/100 - ${rating}\n\n`;

  if (report.error) {
    output += `> ${report.error}\n\n`;
  }

  output += '### Category Scores:\n\n';
  for (const [category, result] of categoryEntries(report)) {
    output += `- **${categoryTitle(category)}**: ${Math.trunc(result.score * 100)}/100\n`;
  }

  output += '\n### Top Issues:\n\n';
  report.issues.slice(0, TOP_ISSUE_LIMIT).forEach((issue, i) => {
    output += `${i + 1}. ${issue}\n`;
  });

  if (report.issues.length > TOP_ISSUE_LIMIT) {
    output += `\n...and ${report.issues.length - TOP_ISSUE_LIMIT} more issues.\n`;
  }

  return output;
}

/**
 * Escape a value for CSV output
 */
function escapeCsv(value: string): string {
  // If value contains comma, quote, or newline, wrap in quotes and escape internal quotes
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return '"' + value.replace(/"/g, '""') + '"';
  }
  return value;
}

/**
 * Convert a Report to CSV format
 * Headers: Category,Issue
 */
export function convertToCsv(report: Report): string {
  const rows: string[] = ['Category,Issue'];

  for (const [category, result] of categoryEntries(report)) {
    for (const issue of result.issues) {
      rows.push(`${escapeCsv(categoryTitle(category))},${escapeCsv(issue)}`);
    }
  }

  return rows.join('\n');
}

export function convertToJson(report: Report): string {
  return JSON.stringify(report, null, 2);
}

export function renderReport(report: Report, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return convertToJson(report);
    case 'csv':
      return convertToCsv(report);
    case 'markdown':
    default:
      return formatResults(report);
  }
}

export const FORMAT_EXTENSIONS: Record<OutputFormat, string> = {
  markdown: 'md',
  json: 'json',
  csv: 'csv',
};

const categoryResultSchema = z.object({
  score: z.number().min(0).max(1),
  issues: z.array(z.string()),
});

const reportSchema = z.object({
  url: z.string(),
  categories: z.object({
    images: categoryResultSchema.optional(),
    headings: categoryResultSchema.optional(),
    links: categoryResultSchema.optional(),
    forms: categoryResultSchema.optional(),
    structure: categoryResultSchema.optional(),
    contrast: categoryResultSchema.optional(),
    keyboard: categoryResultSchema.optional(),
  }),
  totalScore: z.number().int().min(0).max(100),
  issues: z.array(z.string()),
  error: z.string().optional(),
  failedChecks: z.array(z.object({
    category: z.enum(['images', 'headings', 'links', 'forms', 'structure', 'contrast']),
    message: z.string(),
  })).optional(),
});

/**
 * Read a report back from its JSON export
 *
 * @throws SyntaxError when the text is not JSON or not a report
 */
export function parseReport(json: string): Report {
  const result = reportSchema.safeParse(JSON.parse(json));
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new SyntaxError(`Not an a11y-grade report: ${issue.path.join('.')} ${issue.message}`);
  }
  return result.data;
}
