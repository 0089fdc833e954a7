/**
 * Fetch-and-parse collaborator: turns a URL or a local HTML file into a
 * ParsedDocument
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { FetchError } from './errors.js';
import { withRetry, type RetryOptions } from './retry.js';
import { parseHtml, type ParsedDocument } from './document.js';

/** Default page load timeout in milliseconds */
export const DEFAULT_TIMEOUT = 30000;

/** Default retry attempts for transient network errors */
export const DEFAULT_RETRIES = 2;

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export interface FetchOptions {
  timeout?: number;
  retries?: number;
  userAgent?: string;
  /** Base backoff delay, mostly useful to speed up tests */
  retryDelayMs?: number;
  onRetry?: RetryOptions['onRetry'];
}

/** Resolves a check target to a document; injected in tests */
export type DocumentLoader = (target: string) => Promise<ParsedDocument>;

export function isHttpUrl(target: string): boolean {
  return /^https?:\/\//i.test(target);
}

function parseUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new FetchError(`Invalid URL: ${url}`, url, undefined, { cause: error });
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new FetchError(`Unsupported protocol "${parsed.protocol}" in ${url}`, url);
  }
  return parsed;
}

/**
 * Download a page's HTML, retrying transient failures
 */
export async function fetchHtml(url: string, options: FetchOptions = {}): Promise<string> {
  const {
    timeout = DEFAULT_TIMEOUT,
    retries = DEFAULT_RETRIES,
    userAgent = DEFAULT_USER_AGENT,
    retryDelayMs,
    onRetry,
  } = options;
  const target = parseUrl(url);

  return withRetry(async () => {
    const response = await fetch(target, {
      headers: {
        'User-Agent': userAgent,
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      },
      redirect: 'follow',
      signal: AbortSignal.timeout(timeout),
    });

    if (!response.ok) {
      throw new FetchError(`HTTP ${response.status} ${response.statusText}`.trim(), url, response.status);
    }

    return response.text();
  }, { maxRetries: retries, baseDelayMs: retryDelayMs, onRetry });
}

export async function fetchDocument(url: string, options: FetchOptions = {}): Promise<ParsedDocument> {
  return parseHtml(await fetchHtml(url, options));
}

export async function readDocumentFile(filePath: string): Promise<ParsedDocument> {
  const html = await readFile(resolve(filePath), 'utf-8');
  return parseHtml(html);
}

/**
 * Loader that fetches http(s) targets and reads anything else from disk
 */
export function createDocumentLoader(options: FetchOptions = {}): DocumentLoader {
  return (target: string) => isHttpUrl(target)
    ? fetchDocument(target, options)
    : readDocumentFile(target);
}
