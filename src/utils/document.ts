/**
 * Read-only document abstraction the checkers query, with an adapter over
 * node-html-parser
 */

import { parse, HTMLElement } from 'node-html-parser';

export interface DocumentElement {
  /** Lower-cased tag name */
  readonly tagName: string;
  getAttribute(name: string): string | undefined;
  hasAttribute(name: string): boolean;
  /** Decoded text of the element and all its descendants */
  textContent(): string;
  /** Enclosing elements, nearest first */
  ancestors(): DocumentElement[];
  /** Descendants with one of the given tag names, in document order */
  findAll(tags: readonly string[]): DocumentElement[];
}

export interface ParsedDocument {
  /** Elements with one of the given tag names, in document order */
  findAll(tags: readonly string[]): DocumentElement[];
  /** First element with the tag name that satisfies the predicate */
  find(tag: string, predicate: (element: DocumentElement) => boolean): DocumentElement | undefined;
  /** Every element, of any tag, that satisfies the predicate */
  filter(predicate: (element: DocumentElement) => boolean): DocumentElement[];
}

function tagOf(node: HTMLElement): string {
  return (node.rawTagName ?? '').toLowerCase();
}

function collect(
  node: HTMLElement,
  matches: (element: DocumentElement) => boolean,
  found: DocumentElement[]
): void {
  for (const child of node.childNodes) {
    if (child instanceof HTMLElement) {
      const element = new HtmlNodeElement(child);
      if (matches(element)) {
        found.push(element);
      }
      collect(child, matches, found);
    }
  }
}

function findAllUnder(node: HTMLElement, tags: readonly string[]): DocumentElement[] {
  const wanted = new Set(tags.map(t => t.toLowerCase()));
  const found: DocumentElement[] = [];
  collect(node, element => wanted.has(element.tagName), found);
  return found;
}

class HtmlNodeElement implements DocumentElement {
  readonly tagName: string;

  constructor(private readonly node: HTMLElement) {
    this.tagName = tagOf(node);
  }

  getAttribute(name: string): string | undefined {
    return this.node.getAttribute(name);
  }

  hasAttribute(name: string): boolean {
    return this.node.hasAttribute(name);
  }

  textContent(): string {
    return this.node.textContent;
  }

  ancestors(): DocumentElement[] {
    const chain: DocumentElement[] = [];
    let current: HTMLElement | null = this.node.parentNode;
    while (current) {
      // The parse root has no tag of its own
      if (tagOf(current) !== '') {
        chain.push(new HtmlNodeElement(current));
      }
      current = current.parentNode;
    }
    return chain;
  }

  findAll(tags: readonly string[]): DocumentElement[] {
    return findAllUnder(this.node, tags);
  }
}

class HtmlDocument implements ParsedDocument {
  constructor(private readonly root: HTMLElement) {}

  findAll(tags: readonly string[]): DocumentElement[] {
    return findAllUnder(this.root, tags);
  }

  find(tag: string, predicate: (element: DocumentElement) => boolean): DocumentElement | undefined {
    return this.findAll([tag]).find(predicate);
  }

  filter(predicate: (element: DocumentElement) => boolean): DocumentElement[] {
    const found: DocumentElement[] = [];
    collect(this.root, predicate, found);
    return found;
  }
}

// Only script and style stay raw text; markup inside pre and noscript is parsed
const PARSE_OPTIONS = {
  blockTextElements: { script: true, style: true },
};

/**
 * Parse an HTML string into a queryable document
 */
export function parseHtml(html: string): ParsedDocument {
  return new HtmlDocument(parse(html, PARSE_OPTIONS));
}
