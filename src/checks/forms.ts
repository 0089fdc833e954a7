/**
 * Form control labelling check
 *
 * A control counts as labelled when a `<label for>` points at its id, when it
 * sits inside a `<label>`, or when it carries a non-blank aria-label.
 */

import type { CategoryResult } from '../types/index.js';
import type { DocumentElement, ParsedDocument } from '../utils/document.js';
import { clampScore } from './shared.js';

const FORM_CONTROL_TAGS = ['input', 'select', 'textarea'] as const;
const EXCLUDED_INPUT_TYPES: ReadonlySet<string> = new Set(['hidden', 'submit', 'button', 'image']);

function isExcluded(control: DocumentElement): boolean {
  if (control.tagName !== 'input') return false;
  const type = (control.getAttribute('type') ?? '').trim().toLowerCase();
  return EXCLUDED_INPUT_TYPES.has(type);
}

function controlType(control: DocumentElement): string {
  if (control.tagName === 'input') {
    return control.getAttribute('type') ?? 'text';
  }
  return control.tagName;
}

function hasLabel(document: ParsedDocument, control: DocumentElement): boolean {
  const id = control.getAttribute('id');
  if (id && document.find('label', label => label.getAttribute('for') === id)) {
    return true;
  }

  if (control.ancestors().some(ancestor => ancestor.tagName === 'label')) {
    return true;
  }

  const ariaLabel = control.getAttribute('aria-label');
  return ariaLabel !== undefined && ariaLabel.trim() !== '';
}

export function checkFormLabels(document: ParsedDocument): CategoryResult {
  const controls = document.findAll(FORM_CONTROL_TAGS).filter(c => !isExcluded(c));
  if (controls.length === 0) {
    return { score: 1, issues: [] };
  }

  let unlabeled = 0;
  const issues: string[] = [];

  for (const control of controls) {
    if (!hasLabel(document, control)) {
      unlabeled++;
      const name = control.getAttribute('name') ?? 'unnamed';
      issues.push(`Form control missing label: ${name} ${controlType(control)}`);
    }
  }

  return { score: clampScore(1 - unlabeled / controls.length), issues };
}
