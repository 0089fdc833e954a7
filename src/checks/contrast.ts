/**
 * Inline-style color contrast heuristic
 *
 * Without rendering there is no foreground/background pair to compare, so
 * this only flags inline colors that sit at either end of the lightness
 * range. Computed styles and stylesheets are not looked at.
 */

import type { CategoryResult } from '../types/index.js';
import type { ParsedDocument } from '../utils/document.js';

export const LIMITED_CHECK_NOTICE = 'Limited contrast check performed (inline styles only)';

const LIGHT_CHANNEL_MIN = 0xe0;
const DARK_CHANNEL_MAX = 0x2f;
const LIGHT_RED_MIN = 230;
const DARK_RED_MAX = 29;

const PENALTY_PER_MATCH = 0.1;
const MAX_PENALTY = 0.5;

// Matches `color` and `*-color` declarations, value up to the next `;`
const COLOR_DECLARATION = /color\s*:\s*([^;]+)/gi;
const HEX_COLOR = /#([0-9a-f]{3,8})\b/i;
const RGB_COLOR = /rgba?\(\s*(\d{1,3})/i;

type Lightness = 'light' | 'dark' | null;

function hexChannels(hex: string): number[] | null {
  if (hex.length === 3 || hex.length === 4) {
    return [0, 1, 2].map(i => parseInt(hex.charAt(i).repeat(2), 16));
  }
  if (hex.length === 6 || hex.length === 8) {
    return [0, 2, 4].map(i => parseInt(hex.slice(i, i + 2), 16));
  }
  return null;
}

export function classifyColor(value: string): Lightness {
  const hex = HEX_COLOR.exec(value);
  if (hex) {
    const channels = hexChannels(hex[1]);
    if (!channels) return null;
    if (channels.every(c => c >= LIGHT_CHANNEL_MIN)) return 'light';
    if (channels.every(c => c <= DARK_CHANNEL_MAX)) return 'dark';
    return null;
  }

  const rgb = RGB_COLOR.exec(value);
  if (rgb) {
    const red = Number(rgb[1]);
    if (red >= LIGHT_RED_MIN) return 'light';
    if (red <= DARK_RED_MAX) return 'dark';
  }
  return null;
}

export function checkColorContrast(document: ParsedDocument): CategoryResult {
  const styled = document.filter(el => (el.getAttribute('style') ?? '').includes('color'));
  const issues: string[] = [];

  for (const element of styled) {
    const style = element.getAttribute('style') ?? '';
    const found = new Set<Lightness>();
    for (const match of style.matchAll(COLOR_DECLARATION)) {
      found.add(classifyColor(match[1]));
    }

    if (found.has('light')) {
      issues.push(`Potential low contrast light text (<${element.tagName}>)`);
    }
    if (found.has('dark')) {
      issues.push(`Potential low contrast dark text (<${element.tagName}>)`);
    }
  }

  const score = 1 - Math.min(MAX_PENALTY, issues.length * PENALTY_PER_MATCH);

  if (issues.length === 0) {
    issues.push(LIMITED_CHECK_NOTICE);
  }

  return { score, issues };
}
