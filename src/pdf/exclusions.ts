// src/pdf/exclusions.ts
// Structural exclusions: running headers/footers repeated across pages.
// No vocabulary-based filtering.

import type { Line } from './types';
import { repetitionKey } from './utils';

// Horizontal position is compared in 5% slots of the page width.
const X_SLOT = 0.05;

function chromeKey(l: Line, band: number): string | null {
  const yMid = (l.bbox.y0 + l.bbox.y1) / 2 / (l.pageHeight || 1);
  if (!(yMid < band || yMid > 1 - band)) return null;
  const sig = repetitionKey(l.text);
  if (!sig || sig.length < 3) return null;
  const yBand = yMid < band ? 'H' : 'F';
  const xMid = (l.bbox.x0 + l.bbox.x1) / 2 / (l.pageWidth || 1);
  return `${yBand}|${Math.round(xMid / X_SLOT)}|${sig}`;
}

// Returns indexes (into `lines`) of lines that repeat in the top/bottom band on 2+ pages.
export function detectRepeatedPageChrome(lines: Line[], band: number): Set<number> {
  const pagesByKey = new Map<string, Set<number>>();
  const keys: Array<string | null> = lines.map((l) => chromeKey(l, band));

  keys.forEach((k, idx) => {
    if (!k) return;
    const pages = pagesByKey.get(k) ?? new Set<number>();
    pages.add(lines[idx].page);
    pagesByKey.set(k, pages);
  });

  const out = new Set<number>();
  keys.forEach((k, idx) => {
    if (k && (pagesByKey.get(k)?.size ?? 0) >= 2) out.add(idx);
  });
  return out;
}

export function removePageChrome(lines: Line[], band: number): Line[] {
  const chrome = detectRepeatedPageChrome(lines, band);
  if (!chrome.size) return lines;
  return lines.filter((_, idx) => !chrome.has(idx));
}
