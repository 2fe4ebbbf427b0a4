// src/pdf/utils.ts
// Small, deterministic helpers used throughout the outline pipeline.

import type { PdfBBox } from './types';

// Font sizes are compared at 0.1pt resolution.
export function roundSize(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return Math.round(n * 10) / 10;
}

export function bboxUnion(a: PdfBBox, b: PdfBBox): PdfBBox {
  return {
    x0: Math.min(a.x0, b.x0),
    y0: Math.min(a.y0, b.y0),
    x1: Math.max(a.x1, b.x1),
    y1: Math.max(a.y1, b.y1),
  };
}

// Middle value of an unsorted sample; 0 when empty.
export function median(values: readonly number[]): number {
  if (!values.length) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = sorted.length >> 1;
  return sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function collapseWhitespace(raw: string): string {
  return raw.replace(/\s+/g, ' ').trim();
}

// Page numbers and punctuation vary between repeats of a running header.
export function repetitionKey(raw: string): string {
  return collapseWhitespace(
    raw
      .toLowerCase()
      .replace(/\d+/g, '#')
      .replace(/[^\p{L}\p{N}#\s]+/gu, '')
  );
}

const TRAILING_PAGE_NUMBER = /\s+\d{1,3}$/;
// "Chapter 3" keeps its number.
const LABEL_NUMBER = /\b(?:chapter|section|part|appendix|volume|step|phase)\s+\d{1,3}$/i;

// "Introduction ........ 4" and "Introduction 4" → "Introduction"
export function cleanHeadingText(raw: string): string {
  const text = collapseWhitespace(raw)
    .replace(/\s*(?:\.\s*){3,}\d*$/, '')
    .replace(/\s*…+\s*\d*$/, '')
    .trim();
  return LABEL_NUMBER.test(text) ? text : text.replace(TRAILING_PAGE_NUMBER, '');
}

export function cleanTitleText(raw: string): string {
  return collapseWhitespace(raw)
    .replace(/\.(pdf|docx?)$/i, '')
    .slice(0, 200)
    .trim();
}
