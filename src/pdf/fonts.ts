// src/pdf/fonts.ts
// Document-wide font statistics: body size, heading size tiers and the layout
// baselines the classifier measures lines against.

import type { FontProfile, Line } from './types';
import { median, roundSize } from './utils';

const MAX_TIERS = 3;
// Bold left edges closer than this (pt) count as the same indent.
const INDENT_CLUSTER_PT = 2;

function pickBodySize(weights: Map<number, number>): number {
  let best = 0;
  let bestWeight = -1;
  for (const [size, w] of weights) {
    // Ties go to the smaller size: body text is rarely the larger one.
    if (w > bestWeight || (w === bestWeight && size < best)) {
      best = size;
      bestWeight = w;
    }
  }
  return best;
}

function clusterIndents(xs: number[]): number[] {
  const sorted = xs.filter((x) => Number.isFinite(x)).sort((a, b) => a - b);
  const out: number[] = [];
  for (const x of sorted) {
    if (!out.length || x - out[out.length - 1] > INDENT_CLUSTER_PT) out.push(x);
  }
  return out;
}

function bodyGaps(lines: Line[], bodySize: number): number[] {
  const gaps: number[] = [];
  for (let i = 1; i < lines.length; i++) {
    const prev = lines[i - 1];
    const cur = lines[i];
    if (prev.page !== cur.page) continue;
    if (prev.fontSize !== bodySize || cur.fontSize !== bodySize) continue;
    const gap = cur.bbox.y0 - prev.bbox.y1;
    if (gap > 0) gaps.push(gap);
  }
  return gaps;
}

/**
 * Tally font sizes across the whole document, weighted by character count so
 * long body paragraphs dominate short headings.
 *
 * Returns null when there are no lines: a body size is undefined then.
 */
export function buildFontProfile(lines: Line[]): FontProfile | null {
  if (!lines.length) return null;

  const weights = new Map<number, number>();
  let totalChars = 0;
  let boldChars = 0;

  for (const l of lines) {
    const size = roundSize(l.fontSize);
    const chars = l.text.length;
    weights.set(size, (weights.get(size) ?? 0) + chars);
    totalChars += chars;
    if (l.isBold) boldChars += chars;
  }

  const bodySize = pickBodySize(weights);
  const largerSizes = [...weights.keys()].filter((s) => s > bodySize).sort((a, b) => b - a);
  const bodyLines = lines.filter((l) => roundSize(l.fontSize) === bodySize);

  return Object.freeze({
    sizeWeights: weights,
    bodySize,
    largerSizes: Object.freeze(largerSizes),
    tiers: Object.freeze(largerSizes.slice(0, MAX_TIERS)),
    maxSize: Math.max(...weights.keys()),
    boldShare: totalChars ? boldChars / totalChars : 0,
    bodyLineGap: median(bodyGaps(lines, bodySize)),
    bodyLineLength: median(bodyLines.map((l) => l.text.length)),
    boldIndents: Object.freeze(clusterIndents(lines.filter((l) => l.isBold).map((l) => l.x0))),
    degenerate: weights.size < 2 || largerSizes.length === 0,
  });
}

// Tier index (0 → H1) for a size, or -1 when it is not a heading tier.
export function tierOf(profile: FontProfile, fontSize: number): number {
  return profile.tiers.indexOf(roundSize(fontSize));
}
