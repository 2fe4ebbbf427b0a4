// src/pdf/classify.ts
// Decide, line by line, whether a line is a heading and at which level.
// Pure functions of (line, profile, neighbours, settings); no accumulated state.

import type { OutlineSettings } from '../types';
import type { FontProfile, HeadingCandidate, HeadingLevel, Line } from './types';
import { tierOf } from './fonts';
import { cleanHeadingText, cleanTitleText, roundSize } from './utils';

export type Neighbors = {
  prev?: Line;
  next?: Line;
};

export type LineClassification = {
  level: HeadingLevel;
  score: number;
  numbering?: string;
};

export type Numbering = {
  label: string;
  depth: number;
};

export type TitleMatch = {
  lineIndexes: number[];
  text: string;
};

const SIGNAL_WEIGHTS = {
  sizeTier: 3,
  bold: 1,
  larger: 1,
  isolated: 1,
  short: 1,
  numbering: 2,
  terminalPunctuation: -2,
} as const;

// Bold only carries signal while it is the exception in a document.
const MAX_BOLD_SHARE = 0.5;

const DECIMAL_NUMBERING = /^(\d{1,3}(?:\.\d{1,3}){0,4})[.)]?\s+(?=\p{L})/u;
const NAMED_NUMBERING = /^(chapter|section|part|appendix)\s+(\d{1,3}(?:\.\d{1,3}){0,4}|[ivxlcdm]+|[a-z])\b/iu;
const TERMINAL_PUNCTUATION = /[.!?;,]$/;

export function endsLikeSentence(text: string): boolean {
  return TERMINAL_PUNCTUATION.test(text);
}

const LEVELS: readonly HeadingLevel[] = ['H1', 'H2', 'H3'];

function levelForDepth(depth: number): HeadingLevel {
  return LEVELS[Math.min(LEVELS.length, Math.max(1, depth)) - 1];
}

/**
 * Recognises "1.", "1.1", "2.3.1", "Chapter 3", "Section 2.1", "Part IV" and
 * "Appendix A". Depth is the count of numeric segments; named chapter-like
 * prefixes without a dotted number are depth 1.
 */
export function parseNumbering(text: string): Numbering | null {
  const decimal = DECIMAL_NUMBERING.exec(text);
  if (decimal) {
    return { label: decimal[1], depth: decimal[1].split('.').length };
  }
  const named = NAMED_NUMBERING.exec(text);
  if (named) {
    const num = named[2];
    const depth = /^\d/.test(num) ? num.split('.').length : 1;
    return { label: `${named[1]} ${num}`, depth };
  }
  return null;
}

function styleDiffers(line: Line, other: Line): boolean {
  return other.fontSize !== line.fontSize || other.isBold !== line.isBold;
}

/**
 * Visual isolation: a clear gap above or below (relative to the usual body
 * line gap), a style break on both sides, or being the first line of a page
 * near its top edge.
 */
export function isIsolated(line: Line, neighbors: Neighbors, profile: FontProfile, settings: OutlineSettings): boolean {
  const unit = profile.bodyLineGap > 0 ? profile.bodyLineGap : line.fontSize * 0.5;
  const minGap = unit * settings.isolationGapRatio;
  const prev = neighbors.prev && neighbors.prev.page === line.page ? neighbors.prev : undefined;
  const next = neighbors.next && neighbors.next.page === line.page ? neighbors.next : undefined;

  const above = prev
    ? line.bbox.y0 - prev.bbox.y1 >= minGap
    : line.bbox.y0 <= line.pageHeight * settings.topOfPageBand;
  const below = next ? next.bbox.y0 - line.bbox.y1 >= minGap : false;
  const styleBreak = !!prev && !!next && styleDiffers(line, prev) && styleDiffers(line, next);

  return above || below || styleBreak;
}

function isShort(text: string, profile: FontProfile, settings: OutlineSettings): boolean {
  const ceiling = Math.max(settings.shortLineMinChars, profile.bodyLineLength * settings.shortLineRatio);
  return text.length <= ceiling;
}

function degenerateLevel(line: Line, profile: FontProfile): HeadingLevel {
  if (!profile.boldIndents.length) return 'H1';
  let best = 0;
  let bestD = Number.POSITIVE_INFINITY;
  profile.boldIndents.forEach((x, i) => {
    const d = Math.abs(x - line.x0);
    if (d < bestD) {
      bestD = d;
      best = i;
    }
  });
  return levelForDepth(best + 1);
}

/**
 * Classify one line. Returns null for body text.
 *
 * The score is internal: it decides acceptance against `acceptScore` and is
 * kept on the result, but nothing downstream filters on it.
 */
export function classifyLine(
  line: Line,
  profile: FontProfile,
  neighbors: Neighbors,
  settings: OutlineSettings
): LineClassification | null {
  const text = cleanHeadingText(line.text);
  if (text.length < settings.minHeadingChars || text.length > settings.maxHeadingChars) return null;
  if (!/\p{L}/u.test(text)) return null;

  const numbering = parseNumbering(text);
  const tier = tierOf(profile, line.fontSize);
  const bold = line.isBold && profile.boldShare < MAX_BOLD_SHARE;
  const larger = profile.bodySize > 0 && line.fontSize >= profile.bodySize * settings.boldSizeRatio;

  const prominent =
    tier >= 0 ||
    (bold && larger) ||
    (bold && numbering !== null) ||
    (profile.degenerate && bold);
  if (!prominent) return null;

  const short = isShort(text, profile, settings);
  const sentence = endsLikeSentence(text);
  // A plain row at a heading size is a heading only while it reads like one.
  if (tier >= 0 && !bold && !numbering && (!short || sentence)) return null;

  let score = 0;
  if (tier >= 0) score += SIGNAL_WEIGHTS.sizeTier;
  if (bold) score += SIGNAL_WEIGHTS.bold;
  if (larger) score += SIGNAL_WEIGHTS.larger;
  if (isIsolated(line, neighbors, profile, settings)) score += SIGNAL_WEIGHTS.isolated;
  if (short) score += SIGNAL_WEIGHTS.short;
  if (numbering) score += SIGNAL_WEIGHTS.numbering;
  if (sentence) score += SIGNAL_WEIGHTS.terminalPunctuation;

  if (score < settings.acceptScore) return null;

  let level: HeadingLevel;
  if (numbering) level = levelForDepth(numbering.depth);
  else if (profile.degenerate) level = degenerateLevel(line, profile);
  else if (tier >= 0) level = levelForDepth(tier + 1);
  else level = 'H3';

  return numbering ? { level, score, numbering: numbering.label } : { level, score };
}

function neighborsAt(lines: Line[], i: number): Neighbors {
  return { prev: lines[i - 1], next: lines[i + 1] };
}

// Title candidates are looked for among this many lines at the start of page 1.
const TITLE_WINDOW = 10;

// Higher for lines nearer the top of the page and nearer its horizontal centre.
function titlePlacement(line: Line): number {
  const half = line.pageWidth / 2;
  const centre = (line.bbox.x0 + line.bbox.x1) / 2;
  const top = line.pageHeight > 0 ? 1 - line.bbox.y0 / line.pageHeight : 0;
  const centred = half > 0 ? 1 - Math.min(1, Math.abs(centre - half) / half) : 0;
  return top + centred;
}

function joinsTitle(lines: Line[], upper: number, lower: number, settings: OutlineSettings): boolean {
  const a = lines[upper];
  const b = lines[lower];
  return (
    a.page === b.page &&
    !styleDiffers(a, b) &&
    b.bbox.y0 - a.bbox.y1 <= a.fontSize * settings.wrapGapRatio
  );
}

/**
 * The title is a line among the first lines of page 1, set in the document's
 * largest size and carrying no numbering. Several such lines are ranked by
 * nearness to the top and to the horizontal centre. Adjacent rows of the same
 * style (a wrapped title) join it.
 */
export function detectTitle(lines: Line[], profile: FontProfile, settings: OutlineSettings): TitleMatch | null {
  if (profile.degenerate) return null;

  let best = -1;
  let bestPlacement = Number.NEGATIVE_INFINITY;
  for (let i = 0; i < Math.min(lines.length, TITLE_WINDOW); i++) {
    const line = lines[i];
    if (line.page !== 1) break;
    if (roundSize(line.fontSize) !== profile.maxSize) continue;

    const text = cleanHeadingText(line.text);
    if (text.length < settings.minHeadingChars || text.length > settings.maxHeadingChars) continue;
    if (!/\p{L}/u.test(text) || parseNumbering(text)) continue;

    const placement = titlePlacement(line);
    if (placement > bestPlacement) {
      best = i;
      bestPlacement = placement;
    }
  }
  if (best < 0) return null;

  let first = best;
  let last = best;
  while (last - first + 1 < settings.maxTitleLines) {
    if (first > 0 && joinsTitle(lines, first - 1, first, settings)) first--;
    else if (last + 1 < lines.length && joinsTitle(lines, last, last + 1, settings)) last++;
    else break;
  }

  const lineIndexes = Array.from({ length: last - first + 1 }, (_, k) => first + k);
  const text = cleanTitleText(lineIndexes.map((k) => lines[k].text).join(' '));
  return text ? { lineIndexes, text } : null;
}

export function classifyLines(
  lines: Line[],
  profile: FontProfile,
  settings: OutlineSettings,
  skip: ReadonlySet<number> = new Set()
): HeadingCandidate[] {
  const out: HeadingCandidate[] = [];
  lines.forEach((line, lineIndex) => {
    if (skip.has(lineIndex)) return;
    const c = classifyLine(line, profile, neighborsAt(lines, lineIndex), settings);
    if (!c) return;
    out.push({ line, lineIndex, ...c });
  });
  return out;
}
