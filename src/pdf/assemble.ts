// src/pdf/assemble.ts
// Turn classified headings into an ordered, level-consistent outline tree.

import type { OutlineSettings } from '../types';
import type { HeadingCandidate, HeadingLevel, Outline, OutlineEntry, OutlineLevel, OutlineNode } from './types';
import { endsLikeSentence } from './classify';
import { bboxUnion, cleanHeadingText } from './utils';

const DEPTH: Record<OutlineLevel, number> = { H1: 1, H2: 2, H3: 3 };
const BY_DEPTH: readonly OutlineLevel[] = ['H1', 'H2', 'H3'];
// Large enough that any page height fits below one page step.
const PAGE_STRIDE = 1_000_000;

function isOutlineLevel(level: HeadingLevel): level is OutlineLevel {
  return level !== 'TITLE';
}

export function depthOf(level: OutlineLevel): number {
  return DEPTH[level];
}

export function levelAt(depth: number): OutlineLevel {
  return BY_DEPTH[Math.min(BY_DEPTH.length, Math.max(1, depth)) - 1];
}

// Stable: equal positions keep classification order.
export function orderCandidates(candidates: HeadingCandidate[]): HeadingCandidate[] {
  const key = (c: HeadingCandidate): number => c.line.page * PAGE_STRIDE + c.line.y;
  return [...candidates].sort((a, b) => key(a) - key(b));
}

/**
 * Join headings that wrap over several rows: consecutive lines, same level and
 * style, a gap no larger than `wrapGapRatio` of the font size, and no numbering
 * on the continuation row.
 *
 * A joined block longer than `maxHeadingChars`, or one ending in sentence
 * punctuation, is a paragraph and is dropped.
 */
export function mergeWrappedHeadings(candidates: HeadingCandidate[], settings: OutlineSettings): HeadingCandidate[] {
  const out: HeadingCandidate[] = [];
  const rows: number[] = [];
  let lastIndex = -1;

  for (const c of candidates) {
    const prev = out[out.length - 1];
    const wraps =
      prev !== undefined &&
      c.lineIndex === lastIndex + 1 &&
      !c.numbering &&
      c.level === prev.level &&
      c.line.page === prev.line.page &&
      c.line.fontSize === prev.line.fontSize &&
      c.line.isBold === prev.line.isBold &&
      c.line.bbox.y0 - prev.line.bbox.y1 <= c.line.fontSize * settings.wrapGapRatio;

    if (prev && wraps) {
      const bbox = bboxUnion(prev.line.bbox, c.line.bbox);
      out[out.length - 1] = {
        ...prev,
        score: Math.max(prev.score, c.score),
        line: {
          ...prev.line,
          text: `${prev.line.text} ${c.line.text}`,
          bbox,
          fragments: [...prev.line.fragments, ...c.line.fragments],
        },
      };
      rows[rows.length - 1]++;
    } else {
      out.push(c);
      rows.push(1);
    }
    lastIndex = c.lineIndex;
  }

  return out.filter((c, i) => {
    if (rows[i] === 1) return true;
    const text = cleanHeadingText(c.line.text);
    return text.length <= settings.maxHeadingChars && !endsLikeSentence(text);
  });
}

/**
 * Demote levels so depth never exceeds the previous heading's depth + 1.
 * H1 → H3 becomes H1 → H2; a leading H2/H3 becomes H1.
 */
export function normalizeLevels<T extends { level: OutlineLevel }>(items: T[]): T[] {
  let prevDepth = 0;
  return items.map((item) => {
    const depth = Math.min(depthOf(item.level), prevDepth + 1);
    prevDepth = depth;
    return depth === depthOf(item.level) ? item : { ...item, level: levelAt(depth) };
  });
}

/**
 * Each heading becomes a child of the most recent heading with a strictly
 * lower level, or a root. The stack never holds more than three ancestors.
 */
export function buildOutlineTree(entries: OutlineEntry[]): OutlineNode[] {
  const roots: OutlineNode[] = [];
  const stack: OutlineNode[] = [];

  for (const e of entries) {
    const node: OutlineNode = { level: e.level, text: e.text, page: e.page, children: [] };
    while (stack.length && depthOf(stack[stack.length - 1].level) >= depthOf(node.level)) stack.pop();
    const parent = stack[stack.length - 1];
    (parent ? parent.children : roots).push(node);
    stack.push(node);
  }
  return roots;
}

export function candidatesToEntries(candidates: HeadingCandidate[]): OutlineEntry[] {
  const out: OutlineEntry[] = [];
  for (const c of candidates) {
    if (!isOutlineLevel(c.level)) continue;
    const text = cleanHeadingText(c.line.text);
    if (!text) continue;
    out.push({ level: c.level, text, page: c.line.page });
  }
  return out;
}

export function assembleOutline(title: string, candidates: HeadingCandidate[], settings: OutlineSettings): Outline {
  const merged = mergeWrappedHeadings(orderCandidates(candidates), settings);
  const entries = normalizeLevels(candidatesToEntries(merged));
  return { title, nodes: buildOutlineTree(entries) };
}
