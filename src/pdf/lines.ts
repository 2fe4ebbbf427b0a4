// src/pdf/lines.ts
// Convert page fragments into ordered text lines.
// Reading order is taken from the extractor as-is; only adjacent fragments merge.

import type { Line, PageFragments, TextFragment } from './types';
import { bboxUnion, roundSize } from './utils';

type LineBuilderOpts = {
  // baseline band, as a fraction of the font size
  lineTolerance: number;
};

// Fragments closer than this (fraction of font size) are treated as one glyph run.
const ABUTTING_GAP_RATIO = 0.1;

type LineAcc = {
  fragments: TextFragment[];
  text: string;
  trailingSpace: boolean;
  fontSize: number;
  isBold: boolean;
};

function canMerge(acc: LineAcc, last: TextFragment, frag: TextFragment, opts: LineBuilderOpts): boolean {
  if (roundSize(frag.fontSize) !== acc.fontSize) return false;
  if (frag.isBold !== acc.isBold) return false;
  const tol = Math.max(0.5, acc.fontSize * opts.lineTolerance);
  if (Math.abs(frag.bbox.y1 - last.bbox.y1) > tol) return false;
  // A fragment far to the left of the previous one starts a new row/column.
  return frag.bbox.x0 >= last.bbox.x0 - tol;
}

function joinText(acc: LineAcc, last: TextFragment, frag: TextFragment): string {
  const piece = frag.text.replace(/\s+/g, ' ').trim();
  const gap = frag.bbox.x0 - last.bbox.x1;
  const leadingSpace = /^\s/.test(frag.text);
  const abutting = gap <= acc.fontSize * ABUTTING_GAP_RATIO && !acc.trailingSpace && !leadingSpace;
  return abutting ? acc.text + piece : `${acc.text} ${piece}`;
}

function toLine(acc: LineAcc, page: PageFragments): Line {
  let bb = { ...acc.fragments[0].bbox };
  for (let i = 1; i < acc.fragments.length; i++) bb = bboxUnion(bb, acc.fragments[i].bbox);
  return {
    page: page.page,
    text: acc.text,
    fontSize: acc.fontSize,
    isBold: acc.isBold,
    fontName: acc.fragments[0].fontName,
    bbox: bb,
    y: bb.y0,
    x0: bb.x0,
    pageWidth: page.width,
    pageHeight: page.height,
    fragments: acc.fragments,
  };
}

export function buildPageLines(page: PageFragments, opts: LineBuilderOpts): Line[] {
  const out: Line[] = [];
  let acc: LineAcc | null = null;

  for (const frag of page.fragments) {
    const piece = frag.text.replace(/\s+/g, ' ').trim();
    if (!piece) continue;

    const last: TextFragment | undefined = acc?.fragments[acc.fragments.length - 1];
    if (acc && last && canMerge(acc, last, frag, opts)) {
      acc.text = joinText(acc, last, frag);
      acc.fragments.push(frag);
      acc.trailingSpace = /\s$/.test(frag.text);
      continue;
    }

    if (acc) out.push(toLine(acc, page));
    acc = {
      fragments: [frag],
      text: piece,
      trailingSpace: /\s$/.test(frag.text),
      fontSize: roundSize(frag.fontSize),
      isBold: frag.isBold,
    };
  }
  if (acc) out.push(toLine(acc, page));

  return out;
}

export function buildLines(pages: PageFragments[], opts: LineBuilderOpts): Line[] {
  const ordered = pages.slice().sort((a, b) => a.page - b.page);
  const out: Line[] = [];
  for (const p of ordered) out.push(...buildPageLines(p, opts));
  return out;
}
