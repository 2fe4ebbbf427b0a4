import type { DocumentInput, Line, PageFragments, TextFragment } from '../src/pdf/types';

export const PAGE_WIDTH = 612;
export const PAGE_HEIGHT = 792;

export type FragOpts = {
  page?: number;
  size?: number;
  bold?: boolean;
  x?: number;
  // baseline, measured from the top of the page
  baseline: number;
  width?: number;
};

export const BODY = [
  'Revenue grew steadily across every region during the year',
  'Operating costs were held flat while headcount increased',
  'The board approved a new investment plan for the next cycle',
  'Further details are provided in the sections that follow',
];

// Glyphs are half an em wide unless a width is given.
export function frag(text: string, opts: FragOpts): TextFragment {
  const size = opts.size ?? 11;
  const x = opts.x ?? 72;
  const width = opts.width ?? text.length * size * 0.5;
  return {
    text,
    page: opts.page ?? 1,
    fontSize: size,
    isBold: opts.bold ?? false,
    fontName: opts.bold ? 'Helvetica-Bold' : 'Helvetica',
    bbox: { x0: x, y0: opts.baseline - size, x1: x + width, y1: opts.baseline },
  };
}

export function line(text: string, opts: FragOpts): Line {
  const f = frag(text, opts);
  return {
    page: f.page,
    text,
    fontSize: f.fontSize,
    isBold: f.isBold,
    fontName: f.fontName,
    bbox: { ...f.bbox },
    y: f.bbox.y0,
    x0: f.bbox.x0,
    pageWidth: PAGE_WIDTH,
    pageHeight: PAGE_HEIGHT,
    fragments: [f],
  };
}

export function page(num: number, fragments: TextFragment[]): PageFragments {
  return { page: num, width: PAGE_WIDTH, height: PAGE_HEIGHT, fragments };
}

// Body paragraph rows on a 14pt grid starting at `baseline`.
export function body(pageNum: number, baseline: number, count: number): TextFragment[] {
  return Array.from({ length: count }, (_, i) =>
    frag(BODY[i % BODY.length], { page: pageNum, baseline: baseline + i * 14 })
  );
}

export function documentInput(pages: PageFragments[], extra: Partial<DocumentInput> = {}): DocumentInput {
  return {
    pageCount: pages.length,
    pages,
    nativeOutline: [],
    metadataTitle: '',
    ...extra,
  };
}

/**
 * Three pages: a 24pt bold centred title over 11pt body text, then an 18pt
 * and a 14pt bold heading on page 2, and body text only on page 3.
 */
export function companyReport(header?: string): DocumentInput {
  const running = (p: number): TextFragment[] =>
    header ? [frag(header, { page: p, size: 16, bold: true, baseline: 40 })] : [];

  return documentInput([
    page(1, [
      ...running(1),
      frag('Company Report', { size: 24, bold: true, x: 222, baseline: 100 }),
      ...body(1, 140, 4),
    ]),
    page(2, [
      ...running(2),
      frag('Financials', { page: 2, size: 18, bold: true, baseline: 100 }),
      ...body(2, 130, 2),
      frag('Q1 Results', { page: 2, size: 14, bold: true, baseline: 180 }),
      ...body(2, 204, 2),
    ]),
    page(3, [...running(3), ...body(3, 100, 3)]),
  ]);
}

export function numberedReport(): DocumentInput {
  return documentInput([
    page(1, [
      frag('1. Intro', { size: 16, baseline: 100 }),
      ...body(1, 130, 2),
      frag('1.1 Background', { size: 14, baseline: 180 }),
      ...body(1, 204, 2),
    ]),
    page(2, [frag('2. Methods', { page: 2, size: 16, baseline: 100 }), ...body(2, 130, 2)]),
  ]);
}
