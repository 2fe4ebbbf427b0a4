// src/pdf/types.ts
// Data model for the PDF → heading outline pipeline.
// Layout-first: everything downstream of extract.ts works on plain values and
// never touches PDF.js objects.

export type PdfBBox = {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
};

export type TextFragment = {
  readonly text: string;
  // 1-based
  readonly page: number;
  // points, rounded to 0.1
  readonly fontSize: number;
  readonly isBold: boolean;
  readonly fontName: string;
  // page coordinates, origin top-left (y1 is the baseline)
  readonly bbox: Readonly<PdfBBox>;
};

export type PageFragments = {
  page: number;
  width: number;
  height: number;
  fragments: TextFragment[];
};

export type NativeOutlineEntry = {
  // 1 = top level
  depth: number;
  title: string;
  page: number;
};

// Everything the PDF collaborator hands to the heuristic core.
export type DocumentInput = {
  pageCount: number;
  pages: PageFragments[];
  nativeOutline: NativeOutlineEntry[];
  metadataTitle: string;
};

export type Line = {
  page: number;
  text: string;
  fontSize: number;
  isBold: boolean;
  fontName: string;
  bbox: PdfBBox;
  // top of the row
  y: number;
  // indent
  x0: number;
  pageWidth: number;
  pageHeight: number;
  fragments: TextFragment[];
};

export type FontProfile = {
  // font size → character-weighted occurrence count
  readonly sizeWeights: ReadonlyMap<number, number>;
  readonly bodySize: number;
  // distinct sizes strictly larger than bodySize, descending
  readonly largerSizes: readonly number[];
  // top three larger sizes: index 0 → H1, 1 → H2, 2 → H3
  readonly tiers: readonly number[];
  readonly maxSize: number;
  // share of characters set in bold, 0..1
  readonly boldShare: number;
  // median vertical gap between consecutive body lines on a page (0 if unknown)
  readonly bodyLineGap: number;
  // median character length of body lines
  readonly bodyLineLength: number;
  // distinct left edges of bold lines, ascending (used when degenerate)
  readonly boldIndents: readonly number[];
  // fewer than two sizes, or nothing larger than body: size tiers are useless
  readonly degenerate: boolean;
};

export type HeadingLevel = 'TITLE' | 'H1' | 'H2' | 'H3';
export type OutlineLevel = Exclude<HeadingLevel, 'TITLE'>;

export type HeadingCandidate = {
  line: Line;
  // position of the line in the classified sequence
  lineIndex: number;
  level: HeadingLevel;
  score: number;
  // e.g. "1.2" or "Chapter 3"; absent when the text carries no numbering
  numbering?: string;
};

export type OutlineNode = {
  level: OutlineLevel;
  text: string;
  page: number;
  children: OutlineNode[];
};

export type Outline = {
  title: string;
  nodes: OutlineNode[];
};

export type OutlineEntry = {
  level: OutlineLevel;
  text: string;
  page: number;
};

// External JSON contract.
export type OutlineDocument = {
  title: string;
  outline: OutlineEntry[];
};

export type OutlineSource = 'native' | 'layout';

export type OutlineResult = {
  outline: Outline;
  source: OutlineSource;
};

// ---- Minimal PDF.js-like surface types (avoid importing PDF.js types)
// Small enough that both PDFDocumentProxy and hand-built fakes satisfy them.

export type PdfRefLike = {
  num: number;
  gen: number;
};

export type PdfTextStyleLike = {
  fontFamily?: string;
};

export type PdfTextContentLike = {
  items: unknown[];
  styles?: Record<string, PdfTextStyleLike>;
};

export type PdfObjectsLike = {
  has(objId: string): boolean;
  get(objId: string): unknown;
};

export type PdfPageLike = {
  getViewport(opts: { scale: number }): { width: number; height: number };
  getTextContent(): Promise<PdfTextContentLike>;
  getOperatorList?(): Promise<unknown>;
  commonObjs?: PdfObjectsLike;
};

export type PdfOutlineItemLike = {
  title: string;
  dest: string | unknown[] | null;
  items: PdfOutlineItemLike[];
};

export type PdfDocLike = {
  numPages: number;
  getPage(pageNum: number): Promise<PdfPageLike>;
  getOutline(): Promise<PdfOutlineItemLike[] | null>;
  getDestination(id: string): Promise<unknown[] | null>;
  getPageIndex(ref: PdfRefLike): Promise<number>;
  getMetadata(): Promise<{ info: unknown }>;
};
