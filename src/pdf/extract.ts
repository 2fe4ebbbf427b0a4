// src/pdf/extract.ts
// PDF.js extraction + deterministic conversion into page-indexed text fragments.
//
// This is the only module that talks to PDF.js. Everything it returns is plain
// data (DocumentInput) so the heuristic core stays synchronous and testable.

import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PDFDocumentProxy } from 'pdfjs-dist/types/src/display/api';

import { PageLimitExceededError, PdfLoadError } from '../errors';
import { logger } from '../services/logger';
import type {
  DocumentInput,
  NativeOutlineEntry,
  PageFragments,
  PdfDocLike,
  PdfOutlineItemLike,
  PdfPageLike,
  PdfRefLike,
  PdfTextContentLike,
  TextFragment,
} from './types';
import { cleanHeadingText, cleanTitleText, roundSize } from './utils';

export type ReadOptions = {
  maxPages: number;
  resolveFontNames: boolean;
};

type PdfTextItem = {
  str: string;
  transform: unknown[];
  width?: unknown;
  height?: unknown;
  fontName?: unknown;
};

type ResolvedFont = {
  name: string;
  isBold: boolean;
};

// Structural watermark/rotation cutoff (10°).
const MAX_ROTATION_RAD = Math.PI / 18;
const BOLD_NAME = /bold|black|heavy|semibold|demi/i;
// VerbosityLevel.ERRORS
const PDFJS_VERBOSITY = 0;

function asNum(n: unknown, fallback = 0): number {
  const v = Number(n);
  return Number.isFinite(v) ? v : fallback;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

function isTextItem(raw: unknown): raw is PdfTextItem {
  return isRecord(raw) && typeof raw.str === 'string' && Array.isArray(raw.transform);
}

function isRef(v: unknown): v is PdfRefLike {
  return isRecord(v) && typeof v.num === 'number' && typeof v.gen === 'number';
}

function parseTransform(t: unknown[]): [number, number, number, number, number, number] {
  return [asNum(t[0]), asNum(t[1]), asNum(t[2]), asNum(t[3]), asNum(t[4]), asNum(t[5])];
}

function resolveFont(page: PdfPageLike, content: PdfTextContentLike, loadedName: string, cache: Map<string, ResolvedFont>): ResolvedFont {
  const cached = cache.get(loadedName);
  if (cached) return cached;

  let name = content.styles?.[loadedName]?.fontFamily || loadedName;
  let flagged = false;
  const objs = page.commonObjs;
  if (objs && loadedName && objs.has(loadedName)) {
    const font = objs.get(loadedName);
    if (isRecord(font)) {
      if (typeof font.name === 'string' && font.name) name = font.name;
      flagged = font.bold === true || font.black === true;
    }
  }

  const resolved = { name, isBold: flagged || BOLD_NAME.test(name) };
  cache.set(loadedName, resolved);
  return resolved;
}

export function parsePageFragments(pageNum: number, page: PdfPageLike, content: PdfTextContentLike): PageFragments {
  const viewport = page.getViewport({ scale: 1 });
  const pageW = asNum(viewport.width, 1) || 1;
  const pageH = asNum(viewport.height, 1) || 1;
  const fonts = new Map<string, ResolvedFont>();
  const fragments: TextFragment[] = [];

  for (const raw of content.items) {
    if (!isTextItem(raw)) continue;
    if (!raw.str.trim()) continue;

    const [a, b, c, d, x, y] = parseTransform(raw.transform);
    if (Math.abs(Math.atan2(b, a)) > MAX_ROTATION_RAD) continue;

    // Approx font size (purely geometric, deterministic).
    const fontSize = roundSize(Math.max(Math.hypot(a, b), Math.hypot(c, d), Math.abs(d), 0));
    if (!(fontSize > 0)) continue;

    const w = asNum(raw.width, 0);
    const h = asNum(raw.height, 0) || fontSize;
    // PDF origin is bottom-left; flip so y grows downwards. y1 is the baseline.
    const baseline = pageH - y;
    const font = resolveFont(page, content, typeof raw.fontName === 'string' ? raw.fontName : '', fonts);

    fragments.push({
      text: raw.str,
      page: pageNum,
      fontSize,
      isBold: font.isBold,
      fontName: font.name,
      bbox: { x0: x, y0: baseline - h, x1: x + w, y1: baseline },
    });
  }

  return { page: pageNum, width: pageW, height: pageH, fragments };
}

async function readPage(pdf: PdfDocLike, pageNum: number, opts: ReadOptions): Promise<PageFragments> {
  try {
    const page = await pdf.getPage(pageNum);
    const content = await page.getTextContent();
    // The operator list loads fonts into commonObjs, which carries real names and weight flags.
    if (opts.resolveFontNames && page.getOperatorList) await page.getOperatorList();
    return parsePageFragments(pageNum, page, content);
  } catch (err) {
    logger.warn({ pageNum, err }, 'failed to extract page text');
    // Preserve page numbering: emit an empty page.
    return { page: pageNum, width: 1, height: 1, fragments: [] };
  }
}

async function resolveDestinationPage(pdf: PdfDocLike, dest: PdfOutlineItemLike['dest']): Promise<number | null> {
  try {
    const explicit = typeof dest === 'string' ? await pdf.getDestination(dest) : dest;
    if (!explicit || !explicit.length) return null;
    const target = explicit[0];
    if (isRef(target)) return (await pdf.getPageIndex(target)) + 1;
    if (typeof target === 'number' && Number.isInteger(target)) return target + 1;
    return null;
  } catch (err) {
    logger.debug({ err }, 'outline destination could not be resolved');
    return null;
  }
}

export async function readNativeOutline(pdf: PdfDocLike): Promise<NativeOutlineEntry[]> {
  let items: PdfOutlineItemLike[] | null;
  try {
    items = await pdf.getOutline();
  } catch (err) {
    logger.debug({ err }, 'no readable native outline');
    return [];
  }

  const out: NativeOutlineEntry[] = [];
  const walk = async (list: PdfOutlineItemLike[], depth: number): Promise<void> => {
    for (const item of list) {
      const title = cleanHeadingText(String(item.title));
      const page = await resolveDestinationPage(pdf, item.dest);
      if (title && page !== null) out.push({ depth, title, page });
      if (Array.isArray(item.items) && item.items.length) await walk(item.items, depth + 1);
    }
  };
  await walk(items ?? [], 1);
  return out;
}

export async function readMetadataTitle(pdf: PdfDocLike): Promise<string> {
  try {
    const { info } = await pdf.getMetadata();
    const title = isRecord(info) ? info.Title : undefined;
    return typeof title === 'string' ? cleanTitleText(title) : '';
  } catch (err) {
    logger.debug({ err }, 'no readable document metadata');
    return '';
  }
}

/**
 * Read everything the heuristic core needs from an open document.
 * Documents over the page limit are rejected before any page is read.
 */
export async function readDocumentInput(pdf: PdfDocLike, opts: ReadOptions): Promise<DocumentInput> {
  const pageCount = asNum(pdf.numPages, 0);
  if (pageCount > opts.maxPages) throw new PageLimitExceededError(pageCount, opts.maxPages);

  const pages: PageFragments[] = [];
  for (let pageNum = 1; pageNum <= pageCount; pageNum++) {
    pages.push(await readPage(pdf, pageNum, opts));
  }

  return {
    pageCount,
    pages,
    nativeOutline: await readNativeOutline(pdf),
    metadataTitle: await readMetadataTitle(pdf),
  };
}

export async function loadPdfDocument(data: Uint8Array): Promise<PDFDocumentProxy> {
  try {
    const loadingTask = getDocument({
      data,
      verbosity: PDFJS_VERBOSITY,
      isEvalSupported: false,
      useSystemFonts: false,
    });
    return await loadingTask.promise;
  } catch (err) {
    throw new PdfLoadError(err instanceof Error ? err.message : 'Unreadable PDF', err);
  }
}
