// src/pdf/pipeline.ts
// Entry-point: PDF → outline.
//
// buildOutline() is synchronous and pure: fragments → lines → font profile →
// classification → assembly. extractOutlineFromFile() wraps it with PDF.js I/O.

import { readFile } from 'fs/promises';

import type { OutlineSettings } from '../types';
import { DEFAULT_SETTINGS } from '../types';
import { logger } from '../services/logger';
import type { DocumentInput, Line, NativeOutlineEntry, Outline, OutlineEntry, OutlineResult } from './types';
import { loadPdfDocument, readDocumentInput } from './extract';
import { buildLines } from './lines';
import { removePageChrome } from './exclusions';
import { buildFontProfile } from './fonts';
import { classifyLines, detectTitle } from './classify';
import { assembleOutline, buildOutlineTree, levelAt, normalizeLevels } from './assemble';

export type ExtractOptions = {
  maxPages: number;
  settings?: OutlineSettings;
};

const MAX_NATIVE_DEPTH = 3;

function nativeEntries(native: NativeOutlineEntry[]): OutlineEntry[] {
  return native
    .filter((e) => e.depth >= 1 && e.depth <= MAX_NATIVE_DEPTH)
    .map((e) => ({ level: levelAt(e.depth), text: e.title, page: e.page }));
}

/**
 * Layout title: the best-placed line in the document's largest size near the
 * start of page 1.
 * Returns the title text (possibly empty) and the lines it consumed.
 */
function layoutTitle(lines: Line[], settings: OutlineSettings): { title: string; skip: Set<number> } {
  const profile = buildFontProfile(lines);
  if (!profile) return { title: '', skip: new Set() };
  const match = detectTitle(lines, profile, settings);
  return match ? { title: match.text, skip: new Set(match.lineIndexes) } : { title: '', skip: new Set() };
}

export function documentLines(input: DocumentInput, settings: OutlineSettings): Line[] {
  const lines = buildLines(input.pages, { lineTolerance: settings.lineTolerance });
  return settings.excludePageChrome ? removePageChrome(lines, settings.pageChromeBand) : lines;
}

/**
 * Heuristic path. The profile is built twice: once over every line to find
 * the title, then without the title lines so the title's size does not take
 * the H1 tier.
 */
export function buildLayoutOutline(lines: Line[], settings: OutlineSettings): Outline {
  const { title, skip } = layoutTitle(lines, settings);
  const profile = buildFontProfile(lines.filter((_, i) => !skip.has(i)));
  if (!profile) return { title, nodes: [] };

  const candidates = classifyLines(lines, profile, settings, skip);
  return assembleOutline(title, candidates, settings);
}

export function buildOutline(input: DocumentInput, settings: OutlineSettings = DEFAULT_SETTINGS): OutlineResult {
  const lines = documentLines(input, settings);
  const native = nativeEntries(input.nativeOutline);

  if (settings.preferNativeOutline && native.length) {
    const { title } = layoutTitle(lines, settings);
    return {
      source: 'native',
      outline: {
        title: title || input.metadataTitle,
        nodes: buildOutlineTree(normalizeLevels(native)),
      },
    };
  }

  const outline = buildLayoutOutline(lines, settings);
  return {
    source: 'layout',
    outline: { ...outline, title: outline.title || input.metadataTitle },
  };
}

export async function extractOutlineFromFile(path: string, opts: ExtractOptions): Promise<OutlineResult> {
  const settings = opts.settings ?? DEFAULT_SETTINGS;
  const data = new Uint8Array(await readFile(path));
  const pdf = await loadPdfDocument(data);

  try {
    const input = await readDocumentInput(pdf, {
      maxPages: opts.maxPages,
      resolveFontNames: settings.resolveFontNames,
    });
    const result = buildOutline(input, settings);
    logger.debug(
      { path, pages: input.pageCount, source: result.source, roots: result.outline.nodes.length },
      'outline built'
    );
    return result;
  } finally {
    await pdf.destroy();
  }
}
