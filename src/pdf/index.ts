// src/pdf/index.ts
// Public entrypoints for the PDF outline pipeline.

export type {
  DocumentInput,
  FontProfile,
  HeadingCandidate,
  HeadingLevel,
  Line,
  NativeOutlineEntry,
  Outline,
  OutlineDocument,
  OutlineEntry,
  OutlineLevel,
  OutlineNode,
  OutlineResult,
  OutlineSource,
  PageFragments,
  PdfBBox,
  PdfDocLike,
  TextFragment,
} from './types';

export { buildOutline, buildLayoutOutline, extractOutlineFromFile } from './pipeline';
export type { ExtractOptions } from './pipeline';
export { loadPdfDocument, readDocumentInput } from './extract';
export { buildLines } from './lines';
export { buildFontProfile } from './fonts';
export { classifyLine, classifyLines, detectTitle, parseNumbering } from './classify';
export { assembleOutline, buildOutlineTree, normalizeLevels } from './assemble';
export { flattenOutline, serializeOutline, toOutlineDocument } from './flatten';
