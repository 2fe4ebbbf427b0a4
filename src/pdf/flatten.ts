// src/pdf/flatten.ts
// Flatten the outline tree into the interchange form and serialize it.

import type { Outline, OutlineDocument, OutlineEntry, OutlineNode } from './types';

// Depth-first, document order.
export function flattenOutline(nodes: OutlineNode[]): OutlineEntry[] {
  const out: OutlineEntry[] = [];
  const walk = (list: OutlineNode[]) => {
    for (const n of list) {
      out.push({ level: n.level, text: n.text, page: n.page });
      walk(n.children);
    }
  };
  walk(nodes);
  return out;
}

export function toOutlineDocument(outline: Outline): OutlineDocument {
  return { title: outline.title, outline: flattenOutline(outline.nodes) };
}

export function serializeOutline(doc: OutlineDocument): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}
