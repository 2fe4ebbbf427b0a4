import { describe, expect, it } from 'vitest';

import {
  assembleOutline,
  buildOutlineTree,
  candidatesToEntries,
  mergeWrappedHeadings,
  normalizeLevels,
} from '../src/pdf/assemble';
import { flattenOutline, serializeOutline, toOutlineDocument } from '../src/pdf/flatten';
import type { HeadingCandidate, HeadingLevel, OutlineEntry, OutlineLevel } from '../src/pdf/types';
import { DEFAULT_SETTINGS } from '../src/types';
import { line, type FragOpts } from './fixtures';

function candidate(
  text: string,
  level: HeadingLevel,
  lineIndex: number,
  opts: FragOpts,
  numbering?: string
): HeadingCandidate {
  const base = { line: line(text, { size: 18, bold: true, ...opts }), lineIndex, level, score: 5 };
  return numbering ? { ...base, numbering } : base;
}

function entry(level: OutlineLevel, text: string, page = 1): OutlineEntry {
  return { level, text, page };
}

describe('normalizeLevels', () => {
  it('never lets a level skip deeper than one step', () => {
    const levels = normalizeLevels([entry('H2', 'a'), entry('H3', 'b'), entry('H1', 'c'), entry('H3', 'd')]).map(
      (e) => e.level
    );
    expect(levels).toEqual(['H1', 'H2', 'H1', 'H2']);
  });

  it('leaves a consistent sequence untouched', () => {
    const entries = [entry('H1', 'a'), entry('H2', 'b'), entry('H3', 'c'), entry('H1', 'd')];
    expect(normalizeLevels(entries)).toEqual(entries);
  });
});

describe('buildOutlineTree', () => {
  const entries = [entry('H1', 'a'), entry('H2', 'b'), entry('H3', 'c'), entry('H2', 'd', 2), entry('H1', 'e', 3)];

  it('nests each heading under the nearest shallower one', () => {
    const roots = buildOutlineTree(entries);

    expect(roots.map((n) => n.text)).toEqual(['a', 'e']);
    expect(roots[0].children.map((n) => n.text)).toEqual(['b', 'd']);
    expect(roots[0].children[0].children.map((n) => n.text)).toEqual(['c']);
    expect(roots[1].children).toEqual([]);
  });

  it('flattens back to the same sequence', () => {
    expect(flattenOutline(buildOutlineTree(entries))).toEqual(entries);
  });
});

describe('mergeWrappedHeadings', () => {
  it('joins consecutive rows of one heading', () => {
    const merged = mergeWrappedHeadings(
      [
        candidate('Results for the', 'H1', 3, { baseline: 100 }),
        candidate('Northern Region', 'H1', 4, { baseline: 122 }),
      ],
      DEFAULT_SETTINGS
    );

    expect(merged).toHaveLength(1);
    expect(merged[0].line.text).toBe('Results for the Northern Region');
    expect(merged[0].line.bbox.y1).toBe(122);
  });

  it('keeps a numbered row as its own heading', () => {
    const merged = mergeWrappedHeadings(
      [candidate('1. Results', 'H1', 3, { baseline: 100 }, '1'), candidate('2. Outlook', 'H1', 4, { baseline: 122 }, '2')],
      DEFAULT_SETTINGS
    );
    expect(merged.map((c) => c.line.text)).toEqual(['1. Results', '2. Outlook']);
  });

  it('keeps rows apart when body text sits between them', () => {
    const merged = mergeWrappedHeadings(
      [candidate('Results', 'H1', 3, { baseline: 100 }), candidate('Outlook', 'H1', 5, { baseline: 122 })],
      DEFAULT_SETTINGS
    );
    expect(merged).toHaveLength(2);
  });

  it('drops a joined block that ends like a sentence', () => {
    const merged = mergeWrappedHeadings(
      [
        candidate('Results for the', 'H1', 3, { baseline: 100 }),
        candidate('year were strong.', 'H1', 4, { baseline: 122 }),
        candidate('Outlook', 'H1', 6, { baseline: 200 }),
      ],
      DEFAULT_SETTINGS
    );
    expect(merged.map((c) => c.line.text)).toEqual(['Outlook']);
  });

  it('drops a joined block longer than the heading limit', () => {
    const merged = mergeWrappedHeadings(
      [
        candidate('Regional results for', 'H1', 3, { baseline: 100 }),
        candidate('the northern markets', 'H1', 4, { baseline: 122 }),
      ],
      { ...DEFAULT_SETTINGS, maxHeadingChars: 30 }
    );
    expect(merged).toEqual([]);
  });
});

describe('candidatesToEntries', () => {
  it('cleans dot leaders and drops the title level', () => {
    const entries = candidatesToEntries([
      candidate('Quarterly Summary', 'TITLE', 0, { baseline: 60 }),
      candidate('Introduction ........ 4', 'H1', 1, { baseline: 100 }),
    ]);
    expect(entries).toEqual([entry('H1', 'Introduction')]);
  });

  it('strips trailing page numbers but keeps numbering', () => {
    const entries = candidatesToEntries([
      candidate('Introduction 4', 'H1', 1, { baseline: 100 }),
      candidate('1.2 Market Overview 12', 'H2', 2, { baseline: 140 }),
      candidate('Chapter 3', 'H1', 3, { baseline: 180 }),
      candidate('Outlook for 2025', 'H1', 4, { baseline: 220 }),
    ]);
    expect(entries).toEqual([
      entry('H1', 'Introduction'),
      entry('H2', '1.2 Market Overview'),
      entry('H1', 'Chapter 3'),
      entry('H1', 'Outlook for 2025'),
    ]);
  });
});

describe('assembleOutline', () => {
  it('orders headings by page and position before building the tree', () => {
    const outline = assembleOutline(
      'Plan',
      [
        candidate('Budget', 'H2', 7, { page: 2, baseline: 300 }),
        candidate('Goals', 'H1', 5, { page: 2, baseline: 100 }),
        candidate('Summary', 'H1', 1, { baseline: 100 }),
      ],
      DEFAULT_SETTINGS
    );

    expect(toOutlineDocument(outline)).toEqual({
      title: 'Plan',
      outline: [entry('H1', 'Summary', 1), entry('H1', 'Goals', 2), entry('H2', 'Budget', 2)],
    });
  });

  it('demotes a heading that would skip a level', () => {
    const outline = assembleOutline(
      '',
      [candidate('Scope', 'H1', 0, { baseline: 100 }), candidate('Limits', 'H3', 2, { baseline: 200 })],
      DEFAULT_SETTINGS
    );
    expect(outline.nodes[0].children).toEqual([{ level: 'H2', text: 'Limits', page: 1, children: [] }]);
  });
});

describe('serializeOutline', () => {
  it('writes indented JSON with a trailing newline', () => {
    const json = serializeOutline({ title: 'Plan', outline: [entry('H1', 'Goals', 2)] });
    expect(json).toBe(
      '{\n  "title": "Plan",\n  "outline": [\n    {\n      "level": "H1",\n      "text": "Goals",\n      "page": 2\n    }\n  ]\n}\n'
    );
  });
});
