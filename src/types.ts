export interface OutlineSettings {
  /** Baseline band for merging fragments into a line, as a fraction of font size */
  lineTolerance: number;
  /** Bold text must be at least this much larger than body size to count as a heading on its own */
  boldSizeRatio: number;
  /** Gap above/below a line, in multiples of the body line gap, that makes it visually isolated */
  isolationGapRatio: number;
  /** First line of a page within this fraction of the page height counts as isolated */
  topOfPageBand: number;
  // "Short" means at most max(shortLineMinChars, bodyLineLength * shortLineRatio) characters.
  shortLineRatio: number;
  shortLineMinChars: number;
  minHeadingChars: number;
  maxHeadingChars: number;
  /** Internal acceptance threshold for the heading score */
  acceptScore: number;
  /** Consecutive heading lines closer than this (fraction of font size) are one wrapped heading */
  wrapGapRatio: number;
  maxTitleLines: number;
  /** Top/bottom fraction of the page searched for running headers and footers */
  pageChromeBand: number;
  excludePageChrome: boolean;
  /** Use the PDF's own bookmarks when it has any */
  preferNativeOutline: boolean;
  /** Load each page's operator list so real font names (and weights) are known */
  resolveFontNames: boolean;
}

export const DEFAULT_SETTINGS: OutlineSettings = {
  lineTolerance: 0.3,
  boldSizeRatio: 1.15,
  isolationGapRatio: 1.5,
  topOfPageBand: 0.15,
  shortLineRatio: 0.9,
  shortLineMinChars: 40,
  minHeadingChars: 3,
  maxHeadingChars: 200,
  acceptScore: 3,
  wrapGapRatio: 0.6,
  maxTitleLines: 3,
  pageChromeBand: 0.08,
  excludePageChrome: true,
  preferNativeOutline: true,
  resolveFontNames: true,
};
