export interface ExtractedDocument {
  pages: ExtractedPage[];
}

export interface ExtractedPage {
  pageIndex: number;
  width: number;
  height: number;
  spans: TextSpan[];
}

export interface TextSpan {
  text: string;
  x: number;
  y: number;
  fontSize: number;
  fontName: string;
  isBold: boolean;
  pageIndex: number;
}

export interface TextLine {
  pageIndex: number;
  x: number;
  y: number;
  /** Largest span size on the line. */
  fontSize: number;
  text: string;
  spans: TextSpan[];
}

export type HeadingLevel = "H1" | "H2" | "H3";

export type FontSizeRole = "Title" | HeadingLevel;

/** Rounded font size -> number of non-blank spans at that size. */
export type FontSizeHistogram = ReadonlyMap<number, number>;

export type HeadingLevelMap = ReadonlyMap<number, FontSizeRole>;

export interface OutlineEntry {
  level: HeadingLevel;
  text: string;
  /** 1-based page number. */
  page: number;
}

export interface DocumentOutline {
  title: string;
  outline: OutlineEntry[];
}

export interface DetectedTitle {
  text: string;
  fontSize: number;
  lines: TextLine[];
}

export const HEADING_LEVELS: readonly HeadingLevel[] = ["H1", "H2", "H3"];
export const LINE_Y_BUCKET_SIZE = 2;
export const MAX_REASONABLE_Y_MULTIPLIER = 2.5;
export const TITLE_PAGE_INDEX = 0;
export const OUTLINE_JSON_INDENT = 4;
export const NUMBERING_MARKER_PATTERN = /^[\d.]+$/;
/** A heading-sized line ending in "." with more words than this reads as a sentence. */
export const MAX_SENTENCE_HEADING_WORDS = 4;
export const BOLD_FONT_NAME_PATTERN = /[.\-_]B$|Bold|Black|Heavy|\.B\+|Bd$/i;
