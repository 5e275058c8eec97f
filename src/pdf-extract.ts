import { readFile } from "node:fs/promises";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import { createParseError, createReadError } from "./errors.ts";
import type { ExtractedDocument, ExtractedPage, TextSpan } from "./pdf-types.ts";
import { BOLD_FONT_NAME_PATTERN } from "./pdf-types.ts";

interface PdfTextItem {
  str: string;
  transform: number[];
  fontName: string;
}

type PdfTextStyles = Record<string, { fontFamily?: string } | undefined>;

interface PdfObjectStore {
  has(objId: string): boolean;
  get(objId: string): unknown;
}

interface LoadedFont {
  name: string;
  bold: boolean;
}

const IN_MEMORY_SOURCE = "<buffer>";

export async function extractDocument(inputPdfPath: string): Promise<ExtractedDocument> {
  let data: Uint8Array;
  try {
    data = new Uint8Array(await readFile(inputPdfPath));
  } catch (error: unknown) {
    throw createReadError(inputPdfPath, error);
  }
  return extractDocumentFromBuffer(data, inputPdfPath);
}

export async function extractDocumentFromBuffer(
  data: Uint8Array,
  sourcePath: string = IN_MEMORY_SOURCE,
): Promise<ExtractedDocument> {
  const loadingTask = getDocument({
    data,
    useSystemFonts: true,
    disableFontFace: true,
    verbosity: 0,
  });
  try {
    const pdf = await loadingTask.promise;
    const pages: ExtractedPage[] = [];

    for (let i = 0; i < pdf.numPages; i++) {
      const page = await pdf.getPage(i + 1);
      const viewport = page.getViewport({ scale: 1 });
      const textContent = await page.getTextContent();
      // Fonts only reach commonObjs once the page's operator list is built.
      await page.getOperatorList();
      const fonts = createFontResolver(page.commonObjs, textContent.styles);
      pages.push({
        pageIndex: i,
        width: viewport.width,
        height: viewport.height,
        spans: collectPageSpans(textContent.items, fonts, i),
      });
      page.cleanup();
    }
    return { pages };
  } catch (error: unknown) {
    throw createParseError(sourcePath, error);
  } finally {
    await loadingTask.destroy();
  }
}

function collectPageSpans(
  items: unknown[],
  fonts: (fontId: string) => LoadedFont,
  pageIndex: number,
): TextSpan[] {
  const spans: TextSpan[] = [];

  for (const item of items) {
    if (!isPdfTextItem(item)) continue;
    const span = toTextSpan(item, fonts(item.fontName), pageIndex);
    if (span) spans.push(span);
  }

  return spans;
}

function isPdfTextItem(item: unknown): item is PdfTextItem {
  return (
    typeof item === "object" &&
    item !== null &&
    "str" in item &&
    typeof item.str === "string" &&
    "transform" in item &&
    Array.isArray(item.transform) &&
    item.transform.length >= 6 &&
    "fontName" in item &&
    typeof item.fontName === "string"
  );
}

function toTextSpan(item: PdfTextItem, font: LoadedFont, pageIndex: number): TextSpan | undefined {
  const text = normalizePdfText(item.str);
  if (!text) return undefined;
  return {
    text,
    x: item.transform[4],
    y: item.transform[5],
    fontSize: Math.hypot(item.transform[2], item.transform[3]),
    fontName: font.name,
    isBold: font.bold,
    pageIndex,
  };
}

/**
 * Text items only carry an internal font id. The PDF font name comes from
 * the loaded font object; the text style family is a generic CSS fallback.
 */
function createFontResolver(
  commonObjs: PdfObjectStore,
  styles: PdfTextStyles,
): (fontId: string) => LoadedFont {
  const cache = new Map<string, LoadedFont>();
  return (fontId: string) => {
    const cached = cache.get(fontId);
    if (cached) return cached;
    const loaded = commonObjs.has(fontId) ? readLoadedFont(commonObjs.get(fontId)) : undefined;
    const name = loaded?.name ?? styles[fontId]?.fontFamily ?? fontId;
    const font = { name, bold: (loaded?.bold ?? false) || isBoldFontName(name) };
    cache.set(fontId, font);
    return font;
  };
}

function readLoadedFont(font: unknown): { name?: string; bold: boolean } | undefined {
  if (typeof font !== "object" || font === null) return undefined;
  const name = "name" in font && typeof font.name === "string" && font.name.length > 0 ? font.name : undefined;
  const bold = "bold" in font && font.bold === true;
  return { name, bold };
}

export function isBoldFontName(fontName: string): boolean {
  return BOLD_FONT_NAME_PATTERN.test(fontName);
}

function normalizePdfText(text: string): string | undefined {
  const normalized = text.replace(/\s+/g, " ").trim();
  return normalized.length > 0 ? normalized : undefined;
}
