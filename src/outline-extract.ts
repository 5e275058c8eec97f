import { buildFontSizeHistogram, deriveHeadingLevelMap, estimateBodyFontSize } from "./font-histogram.ts";
import { classifyHeadingLines } from "./heading-detect.ts";
import { extractDocument } from "./pdf-extract.ts";
import type { DocumentOutline, ExtractedDocument } from "./pdf-types.ts";
import { collectTextLines } from "./text-lines.ts";
import { findTitle } from "./title-detect.ts";

/**
 * Two passes over the document: the first builds the font-size histogram
 * and level map, the second classifies each line against it. Nothing is
 * shared between calls.
 */
export function extractOutline(document: ExtractedDocument): DocumentOutline {
  const histogram = buildFontSizeHistogram(document);
  const bodyFontSize = estimateBodyFontSize(histogram);
  if (bodyFontSize === undefined) return { title: "", outline: [] };

  const lines = collectTextLines(document);
  const title = findTitle(lines, bodyFontSize);
  const levelMap = deriveHeadingLevelMap(histogram, bodyFontSize, title?.fontSize);

  return {
    title: title?.text ?? "",
    outline: classifyHeadingLines(lines, levelMap, title?.lines),
  };
}

export async function extractOutlineFromPdf(inputPdfPath: string): Promise<DocumentOutline> {
  return extractOutline(await extractDocument(inputPdfPath));
}
