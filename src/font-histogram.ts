import type {
  ExtractedDocument,
  FontSizeHistogram,
  FontSizeRole,
  HeadingLevelMap,
} from "./pdf-types.ts";
import { HEADING_LEVELS } from "./pdf-types.ts";
import { isWithinPageBox } from "./text-lines.ts";

export function roundFontSize(fontSize: number): number {
  return Math.round(fontSize);
}

export function buildFontSizeHistogram(document: ExtractedDocument): FontSizeHistogram {
  const frequencies = new Map<number, number>();
  for (const page of document.pages) {
    for (const span of page.spans) {
      if (span.text.trim().length === 0 || !isWithinPageBox(span, page)) continue;
      const rounded = roundFontSize(span.fontSize);
      frequencies.set(rounded, (frequencies.get(rounded) ?? 0) + 1);
    }
  }
  return frequencies;
}

/**
 * Most frequent size. Ties go to the smaller size, since body text is
 * usually the most common small size.
 */
export function estimateBodyFontSize(histogram: FontSizeHistogram): number | undefined {
  const [mostFrequent] = [...histogram.entries()].sort((left, right) => {
    if (left[1] !== right[1]) return right[1] - left[1];
    return left[0] - right[0];
  });
  return mostFrequent?.[0];
}

export function collectHeadingCandidateSizes(
  histogram: FontSizeHistogram,
  bodyFontSize: number,
  excludedFontSize?: number,
): number[] {
  return [...histogram.keys()]
    .filter((size) => size > bodyFontSize && size !== excludedFontSize)
    .sort((left, right) => right - left);
}

export function deriveHeadingLevelMap(
  histogram: FontSizeHistogram,
  bodyFontSize: number,
  titleFontSize?: number,
): HeadingLevelMap {
  const levels = new Map<number, FontSizeRole>();
  if (titleFontSize !== undefined) levels.set(titleFontSize, "Title");

  const candidates = collectHeadingCandidateSizes(histogram, bodyFontSize, titleFontSize);
  candidates.slice(0, HEADING_LEVELS.length).forEach((size, index) => {
    levels.set(size, HEADING_LEVELS[index]);
  });
  return levels;
}
