import type { DetectedTitle, TextLine } from "./pdf-types.ts";
import { TITLE_PAGE_INDEX } from "./pdf-types.ts";
import { roundFontSize } from "./font-histogram.ts";
import { normalizeSpacing } from "./text-lines.ts";

/**
 * Title is the largest text on the first page, provided it is larger than
 * body text. Every first-page span at that size contributes, in reading order.
 */
export function findTitle(lines: TextLine[], bodyFontSize: number): DetectedTitle | undefined {
  const firstPageLines = lines.filter((line) => line.pageIndex === TITLE_PAGE_INDEX);
  if (firstPageLines.length === 0) return undefined;

  const titleFontSize = Math.max(...firstPageLines.map((line) => roundFontSize(line.fontSize)));
  if (titleFontSize <= bodyFontSize) return undefined;

  const titleLines: TextLine[] = [];
  const parts: string[] = [];
  for (const line of firstPageLines) {
    const titleSpans = line.spans.filter((span) => roundFontSize(span.fontSize) === titleFontSize);
    if (titleSpans.length === 0) continue;
    titleLines.push(line);
    parts.push(...titleSpans.map((span) => span.text));
  }

  const text = normalizeSpacing(parts.join(" "));
  if (text.length === 0) return undefined;
  return { text, fontSize: titleFontSize, lines: titleLines };
}
