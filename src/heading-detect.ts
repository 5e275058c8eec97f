import type { HeadingLevel, HeadingLevelMap, OutlineEntry, TextLine } from "./pdf-types.ts";
import { MAX_SENTENCE_HEADING_WORDS, NUMBERING_MARKER_PATTERN } from "./pdf-types.ts";
import { roundFontSize } from "./font-histogram.ts";
import { normalizeSpacing } from "./text-lines.ts";

export function classifyHeadingLines(
  lines: TextLine[],
  levelMap: HeadingLevelMap,
  titleLines: readonly TextLine[] = [],
): OutlineEntry[] {
  const excluded = new Set(titleLines);
  const entries: OutlineEntry[] = [];

  for (const line of lines) {
    if (excluded.has(line)) continue;
    const level = resolveHeadingLevel(line, levelMap);
    if (level === undefined) continue;
    const text = normalizeSpacing(line.text);
    if (!isOutlineText(text)) continue;
    entries.push({ level, text, page: line.pageIndex + 1 });
  }

  return entries;
}

export function resolveHeadingLevel(
  line: TextLine,
  levelMap: HeadingLevelMap,
): HeadingLevel | undefined {
  const role = levelMap.get(roundFontSize(line.fontSize));
  // Title-sized text outside the title itself is not an outline entry.
  if (role === undefined || role === "Title") return undefined;
  return role;
}

/**
 * Bare numbering such as "3." or "2.1" is a list marker, and a longer line
 * ending in a period is a sentence; neither is a heading.
 */
export function isOutlineText(text: string): boolean {
  const normalized = normalizeSpacing(text);
  if (normalized.length === 0) return false;
  if (NUMBERING_MARKER_PATTERN.test(normalized)) return false;
  return !(normalized.endsWith(".") && normalized.split(" ").length > MAX_SENTENCE_HEADING_WORDS);
}
