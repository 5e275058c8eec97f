import type { ExtractedDocument, ExtractedPage, TextLine, TextSpan } from "./pdf-types.ts";
import { LINE_Y_BUCKET_SIZE, MAX_REASONABLE_Y_MULTIPLIER } from "./pdf-types.ts";

export function collectTextLines(document: ExtractedDocument): TextLine[] {
  const lines: TextLine[] = [];
  for (const page of document.pages) {
    lines.push(...collectPageLines(page));
  }
  return lines.sort(compareLinesForReadingOrder);
}

function collectPageLines(page: ExtractedPage): TextLine[] {
  const lines: TextLine[] = [];

  for (const [bucket, rawSpans] of bucketSpans(page)) {
    const spans = sortSpansForReadingOrder(rawSpans);
    const text = normalizeSpacing(spans.map((span) => span.text).join(" "));
    if (text.length === 0) continue;

    lines.push({
      pageIndex: page.pageIndex,
      x: Math.min(...spans.map((span) => span.x)),
      y: bucket,
      fontSize: Math.max(...spans.map((span) => span.fontSize)),
      text,
      spans,
    });
  }

  return lines;
}

function bucketSpans(page: ExtractedPage): Map<number, TextSpan[]> {
  const buckets = new Map<number, TextSpan[]>();
  for (const span of page.spans) {
    if (!isWithinPageBox(span, page)) continue;
    const bucket = toLineBucket(span.y);
    const existing = buckets.get(bucket);
    if (existing) {
      existing.push(span);
    } else {
      buckets.set(bucket, [span]);
    }
  }
  return buckets;
}

/** Spans far above the page box come from broken text matrices. */
export function isWithinPageBox(span: TextSpan, page: ExtractedPage): boolean {
  return span.y <= page.height * MAX_REASONABLE_Y_MULTIPLIER;
}

export function toLineBucket(y: number): number {
  return Math.round(y / LINE_Y_BUCKET_SIZE) * LINE_Y_BUCKET_SIZE;
}

export function compareLinesForReadingOrder(left: TextLine, right: TextLine): number {
  if (left.pageIndex !== right.pageIndex) return left.pageIndex - right.pageIndex;
  if (left.y !== right.y) return right.y - left.y;
  return left.x - right.x;
}

/** Top to bottom, then left to right; PDF y grows upwards. */
export function sortSpansForReadingOrder(spans: readonly TextSpan[]): TextSpan[] {
  return [...spans].sort((left, right) => {
    if (left.pageIndex !== right.pageIndex) return left.pageIndex - right.pageIndex;
    const leftBucket = toLineBucket(left.y);
    const rightBucket = toLineBucket(right.y);
    if (leftBucket !== rightBucket) return rightBucket - leftBucket;
    return left.x - right.x;
  });
}

export function normalizeSpacing(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
