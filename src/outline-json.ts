import { parse } from "node:path";
import { z } from "zod";
import type { DocumentOutline } from "./pdf-types.ts";
import { OUTLINE_JSON_INDENT } from "./pdf-types.ts";

export const OutlineEntrySchema = z.object({
  level: z.enum(["H1", "H2", "H3"]),
  text: z.string().min(1),
  page: z.number().int().positive(),
});

export const DocumentOutlineSchema = z.object({
  title: z.string(),
  outline: z.array(OutlineEntrySchema),
});

/** Validated and rebuilt field by field, so key order never depends on the caller. */
export function serializeOutline(outline: DocumentOutline): string {
  const parsed = DocumentOutlineSchema.parse(outline);
  const ordered: DocumentOutline = {
    title: parsed.title,
    outline: parsed.outline.map(({ level, text, page }) => ({ level, text, page })),
  };
  return JSON.stringify(ordered, null, OUTLINE_JSON_INDENT);
}

export function getOutputFileName(pdfFileName: string): string {
  const { name, ext } = parse(pdfFileName);
  const stem = ext.toLowerCase() === ".pdf" ? name : `${name}${ext}`;
  return `${stem}.json`;
}
