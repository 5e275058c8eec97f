/**
 * Builds small single-font-family PDFs in memory so the pdf.js path can be
 * tested without checked-in binaries. ASCII text only.
 */

export interface TestPdfText {
  text: string;
  x: number;
  y: number;
  fontSize: number;
  bold?: boolean;
}

const PAGE_WIDTH = 612;
const PAGE_HEIGHT = 792;
const FIXED_OBJECT_COUNT = 4;

export function buildTestPdf(pages: TestPdfText[][]): Uint8Array {
  const objects: string[] = [];
  const pageObjectNumbers = pages.map((_, index) => FIXED_OBJECT_COUNT + 1 + index * 2);

  objects.push("<< /Type /Catalog /Pages 2 0 R >>");
  objects.push(
    `<< /Type /Pages /Kids [${pageObjectNumbers.map((n) => `${n} 0 R`).join(" ")}] /Count ${pages.length} >>`,
  );
  objects.push("<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>");
  objects.push("<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica-Bold /Encoding /WinAnsiEncoding >>");

  pages.forEach((texts, index) => {
    const contentObjectNumber = pageObjectNumbers[index] + 1;
    objects.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 ${PAGE_WIDTH} ${PAGE_HEIGHT}] ` +
        `/Resources << /Font << /F1 3 0 R /F2 4 0 R >> >> /Contents ${contentObjectNumber} 0 R >>`,
    );
    const stream = texts.map(renderText).join("");
    objects.push(`<< /Length ${stream.length} >>\nstream\n${stream}endstream`);
  });

  let output = "%PDF-1.4\n";
  const offsets: number[] = [];
  objects.forEach((body, index) => {
    offsets.push(output.length);
    output += `${index + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = output.length;
  output += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    output += `${String(offset).padStart(10, "0")} 00000 n \n`;
  }
  output += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return new TextEncoder().encode(output);
}

function renderText({ text, x, y, fontSize, bold }: TestPdfText): string {
  const font = bold ? "F2" : "F1";
  return `BT /${font} ${fontSize} Tf ${x} ${y} Td (${escapePdfString(text)}) Tj ET\n`;
}

function escapePdfString(text: string): string {
  return text.replace(/[\\()]/g, (char) => `\\${char}`);
}
