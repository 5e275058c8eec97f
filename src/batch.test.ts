import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { listPdfFiles, processPdfDirectory } from "./batch.ts";
import { FileReadError, ParseError, WriteError } from "./errors.ts";
import { createLogger } from "./logger.ts";
import type { DocumentOutline } from "./pdf-types.ts";
import { captureLogLines, createSilentLogger, flushLogs } from "./test-logger.ts";
import { buildTestPdf } from "./test-pdf.ts";

type Dependencies = NonNullable<Parameters<typeof processPdfDirectory>[1]>;

describe("listPdfFiles", () => {
  it("keeps pdf files regardless of extension case, sorted by name", () => {
    expect(listPdfFiles(["b.pdf", "notes.txt", "A.PDF", "c.pdf.bak", "a.pdf"])).toEqual([
      "a.pdf",
      "A.PDF",
      "b.pdf",
    ]);
  });
});

describe("processPdfDirectory", () => {
  it("writes one json file per pdf and continues past failures", async () => {
    const written = new Map<string, string>();
    const { stream, lines: logLines } = captureLogLines();
    const dependencies = createDependencies({
      readInputDir: async () => ["good.pdf", "broken.pdf", "readme.md"],
      extractOutline: async (inputPath: string) => {
        if (inputPath.endsWith("broken.pdf")) {
          throw new ParseError(`Failed to parse PDF ${inputPath}: Invalid PDF structure.`, inputPath);
        }
        return { title: "Good", outline: [{ level: "H1", text: "Intro", page: 1 }] };
      },
      writeOutput: async (outputPath: string, contents: string) => {
        written.set(outputPath, contents);
      },
      logger: createLogger({ stream, now: () => new Date(0) }),
    });

    const result = await processPdfDirectory({ inputDirPath: "/in", outputDirPath: "/out" }, dependencies);
    await flushLogs();

    const goodOutput = join(resolve("/out"), "good.json");
    expect([...written.keys()]).toEqual([goodOutput]);
    expect(JSON.parse(written.get(goodOutput) ?? "")).toEqual({
      title: "Good",
      outline: [{ level: "H1", text: "Intro", page: 1 }],
    });
    expect(result.processed).toEqual([
      { inputPath: join(resolve("/in"), "good.pdf"), outputPath: goodOutput, headingCount: 1 },
    ]);
    expect(result.failed.map((failure) => failure.inputPath)).toEqual([join(resolve("/in"), "broken.pdf")]);
    expect(result.failed[0].error).toBeInstanceOf(ParseError);
    expect(logLines).toContain(
      `[1970-01-01T00:00:00.000Z] ERROR - Skipping file {"file":"broken.pdf","reason":"Failed to parse PDF ${join(resolve("/in"), "broken.pdf")}: Invalid PDF structure."}`,
    );
  });

  it("processes files in name order", async () => {
    const seen: string[] = [];
    const dependencies = createDependencies({
      readInputDir: async () => ["zeta.pdf", "alpha.pdf", "mid.PDF"],
      extractOutline: async (inputPath: string) => {
        seen.push(inputPath);
        return { title: "", outline: [] };
      },
    });

    await processPdfDirectory({ inputDirPath: "/in", outputDirPath: "/out" }, dependencies);

    expect(seen).toEqual(["alpha.pdf", "mid.PDF", "zeta.pdf"].map((name) => join(resolve("/in"), name)));
  });

  it("fails the whole run when the output directory cannot be created", async () => {
    const extractOutline = vi.fn(async (): Promise<DocumentOutline> => ({ title: "", outline: [] }));
    const dependencies = createDependencies({
      ensureOutputDir: async () => {
        throw Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
      },
      extractOutline,
    });

    await expect(
      processPdfDirectory({ inputDirPath: "/in", outputDirPath: "/readonly/out" }, dependencies),
    ).rejects.toThrow(new WriteError(`Cannot write output: ${resolve("/readonly/out")} (EACCES)`));
    expect(extractOutline).not.toHaveBeenCalled();
  });

  it("fails the whole run when the input directory cannot be listed", async () => {
    const dependencies = createDependencies({
      readInputDir: async () => {
        throw new Error("ENOENT");
      },
    });

    await expect(
      processPdfDirectory({ inputDirPath: "/missing", outputDirPath: "/out" }, dependencies),
    ).rejects.toBeInstanceOf(FileReadError);
  });

  it("records a failed output write and keeps going", async () => {
    const dependencies = createDependencies({
      readInputDir: async () => ["a.pdf", "b.pdf"],
      writeOutput: async (outputPath: string) => {
        if (outputPath.endsWith("a.json")) throw new Error("disk full");
      },
    });

    const result = await processPdfDirectory({ inputDirPath: "/in", outputDirPath: "/out" }, dependencies);

    expect(result.processed.map((file) => file.outputPath)).toEqual([join(resolve("/out"), "b.json")]);
    expect(result.failed[0].error).toBeInstanceOf(WriteError);
    expect(result.failed[0].error.message).toBe(`Cannot write output: ${join(resolve("/out"), "a.json")} (disk full)`);
  });
});

describe("processPdfDirectory on disk", () => {
  let workDir = "";

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "pdf-outline-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("extracts outlines from real pdf files and skips corrupt ones", async () => {
    const inputDir = join(workDir, "input");
    const outputDir = join(workDir, "output");
    await mkdir(inputDir);
    await writeFile(
      join(inputDir, "report.pdf"),
      buildTestPdf([
        [
          { text: "Quarterly Review", x: 72, y: 720, fontSize: 24 },
          { text: "Summary", x: 72, y: 680, fontSize: 16 },
          { text: "Revenue grew steadily.", x: 72, y: 650, fontSize: 10 },
          { text: "Costs stayed flat.", x: 72, y: 630, fontSize: 10 },
          { text: "Headcount rose slightly.", x: 72, y: 610, fontSize: 10 },
        ],
        [
          { text: "Details", x: 72, y: 720, fontSize: 16 },
          { text: "Regional figures follow.", x: 72, y: 690, fontSize: 10 },
          { text: "All numbers are unaudited.", x: 72, y: 670, fontSize: 10 },
          { text: "See the appendix.", x: 72, y: 650, fontSize: 10 },
        ],
      ]),
    );
    await writeFile(join(inputDir, "blank.pdf"), buildTestPdf([[]]));
    await writeFile(join(inputDir, "corrupt.pdf"), "definitely not a pdf");
    await writeFile(join(inputDir, "notes.txt"), "ignored");

    const result = await processPdfDirectory(
      { inputDirPath: inputDir, outputDirPath: outputDir },
      { logger: createSilentLogger() },
    );

    expect((await readdir(outputDir)).sort()).toEqual(["blank.json", "report.json"]);
    expect(result.failed.map((failure) => failure.inputPath)).toEqual([join(inputDir, "corrupt.pdf")]);
    expect(result.failed[0].error).toBeInstanceOf(ParseError);

    expect(JSON.parse(await readFile(join(outputDir, "report.json"), "utf8"))).toEqual({
      title: "Quarterly Review",
      outline: [
        { level: "H1", text: "Summary", page: 1 },
        { level: "H1", text: "Details", page: 2 },
      ],
    });
    expect(await readFile(join(outputDir, "blank.json"), "utf8")).toBe('{\n    "title": "",\n    "outline": []\n}');
  });

  it("writes byte-identical output when run twice", async () => {
    const inputDir = join(workDir, "input");
    await mkdir(inputDir);
    await writeFile(
      join(inputDir, "guide.pdf"),
      buildTestPdf([
        [
          { text: "User Guide", x: 72, y: 720, fontSize: 22 },
          { text: "Installation", x: 72, y: 680, fontSize: 15 },
          { text: "Run the installer.", x: 72, y: 650, fontSize: 11 },
          { text: "Accept the defaults.", x: 72, y: 630, fontSize: 11 },
        ],
      ]),
    );
    const options = { logger: createSilentLogger() };

    await processPdfDirectory({ inputDirPath: inputDir, outputDirPath: join(workDir, "first") }, options);
    await processPdfDirectory({ inputDirPath: inputDir, outputDirPath: join(workDir, "second") }, options);

    const first = await readFile(join(workDir, "first", "guide.json"));
    const second = await readFile(join(workDir, "second", "guide.json"));
    expect(second.equals(first)).toBe(true);
  });
});

function createDependencies(overrides: Partial<Dependencies> = {}): Dependencies {
  return {
    ensureOutputDir: vi.fn(async () => {}),
    readInputDir: vi.fn(async () => ["report.pdf"]),
    assertReadableFile: vi.fn(async () => {}),
    extractOutline: vi.fn(async (): Promise<DocumentOutline> => ({ title: "", outline: [] })),
    writeOutput: vi.fn(async () => {}),
    logger: createSilentLogger(),
    ...overrides,
  };
}
