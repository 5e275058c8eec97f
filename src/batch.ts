import { readdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { createReadError, createWriteError, describeError, WriteError } from "./errors.ts";
import { assertReadableFile, ensureWritableDirectory } from "./file-access.ts";
import type { Logger } from "./logger.ts";
import { createLogger } from "./logger.ts";
import { extractOutlineFromPdf } from "./outline-extract.ts";
import { getOutputFileName, serializeOutline } from "./outline-json.ts";
import type { DocumentOutline } from "./pdf-types.ts";

export interface ProcessPdfDirectoryInput {
  inputDirPath: string;
  outputDirPath: string;
}

export interface ProcessedFile {
  inputPath: string;
  outputPath: string;
  headingCount: number;
}

export interface FailedFile {
  inputPath: string;
  error: Error;
}

export interface BatchResult {
  outputDirPath: string;
  processed: ProcessedFile[];
  failed: FailedFile[];
}

export interface ProcessPdfDirectoryDependencies {
  ensureOutputDir: (outputDirPath: string) => Promise<void>;
  readInputDir: (inputDirPath: string) => Promise<string[]>;
  assertReadableFile: (filePath: string) => Promise<void>;
  extractOutline: (inputPdfPath: string) => Promise<DocumentOutline>;
  writeOutput: (outputPath: string, contents: string) => Promise<void>;
  logger: Logger;
}

export function listPdfFiles(fileNames: string[]): string[] {
  return fileNames
    .filter((fileName) => fileName.toLowerCase().endsWith(".pdf"))
    .sort((left, right) => left.localeCompare(right));
}

/**
 * Files are processed one at a time. A failing file is logged and skipped;
 * only an unusable input or output directory stops the run.
 */
export async function processPdfDirectory(
  input: ProcessPdfDirectoryInput,
  dependencies?: Partial<ProcessPdfDirectoryDependencies>,
): Promise<BatchResult> {
  const deps: ProcessPdfDirectoryDependencies = { ...createDefaultDependencies(), ...dependencies };
  const inputDirPath = resolve(input.inputDirPath);
  const outputDirPath = resolve(input.outputDirPath);

  try {
    await deps.ensureOutputDir(outputDirPath);
  } catch (error: unknown) {
    throw error instanceof WriteError ? error : createWriteError(outputDirPath, error);
  }

  let fileNames: string[];
  try {
    fileNames = listPdfFiles(await deps.readInputDir(inputDirPath));
  } catch (error: unknown) {
    throw createReadError(inputDirPath, error);
  }

  deps.logger.info("Found PDF files", { inputDir: inputDirPath, count: fileNames.length });

  const result: BatchResult = { outputDirPath, processed: [], failed: [] };
  for (const fileName of fileNames) {
    const inputPath = join(inputDirPath, fileName);
    const outputPath = join(outputDirPath, getOutputFileName(fileName));
    const fileLogger = deps.logger.child({ file: fileName });

    try {
      const processed = await processPdfFile(inputPath, outputPath, deps);
      fileLogger.info("Wrote outline", { output: outputPath, headings: processed.headingCount });
      result.processed.push(processed);
    } catch (error: unknown) {
      fileLogger.error("Skipping file", { reason: describeError(error) });
      result.failed.push({ inputPath, error: toError(error) });
    }
  }

  deps.logger.info("Batch finished", {
    processed: result.processed.length,
    failed: result.failed.length,
  });
  return result;
}

async function processPdfFile(
  inputPath: string,
  outputPath: string,
  deps: ProcessPdfDirectoryDependencies,
): Promise<ProcessedFile> {
  await deps.assertReadableFile(inputPath);
  const outline = await deps.extractOutline(inputPath);
  const contents = serializeOutline(outline);

  try {
    await deps.writeOutput(outputPath, contents);
  } catch (error: unknown) {
    throw createWriteError(outputPath, error);
  }

  return { inputPath, outputPath, headingCount: outline.outline.length };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(describeError(error));
}

function createDefaultDependencies(): ProcessPdfDirectoryDependencies {
  return {
    ensureOutputDir: ensureWritableDirectory,
    readInputDir: (inputDirPath: string) => readdir(inputDirPath),
    assertReadableFile,
    extractOutline: extractOutlineFromPdf,
    writeOutput: (outputPath: string, contents: string) => writeFile(outputPath, contents, "utf8"),
    logger: createLogger(),
  };
}
