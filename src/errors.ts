export abstract class OutlineError extends Error {
  readonly filePath: string | undefined;

  constructor(message: string, filePath?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.filePath = filePath;
  }
}

/** The input PDF or the input directory could not be read. */
export class FileReadError extends OutlineError {}

/** The PDF parser rejected the document (corrupt, encrypted or malformed). */
export class ParseError extends OutlineError {}

/** The output directory or an output file could not be written. */
export class WriteError extends OutlineError {}

export class ConfigError extends OutlineError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unknown error";
}

export function createReadError(filePath: string, error: unknown): FileReadError {
  return new FileReadError(`Cannot read input PDF: ${filePath}`, filePath, error);
}

export function createParseError(filePath: string, error: unknown): ParseError {
  const detail = describeError(error);
  return new ParseError(`Failed to parse PDF ${filePath}: ${detail}`, filePath, error);
}

export function createWriteError(filePath: string, error: unknown): WriteError {
  const reason = getErrorCode(error) ?? describeError(error);
  return new WriteError(`Cannot write output: ${filePath} (${reason})`, filePath, error);
}

export function getErrorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}
