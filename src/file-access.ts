import { constants } from "node:fs";
import { access, mkdir } from "node:fs/promises";
import { createReadError, createWriteError } from "./errors.ts";

export async function assertReadableFile(filePath: string): Promise<void> {
  try {
    await access(filePath, constants.R_OK);
  } catch (error: unknown) {
    throw createReadError(filePath, error);
  }
}

export async function ensureWritableDirectory(dirPath: string): Promise<void> {
  try {
    await mkdir(dirPath, { recursive: true });
    await access(dirPath, constants.W_OK);
  } catch (error: unknown) {
    throw createWriteError(dirPath, error);
  }
}
