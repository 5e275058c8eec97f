#!/usr/bin/env tsx

import { Command } from "commander";
import { processPdfDirectory } from "./batch.ts";
import { resolveRunConfig } from "./config.ts";
import { describeError } from "./errors.ts";
import { createLogger } from "./logger.ts";

const program = new Command();

program
  .name("pdf-outline")
  .description("Extract the title and H1-H3 outline of every PDF in ./input into ./output")
  .action(async () => {
    const config = resolveRunConfig();
    const logger = createLogger({ level: config.logLevel });
    const result = await processPdfDirectory(
      { inputDirPath: config.inputDirPath, outputDirPath: config.outputDirPath },
      { logger },
    );
    if (result.failed.length > 0) {
      logger.warn(`${result.failed.length} file(s) could not be processed`);
    }
  });

void program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${describeError(error)}`);
  process.exitCode = 1;
});
