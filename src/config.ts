import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.ts";
import type { LogLevel } from "./logger.ts";
import { LOG_LEVELS } from "./logger.ts";

export const INPUT_DIR_NAME = "input";
export const OUTPUT_DIR_NAME = "output";
export const LOG_LEVEL_ENV = "PDF_OUTLINE_LOG_LEVEL";

const RunEnvironmentSchema = z.object({
  [LOG_LEVEL_ENV]: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface RunConfig {
  inputDirPath: string;
  outputDirPath: string;
  logLevel: LogLevel;
}

/**
 * The run always reads `./input` and writes `./output` under the working
 * directory. Only the log verbosity can be changed, through the environment.
 */
export function resolveRunConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): RunConfig {
  const result = RunEnvironmentSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`${LOG_LEVEL_ENV} must be one of ${LOG_LEVELS.join(", ")}`);
  }

  return {
    inputDirPath: resolve(cwd, INPUT_DIR_NAME),
    outputDirPath: resolve(cwd, OUTPUT_DIR_NAME),
    logLevel: result.data[LOG_LEVEL_ENV],
  };
}
