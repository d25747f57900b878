// src/cli/transpile.ts - `transpile` and `ast` command handlers

import { readFile, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { loadConfig } from "../common/config/storage.ts";
import type { TranspilerConfig } from "../common/config/types.ts";
import { ErrorReporter } from "../common/error.ts";
import { globalLogger as logger, Logger } from "../logger.ts";
import { transpile } from "../transpiler/index.ts";
import { parseSource } from "../transpiler/pipeline/parser.ts";

export interface TranspileCommandOptions {
  output?: string;
  config?: string;
  sourceMap?: boolean;
  verbose?: boolean;
  log?: string;
  time?: boolean;
  debug?: boolean;
}

export interface AstCommandOptions {
  pretty?: boolean;
  debug?: boolean;
}

const reporter = new ErrorReporter();

/**
 * Utility to time async phases and log durations
 */
async function timed<T>(category: string, label: string, fn: () => Promise<T>): Promise<T> {
  logger.startTiming(category, label);
  try {
    return await fn();
  } finally {
    logger.endTiming(category, label);
  }
}

function applyLoggingOptions(options: TranspileCommandOptions): void {
  if (options.verbose) logger.setEnabled(true);
  if (options.log) {
    Logger.setAllowedNamespaces(options.log.split(",").map((ns) => ns.trim()).filter(Boolean));
  }
  logger.setTimingOptions({ showTiming: options.time });
}

function defaultOutputPath(inputPath: string): string {
  return inputPath.endsWith(".py") ? `${inputPath.slice(0, -3)}.cpp` : `${inputPath}.cpp`;
}

/**
 * Report the error and mark the process as failed
 */
function fail(error: unknown, debug?: boolean): void {
  reporter.reportError(error, { color: process.stderr.isTTY === true, debug });
  process.exitCode = 1;
}

export async function transpileCommand(input: string, options: TranspileCommandOptions): Promise<void> {
  applyLoggingOptions(options);
  const inputPath = resolve(input);
  if (!input.endsWith(".py")) {
    logger.warn(`${input} does not end in .py`, "cli");
  }

  try {
    const config: Partial<TranspilerConfig> | undefined = options.config
      ? await timed("cli", "Config", () => loadConfig(resolve(options.config ?? "")))
      : undefined;

    const source = await timed("cli", "Read", () => readFile(inputPath, "utf8"));
    const result = await timed("cli", "Transpile", () =>
      transpile(source, {
        filePath: inputPath,
        config,
        sourceMap: options.sourceMap,
        verbose: options.verbose,
        showTiming: options.time,
      }));

    const outputPath = resolve(options.output ?? defaultOutputPath(input));
    await timed("cli", "Write", async () => {
      await writeFile(outputPath, result.code, "utf8");
      if (result.sourceMap) {
        await writeFile(`${outputPath}.map`, result.sourceMap, "utf8");
      }
    });

    logger.info(`Wrote ${outputPath}`, "cli");
    logger.logPerformance("cli", inputPath);
  } catch (error) {
    fail(error, options.debug);
  }
}

export async function astCommand(input: string, options: AstCommandOptions): Promise<void> {
  const inputPath = resolve(input);
  try {
    const source = await readFile(inputPath, "utf8");
    const module = parseSource(source, inputPath);
    console.log(JSON.stringify(module, null, options.pretty === false ? undefined : 2));
  } catch (error) {
    fail(error, options.debug);
  }
}
