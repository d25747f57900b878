// Core transpiler API entry point
import { TranspilerError } from "../common/error.ts";
import type { TranspilerConfig } from "../common/config/types.ts";
import { resolveConfig } from "../common/config/storage.ts";
import { globalLogger as logger } from "../logger.ts";
import { generateWithMappings } from "./pipeline/cpp-code-generator.ts";
import { parseSource } from "./pipeline/parser.ts";
import { createSourceMapJson } from "./pipeline/source-map.ts";

export interface TranspileOptions {
  /** Path of the Python source, used in errors and the source map */
  filePath?: string;
  /** Overrides merged over the default configuration */
  config?: Partial<TranspilerConfig>;
  /** Generate a source map (default: false) */
  sourceMap?: boolean;
  /** Enable verbose logging */
  verbose?: boolean;
  /** Show performance timing information */
  showTiming?: boolean;
}

export interface TranspileResult {
  code: string;
  /** Source Map v3 JSON (if sourceMap was true) */
  sourceMap?: string;
}

const DEFAULT_SOURCE_NAME = "input.py";

function outputFileName(filePath: string): string {
  return filePath.endsWith(".py") ? `${filePath.slice(0, -3)}.cpp` : `${filePath}.cpp`;
}

/**
 * Transpile Python source to C++, synchronously
 */
export function transpileSync(source: string, options: TranspileOptions = {}): TranspileResult {
  if (options.verbose) logger.setEnabled(true);
  logger.setTimingOptions({ showTiming: options.showTiming });

  const sourcePath = options.filePath ?? DEFAULT_SOURCE_NAME;
  const timingContext = `transpile:${sourcePath}`;

  try {
    const config = resolveConfig({ ...options.config });

    const module = logger.measure(timingContext, "Parse", () => parseSource(source, options.filePath));
    const { code, mappings } = logger.measure(
      timingContext,
      "Generate",
      () => generateWithMappings(module, { config, filePath: sourcePath }),
    );

    const sourceMap = options.sourceMap
      ? logger.measure(timingContext, "Source map", () =>
        createSourceMapJson(mappings, {
          sourcePath,
          outputFile: outputFileName(sourcePath),
          sourceContent: source,
        }))
      : undefined;

    logger.logPerformance(timingContext, options.filePath);
    return { code, sourceMap };
  } catch (error) {
    if (error instanceof TranspilerError) {
      throw error.withSource(source, options.filePath);
    }
    throw error;
  }
}

/**
 * Transpile Python source to C++
 *
 * @example
 * const { code } = await transpile("print(1 + 2)\n");
 */
export async function transpile(
  source: string,
  options: TranspileOptions = {},
): Promise<TranspileResult> {
  return transpileSync(source, options);
}

export { generate, generateWithMappings } from "./pipeline/cpp-code-generator.ts";
export { parse, parseSource } from "./pipeline/parser.ts";
