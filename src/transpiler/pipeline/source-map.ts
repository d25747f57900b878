/**
 * Source Map - Python → C++ line mappings as Source Map v3 JSON
 */

import { SourceMapGenerator } from "source-map";
import type { RawSourceMap } from "source-map";
import { CodeGenError } from "../../common/error.ts";
import { ErrorCode } from "../../common/error-codes.ts";
import { getErrorMessage } from "../../common/utils.ts";
import { globalLogger as logger } from "../../logger.ts";
import type { SourceMapping } from "../codegen/code-buffer.ts";

export interface SourceMapOptions {
  /** Path of the Python source, as recorded in `sources` */
  sourcePath: string;
  /** Name of the generated C++ file */
  outputFile: string;
  /** Python source to embed as `sourcesContent` */
  sourceContent?: string;
}

/**
 * Build a source map from CodeBuffer mappings.
 *
 * Generated and original lines are 1-based, columns 0-based, as the
 * source-map package expects.
 */
export function createSourceMap(mappings: SourceMapping[], options: SourceMapOptions): RawSourceMap {
  const generator = new SourceMapGenerator({ file: options.outputFile });

  if (options.sourceContent !== undefined) {
    generator.setSourceContent(options.sourcePath, options.sourceContent);
  }

  for (const mapping of mappings) {
    generator.addMapping({
      generated: mapping.generated,
      original: mapping.original,
      source: mapping.source,
      name: mapping.name ?? undefined,
    });
  }

  logger.debug(`Source map built from ${mappings.length} mappings`, "codegen");
  return generator.toJSON();
}

/**
 * Same as createSourceMap, serialized to JSON text
 */
export function createSourceMapJson(mappings: SourceMapping[], options: SourceMapOptions): string {
  try {
    return JSON.stringify(createSourceMap(mappings, options));
  } catch (error: unknown) {
    throw new CodeGenError(`Source map generation failed: ${getErrorMessage(error)}`, {
      code: ErrorCode.SOURCEMAP_GENERATION_FAILED,
      originalError: error instanceof Error ? error : undefined,
    });
  }
}
