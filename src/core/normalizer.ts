/**
 * Orchestrates: prompt + file paths → ordered content blocks for one request.
 */

import { blockByteSize, textBlock, type ContentBlock } from "./content";
import { GenerationError, MediaReadError, PayloadTooLargeError } from "./errors";
import { silentLogger, type Logger } from "./logger";
import type { ReaderRegistry } from "./readers/registry";

export interface NormalizeOptions {
  registry: ReaderRegistry;
  /** Rethrow the first file error instead of skipping that file. */
  strict?: boolean;
  /** Reject the request when its blocks add up to more than this many bytes. */
  maxPayloadBytes?: number;
  logger?: Logger;
}

export interface FileFailure {
  path: string;
  error: MediaReadError;
}

export interface NormalizedContent {
  blocks: ContentBlock[];
  /** Files left out of `blocks`, in the order they were given. */
  failures: FileFailure[];
}

/**
 * Build `[text(prompt), ...blocks of each file]`, keeping the caller's file
 * order. A file that can't be read is reported in `failures` and skipped,
 * unless `strict` is set.
 */
export async function normalizeContent(
  prompt: string,
  paths: readonly string[],
  options: NormalizeOptions
): Promise<NormalizedContent> {
  const logger = options.logger ?? silentLogger;
  if (prompt.trim().length === 0) {
    throw new GenerationError("MalformedRequest", "Prompt must not be empty");
  }

  const blocks: ContentBlock[] = [textBlock(prompt)];
  const failures: FileFailure[] = [];

  for (const path of paths) {
    try {
      const read = await options.registry.read(path);
      logger.debug(`Read ${path} → ${read.map((b) => b.kind).join(", ")}`);
      blocks.push(...read);
    } catch (err) {
      if (!(err instanceof MediaReadError) || options.strict) throw err;
      logger.warn(`Skipping ${path}: [${err.kind}] ${err.message}`);
      failures.push({ path, error: err });
    }
  }

  if (options.maxPayloadBytes !== undefined) {
    const total = blocks.reduce((sum, block) => sum + blockByteSize(block), 0);
    if (total > options.maxPayloadBytes) {
      throw new PayloadTooLargeError(options.maxPayloadBytes, total);
    }
  }

  return { blocks, failures };
}
