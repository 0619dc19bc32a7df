/**
 * Extension → reader table. New formats register here instead of growing a
 * chain of suffix checks.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import type { ContentBlock } from "../content";
import { MediaReadError } from "../errors";
import type { MediaReader, SourceFile } from "./base";

export class ReaderRegistry {
  private readers = new Map<string, MediaReader>();

  /** Map each extension (with or without the leading dot) to `reader`. Later calls win. */
  register(extensions: Iterable<string>, reader: MediaReader): this {
    for (const ext of extensions) {
      this.readers.set(normalizeExtension(ext), reader);
    }
    return this;
  }

  extensions(): string[] {
    return [...this.readers.keys()].sort();
  }

  /** Reader for `path`, or UnsupportedFormat. Never touches the file system. */
  resolve(path: string): MediaReader {
    const extension = extensionOf(path);
    const reader = extension ? this.readers.get(extension) : undefined;
    if (!reader) {
      throw new MediaReadError(
        "UnsupportedFormat",
        path,
        extension ? `Unsupported file extension: .${extension}` : "File has no extension"
      );
    }
    return reader;
  }

  async read(path: string): Promise<ContentBlock[]> {
    const reader = this.resolve(path);
    let bytes: Uint8Array;
    try {
      bytes = await readFile(path);
    } catch (err) {
      throw new MediaReadError("IOFailure", path, `Cannot read file: ${describe(err)}`, {
        cause: err,
      });
    }
    return reader.read({ path, extension: extensionOf(path), bytes });
  }

  /** Same dispatch as read() for content already in memory; `name` supplies the extension. */
  async readBytes(name: string, bytes: Uint8Array): Promise<ContentBlock[]> {
    const reader = this.resolve(name);
    const file: SourceFile = { path: name, extension: extensionOf(name), bytes };
    return reader.read(file);
  }
}

function normalizeExtension(ext: string): string {
  return ext.replace(/^\./, "").toLowerCase();
}

function extensionOf(path: string): string {
  return normalizeExtension(extname(path));
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
