import type { ContentBlock } from "../content";
import { MediaReadError } from "../errors";

/** A file handed to a reader: its path, lower-cased extension (no dot) and raw bytes. */
export interface SourceFile {
  path: string;
  extension: string;
  bytes: Uint8Array;
}

export interface MediaReader {
  /** Short format name used in log lines, e.g. "pdf". */
  readonly name: string;
  read(file: SourceFile): Promise<ContentBlock[]>;
}

/**
 * Decode a file as UTF-8, dropping a leading byte-order mark. Bytes that are
 * not valid UTF-8 fail with ParseFailure.
 */
export function decodeUtf8(file: SourceFile): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(file.bytes);
  } catch (err) {
    throw new MediaReadError("ParseFailure", file.path, "File is not valid UTF-8 text", {
      cause: err,
    });
  }
}
