import { imageBlock, type ContentBlock } from "../content";
import type { MediaReader, SourceFile } from "./base";

export const IMAGE_MIME_TYPES: Record<string, string> = {
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  webp: "image/webp",
  gif: "image/gif",
  heic: "image/heic",
  heif: "image/heif",
};

/** Sends image files as-is; the provider does any scaling it needs. */
export class ImageReader implements MediaReader {
  readonly name = "image";

  async read(file: SourceFile): Promise<ContentBlock[]> {
    const mime = IMAGE_MIME_TYPES[file.extension] ?? "application/octet-stream";
    return [imageBlock(file.bytes, mime, file.path)];
  }
}
