import { textBlock, type ContentBlock } from "../content";
import { decodeUtf8, type MediaReader, type SourceFile } from "./base";

const TEXT_MIME_TYPES: Record<string, string> = {
  csv: "text/csv",
};

export class PlainTextReader implements MediaReader {
  readonly name = "text";

  async read(file: SourceFile): Promise<ContentBlock[]> {
    const mime = TEXT_MIME_TYPES[file.extension] ?? "text/plain";
    return [textBlock(decodeUtf8(file), mime, file.path)];
  }
}
