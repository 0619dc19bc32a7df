import { textBlock, type ContentBlock } from "../content";
import { decodeUtf8, type MediaReader, type SourceFile } from "./base";

/** Markdown is sent as its source text, unchanged. */
export class MarkdownReader implements MediaReader {
  readonly name = "markdown";

  async read(file: SourceFile): Promise<ContentBlock[]> {
    return [textBlock(decodeUtf8(file), "text/markdown", file.path)];
  }
}
