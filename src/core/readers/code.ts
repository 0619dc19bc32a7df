import { codeBlock, type ContentBlock } from "../content";
import { decodeUtf8, type MediaReader, type SourceFile } from "./base";
import languages from "./languages.json";

/** Source-file extension → fence language tag. */
export const CODE_LANGUAGES: Readonly<Record<string, string>> = languages;

export class CodeReader implements MediaReader {
  readonly name = "code";

  async read(file: SourceFile): Promise<ContentBlock[]> {
    const language = CODE_LANGUAGES[file.extension] ?? file.extension;
    return [codeBlock(decodeUtf8(file), language, file.path)];
  }
}
