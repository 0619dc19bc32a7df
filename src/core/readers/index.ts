import { CodeReader, CODE_LANGUAGES } from "./code";
import { HtmlReader } from "./html";
import { ImageReader, IMAGE_MIME_TYPES } from "./image";
import { MarkdownReader } from "./markdown";
import { PdfReader, type PdfCapabilityLoader } from "./pdf";
import { ReaderRegistry } from "./registry";
import { PlainTextReader } from "./text";

export { ReaderRegistry } from "./registry";
export type { MediaReader, SourceFile } from "./base";

export interface DefaultRegistryOptions {
  /** Replaces the mupdf loader, e.g. to run without PDF support. */
  pdfCapability?: PdfCapabilityLoader;
}

export function createDefaultRegistry(options: DefaultRegistryOptions = {}): ReaderRegistry {
  return new ReaderRegistry()
    .register(Object.keys(CODE_LANGUAGES), new CodeReader())
    .register(Object.keys(IMAGE_MIME_TYPES), new ImageReader())
    .register(["pdf"], new PdfReader(options.pdfCapability))
    .register(["md", "markdown"], new MarkdownReader())
    .register(["html", "htm"], new HtmlReader())
    .register(["txt", "text", "log", "csv"], new PlainTextReader());
}
