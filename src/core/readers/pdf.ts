/**
 * PDF text extraction. mupdf (WASM, no native build) is loaded on first use;
 * when it can't be loaded every PDF read fails with CapabilityUnavailable.
 */

import { textBlock, type ContentBlock } from "../content";
import { MediaReadError } from "../errors";
import type { MediaReader, SourceFile } from "./base";

export interface PdfTextEngine {
  /** Plain text of every page, in page order. */
  extractPages(bytes: Uint8Array): string[];
}

export type PdfCapability =
  | { available: true; engine: PdfTextEngine }
  | { available: false; reason: string };

export type PdfCapabilityLoader = () => Promise<PdfCapability>;

export async function loadMupdfCapability(): Promise<PdfCapability> {
  let mupdf: typeof import("mupdf");
  try {
    mupdf = await import("mupdf");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { available: false, reason: `mupdf could not be loaded: ${reason}` };
  }

  return {
    available: true,
    engine: {
      extractPages(bytes) {
        const doc = mupdf.Document.openDocument(bytes, "application/pdf");
        const pages: string[] = [];
        try {
          const pageCount = doc.countPages();
          for (let i = 0; i < pageCount; i++) {
            const page = doc.loadPage(i);
            try {
              const stext = page.toStructuredText("");
              try {
                pages.push(stext.asText());
              } finally {
                stext.destroy();
              }
            } finally {
              page.destroy();
            }
          }
        } finally {
          doc.destroy();
        }
        return pages;
      },
    },
  };
}

/** Page texts each headed by a `[Page N]` marker, separated by blank lines. */
export function joinPages(pages: string[]): string {
  return pages.map((text, i) => `[Page ${i + 1}]\n${text.trim()}`).join("\n\n");
}

export class PdfReader implements MediaReader {
  readonly name = "pdf";
  private loadCapability: PdfCapabilityLoader;
  private capability?: Promise<PdfCapability>;

  constructor(loadCapability: PdfCapabilityLoader = loadMupdfCapability) {
    this.loadCapability = loadCapability;
  }

  async read(file: SourceFile): Promise<ContentBlock[]> {
    this.capability ??= this.loadCapability();
    const capability = await this.capability;
    if (!capability.available) {
      throw new MediaReadError(
        "CapabilityUnavailable",
        file.path,
        `PDF support is not available: ${capability.reason}`
      );
    }

    let pages: string[];
    try {
      pages = capability.engine.extractPages(file.bytes);
    } catch (err) {
      throw new MediaReadError(
        "ParseFailure",
        file.path,
        `Cannot parse PDF: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
    if (pages.length === 0) {
      throw new MediaReadError("ParseFailure", file.path, "PDF has no pages");
    }

    return [textBlock(joinPages(pages), "application/pdf", file.path)];
  }
}
