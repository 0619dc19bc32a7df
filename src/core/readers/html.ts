import { parseDocument } from "htmlparser2";
import { isCDATA, isTag, isText, type AnyNode } from "domhandler";
import { textBlock, type ContentBlock } from "../content";
import { decodeUtf8, type MediaReader, type SourceFile } from "./base";

const HIDDEN_TAGS = new Set(["script", "style", "noscript", "template", "head"]);

const BLOCK_TAGS = new Set([
  "address", "article", "aside", "blockquote", "dd", "details", "div", "dl",
  "dt", "fieldset", "figcaption", "figure", "footer", "form", "h1", "h2",
  "h3", "h4", "h5", "h6", "header", "hr", "li", "main", "nav", "ol", "p",
  "pre", "section", "summary", "table", "tr", "ul",
]);

/** Reduce an HTML document to the text a reader would see. */
export function htmlToText(html: string): string {
  const doc = parseDocument(html, { decodeEntities: true });
  const chunks: string[] = [];
  walk(doc.children, chunks);
  return chunks
    .join("")
    .split("\n")
    .map((line) => line.replace(/[ \t\f\v\r]+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

function walk(nodes: AnyNode[], out: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      out.push(node.data.replace(/\s+/g, " "));
    } else if (isCDATA(node)) {
      walk(node.children, out);
    } else if (isTag(node)) {
      const name = node.name.toLowerCase();
      if (HIDDEN_TAGS.has(name)) continue;
      if (name === "br") {
        out.push("\n");
        continue;
      }
      const block = BLOCK_TAGS.has(name);
      if (block) out.push("\n");
      walk(node.children, out);
      if (block) out.push("\n");
      else if (name === "td" || name === "th") out.push(" ");
    }
  }
}

export class HtmlReader implements MediaReader {
  readonly name = "html";

  async read(file: SourceFile): Promise<ContentBlock[]> {
    return [textBlock(htmlToText(decodeUtf8(file)), "text/plain", file.path)];
  }
}
