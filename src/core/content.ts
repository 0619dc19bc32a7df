/**
 * Typed content blocks submitted, in order, as one generation request.
 * Blocks are frozen on construction and live for a single request.
 */

export interface TextBlock {
  readonly kind: "text";
  readonly payload: string;
  readonly mimeType: string;
  readonly sourcePath?: string;
}

export interface ImageBlock {
  readonly kind: "image";
  /** Copy of the raw file bytes, never resized or re-encoded. */
  readonly payload: Uint8Array;
  readonly mimeType: string;
  readonly sourcePath?: string;
}

export interface CodeBlock {
  readonly kind: "code";
  /** Source wrapped in a fence annotated with `language`. */
  readonly payload: string;
  readonly mimeType: string;
  readonly language: string;
  readonly sourcePath?: string;
}

export type ContentBlock = TextBlock | ImageBlock | CodeBlock;

export function textBlock(
  payload: string,
  mimeType = "text/plain",
  sourcePath?: string
): TextBlock {
  const block: TextBlock = { kind: "text", payload, mimeType, ...withSource(sourcePath) };
  return Object.freeze(block);
}

export function imageBlock(payload: Uint8Array, mimeType: string, sourcePath?: string): ImageBlock {
  const block: ImageBlock = {
    kind: "image",
    payload: new Uint8Array(payload),
    mimeType,
    ...withSource(sourcePath),
  };
  return Object.freeze(block);
}

/**
 * Wrap source code in a fenced block. The fence is one backtick longer than
 * the longest backtick run inside the source (never shorter than three), so
 * the source can't close it early. The source itself is kept byte for byte.
 */
export function codeBlock(source: string, language: string, sourcePath?: string): CodeBlock {
  const longestRun = Math.max(0, ...(source.match(/`+/g) ?? []).map((run) => run.length));
  const fence = "`".repeat(Math.max(3, longestRun + 1));
  const body = source.endsWith("\n") ? source : `${source}\n`;
  const block: CodeBlock = {
    kind: "code",
    payload: `${fence}${language}\n${body}${fence}`,
    mimeType: `text/x-${language}`,
    language,
    ...withSource(sourcePath),
  };
  return Object.freeze(block);
}

/** Size the block contributes to a request: UTF-8 bytes for text, raw bytes for images. */
export function blockByteSize(block: ContentBlock): number {
  return block.kind === "image"
    ? block.payload.byteLength
    : Buffer.byteLength(block.payload, "utf8");
}

function withSource(sourcePath: string | undefined): { sourcePath?: string } {
  return sourcePath === undefined ? {} : { sourcePath };
}
