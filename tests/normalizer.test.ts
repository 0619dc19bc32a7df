import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { GenerationError, MediaReadError, PayloadTooLargeError } from "../src/core/errors";
import type { Logger } from "../src/core/logger";
import { normalizeContent } from "../src/core/normalizer";
import { createDefaultRegistry } from "../src/core/readers";
import { makeTempDir, PNG_BYTES, type TempDir } from "./fixtures";

/** PDFs whose first byte is "%" parse; anything else fails like a corrupt file. */
const registry = createDefaultRegistry({
  pdfCapability: async () => ({
    available: true,
    engine: {
      extractPages(bytes) {
        if (bytes[0] !== 0x25) throw new Error("not a PDF");
        return ["pdf text"];
      },
    },
  }),
});

let dir: TempDir;

beforeEach(() => {
  dir = makeTempDir();
});

afterEach(() => {
  dir.cleanup();
});

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    debug: vi.fn(),
    info: vi.fn(),
    warn: (message: string) => {
      warnings.push(message);
    },
    error: vi.fn(),
  };
}

describe("normalizeContent", () => {
  it("puts the prompt first and keeps the file order", async () => {
    const a = dir.write("a.png", PNG_BYTES);
    const b = dir.write("b.md", "# Notes");
    const { blocks, failures } = await normalizeContent("describe", [a, b], { registry });

    expect(failures).toEqual([]);
    expect(blocks.map((block) => [block.kind, block.mimeType, block.sourcePath])).toEqual([
      ["text", "text/plain", undefined],
      ["image", "image/png", a],
      ["text", "text/markdown", b],
    ]);
    expect(blocks[0].payload).toBe("describe");
    expect(blocks[2].payload).toBe("# Notes");
  });

  it("sends the prompt alone when no files are given", async () => {
    const { blocks } = await normalizeContent("hello", [], { registry });
    expect(blocks).toEqual([{ kind: "text", payload: "hello", mimeType: "text/plain" }]);
  });

  it("skips a malformed PDF and reports it", async () => {
    const bad = dir.write("broken.pdf", "garbage");
    const logger = recordingLogger();
    const { blocks, failures } = await normalizeContent("summarize", [bad], { registry, logger });

    expect(blocks).toHaveLength(1);
    expect(blocks[0].payload).toBe("summarize");
    expect(failures).toHaveLength(1);
    expect(failures[0].path).toBe(bad);
    expect(failures[0].error.kind).toBe("ParseFailure");
    expect(logger.warnings).toEqual([`Skipping ${bad}: [ParseFailure] Cannot parse PDF: not a PDF`]);
  });

  it("keeps the files that did read around one that failed", async () => {
    const good = dir.write("good.pdf", "%PDF-1.4");
    const missing = `${dir.path}/missing.txt`;
    const code = dir.write("x.ts", "export {};\n");
    const { blocks, failures } = await normalizeContent("go", [good, missing, code], { registry });

    expect(blocks.map((block) => block.payload)).toEqual([
      "go",
      "[Page 1]\npdf text",
      "```typescript\nexport {};\n```",
    ]);
    expect(failures.map((f) => [f.path, f.error.kind])).toEqual([[missing, "IOFailure"]]);
  });

  it("rethrows the first file error in strict mode", async () => {
    const bad = dir.write("broken.pdf", "garbage");
    const unsupported = dir.write("tool.exe", "MZ");
    const pending = normalizeContent("summarize", [unsupported, bad], { registry, strict: true });
    await expect(pending).rejects.toBeInstanceOf(MediaReadError);
    await expect(pending).rejects.toMatchObject({ kind: "UnsupportedFormat", path: unsupported });
  });

  it.each(["", "   ", "\n\t"])("rejects the blank prompt %j", async (prompt) => {
    const pending = normalizeContent(prompt, [], { registry });
    await expect(pending).rejects.toBeInstanceOf(GenerationError);
    await expect(pending).rejects.toMatchObject({
      kind: "MalformedRequest",
      message: "Prompt must not be empty",
    });
  });

  it("rejects a request larger than maxPayloadBytes", async () => {
    const image = dir.write("big.png", new Uint8Array(100));
    const pending = normalizeContent("abc", [image], { registry, maxPayloadBytes: 102 });
    await expect(pending).rejects.toBeInstanceOf(PayloadTooLargeError);
    await expect(pending).rejects.toMatchObject({
      limit: 102,
      actual: 103,
      message: "Payload of 103 bytes exceeds the limit of 102 bytes",
    });
  });

  it("accepts a request exactly at the limit", async () => {
    const image = dir.write("big.png", new Uint8Array(100));
    const { blocks } = await normalizeContent("abc", [image], { registry, maxPayloadBytes: 103 });
    expect(blocks).toHaveLength(2);
  });
});
