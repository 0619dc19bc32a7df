import type { ContentBlock, ImageBlock } from "../content";
import type { GenerationConfig } from "../config";
import { GenerationError, type GenerationErrorKind } from "../errors";
import type { ProviderName } from "../settings";

export type FinishReason = "stop" | "length" | "content_filter" | "other";

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface GenerationResult {
  text: string;
  finishReason: FinishReason;
  model: string;
  usage?: TokenUsage;
}

export interface GenerationRequest {
  blocks: readonly ContentBlock[];
  config: GenerationConfig;
  /** Aborted by the client when its timeout elapses. */
  signal?: AbortSignal;
}

export interface LlmProvider {
  readonly name: ProviderName;
  /** One outbound request. Failures are thrown as GenerationError. */
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export function toBase64(block: ImageBlock): string {
  return Buffer.from(block.payload).toString("base64");
}

export function toDataUrl(block: ImageBlock): string {
  return `data:${block.mimeType};base64,${toBase64(block)}`;
}

/** Build the user-turn content array for OpenAI-compatible APIs, one part per block. */
export function buildOpenAIUserContent(blocks: readonly ContentBlock[]) {
  return blocks.map((block) =>
    block.kind === "image"
      ? {
          type: "image_url" as const,
          image_url: { url: toDataUrl(block), detail: "auto" as const },
        }
      : { type: "text" as const, text: block.payload }
  );
}

/** Map an HTTP status from the provider onto the error taxonomy. */
export function errorKindForStatus(status: number): GenerationErrorKind {
  if (status === 401 || status === 403) return "AuthFailure";
  if (status === 408) return "Timeout";
  if (status === 429) return "RateLimited";
  if (status >= 400 && status < 500) return "MalformedRequest";
  return "ProviderError";
}

export function errorFromStatus(
  status: number,
  message: string,
  cause?: unknown
): GenerationError {
  return new GenerationError(errorKindForStatus(status), message, { status, cause });
}

/** True for the error fetch() raises when its signal is aborted. */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
