import { ApiError, GoogleGenAI, type GenerateContentResponse, type Part } from "@google/genai";
import type { ContentBlock } from "../content";
import { GenerationError } from "../errors";
import type { ProviderName } from "../settings";
import {
  errorFromStatus,
  isAbortError,
  messageOf,
  toBase64,
  type FinishReason,
  type GenerationRequest,
  type GenerationResult,
  type LlmProvider,
} from "./base";

const FINISH_REASONS: Record<string, FinishReason> = {
  STOP: "stop",
  MAX_TOKENS: "length",
  SAFETY: "content_filter",
  RECITATION: "content_filter",
  BLOCKLIST: "content_filter",
  PROHIBITED_CONTENT: "content_filter",
  SPII: "content_filter",
  IMAGE_SAFETY: "content_filter",
};

export function toGeminiParts(blocks: readonly ContentBlock[]): Part[] {
  return blocks.map((block) =>
    block.kind === "image"
      ? { inlineData: { mimeType: block.mimeType, data: toBase64(block) } }
      : { text: block.payload }
  );
}

export class GeminiProvider implements LlmProvider {
  readonly name: ProviderName = "gemini";
  private client: GoogleGenAI;

  constructor(apiKey: string) {
    this.client = new GoogleGenAI({ apiKey });
  }

  async generate({ blocks, config, signal }: GenerationRequest): Promise<GenerationResult> {
    let response: GenerateContentResponse;
    try {
      response = await this.client.models.generateContent({
        model: config.model,
        contents: [{ role: "user", parts: toGeminiParts(blocks) }],
        config: {
          temperature: config.temperature,
          topK: config.topK,
          topP: config.topP,
          maxOutputTokens: config.maxOutputTokens,
          stopSequences: config.stopSequences.length > 0 ? [...config.stopSequences] : undefined,
          abortSignal: signal,
        },
      });
    } catch (err) {
      throw toGenerationError(err);
    }

    const usage = response.usageMetadata
      ? {
          inputTokens: response.usageMetadata.promptTokenCount ?? 0,
          outputTokens: response.usageMetadata.candidatesTokenCount ?? 0,
        }
      : undefined;
    const model = response.modelVersion || config.model;

    const candidate = response.candidates?.[0];
    if (!candidate) {
      // A prompt blocked by safety filters comes back without candidates.
      if (response.promptFeedback?.blockReason) {
        return { text: "", finishReason: "content_filter", model, usage };
      }
      throw new GenerationError("ProviderError", "Unexpected response: no candidates returned");
    }

    return {
      text: response.text ?? "",
      finishReason: (candidate.finishReason && FINISH_REASONS[candidate.finishReason]) || "other",
      model,
      usage,
    };
  }
}

export function toGenerationError(err: unknown): GenerationError {
  if (err instanceof ApiError) {
    return errorFromStatus(err.status, err.message, err);
  }
  if (isAbortError(err)) {
    return new GenerationError("Timeout", "Request was aborted", { cause: err });
  }
  // fetch() reports DNS, connection and TLS failures as a TypeError.
  if (err instanceof TypeError) {
    return new GenerationError("NetworkFailure", err.message, { cause: err });
  }
  return new GenerationError("ProviderError", messageOf(err), { cause: err });
}
