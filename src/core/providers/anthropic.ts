import Anthropic, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from "@anthropic-ai/sdk";
import type { ImageBlock } from "../content";
import { GenerationError } from "../errors";
import type { ProviderName } from "../settings";
import {
  errorFromStatus,
  messageOf,
  toBase64,
  type FinishReason,
  type GenerationRequest,
  type GenerationResult,
  type LlmProvider,
} from "./base";

/** max_tokens is mandatory on this API. */
const DEFAULT_MAX_TOKENS = 4096;

type AnthropicImageType = "image/png" | "image/jpeg" | "image/webp" | "image/gif";

const IMAGE_TYPES: Record<string, AnthropicImageType> = {
  "image/png": "image/png",
  "image/jpeg": "image/jpeg",
  "image/webp": "image/webp",
  "image/gif": "image/gif",
};

const FINISH_REASONS: Record<string, FinishReason> = {
  end_turn: "stop",
  stop_sequence: "stop",
  max_tokens: "length",
  refusal: "content_filter",
};

export class AnthropicProvider implements LlmProvider {
  readonly name: ProviderName = "anthropic";
  private client: Anthropic;

  constructor(apiKey: string) {
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
  }

  async generate({ blocks, config, signal }: GenerationRequest): Promise<GenerationResult> {
    const content: Anthropic.MessageParam["content"] = blocks.map((block) =>
      block.kind === "image"
        ? {
            type: "image" as const,
            source: { type: "base64" as const, media_type: imageType(block), data: toBase64(block) },
          }
        : { type: "text" as const, text: block.payload }
    );

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: config.model,
          max_tokens: config.maxOutputTokens ?? DEFAULT_MAX_TOKENS,
          temperature: config.temperature,
          top_k: config.topK,
          top_p: config.topP,
          stop_sequences: config.stopSequences.length > 0 ? [...config.stopSequences] : undefined,
          messages: [{ role: "user", content }],
        },
        { signal }
      );
    } catch (err) {
      throw toGenerationError(err);
    }

    let text = "";
    for (const block of response.content) {
      if (block.type === "text") text += block.text;
    }
    return {
      text,
      finishReason: (response.stop_reason && FINISH_REASONS[response.stop_reason]) || "other",
      model: response.model || config.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }
}

function imageType(block: ImageBlock): AnthropicImageType {
  const type = IMAGE_TYPES[block.mimeType];
  if (!type) {
    throw new GenerationError(
      "MalformedRequest",
      `Anthropic does not accept ${block.mimeType} images${block.sourcePath ? ` (${block.sourcePath})` : ""}`
    );
  }
  return type;
}

export function toGenerationError(err: unknown): GenerationError {
  if (err instanceof APIUserAbortError) {
    return new GenerationError("Timeout", "Request was aborted", { cause: err });
  }
  if (err instanceof APIConnectionTimeoutError) {
    return new GenerationError("Timeout", err.message, { cause: err });
  }
  if (err instanceof APIConnectionError) {
    return new GenerationError("NetworkFailure", err.message, { cause: err });
  }
  if (err instanceof APIError && err.status !== undefined) {
    return errorFromStatus(err.status, err.message, err);
  }
  return new GenerationError("ProviderError", messageOf(err), { cause: err });
}
