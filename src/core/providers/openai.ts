import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from "openai";
import { GenerationError } from "../errors";
import type { ProviderName } from "../settings";
import {
  buildOpenAIUserContent,
  errorFromStatus,
  messageOf,
  type FinishReason,
  type GenerationRequest,
  type GenerationResult,
  type LlmProvider,
} from "./base";

const FINISH_REASONS: Record<string, FinishReason> = {
  stop: "stop",
  length: "length",
  content_filter: "content_filter",
};

/** Chat Completions API. Also serves OpenAI-compatible servers through `baseURL`. */
export class OpenAIProvider implements LlmProvider {
  readonly name: ProviderName = "openai";
  private client: OpenAI;

  constructor(apiKey: string, baseURL?: string) {
    this.client = new OpenAI({ apiKey, baseURL, maxRetries: 0 });
  }

  async generate({ blocks, config, signal }: GenerationRequest): Promise<GenerationResult> {
    let response: OpenAI.Chat.ChatCompletion;
    try {
      // No top-k parameter on this API; config.topK is not sent.
      response = await this.client.chat.completions.create(
        {
          model: config.model,
          messages: [{ role: "user", content: buildOpenAIUserContent(blocks) }],
          temperature: config.temperature,
          top_p: config.topP,
          max_tokens: config.maxOutputTokens,
          stop: config.stopSequences.length > 0 ? [...config.stopSequences] : undefined,
        },
        { signal }
      );
    } catch (err) {
      throw toGenerationError(err);
    }

    const choice = response.choices[0];
    if (!choice) {
      throw new GenerationError("ProviderError", "Unexpected response: no choices returned");
    }
    return {
      text: choice.message?.content ?? "",
      finishReason: FINISH_REASONS[choice.finish_reason] ?? "other",
      model: response.model || config.model,
      usage: response.usage
        ? {
            inputTokens: response.usage.prompt_tokens,
            outputTokens: response.usage.completion_tokens,
          }
        : undefined,
    };
  }
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
