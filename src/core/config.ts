import { z } from "zod";
import { GenerationError } from "./errors";

/** Gemini accepts at most five stop sequences; the other providers accept at least as many. */
export const MAX_STOP_SEQUENCES = 5;

const generationConfigSchema = z.object({
  model: z.string().trim().min(1, "model must not be empty"),
  temperature: z.number().min(0).max(1),
  topK: z.number().int().positive().optional(),
  topP: z.number().gt(0).max(1).optional(),
  maxOutputTokens: z.number().int().positive().optional(),
  stopSequences: z
    .array(z.string().min(1, "stop sequences must not be empty"))
    .max(MAX_STOP_SEQUENCES),
});

type ConfigFields = Omit<z.infer<typeof generationConfigSchema>, "stopSequences">;

/** Sampling parameters for one request. Optional fields fall back to the provider default. */
export type GenerationConfig = Readonly<ConfigFields> & {
  readonly stopSequences: readonly string[];
};

export type GenerationConfigPatch = Partial<ConfigFields> & {
  stopSequences?: readonly string[];
};

export function defaultGenerationConfig(model: string): GenerationConfig {
  return validateGenerationConfig({ model, temperature: 0.7, stopSequences: [] });
}

/**
 * Check every field against the ranges the providers accept.
 * Out-of-range values are rejected, never clamped.
 */
export function validateGenerationConfig(value: unknown): GenerationConfig {
  const parsed = generationConfigSchema.safeParse(value);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`
    );
    throw new GenerationError(
      "MalformedRequest",
      `Invalid generation config: ${problems.join("; ")}`
    );
  }
  const config: GenerationConfig = {
    ...parsed.data,
    stopSequences: Object.freeze([...parsed.data.stopSequences]),
  };
  return Object.freeze(config);
}

/**
 * Return a new config with `patch` applied. An explicit `undefined` clears an
 * optional field. The input config is left untouched.
 */
export function updateGenerationConfig(
  config: GenerationConfig,
  patch: GenerationConfigPatch
): GenerationConfig {
  const next: Record<string, unknown> = { ...config, stopSequences: [...config.stopSequences] };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) delete next[key];
    else next[key] = value;
  }
  return validateGenerationConfig(next);
}

/** Human-readable listing for the shell's /config command. */
export function formatGenerationConfig(config: GenerationConfig): string[] {
  const orOff = (value: number | undefined) => (value === undefined ? "off" : String(value));
  return [
    `Model:             ${config.model}`,
    `Temperature:       ${config.temperature}`,
    `Top K:             ${orOff(config.topK)}`,
    `Top P:             ${orOff(config.topP)}`,
    `Max output tokens: ${orOff(config.maxOutputTokens)}`,
    `Stop sequences:    ${
      config.stopSequences.length > 0 ? config.stopSequences.map((s) => JSON.stringify(s)).join(", ") : "none"
    }`,
  ];
}
