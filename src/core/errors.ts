/**
 * Error taxonomy shared by the readers, the normalizer and the client.
 *
 * File-level kinds are reported per file and never end the session.
 * Generation kinds end the current request only. ConfigurationError is the
 * one startup failure that stops the process.
 */

export type FileErrorKind =
  | "IOFailure"
  | "UnsupportedFormat"
  | "ParseFailure"
  | "CapabilityUnavailable";

export type GenerationErrorKind =
  | "NetworkFailure"
  | "AuthFailure"
  | "RateLimited"
  | "MalformedRequest"
  | "ProviderError"
  | "Timeout";

export type ErrorKind = FileErrorKind | GenerationErrorKind | "PayloadTooLarge";

export abstract class MediaPromptError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MediaReadError extends MediaPromptError {
  readonly kind: FileErrorKind;
  readonly path: string;

  constructor(kind: FileErrorKind, path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.path = path;
  }
}

export class PayloadTooLargeError extends MediaPromptError {
  readonly kind = "PayloadTooLarge" as const;
  readonly limit: number;
  readonly actual: number;

  constructor(limit: number, actual: number) {
    super(`Payload of ${actual} bytes exceeds the limit of ${limit} bytes`);
    this.limit = limit;
    this.actual = actual;
  }
}

export class GenerationError extends MediaPromptError {
  readonly kind: GenerationErrorKind;
  /** HTTP status reported by the provider, when there was a response. */
  readonly status?: number;

  constructor(
    kind: GenerationErrorKind,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, options);
    this.kind = kind;
    this.status = options?.status;
  }
}

/** Invalid or missing startup configuration. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** One-line description for the interactive shell. */
export function describeError(err: MediaPromptError): string {
  const where = err instanceof MediaReadError ? ` (${err.path})` : "";
  return `Error [${err.kind}]${where}: ${err.message}`;
}
