/**
 * Typed errors surfaced by the panel.
 *
 * ValidationError          bad query or parameter, raised before any remote call
 * RetrievalError           embedding / vector search failed (fatal for routing)
 * TimeoutError             a remote call exceeded its deadline
 * ProviderError            an HTTP backend answered with an error status
 * NoRelevantAuthorsError   routing selected nobody (or too few for a debate)
 * GenerationFailedError    round 1 produced zero responses
 */

export type PanelErrorCode =
  | "VALIDATION"
  | "RETRIEVAL"
  | "TIMEOUT"
  | "PROVIDER"
  | "NO_RELEVANT_AUTHORS"
  | "GENERATION_FAILED";

export class PanelError extends Error {
  readonly code: PanelErrorCode;

  constructor(code: PanelErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PanelError";
    this.code = code;
  }
}

export class ValidationError extends PanelError {
  constructor(message: string) {
    super("VALIDATION", message);
    this.name = "ValidationError";
  }
}

export class RetrievalError extends PanelError {
  constructor(message: string, cause?: unknown) {
    super("RETRIEVAL", message, { cause });
    this.name = "RetrievalError";
  }
}

export class TimeoutError extends PanelError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super("TIMEOUT", `${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ProviderError extends PanelError {
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super("PROVIDER", message);
    this.name = "ProviderError";
    this.status = status;
  }

  /** 5xx and network-level failures are worth another attempt; 4xx are not. */
  get retryable(): boolean {
    return this.status === undefined || this.status >= 500;
  }
}

export class NoRelevantAuthorsError extends PanelError {
  constructor(message = "No relevant authors found for query") {
    super("NO_RELEVANT_AUTHORS", message);
    this.name = "NoRelevantAuthorsError";
  }
}

export class GenerationFailedError extends PanelError {
  constructor(message = "Failed to generate any responses") {
    super("GENERATION_FAILED", message);
    this.name = "GenerationFailedError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
