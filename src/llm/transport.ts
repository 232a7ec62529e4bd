import { isRetryableError } from "../utils/retry.js";

export interface CompletionRequest {
  system: string;
  prompt: string;
  model: string;
  maxTokens: number;
  temperature: number;
}

export interface CompletionResponse {
  text: string;
  usage?: { promptTokens: number; completionTokens: number };
}

/**
 * One round trip to a completion endpoint. Implementations make a single
 * attempt and report failures as `TransportError`; retrying is left to the
 * caller.
 */
export interface CompletionTransport {
  readonly name: string;
  complete(
    request: CompletionRequest,
    signal?: AbortSignal
  ): Promise<CompletionResponse>;
}

export type TransportErrorKind = "network" | "http" | "aborted";

export class TransportError extends Error {
  constructor(
    message: string,
    public readonly kind: TransportErrorKind,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TransportError";
  }

  static http(status: number, message: string, cause?: unknown): TransportError {
    return new TransportError(`HTTP ${status}: ${message}`, "http", status, {
      cause,
    });
  }

  static network(message: string, cause?: unknown): TransportError {
    return new TransportError(message, "network", undefined, { cause });
  }

  static aborted(cause?: unknown): TransportError {
    return new TransportError("Request aborted", "aborted", undefined, {
      cause,
    });
  }
}

/** Network failures, 429 and 5xx are retried; other 4xx and aborts are fatal. */
export function isRetryableTransportError(error: unknown): boolean {
  if (error instanceof TransportError) {
    switch (error.kind) {
      case "network":
        return true;
      case "aborted":
        return false;
      case "http":
        return error.status === 429 || (error.status ?? 0) >= 500;
    }
  }
  return isRetryableError(error);
}
