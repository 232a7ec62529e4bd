import { ProviderError } from "../errors.js";
import { logger } from "../logger.js";
import { parseReviewResponse } from "../review/parser.js";
import { withRetry, type Sleep } from "../utils/retry.js";
import { buildReviewPrompt } from "./prompts.js";
import {
  isRetryableTransportError,
  type CompletionResponse,
  type CompletionTransport,
} from "./transport.js";
import type {
  LLMProvider,
  PullRequestData,
  ReviewConfiguration,
  ReviewResult,
} from "./types.js";

export interface CompletionProviderOptions {
  /** Replaces the timer between attempts, e.g. with a fake clock. */
  sleep?: Sleep;
}

/**
 * Reviews a pull request through any completion endpoint: builds the prompt,
 * calls the transport with exponential backoff and parses the answer.
 */
export class CompletionReviewProvider implements LLMProvider {
  readonly name: string;

  constructor(
    private readonly transport: CompletionTransport,
    private readonly options: CompletionProviderOptions = {}
  ) {
    this.name = transport.name;
  }

  async analyze(
    pr: PullRequestData,
    config: ReviewConfiguration,
    signal?: AbortSignal
  ): Promise<ReviewResult> {
    const log = logger.withContext({ pr: pr.number, provider: this.name });
    const { system, prompt } = buildReviewPrompt(pr, config);

    log.debug("Prompt built", { promptChars: prompt.length });

    let attempts = 0;
    let response: CompletionResponse;
    try {
      response = await withRetry(
        () =>
          this.transport.complete(
            {
              system,
              prompt,
              model: config.model,
              maxTokens: config.maxTokens,
              temperature: config.temperature,
            },
            signal
          ),
        {
          maxAttempts: config.maxRetries,
          initialDelayMs: config.baseDelayMs,
          maxDelayMs: config.maxDelayMs,
          shouldRetry: isRetryableTransportError,
          sleep: this.options.sleep,
          signal,
          onStateChange: (state) => {
            if (state.kind === "attempting") {
              attempts = state.attempt;
              log.debug("Calling completion endpoint", { attempt: attempts });
            }
          },
        }
      );
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const message = signal?.aborted
        ? `Review cancelled: ${detail}`
        : isRetryableTransportError(err)
          ? `All ${attempts} attempt(s) failed: ${detail}`
          : `Request failed: ${detail}`;

      log.error("Completion request failed", { attempts, error: detail });
      throw new ProviderError(message, this.name, attempts, { cause: err });
    }

    if (response.usage) {
      log.info("Completion received", {
        attempts,
        promptTokens: response.usage.promptTokens,
        completionTokens: response.usage.completionTokens,
      });
    }

    const { degraded, ...result } = parseReviewResponse(response.text);
    if (degraded) {
      log.warn("Response was not structured, using fallback review", {
        responseChars: response.text.length,
      });
    }

    return result;
  }
}
