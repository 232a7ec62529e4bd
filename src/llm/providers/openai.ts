import OpenAI, { AzureOpenAI } from "openai";
import {
  TransportError,
  type CompletionRequest,
  type CompletionResponse,
  type CompletionTransport,
} from "../transport.js";

function toTransportError(err: unknown): unknown {
  if (err instanceof OpenAI.APIUserAbortError) {
    return TransportError.aborted(err);
  }
  // Also covers APIConnectionTimeoutError.
  if (err instanceof OpenAI.APIConnectionError) {
    return TransportError.network(err.message, err);
  }
  if (err instanceof OpenAI.APIError) {
    return typeof err.status === "number"
      ? TransportError.http(err.status, err.message, err)
      : TransportError.network(err.message, err);
  }
  return err;
}

export class OpenAITransport implements CompletionTransport {
  constructor(
    private readonly client: OpenAI,
    readonly name: string = "openai"
  ) {}

  static create(options: { apiKey: string; baseURL?: string }): OpenAITransport {
    return new OpenAITransport(
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        maxRetries: 0,
      })
    );
  }

  static azure(options: {
    endpoint: string;
    apiKey: string;
    apiVersion: string;
    deployment: string;
  }): OpenAITransport {
    return new OpenAITransport(
      new AzureOpenAI({
        endpoint: options.endpoint,
        apiKey: options.apiKey,
        apiVersion: options.apiVersion,
        deployment: options.deployment,
        maxRetries: 0,
      }),
      "azure-openai"
    );
  }

  async complete(
    request: CompletionRequest,
    signal?: AbortSignal
  ): Promise<CompletionResponse> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: request.model,
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.prompt },
          ],
          max_tokens: request.maxTokens,
          temperature: request.temperature,
        },
        { signal }
      );

      return {
        text: response.choices[0]?.message?.content ?? "",
        usage: response.usage
          ? {
              promptTokens: response.usage.prompt_tokens,
              completionTokens: response.usage.completion_tokens,
            }
          : undefined,
      };
    } catch (err) {
      throw toTransportError(err);
    }
  }
}
