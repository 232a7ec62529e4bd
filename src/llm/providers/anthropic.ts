import Anthropic from "@anthropic-ai/sdk";
import {
  TransportError,
  type CompletionRequest,
  type CompletionResponse,
  type CompletionTransport,
} from "../transport.js";

function toTransportError(err: unknown): unknown {
  if (err instanceof Anthropic.APIUserAbortError) {
    return TransportError.aborted(err);
  }
  if (err instanceof Anthropic.APIConnectionError) {
    return TransportError.network(err.message, err);
  }
  if (err instanceof Anthropic.APIError) {
    return typeof err.status === "number"
      ? TransportError.http(err.status, err.message, err)
      : TransportError.network(err.message, err);
  }
  return err;
}

export class AnthropicTransport implements CompletionTransport {
  readonly name = "anthropic";

  constructor(private readonly client: Anthropic) {}

  static create(options: { apiKey: string; baseURL?: string }): AnthropicTransport {
    return new AnthropicTransport(
      new Anthropic({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        maxRetries: 0,
      })
    );
  }

  async complete(
    request: CompletionRequest,
    signal?: AbortSignal
  ): Promise<CompletionResponse> {
    try {
      const response = await this.client.messages.create(
        {
          model: request.model,
          max_tokens: request.maxTokens,
          system: request.system,
          messages: [{ role: "user", content: request.prompt }],
          temperature: request.temperature,
        },
        { signal }
      );

      const content =
        response.content[0]?.type === "text" ? response.content[0].text : "";

      return {
        text: content,
        usage: {
          promptTokens: response.usage.input_tokens,
          completionTokens: response.usage.output_tokens,
        },
      };
    } catch (err) {
      throw toTransportError(err);
    }
  }
}
