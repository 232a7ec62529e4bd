import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
} from "@google/generative-ai";
import {
  TransportError,
  type CompletionRequest,
  type CompletionResponse,
  type CompletionTransport,
} from "../transport.js";

export class GeminiTransport implements CompletionTransport {
  readonly name = "gemini";

  constructor(private readonly genAI: GoogleGenerativeAI) {}

  static create(options: { apiKey: string }): GeminiTransport {
    return new GeminiTransport(new GoogleGenerativeAI(options.apiKey));
  }

  async complete(
    request: CompletionRequest,
    signal?: AbortSignal
  ): Promise<CompletionResponse> {
    const genModel = this.genAI.getGenerativeModel({
      model: request.model,
      systemInstruction: request.system,
      generationConfig: {
        maxOutputTokens: request.maxTokens,
        temperature: request.temperature,
      },
    });

    try {
      const result = await genModel.generateContent(request.prompt, { signal });
      const response = result.response;
      const usage = response.usageMetadata;

      return {
        text: response.text(),
        usage: usage
          ? {
              promptTokens: usage.promptTokenCount ?? 0,
              completionTokens: usage.candidatesTokenCount ?? 0,
            }
          : undefined,
      };
    } catch (err) {
      if (signal?.aborted) {
        throw TransportError.aborted(err);
      }
      if (err instanceof GoogleGenerativeAIFetchError && err.status !== undefined) {
        throw TransportError.http(err.status, err.message, err);
      }
      throw err;
    }
  }
}
