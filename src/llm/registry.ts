import { ConfigError } from "../errors.js";
import type { LLMProvider } from "./types.js";
import type { CompletionTransport } from "./transport.js";
import {
  CompletionReviewProvider,
  type CompletionProviderOptions,
} from "./completion-provider.js";
import { OpenAITransport } from "./providers/openai.js";
import { AnthropicTransport } from "./providers/anthropic.js";
import { GeminiTransport } from "./providers/gemini.js";

export interface ProviderCredentials {
  apiKey: string;
  /** Azure resource endpoint, or a base URL override for other vendors. */
  endpoint?: string;
  /** Azure only. */
  apiVersion?: string;
  /** Model or deployment name. */
  model: string;
}

type TransportFactory = (credentials: ProviderCredentials) => CompletionTransport;

function requireEndpoint(credentials: ProviderCredentials): string {
  if (!credentials.endpoint) {
    throw new ConfigError(["AZURE_OPENAI_ENDPOINT: Required"]);
  }
  return credentials.endpoint;
}

const transports = new Map<string, TransportFactory>([
  [
    "azure-openai",
    (c) =>
      OpenAITransport.azure({
        endpoint: requireEndpoint(c),
        apiKey: c.apiKey,
        apiVersion: c.apiVersion ?? "2024-02-15-preview",
        deployment: c.model,
      }),
  ],
  ["openai", (c) => OpenAITransport.create({ apiKey: c.apiKey, baseURL: c.endpoint })],
  [
    "anthropic",
    (c) => AnthropicTransport.create({ apiKey: c.apiKey, baseURL: c.endpoint }),
  ],
  ["gemini", (c) => GeminiTransport.create({ apiKey: c.apiKey })],
]);

export function createProvider(
  name: string,
  credentials: ProviderCredentials,
  options?: CompletionProviderOptions
): LLMProvider {
  const factory = transports.get(name);
  if (!factory) {
    throw new ConfigError([`AI_PROVIDER: Unknown LLM provider: ${name}`]);
  }
  return new CompletionReviewProvider(factory(credentials), options);
}

export function listProviders(): string[] {
  return Array.from(transports.keys());
}
