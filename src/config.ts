import { z } from "zod";
import { ConfigError } from "./errors.js";
import { listProviders, type ProviderCredentials } from "./llm/registry.js";
import {
  DEFAULT_REVIEW_CONFIGURATION,
  type ReviewConfiguration,
} from "./llm/types.js";

const DEFAULT_MODELS: Record<string, string> = {
  "azure-openai": "gpt-4",
  openai: "gpt-4o-mini",
  anthropic: "claude-3-5-sonnet-latest",
  gemini: "gemini-1.5-pro",
};

const envSchema = z
  .object({
    AI_PROVIDER: z.string().default("azure-openai"),
    AZURE_OPENAI_ENDPOINT: z.string().url().optional(),
    AZURE_OPENAI_API_KEY: z.string().min(1).optional(),
    AZURE_OPENAI_DEPLOYMENT_NAME: z.string().min(1).optional(),
    AZURE_OPENAI_API_VERSION: z.string().min(1).default("2024-02-15-preview"),
    AI_API_KEY: z.string().min(1).optional(),
    AI_MODEL: z.string().min(1).optional(),
    AI_BASE_URL: z.string().url().optional(),
    MAX_TOKENS: z.coerce.number().int().positive().default(DEFAULT_REVIEW_CONFIGURATION.maxTokens),
    TEMPERATURE: z.coerce.number().min(0).max(1).default(DEFAULT_REVIEW_CONFIGURATION.temperature),
    MAX_RETRIES: z.coerce.number().int().positive().default(DEFAULT_REVIEW_CONFIGURATION.maxRetries),
    RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(DEFAULT_REVIEW_CONFIGURATION.baseDelayMs),
    RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(DEFAULT_REVIEW_CONFIGURATION.maxDelayMs),
    MAX_FILES: z.coerce.number().int().positive().default(DEFAULT_REVIEW_CONFIGURATION.maxFiles),
    MAX_PATCH_SIZE: z.coerce.number().int().positive().default(DEFAULT_REVIEW_CONFIGURATION.maxPatchChars),
    REVIEW_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
    GITHUB_TOKEN: z.string().min(1).optional(),
    GITHUB_REPOSITORY: z
      .string()
      .regex(/^[^/\s]+\/[^/\s]+$/, "Must be in owner/repo format")
      .optional(),
    GITHUB_EVENT_PATH: z.string().min(1).optional(),
    GITHUB_OUTPUT: z.string().min(1).optional(),
    POST_COMMENT: z.enum(["true", "false"]).default("true"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  })
  .superRefine((env, ctx) => {
    if (!listProviders().includes(env.AI_PROVIDER)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["AI_PROVIDER"],
        message: `Must be one of: ${listProviders().join(", ")}`,
      });
      return;
    }
    if (env.AI_PROVIDER === "azure-openai") {
      if (!env.AZURE_OPENAI_ENDPOINT) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["AZURE_OPENAI_ENDPOINT"],
          message: "Required",
        });
      }
      if (!env.AZURE_OPENAI_API_KEY) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["AZURE_OPENAI_API_KEY"],
          message: "Required",
        });
      }
    } else if (!env.AI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["AI_API_KEY"],
        message: `Required for provider ${env.AI_PROVIDER}`,
      });
    }
  });

type Env = z.infer<typeof envSchema>;

export interface RepositoryRef {
  owner: string;
  repo: string;
}

export interface AppConfig {
  provider: string;
  credentials: ProviderCredentials;
  review: ReviewConfiguration;
  timeoutMs: number;
  postComment: boolean;
  github: {
    token?: string;
    repository?: RepositoryRef;
    eventPath?: string;
    outputPath?: string;
  };
}

function parseRepository(fullName: string | undefined): RepositoryRef | undefined {
  if (!fullName) return undefined;
  const [owner, repo] = fullName.split("/");
  return { owner, repo };
}

function resolveModel(env: Env): string {
  if (env.AI_PROVIDER === "azure-openai") {
    return env.AZURE_OPENAI_DEPLOYMENT_NAME ?? env.AI_MODEL ?? DEFAULT_MODELS["azure-openai"];
  }
  return env.AI_MODEL ?? DEFAULT_MODELS[env.AI_PROVIDER] ?? DEFAULT_MODELS.openai;
}

function resolveCredentials(env: Env, model: string): ProviderCredentials {
  if (env.AI_PROVIDER === "azure-openai") {
    return {
      apiKey: env.AZURE_OPENAI_API_KEY ?? "",
      endpoint: env.AZURE_OPENAI_ENDPOINT,
      apiVersion: env.AZURE_OPENAI_API_VERSION,
      model,
    };
  }
  return { apiKey: env.AI_API_KEY ?? "", endpoint: env.AI_BASE_URL, model };
}

/**
 * Reads the process environment once. Unset and empty variables both count
 * as missing, since Actions passes empty strings for omitted inputs.
 */
export function loadConfig(
  source: Record<string, string | undefined> = process.env
): AppConfig {
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== "")
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const env = result.data;
  const model = resolveModel(env);

  return {
    provider: env.AI_PROVIDER,
    credentials: resolveCredentials(env, model),
    review: {
      maxTokens: env.MAX_TOKENS,
      temperature: env.TEMPERATURE,
      model,
      maxRetries: env.MAX_RETRIES,
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
      maxFiles: env.MAX_FILES,
      maxPatchChars: env.MAX_PATCH_SIZE,
    },
    timeoutMs: env.REVIEW_TIMEOUT_MS,
    postComment: env.POST_COMMENT === "true",
    github: {
      token: env.GITHUB_TOKEN,
      repository: parseRepository(env.GITHUB_REPOSITORY),
      eventPath: env.GITHUB_EVENT_PATH,
      outputPath: env.GITHUB_OUTPUT,
    },
  };
}
