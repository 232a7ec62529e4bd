import YAML from "yaml";
import { minimatch } from "minimatch";
import { z } from "zod";
import type { Octokit } from "octokit";
import { fetchFileContent } from "./github/client.js";
import { logger } from "./logger.js";
import type { FileChange, ReviewConfiguration } from "./llm/types.js";

export const REPO_CONFIG_PATH = ".github/pr-review.yml";

const repoConfigSchema = z.object({
  enabled: z.boolean().optional(),
  ignorePaths: z.array(z.string()).optional(),
  maxFiles: z.number().int().positive().optional(),
  customInstructions: z.string().optional(),
});

export type RepoConfig = z.infer<typeof repoConfigSchema>;

export function parseRepoConfig(content: string): RepoConfig | null {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    logger.warn(`Failed to parse ${REPO_CONFIG_PATH}`, { error: String(err) });
    return null;
  }

  // An empty file parses to null.
  if (raw === null || raw === undefined) return {};

  const result = repoConfigSchema.safeParse(raw);
  if (!result.success) {
    logger.warn(`Ignoring invalid ${REPO_CONFIG_PATH}`, {
      issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
    return null;
  }
  return result.data;
}

export async function fetchRepoConfig(
  octokit: Octokit,
  owner: string,
  repo: string,
  ref: string
): Promise<RepoConfig | null> {
  const content = await fetchFileContent(octokit, owner, repo, REPO_CONFIG_PATH, ref);
  if (!content) return null;
  return parseRepoConfig(content);
}

export interface MergedReviewSettings {
  enabled: boolean;
  ignorePaths: string[];
  review: ReviewConfiguration;
}

export function mergeConfig(
  review: ReviewConfiguration,
  repoConfig: RepoConfig | null
): MergedReviewSettings {
  return {
    enabled: repoConfig?.enabled ?? true,
    ignorePaths: repoConfig?.ignorePaths ?? [],
    review: {
      ...review,
      maxFiles: repoConfig?.maxFiles ?? review.maxFiles,
      customInstructions:
        repoConfig?.customInstructions ?? review.customInstructions,
    },
  };
}

export function filterFiles(
  files: readonly FileChange[],
  ignorePaths: string[]
): FileChange[] {
  return files.filter(
    (file) => !ignorePaths.some((pattern) => minimatch(file.filename, pattern))
  );
}
