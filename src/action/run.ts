import type { Octokit } from "octokit";
import type { AppConfig } from "../config.js";
import { ConfigError } from "../errors.js";
import { fetchPullRequestFiles, getOctokit } from "../github/client.js";
import {
  buildPullRequestData,
  metadataFromEvent,
  parseFileList,
  readPullRequestEvent,
  resolveMetadata,
} from "../github/event.js";
import { createProvider } from "../llm/registry.js";
import type { FileChange, LLMProvider, ReviewResult } from "../llm/types.js";
import { logger } from "../logger.js";
import { fetchRepoConfig, filterFiles, mergeConfig } from "../repo-config.js";
import { ReviewPipeline } from "../review/pipeline.js";
import {
  formatReviewComment,
  issueCommentPoster,
  publishReview,
  type CommentPoster,
} from "../review/poster.js";
import { formatOutputs, writeOutputs } from "./outputs.js";

export interface RunDependencies {
  provider?: LLMProvider;
  /** `null` disables GitHub API access. */
  octokit?: Octokit | null;
  /** `null` disables commenting. */
  poster?: CommentPoster | null;
}

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

async function loadFiles(
  env: Record<string, string | undefined>,
  octokit: Octokit | null,
  config: AppConfig,
  prNumber: number
): Promise<FileChange[]> {
  if (env.PR_FILES) {
    return parseFileList(env.PR_FILES);
  }
  const repository = config.github.repository;
  if (octokit && repository) {
    return fetchPullRequestFiles(octokit, repository.owner, repository.repo, prNumber);
  }
  throw new ConfigError([
    "PR_FILES: Required unless GITHUB_TOKEN and GITHUB_REPOSITORY are set",
  ]);
}

/**
 * One review from start to finish. Resolves to the process exit code;
 * rejects only when the pull request itself cannot be identified.
 */
export async function runReview(
  config: AppConfig,
  env: Record<string, string | undefined>,
  deps: RunDependencies = {}
): Promise<number> {
  const repository = config.github.repository;
  const octokit =
    deps.octokit !== undefined
      ? deps.octokit
      : config.github.token
        ? getOctokit(config.github.token)
        : null;

  const event = config.github.eventPath
    ? await readPullRequestEvent(config.github.eventPath)
    : null;
  const metadata = resolveMetadata(event ? metadataFromEvent(event) : null, env);

  const log = logger.withContext({
    pr: metadata.number,
    repo: repository ? `${repository.owner}/${repository.repo}` : undefined,
  });

  const poster =
    deps.poster !== undefined
      ? deps.poster
      : config.postComment && octokit && repository
        ? issueCommentPoster(octokit, repository.owner, repository.repo, metadata.number)
        : null;

  async function failRun(err: unknown): Promise<number> {
    log.error("Review failed", {
      error: err instanceof Error ? err.message : String(err),
      errorType: err instanceof Error ? err.name : typeof err,
    });
    if (poster) {
      try {
        await publishReview(poster, null);
      } catch (postErr) {
        log.error("No comment could be posted", { error: String(postErr) });
      }
    }
    return EXIT_FAILURE;
  }

  let result: ReviewResult;
  try {
    const repoConfig =
      octokit && repository
        ? await fetchRepoConfig(octokit, repository.owner, repository.repo, metadata.baseBranch)
        : null;
    const settings = mergeConfig(config.review, repoConfig);

    if (!settings.enabled) {
      log.info("Review disabled by repository configuration");
      return EXIT_SUCCESS;
    }

    const files = await loadFiles(env, octokit, config, metadata.number);
    const reviewable = filterFiles(files, settings.ignorePaths);
    if (files.length > 0 && reviewable.length === 0) {
      log.info("No reviewable files", { ignored: files.length });
      return EXIT_SUCCESS;
    }

    const pr = buildPullRequestData(metadata, reviewable);
    const provider =
      deps.provider ?? createProvider(config.provider, config.credentials);
    const pipeline = new ReviewPipeline(provider, settings.review);

    result = await pipeline.run(pr, AbortSignal.timeout(config.timeoutMs));
  } catch (err) {
    return failRun(err);
  }

  let exitCode = EXIT_SUCCESS;
  try {
    await writeOutputs(formatOutputs(result), config.github.outputPath);
  } catch (err) {
    log.error("Failed to write step outputs", { error: String(err) });
    exitCode = EXIT_FAILURE;
  }

  if (!poster) {
    log.info("Comment posting disabled", { comment: formatReviewComment(result) });
    return exitCode;
  }

  try {
    await publishReview(poster, result);
  } catch (err) {
    log.error("Marking run as failed", { error: String(err) });
    return EXIT_FAILURE;
  }
  return exitCode;
}
