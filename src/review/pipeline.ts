import { ValidationError } from "../errors.js";
import { logger } from "../logger.js";
import {
  hasBlockingIssues,
  totalChanges,
  type LLMProvider,
  type PullRequestData,
  type ReviewConfiguration,
  type ReviewResult,
} from "../llm/types.js";

function isCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

export function validatePullRequest(pr: PullRequestData): void {
  if (!Number.isInteger(pr.number) || pr.number <= 0) {
    throw new ValidationError(
      `PR number must be a positive integer, got ${pr.number}`
    );
  }
  if (pr.files.length === 0) {
    throw new ValidationError("PR must have at least one file change");
  }
  for (const file of pr.files) {
    if (!isCount(file.additions) || !isCount(file.deletions)) {
      throw new ValidationError(
        `Invalid change counts for ${file.filename}: +${file.additions}/-${file.deletions}`
      );
    }
  }
}

/**
 * Validates the pull request and hands it to the provider. Provider errors
 * are propagated as-is.
 */
export class ReviewPipeline {
  constructor(
    private readonly provider: LLMProvider,
    private readonly config: ReviewConfiguration
  ) {}

  async run(pr: PullRequestData, signal?: AbortSignal): Promise<ReviewResult> {
    const log = logger.withContext({ pr: pr.number, provider: this.provider.name });

    validatePullRequest(pr);

    log.info("Starting review", {
      files: pr.files.length,
      totalChanges: totalChanges(pr),
    });

    const startTime = Date.now();
    const result = await this.provider.analyze(pr, this.config, signal);

    log.info("Review completed", {
      durationMs: Date.now() - startTime,
      score: result.overallScore,
      approved: result.approved,
      commentCount: result.comments.length,
      blockingIssues: hasBlockingIssues(result),
    });

    return result;
  }
}
