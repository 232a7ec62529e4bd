export type FileStatus = "added" | "modified" | "removed" | "renamed";

export interface FileChange {
  readonly filename: string;
  readonly status: FileStatus;
  readonly additions: number;
  readonly deletions: number;
  readonly patch?: string;
}

export interface PullRequestData {
  readonly number: number;
  readonly title: string;
  readonly body?: string;
  readonly author: string;
  readonly baseBranch: string;
  readonly headBranch: string;
  readonly files: readonly FileChange[];
}

export type Severity = "info" | "warning" | "error";

export interface ReviewComment {
  readonly filename?: string;
  /** Only set together with `filename`. */
  readonly lineNumber?: number;
  readonly message: string;
  readonly severity: Severity;
}

/**
 * Outcome of one review. `approved` and `overallScore` both come from the
 * model and are not reconciled with each other.
 */
export interface ReviewResult {
  readonly summary: string;
  /** Integer in [1, 10]. */
  readonly overallScore: number;
  readonly approved: boolean;
  readonly comments: readonly ReviewComment[];
}

export interface ReviewConfiguration {
  readonly maxTokens: number;
  readonly temperature: number;
  /** Model name, or the deployment name on Azure. */
  readonly model: string;
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly maxFiles: number;
  readonly maxPatchChars: number;
  readonly customInstructions?: string;
}

export interface LLMProvider {
  readonly name: string;
  /**
   * Rejects with a `ProviderError` when the service stays unreachable after
   * all retries, refuses the request, or the call is aborted.
   */
  analyze(
    pr: PullRequestData,
    config: ReviewConfiguration,
    signal?: AbortSignal
  ): Promise<ReviewResult>;
}

export const DEFAULT_REVIEW_CONFIGURATION: Omit<ReviewConfiguration, "model"> = {
  maxTokens: 1500,
  temperature: 0.1,
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10_000,
  maxFiles: 10,
  maxPatchChars: 1000,
};

export function totalChanges(pr: PullRequestData): number {
  return pr.files.reduce((sum, f) => sum + f.additions + f.deletions, 0);
}

export function fileExtensions(pr: PullRequestData): string[] {
  const extensions = new Set<string>();
  for (const file of pr.files) {
    const base = file.filename.split("/").pop() ?? file.filename;
    const dot = base.lastIndexOf(".");
    if (dot > 0 && dot < base.length - 1) {
      extensions.add(base.slice(dot + 1).toLowerCase());
    }
  }
  return Array.from(extensions).sort();
}

export function commentsBySeverity(
  result: ReviewResult,
  severity: Severity
): ReviewComment[] {
  return result.comments.filter((c) => c.severity === severity);
}

export function hasBlockingIssues(result: ReviewResult): boolean {
  return result.comments.some((c) => c.severity === "error");
}

/** Wire shape used for the `review_result` output and the posted comment. */
export interface SerializedReviewResult {
  summary: string;
  overall_score: number;
  approved: boolean;
  comments: Array<{
    filename: string | null;
    line_number: number | null;
    message: string;
    severity: Severity;
  }>;
}

export function serializeReviewResult(
  result: ReviewResult
): SerializedReviewResult {
  return {
    summary: result.summary,
    overall_score: result.overallScore,
    approved: result.approved,
    comments: result.comments.map((c) => ({
      filename: c.filename ?? null,
      line_number: c.lineNumber ?? null,
      message: c.message,
      severity: c.severity,
    })),
  };
}
