import type { Octokit } from "octokit";
import { createIssueComment } from "../github/client.js";
import { logger } from "../logger.js";
import {
  commentsBySeverity,
  type ReviewComment,
  type ReviewResult,
  type Severity,
} from "../llm/types.js";

const SEVERITY_EMOJI: Record<Severity, string> = {
  error: "❌",
  warning: "⚠️",
  info: "ℹ️",
};

const HEADER = "## 🤖 AI Code Review";
const FOOTER = "---\n*Generated by the AI PR review agent*";

export interface CommentPoster {
  post(body: string): Promise<void>;
}

export function issueCommentPoster(
  octokit: Octokit,
  owner: string,
  repo: string,
  prNumber: number
): CommentPoster {
  return {
    post: (body) => createIssueComment(octokit, owner, repo, prNumber, body),
  };
}

function formatLocation(comment: ReviewComment): string {
  if (comment.filename && comment.lineNumber) {
    return `${comment.filename}:${comment.lineNumber}`;
  }
  return comment.filename ?? "General";
}

function formatCounts(result: ReviewResult): string {
  const count = (severity: Severity) => commentsBySeverity(result, severity).length;
  return `**Findings:** ${count("error")} error(s), ${count("warning")} warning(s), ${count("info")} info`;
}

export function formatReviewComment(result: ReviewResult): string {
  let body = `${HEADER}\n\n`;
  body += `**Overall Score:** ${result.overallScore}/10\n`;
  body += `**Status:** ${result.approved ? "✅ Approved" : "❌ Changes Requested"}\n\n`;
  body += `### Summary\n${result.summary}\n\n`;

  if (result.comments.length > 0) {
    body += `### Comments\n\n${formatCounts(result)}\n\n`;
    for (const comment of result.comments) {
      body += `${SEVERITY_EMOJI[comment.severity]} **${formatLocation(comment)}**\n`;
      body += `  ${comment.message}\n\n`;
    }
  }

  return body + FOOTER;
}

export function formatFallbackComment(score?: number): string {
  let body = `${HEADER}\n\n`;
  body += `❌ **Error:** Could not complete the review due to a technical issue.\n\n`;
  if (score !== undefined) {
    body += `Review Score: ${score}/10\n\n`;
  }
  return body + FOOTER;
}

export type PublishOutcome = "primary" | "fallback";

/**
 * Posts the formatted review, or the fallback notice when there is no result
 * or the first post fails. Throws when the fallback cannot be posted either.
 */
export async function publishReview(
  poster: CommentPoster,
  result: ReviewResult | null,
  score?: number
): Promise<PublishOutcome> {
  if (result) {
    try {
      await poster.post(formatReviewComment(result));
      logger.info("Review comment posted");
      return "primary";
    } catch (err) {
      logger.error("Failed to post review comment", { error: String(err) });
    }
  }

  try {
    await poster.post(formatFallbackComment(score ?? result?.overallScore));
  } catch (err) {
    logger.error("Failed to post fallback comment", { error: String(err) });
    throw new Error("Failed to post review comment", { cause: err });
  }
  logger.warn("Fallback comment posted");
  return "fallback";
}
