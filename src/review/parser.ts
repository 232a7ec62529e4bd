import { z } from "zod";
import type { ReviewComment, ReviewResult, Severity } from "../llm/types.js";

export const DEFAULT_SCORE = 5;
export const MIN_SCORE = 1;
export const MAX_SCORE = 10;
export const EXCERPT_CHARS = 500;
export const PARSE_FAILURE_MARKER =
  "⚠️ Automatic parsing of the AI response failed. Raw response excerpt: ";

export interface ParsedReview extends ReviewResult {
  /** True when the response was not structured and a fallback was built. */
  degraded: boolean;
}

const numberLike = z.union([z.number(), z.string()]);

const nonBlank = z.string().refine((value) => value.trim().length > 0);

// Only `summary` (per review) and `message` (per comment) are required; a
// malformed optional field falls back to its default instead of failing.
const rawReviewSchema = z.object({
  summary: nonBlank,
  overall_score: numberLike.nullish().catch(undefined),
  approved: z.union([z.boolean(), z.string()]).nullish().catch(undefined),
  comments: z.unknown(),
});

const rawCommentSchema = z.object({
  filename: z.string().nullish().catch(undefined),
  line_number: numberLike.nullish().catch(undefined),
  message: nonBlank,
  severity: z.string().nullish().catch(undefined),
});

const FENCED_JSON_REGEX = /```(?:json)?[^\S\n]*\n([\s\S]*?)```/i;

const SEVERITIES: readonly Severity[] = ["info", "warning", "error"];

function toNumber(value: number | string | null | undefined): number {
  if (value === null || value === undefined) return NaN;
  return typeof value === "number" ? value : Number(value.trim());
}

export function clampScore(value: number | string | null | undefined): number {
  const score = toNumber(value);
  if (!Number.isFinite(score)) return DEFAULT_SCORE;
  return Math.min(MAX_SCORE, Math.max(MIN_SCORE, Math.round(score)));
}

function toApproved(value: boolean | string | null | undefined): boolean {
  if (typeof value === "boolean") return value;
  return typeof value === "string" && value.trim().toLowerCase() === "true";
}

function toSeverity(value: string | null | undefined): Severity {
  const normalized = value?.trim().toLowerCase();
  return SEVERITIES.find((s) => s === normalized) ?? "info";
}

function toFilename(value: string | null | undefined): string | undefined {
  const filename = value?.trim();
  if (!filename || filename.toLowerCase() === "null") return undefined;
  return filename;
}

function toComment(entry: unknown): ReviewComment | null {
  const parsed = rawCommentSchema.safeParse(entry);
  if (!parsed.success) return null;

  const { data } = parsed;
  const filename = toFilename(data.filename);
  const line = toNumber(data.line_number);
  const lineNumber =
    filename && Number.isInteger(line) && line > 0 ? line : undefined;

  return {
    filename,
    lineNumber,
    message: data.message,
    severity: toSeverity(data.severity),
  };
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function jsonCandidates(raw: string): string[] {
  const candidates = [raw.trim()];

  const fence = FENCED_JSON_REGEX.exec(raw);
  if (fence) {
    candidates.push(fence[1].trim());
  }

  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start !== -1 && end > start) {
    candidates.push(raw.slice(start, end + 1));
  }

  return candidates;
}

export function buildFallbackReview(raw: string): ParsedReview {
  const trimmed = raw.trim();
  const excerpt =
    trimmed.length === 0
      ? "(empty response)"
      : trimmed.length > EXCERPT_CHARS
        ? `${trimmed.slice(0, EXCERPT_CHARS)}…`
        : trimmed;

  return {
    summary: `${PARSE_FAILURE_MARKER}${excerpt}`,
    overallScore: DEFAULT_SCORE,
    approved: false,
    comments: [],
    degraded: true,
  };
}

/**
 * Turns a model response into a review. Never throws: anything that is not a
 * JSON object with a non-empty `summary` yields the fallback review.
 */
export function parseReviewResponse(raw: string): ParsedReview {
  for (const candidate of jsonCandidates(raw)) {
    const parsed = rawReviewSchema.safeParse(tryParseJson(candidate));
    if (!parsed.success) continue;

    const { data } = parsed;
    const entries = Array.isArray(data.comments) ? data.comments : [];
    const comments: ReviewComment[] = [];
    for (const entry of entries) {
      const comment = toComment(entry);
      if (comment) comments.push(comment);
    }

    return {
      summary: data.summary,
      overallScore: clampScore(data.overall_score),
      approved: toApproved(data.approved),
      comments,
      degraded: false,
    };
  }

  return buildFallbackReview(raw);
}
