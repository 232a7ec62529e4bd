import { readFile } from "fs/promises";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import type { FileChange, PullRequestData } from "../llm/types.js";
import { normalizeFileStatus } from "./client.js";

const pullRequestEventSchema = z.object({
  action: z.string().optional(),
  pull_request: z.object({
    number: z.number().int(),
    title: z.string(),
    body: z.string().nullish(),
    user: z.object({ login: z.string() }).nullish(),
    base: z.object({ ref: z.string() }),
    head: z.object({ ref: z.string(), sha: z.string().optional() }),
  }),
});

export type PullRequestEvent = z.infer<typeof pullRequestEventSchema>;

export interface PullRequestMetadata {
  number: number;
  title: string;
  body?: string;
  author: string;
  baseBranch: string;
  headBranch: string;
}

const fileChangeSchema = z.object({
  filename: z.string().min(1),
  status: z.string().default("modified"),
  additions: z.number(),
  deletions: z.number(),
  patch: z.string().nullish(),
});

export async function readPullRequestEvent(
  path: string
): Promise<PullRequestEvent | null> {
  const payload: unknown = JSON.parse(await readFile(path, "utf-8"));
  const result = pullRequestEventSchema.safeParse(payload);
  return result.success ? result.data : null;
}

export function metadataFromEvent(event: PullRequestEvent): PullRequestMetadata {
  const pr = event.pull_request;
  return {
    number: pr.number,
    title: pr.title,
    body: pr.body ?? undefined,
    author: pr.user?.login ?? "unknown",
    baseBranch: pr.base.ref,
    headBranch: pr.head.ref,
  };
}

/**
 * Applies `PR_*` overrides on top of whatever the event supplied. Empty
 * variables count as unset. Fails when neither source provides the number or
 * title.
 */
export function resolveMetadata(
  fromEvent: PullRequestMetadata | null,
  env: Record<string, string | undefined>
): PullRequestMetadata {
  const read = (key: string): string | undefined => env[key] || undefined;

  const prNumber = read("PR_NUMBER");
  const number = prNumber ? Number(prNumber) : fromEvent?.number;
  const title = read("PR_TITLE") ?? fromEvent?.title;

  const missing: string[] = [];
  if (number === undefined) missing.push("PR_NUMBER: Required when no pull_request event is available");
  if (title === undefined) missing.push("PR_TITLE: Required when no pull_request event is available");
  if (number === undefined || title === undefined) {
    throw new ConfigError(missing);
  }

  return {
    number,
    title,
    body: read("PR_BODY") ?? fromEvent?.body,
    author: read("PR_AUTHOR") ?? fromEvent?.author ?? read("GITHUB_ACTOR") ?? "unknown",
    baseBranch: read("PR_BASE_BRANCH") ?? fromEvent?.baseBranch ?? "main",
    headBranch: read("PR_HEAD_BRANCH") ?? fromEvent?.headBranch ?? "unknown",
  };
}

/** Parses the `PR_FILES` JSON array. */
export function parseFileList(json: string): FileChange[] {
  let payload: unknown;
  try {
    payload = JSON.parse(json);
  } catch (err) {
    throw new ConfigError([`PR_FILES: Invalid JSON (${String(err)})`]);
  }

  const result = z.array(fileChangeSchema).safeParse(payload);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((i) => `PR_FILES.${i.path.join(".")}: ${i.message}`)
    );
  }

  return result.data.map((f) => ({
    filename: f.filename,
    status: normalizeFileStatus(f.status),
    additions: f.additions,
    deletions: f.deletions,
    patch: f.patch ?? undefined,
  }));
}

export function buildPullRequestData(
  metadata: PullRequestMetadata,
  files: FileChange[]
): PullRequestData {
  return Object.freeze({ ...metadata, files: Object.freeze([...files]) });
}
