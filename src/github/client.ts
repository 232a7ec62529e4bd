import { Octokit, RequestError } from "octokit";
import type { FileChange, FileStatus } from "../llm/types.js";

export function getOctokit(token: string): Octokit {
  return new Octokit({ auth: token });
}

const KNOWN_STATUSES: readonly FileStatus[] = ["added", "modified", "removed", "renamed"];

export function normalizeFileStatus(status: string): FileStatus {
  return KNOWN_STATUSES.find((s) => s === status) ?? "modified";
}

export async function fetchPullRequestFiles(
  octokit: Octokit,
  owner: string,
  repo: string,
  prNumber: number
): Promise<FileChange[]> {
  const files = await octokit.paginate(octokit.rest.pulls.listFiles, {
    owner,
    repo,
    pull_number: prNumber,
    per_page: 100,
  });

  return files.map((f) => ({
    filename: f.filename,
    status: normalizeFileStatus(f.status),
    additions: f.additions,
    deletions: f.deletions,
    patch: f.patch,
  }));
}

export async function createIssueComment(
  octokit: Octokit,
  owner: string,
  repo: string,
  issueNumber: number,
  body: string
): Promise<void> {
  await octokit.rest.issues.createComment({
    owner,
    repo,
    issue_number: issueNumber,
    body,
  });
}

export async function fetchFileContent(
  octokit: Octokit,
  owner: string,
  repo: string,
  path: string,
  ref: string
): Promise<string | null> {
  try {
    const response = await octokit.rest.repos.getContent({
      owner,
      repo,
      path,
      ref,
    });
    const data = response.data;
    if (!Array.isArray(data) && "content" in data && data.encoding === "base64") {
      return Buffer.from(data.content, "base64").toString("utf-8");
    }
    return null;
  } catch (err) {
    if (err instanceof RequestError && err.status === 404) return null;
    throw err;
  }
}
