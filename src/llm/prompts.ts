import {
  fileExtensions,
  totalChanges,
  type FileChange,
  type PullRequestData,
  type ReviewConfiguration,
} from "./types.js";

export const CONTEXT_WINDOW_TOKENS = 8192;
export const CHARS_PER_TOKEN = 4;
export const MIN_PROMPT_CHARS = 4000;
export const MAX_DESCRIPTION_CHARS = 500;

export const SYSTEM_PROMPT = `You are a senior code reviewer. Review the following pull request and provide actionable feedback.

Respond with a single JSON object and nothing else, in exactly this shape:

{
  "summary": "Brief overall assessment of the pull request",
  "overall_score": 7,
  "approved": true,
  "comments": [
    {
      "filename": "path/to/file.ts or null for a general comment",
      "line_number": 123,
      "message": "Specific, actionable feedback",
      "severity": "info"
    }
  ]
}

Rules:
- overall_score is an integer from 1 (unacceptable) to 10 (excellent)
- severity is one of: info, warning, error
- line_number must refer to a line in the new version of the file, or be null
- Focus on bugs, security issues, performance problems, and code quality
- If the code looks good, give a positive summary and an empty comments array
- Keep comments concise and constructive`;

export interface ReviewPrompt {
  system: string;
  prompt: string;
}

export function promptBudgetChars(maxTokens: number): number {
  return Math.max(
    (CONTEXT_WINDOW_TOKENS - maxTokens) * CHARS_PER_TOKEN,
    MIN_PROMPT_CHARS
  );
}

export function truncatePatch(patch: string, maxChars: number): string {
  if (patch.length <= maxChars) return patch;
  const rest = patch.length - maxChars;
  return `${patch.slice(0, maxChars)}\n[... patch truncated, ${rest} more characters]`;
}

function formatFile(file: FileChange, maxPatchChars: number): string {
  let block = `### ${file.filename} (${file.status}, +${file.additions}/-${file.deletions})\n`;
  if (file.patch) {
    block += `\`\`\`diff\n${truncatePatch(file.patch, maxPatchChars)}\n\`\`\`\n\n`;
  } else {
    block += `(no patch available)\n\n`;
  }
  return block;
}

function omittedMarker(count: number): string {
  return `[${count} more file(s) omitted from this review]\n`;
}

export function buildUserPrompt(
  pr: PullRequestData,
  config: ReviewConfiguration
): string {
  let prompt = `# Pull Request #${pr.number}: ${pr.title}\n\n`;
  prompt += `Author: ${pr.author}\n`;
  prompt += `Branches: ${pr.headBranch} → ${pr.baseBranch}\n`;
  prompt += `Files changed: ${pr.files.length}\n`;
  prompt += `Total changes: ${totalChanges(pr)} lines\n`;

  const extensions = fileExtensions(pr);
  if (extensions.length > 0) {
    prompt += `File types: ${extensions.join(", ")}\n`;
  }

  const body = pr.body?.trim();
  if (body) {
    const description =
      body.length > MAX_DESCRIPTION_CHARS
        ? `${body.slice(0, MAX_DESCRIPTION_CHARS)} [... description truncated]`
        : body;
    prompt += `\n## Description\n${description}\n`;
  }

  if (config.customInstructions) {
    prompt += `\n## Additional Instructions\n${config.customInstructions}\n`;
  }

  prompt += `\n## File Changes\n\n`;

  const budget = promptBudgetChars(config.maxTokens);
  const candidates = pr.files.slice(0, config.maxFiles);
  let included = 0;

  for (const file of candidates) {
    const block = formatFile(file, config.maxPatchChars);
    if (prompt.length + block.length > budget) break;
    prompt += block;
    included++;
  }

  const omitted = pr.files.length - included;
  if (omitted > 0) {
    prompt += omittedMarker(omitted);
  }

  return prompt;
}

export function buildReviewPrompt(
  pr: PullRequestData,
  config: ReviewConfiguration
): ReviewPrompt {
  return { system: SYSTEM_PROMPT, prompt: buildUserPrompt(pr, config) };
}
