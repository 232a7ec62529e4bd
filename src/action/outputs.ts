import { appendFile } from "fs/promises";
import { serializeReviewResult, type ReviewResult } from "../llm/types.js";

function singleLine(value: string): string {
  return value.replace(/\s*\r?\n\s*/g, " ").trim();
}

/** Step outputs as `key=value` lines, in the order workflows read them. */
export function formatOutputs(result: ReviewResult): string[] {
  const score = String(result.overallScore);
  return [
    `summary=${singleLine(result.summary)}`,
    `overall_score=${score}`,
    `score=${score}`,
    `approved=${String(result.approved)}`,
    `comment_count=${result.comments.length}`,
    `review_result=${JSON.stringify(serializeReviewResult(result))}`,
  ];
}

/** Appends to the `GITHUB_OUTPUT` file, or prints when running outside Actions. */
export async function writeOutputs(
  lines: string[],
  outputPath?: string
): Promise<void> {
  const content = lines.map((line) => `${line}\n`).join("");
  if (outputPath) {
    await appendFile(outputPath, content, "utf-8");
  } else {
    process.stdout.write(content);
  }
}
