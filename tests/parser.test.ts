import { describe, test, expect } from "vitest";
import {
  DEFAULT_SCORE,
  PARSE_FAILURE_MARKER,
  clampScore,
  parseReviewResponse,
} from "../src/review/parser.js";
import { cachingResponse } from "./fakes.js";

describe("parseReviewResponse", () => {
  test("parses summary, score, approval and comments", () => {
    const result = parseReviewResponse(cachingResponse);

    expect(result.degraded).toBe(false);
    expect(result.summary).toBe("Looks good");
    expect(result.overallScore).toBe(8);
    expect(result.approved).toBe(true);
    expect(result.comments).toEqual([
      {
        filename: "cache.py",
        lineNumber: 10,
        message: "Consider bounding cache size",
        severity: "warning",
      },
    ]);
  });

  test("keeps comments in the order they appear", () => {
    const raw = JSON.stringify({
      summary: "Test",
      overall_score: 6,
      approved: false,
      comments: [
        { filename: "a.ts", line_number: 1, message: "Error", severity: "error" },
        { filename: "b.ts", line_number: 2, message: "Warning", severity: "warning" },
        { filename: "c.ts", line_number: 3, message: "Info", severity: "info" },
      ],
    });
    const result = parseReviewResponse(raw);
    expect(result.comments.map((c) => c.severity)).toEqual([
      "error",
      "warning",
      "info",
    ]);
    expect(result.comments.map((c) => c.filename)).toEqual(["a.ts", "b.ts", "c.ts"]);
  });

  test("clamps scores above 10 and below 1", () => {
    const high = parseReviewResponse(
      JSON.stringify({ summary: "Great", overall_score: 15, approved: true, comments: [] })
    );
    const low = parseReviewResponse(
      JSON.stringify({ summary: "Bad", overall_score: 0, approved: false, comments: [] })
    );
    expect(high.overallScore).toBe(10);
    expect(low.overallScore).toBe(1);
    expect(high.degraded).toBe(false);
  });

  test("drops comments without a message and keeps the rest", () => {
    const raw = JSON.stringify({
      summary: "Mixed",
      overall_score: 7,
      approved: true,
      comments: [
        { filename: "a.ts", line_number: 3, severity: "error" },
        { filename: "b.ts", line_number: 4, message: "   ", severity: "error" },
        { filename: "c.ts", line_number: 5, message: "Handle the null case", severity: "error" },
      ],
    });
    const result = parseReviewResponse(raw);
    expect(result.comments).toHaveLength(1);
    expect(result.comments[0].message).toBe("Handle the null case");
    expect(result.comments[0].filename).toBe("c.ts");
  });

  test("normalizes loosely typed fields", () => {
    const raw = JSON.stringify({
      summary: "  Fine  ",
      overall_score: "7.6",
      approved: "TRUE",
      comments: [
        { filename: "a.ts", line_number: "12", message: "Rename", severity: "CRITICAL" },
        { filename: null, line_number: 4, message: "General note", severity: "warning" },
        { filename: "null", line_number: null, message: "Also general" },
        { filename: "b.ts", line_number: -3, message: "Bad line" },
      ],
    });
    const result = parseReviewResponse(raw);

    expect(result.summary).toBe("  Fine  ");
    expect(result.overallScore).toBe(8);
    expect(result.approved).toBe(true);
    expect(result.comments).toEqual([
      { filename: "a.ts", lineNumber: 12, message: "Rename", severity: "info" },
      { filename: undefined, lineNumber: undefined, message: "General note", severity: "warning" },
      { filename: undefined, lineNumber: undefined, message: "Also general", severity: "info" },
      { filename: "b.ts", lineNumber: undefined, message: "Bad line", severity: "info" },
    ]);
  });

  test("keeps a comment whose optional fields have the wrong type", () => {
    const raw = JSON.stringify({
      summary: "Review",
      overall_score: 6,
      approved: false,
      comments: [
        { filename: "a.ts", line_number: [10, 12], message: "Bound the cache", severity: "warning" },
        { filename: "b.ts", line_number: 3, message: "Check the result", severity: 2 },
        { filename: 7, line_number: 3, message: "Unclear location", severity: "error" },
      ],
    });
    const result = parseReviewResponse(raw);

    expect(result.comments).toEqual([
      { filename: "a.ts", lineNumber: undefined, message: "Bound the cache", severity: "warning" },
      { filename: "b.ts", lineNumber: 3, message: "Check the result", severity: "info" },
      { filename: undefined, lineNumber: undefined, message: "Unclear location", severity: "error" },
    ]);
  });

  test("keeps the review when approval or score has the wrong type", () => {
    const approvedAsNumber = parseReviewResponse(
      JSON.stringify({ summary: "Solid", overall_score: 9, approved: 1 })
    );
    expect(approvedAsNumber.degraded).toBe(false);
    expect(approvedAsNumber.summary).toBe("Solid");
    expect(approvedAsNumber.overallScore).toBe(9);
    expect(approvedAsNumber.approved).toBe(false);

    const scoreAsBoolean = parseReviewResponse(
      JSON.stringify({ summary: "Solid", overall_score: true, approved: true })
    );
    expect(scoreAsBoolean.degraded).toBe(false);
    expect(scoreAsBoolean.overallScore).toBe(DEFAULT_SCORE);
    expect(scoreAsBoolean.approved).toBe(true);
  });

  test("stores summary and message text unchanged", () => {
    const raw = JSON.stringify({
      summary: "Two issues found.\n",
      overall_score: 5,
      approved: false,
      comments: [{ filename: "a.ts", line_number: 1, message: " Use const ", severity: "info" }],
    });
    const result = parseReviewResponse(raw);
    expect(result.summary).toBe("Two issues found.\n");
    expect(result.comments[0].message).toBe(" Use const ");
  });

  test("applies defaults for a missing score and approval", () => {
    const result = parseReviewResponse(JSON.stringify({ summary: "Short" }));
    expect(result.overallScore).toBe(DEFAULT_SCORE);
    expect(result.approved).toBe(false);
    expect(result.comments).toEqual([]);
    expect(result.degraded).toBe(false);
  });

  test("extracts JSON from a fenced block", () => {
    const raw = `Here is my review:

\`\`\`json
{"summary": "Solid change", "overall_score": 9, "approved": true, "comments": []}
\`\`\`
`;
    const result = parseReviewResponse(raw);
    expect(result.degraded).toBe(false);
    expect(result.summary).toBe("Solid change");
    expect(result.overallScore).toBe(9);
  });

  test("extracts a JSON object surrounded by prose", () => {
    const raw = `Sure! {"summary": "Ok", "overall_score": 4, "approved": false} Hope this helps.`;
    const result = parseReviewResponse(raw);
    expect(result.summary).toBe("Ok");
    expect(result.overallScore).toBe(4);
  });

  test("falls back on unstructured text without throwing", () => {
    const result = parseReviewResponse("I think this looks fine overall");

    expect(result.degraded).toBe(true);
    expect(result.approved).toBe(false);
    expect(result.overallScore).toBe(DEFAULT_SCORE);
    expect(result.comments).toHaveLength(0);
    expect(result.summary).toBe(
      `${PARSE_FAILURE_MARKER}I think this looks fine overall`
    );
  });

  test("falls back when the JSON has no summary", () => {
    const result = parseReviewResponse('{"overall_score": 9}');
    expect(result.degraded).toBe(true);
    expect(result.overallScore).toBe(DEFAULT_SCORE);
    expect(result.summary).toBe(`${PARSE_FAILURE_MARKER}{"overall_score": 9}`);
  });

  test("truncates long raw text in the fallback summary", () => {
    const result = parseReviewResponse("a".repeat(600));
    expect(result.summary).toBe(`${PARSE_FAILURE_MARKER}${"a".repeat(500)}…`);
  });

  test("handles an empty response", () => {
    const result = parseReviewResponse("   ");
    expect(result.summary).toBe(`${PARSE_FAILURE_MARKER}(empty response)`);
    expect(result.approved).toBe(false);
  });

  test("ignores comments that are not an array", () => {
    const result = parseReviewResponse(
      JSON.stringify({ summary: "Ok", overall_score: 6, approved: true, comments: "none" })
    );
    expect(result.comments).toEqual([]);
    expect(result.degraded).toBe(false);
  });
});

describe("clampScore", () => {
  test("rounds and clamps", () => {
    expect(clampScore(3.4)).toBe(3);
    expect(clampScore(-2)).toBe(1);
    expect(clampScore(11)).toBe(10);
    expect(clampScore("abc")).toBe(DEFAULT_SCORE);
    expect(clampScore(undefined)).toBe(DEFAULT_SCORE);
  });
});
