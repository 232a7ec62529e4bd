import { describe, test, expect } from "vitest";
import { ReviewPipeline, validatePullRequest } from "../src/review/pipeline.js";
import { CompletionReviewProvider } from "../src/llm/completion-provider.js";
import { TransportError } from "../src/llm/transport.js";
import { ProviderError, ValidationError } from "../src/errors.js";
import type {
  LLMProvider,
  PullRequestData,
  ReviewResult,
} from "../src/llm/types.js";
import {
  FakeTransport,
  cachingPr,
  cachingResponse,
  recordingSleep,
  testConfig,
} from "./fakes.js";

function pipelineWith(transport: FakeTransport): ReviewPipeline {
  const provider = new CompletionReviewProvider(transport, {
    sleep: recordingSleep().sleep,
  });
  return new ReviewPipeline(provider, testConfig);
}

describe("ReviewPipeline", () => {
  test("returns the provider's review", async () => {
    const transport = new FakeTransport([cachingResponse]);
    const result = await pipelineWith(transport).run(cachingPr);

    expect(result.overallScore).toBe(8);
    expect(result.approved).toBe(true);
    expect(result.comments).toHaveLength(1);
  });

  test("rejects a PR without files before calling the endpoint", async () => {
    const transport = new FakeTransport([cachingResponse]);
    const pr: PullRequestData = { ...cachingPr, files: [] };

    await expect(pipelineWith(transport).run(pr)).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(transport.calls).toHaveLength(0);
  });

  test("rejects a non-positive PR number", async () => {
    const transport = new FakeTransport([cachingResponse]);

    await expect(
      pipelineWith(transport).run({ ...cachingPr, number: 0 })
    ).rejects.toThrow("PR number must be a positive integer, got 0");
    expect(transport.calls).toHaveLength(0);
  });

  test("rejects negative change counts", async () => {
    const transport = new FakeTransport([cachingResponse]);
    const pr: PullRequestData = {
      ...cachingPr,
      files: [{ filename: "cache.py", status: "modified", additions: 3, deletions: -1 }],
    };

    await expect(pipelineWith(transport).run(pr)).rejects.toThrow(
      "Invalid change counts for cache.py: +3/-1"
    );
    expect(transport.calls).toHaveLength(0);
  });

  test("propagates provider errors unchanged", async () => {
    const failure = new ProviderError("All 3 attempt(s) failed", "fake", 3);
    const provider: LLMProvider = {
      name: "fake",
      analyze: async (): Promise<ReviewResult> => {
        throw failure;
      },
    };

    await expect(
      new ReviewPipeline(provider, testConfig).run(cachingPr)
    ).rejects.toBe(failure);
  });

  test("surfaces a fatal client error from the endpoint", async () => {
    const transport = new FakeTransport([TransportError.http(403, "forbidden")]);

    await expect(pipelineWith(transport).run(cachingPr)).rejects.toBeInstanceOf(
      ProviderError
    );
    expect(transport.calls).toHaveLength(1);
  });
});

describe("validatePullRequest", () => {
  test("accepts a well-formed PR", () => {
    expect(() => validatePullRequest(cachingPr)).not.toThrow();
  });

  test("rejects fractional PR numbers", () => {
    expect(() => validatePullRequest({ ...cachingPr, number: 1.5 })).toThrow(
      ValidationError
    );
  });
});
