import type { DiffBundle, Finding, PullRequestRef, ReviewConfig, ReviewContext, ReviewThread } from "../../src/types.js";

export const ref: PullRequestRef = {
  owner: "owner",
  repo: "repo",
  prNumber: 7,
  baseSha: "base0000aaaabbbb",
  headSha: "head1111ccccdddd",
};

export function makeContext(overrides: Partial<ReviewContext> = {}): ReviewContext {
  return {
    number: 7,
    title: "Add retry budget",
    body: "Limits retries per request.",
    author: "alice",
    baseRef: "main",
    headRef: "feature/retry",
    baseSha: "base0000aaaabbbb",
    headSha: "head1111ccccdddd",
    conversationComments: [],
    reviewThreads: [],
    ...overrides,
  };
}

export function makeThread(overrides: Partial<ReviewThread> = {}): ReviewThread {
  return {
    isResolved: false,
    isOutdated: false,
    path: "src/a.ts",
    line: 10,
    startLine: null,
    comments: [{ author: "bob", body: "Please check this.", createdAt: "2026-01-01T00:00:00Z" }],
    ...overrides,
  };
}

export function makeDiff(text: string): DiffBundle {
  const rawDiff = Buffer.from(text, "utf8");
  return { rawDiff, originalSize: rawDiff.length, truncated: false, truncatedSize: rawDiff.length };
}

export function makeFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    path: "src/a.ts",
    line: 5,
    endLine: 5,
    severity: "warning",
    title: "Possible null dereference",
    body: "`value` can be undefined here.",
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<ReviewConfig> = {}): ReviewConfig {
  return {
    modelId: "provider/model-x",
    maxDiffSize: 100_000,
    postSummary: true,
    ignorePatterns: [],
    engineCommand: "opencode",
    outputPath: "/tmp/review-relay-test-output.json",
    repoRoot: process.cwd(),
    debug: false,
    ...overrides,
  };
}
