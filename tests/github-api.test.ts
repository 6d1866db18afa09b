import { expect, test } from "vitest";
import { FetchError } from "../src/errors.js";
import { fetchReviewContext } from "../src/github-api.js";
import { makeOctokitSpy } from "./helpers/fake-octokit.js";
import { ref } from "./helpers/fixtures.js";

function makePullRequest(overrides: Record<string, unknown> = {}) {
  return {
    number: 7,
    title: "Add retry budget",
    body: null,
    author: null,
    baseRefName: "main",
    headRefName: "feature/retry",
    baseRefOid: "oid-base",
    headRefOid: "oid-head",
    comments: {
      nodes: [{ author: { login: "carol" }, body: "First pass looks fine.", createdAt: "2026-01-01T00:00:00Z" }, null],
      pageInfo: { hasNextPage: false },
    },
    reviewThreads: {
      nodes: [
        {
          isResolved: true,
          isOutdated: false,
          path: "a.go",
          line: 10,
          startLine: null,
          comments: {
            nodes: [{ author: { login: "dave" }, body: "Off by one?", createdAt: "2026-01-02T00:00:00Z" }],
            pageInfo: { hasNextPage: false },
          },
        },
        {
          isResolved: false,
          isOutdated: true,
          path: "b.go",
          line: null,
          startLine: null,
          comments: null,
        },
      ],
      pageInfo: { hasNextPage: false },
    },
    ...overrides,
  };
}

test("fetchReviewContext queries by owner, repo and PR number", async () => {
  const { octokit, calls } = makeOctokitSpy({
    graphqlResponse: { repository: { pullRequest: makePullRequest() } },
  });

  await fetchReviewContext(octokit, ref);

  expect(calls).toHaveLength(1);
  const call = calls[0];
  expect(call.type).toBe("graphql");
  if (call.type === "graphql") {
    expect(call.variables).toEqual({ owner: "owner", repo: "repo", number: 7 });
    expect(call.query).toContain("reviewThreads(first: 100)");
    expect(call.query).toContain("comments(first: 20)");
    expect(call.query).toContain("orderBy: { field: UPDATED_AT, direction: ASC }");
  }
});

test("fetchReviewContext fills placeholders for missing description and author", async () => {
  const { octokit } = makeOctokitSpy({
    graphqlResponse: { repository: { pullRequest: makePullRequest() } },
  });

  const context = await fetchReviewContext(octokit, ref);

  expect(context.body).toBe("No description provided.");
  expect(context.author).toBe("ghost");
  expect(context.conversationComments).toEqual([
    { author: "carol", body: "First pass looks fine.", createdAt: "2026-01-01T00:00:00Z" },
  ]);
});

test("fetchReviewContext treats a blank description as missing", async () => {
  const { octokit } = makeOctokitSpy({
    graphqlResponse: { repository: { pullRequest: makePullRequest({ body: "  \n" }) } },
  });

  const context = await fetchReviewContext(octokit, ref);

  expect(context.body).toBe("No description provided.");
});

test("fetchReviewContext keeps resolved and outdated threads with their anchors", async () => {
  const { octokit } = makeOctokitSpy({
    graphqlResponse: { repository: { pullRequest: makePullRequest() } },
  });

  const context = await fetchReviewContext(octokit, ref);

  expect(context.reviewThreads).toEqual([
    {
      isResolved: true,
      isOutdated: false,
      path: "a.go",
      line: 10,
      startLine: null,
      comments: [{ author: "dave", body: "Off by one?", createdAt: "2026-01-02T00:00:00Z" }],
    },
    {
      isResolved: false,
      isOutdated: true,
      path: "b.go",
      line: null,
      startLine: null,
      comments: [],
    },
  ]);
});

test("fetchReviewContext prefers event SHAs and falls back to the GraphQL OIDs", async () => {
  const { octokit } = makeOctokitSpy({
    graphqlResponse: { repository: { pullRequest: makePullRequest() } },
  });

  const fromEvent = await fetchReviewContext(octokit, ref);
  const fromGraphql = await fetchReviewContext(octokit, { owner: "owner", repo: "repo", prNumber: 7 });

  expect(fromEvent.baseSha).toBe("base0000aaaabbbb");
  expect(fromEvent.headSha).toBe("head1111ccccdddd");
  expect(fromGraphql.baseSha).toBe("oid-base");
  expect(fromGraphql.headSha).toBe("oid-head");
});

test("fetchReviewContext warns when a page is cut", async () => {
  const warnings: string[] = [];
  const { octokit } = makeOctokitSpy({
    graphqlResponse: {
      repository: {
        pullRequest: makePullRequest({ comments: { nodes: [], pageInfo: { hasNextPage: true } } }),
      },
    },
  });

  await fetchReviewContext(octokit, ref, (message) => warnings.push(message));

  expect(warnings).toEqual(["PR has more than 100 conversation comments; only the oldest are included."]);
});

test("fetchReviewContext wraps transport failures in FetchError", async () => {
  const { octokit } = makeOctokitSpy({ graphqlError: new Error("boom") });

  const promise = fetchReviewContext(octokit, ref);

  await expect(promise).rejects.toBeInstanceOf(FetchError);
  await expect(promise).rejects.toThrow("Failed to fetch context for PR #7: boom");
});

test("fetchReviewContext rejects a malformed response", async () => {
  const { octokit } = makeOctokitSpy({
    graphqlResponse: { repository: { pullRequest: makePullRequest({ title: 42 }) } },
  });

  await expect(fetchReviewContext(octokit, ref)).rejects.toThrow("Malformed review context response for PR #7");
});

test("fetchReviewContext rejects a missing pull request", async () => {
  const { octokit } = makeOctokitSpy({ graphqlResponse: { repository: { pullRequest: null } } });

  await expect(fetchReviewContext(octokit, ref)).rejects.toThrow("Pull request #7 not found.");
});
