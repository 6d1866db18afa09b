import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { FetchError, errorMessage } from "./errors.js";
import type { Comment, GithubClient, PullRequestRef, ReviewContext, ReviewThread } from "./types.js";

export const CONVERSATION_PAGE_SIZE = 100;
export const THREAD_PAGE_SIZE = 100;
export const THREAD_COMMENT_PAGE_SIZE = 20;

const NO_DESCRIPTION = "No description provided.";
const UNKNOWN_AUTHOR = "ghost";

export const REVIEW_CONTEXT_QUERY = `query($owner: String!, $repo: String!, $number: Int!) {
  repository(owner: $owner, name: $repo) {
    pullRequest(number: $number) {
      number
      title
      body
      author { login }
      baseRefName
      headRefName
      baseRefOid
      headRefOid
      comments(first: ${CONVERSATION_PAGE_SIZE}, orderBy: { field: UPDATED_AT, direction: ASC }) {
        nodes {
          author { login }
          body
          createdAt
        }
        pageInfo { hasNextPage }
      }
      reviewThreads(first: ${THREAD_PAGE_SIZE}) {
        nodes {
          isResolved
          isOutdated
          path
          line
          startLine
          comments(first: ${THREAD_COMMENT_PAGE_SIZE}) {
            nodes {
              author { login }
              body
              createdAt
            }
            pageInfo { hasNextPage }
          }
        }
        pageInfo { hasNextPage }
      }
    }
  }
}`;

const Nullable = <T extends TSchema>(schema: T) => Type.Union([schema, Type.Null()]);

const PageInfoSchema = Type.Optional(Nullable(Type.Object({ hasNextPage: Type.Boolean() })));

const CommentNodeSchema = Type.Object({
  author: Type.Optional(Nullable(Type.Object({ login: Type.String() }))),
  body: Type.Optional(Nullable(Type.String())),
  createdAt: Type.Optional(Nullable(Type.String())),
});

const CommentConnectionSchema = Type.Object({
  nodes: Type.Optional(Nullable(Type.Array(Nullable(CommentNodeSchema)))),
  pageInfo: PageInfoSchema,
});

const ThreadNodeSchema = Type.Object({
  isResolved: Type.Boolean(),
  isOutdated: Type.Boolean(),
  path: Type.String(),
  line: Type.Optional(Nullable(Type.Integer())),
  startLine: Type.Optional(Nullable(Type.Integer())),
  comments: Type.Optional(Nullable(CommentConnectionSchema)),
});

const PullRequestSchema = Type.Object({
  number: Type.Integer(),
  title: Type.String(),
  body: Type.Optional(Nullable(Type.String())),
  author: Type.Optional(Nullable(Type.Object({ login: Type.String() }))),
  baseRefName: Type.String(),
  headRefName: Type.String(),
  baseRefOid: Type.String(),
  headRefOid: Type.String(),
  comments: CommentConnectionSchema,
  reviewThreads: Type.Object({
    nodes: Type.Optional(Nullable(Type.Array(Nullable(ThreadNodeSchema)))),
    pageInfo: PageInfoSchema,
  }),
});

const ReviewContextResponseSchema = Type.Object({
  repository: Nullable(
    Type.Object({
      pullRequest: Nullable(PullRequestSchema),
    })
  ),
});

type ReviewContextResponse = Static<typeof ReviewContextResponseSchema>;
type CommentConnection = Static<typeof CommentConnectionSchema>;
type PullRequestNode = Static<typeof PullRequestSchema>;

export async function fetchReviewContext(
  octokit: Pick<GithubClient, "graphql">,
  ref: PullRequestRef,
  logWarning?: (message: string) => void
): Promise<ReviewContext> {
  let response: unknown;
  try {
    response = await octokit.graphql(REVIEW_CONTEXT_QUERY, {
      owner: ref.owner,
      repo: ref.repo,
      number: ref.prNumber,
    });
  } catch (error) {
    throw new FetchError(`Failed to fetch context for PR #${ref.prNumber}: ${errorMessage(error)}`);
  }

  const pr = parseReviewContextResponse(response, ref.prNumber);
  for (const warning of collectPageWarnings(pr)) {
    logWarning?.(warning);
  }
  return normalizeReviewContext(pr, ref);
}

function parseReviewContextResponse(response: unknown, prNumber: number): PullRequestNode {
  if (!Value.Check(ReviewContextResponseSchema, response)) {
    const first = Value.Errors(ReviewContextResponseSchema, response).First();
    const where = first ? `${first.path || "(root)"}: ${first.message}` : "unknown shape";
    throw new FetchError(`Malformed review context response for PR #${prNumber}: ${where}`);
  }
  const checked: ReviewContextResponse = response;
  const pr = checked.repository?.pullRequest;
  if (!pr) {
    throw new FetchError(`Pull request #${prNumber} not found.`);
  }
  return pr;
}

function normalizeReviewContext(pr: PullRequestNode, ref: PullRequestRef): ReviewContext {
  const body = pr.body?.trim() ? pr.body : NO_DESCRIPTION;
  const reviewThreads: ReviewThread[] = [];
  for (const thread of pr.reviewThreads.nodes ?? []) {
    if (!thread) continue;
    reviewThreads.push({
      isResolved: thread.isResolved,
      isOutdated: thread.isOutdated,
      path: thread.path,
      line: thread.line ?? null,
      startLine: thread.startLine ?? null,
      comments: normalizeComments(thread.comments ?? null),
    });
  }

  return {
    number: pr.number,
    title: pr.title,
    body,
    author: pr.author?.login ?? UNKNOWN_AUTHOR,
    baseRef: pr.baseRefName,
    headRef: pr.headRefName,
    baseSha: ref.baseSha || pr.baseRefOid,
    headSha: ref.headSha || pr.headRefOid,
    conversationComments: normalizeComments(pr.comments),
    reviewThreads,
  };
}

function normalizeComments(connection: CommentConnection | null): Comment[] {
  const comments: Comment[] = [];
  for (const node of connection?.nodes ?? []) {
    if (!node) continue;
    comments.push({
      author: node.author?.login ?? UNKNOWN_AUTHOR,
      body: node.body ?? "",
      createdAt: node.createdAt ?? "",
    });
  }
  return comments;
}

function collectPageWarnings(pr: PullRequestNode): string[] {
  const warnings: string[] = [];
  if (pr.comments.pageInfo?.hasNextPage) {
    warnings.push(`PR has more than ${CONVERSATION_PAGE_SIZE} conversation comments; only the oldest are included.`);
  }
  if (pr.reviewThreads.pageInfo?.hasNextPage) {
    warnings.push(`PR has more than ${THREAD_PAGE_SIZE} review threads; only the first page is included.`);
  }
  const longThreads = (pr.reviewThreads.nodes ?? []).filter((thread) => thread?.comments?.pageInfo?.hasNextPage);
  if (longThreads.length > 0) {
    warnings.push(
      `${longThreads.length} review thread(s) have more than ${THREAD_COMMENT_PAGE_SIZE} comments; replies beyond that are omitted.`
    );
  }
  return warnings;
}
