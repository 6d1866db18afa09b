export interface PullRequestRef {
  owner: string;
  repo: string;
  prNumber: number;
  baseSha?: string;
  headSha?: string;
}

export interface Comment {
  author: string;
  body: string;
  createdAt: string;
}

export interface ReviewThread {
  isResolved: boolean;
  isOutdated: boolean;
  path: string;
  line: number | null;
  startLine: number | null;
  comments: Comment[];
}

export interface ReviewContext {
  number: number;
  title: string;
  body: string;
  author: string;
  baseRef: string;
  headRef: string;
  baseSha: string;
  headSha: string;
  conversationComments: Comment[];
  reviewThreads: ReviewThread[];
}

export interface DiffBundle {
  rawDiff: Buffer;
  originalSize: number;
  truncated: boolean;
  truncatedSize: number;
}

export const SEVERITIES = ["error", "warning", "suggestion"] as const;
export type Severity = (typeof SEVERITIES)[number];

export const VERDICTS = ["approve", "request_changes", "comment"] as const;
export type Verdict = (typeof VERDICTS)[number];

export interface Finding {
  path: string;
  line: number;
  endLine: number;
  severity: Severity;
  title: string;
  body: string;
}

export interface ReviewOutput {
  summary: string;
  verdict: Verdict;
  findings: Finding[];
}

export type PostResult =
  | { status: "posted"; finding: Finding }
  | { status: "out_of_diff"; finding: Finding; httpStatus: number | null };

export interface ReviewConfig {
  modelId: string;
  maxDiffSize: number;
  postSummary: boolean;
  instructions?: string;
  ignorePatterns: string[];
  engineCommand: string;
  outputPath: string;
  repoRoot: string;
  debug: boolean;
}

export interface ReviewRelayFile {
  model?: string;
  maxDiffSize?: number;
  postSummary?: boolean;
  instructions?: string;
  ignorePatterns?: string[];
  engineCommand?: string;
}

export type ReviewCommentParams = {
  owner: string;
  repo: string;
  pull_number: number;
  body: string;
  commit_id: string;
  path: string;
  line: number;
  side: "RIGHT";
  start_line?: number;
  start_side?: "RIGHT";
};

export type IssueCommentParams = {
  owner: string;
  repo: string;
  issue_number: number;
  body: string;
};

export type ReviewContextQueryVariables = {
  owner: string;
  repo: string;
  number: number;
};

/**
 * The slice of the `@actions/github` Octokit client the pipeline talks to.
 * `ReturnType<typeof getOctokit>` satisfies it; tests pass plain fakes.
 */
export interface GithubClient {
  graphql(query: string, variables: ReviewContextQueryVariables): Promise<unknown>;
  rest: {
    pulls: {
      createReviewComment(params: ReviewCommentParams): Promise<unknown>;
    };
    issues: {
      createComment(params: IssueCommentParams): Promise<unknown>;
    };
  };
}
