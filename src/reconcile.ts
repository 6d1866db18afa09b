import { errorMessage } from "./errors.js";
import type { Finding, GithubClient, PostResult, ReviewCommentParams, Severity } from "./types.js";

export interface ReviewCommentClient {
  rest: { pulls: GithubClient["rest"]["pulls"] };
}

export interface ReviewTarget {
  owner: string;
  repo: string;
  prNumber: number;
  headSha: string;
}

export const SEVERITY_ICONS: Record<Severity, string> = {
  error: "🔴",
  warning: "🟡",
  suggestion: "🔵",
};

export function formatFindingBody(finding: Finding): string {
  return `${SEVERITY_ICONS[finding.severity]} **${finding.title}**\n\n${finding.body}`;
}

export function buildReviewCommentParams(finding: Finding, target: ReviewTarget): ReviewCommentParams {
  const params: ReviewCommentParams = {
    owner: target.owner,
    repo: target.repo,
    pull_number: target.prNumber,
    body: formatFindingBody(finding),
    commit_id: target.headSha,
    path: finding.path,
    line: finding.endLine,
    side: "RIGHT",
  };
  if (finding.line !== finding.endLine) {
    params.start_line = finding.line;
    params.start_side = "RIGHT";
  }
  return params;
}

export function formatLocation(finding: Finding): string {
  if (finding.line === finding.endLine) return `${finding.path}:${finding.line}`;
  return `${finding.path}:${finding.line}-${finding.endLine}`;
}

/**
 * Posts findings one at a time in emission order, one request each, no
 * retries. A rejected request (422 when the line is outside the diff) turns
 * the finding into an out-of-diff result for the summary table.
 */
export async function reconcileFindings(params: {
  octokit: ReviewCommentClient;
  target: ReviewTarget;
  findings: readonly Finding[];
  logInfo?: (message: string) => void;
}): Promise<PostResult[]> {
  const log = params.logInfo ?? (() => {});
  const results: PostResult[] = [];
  for (const finding of params.findings) {
    try {
      await params.octokit.rest.pulls.createReviewComment(buildReviewCommentParams(finding, params.target));
      log(`  ✓ ${formatLocation(finding)} ${finding.title}`);
      results.push({ status: "posted", finding });
    } catch (error) {
      const httpStatus = extractHttpStatus(error);
      log(
        `  ✗ ${formatLocation(finding)} could not post inline (${httpStatus === null ? errorMessage(error) : `HTTP ${httpStatus}`})`
      );
      results.push({ status: "out_of_diff", finding, httpStatus });
    }
  }
  return results;
}

export function extractHttpStatus(error: unknown): number | null {
  if (!error || typeof error !== "object" || !("status" in error)) return null;
  return typeof error.status === "number" ? error.status : null;
}
