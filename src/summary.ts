import { formatLocation, SEVERITY_ICONS } from "./reconcile.js";
import type { GithubClient, PostResult, PullRequestRef, Verdict } from "./types.js";

export type OutOfDiffResult = Extract<PostResult, { status: "out_of_diff" }>;

export interface SummaryContent {
  verdict: string;
  summary: string;
  results: readonly PostResult[];
  model: string;
}

export interface IssueCommentClient {
  rest: { issues: GithubClient["rest"]["issues"] };
}

const VERDICT_BADGES: Record<Verdict, string> = {
  approve: "✅ **Approve**",
  request_changes: "❌ **Changes requested**",
  comment: "💬 **Comment**",
};

export const MISSING_OUTPUT_NOTICE =
  "**Automated Review**: The review completed but no structured output was produced. Check the Actions log for details.";

export function verdictBadge(verdict: string): string {
  switch (verdict) {
    case "approve":
    case "request_changes":
      return VERDICT_BADGES[verdict];
    default:
      return VERDICT_BADGES.comment;
  }
}

export function outOfDiffResults(results: readonly PostResult[]): OutOfDiffResult[] {
  return results.filter((result): result is OutOfDiffResult => result.status === "out_of_diff");
}

export function buildSummaryMarkdown(content: SummaryContent): string {
  const parts = ["## Automated Review", verdictBadge(content.verdict), content.summary];
  const outOfDiff = outOfDiffResults(content.results);
  if (outOfDiff.length > 0) {
    parts.push(
      [
        "### Findings outside the diff",
        "",
        "These could not be posted as inline comments because the lines are not part of the diff.",
        "",
        "| Location | Severity | Issue |",
        "|----------|----------|-------|",
        ...outOfDiff.map(renderRow),
      ].join("\n")
    );
  }
  parts.push(`---\n<sub>Reviewed by review-relay · model \`${content.model}\`</sub>`);
  return parts.join("\n\n");
}

function renderRow(result: OutOfDiffResult): string {
  const { finding } = result;
  return `| \`${formatLocation(finding)}\` | ${SEVERITY_ICONS[finding.severity]} ${finding.severity} | ${escapeCell(finding.title)} |`;
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

export async function postSummary(params: {
  octokit: IssueCommentClient;
  ref: PullRequestRef;
  content: SummaryContent;
}): Promise<void> {
  await params.octokit.rest.issues.createComment({
    owner: params.ref.owner,
    repo: params.ref.repo,
    issue_number: params.ref.prNumber,
    body: buildSummaryMarkdown(params.content),
  });
}

export async function postMissingOutputNotice(params: { octokit: IssueCommentClient; ref: PullRequestRef }): Promise<void> {
  await params.octokit.rest.issues.createComment({
    owner: params.ref.owner,
    repo: params.ref.repo,
    issue_number: params.ref.prNumber,
    body: MISSING_OUTPUT_NOTICE,
  });
}
