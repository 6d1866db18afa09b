import * as github from "@actions/github";
import type { PullRequestRef } from "../types.js";

export function readPullRequestRef(): PullRequestRef {
  const ctx = github.context;
  return pullRequestRefFromEvent(ctx.repo, ctx.payload);
}

export function pullRequestRefFromEvent(
  repo: { owner: string; repo: string },
  payload: { pull_request?: Record<string, unknown>; issue?: Record<string, unknown> }
): PullRequestRef {
  const pr = payload.pull_request;
  const prNumber = asNumber(pr?.number) ?? asNumber(payload.issue?.number);
  if (!prNumber) {
    throw new Error("No pull request found in event payload.");
  }
  return {
    owner: repo.owner,
    repo: repo.repo,
    prNumber,
    baseSha: readSha(pr?.base),
    headSha: readSha(pr?.head),
  };
}

function asNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) ? value : undefined;
}

function readSha(ref: unknown): string | undefined {
  if (!ref || typeof ref !== "object" || !("sha" in ref)) return undefined;
  return typeof ref.sha === "string" && ref.sha ? ref.sha : undefined;
}
