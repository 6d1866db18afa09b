import * as core from "@actions/core";
import * as github from "@actions/github";
import { readConfig } from "./app/config.js";
import { readPullRequestRef } from "./app/context.js";
import { runReviewFlow } from "./app/flow.js";
import { resolveGithubAuth } from "./app/github-auth.js";
import { errorMessage } from "./errors.js";

async function main(): Promise<void> {
  try {
    const config = readConfig();
    const ref = readPullRequestRef();
    const auth = await resolveGithubAuth();
    const octokit = github.getOctokit(auth.token);
    if (config.debug) {
      core.info(`[debug] GitHub auth: ${auth.kind === "github-app" ? `app ${auth.appId}` : "GITHUB_TOKEN"}`);
      core.info(`[debug] Model: ${config.modelId}, max diff size: ${config.maxDiffSize} bytes`);
    }

    const outcome = await runReviewFlow({ config, ref, octokit });
    if (outcome.status === "no_output") {
      core.info(`Review finished without structured output: ${outcome.reason}`);
      return;
    }
    core.info("Review complete.");
  } catch (error) {
    core.setFailed(errorMessage(error));
  }
}

void main();
