import { buildDiff, createGitRunner, type GitRunner } from "../diff.js";
import { runEngine } from "../engine.js";
import { EngineError } from "../errors.js";
import { readReviewOutput } from "../findings.js";
import { fetchReviewContext } from "../github-api.js";
import { buildReviewPrompt } from "../prompt.js";
import { reconcileFindings } from "../reconcile.js";
import { outOfDiffResults, postMissingOutputNotice, postSummary } from "../summary.js";
import type { GithubClient, PostResult, PullRequestRef, ReviewConfig, ReviewOutput } from "../types.js";
import { actionsLogger, createDebugLogger, type FlowLogger } from "./logger.js";

export type FlowOutcome =
  | { status: "reviewed"; output: ReviewOutput; results: PostResult[] }
  | { status: "no_output"; reason: string };

export interface ReviewFlowInput {
  config: ReviewConfig;
  ref: PullRequestRef;
  octokit: GithubClient;
  logger?: FlowLogger;
  runGit?: GitRunner;
  fetchReviewContextFn?: typeof fetchReviewContext;
  buildDiffFn?: typeof buildDiff;
  runEngineFn?: typeof runEngine;
  readReviewOutputFn?: typeof readReviewOutput;
}

/**
 * Runs the review pipeline once, strictly in order. Fetch, diff and engine
 * failures propagate and nothing is posted. A missing or unreadable artifact
 * posts a notice instead of comments.
 */
export async function runReviewFlow(input: ReviewFlowInput): Promise<FlowOutcome> {
  const { config, ref, octokit } = input;
  const logger = input.logger ?? actionsLogger;
  const logDebug = createDebugLogger(config.debug, logger);
  const fetchReviewContextImpl = input.fetchReviewContextFn ?? fetchReviewContext;
  const buildDiffImpl = input.buildDiffFn ?? buildDiff;
  const runEngineImpl = input.runEngineFn ?? runEngine;
  const readReviewOutputImpl = input.readReviewOutputFn ?? readReviewOutput;

  const context = await logger.group("Fetching PR context", async () => {
    const fetched = await fetchReviewContextImpl(octokit, ref, (message) => logger.warning(message));
    const resolved = fetched.reviewThreads.filter((thread) => thread.isResolved).length;
    logger.info(`PR #${fetched.number}: ${fetched.title} by @${fetched.author}`);
    logger.info(
      `Conversation comments: ${fetched.conversationComments.length}, review threads: ${fetched.reviewThreads.length} (${resolved} resolved)`
    );
    return fetched;
  });

  const diff = await logger.group("Generating diff", async () => {
    const bundle = await buildDiffImpl({
      context,
      maxDiffSize: config.maxDiffSize,
      ignorePatterns: config.ignorePatterns,
      runGit: input.runGit ?? createGitRunner(config.repoRoot),
      logDebug,
    });
    logger.info(`Diff size: ${bundle.originalSize} bytes`);
    if (bundle.truncated) {
      logger.warning(`Diff truncated from ${bundle.originalSize} to ${bundle.truncatedSize} bytes.`);
    }
    return bundle;
  });

  const prompt = await logger.group("Building prompt", async () => {
    const document = buildReviewPrompt({
      context,
      diff,
      instructions: config.instructions,
      outputPath: config.outputPath,
    });
    logger.info(`Prompt built: ${Buffer.byteLength(document, "utf8")} bytes`);
    return document;
  });

  const engine = await logger.group("Running review engine", async () => {
    const result = await runEngineImpl({
      prompt,
      modelId: config.modelId,
      engineCommand: config.engineCommand,
      outputPath: config.outputPath,
      repoRoot: config.repoRoot,
      logDebug,
    });
    if (result.kind === "process_failure") {
      const status = result.exitCode === null ? "could not be started" : `exited with status ${result.exitCode}`;
      logger.error(`Review engine ${status}.`);
      logger.error(result.log);
      throw new EngineError(`Review engine ${status}.`, result.exitCode, result.log);
    }
    logDebug(`[debug] Engine log: ${Buffer.byteLength(result.log, "utf8")} bytes`);
    return result;
  });

  const parsed = await logger.group("Reading review output", async () => {
    const result = await readReviewOutputImpl(engine.artifactPath);
    if (result.kind !== "ok") {
      const reason =
        result.kind === "missing"
          ? `Review engine did not produce ${result.artifactPath}.`
          : `Review output is malformed: ${result.reason}`;
      logger.warning(reason);
      logger.info(`Engine output was:\n${engine.log}`);
      await postMissingOutputNotice({ octokit, ref });
      return { kind: "no_output" as const, reason };
    }
    for (const warning of result.warnings) {
      logger.warning(warning);
    }
    for (const rejected of result.rejected) {
      logger.warning(`Skipping finding ${rejected.index}: ${rejected.reason}`);
    }
    logger.info(`Findings: ${result.output.findings.length}`);
    return { kind: "ok" as const, output: result.output };
  });

  if (parsed.kind === "no_output") {
    return { status: "no_output", reason: parsed.reason };
  }
  const { output } = parsed;

  const results = await logger.group("Posting review comments", () =>
    reconcileFindings({
      octokit,
      target: { owner: ref.owner, repo: ref.repo, prNumber: ref.prNumber, headSha: context.headSha },
      findings: output.findings,
      logInfo: (message) => logger.info(message),
    })
  );
  const outOfDiff = outOfDiffResults(results).length;
  logger.info(`Inline comments posted: ${results.length - outOfDiff}, outside the diff: ${outOfDiff}`);

  if (config.postSummary) {
    await logger.group("Posting summary", () =>
      postSummary({
        octokit,
        ref,
        content: { verdict: output.verdict, summary: output.summary, results, model: config.modelId },
      })
    );
  } else {
    logDebug("[debug] Summary posting disabled.");
  }

  return { status: "reviewed", output, results };
}
