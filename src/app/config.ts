import * as core from "@actions/core";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { readConfigFile } from "./config-file.js";
import type { ReviewConfig } from "../types.js";

export const DEFAULT_MAX_DIFF_SIZE = 100_000;
export const DEFAULT_ENGINE_COMMAND = "opencode";
export const OUTPUT_FILENAME = "review-relay-output.json";

function getOptionalInput(name: string): string | undefined {
  const trimmed = core.getInput(name).trim();
  return trimmed ? trimmed : undefined;
}

export function readConfig(): ReviewConfig {
  const repoRoot = process.env.GITHUB_WORKSPACE || process.cwd();
  if (!fs.existsSync(path.join(repoRoot, ".git"))) {
    throw new Error("Checkout missing. Ensure actions/checkout ran before this action.");
  }

  const file = readConfigFile(repoRoot) ?? {};

  const modelId = getOptionalInput("model") ?? file.model ?? "";
  if (!modelId) {
    throw new Error("Missing model. Set action input model or model in .review-relay.yml.");
  }

  const maxDiffSizeInput = getOptionalInput("max-diff-size");
  const maxDiffSize = maxDiffSizeInput ? parseMaxDiffSize(maxDiffSizeInput) : file.maxDiffSize ?? DEFAULT_MAX_DIFF_SIZE;

  const postSummaryInput = getOptionalInput("post-summary");
  const postSummary = postSummaryInput
    ? parseBooleanInput("post-summary", postSummaryInput)
    : file.postSummary ?? true;

  const ignorePatternsInput = getOptionalInput("ignore-patterns");
  const ignorePatterns = ignorePatternsInput ? splitPatterns(ignorePatternsInput) : file.ignorePatterns ?? [];

  const debugInput = getOptionalInput("debug");

  return {
    modelId,
    maxDiffSize,
    postSummary,
    instructions: getOptionalInput("review-prompt") ?? file.instructions,
    ignorePatterns,
    engineCommand: getOptionalInput("engine-command") ?? file.engineCommand ?? DEFAULT_ENGINE_COMMAND,
    outputPath: path.join(os.tmpdir(), OUTPUT_FILENAME),
    repoRoot,
    debug: debugInput ? parseBooleanInput("debug", debugInput) : false,
  };
}

export function parseMaxDiffSize(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid max-diff-size: ${value}`);
  }
  return parsed;
}

export function parseBooleanInput(name: string, value: string): boolean {
  switch (value.toLowerCase()) {
    case "true":
      return true;
    case "false":
      return false;
    default:
      throw new Error(`Invalid ${name}: ${value} (expected true or false)`);
  }
}

export function splitPatterns(value: string): string[] {
  return value
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
}
