import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { expect, test } from "vitest";
import { readConfigFile } from "../src/app/config-file.js";
import {
  DEFAULT_MAX_DIFF_SIZE,
  OUTPUT_FILENAME,
  parseBooleanInput,
  parseMaxDiffSize,
  readConfig,
  splitPatterns,
} from "../src/app/config.js";

function makeTempRepo(configFile?: string): string {
  const repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), "review-relay-config-"));
  fs.mkdirSync(path.join(repoRoot, ".git"), { recursive: true });
  if (configFile !== undefined) {
    fs.writeFileSync(path.join(repoRoot, ".review-relay.yml"), configFile, "utf8");
  }
  return repoRoot;
}

function withEnv<T>(vars: Record<string, string>, fn: () => T): T {
  const previous = { ...process.env };
  Object.assign(process.env, vars);
  try {
    return fn();
  } finally {
    process.env = previous;
  }
}

test("readConfig applies defaults when only the model is set", () => {
  const repoRoot = makeTempRepo();

  const config = withEnv({ GITHUB_WORKSPACE: repoRoot, INPUT_MODEL: "provider/model-x" }, () => readConfig());

  expect(config).toEqual({
    modelId: "provider/model-x",
    maxDiffSize: DEFAULT_MAX_DIFF_SIZE,
    postSummary: true,
    instructions: undefined,
    ignorePatterns: [],
    engineCommand: "opencode",
    outputPath: path.join(os.tmpdir(), OUTPUT_FILENAME),
    repoRoot,
    debug: false,
  });
});

test("readConfig merges .review-relay.yml under action inputs", () => {
  const repoRoot = makeTempRepo(
    [
      "model: provider/from-file",
      "maxDiffSize: 5000",
      "postSummary: false",
      "instructions: Focus on SQL.",
      "ignorePatterns:",
      "  - '*.lock'",
      "engineCommand: /usr/local/bin/opencode",
    ].join("\n")
  );

  const config = withEnv(
    {
      GITHUB_WORKSPACE: repoRoot,
      INPUT_MODEL: "provider/from-input",
      "INPUT_MAX-DIFF-SIZE": "2000",
      "INPUT_IGNORE-PATTERNS": "dist/**, *.snap",
    },
    () => readConfig()
  );

  expect(config.modelId).toBe("provider/from-input");
  expect(config.maxDiffSize).toBe(2000);
  expect(config.postSummary).toBe(false);
  expect(config.instructions).toBe("Focus on SQL.");
  expect(config.ignorePatterns).toEqual(["dist/**", "*.snap"]);
  expect(config.engineCommand).toBe("/usr/local/bin/opencode");
});

test("readConfig reads the model from the config file", () => {
  const repoRoot = makeTempRepo("model: provider/from-file\n");

  const config = withEnv({ GITHUB_WORKSPACE: repoRoot }, () => readConfig());

  expect(config.modelId).toBe("provider/from-file");
});

test("readConfig requires a model", () => {
  const repoRoot = makeTempRepo();

  expect(() => withEnv({ GITHUB_WORKSPACE: repoRoot, INPUT_MODEL: "" }, () => readConfig())).toThrow(
    "Missing model. Set action input model or model in .review-relay.yml."
  );
});

test("readConfig requires a checkout", () => {
  const repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), "review-relay-config-"));

  expect(() => withEnv({ GITHUB_WORKSPACE: repoRoot, INPUT_MODEL: "m" }, () => readConfig())).toThrow(
    "Checkout missing. Ensure actions/checkout ran before this action."
  );
});

test("readConfig rejects an invalid post-summary input", () => {
  const repoRoot = makeTempRepo();

  expect(() =>
    withEnv({ GITHUB_WORKSPACE: repoRoot, INPUT_MODEL: "m", "INPUT_POST-SUMMARY": "sometimes" }, () => readConfig())
  ).toThrow("Invalid post-summary: sometimes (expected true or false)");
});

test("readConfig enables debug from the input", () => {
  const repoRoot = makeTempRepo();

  const config = withEnv({ GITHUB_WORKSPACE: repoRoot, INPUT_MODEL: "m", INPUT_DEBUG: "TRUE" }, () => readConfig());

  expect(config.debug).toBe(true);
});

test("readConfigFile returns null without a file and an empty object for an empty one", () => {
  expect(readConfigFile(makeTempRepo())).toBeNull();
  expect(readConfigFile(makeTempRepo(""))).toEqual({});
});

test("readConfigFile rejects unknown keys", () => {
  expect(() => readConfigFile(makeTempRepo("model: m\nprovider: google\n"))).toThrow(
    "Invalid .review-relay.yml: (root): must NOT have additional properties"
  );
});

test("readConfigFile rejects a non-positive maxDiffSize", () => {
  expect(() => readConfigFile(makeTempRepo("maxDiffSize: 0\n"))).toThrow(
    "Invalid .review-relay.yml: /maxDiffSize: must be >= 1"
  );
});

test("readConfigFile rejects a YAML list", () => {
  expect(() => readConfigFile(makeTempRepo("- a\n- b\n"))).toThrow(".review-relay.yml must contain a YAML object.");
});

test("readConfigFile reports YAML syntax errors", () => {
  expect(() => readConfigFile(makeTempRepo("model: [unclosed\n"))).toThrow("Invalid YAML in .review-relay.yml");
});

test("input parsers parses max-diff-size as a positive integer", () => {
  expect(parseMaxDiffSize("100000")).toBe(100_000);
  expect(() => parseMaxDiffSize("0")).toThrow("Invalid max-diff-size: 0");
  expect(() => parseMaxDiffSize("1.5")).toThrow("Invalid max-diff-size: 1.5");
  expect(() => parseMaxDiffSize("lots")).toThrow("Invalid max-diff-size: lots");
});

test("input parsers parses booleans case-insensitively", () => {
  expect(parseBooleanInput("debug", "True")).toBe(true);
  expect(parseBooleanInput("debug", "false")).toBe(false);
});

test("input parsers splits comma-separated patterns", () => {
  expect(splitPatterns(" *.md ,, dist/** ")).toEqual(["*.md", "dist/**"]);
});
