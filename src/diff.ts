import { execFile } from "node:child_process";
import path from "node:path";
import { promisify } from "node:util";
import { minimatch } from "minimatch";
import { DiffError, errorMessage } from "./errors.js";
import type { DiffBundle, ReviewContext } from "./types.js";

const execFileAsync = promisify(execFile);

export const DIFF_CONTEXT_LINES = 5;
const GIT_MAX_BUFFER = 256 * 1024 * 1024;

export type GitRunner = (args: string[]) => Promise<Buffer>;

export interface BuildDiffInput {
  context: Pick<ReviewContext, "number" | "baseRef" | "baseSha" | "headSha">;
  maxDiffSize: number;
  ignorePatterns: string[];
  runGit: GitRunner;
  logDebug?: (message: string) => void;
}

export function createGitRunner(repoRoot: string): GitRunner {
  return async (args) => {
    try {
      return await execGit(repoRoot, args);
    } catch (error) {
      const message = gitFailureMessage(error);
      if (!/dubious ownership/i.test(message)) {
        throw new Error(`git ${args.join(" ")} failed: ${message}`);
      }
      await execFileAsync("git", ["config", "--global", "--add", "safe.directory", path.resolve(repoRoot)]);
      try {
        return await execGit(repoRoot, args);
      } catch (retryError) {
        throw new Error(`git ${args.join(" ")} failed: ${gitFailureMessage(retryError)}`);
      }
    }
  };
}

async function execGit(cwd: string, args: string[]): Promise<Buffer> {
  const { stdout } = await execFileAsync("git", args, { cwd, encoding: "buffer", maxBuffer: GIT_MAX_BUFFER });
  return stdout;
}

function gitFailureMessage(error: unknown): string {
  if (error && typeof error === "object" && "stderr" in error) {
    const stderr = String(error.stderr ?? "").trim();
    if (stderr) return stderr;
  }
  return errorMessage(error);
}

export async function buildDiff(input: BuildDiffInput): Promise<DiffBundle> {
  const { context, runGit } = input;
  const log = input.logDebug ?? (() => {});

  try {
    await runGit(["fetch", "--no-tags", "--quiet", "origin", context.baseRef, `+refs/pull/${context.number}/head`]);
  } catch (error) {
    log(`[debug] git fetch failed, diffing with local refs: ${errorMessage(error)}`);
  }

  const unified = `--unified=${DIFF_CONTEXT_LINES}`;
  let raw: Buffer;
  try {
    raw = await runGit(["diff", unified, `${context.baseSha}...${context.headSha}`]);
  } catch (primaryError) {
    log(`[debug] diff ${context.baseSha}...${context.headSha} failed: ${errorMessage(primaryError)}`);
    try {
      raw = await runGit(["diff", unified, `origin/${context.baseRef}...HEAD`]);
    } catch (fallbackError) {
      throw new DiffError(
        `Unable to compute diff. ${context.baseSha}...${context.headSha}: ${errorMessage(primaryError)}; ` +
          `origin/${context.baseRef}...HEAD: ${errorMessage(fallbackError)}`
      );
    }
  }

  return truncateDiff(filterDiff(raw, input.ignorePatterns), input.maxDiffSize);
}

/** Byte-prefix cut. Hunk and UTF-8 boundaries are not respected. */
export function truncateDiff(raw: Buffer, maxBytes: number): DiffBundle {
  const originalSize = raw.length;
  if (originalSize <= maxBytes) {
    return { rawDiff: raw, originalSize, truncated: false, truncatedSize: originalSize };
  }
  const rawDiff = raw.subarray(0, maxBytes);
  return { rawDiff, originalSize, truncated: true, truncatedSize: rawDiff.length };
}

const SECTION_BOUNDARY = Buffer.from("\ndiff --git ", "utf8");
const GIT_ESCAPES: Record<string, string> = { a: "\x07", b: "\b", f: "\f", n: "\n", r: "\r", t: "\t", v: "\v" };

/**
 * Drops whole `diff --git` sections whose path matches one of the patterns.
 * Kept sections are sliced from the original buffer, so their bytes are
 * preserved even when they are not valid UTF-8.
 */
export function filterDiff(raw: Buffer, patterns: string[]): Buffer {
  if (patterns.length === 0) return raw;
  const sections = splitSections(raw);
  const kept = sections.filter((section) => {
    const filePath = sectionPath(section);
    if (!filePath) return true;
    return !patterns.some((pattern) => minimatch(filePath, pattern, { matchBase: true, dot: true }));
  });
  if (kept.length === sections.length) return raw;
  return Buffer.concat(kept);
}

function splitSections(raw: Buffer): Buffer[] {
  const sections: Buffer[] = [];
  let start = 0;
  let boundary = raw.indexOf(SECTION_BOUNDARY);
  while (boundary !== -1) {
    sections.push(raw.subarray(start, boundary + 1));
    start = boundary + 1;
    boundary = raw.indexOf(SECTION_BOUNDARY, start);
  }
  if (start < raw.length) sections.push(raw.subarray(start));
  return sections;
}

/** New-side path of a section; the old side for deletions. */
function sectionPath(section: Buffer): string | null {
  const hunk = section.indexOf("\n@@");
  const header = section.subarray(0, hunk === -1 ? section.length : hunk).toString("utf8").split("\n");
  if (!header[0].startsWith("diff --git ")) return null;
  return (
    markerPath(header, "+++ ", "b/") ?? markerPath(header, "--- ", "a/") ?? gitHeaderPath(header[0].slice("diff --git ".length))
  );
}

function markerPath(header: string[], marker: string, prefix: string): string | null {
  const line = header.find((entry) => entry.startsWith(marker));
  if (!line) return null;
  // git appends a tab to names containing spaces
  const name = unquoteGitPath(line.slice(marker.length).replace(/\t$/, ""));
  return name.startsWith(prefix) ? name.slice(prefix.length) : null;
}

/** Binary and mode-only sections carry their path only in the `diff --git` line. */
function gitHeaderPath(rest: string): string | null {
  const quoted = rest.match(/("b\/(?:[^"\\]|\\.)*")$/);
  if (quoted) return unquoteGitPath(quoted[1]).slice(2);
  const half = (rest.length - 5) / 2;
  if (Number.isInteger(half) && rest.startsWith("a/") && rest.slice(2 + half, 5 + half) === " b/") {
    const oldPath = rest.slice(2, 2 + half);
    if (oldPath === rest.slice(5 + half)) return oldPath;
  }
  const index = rest.lastIndexOf(" b/");
  return index === -1 ? null : rest.slice(index + 3);
}

function unquoteGitPath(value: string): string {
  if (value.length < 2 || !value.startsWith('"') || !value.endsWith('"')) return value;
  const body = value.slice(1, -1);
  const bytes: number[] = [];
  for (let index = 0; index < body.length; index += 1) {
    const char = body[index];
    if (char !== "\\") {
      bytes.push(...Buffer.from(char, "utf8"));
      continue;
    }
    const octal = body.slice(index + 1, index + 4);
    if (/^[0-7]{3}$/.test(octal)) {
      bytes.push(Number.parseInt(octal, 8));
      index += 3;
      continue;
    }
    const escaped = body[index + 1] ?? "";
    bytes.push(...Buffer.from(GIT_ESCAPES[escaped] ?? escaped, "utf8"));
    index += 1;
  }
  return Buffer.from(bytes).toString("utf8");
}
