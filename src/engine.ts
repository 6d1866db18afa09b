import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "./errors.js";

export type EngineResult =
  | { kind: "success"; artifactPath: string; log: string }
  | { kind: "process_failure"; exitCode: number | null; log: string };

export interface ProcessOutcome {
  exitCode: number | null;
  output: string;
}

export interface ProcessOptions {
  cwd: string;
  input?: string;
}

export type ProcessRunner = (command: string, args: string[], options: ProcessOptions) => Promise<ProcessOutcome>;

export interface EngineRunInput {
  prompt: string;
  modelId: string;
  engineCommand: string;
  outputPath: string;
  repoRoot: string;
  runProcess?: ProcessRunner;
  logDebug?: (message: string) => void;
}

export const PROMPT_FILENAME = "review-relay-prompt.md";

/**
 * Runs the engine without a timeout. `input` is written to stdin, which is
 * then closed; stdout and stderr are interleaved into one log in arrival
 * order. A spawn error, synchronous or emitted, resolves with a null exit
 * code instead of rejecting.
 */
export const runProcess: ProcessRunner = (command, args, options) =>
  new Promise((resolve) => {
    const chunks: Buffer[] = [];
    let settled = false;
    const finish = (exitCode: number | null) => {
      if (settled) return;
      settled = true;
      resolve({ exitCode, output: Buffer.concat(chunks).toString("utf8") });
    };
    const fail = (error: unknown) => {
      chunks.push(Buffer.from(`${errorMessage(error)}\n`, "utf8"));
      finish(null);
    };

    let child: ChildProcessWithoutNullStreams;
    try {
      child = spawn(command, args, { cwd: options.cwd });
    } catch (error) {
      fail(error);
      return;
    }
    child.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => chunks.push(chunk));
    // EPIPE when the engine exits without reading its input; the exit code decides the outcome.
    child.stdin.on("error", (error) => chunks.push(Buffer.from(`stdin: ${error.message}\n`, "utf8")));
    child.on("error", fail);
    child.on("close", (code) => finish(code));
    child.stdin.end(options.input ?? "");
  });

export async function runEngine(input: EngineRunInput): Promise<EngineResult> {
  const runner = input.runProcess ?? runProcess;
  const log = input.logDebug ?? (() => {});

  await fs.rm(input.outputPath, { force: true });
  const promptPath = path.join(path.dirname(input.outputPath), PROMPT_FILENAME);
  await fs.writeFile(promptPath, input.prompt, "utf8");
  log(`[debug] Prompt written to ${promptPath}`);

  const args = ["run", "--model", input.modelId];
  const outcome = await runner(input.engineCommand, args, { cwd: input.repoRoot, input: input.prompt });
  if (outcome.exitCode !== 0) {
    return { kind: "process_failure", exitCode: outcome.exitCode, log: outcome.output };
  }
  return { kind: "success", artifactPath: input.outputPath, log: outcome.output };
}
