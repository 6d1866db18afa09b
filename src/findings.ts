import fs from "node:fs/promises";
import { Type, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { errorMessage } from "./errors.js";
import { SEVERITIES, VERDICTS, type Finding, type ReviewOutput, type Severity, type Verdict } from "./types.js";

export const DEFAULT_SUMMARY = "No summary.";
export const DEFAULT_SEVERITY: Severity = "suggestion";
export const DEFAULT_VERDICT: Verdict = "comment";

const Nullable = <T extends TSchema>(schema: T) => Type.Union([schema, Type.Null()]);

const FindingSchema = Type.Object({
  path: Type.String({ minLength: 1 }),
  line: Type.Integer({ minimum: 1 }),
  end_line: Type.Optional(Nullable(Type.Integer({ minimum: 1 }))),
  severity: Type.Optional(Nullable(Type.String())),
  title: Type.String({ minLength: 1 }),
  body: Type.String(),
});

const ReviewOutputSchema = Type.Object({
  summary: Type.Optional(Nullable(Type.String())),
  verdict: Type.Optional(Nullable(Type.String())),
  findings: Type.Optional(Nullable(Type.Array(Type.Unknown()))),
});

export interface RejectedFinding {
  index: number;
  reason: string;
}

export type ParsedReviewOutput =
  | { kind: "malformed"; reason: string }
  | { kind: "ok"; output: ReviewOutput; rejected: RejectedFinding[]; warnings: string[] };

export type ReviewOutputResult = { kind: "missing"; artifactPath: string } | ParsedReviewOutput;

export async function readReviewOutput(artifactPath: string): Promise<ReviewOutputResult> {
  let text: string;
  try {
    text = await fs.readFile(artifactPath, "utf8");
  } catch (error) {
    if (isNotFound(error)) {
      return { kind: "missing", artifactPath };
    }
    return { kind: "malformed", reason: `Unable to read ${artifactPath}: ${errorMessage(error)}` };
  }
  return parseReviewOutput(text);
}

/**
 * Validates the engine artifact and applies every default in one place:
 * severity, end_line, verdict and summary. Findings that fail the schema are
 * dropped individually and reported in `rejected`.
 */
export function parseReviewOutput(text: string): ParsedReviewOutput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return { kind: "malformed", reason: `Invalid JSON: ${errorMessage(error)}` };
  }

  if (!Value.Check(ReviewOutputSchema, parsed)) {
    return { kind: "malformed", reason: `Unexpected output shape: ${firstSchemaError(ReviewOutputSchema, parsed)}` };
  }

  const warnings: string[] = [];
  const rejected: RejectedFinding[] = [];
  const findings: Finding[] = [];
  const rawFindings = parsed.findings ?? [];
  for (let index = 0; index < rawFindings.length; index += 1) {
    const raw = rawFindings[index];
    if (!Value.Check(FindingSchema, raw)) {
      rejected.push({ index, reason: firstSchemaError(FindingSchema, raw) });
      continue;
    }
    let severity = DEFAULT_SEVERITY;
    if (raw.severity) {
      const known = pickLiteral(SEVERITIES, raw.severity);
      if (known) {
        severity = known;
      } else {
        warnings.push(`Finding ${index} has unknown severity "${raw.severity}"; using ${DEFAULT_SEVERITY}.`);
      }
    }
    findings.push({
      path: raw.path,
      line: raw.line,
      endLine: raw.end_line ?? raw.line,
      severity,
      title: raw.title,
      body: raw.body,
    });
  }

  let verdict = DEFAULT_VERDICT;
  if (parsed.verdict) {
    const known = pickLiteral(VERDICTS, parsed.verdict);
    if (known) {
      verdict = known;
    } else {
      warnings.push(`Unknown verdict "${parsed.verdict}"; using ${DEFAULT_VERDICT}.`);
    }
  }

  const summary = parsed.summary?.trim() ? parsed.summary : DEFAULT_SUMMARY;
  return { kind: "ok", output: { summary, verdict, findings }, rejected, warnings };
}

function pickLiteral<T extends string>(values: readonly T[], raw: string): T | undefined {
  const normalized = raw.trim().toLowerCase();
  return values.find((value) => value === normalized);
}

function firstSchemaError(schema: TSchema, value: unknown): string {
  const first = Value.Errors(schema, value).First();
  if (!first) return "unknown schema error";
  return `${first.path || "(root)"}: ${first.message}`;
}

function isNotFound(error: unknown): boolean {
  return Boolean(error && typeof error === "object" && "code" in error && error.code === "ENOENT");
}
