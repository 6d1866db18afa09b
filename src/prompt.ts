import type { Comment, DiffBundle, ReviewContext, ReviewThread } from "./types.js";

export interface PromptInput {
  context: ReviewContext;
  diff: DiffBundle;
  instructions?: string;
  outputPath: string;
}

export function buildRulesSection(outputPath: string): string {
  return `You are a senior code reviewer. Your job is to review the pull request below.

## Rules

1. **Full codebase access**: You are running inside the repository. Use your
   file-reading tools to look at ANY file you need for context (imports,
   callers, tests, configs, etc.). Do NOT limit yourself to the diff.

2. **Do NOT duplicate existing comments**: The section "Existing review
   threads" lists every comment already posted on this PR, tagged as either
   RESOLVED or UNRESOLVED.
   - **RESOLVED** threads: the issue was raised and fixed. Do not mention it.
   - **UNRESOLVED** threads: the issue was already raised and is still open.
     Do not raise it again.
   Only raise **new** issues that have not been mentioned in any thread.

3. **Focus on what matters**: Prioritize correctness, security, performance,
   and maintainability bugs introduced by this PR. Avoid nitpicks and style
   preferences unless they cause real problems.

4. **Be precise**: Every finding must reference the exact file path (relative
   to the repo root) and line number(s) in the HEAD version of the file. If
   you are unsure, read the file first.

5. **Structured output**: After your analysis, write a JSON file to
   \`${outputPath}\` with this exact schema:

\`\`\`json
{
  "summary": "<markdown summary of the review>",
  "verdict": "approve | request_changes | comment",
  "findings": [
    {
      "path": "relative/path/to/file",
      "line": 42,
      "end_line": 42,
      "severity": "error | warning | suggestion",
      "title": "Short title (max 80 chars)",
      "body": "Detailed explanation in markdown"
    }
  ]
}
\`\`\`

   - \`line\` / \`end_line\`: line numbers in the new (HEAD) version of the file.
     For single-line comments set both to the same value.
   - If there are no findings, set \`findings\` to an empty array \`[]\`.
   - You MUST write this file as your final action. The CI pipeline reads it.
`;
}

export function buildReviewPrompt(input: PromptInput): string {
  const { context, diff } = input;
  const sections = [buildRulesSection(input.outputPath)];

  const instructions = input.instructions?.trim();
  if (instructions) {
    sections.push(`## Additional review instructions\n\n${instructions}\n`);
  }

  sections.push(`---

## Pull Request

- **Title**: ${context.title}
- **Author**: @${context.author}
- **PR**: #${context.number}
- **Base**: \`${context.baseRef}\` (${shortSha(context.baseSha)})
- **Head**: \`${context.headRef}\` (${shortSha(context.headSha)})

### Description

${context.body}

---

## Conversation comments

${formatConversation(context.conversationComments)}

---

## Existing review threads

${formatThreads(context.reviewThreads)}

---

## Diff
${truncationAdvisory(diff)}
${fenceDiff(diff.rawDiff.toString("utf8"))}
`);

  return sections.join("\n");
}

export function truncationAdvisory(diff: DiffBundle): string {
  if (!diff.truncated) return "";
  return `
> **Note**: The diff was truncated from ${diff.originalSize} to ${diff.truncatedSize} bytes.
> Use your file-reading tools to inspect the full content of any file.
`;
}

export function formatConversation(comments: Comment[]): string {
  if (comments.length === 0) return "None.";
  return comments
    .map((comment) => `- **@${comment.author}** (${comment.createdAt}):\n  ${indentLines(comment.body, "  ")}`)
    .join("\n\n");
}

export function formatThreads(threads: ReviewThread[]): string {
  if (threads.length === 0) return "None.";
  return threads.map(formatThread).join("\n\n");
}

function formatThread(thread: ReviewThread): string {
  const tags = [thread.isResolved ? "[RESOLVED]" : "[UNRESOLVED]"];
  if (thread.isOutdated) tags.push("[OUTDATED]");
  const header = `### ${tags.join(" ")} \`${thread.path}\` ${formatAnchor(thread)}`;
  const comments = thread.comments.map((comment) => `> **@${comment.author}**: ${indentLines(comment.body, "> ")}`);
  return [header, ...comments].join("\n");
}

function formatAnchor(thread: ReviewThread): string {
  if (thread.line === null) return "(file-level)";
  if (thread.startLine !== null && thread.startLine !== thread.line) {
    return `lines ${thread.startLine}-${thread.line}`;
  }
  return `line ${thread.line}`;
}

function indentLines(text: string, prefix: string): string {
  return text.split("\n").join(`\n${prefix}`);
}

function shortSha(sha: string): string {
  return sha.slice(0, 8);
}

/** Fence long enough that backtick runs inside the diff cannot close it. */
function fenceDiff(diff: string): string {
  const longestRun = (diff.match(/`+/g) ?? []).reduce((max, run) => Math.max(max, run.length), 0);
  const fence = "`".repeat(Math.max(3, longestRun + 1));
  return `${fence}diff\n${diff}\n${fence}`;
}
