import type { ScoredCandidate, VulnerabilityRecord } from "../types";

export interface ArbitrationPrompt {
  system: string;
  prompt: string;
}

const SYSTEM = [
  "You are a security engineer identifying the commit that fixes a published vulnerability.",
  "You are shown the advisory and a numbered list of candidate commits with their diffs.",
  "Judge only from the material shown. Do not invent commits.",
  "Reply with a single JSON object and nothing else:",
  '{"decision": "select" | "reject_all" | "insufficient_evidence", "index": <candidate number, required for select>, "sha": "<sha of the selected candidate, optional>", "justification": "<one or two sentences>"}',
  'Use "reject_all" when none of the candidates fixes the vulnerability, and "insufficient_evidence" when the material does not allow a decision.',
].join("\n");

function excerpt(c: ScoredCandidate, maxChars: number): string {
  const parts: string[] = [];
  let used = 0;
  for (const f of c.commit.files) {
    const header = `--- ${f.previousPath ?? f.path}\n+++ ${f.path}\n`;
    const body = f.patch ?? "(diff not available)";
    const chunk = header + body + "\n";
    if (used + chunk.length > maxChars) {
      parts.push(chunk.slice(0, Math.max(0, maxChars - used)) + "\n[... diff truncated]");
      break;
    }
    parts.push(chunk);
    used += chunk.length;
  }
  return parts.join("");
}

/**
 * Candidates are numbered from 1 in presentation order; the reply's `index`
 * refers to that numbering.
 */
export function buildArbitrationPrompt(
  record: VulnerabilityRecord,
  presented: readonly ScoredCandidate[],
  diffExcerptChars: number,
): ArbitrationPrompt {
  const lines: string[] = [];
  lines.push(`# Advisory ${record.id}${record.aliases.length > 0 ? ` (aliases: ${record.aliases.join(", ")})` : ""}`);
  if (record.summary) lines.push(`Summary: ${record.summary}`);
  if (record.weaknesses.length > 0) lines.push(`Weaknesses: ${record.weaknesses.join(", ")}`);
  if (record.publishedAt) lines.push(`Published: ${record.publishedAt}`);
  lines.push("", record.description || "(no description)", "");

  presented.forEach((c, i) => {
    lines.push(`# Candidate ${i + 1}`);
    lines.push(`sha: ${c.commit.sha}`);
    lines.push(`date: ${c.commit.timestamp}`);
    lines.push(`correlation score: ${c.score}`);
    lines.push(`files: ${c.commit.files.map((f) => f.path).join(", ")}`);
    lines.push("message:", c.commit.message.trim(), "");
    lines.push("diff:", "```diff", excerpt(c, diffExcerptChars).trimEnd(), "```", "");
  });

  lines.push(`Answer with the JSON object only. Valid indices are 1 to ${presented.length}.`);
  return { system: SYSTEM, prompt: lines.join("\n") };
}
