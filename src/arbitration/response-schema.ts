import { z } from "zod";
import { ArbitrationParseError } from "../errors";
import type { ArbitrationDecision, ScoredCandidate } from "../types";

export const ArbitrationResponseSchema = z.object({
  decision: z.enum(["select", "reject_all", "insufficient_evidence"]),
  index: z.number().int().nullable().optional(),
  sha: z.string().nullable().optional(),
  justification: z.string().min(1),
});

export interface ParsedArbitration {
  decision: ArbitrationDecision;
  justification: string;
}

/**
 * Pull the JSON object out of a model reply: a ```json fence when present,
 * otherwise the outermost brace pair.
 */
export function extractJsonObject(text: string): string | null {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  const body = (fenced ? fenced[1] : text).trim();
  const start = body.indexOf("{");
  const end = body.lastIndexOf("}");
  if (start < 0 || end <= start) return null;
  return body.slice(start, end + 1);
}

/**
 * Validate a reply against the presented candidates. Any deviation (no JSON,
 * schema mismatch, index out of range, sha of a different candidate) is an
 * ArbitrationParseError.
 */
export function parseArbitrationResponse(
  text: string,
  presented: readonly ScoredCandidate[],
  provider: string,
): ParsedArbitration {
  const fail = (why: string, cause?: unknown): never => {
    throw new ArbitrationParseError(`${provider}: ${why}`, { provider, rawResponse: text, cause });
  };

  const json = extractJsonObject(text);
  if (json === null) return fail("reply contains no JSON object");

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (e) {
    return fail("reply is not valid JSON", e);
  }

  const parsed = ArbitrationResponseSchema.safeParse(raw);
  if (!parsed.success) {
    return fail(`reply does not match the schema: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
  }
  const r = parsed.data;
  const justification = r.justification.trim();

  if (r.decision !== "select") {
    return { decision: { kind: r.decision }, justification };
  }

  if (r.index === undefined || r.index === null) return fail("select without index");
  const position = r.index - 1;
  const chosen = presented[position];
  if (position < 0 || !chosen) return fail(`index ${r.index} outside 1..${presented.length}`);

  if (r.sha) {
    const sha = r.sha.trim().toLowerCase();
    if (sha.length < 7 || !chosen.commit.sha.startsWith(sha)) {
      return fail(`sha ${r.sha} does not match candidate ${r.index} (${chosen.commit.sha})`);
    }
  }
  return { decision: { kind: "select", index: position, sha: chosen.commit.sha }, justification };
}
