import type { Severity } from "../types";

type Table = Readonly<Record<string, number | undefined>>;

const AV: Table = { N: 0.85, A: 0.62, L: 0.55, P: 0.2 };
const AC: Table = { L: 0.77, H: 0.44 };
const UI: Table = { N: 0.85, R: 0.62 };
const CIA: Table = { H: 0.56, L: 0.22, N: 0.0 };
const PR_UNCHANGED: Table = { N: 0.85, L: 0.62, H: 0.27 };
const PR_CHANGED: Table = { N: 0.85, L: 0.68, H: 0.5 };

export function severityFromCvssScore(score: number | undefined): Severity {
  if (score === undefined || !Number.isFinite(score)) return "unknown";
  if (score < 0 || score > 10) return "unknown";
  if (score >= 9.0) return "critical";
  if (score >= 7.0) return "high";
  if (score >= 4.0) return "medium";
  if (score > 0.0) return "low";
  return "unknown";
}

/**
 * Compute the CVSS v3.x base score from a vector string.
 * Returns undefined when the vector is not 3.0/3.1 or lacks a base metric.
 */
export function cvssV3VectorToBaseScore(vector: string): number | undefined {
  const v = vector.trim();
  if (!v.startsWith("CVSS:3.")) return undefined;

  const metrics = new Map<string, string>();
  for (const part of v.split("/").slice(1)) {
    const [k, val] = part.split(":");
    if (k && val) metrics.set(k, val);
  }
  const pick = (table: Table, key: string) => {
    const m = metrics.get(key);
    return m === undefined ? undefined : table[m];
  };

  const scope = metrics.get("S");
  if (scope !== "U" && scope !== "C") return undefined;
  const av = pick(AV, "AV");
  const ac = pick(AC, "AC");
  const ui = pick(UI, "UI");
  const c = pick(CIA, "C");
  const i = pick(CIA, "I");
  const a = pick(CIA, "A");
  const pr = pick(scope === "U" ? PR_UNCHANGED : PR_CHANGED, "PR");
  if (av === undefined || ac === undefined || ui === undefined || pr === undefined) return undefined;
  if (c === undefined || i === undefined || a === undefined) return undefined;

  const exploitability = 8.22 * av * ac * pr * ui;
  const iscBase = 1 - (1 - c) * (1 - i) * (1 - a);
  const impact =
    scope === "U" ? 6.42 * iscBase : 7.52 * (iscBase - 0.029) - 3.25 * Math.pow(iscBase - 0.02, 15);

  if (impact <= 0) return 0;
  return scope === "U"
    ? roundUp1(Math.min(impact + exploitability, 10))
    : roundUp1(Math.min(1.08 * (impact + exploitability), 10));
}

function roundUp1(x: number): number {
  // epsilon keeps 4.0000000001-style float noise from rounding up
  return Math.ceil((x - 1e-10) * 10) / 10;
}

/**
 * Map a textual severity label to the canonical Severity type.
 * GitHub says "moderate" where NVD says "MEDIUM".
 */
export function mapSeverity(sev: string | undefined): Severity {
  switch ((sev ?? "").toLowerCase()) {
    case "critical":
      return "critical";
    case "high":
      return "high";
    case "medium":
    case "moderate":
      return "medium";
    case "low":
      return "low";
    default:
      return "unknown";
  }
}
