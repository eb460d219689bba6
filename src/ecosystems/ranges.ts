import type { AdvisorySourceId, AffectedRange, Ecosystem, RangeEvent } from "../types";
import { compareVersions, isValidVersion } from "./versions";

/** OSV uses "0" for "every version since the beginning". */
const ORIGIN = "0";

function eventVersion(e: RangeEvent): string | undefined {
  return e.introduced ?? e.fixed ?? e.lastAffected ?? e.limit;
}

/**
 * Drop events whose version does not parse under the ecosystem's scheme.
 * Returns null when nothing usable is left, so the caller drops the range.
 */
export function sanitizeRange(range: AffectedRange): AffectedRange | null {
  const events = range.events.filter((e) => {
    const v = eventVersion(e);
    if (v === undefined) return false;
    return e.introduced === ORIGIN || isValidVersion(range.ecosystem, v);
  });
  const versions = range.versions.filter((v) => isValidVersion(range.ecosystem, v));
  const hasBoundary = events.some((e) => e.introduced !== undefined);
  if (!hasBoundary && versions.length === 0) return null;
  return { ...range, events: hasBoundary ? events : [], versions };
}

function compareEvent(eco: Ecosystem, a: RangeEvent, b: RangeEvent): number {
  const va = eventVersion(a) ?? ORIGIN;
  const vb = eventVersion(b) ?? ORIGIN;
  if (va === ORIGIN && a.introduced !== undefined) return vb === ORIGIN && b.introduced !== undefined ? 0 : -1;
  if (vb === ORIGIN && b.introduced !== undefined) return 1;
  return compareVersions(eco, va, vb) ?? 0;
}

export interface RangeBracket {
  range: AffectedRange;
  /** Inclusive lower bound, or "0" */
  introduced?: string;
  fixed?: string;
  lastAffected?: string;
}

/**
 * Locate the interval of `range` that contains `version`, following OSV's
 * evaluation order: events sorted by version, `introduced` opens an interval,
 * `fixed` (exclusive) and `last_affected` (inclusive) close it.
 */
export function bracketVersion(range: AffectedRange, version: string): RangeBracket | null {
  const eco = range.ecosystem;
  if (!isValidVersion(eco, version)) return null;

  if (range.versions.some((v) => compareVersions(eco, v, version) === 0)) {
    return { range };
  }

  const events = range.events.filter((e) => e.limit === undefined).sort((a, b) => compareEvent(eco, a, b));
  let open: RangeEvent | undefined;
  let affected = false;
  for (const e of events) {
    const v = eventVersion(e);
    if (v === undefined) continue;
    if (e.introduced !== undefined) {
      if (e.introduced === ORIGIN || (compareVersions(eco, version, v) ?? -1) >= 0) {
        affected = true;
        open = e;
      }
      continue;
    }
    if (!affected) continue;
    const cmp = compareVersions(eco, version, v);
    if (cmp === null) continue;
    if (e.fixed !== undefined) {
      if (cmp >= 0) affected = false;
      else return { range, introduced: open?.introduced, fixed: e.fixed };
    } else if (e.lastAffected !== undefined) {
      if (cmp > 0) affected = false;
      else return { range, introduced: open?.introduced, lastAffected: e.lastAffected };
    }
  }
  return affected ? { range, introduced: open?.introduced } : null;
}

export function isAffected(range: AffectedRange, version: string): boolean {
  return bracketVersion(range, version) !== null;
}

/**
 * Translate a GitHub `vulnerable_version_range` such as ">= 1.0, < 1.1.10.1"
 * into OSV-style events. An exclusive lower bound is widened to inclusive,
 * since OSV events cannot express it. Returns null on any unrecognised clause.
 */
export function parseGithubRangeExpression(
  expression: string,
  firstPatched?: string,
): { events: RangeEvent[]; versions: string[] } | null {
  const events: RangeEvent[] = [];
  const versions: string[] = [];
  let lower: string | undefined;
  let hasUpper = false;

  for (const clause of expression.split(",").map((c) => c.trim()).filter(Boolean)) {
    const m = /^(>=|<=|>|<|=)?\s*(\S+)$/.exec(clause);
    if (!m) return null;
    const op = m[1] ?? "=";
    const v = m[2];
    switch (op) {
      case ">=":
      case ">":
        lower = v;
        break;
      case "<":
        events.push({ fixed: v });
        hasUpper = true;
        break;
      case "<=":
        events.push({ lastAffected: v });
        hasUpper = true;
        break;
      default:
        versions.push(v);
        hasUpper = true;
    }
  }

  if (versions.length > 0 && events.length === 0 && lower === undefined) return { events: [], versions };
  if (!hasUpper && firstPatched) events.push({ fixed: firstPatched });
  return { events: [{ introduced: lower ?? ORIGIN }, ...events], versions };
}

export function makeRange(
  ecosystem: Ecosystem,
  packageName: string,
  source: AdvisorySourceId,
  events: RangeEvent[],
  versions: string[] = [],
): AffectedRange | null {
  return sanitizeRange({ ecosystem, packageName, events, versions, source });
}
