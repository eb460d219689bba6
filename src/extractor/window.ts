import { findTag } from "../collectors/registry/collector";
import { samePackage } from "../ecosystems/purl";
import { type RangeBracket, bracketVersion } from "../ecosystems/ranges";
import { compareVersions } from "../ecosystems/versions";
import type {
  AffectedRange,
  CandidateWindow,
  DateWindow,
  PackageIdentity,
  RefRange,
  ReleaseMetadata,
  ResolverConfig,
  VulnerabilityRecord,
} from "../types";

const DAY_MS = 86_400_000;

export type WindowPlan =
  | { kind: "mismatch"; reason: string; ranges: AffectedRange[] }
  | { kind: "window"; window: CandidateWindow; range?: RefRange; ref?: string };

function formatEvents(r: AffectedRange): string {
  const parts = r.events.map((e) => {
    if (e.introduced !== undefined) return `>=${e.introduced}`;
    if (e.fixed !== undefined) return `<${e.fixed}`;
    if (e.lastAffected !== undefined) return `<=${e.lastAffected}`;
    return `limit ${e.limit}`;
  });
  if (r.versions.length > 0) parts.push(`=${r.versions.join("|")}`);
  return parts.join(", ");
}

export function describeRanges(ranges: readonly AffectedRange[]): string {
  return ranges.map((r) => `[${formatEvents(r)}]`).join(" ");
}

export function describeWindow(w: CandidateWindow): string {
  if (w.kind === "tag" && w.vulnerableTag && w.fixedTag) {
    return `tag window ${w.vulnerableTag.name}..${w.fixedTag.name}`;
  }
  const day = (iso: string | undefined) => (iso ? iso.slice(0, 10) : "open");
  if (w.kind === "date") return `date window ${day(w.dates.since)}..${day(w.dates.until)}`;
  return "unbounded window";
}

function shift(iso: string, days: number): string {
  return new Date(Date.parse(iso) + days * DAY_MS).toISOString();
}

function releaseDate(meta: ReleaseMetadata, pkg: PackageIdentity, version: string | undefined): string | undefined {
  if (!version) return undefined;
  const r = meta.releases.find((x) => compareVersions(pkg.ecosystem, x.version, version) === 0);
  if (!r?.publishedAt || Number.isNaN(Date.parse(r.publishedAt))) return undefined;
  return new Date(Date.parse(r.publishedAt)).toISOString();
}

/** The versions either side of the fix, from the bracket and the known releases. */
function fixVersions(
  bracket: RangeBracket | null,
  meta: ReleaseMetadata,
  pkg: PackageIdentity,
): { lastVulnerable: string; firstFixed?: string } {
  const eco = pkg.ecosystem;
  const cmp = (a: string, b: string) => compareVersions(eco, a, b) ?? 0;
  let firstFixed = bracket?.fixed;
  if (!firstFixed && bracket?.lastAffected) {
    const last = bracket.lastAffected;
    firstFixed = meta.releases.find((r) => cmp(r.version, last) > 0)?.version;
  }
  if (bracket?.lastAffected) return { lastVulnerable: bracket.lastAffected, firstFixed };
  if (!firstFixed) return { lastVulnerable: pkg.version };

  const fixed = firstFixed;
  const below = meta.releases.filter((r) => cmp(r.version, fixed) < 0 && cmp(r.version, pkg.version) >= 0);
  const lastVulnerable = below.length > 0 ? below[below.length - 1].version : pkg.version;
  return { lastVulnerable, firstFixed };
}

/**
 * Decide which slice of history may contain the fix, before any repository
 * call. A target version outside every affected range of the package ends
 * the request here.
 */
export function planWindow(
  record: VulnerabilityRecord,
  pkg: PackageIdentity,
  meta: ReleaseMetadata,
  cfg: Pick<ResolverConfig, "window">,
): WindowPlan {
  const ranges = record.affected.filter((r) => samePackage(pkg, r.ecosystem, r.packageName));
  let bracket: RangeBracket | null = null;
  if (ranges.length > 0) {
    for (const r of ranges) {
      bracket = bracketVersion(r, pkg.version);
      if (bracket) break;
    }
    if (!bracket) {
      return {
        kind: "mismatch",
        ranges,
        reason: `version ${pkg.version} of ${pkg.name} is outside the affected ranges of ${record.id} ${describeRanges(ranges)}`,
      };
    }
  }

  const { lastVulnerable, firstFixed } = fixVersions(bracket, meta, pkg);
  const disclosedAt = record.publishedAt;
  const vulnerableTag = findTag(meta.tags, pkg.ecosystem, lastVulnerable);
  const fixedTag = firstFixed ? findTag(meta.tags, pkg.ecosystem, firstFixed) : undefined;

  const vulnDate = releaseDate(meta, pkg, lastVulnerable);
  const fixedDate = releaseDate(meta, pkg, firstFixed);
  const pad = cfg.window.paddingDays;
  const span = cfg.window.windowDays;

  let dates: DateWindow = {};
  if (vulnDate || fixedDate) {
    dates = {
      since: vulnDate ? shift(vulnDate, -pad) : disclosedAt ? shift(disclosedAt, -span) : undefined,
      until: fixedDate ? shift(fixedDate, pad) : disclosedAt ? shift(disclosedAt, span) : undefined,
    };
  } else if (disclosedAt) {
    dates = { since: shift(disclosedAt, -span - pad), until: shift(disclosedAt, span + pad) };
  }

  const fixBoundary = fixedDate ?? disclosedAt ?? dates.until;
  const base = { lastVulnerable, firstFixed, dates, fixBoundary, disclosedAt };

  if (vulnerableTag && fixedTag && vulnerableTag.sha !== fixedTag.sha) {
    return {
      kind: "window",
      window: { ...base, kind: "tag", vulnerableTag, fixedTag },
      range: { base: vulnerableTag.sha, head: fixedTag.sha },
    };
  }
  return {
    kind: "window",
    window: { ...base, kind: dates.since || dates.until ? "date" : "unbounded" },
    // Walk back from the fix tag when there is one; the default branch otherwise
    ref: fixedTag?.sha,
  };
}
