import semver from "semver";
import type { Ecosystem } from "../types";

const SEMVER_ECOSYSTEMS = new Set<Ecosystem>(["npm", "cargo", "golang"]);

type Token = { num: number } | { qualifier: string };

/**
 * Qualifier ordering shared by Maven, PyPI, RubyGems and NuGet closely enough
 * for range checks. A bare release ranks 6; `sp`/`post` sort after it.
 */
const QUALIFIER_RANK: Record<string, number> = {
  dev: 0,
  snapshot: 0,
  alpha: 1,
  a: 1,
  beta: 2,
  b: 2,
  milestone: 3,
  m: 3,
  rc: 4,
  cr: 4,
  c: 4,
  pre: 4,
  preview: 4,
  final: 6,
  ga: 6,
  release: 6,
  sp: 7,
  post: 7,
  p: 7,
  patch: 7,
};
const UNKNOWN_QUALIFIER = 5;

function qualifierRank(q: string): number {
  return QUALIFIER_RANK[q] ?? UNKNOWN_QUALIFIER;
}

function tokenize(version: string): Token[] | null {
  const v = version.trim().toLowerCase().replace(/^v(?=\d)/, "");
  if (!/^\d/.test(v)) return null;
  const tokens: Token[] = [];
  for (const part of v.split(/[.\-_+~]/)) {
    for (const piece of part.match(/\d+|[a-z]+/g) ?? []) {
      tokens.push(/^\d/.test(piece) ? { num: Number(piece) } : { qualifier: piece });
    }
  }
  return tokens;
}

function compareTokens(a: Token | undefined, b: Token | undefined): number {
  if (a === undefined && b === undefined) return 0;
  // A missing token is a zero when the other side is numeric, a release otherwise
  const left: Token = a ?? (b !== undefined && "num" in b ? { num: 0 } : { qualifier: "release" });
  const right: Token = b ?? ("num" in left ? { num: 0 } : { qualifier: "release" });

  if ("num" in left && "num" in right) return Math.sign(left.num - right.num);
  if ("num" in left) return 1;
  if ("num" in right) return -1;
  const diff = qualifierRank(left.qualifier) - qualifierRank(right.qualifier);
  if (diff !== 0) return Math.sign(diff);
  return left.qualifier < right.qualifier ? -1 : left.qualifier > right.qualifier ? 1 : 0;
}

/** Dotted-numeric comparison with pre/post-release qualifiers. */
export function compareGeneric(a: string, b: string): number | null {
  const ta = tokenize(a);
  const tb = tokenize(b);
  if (!ta || !tb) return null;
  for (let i = 0; i < Math.max(ta.length, tb.length); i++) {
    const c = compareTokens(ta[i], tb[i]);
    if (c !== 0) return c;
  }
  return 0;
}

function cleanSemver(v: string): string | null {
  return semver.valid(semver.clean(v, { loose: true }) ?? v.replace(/^v/, ""));
}

/**
 * Compare two versions under an ecosystem's scheme.
 * Returns null when either side does not parse.
 */
export function compareVersions(ecosystem: Ecosystem, a: string, b: string): number | null {
  if (SEMVER_ECOSYSTEMS.has(ecosystem)) {
    const sa = cleanSemver(a);
    const sb = cleanSemver(b);
    if (sa && sb) return semver.compare(sa, sb);
  }
  return compareGeneric(a, b);
}

export function isValidVersion(ecosystem: Ecosystem, v: string): boolean {
  if (SEMVER_ECOSYSTEMS.has(ecosystem) && cleanSemver(v)) return true;
  return tokenize(v) !== null;
}

/** Sort ascending; unparseable versions are dropped. */
export function sortVersions(ecosystem: Ecosystem, versions: readonly string[]): string[] {
  return versions
    .filter((v) => isValidVersion(ecosystem, v))
    .sort((x, y) => compareVersions(ecosystem, x, y) ?? 0);
}
