import type { ReferenceKind } from "../../types";

const SHA_RE = /^[0-9a-f]{7,40}$/i;

const COMMIT_PATTERNS: RegExp[] = [
  // github.com/o/r/commit/<sha>, gitlab .../-/commit/<sha>, pull/N/commits/<sha>
  /\/commits?\/([0-9a-f]{7,40})(?:[/?#.]|$)/i,
  // gitweb: ?p=repo;a=commit;h=<sha>
  /[;?&]a=commit(?:diff)?[;&](?:.*[;&])?h=([0-9a-f]{7,40})(?:[;&#]|$)/i,
  // cgit: /commit/?id=<sha>
  /\/commit\/?\?(?:.*&)?id=([0-9a-f]{7,40})(?:[&#]|$)/i,
];

function safeUrl(raw: string): URL | null {
  try {
    return new URL(raw);
  } catch {
    return null;
  }
}

/** Lower-case sha named by a commit URL, if it is one. */
export function commitShaFromUrl(url: string): string | undefined {
  if (!safeUrl(url)) return undefined;
  for (const re of COMMIT_PATTERNS) {
    const m = re.exec(url);
    if (m && SHA_RE.test(m[1])) return m[1].toLowerCase();
  }
  return undefined;
}

export function pullNumberFromUrl(url: string): number | undefined {
  const m = /\/(?:pull|pulls|merge_requests)\/(\d+)(?:[/?#]|$)/.exec(url);
  return m ? Number(m[1]) : undefined;
}

export function issueNumberFromUrl(url: string): number | undefined {
  const m = /\/issues\/(\d+)(?:[/?#]|$)/.exec(url);
  return m ? Number(m[1]) : undefined;
}

/** File path of a github/gitlab blob or tree URL, without the ref segment. */
export function filePathFromUrl(url: string): string | undefined {
  const u = safeUrl(url);
  if (!u) return undefined;
  const m = /\/(?:-\/)?(?:blob|tree)\/[^/]+\/(.+)$/.exec(u.pathname);
  if (!m) return undefined;
  const p = decodeURIComponent(m[1]).replace(/\/+$/, "");
  return p === "" ? undefined : p;
}

const ADVISORY_HOSTS = ["nvd.nist.gov", "osv.dev", "cve.org", "www.cve.org", "cve.mitre.org", "security-tracker.debian.org", "snyk.io", "security.snyk.io"];

export function classifyReference(url: string): ReferenceKind {
  const u = safeUrl(url);
  if (!u) return "other";
  const path = u.pathname;
  if (commitShaFromUrl(url)) return "commit";
  if (/\.(?:patch|diff)$/i.test(path)) return "patch";
  if (pullNumberFromUrl(url) !== undefined) return "pull";
  if (issueNumberFromUrl(url) !== undefined) return "issue";
  if (/\/security\/advisories\/|\/advisories\/GHSA-/i.test(path) || ADVISORY_HOSTS.includes(u.hostname)) return "advisory";
  if (/\/releases\/tag\/|\/-\/tags\//.test(path)) return "tag";
  return "other";
}

/** "owner/name" of a github.com or gitlab.com URL, lower-cased. */
export function repositorySlugFromUrl(url: string): string | undefined {
  const u = safeUrl(url);
  if (!u || (u.hostname !== "github.com" && u.hostname !== "gitlab.com")) return undefined;
  const parts = u.pathname.split("/").filter(Boolean);
  if (parts.length < 2) return undefined;
  return `${parts[0]}/${parts[1].replace(/\.git$/, "")}`.toLowerCase();
}
