import { InvalidRequestError } from "../../errors";
import type { RepositoryHostKind, RepositoryLocator } from "../../types";

export interface HostApiBases {
  github: string;
  gitlab: string;
}

function hostKind(hostname: string): RepositoryHostKind | undefined {
  if (hostname === "github.com" || hostname === "www.github.com") return "github";
  if (hostname === "gitlab.com" || hostname.startsWith("gitlab.")) return "gitlab";
  return undefined;
}

/**
 * Accepts https/http URLs, scp-style `git@host:owner/name.git`, `host/owner/name`
 * and the `owner/name` GitHub shorthand. Trailing `.git`, slashes and deep
 * links (`/tree/main/...`) are stripped.
 */
export function parseRepositoryUrl(input: string, apiBases: HostApiBases): RepositoryLocator {
  const raw = input.trim();
  const fail = (why: string): never => {
    throw new InvalidRequestError(`repository_url "${input}" is invalid: ${why}`, { field: "repository_url" });
  };
  if (raw === "") fail("empty");

  let hostname: string;
  let path: string;
  const scp = /^[\w.-]+@([\w.-]+):(.+)$/.exec(raw);
  if (scp) {
    hostname = scp[1];
    path = scp[2];
  } else if (/^[a-z][a-z0-9+.-]*:\/\//i.test(raw)) {
    let u: URL;
    try {
      u = new URL(raw);
    } catch {
      return fail("not a URL");
    }
    if (!["https:", "http:", "git:", "ssh:"].includes(u.protocol)) fail(`unsupported scheme ${u.protocol}`);
    hostname = u.hostname;
    path = u.pathname;
  } else if (/^[\w-]+\/[\w.-]+$/.test(raw)) {
    hostname = "github.com";
    path = raw;
  } else {
    const slash = raw.indexOf("/");
    if (slash <= 0) return fail("expected owner/name");
    hostname = raw.slice(0, slash);
    path = raw.slice(slash + 1);
  }

  const kind = hostKind(hostname.toLowerCase());
  if (!kind) return fail(`unsupported host "${hostname}"`);

  let segments = path
    .replace(/\.git\/?$/, "")
    .split("/")
    .filter(Boolean);
  // Drop deep links: github /tree/..., gitlab /-/...
  const dash = segments.indexOf("-");
  if (dash >= 0) segments = segments.slice(0, dash);
  if (kind === "github") segments = segments.slice(0, 2);
  if (segments.length < 2) return fail("expected owner/name");

  const name = segments[segments.length - 1];
  const owner = segments.slice(0, -1).join("/");
  const host = kind === "github" ? "github.com" : hostname.toLowerCase();
  const apiBaseUrl =
    kind === "github" ? apiBases.github : host === "gitlab.com" ? apiBases.gitlab : `https://${host}/api/v4`;

  return { host: kind, apiBaseUrl, webUrl: `https://${host}/${owner}/${name}`, owner, name };
}

export function commitUrl(repo: RepositoryLocator, sha: string): string {
  return repo.host === "gitlab" ? `${repo.webUrl}/-/commit/${sha}` : `${repo.webUrl}/commit/${sha}`;
}
