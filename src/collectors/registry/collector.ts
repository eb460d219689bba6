import { NotFound, isProviderError } from "../../errors";
import { compareVersions, isValidVersion } from "../../ecosystems/versions";
import type {
  Ecosystem,
  PackageIdentity,
  ReleaseInfo,
  ReleaseMetadata,
  RepositoryHostKind,
  RepositoryLocator,
  TagInfo,
} from "../../types";
import { errorMessage } from "../../utils/error";
import { deepFreeze } from "../../utils/freeze";
import { abortReason } from "../../utils/retry";
import type { CollectorContext, EvidenceCollector } from "../connector";
import type { RepositoryHost } from "../repository/host";
import type { DepsDevReleases } from "./depsdev";

export interface RegistryQuery {
  pkg: PackageIdentity;
  /** Tags are read from here when the repository's host is supported */
  repository?: RepositoryLocator;
}

function stripPrefix(value: string, prefix: string): string | undefined {
  return value.toLowerCase().startsWith(prefix.toLowerCase()) ? value.slice(prefix.length) : undefined;
}

/**
 * Version a tag name denotes, if any: `v1.2.3`, `release-1.2.3`,
 * `<name>-1.2.3` and `<name>_1.2.3` all map to `1.2.3`.
 */
export function versionFromTag(tag: string, pkg: Pick<PackageIdentity, "name" | "ecosystem">): string | undefined {
  const base = tag.replace(/^refs\/tags\//, "");
  const candidates = [
    base,
    stripPrefix(base, "v"),
    stripPrefix(base, "release-"),
    stripPrefix(base, `${pkg.name}-`),
    stripPrefix(base, `${pkg.name}_`),
  ];
  for (const c of candidates) {
    if (c === undefined) continue;
    const v = c.replace(/^v(?=\d)/, "");
    if (/^\d/.test(v) && isValidVersion(pkg.ecosystem, v)) return v;
  }
  return undefined;
}

/** First tag whose version equals `version` under the ecosystem's scheme. */
export function findTag(tags: readonly TagInfo[], ecosystem: Ecosystem, version: string): TagInfo | undefined {
  return tags.find((t) => t.version !== undefined && compareVersions(ecosystem, t.version, version) === 0);
}

export class RegistryCollector implements EvidenceCollector<RegistryQuery, ReleaseMetadata> {
  readonly id = "registry";

  constructor(
    private readonly releases: DepsDevReleases | undefined,
    private readonly hosts: Partial<Record<RepositoryHostKind, RepositoryHost>>,
    private readonly maxTags: number,
  ) {}

  private async fetchReleases(q: RegistryQuery, ctx: CollectorContext): Promise<ReleaseInfo[]> {
    if (!this.releases) throw new NotFound("registry: release source disabled");
    return this.releases.fetch(q.pkg, ctx);
  }

  private async fetchTags(q: RegistryQuery, ctx: CollectorContext): Promise<TagInfo[]> {
    const host = q.repository ? this.hosts[q.repository.host] : undefined;
    if (!q.repository || !host || this.maxTags === 0) throw new NotFound("registry: no tag source for this repository");
    const tags = await host.listTags(q.repository, this.maxTags, ctx);
    return tags.map((t) => ({ ...t, version: versionFromTag(t.name, q.pkg) }));
  }

  async fetch(query: RegistryQuery, ctx: CollectorContext): Promise<ReleaseMetadata> {
    const [releases, tags] = await Promise.allSettled([this.fetchReleases(query, ctx), this.fetchTags(query, ctx)]);
    if (ctx.signal?.aborted) throw abortReason(ctx.signal);

    const failures: unknown[] = [];
    const absorb = (what: string, r: PromiseSettledResult<unknown>) => {
      if (r.status === "fulfilled") return;
      if (!isProviderError(r.reason)) throw r.reason;
      failures.push(r.reason);
      ctx.logger.debug(`registry: ${what} unavailable: ${errorMessage(r.reason)}`);
    };
    absorb("releases", releases);
    absorb("tags", tags);

    if (releases.status === "rejected" && tags.status === "rejected") {
      throw failures.find((e) => !(e instanceof NotFound)) ?? failures[0];
    }

    const eco = query.pkg.ecosystem;
    const releaseList = releases.status === "fulfilled" ? releases.value : [];
    return deepFreeze({
      releases: releaseList
        .filter((r) => isValidVersion(eco, r.version))
        .sort((a, b) => compareVersions(eco, a.version, b.version) ?? 0),
      tags: tags.status === "fulfilled" ? tags.value : [],
    });
  }
}
