import { z } from "zod";
import { NotFound } from "../../errors";
import { DEPSDEV_SYSTEM, advisoryPackageName } from "../../ecosystems/purl";
import type { PackageIdentity, ReleaseInfo } from "../../types";
import { type CollectorContext, type JsonClient, parseEvidence } from "../connector";

const PackageSchema = z.object({
  versions: z
    .array(
      z.object({
        versionKey: z.object({ version: z.string() }),
        publishedAt: z.string().optional(),
      }),
    )
    .default([]),
});

/**
 * deps.dev (Open Source Insights): free, no auth. Supplies release dates,
 * which bound the date window when no tags map to the bracketing versions.
 */
export class DepsDevReleases {
  readonly id = "depsdev" as const;

  constructor(
    private readonly http: JsonClient,
    private readonly baseUrl: string,
  ) {}

  async fetch(pkg: PackageIdentity, ctx: CollectorContext): Promise<ReleaseInfo[]> {
    const system = DEPSDEV_SYSTEM[pkg.ecosystem];
    if (!system) throw new NotFound(`depsdev: ecosystem ${pkg.ecosystem} is not indexed`, { provider: "depsdev" });

    const url = `${this.baseUrl}/systems/${system}/packages/${encodeURIComponent(advisoryPackageName(pkg))}`;
    const raw = await this.http.getJson(url, { signal: ctx.signal });
    const { versions } = parseEvidence(PackageSchema, raw, "depsdev", "package");
    return versions.map((v) => ({ version: v.versionKey.version, publishedAt: v.publishedAt }));
  }
}
