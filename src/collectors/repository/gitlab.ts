import { z } from "zod";
import type { ChangedFile, CommitNode, FileChangeStatus, RepositoryLocator, TagInfo } from "../../types";
import { type CollectorContext, type JsonClient, parseEvidence } from "../connector";
import {
  type CommitSummary,
  type ListCommitsOptions,
  PAGE_SIZE,
  type RepositoryHost,
  countDiffLines,
  toIsoTimestamp,
} from "./host";

const CommitSchema = z.object({
  id: z.string(),
  message: z.string(),
  committed_date: z.string().optional(),
  authored_date: z.string().optional(),
  created_at: z.string().optional(),
  parent_ids: z.array(z.string()).default([]),
  web_url: z.string().optional(),
});

const DiffSchema = z.object({
  old_path: z.string(),
  new_path: z.string(),
  new_file: z.boolean().default(false),
  renamed_file: z.boolean().default(false),
  deleted_file: z.boolean().default(false),
  diff: z.string().default(""),
});

const ProjectSchema = z.object({ default_branch: z.string() });
const TagSchema = z.object({ name: z.string(), commit: z.object({ id: z.string() }) });
const CompareSchema = z.object({ commits: z.array(CommitSchema) });

type GitLabCommit = z.infer<typeof CommitSchema>;
type GitLabDiff = z.infer<typeof DiffSchema>;

function summarize(c: GitLabCommit): CommitSummary {
  return {
    sha: c.id.toLowerCase(),
    timestamp: toIsoTimestamp(c.committed_date ?? c.created_at ?? c.authored_date ?? ""),
    message: c.message,
    parents: c.parent_ids.map((p) => p.toLowerCase()),
  };
}

function fileStatus(d: GitLabDiff): FileChangeStatus {
  if (d.new_file) return "added";
  if (d.deleted_file) return "removed";
  if (d.renamed_file) return "renamed";
  return "modified";
}

function toChangedFile(d: GitLabDiff): ChangedFile {
  // GitLab diffs carry no ---/+++ headers
  const counts = countDiffLines(d.diff);
  return {
    path: d.deleted_file ? d.old_path : d.new_path,
    previousPath: d.renamed_file ? d.old_path : undefined,
    status: fileStatus(d),
    additions: counts.additions,
    deletions: counts.deletions,
    patch: d.diff === "" ? undefined : d.diff,
  };
}

/** GitLab REST v4, gitlab.com or self-managed. */
export class GitLabHost implements RepositoryHost {
  readonly kind = "gitlab" as const;

  constructor(
    private readonly http: JsonClient,
    private readonly token?: string,
  ) {}

  private opts(ctx: CollectorContext) {
    const headers: Record<string, string> = this.token ? { "private-token": this.token } : {};
    return { headers, signal: ctx.signal };
  }

  private base(repo: RepositoryLocator): string {
    return `${repo.apiBaseUrl}/projects/${encodeURIComponent(`${repo.owner}/${repo.name}`)}`;
  }

  async describe(repo: RepositoryLocator, ctx: CollectorContext): Promise<{ defaultBranch: string }> {
    const raw = await this.http.getJson(this.base(repo), this.opts(ctx));
    return { defaultBranch: parseEvidence(ProjectSchema, raw, "gitlab", "project").default_branch };
  }

  async listCommits(repo: RepositoryLocator, o: ListCommitsOptions, ctx: CollectorContext): Promise<CommitSummary[]> {
    const out: CommitSummary[] = [];
    for (let page = 1; out.length < o.limit; page++) {
      const params = new URLSearchParams({ ref_name: o.ref, per_page: String(PAGE_SIZE), page: String(page) });
      if (o.since) params.set("since", o.since);
      if (o.until) params.set("until", o.until);
      const raw = await this.http.getJson(`${this.base(repo)}/repository/commits?${params.toString()}`, this.opts(ctx));
      const items = parseEvidence(z.array(CommitSchema), raw, "gitlab", "commit list");
      out.push(...items.map(summarize));
      if (items.length < PAGE_SIZE) break;
    }
    return out.slice(0, o.limit);
  }

  async compare(repo: RepositoryLocator, base: string, head: string, limit: number, ctx: CollectorContext): Promise<CommitSummary[]> {
    const params = new URLSearchParams({ from: base, to: head, straight: "false" });
    const raw = await this.http.getJson(`${this.base(repo)}/repository/compare?${params.toString()}`, this.opts(ctx));
    return parseEvidence(CompareSchema, raw, "gitlab", "compare").commits.map(summarize).slice(-limit);
  }

  async getCommit(repo: RepositoryLocator, sha: string, ctx: CollectorContext): Promise<CommitNode> {
    const commitUrl = `${this.base(repo)}/repository/commits/${encodeURIComponent(sha)}`;
    const [rawCommit, rawDiff] = await Promise.all([
      this.http.getJson(commitUrl, this.opts(ctx)),
      this.http.getJson(`${commitUrl}/diff?per_page=${PAGE_SIZE}`, this.opts(ctx)),
    ]);
    const c = parseEvidence(CommitSchema, rawCommit, "gitlab", "commit");
    const diffs = parseEvidence(z.array(DiffSchema), rawDiff, "gitlab", "commit diff");
    const summary = summarize(c);
    return {
      ...summary,
      files: diffs.map(toChangedFile),
      url: c.web_url ?? `${repo.webUrl}/-/commit/${summary.sha}`,
    };
  }

  async listTags(repo: RepositoryLocator, limit: number, ctx: CollectorContext): Promise<TagInfo[]> {
    const out: TagInfo[] = [];
    for (let page = 1; out.length < limit; page++) {
      const params = new URLSearchParams({ per_page: String(PAGE_SIZE), page: String(page) });
      const raw = await this.http.getJson(`${this.base(repo)}/repository/tags?${params.toString()}`, this.opts(ctx));
      const items = parseEvidence(z.array(TagSchema), raw, "gitlab", "tag list");
      out.push(...items.map((t) => ({ name: t.name, sha: t.commit.id.toLowerCase() })));
      if (items.length < PAGE_SIZE) break;
    }
    return out.slice(0, limit);
  }
}
