import { z } from "zod";
import type { ChangedFile, CommitNode, FileChangeStatus, RepositoryLocator, TagInfo } from "../../types";
import { type CollectorContext, type JsonClient, parseEvidence } from "../connector";
import { type CommitSummary, type ListCommitsOptions, PAGE_SIZE, type RepositoryHost, toIsoTimestamp } from "./host";

const PersonSchema = z.object({ date: z.string() }).nullable().optional();

const CommitListItemSchema = z.object({
  sha: z.string(),
  html_url: z.string().optional(),
  commit: z.object({ message: z.string(), committer: PersonSchema, author: PersonSchema }),
  parents: z.array(z.object({ sha: z.string() })).default([]),
});

const CommitDetailSchema = CommitListItemSchema.extend({
  files: z
    .array(
      z.object({
        filename: z.string(),
        previous_filename: z.string().optional(),
        status: z.string(),
        additions: z.number().default(0),
        deletions: z.number().default(0),
        patch: z.string().optional(),
      }),
    )
    .default([]),
});

const RepoSchema = z.object({ default_branch: z.string() });
const TagSchema = z.object({ name: z.string(), commit: z.object({ sha: z.string() }) });
const CompareSchema = z.object({
  total_commits: z.number().int().nonnegative().optional(),
  commits: z.array(CommitListItemSchema),
});

type CommitListItem = z.infer<typeof CommitListItemSchema>;

function fileStatus(status: string): FileChangeStatus {
  switch (status) {
    case "added":
    case "copied":
      return "added";
    case "removed":
      return "removed";
    case "renamed":
      return "renamed";
    default:
      return "modified";
  }
}

function summarize(c: CommitListItem): CommitSummary {
  const date = c.commit.committer?.date ?? c.commit.author?.date ?? "";
  return {
    sha: c.sha.toLowerCase(),
    timestamp: toIsoTimestamp(date),
    message: c.commit.message,
    parents: c.parents.map((p) => p.sha.toLowerCase()),
  };
}

/** GitHub REST v3. */
export class GitHubHost implements RepositoryHost {
  readonly kind = "github" as const;

  constructor(
    private readonly http: JsonClient,
    private readonly token?: string,
  ) {}

  private opts(ctx: CollectorContext) {
    const headers: Record<string, string> = {
      accept: "application/vnd.github+json",
      "x-github-api-version": "2022-11-28",
    };
    if (this.token) headers.authorization = `Bearer ${this.token}`;
    return { headers, signal: ctx.signal };
  }

  private base(repo: RepositoryLocator): string {
    return `${repo.apiBaseUrl}/repos/${encodeURIComponent(repo.owner)}/${encodeURIComponent(repo.name)}`;
  }

  async describe(repo: RepositoryLocator, ctx: CollectorContext): Promise<{ defaultBranch: string }> {
    const raw = await this.http.getJson(this.base(repo), this.opts(ctx));
    return { defaultBranch: parseEvidence(RepoSchema, raw, "github", "repository").default_branch };
  }

  async listCommits(repo: RepositoryLocator, o: ListCommitsOptions, ctx: CollectorContext): Promise<CommitSummary[]> {
    const out: CommitSummary[] = [];
    for (let page = 1; out.length < o.limit; page++) {
      const params = new URLSearchParams({ sha: o.ref, per_page: String(PAGE_SIZE), page: String(page) });
      if (o.since) params.set("since", o.since);
      if (o.until) params.set("until", o.until);
      const raw = await this.http.getJson(`${this.base(repo)}/commits?${params.toString()}`, this.opts(ctx));
      const items = parseEvidence(z.array(CommitListItemSchema), raw, "github", "commit list");
      out.push(...items.map(summarize));
      if (items.length < PAGE_SIZE) break;
    }
    return out.slice(0, o.limit);
  }

  /**
   * Commits reachable from head and not from base, oldest first, keeping the
   * newest `limit`. Compare pages run oldest to newest, so after the first
   * page only the pages holding the tail are fetched.
   */
  async compare(repo: RepositoryLocator, base: string, head: string, limit: number, ctx: CollectorContext): Promise<CommitSummary[]> {
    const url = `${this.base(repo)}/compare/${encodeURIComponent(base)}...${encodeURIComponent(head)}`;
    const page = async (n: number) => {
      const params = new URLSearchParams({ per_page: String(PAGE_SIZE), page: String(n) });
      const raw = await this.http.getJson(`${url}?${params.toString()}`, this.opts(ctx));
      return parseEvidence(CompareSchema, raw, "github", "compare");
    };

    const first = await page(1);
    const total = first.total_commits ?? first.commits.length;
    if (total <= first.commits.length) return first.commits.map(summarize).slice(-limit);

    const lastPage = Math.ceil(total / PAGE_SIZE);
    const startPage = Math.floor(Math.max(0, total - limit) / PAGE_SIZE) + 1;
    const items: CommitListItem[] = startPage === 1 ? [...first.commits] : [];
    for (let n = Math.max(startPage, 2); n <= lastPage; n++) {
      const next = await page(n);
      items.push(...next.commits);
      if (next.commits.length < PAGE_SIZE) break;
    }
    return items.map(summarize).slice(-limit);
  }

  async getCommit(repo: RepositoryLocator, sha: string, ctx: CollectorContext): Promise<CommitNode> {
    const raw = await this.http.getJson(`${this.base(repo)}/commits/${encodeURIComponent(sha)}`, this.opts(ctx));
    const c = parseEvidence(CommitDetailSchema, raw, "github", "commit");
    const files: ChangedFile[] = c.files.map((f) => ({
      path: f.filename,
      previousPath: f.previous_filename,
      status: fileStatus(f.status),
      additions: f.additions,
      deletions: f.deletions,
      patch: f.patch,
    }));
    const summary = summarize(c);
    return { ...summary, files, url: c.html_url ?? `${repo.webUrl}/commit/${summary.sha}` };
  }

  async listTags(repo: RepositoryLocator, limit: number, ctx: CollectorContext): Promise<TagInfo[]> {
    const out: TagInfo[] = [];
    for (let page = 1; out.length < limit; page++) {
      const params = new URLSearchParams({ per_page: String(PAGE_SIZE), page: String(page) });
      const raw = await this.http.getJson(`${this.base(repo)}/tags?${params.toString()}`, this.opts(ctx));
      const items = parseEvidence(z.array(TagSchema), raw, "github", "tag list");
      out.push(...items.map((t) => ({ name: t.name, sha: t.commit.sha.toLowerCase() })));
      if (items.length < PAGE_SIZE) break;
    }
    return out.slice(0, limit);
  }
}
