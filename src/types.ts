export type Ecosystem =
  | "npm"
  | "pypi"
  | "maven"
  | "golang"
  | "cargo"
  | "gem"
  | "nuget"
  | "composer"
  | "generic";

export type Severity = "critical" | "high" | "medium" | "low" | "unknown";
export type AdvisorySourceId = "osv" | "github" | "nvd";
export type RepositoryHostKind = "github" | "gitlab";
export type VerdictStatus = "RESOLVED" | "AMBIGUOUS" | "UNRESOLVED";

/** Request record as produced by the external loader. */
export interface ResolveRequest {
  package_url: string;
  repository_url: string;
  vulnerability_id: string;
}

export interface PackageIdentity {
  readonly ecosystem: Ecosystem;
  /** purl type as written by the caller, e.g. "maven" or "pypi" */
  readonly purlType: string;
  readonly namespace?: string;
  readonly name: string;
  readonly version: string;
  readonly purl: string;
}

// ---------------------------------------------------------------------------
// Advisory evidence
// ---------------------------------------------------------------------------

/** OSV-style range event. Exactly one field is set per event. */
export interface RangeEvent {
  readonly introduced?: string;
  readonly fixed?: string;
  readonly lastAffected?: string;
  readonly limit?: string;
}

export interface AffectedRange {
  readonly ecosystem: Ecosystem;
  readonly packageName: string;
  readonly events: readonly RangeEvent[];
  /** Explicitly enumerated affected versions, when the source lists them. */
  readonly versions: readonly string[];
  readonly source: AdvisorySourceId;
}

export type ReferenceKind = "commit" | "pull" | "issue" | "advisory" | "tag" | "patch" | "other";

export interface AdvisoryReference {
  readonly url: string;
  readonly kind: ReferenceKind;
  readonly source: AdvisorySourceId;
}

export interface SeverityRating {
  readonly rating: Severity;
  readonly score?: number;
  readonly vector?: string;
  readonly source: AdvisorySourceId;
}

export interface VulnerabilityRecord {
  readonly id: string;
  readonly aliases: readonly string[];
  readonly summary?: string;
  readonly description: string;
  /** CWE codes, e.g. "CWE-770", sorted numerically */
  readonly weaknesses: readonly string[];
  readonly affected: readonly AffectedRange[];
  readonly references: readonly AdvisoryReference[];
  /** Lower-case commit shas the advisory itself names as fixes */
  readonly fixCommits: readonly string[];
  readonly publishedAt?: string;
  readonly modifiedAt?: string;
  readonly severity?: SeverityRating;
  readonly sources: readonly AdvisorySourceId[];
  /** Advisory page of each contributing source, in source order */
  readonly advisoryPages: readonly string[];
}

// ---------------------------------------------------------------------------
// Repository evidence
// ---------------------------------------------------------------------------

export type FileChangeStatus = "added" | "modified" | "removed" | "renamed";

export interface ChangedFile {
  readonly path: string;
  readonly previousPath?: string;
  readonly status: FileChangeStatus;
  readonly additions: number;
  readonly deletions: number;
  /** Unified diff of this file; hosts omit it for binary or very large files */
  readonly patch?: string;
}

export interface CommitNode {
  readonly sha: string;
  /** Committer timestamp, ISO 8601 */
  readonly timestamp: string;
  readonly message: string;
  readonly parents: readonly string[];
  readonly files: readonly ChangedFile[];
  readonly url: string;
}

export interface RepositoryLocator {
  readonly host: RepositoryHostKind;
  /** API origin, e.g. https://api.github.com or https://gitlab.com/api/v4 */
  readonly apiBaseUrl: string;
  /** Web URL without trailing slash or .git */
  readonly webUrl: string;
  /** Owner, or the full group path on GitLab */
  readonly owner: string;
  readonly name: string;
}

export interface DateWindow {
  readonly since?: string;
  readonly until?: string;
}

/** Commits reachable from `head` and not from `base` */
export interface RefRange {
  readonly base: string;
  readonly head: string;
}

export interface RepositoryQuery {
  readonly repository: RepositoryLocator;
  /** Branch, tag or sha to walk back from; the default branch when omitted */
  readonly ref?: string;
  readonly window: DateWindow;
  /** When set, the listing follows the ref range instead of the date window */
  readonly range?: RefRange;
  /** Commits fetched even if outside the window (advisory-named fixes, tag commits) */
  readonly includeShas: readonly string[];
}

export interface RepositorySnapshot {
  readonly snapshotId: string;
  readonly repository: RepositoryLocator;
  readonly defaultBranch: string;
  readonly ref: string;
  readonly window: DateWindow;
  readonly range?: RefRange;
  readonly commits: readonly CommitNode[];
  /** True when the configured graph-size cap cut the listing short */
  readonly truncated: boolean;
  /** Listed commits left out because their details were missing or malformed */
  readonly skipped: readonly string[];
}

// ---------------------------------------------------------------------------
// Registry evidence
// ---------------------------------------------------------------------------

export interface ReleaseInfo {
  readonly version: string;
  readonly publishedAt?: string;
}

export interface TagInfo {
  readonly name: string;
  readonly sha: string;
  /** Version the tag name maps to, when it maps to one */
  readonly version?: string;
}

export interface ReleaseMetadata {
  readonly releases: readonly ReleaseInfo[];
  readonly tags: readonly TagInfo[];
}

// ---------------------------------------------------------------------------
// Candidates and verdicts
// ---------------------------------------------------------------------------

export type WindowKind = "tag" | "date" | "unbounded";

export interface CandidateWindow {
  readonly kind: WindowKind;
  readonly lastVulnerable?: string;
  readonly firstFixed?: string;
  readonly vulnerableTag?: TagInfo;
  readonly fixedTag?: TagInfo;
  readonly dates: DateWindow;
  /** Instant the fix is expected near; candidates are capped by distance to it */
  readonly fixBoundary?: string;
  readonly disclosedAt?: string;
}

export type ScoreComponent = "description" | "weakness" | "proximity" | "reference";

export interface EvidenceFragment {
  readonly component: ScoreComponent;
  readonly detail: string;
}

export interface CommitCandidate {
  readonly snapshotId: string;
  readonly commit: CommitNode;
  /** Absolute distance between the commit and the disclosure date */
  readonly proximityMs: number;
  /** True when the advisory itself names this commit */
  readonly advisoryNamed: boolean;
  readonly score: number | null;
  readonly components: Readonly<Partial<Record<ScoreComponent, number>>>;
  readonly evidence: readonly EvidenceFragment[];
}

export interface ScoredCandidate extends CommitCandidate {
  readonly score: number;
}

export type ArbitrationDecision =
  /** `index` is the 0-based position in the presented list */
  | { readonly kind: "select"; readonly index: number; readonly sha: string }
  | { readonly kind: "reject_all" }
  | { readonly kind: "insufficient_evidence" }
  | { readonly kind: "no_decision" };

export interface ArbitrationAttempt {
  readonly provider: string;
  readonly outcome: "decision" | "parse_error" | "rate_limited" | "unavailable" | "skipped";
  readonly detail?: string;
}

export interface ArbitrationOutcome {
  readonly decision: ArbitrationDecision;
  readonly provider?: string;
  readonly trustWeight?: number;
  readonly justification?: string;
  /** Shas of the candidates presented to the providers, in presentation order */
  readonly presented: readonly string[];
  readonly attempts: readonly ArbitrationAttempt[];
}

export type CitationKind = "advisory" | "advisory-reference" | "commit";

export interface EvidenceCitation {
  readonly kind: CitationKind;
  readonly url: string;
}

export interface RootCauseVerdict {
  readonly status: VerdictStatus;
  readonly candidate: ScoredCandidate | null;
  readonly confidence: number;
  readonly rationale: string;
  readonly evidence: readonly EvidenceCitation[];
  readonly window?: CandidateWindow;
  readonly candidatesConsidered: number;
  readonly arbitration?: ArbitrationOutcome;
  readonly functions: readonly string[];
}

/** Response record handed to the external writer. */
export interface ResolveResponse {
  vulnerability_id: string;
  package_url: string;
  status: VerdictStatus;
  confidence: number;
  root_cause: {
    repository_url: string;
    commit: string;
    commit_url: string;
    files: string[];
    functions: string[];
  } | null;
  rationale: string;
  evidence: Array<{ type: CitationKind; url: string }>;
  vulnerability: {
    aliases: string[];
    weaknesses: string[];
    severity: { rating: Severity; score?: number; vector?: string } | null;
    published: string | null;
  } | null;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface RetrySettings {
  /** Retries after the first attempt */
  attempts: number;
  minDelayMs: number;
  maxDelayMs: number;
  factor: number;
  jitter: number;
}

export interface ProviderSettings {
  enabled: boolean;
  timeoutMs: number;
  retry: RetrySettings;
  baseUrl: string;
}

export type ReasoningProviderKind = "anthropic" | "openai";

export interface ReasoningProviderSettings {
  id: string;
  kind: ReasoningProviderKind;
  model: string;
  /** Environment variable holding the API key */
  apiKeyEnv: string;
  /** OpenAI-compatible gateway URL (OpenRouter and friends) */
  baseUrl?: string;
  /** Overrides arbitration.trustWeight for this provider */
  trustWeight?: number;
  timeoutMs: number;
  maxOutputTokens: number;
  retry: RetrySettings;
}

export type CorrelationWeights = Record<ScoreComponent, number>;

/** Fully-resolved config returned by loadConfig(); frozen. */
export interface ResolverConfig {
  /** Request-scoped deadline for the whole pipeline */
  deadlineMs: number;
  providers: {
    osv: ProviderSettings;
    github: ProviderSettings;
    nvd: ProviderSettings;
    gitlab: ProviderSettings;
    depsdev: ProviderSettings;
  };
  repository: {
    /** Upper bound on commits listed into a snapshot */
    maxCommits: number;
    fetchConcurrency: number;
    maxTags: number;
  };
  window: {
    /** Half-width of a disclosure-date window when no release dates are known */
    windowDays: number;
    /** Slack added on both sides of release-date and tag windows */
    paddingDays: number;
  };
  candidates: {
    maxCandidates: number;
  };
  correlation: {
    weights: CorrelationWeights;
    /** Resolution threshold */
    threshold: number;
    /** Required lead of the top candidate over the runner-up */
    margin: number;
    tieBand: number;
    proximityHalfLifeDays: number;
    descriptionSaturation: number;
    weaknessSaturation: number;
  };
  arbitration: {
    enabled: boolean;
    topN: number;
    trustWeight: number;
    diffExcerptChars: number;
    /** Priority order */
    providers: ReasoningProviderSettings[];
  };
  cache: {
    enabled: boolean;
    dir: string;
    ttlSeconds: number;
  };
  credentials: {
    /** Environment variables that must be set, or the CLI refuses to start */
    require: string[];
  };
}

export interface Credentials {
  githubToken?: string;
  gitlabToken?: string;
  nvdApiKey?: string;
  /** API keys by reasoning provider id */
  reasoning: Record<string, string>;
}
