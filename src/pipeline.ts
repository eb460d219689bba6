import { AdvisoryCollector } from "./collectors/advisory/aggregator";
import { GitHubAdvisorySource } from "./collectors/advisory/github-advisory";
import { NvdSource } from "./collectors/advisory/nvd";
import { OsvSource } from "./collectors/advisory/osv";
import type { AdvisoryQuery, AdvisorySource } from "./collectors/advisory/source";
import type { CollectorContext, EvidenceCollector } from "./collectors/connector";
import { RegistryCollector, type RegistryQuery } from "./collectors/registry/collector";
import { DepsDevReleases } from "./collectors/registry/depsdev";
import { RepositoryCollector } from "./collectors/repository/collector";
import { GitHubHost } from "./collectors/repository/github";
import { GitLabHost } from "./collectors/repository/gitlab";
import type { RepositoryHost } from "./collectors/repository/host";
import { Arbiter } from "./arbitration/arbiter";
import { type ReasoningProvider, createReasoningProviders } from "./arbitration/reasoning-provider";
import type { Cache } from "./cache/types";
import { assessRanking, correlate } from "./correlation/correlation-engine";
import { NotFound, TimeoutError, isProviderError } from "./errors";
import { extractCandidates } from "./extractor/candidate-extractor";
import { pathHints } from "./extractor/path-hints";
import { planWindow } from "./extractor/window";
import { validateRequest } from "./request";
import type {
  ArbitrationOutcome,
  CandidateWindow,
  Credentials,
  ReleaseMetadata,
  RepositoryHostKind,
  RepositoryQuery,
  RepositorySnapshot,
  ResolveResponse,
  ResolverConfig,
  RootCauseVerdict,
  ScoredCandidate,
  VulnerabilityRecord,
} from "./types";
import { createDeadline } from "./utils/deadline";
import { errorMessage } from "./utils/error";
import { createProviderHttpClient } from "./utils/http-factory";
import type { Logger } from "./utils/logger";
import { assembleVerdict, toResponse, unresolvedVerdict } from "./verdict/assembler";

export interface ArbitrationPort {
  arbitrate(
    record: VulnerabilityRecord,
    scored: readonly ScoredCandidate[],
    ctx: CollectorContext,
  ): Promise<ArbitrationOutcome>;
}

/** Everything the pipeline talks to; tests swap in fakes. */
export interface PipelineDeps {
  config: ResolverConfig;
  logger: Logger;
  advisory: EvidenceCollector<AdvisoryQuery, VulnerabilityRecord>;
  registry: EvidenceCollector<RegistryQuery, ReleaseMetadata>;
  repository: EvidenceCollector<RepositoryQuery, RepositorySnapshot>;
  arbiter?: ArbitrationPort;
}

export interface Resolution {
  verdict: RootCauseVerdict;
  response: ResolveResponse;
  record?: VulnerabilityRecord;
  snapshot?: RepositorySnapshot;
}

export interface ResolveOptions {
  /** Caller-side cancellation on top of the configured deadline */
  signal?: AbortSignal;
}

export interface DefaultDepsOptions {
  logger: Logger;
  cache?: Cache<unknown>;
  /** Overrides the providers built from config and credentials */
  reasoningProviders?: readonly ReasoningProvider[];
}

/** Wire the real collectors and reasoning providers from config. */
export function createDefaultDeps(config: ResolverConfig, credentials: Credentials, opts: DefaultDepsOptions): PipelineDeps {
  const { logger, cache } = opts;
  const p = config.providers;
  const client = (id: keyof ResolverConfig["providers"]) =>
    createProviderHttpClient(id, p[id], { logger, cache, cacheTtlSeconds: config.cache.ttlSeconds });

  const sources: AdvisorySource[] = [];
  if (p.osv.enabled) sources.push(new OsvSource(client("osv"), p.osv.baseUrl));
  if (p.github.enabled) sources.push(new GitHubAdvisorySource(client("github"), p.github.baseUrl, credentials.githubToken));
  if (p.nvd.enabled) sources.push(new NvdSource(client("nvd"), p.nvd.baseUrl, credentials.nvdApiKey));

  const hosts: Partial<Record<RepositoryHostKind, RepositoryHost>> = {};
  if (p.github.enabled) hosts.github = new GitHubHost(client("github"), credentials.githubToken);
  if (p.gitlab.enabled) hosts.gitlab = new GitLabHost(client("gitlab"), credentials.gitlabToken);

  const releases = p.depsdev.enabled ? new DepsDevReleases(client("depsdev"), p.depsdev.baseUrl) : undefined;

  const providers =
    opts.reasoningProviders ?? createReasoningProviders(config.arbitration.providers, credentials, logger);

  return {
    config,
    logger,
    advisory: new AdvisoryCollector(sources),
    registry: new RegistryCollector(releases, hosts, config.repository.maxTags),
    repository: new RepositoryCollector(hosts, {
      maxCommits: config.repository.maxCommits,
      fetchConcurrency: config.repository.fetchConcurrency,
    }),
    arbiter: config.arbitration.enabled ? new Arbiter(providers, config.arbitration) : undefined,
  };
}

const EMPTY_RELEASES: ReleaseMetadata = { releases: [], tags: [] };

/**
 * Resolve one request to a verdict.
 *
 * Throws InvalidRequestError before any external call for a malformed
 * request, and RepositoryUnavailableError when the commit history cannot be
 * read. Every other provider failure degrades the evidence instead.
 */
export async function resolveRootCause(input: unknown, deps: PipelineDeps, opts: ResolveOptions = {}): Promise<Resolution> {
  const { config, logger } = deps;
  const request = validateRequest(input, {
    github: config.providers.github.baseUrl,
    gitlab: config.providers.gitlab.baseUrl,
  });
  const { pkg, repository, vulnerabilityId } = request;
  const reqInfo = { vulnerabilityId, pkg, repository, packageUrl: request.raw.package_url };

  const deadline = createDeadline(config.deadlineMs, opts.signal);
  const ctx: CollectorContext = { signal: deadline.signal, logger };
  let record: VulnerabilityRecord | undefined;
  let window: CandidateWindow | undefined;

  const finish = (verdict: RootCauseVerdict, snapshot?: RepositorySnapshot): Resolution => ({
    verdict,
    response: toResponse(verdict, reqInfo, record),
    record,
    snapshot,
  });

  try {
    logger.info(`resolving ${vulnerabilityId} for ${pkg.purl} in ${repository.webUrl}`);

    const [advisory, registry] = await Promise.allSettled([
      deps.advisory.fetch({ vulnerabilityId, pkg }, ctx),
      deps.registry.fetch({ pkg, repository }, ctx),
    ]);
    if (advisory.status === "rejected") {
      const e: unknown = advisory.reason;
      if (!isProviderError(e)) throw e;
      const why = e instanceof NotFound ? "no advisory source knows it" : `advisory evidence unavailable: ${errorMessage(e)}`;
      return finish(unresolvedVerdict(`${vulnerabilityId} could not be described, ${why}`));
    }
    record = advisory.value;

    let meta = EMPTY_RELEASES;
    if (registry.status === "fulfilled") meta = registry.value;
    else if (isProviderError(registry.reason)) logger.warn(`registry: ${errorMessage(registry.reason)}`);
    else throw registry.reason;

    const plan = planWindow(record, pkg, meta, config);
    if (plan.kind === "mismatch") {
      logger.info(`${vulnerabilityId}: ${plan.reason}`);
      return finish(unresolvedVerdict(plan.reason, { record }));
    }
    window = plan.window;

    const snapshot = await deps.repository.fetch(
      {
        repository,
        ref: plan.ref,
        window: window.dates,
        range: plan.range,
        includeShas: record.fixCommits,
      },
      ctx,
    );

    const candidates = extractCandidates(snapshot, record, window, {
      maxCandidates: config.candidates.maxCandidates,
      pathHints: pathHints(record),
      logger,
    });
    const scored = correlate(candidates, record, config.correlation, repository);
    const assessment = assessRanking(scored, config.correlation);
    logger.debug(`correlation: ${scored.length} candidates, ranking ${assessment.status}`, {
      top: scored.slice(0, 3).map((c) => ({ sha: c.commit.sha, score: c.score })),
    });

    let arbitration: ArbitrationOutcome | undefined;
    if (scored.length > 0 && assessment.inconclusive && deps.arbiter) {
      arbitration = await deps.arbiter.arbitrate(record, scored, ctx);
    }

    const verdict = assembleVerdict({
      record,
      repository,
      window,
      scored,
      assessment,
      arbitration,
      threshold: config.correlation.threshold,
    });
    logger.info(`${vulnerabilityId}: ${verdict.status} (confidence ${verdict.confidence})`);
    return finish(verdict, snapshot);
  } catch (e) {
    if (e instanceof TimeoutError) {
      logger.warn(`${vulnerabilityId}: ${e.message}`);
      return finish(unresolvedVerdict(`deadline of ${config.deadlineMs}ms elapsed before a verdict`, { record, window }));
    }
    throw e;
  } finally {
    deadline.release();
  }
}
