import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import type {
  CorrelationWeights,
  ProviderSettings,
  ReasoningProviderKind,
  ReasoningProviderSettings,
  ResolverConfig,
  RetrySettings,
  ScoreComponent,
} from "./types";
import { errorMessage, isNodeError } from "./utils/error";
import { deepFreeze } from "./utils/freeze";
import { logger } from "./utils/logger";

/** Maximum allowed request deadline (30 minutes) */
const MAX_DEADLINE_MS = 1_800_000;
/** Maximum allowed per-call timeout (5 minutes) */
const MAX_TIMEOUT_MS = 300_000;
/** Maximum allowed cache TTL in seconds (7 days) */
const MAX_CACHE_TTL_SECONDS = 604_800;

export const DEFAULT_CONFIG_FILE = ".fixtrace.yaml";

const DEFAULT_RETRY: RetrySettings = { attempts: 2, minDelayMs: 500, maxDelayMs: 8000, factor: 2, jitter: 0.2 };
const DEFAULT_REASONING_RETRY: RetrySettings = { attempts: 2, minDelayMs: 1000, maxDelayMs: 15000, factor: 2, jitter: 0.2 };

const provider = (baseUrl: string, timeoutMs = 15000): ProviderSettings => ({
  enabled: true,
  timeoutMs,
  retry: { ...DEFAULT_RETRY },
  baseUrl,
});

/**
 * Defaults for every tunable. Weights, thresholds and the reasoning-provider
 * priority list are product decisions; override them in the config file.
 */
export function defaultConfig(): ResolverConfig {
  return {
    deadlineMs: 180_000,
    providers: {
      osv: provider("https://api.osv.dev/v1"),
      github: provider("https://api.github.com"),
      nvd: provider("https://services.nvd.nist.gov/rest/json/cves/2.0", 20000),
      gitlab: provider("https://gitlab.com/api/v4"),
      depsdev: provider("https://api.deps.dev/v3"),
    },
    repository: { maxCommits: 300, fetchConcurrency: 6, maxTags: 500 },
    window: { windowDays: 120, paddingDays: 14 },
    candidates: { maxCandidates: 25 },
    correlation: {
      weights: { description: 0.3, weakness: 0.15, proximity: 0.15, reference: 0.4 },
      threshold: 0.6,
      margin: 0.1,
      tieBand: 0.05,
      proximityHalfLifeDays: 30,
      descriptionSaturation: 8,
      weaknessSaturation: 3,
    },
    arbitration: {
      enabled: true,
      topN: 3,
      trustWeight: 0.7,
      diffExcerptChars: 4000,
      providers: [
        {
          id: "anthropic",
          kind: "anthropic",
          model: "claude-sonnet-4-20250514",
          apiKeyEnv: "ANTHROPIC_API_KEY",
          timeoutMs: 60000,
          maxOutputTokens: 600,
          retry: { ...DEFAULT_REASONING_RETRY },
        },
        {
          id: "openai",
          kind: "openai",
          model: "gpt-4o",
          apiKeyEnv: "OPENAI_API_KEY",
          timeoutMs: 60000,
          maxOutputTokens: 600,
          retry: { ...DEFAULT_REASONING_RETRY },
        },
      ],
    },
    cache: { enabled: false, dir: ".fixtrace-cache", ttlSeconds: 3600 },
    credentials: { require: [] },
  };
}

export const DEFAULT_CONFIG: ResolverConfig = deepFreeze(defaultConfig());

export interface LoadConfigOptions {
  cwd: string;
  env: Record<string, string | undefined>;
  /** Explicit config path (CLI --config); wins over FIXTRACE_CONFIG_PATH */
  configPath?: string;
}

type Raw = Record<string, unknown>;

function isRecord(v: unknown): v is Raw {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function asRecord(v: unknown): Raw | undefined {
  return isRecord(v) ? v : undefined;
}

interface NumberRule {
  min: number;
  max: number;
  integer?: boolean;
}

function num(v: unknown, rule: NumberRule, fallback: number, key: string): number {
  if (v === undefined) return fallback;
  if (typeof v !== "number" || !Number.isFinite(v) || v < rule.min || v > rule.max || (rule.integer && !Number.isInteger(v))) {
    logger.warn(`Invalid ${key}: ${JSON.stringify(v)} (expected ${rule.integer ? "integer" : "number"} in [${rule.min}, ${rule.max}]), using default: ${fallback}`);
    return fallback;
  }
  return v;
}

function bool(v: unknown, fallback: boolean, key: string): boolean {
  if (v === undefined) return fallback;
  if (typeof v !== "boolean") {
    logger.warn(`Invalid ${key}: expected boolean, using default: ${fallback}`);
    return fallback;
  }
  return v;
}

function str(v: unknown, fallback: string, key: string): string {
  if (v === undefined) return fallback;
  if (typeof v !== "string" || v.trim() === "") {
    logger.warn(`Invalid ${key}: expected non-empty string, using default: ${fallback}`);
    return fallback;
  }
  return v.trim();
}

function httpUrl(v: unknown, fallback: string, key: string): string {
  const s = str(v, fallback, key);
  try {
    const u = new URL(s);
    if (u.protocol === "https:" || u.protocol === "http:") return s.replace(/\/+$/, "");
  } catch {
    // fall through
  }
  logger.warn(`Invalid ${key}: "${s}" is not an http(s) URL, using default: ${fallback}`);
  return fallback;
}

function parseRetry(v: unknown, fallback: RetrySettings, key: string): RetrySettings {
  const r = asRecord(v);
  if (!r) return { ...fallback };
  const minDelayMs = num(r.minDelayMs, { min: 0, max: 60000 }, fallback.minDelayMs, `${key}.minDelayMs`);
  return {
    attempts: num(r.attempts, { min: 0, max: 10, integer: true }, fallback.attempts, `${key}.attempts`),
    minDelayMs,
    maxDelayMs: Math.max(minDelayMs, num(r.maxDelayMs, { min: 0, max: 120000 }, fallback.maxDelayMs, `${key}.maxDelayMs`)),
    factor: num(r.factor, { min: 1, max: 10 }, fallback.factor, `${key}.factor`),
    jitter: num(r.jitter, { min: 0, max: 1 }, fallback.jitter, `${key}.jitter`),
  };
}

function parseProvider(v: unknown, fallback: ProviderSettings, key: string): ProviderSettings {
  if (v === false) return { ...fallback, enabled: false };
  const r = asRecord(v);
  if (!r) return fallback;
  return {
    enabled: bool(r.enabled, fallback.enabled, `${key}.enabled`),
    timeoutMs: num(r.timeoutMs, { min: 1, max: MAX_TIMEOUT_MS }, fallback.timeoutMs, `${key}.timeoutMs`),
    retry: parseRetry(r.retry, fallback.retry, `${key}.retry`),
    baseUrl: httpUrl(r.baseUrl, fallback.baseUrl, `${key}.baseUrl`),
  };
}

const REASONING_KINDS: readonly ReasoningProviderKind[] = ["anthropic", "openai"];

function isReasoningKind(v: unknown): v is ReasoningProviderKind {
  return REASONING_KINDS.some((k) => k === v);
}

/** Validate one reasoning provider entry, logging and dropping invalid ones */
function parseReasoningProvider(v: unknown, index: number): ReasoningProviderSettings | null {
  const key = `arbitration.providers[${index}]`;
  const r = asRecord(v);
  if (!r) {
    logger.warn(`${key} filtered: not an object`);
    return null;
  }
  if (typeof r.id !== "string" || r.id.trim() === "") {
    logger.warn(`${key} filtered: missing 'id'`);
    return null;
  }
  if (!isReasoningKind(r.kind)) {
    logger.warn(`${key} filtered: 'kind' must be one of ${REASONING_KINDS.join(", ")}`);
    return null;
  }
  if (typeof r.model !== "string" || r.model.trim() === "") {
    logger.warn(`${key} filtered: missing 'model'`);
    return null;
  }

  const entry: ReasoningProviderSettings = {
    id: r.id.trim(),
    kind: r.kind,
    model: r.model.trim(),
    apiKeyEnv: str(r.apiKeyEnv, r.kind === "anthropic" ? "ANTHROPIC_API_KEY" : "OPENAI_API_KEY", `${key}.apiKeyEnv`),
    timeoutMs: num(r.timeoutMs, { min: 1, max: MAX_TIMEOUT_MS }, 60000, `${key}.timeoutMs`),
    maxOutputTokens: num(r.maxOutputTokens, { min: 64, max: 8192, integer: true }, 600, `${key}.maxOutputTokens`),
    retry: parseRetry(r.retry, DEFAULT_REASONING_RETRY, `${key}.retry`),
  };
  if (r.baseUrl !== undefined) entry.baseUrl = httpUrl(r.baseUrl, "", `${key}.baseUrl`) || undefined;
  if (r.trustWeight !== undefined) {
    const tw = num(r.trustWeight, { min: 0, max: 1 }, -1, `${key}.trustWeight`);
    if (tw >= 0) entry.trustWeight = tw;
  }
  return entry;
}

function parseReasoningProviders(v: unknown, fallback: ReasoningProviderSettings[]): ReasoningProviderSettings[] {
  if (v === undefined) return fallback.map((p) => ({ ...p, retry: { ...p.retry } }));
  if (!Array.isArray(v)) {
    logger.warn("Invalid arbitration.providers: expected a list, using defaults");
    return fallback.map((p) => ({ ...p, retry: { ...p.retry } }));
  }
  const out: ReasoningProviderSettings[] = [];
  const seen = new Set<string>();
  v.forEach((item, i) => {
    const entry = parseReasoningProvider(item, i);
    if (!entry) return;
    if (seen.has(entry.id)) {
      logger.warn(`arbitration.providers[${i}] filtered: duplicate id "${entry.id}"`);
      return;
    }
    seen.add(entry.id);
    out.push(entry);
  });
  return out;
}

const SCORE_COMPONENTS: ScoreComponent[] = ["description", "weakness", "proximity", "reference"];

function parseWeights(v: unknown, fallback: CorrelationWeights): CorrelationWeights {
  const r = asRecord(v);
  if (!r) return { ...fallback };
  const weights = { ...fallback };
  for (const c of SCORE_COMPONENTS) {
    weights[c] = num(r[c], { min: 0, max: 100 }, fallback[c], `correlation.weights.${c}`);
  }
  const total = SCORE_COMPONENTS.reduce((sum, c) => sum + weights[c], 0);
  if (total <= 0) {
    logger.warn("correlation.weights sum to zero, using defaults");
    return { ...fallback };
  }
  return weights;
}

function parseStringList(v: unknown, key: string): string[] {
  if (v === undefined) return [];
  if (!Array.isArray(v)) {
    logger.warn(`Invalid ${key}: expected a list of strings`);
    return [];
  }
  const out: string[] = [];
  for (const item of v) {
    if (typeof item === "string" && item.trim() !== "") out.push(item.trim());
    else logger.warn(`${key} entry ignored: ${JSON.stringify(item)}`);
  }
  return out;
}

/** Merge a parsed YAML document onto the defaults. Never throws on bad values. */
export function resolveConfig(raw: Raw): ResolverConfig {
  const d = defaultConfig();
  const providers = asRecord(raw.providers) ?? {};
  const repository = asRecord(raw.repository) ?? {};
  const window = asRecord(raw.window) ?? {};
  const candidates = asRecord(raw.candidates) ?? {};
  const correlation = asRecord(raw.correlation) ?? {};
  const arbitration = asRecord(raw.arbitration) ?? {};
  const cache = asRecord(raw.cache) ?? {};
  const credentials = asRecord(raw.credentials) ?? {};

  const threshold = num(correlation.threshold, { min: 0, max: 1 }, d.correlation.threshold, "correlation.threshold");

  const cfg: ResolverConfig = {
    deadlineMs: num(raw.deadlineMs, { min: 1, max: MAX_DEADLINE_MS }, d.deadlineMs, "deadlineMs"),
    providers: {
      osv: parseProvider(providers.osv, d.providers.osv, "providers.osv"),
      github: parseProvider(providers.github, d.providers.github, "providers.github"),
      nvd: parseProvider(providers.nvd, d.providers.nvd, "providers.nvd"),
      gitlab: parseProvider(providers.gitlab, d.providers.gitlab, "providers.gitlab"),
      depsdev: parseProvider(providers.depsdev, d.providers.depsdev, "providers.depsdev"),
    },
    repository: {
      maxCommits: num(repository.maxCommits, { min: 1, max: 5000, integer: true }, d.repository.maxCommits, "repository.maxCommits"),
      fetchConcurrency: num(repository.fetchConcurrency, { min: 1, max: 32, integer: true }, d.repository.fetchConcurrency, "repository.fetchConcurrency"),
      maxTags: num(repository.maxTags, { min: 0, max: 10000, integer: true }, d.repository.maxTags, "repository.maxTags"),
    },
    window: {
      windowDays: num(window.windowDays, { min: 1, max: 3650 }, d.window.windowDays, "window.windowDays"),
      paddingDays: num(window.paddingDays, { min: 0, max: 365 }, d.window.paddingDays, "window.paddingDays"),
    },
    candidates: {
      maxCandidates: num(candidates.maxCandidates, { min: 1, max: 500, integer: true }, d.candidates.maxCandidates, "candidates.maxCandidates"),
    },
    correlation: {
      weights: parseWeights(correlation.weights, d.correlation.weights),
      threshold,
      margin: num(correlation.margin, { min: 0, max: 1 }, d.correlation.margin, "correlation.margin"),
      tieBand: num(correlation.tieBand, { min: 0, max: 1 }, d.correlation.tieBand, "correlation.tieBand"),
      proximityHalfLifeDays: num(correlation.proximityHalfLifeDays, { min: 0.1, max: 3650 }, d.correlation.proximityHalfLifeDays, "correlation.proximityHalfLifeDays"),
      descriptionSaturation: num(correlation.descriptionSaturation, { min: 1, max: 100, integer: true }, d.correlation.descriptionSaturation, "correlation.descriptionSaturation"),
      weaknessSaturation: num(correlation.weaknessSaturation, { min: 1, max: 50, integer: true }, d.correlation.weaknessSaturation, "correlation.weaknessSaturation"),
    },
    arbitration: {
      enabled: bool(arbitration.enabled, d.arbitration.enabled, "arbitration.enabled"),
      topN: num(arbitration.topN, { min: 2, max: 10, integer: true }, d.arbitration.topN, "arbitration.topN"),
      trustWeight: num(arbitration.trustWeight, { min: 0, max: 1 }, d.arbitration.trustWeight, "arbitration.trustWeight"),
      diffExcerptChars: num(arbitration.diffExcerptChars, { min: 200, max: 50000, integer: true }, d.arbitration.diffExcerptChars, "arbitration.diffExcerptChars"),
      providers: parseReasoningProviders(arbitration.providers, d.arbitration.providers),
    },
    cache: {
      enabled: bool(cache.enabled, d.cache.enabled, "cache.enabled"),
      dir: str(cache.dir, d.cache.dir, "cache.dir"),
      ttlSeconds: num(cache.ttlSeconds, { min: 1, max: MAX_CACHE_TTL_SECONDS, integer: true }, d.cache.ttlSeconds, "cache.ttlSeconds"),
    },
    credentials: {
      require: parseStringList(credentials.require, "credentials.require"),
    },
  };

  return deepFreeze(cfg);
}

export async function loadConfig(opts: LoadConfigOptions): Promise<ResolverConfig> {
  const explicit = opts.configPath ?? opts.env.FIXTRACE_CONFIG_PATH;
  const configPath = path.resolve(opts.cwd, explicit ?? DEFAULT_CONFIG_FILE);

  let raw: Raw = {};
  try {
    const parsed: unknown = YAML.parse(await fs.readFile(configPath, "utf-8"));
    if (parsed !== null && parsed !== undefined) {
      if (!isRecord(parsed)) throw new Error("top-level value must be a mapping");
      raw = parsed;
    }
  } catch (e: unknown) {
    if (isNodeError(e) && e.code === "ENOENT" && explicit === undefined) {
      logger.debug(`No config file found at ${configPath}, using defaults`);
    } else {
      throw new Error(`Failed to read config ${configPath}: ${errorMessage(e)}`);
    }
  }

  return resolveConfig(raw);
}
