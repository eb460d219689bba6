import type { Credentials, ResolverConfig } from "../types";

type Env = Record<string, string | undefined>;

function nonEmpty(v: string | undefined): string | undefined {
  const t = v?.trim();
  return t ? t : undefined;
}

/**
 * Read provider credentials from the environment. Keys are never taken
 * from the config file, only the names of the variables holding them.
 */
export function loadCredentials(env: Env, cfg: ResolverConfig): Credentials {
  const reasoning: Record<string, string> = {};
  for (const p of cfg.arbitration.providers) {
    const key = nonEmpty(env[p.apiKeyEnv]);
    if (key) reasoning[p.id] = key;
  }
  return {
    githubToken: nonEmpty(env.GITHUB_TOKEN) ?? nonEmpty(env.GH_TOKEN),
    gitlabToken: nonEmpty(env.GITLAB_TOKEN),
    nvdApiKey: nonEmpty(env.NVD_API_KEY),
    reasoning,
  };
}

/** Names from credentials.require that are unset or blank. */
export function missingRequiredCredentials(env: Env, cfg: ResolverConfig): string[] {
  return cfg.credentials.require.filter((name) => nonEmpty(env[name]) === undefined);
}
