import { ArbitrationParseError, RateLimited, TimeoutError } from "../errors";
import type {
  ArbitrationAttempt,
  ArbitrationOutcome,
  ResolverConfig,
  ScoredCandidate,
  VulnerabilityRecord,
} from "../types";
import { errorMessage } from "../utils/error";
import type { Logger } from "../utils/logger";
import { abortReason } from "../utils/retry";
import { buildArbitrationPrompt } from "./prompt";
import { ProviderGate } from "./provider-gate";
import type { ReasoningProvider } from "./reasoning-provider";
import { parseArbitrationResponse } from "./response-schema";

export type ArbitrationSettings = Pick<ResolverConfig["arbitration"], "topN" | "trustWeight" | "diffExcerptChars">;

export interface ArbitrationContext {
  signal?: AbortSignal;
  logger: Logger;
}

function attemptOutcome(e: unknown): ArbitrationAttempt["outcome"] {
  if (e instanceof ArbitrationParseError) return "parse_error";
  if (e instanceof RateLimited) return "rate_limited";
  return "unavailable";
}

/**
 * Asks the reasoning providers, in priority order, to pick the fix among the
 * top-ranked candidates. The first valid reply wins; a provider that fails or
 * replies out of contract hands over to the next one.
 */
export class Arbiter {
  constructor(
    private readonly providers: readonly ReasoningProvider[],
    private readonly settings: ArbitrationSettings,
  ) {}

  async arbitrate(
    record: VulnerabilityRecord,
    scored: readonly ScoredCandidate[],
    ctx: ArbitrationContext,
  ): Promise<ArbitrationOutcome> {
    const presented = scored.slice(0, Math.max(1, this.settings.topN));
    const shas = presented.map((c) => c.commit.sha);
    const attempts: ArbitrationAttempt[] = [];

    if (presented.length === 0 || this.providers.length === 0) {
      return { decision: { kind: "no_decision" }, presented: shas, attempts };
    }

    const { system, prompt } = buildArbitrationPrompt(record, presented, this.settings.diffExcerptChars);

    for (const provider of this.providers) {
      if (ctx.signal?.aborted) throw abortReason(ctx.signal);

      const gate = new ProviderGate(provider.id, provider.settings.retry, ctx.logger);
      try {
        const parsed = await gate.run(async (signal) => {
          const text = await provider.complete({ system, prompt, signal });
          return parseArbitrationResponse(text, presented, provider.id);
        }, ctx.signal);

        attempts.push({ provider: provider.id, outcome: "decision", detail: parsed.decision.kind });
        ctx.logger.info(`arbitration: ${provider.id} decided ${parsed.decision.kind}`);
        return {
          decision: parsed.decision,
          provider: provider.id,
          trustWeight: provider.settings.trustWeight ?? this.settings.trustWeight,
          justification: parsed.justification,
          presented: shas,
          attempts,
        };
      } catch (e) {
        if (e instanceof TimeoutError) throw e;
        attempts.push({ provider: provider.id, outcome: attemptOutcome(e), detail: errorMessage(e) });
        ctx.logger.warn(`arbitration: ${provider.id} gave no decision after ${gate.attemptCount} attempt(s): ${errorMessage(e)}`);
      }
    }

    return { decision: { kind: "no_decision" }, presented: shas, attempts };
  }
}
