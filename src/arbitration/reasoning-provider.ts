import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import { APICallError, type LanguageModel, generateText } from "ai";
import { ProviderUnavailable, RateLimited, type ResolutionError } from "../errors";
import type { Credentials, ReasoningProviderSettings } from "../types";
import { errorMessage, errorStatus } from "../utils/error";
import { parseRetryAfter } from "../utils/http";
import type { Logger } from "../utils/logger";
import { abortReason } from "../utils/retry";

export interface CompletionRequest {
  system: string;
  prompt: string;
  signal?: AbortSignal;
}

/** A reasoning backend that turns a prompt into raw reply text. */
export interface ReasoningProvider {
  readonly id: string;
  readonly settings: ReasoningProviderSettings;
  complete(req: CompletionRequest): Promise<string>;
}

/** Map SDK failures onto the provider error taxonomy. */
export function classifyModelError(e: unknown, provider: string): ResolutionError {
  const status = APICallError.isInstance(e) ? e.statusCode : errorStatus(e);
  if (status === 429 || status === 529) {
    const retryAfter = APICallError.isInstance(e) ? e.responseHeaders?.["retry-after"] : undefined;
    return new RateLimited(`${provider}: rate limited`, {
      provider,
      cause: e,
      retryAfterSeconds: parseRetryAfter(retryAfter),
    });
  }
  if (status === 401 || status === 403) {
    return new ProviderUnavailable(`${provider}: authentication failed with HTTP ${status}`, {
      provider,
      cause: e,
      status,
      transient: false,
    });
  }
  if (status !== undefined && status >= 400 && status < 500 && status !== 408) {
    return new ProviderUnavailable(`${provider}: request rejected with HTTP ${status}: ${errorMessage(e)}`, {
      provider,
      cause: e,
      status,
      transient: false,
    });
  }
  return new ProviderUnavailable(`${provider}: ${errorMessage(e)}`, { provider, cause: e, status, transient: true });
}

/** Reasoning provider backed by an AI SDK language model. */
export class AiSdkReasoningProvider implements ReasoningProvider {
  readonly id: string;

  constructor(
    readonly settings: ReasoningProviderSettings,
    private readonly model: LanguageModel,
  ) {
    this.id = settings.id;
  }

  async complete(req: CompletionRequest): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.settings.timeoutMs);
    const parent = req.signal;
    const onParentAbort = () => controller.abort();
    parent?.addEventListener("abort", onParentAbort, { once: true });

    try {
      const result = await generateText({
        model: this.model,
        system: req.system,
        prompt: req.prompt,
        temperature: 0,
        maxOutputTokens: this.settings.maxOutputTokens,
        // Retries belong to the provider gate
        maxRetries: 0,
        abortSignal: controller.signal,
      });
      return result.text;
    } catch (e) {
      if (parent?.aborted) throw abortReason(parent);
      if (controller.signal.aborted) {
        throw new ProviderUnavailable(`${this.id}: no reply within ${this.settings.timeoutMs}ms`, {
          provider: this.id,
          cause: e,
        });
      }
      throw classifyModelError(e, this.id);
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    }
  }
}

function createModel(settings: ReasoningProviderSettings, apiKey: string): LanguageModel {
  if (settings.kind === "anthropic") {
    return createAnthropic({ apiKey, baseURL: settings.baseUrl })(settings.model);
  }
  // OpenAI-compatible gateways (OpenRouter and friends) speak chat completions
  const openai = createOpenAI({ apiKey, baseURL: settings.baseUrl });
  return settings.baseUrl ? openai.chat(settings.model) : openai(settings.model);
}

/**
 * Build the configured providers in priority order. A provider without its
 * API key is skipped with a warning rather than failing the request.
 */
export function createReasoningProviders(
  settings: readonly ReasoningProviderSettings[],
  credentials: Credentials,
  logger: Logger,
): ReasoningProvider[] {
  const out: ReasoningProvider[] = [];
  for (const s of settings) {
    const key = credentials.reasoning[s.id];
    if (!key) {
      logger.warn(`arbitration: provider "${s.id}" skipped, ${s.apiKeyEnv} is not set`);
      continue;
    }
    out.push(new AiSdkReasoningProvider(s, createModel(s, key)));
  }
  return out;
}
