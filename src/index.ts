export { resolveRootCause, createDefaultDeps } from "./pipeline";
export type { PipelineDeps, Resolution, ResolveOptions, ArbitrationPort, DefaultDepsOptions } from "./pipeline";
export { validateRequest, normalizeVulnerabilityId } from "./request";
export type { ValidatedRequest } from "./request";
export { loadConfig, resolveConfig, defaultConfig, DEFAULT_CONFIG, DEFAULT_CONFIG_FILE } from "./config";
export { loadCredentials, missingRequiredCredentials } from "./utils/env";
export { createLogger, silentLogger } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";
export { MemoryCache } from "./cache/memory-cache";
export { FileCache } from "./cache/file-cache";
export { LayeredCache } from "./cache/layered-cache";
export type { Cache, CacheEntry } from "./cache/types";
export { Arbiter } from "./arbitration/arbiter";
export { AiSdkReasoningProvider, createReasoningProviders } from "./arbitration/reasoning-provider";
export type { ReasoningProvider, CompletionRequest } from "./arbitration/reasoning-provider";
export { assembleVerdict, toResponse } from "./verdict/assembler";
export * from "./errors";
export * from "./types";
