export {
  createConfigurationService,
  type ConfigurationRuntime,
  type CreateConfigurationServiceOptions,
} from "./createConfigurationService.js";
export {
  ConfigurationService,
  type CacheStatistics,
  type ConfigurationChange,
  type ConfigurationServiceOptions,
} from "./resolution/ConfigurationService.js";
export {
  EnvironmentResolver,
  type EnvironmentResolverOptions,
  type EnvironmentSource,
  type ResolvedEnvironment,
} from "./environment/EnvironmentResolver.js";
export { TtlCache, DEFAULT_CACHE_TTL_MS, type CachedValue, type TtlCacheStats } from "./cache/TtlCache.js";
export {
  SecurityClassifier,
  inferClassification,
  maskValue,
  REDACTION_TOKEN,
  type Classification,
} from "./security/classification.js";
export { AuditRecorder, type AuditRecorderOptions, type AuditRecorderStats } from "./audit/AuditRecorder.js";
export { LoggerAuditSink, PostgresAuditSink } from "./audit/sinks.js";
export { createAuditEvent, type AuditEvent, type AuditEventType, type AuditSink } from "./audit/types.js";
export { MemoryConfigurationStore } from "./store/MemoryConfigurationStore.js";
export { PostgresConfigurationStore } from "./store/PostgresConfigurationStore.js";
export type { ConfigurationEntry, ConfigurationStore, EnvironmentRecord, StoreResult } from "./store/types.js";
export { normalizeUrl, sameEnvironmentUrl } from "./url/normalizeUrl.js";
export { loadConfig } from "./config/loadConfig.js";
export { getDefaultConfig, validateConfig, type ServiceConfig } from "./config/schema.js";
export {
  ConfigLoadError,
  EnvironmentNotResolvedError,
  EnvironmentStoreUnavailableError,
  isEnvironmentNotResolvedError,
  isEnvironmentStoreUnavailableError,
} from "./errors.js";
export { runWithContext, currentActor } from "./observability/requestContext.js";
export { getMetricsContentType, getMetricsSnapshot } from "./observability/metrics.js";
