import { AuditRecorder, type AuditRecorderStats } from "../audit/AuditRecorder.js";
import { type AuditEventInput, type AuditSource, createAuditEvent } from "../audit/types.js";
import { TtlCache } from "../cache/TtlCache.js";
import type { EnvironmentCacheStats, EnvironmentResolver } from "../environment/EnvironmentResolver.js";
import { isEnvironmentStoreUnavailableError } from "../errors.js";
import { type AppLogger, appLogger, normalizeError } from "../observability/logger.js";
import { recordCacheLookup, recordResolution, setCacheEntries } from "../observability/metrics.js";
import type { Classification, SecurityClassifier } from "../security/classification.js";
import type { ConfigurationEntry, ConfigurationStore, StoreResult } from "../store/types.js";
import { toEnvironmentVariableName } from "../utils/env.js";

const TRUE_TOKENS: ReadonlySet<string> = new Set(["true", "yes", "1", "on", "enabled"]);
const FALSE_TOKENS: ReadonlySet<string> = new Set(["false", "no", "0", "off", "disabled"]);
const INTEGER_PATTERN = /^[+-]?\d+$/;

export type ConfigurationServiceOptions = {
  store: ConfigurationStore;
  environments: EnvironmentResolver;
  cache: TtlCache<string>;
  classifier: SecurityClassifier;
  audit: AuditRecorder;
  /** Environment codes allowed to read values from process environment variables. */
  localEnvironments?: readonly string[];
  env?: NodeJS.ProcessEnv;
  now?: () => number;
  logger?: AppLogger;
};

export type CacheStatistics = {
  configCacheSize: number;
  environmentCacheSize: number;
  cacheTtlMs: number;
  configCacheKeys: string[];
  environmentCacheEntries: Array<{ code: string; id: number }>;
  oldestEntryAgeMs?: number;
  audit: AuditRecorderStats;
};

export type ConfigurationChange = {
  eventType: "CREATE" | "UPDATE" | "DELETE";
  key: string;
  value?: string | null;
  environmentCode?: string;
  classification?: Classification;
  actor?: string;
};

type Tier = "environment" | "global";

type Resolved = {
  value: string;
  source: Extract<AuditSource, "database" | "environment">;
};

/**
 * Resolves configuration values for the environment the process runs in.
 *
 * Lookup order: cache, the environment-specific store entry, the global
 * store entry, a process environment variable (local/dev environments only),
 * then the caller's default. None of the accessors reject: store failures
 * skip a tier and bad input returns the default.
 */
export class ConfigurationService {
  private readonly store: ConfigurationStore;
  private readonly environments: EnvironmentResolver;
  private readonly cache: TtlCache<string>;
  private readonly classifier: SecurityClassifier;
  private readonly audit: AuditRecorder;
  private readonly localEnvironments: ReadonlySet<string>;
  private readonly env: NodeJS.ProcessEnv;
  private readonly now: () => number;
  private readonly logger: AppLogger;
  private lastEnvironmentCode: string | undefined;

  constructor(options: ConfigurationServiceOptions) {
    this.store = options.store;
    this.environments = options.environments;
    this.cache = options.cache;
    this.classifier = options.classifier;
    this.audit = options.audit;
    this.localEnvironments = new Set((options.localEnvironments ?? ["LOCAL", "DEV"]).map((code) => code.toUpperCase()));
    this.env = options.env ?? process.env;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? appLogger.child({ subsystem: "configuration-service" });
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  getString(key: string): Promise<string | undefined>;
  getString(key: string, defaultValue: string): Promise<string>;
  getString(key: string, defaultValue?: string): Promise<string | undefined>;
  async getString(key: string, defaultValue?: string): Promise<string | undefined> {
    const startedAt = this.now();
    if (!key || key.trim().length === 0) {
      this.logger.warn({ event: "config.get.empty_key" }, "getString called with an empty key");
      return defaultValue;
    }

    const environmentCode = await this.currentEnvironment();
    const classification = this.classifier.classify(key);
    const cacheKey = `${key}:${environmentCode}`;

    const cached = this.cache.get(cacheKey);
    recordCacheLookup(cached !== undefined);
    if (cached !== undefined) {
      recordResolution("cache");
      this.recordRead(key, environmentCode, cached, "cache", startedAt);
      return cached;
    }

    const resolved =
      (await this.lookupEnvironmentEntry(key, environmentCode)) ??
      (await this.lookupGlobalEntry(key, environmentCode)) ??
      this.lookupProcessEnvironment(key, environmentCode);

    if (resolved) {
      this.cache.put(cacheKey, resolved.value);
      setCacheEntries(this.cache.size);
      recordResolution(resolved.source);
      this.recordRead(key, environmentCode, resolved.value, resolved.source, startedAt);
      return resolved.value;
    }

    recordResolution("default");
    this.logger.debug(
      {
        event: "config.get.default",
        key,
        environment: environmentCode,
        value: this.classifier.mask(defaultValue, classification),
      },
      "Configuration key not found; using default",
    );
    this.recordRead(key, environmentCode, defaultValue, "default", startedAt);
    return defaultValue;
  }

  getInteger(key: string): Promise<number | undefined>;
  getInteger(key: string, defaultValue: number): Promise<number>;
  getInteger(key: string, defaultValue?: number): Promise<number | undefined>;
  async getInteger(key: string, defaultValue?: number): Promise<number | undefined> {
    const startedAt = this.now();
    const raw = await this.getString(key);
    if (raw === undefined) {
      return defaultValue;
    }
    const trimmed = raw.trim();
    const parsed = INTEGER_PATTERN.test(trimmed) ? Number(trimmed) : Number.NaN;
    if (Number.isSafeInteger(parsed)) {
      return parsed;
    }
    const masked = this.classifier.maskForKey(key, raw);
    this.logger.error(
      { event: "config.parse.integer_failed", key, value: masked, defaultValue },
      "Configuration value is not a valid integer; using default",
    );
    this.recordParseFailure(key, raw, startedAt);
    return defaultValue;
  }

  async getBoolean(key: string, defaultValue = false): Promise<boolean> {
    const startedAt = this.now();
    const raw = await this.getString(key);
    if (raw === undefined) {
      return defaultValue;
    }
    const token = raw.trim().toLowerCase();
    if (TRUE_TOKENS.has(token)) {
      return true;
    }
    if (FALSE_TOKENS.has(token)) {
      return false;
    }
    this.logger.warn(
      { event: "config.parse.boolean_failed", key, value: this.classifier.maskForKey(key, raw), defaultValue },
      "Configuration value is not a recognised boolean; using default",
    );
    this.recordParseFailure(key, raw, startedAt);
    return defaultValue;
  }

  /**
   * Active entries whose key starts with `prefix`, keyed by the remainder of
   * the key. Environment-specific entries win over globals with the same
   * key. Any failure yields an empty record.
   */
  async getSection(prefix: string): Promise<Record<string, string>> {
    const startedAt = this.now();
    if (!prefix || prefix.trim().length === 0) {
      this.logger.warn({ event: "config.section.empty_prefix" }, "getSection called with an empty prefix");
      return {};
    }

    const environmentCode = await this.currentEnvironment();
    try {
      const environmentId = await this.environments.currentEnvironmentId();
      const [globals, scoped] = await Promise.all([
        this.store.findActiveEntries(null, prefix),
        this.store.findActiveEntries(environmentId, prefix),
      ]);
      const globalEntries = this.unwrapSection(globals, prefix, "global");
      const scopedEntries = this.unwrapSection(scoped, prefix, "environment");

      const merged = new Map<string, ConfigurationEntry>();
      for (const entry of [...globalEntries, ...scopedEntries]) {
        if (entry.value.length > 0) {
          merged.set(entry.key, entry);
        }
      }

      const section: Record<string, string> = {};
      for (const [fullKey, entry] of merged) {
        this.classifier.registerExplicit(fullKey, entry.classification);
        section[fullKey.slice(prefix.length)] = entry.value;
        this.recordRead(fullKey, environmentCode, entry.value, "section", startedAt);
      }
      this.logger.debug(
        { event: "config.section.loaded", prefix, environment: environmentCode, count: merged.size },
        "Configuration section loaded",
      );
      return section;
    } catch (error) {
      this.logger.error(
        { err: normalizeError(error), event: "config.section.failed", prefix, environment: environmentCode },
        "Failed to load configuration section",
      );
      this.record({
        eventType: "READ",
        key: prefix,
        environmentCode,
        classification: "PUBLIC",
        source: "section-error",
        outcome: "failure",
        startedAtEpochMs: startedAt,
      });
      return {};
    }
  }

  // ==========================================================================
  // Environment
  // ==========================================================================

  /**
   * Current environment code. Records an ENV_RESOLVE audit event whenever
   * the detected code differs from the previous call.
   */
  async currentEnvironment(): Promise<string> {
    const startedAt = this.now();
    const resolved = await this.environments.resolve();
    if (resolved.code !== this.lastEnvironmentCode) {
      const previous = this.lastEnvironmentCode;
      this.lastEnvironmentCode = resolved.code;
      this.logger.info(
        { event: "environment.resolved", environment: resolved.code, previous, source: resolved.source },
        "Configuration environment resolved",
      );
      this.record({
        eventType: "ENV_RESOLVE",
        environmentCode: resolved.code,
        maskedValue: resolved.code,
        source: resolved.source,
        startedAtEpochMs: startedAt,
      });
    }
    return resolved.code;
  }

  environmentExists(code: string): Promise<boolean> {
    return this.environments.environmentExists(code);
  }

  // ==========================================================================
  // Cache management
  // ==========================================================================

  clearCache(): void {
    this.clear("CACHE_CLEAR");
  }

  refreshConfiguration(): void {
    this.clear("CACHE_REFRESH");
  }

  private clear(eventType: "CACHE_CLEAR" | "CACHE_REFRESH"): void {
    const startedAt = this.now();
    const configEntries = this.cache.clear();
    const environmentEntries = this.environments.clear();
    setCacheEntries(0);
    this.logger.info(
      {
        event: eventType === "CACHE_CLEAR" ? "config.cache.cleared" : "config.cache.refreshed",
        configEntries,
        environmentIds: environmentEntries.ids,
      },
      "Configuration cache cleared",
    );
    this.record({
      eventType,
      environmentCode: this.lastEnvironmentCode,
      maskedValue: String(configEntries),
      source: "operator",
      startedAtEpochMs: startedAt,
    });
  }

  evictExpiredCacheEntries(): number {
    const removed = this.cache.evictExpired() + this.environments.evictExpired();
    setCacheEntries(this.cache.size);
    this.logger.debug({ event: "config.cache.evicted", removed }, "Expired configuration cache entries removed");
    return removed;
  }

  cacheStatistics(): CacheStatistics {
    const cacheStats = this.cache.stats();
    const environmentStats: EnvironmentCacheStats = this.environments.stats();
    const statistics: CacheStatistics = {
      configCacheSize: cacheStats.size,
      environmentCacheSize: environmentStats.ids.size,
      cacheTtlMs: cacheStats.ttlMs,
      configCacheKeys: cacheStats.keys,
      environmentCacheEntries: environmentStats.entries,
      audit: this.audit.stats(),
    };
    if (cacheStats.oldestAgeMs !== undefined) {
      statistics.oldestEntryAgeMs = cacheStats.oldestAgeMs;
    }
    return statistics;
  }

  // ==========================================================================
  // Writes performed elsewhere
  // ==========================================================================

  /**
   * Audits a create, update or deactivation made by the administrative
   * component. The value is masked here; callers pass it raw.
   */
  recordConfigurationChange(change: ConfigurationChange): void {
    this.classifier.registerExplicit(change.key, change.classification);
    const classification = this.classifier.classify(change.key);
    this.record({
      eventType: change.eventType,
      key: change.key,
      environmentCode: change.environmentCode,
      classification,
      maskedValue: this.classifier.mask(change.value, classification),
      actor: change.actor,
      source: "operator",
    });
  }

  // ==========================================================================
  // Tiers
  // ==========================================================================

  private async lookupEnvironmentEntry(key: string, environmentCode: string): Promise<Resolved | undefined> {
    let environmentId: number;
    try {
      environmentId = await this.environments.requireEnvironmentId(environmentCode);
    } catch (error) {
      if (isEnvironmentStoreUnavailableError(error)) {
        this.logger.warn(
          {
            err: normalizeError(error),
            event: "config.tier.store_unavailable",
            key,
            tier: "environment",
            environment: environmentCode,
          },
          "Configuration store unavailable; continuing with next tier",
        );
      } else {
        this.logger.warn(
          { err: normalizeError(error), event: "config.tier.environment_unresolved", key, environment: environmentCode },
          "Skipping environment-specific lookup; environment id unresolved",
        );
      }
      return undefined;
    }
    return this.unwrapEntry(await this.store.findActiveEntry(key, environmentId), key, environmentCode, "environment");
  }

  private async lookupGlobalEntry(key: string, environmentCode: string): Promise<Resolved | undefined> {
    return this.unwrapEntry(await this.store.findActiveEntry(key, null), key, environmentCode, "global");
  }

  private unwrapEntry(
    result: StoreResult<ConfigurationEntry>,
    key: string,
    environmentCode: string,
    tier: Tier,
  ): Resolved | undefined {
    switch (result.status) {
      case "found": {
        const entry = result.value;
        if (!entry.isActive || entry.value.length === 0) {
          return undefined;
        }
        this.classifier.registerExplicit(key, entry.classification);
        this.logger.debug(
          {
            event: "config.tier.found",
            key,
            tier,
            environment: environmentCode,
            value: this.classifier.maskForKey(key, entry.value),
          },
          "Configuration value found in store",
        );
        return { value: entry.value, source: "database" };
      }
      case "not_found":
        return undefined;
      case "unavailable":
        this.logger.warn(
          {
            err: normalizeError(result.error),
            event: "config.tier.store_unavailable",
            key,
            tier,
            environment: environmentCode,
          },
          "Configuration store unavailable; continuing with next tier",
        );
        return undefined;
    }
  }

  private lookupProcessEnvironment(key: string, environmentCode: string): Resolved | undefined {
    if (!this.localEnvironments.has(environmentCode)) {
      return undefined;
    }
    const variable = toEnvironmentVariableName(key);
    const value = this.env[variable];
    if (value === undefined || value.length === 0) {
      return undefined;
    }
    this.logger.debug(
      {
        event: "config.tier.process_env",
        key,
        variable,
        environment: environmentCode,
        value: this.classifier.maskForKey(key, value),
      },
      "Configuration value taken from process environment",
    );
    return { value, source: "environment" };
  }

  private unwrapSection(
    result: StoreResult<ConfigurationEntry[]>,
    prefix: string,
    tier: Tier,
  ): ConfigurationEntry[] {
    switch (result.status) {
      case "found":
        return result.value;
      case "not_found":
        return [];
      case "unavailable":
        throw new Error(`Configuration store unavailable while loading ${tier} entries for section "${prefix}"`, {
          cause: result.error,
        });
    }
  }

  // ==========================================================================
  // Audit
  // ==========================================================================

  private recordRead(
    key: string,
    environmentCode: string,
    value: string | undefined,
    source: AuditSource,
    startedAt: number,
  ): void {
    const classification = this.classifier.classify(key);
    this.record({
      eventType: "READ",
      key,
      environmentCode,
      classification,
      maskedValue: this.classifier.mask(value, classification),
      source,
      outcome: value === undefined ? "failure" : "success",
      startedAtEpochMs: startedAt,
    });
  }

  private recordParseFailure(key: string, raw: string, startedAt: number): void {
    const classification = this.classifier.classify(key);
    this.record({
      eventType: "READ",
      key,
      environmentCode: this.lastEnvironmentCode,
      classification,
      maskedValue: this.classifier.mask(raw, classification),
      source: "parse-error",
      outcome: "failure",
      startedAtEpochMs: startedAt,
    });
  }

  private record(input: AuditEventInput): void {
    this.audit.record(createAuditEvent(input, this.now()));
  }
}
