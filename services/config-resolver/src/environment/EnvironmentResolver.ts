import os from "node:os";

import { TtlCache, type TtlCacheStats } from "../cache/TtlCache.js";
import { DEFAULT_HOST_PATTERNS, type HostPatternRule } from "../config/schema.js";
import { EnvironmentNotResolvedError, EnvironmentStoreUnavailableError } from "../errors.js";
import { type AppLogger, appLogger, normalizeError } from "../observability/logger.js";
import { type ConfigurationStore, type EnvironmentRecord, NOT_FOUND, type StoreResult, found } from "../store/types.js";
import { extractHostname, normalizeUrl } from "../url/normalizeUrl.js";
import { type OverrideSource, processOverrides, toEnvironmentVariableName } from "../utils/env.js";

export type EnvironmentSource = "flag" | "env" | "store" | "pattern" | "fallback";

export type ResolvedEnvironment = {
  code: string;
  source: EnvironmentSource;
};

export type EnvironmentResolverOptions = {
  store: ConfigurationStore;
  /** Launch flag / env var name carrying an explicit environment code. */
  overrideName?: string;
  /** Launch flag / env var name carrying this process's base URL. */
  baseUrlName?: string;
  knownEnvironments?: readonly string[];
  fallbackEnvironment?: string;
  hostPatterns?: readonly HostPatternRule[];
  overrides?: OverrideSource;
  hostname?: () => string;
  ttlMs?: number;
  now?: () => number;
  logger?: AppLogger;
};

export type EnvironmentCacheStats = {
  ids: TtlCacheStats;
  entries: Array<{ code: string; id: number }>;
  environmentsCached: boolean;
};

const ENVIRONMENTS_KEY = "environments";

/**
 * Works out which environment this process belongs to.
 *
 * Order: launch flag, environment variable, base URL matched against the
 * environments table, hostname patterns, then the fallback code. Detection
 * never throws; a store outage only skips the URL match.
 */
export class EnvironmentResolver {
  private readonly store: ConfigurationStore;
  private readonly overrideName: string;
  private readonly baseUrlName: string;
  private readonly known: ReadonlySet<string>;
  private readonly fallback: string;
  private readonly hostPatterns: readonly HostPatternRule[];
  private readonly overrides: OverrideSource;
  private readonly hostname: () => string;
  private readonly logger: AppLogger;
  private readonly idCache: TtlCache<number>;
  private readonly environmentCache: TtlCache<EnvironmentRecord[]>;

  constructor(options: EnvironmentResolverOptions) {
    this.store = options.store;
    this.overrideName = options.overrideName ?? "app.environment";
    this.baseUrlName = options.baseUrlName ?? "app.base.url";
    this.known = new Set(
      (options.knownEnvironments ?? ["LOCAL", "DEV", "TEST", "UAT", "PROD"]).map((code) => code.toUpperCase()),
    );
    this.fallback = (options.fallbackEnvironment ?? "PROD").toUpperCase();
    this.hostPatterns = options.hostPatterns ?? DEFAULT_HOST_PATTERNS;
    this.overrides = options.overrides ?? processOverrides;
    this.hostname = options.hostname ?? os.hostname;
    this.logger = options.logger ?? appLogger.child({ subsystem: "environment-resolver" });
    this.idCache = new TtlCache<number>({ ttlMs: options.ttlMs, now: options.now });
    this.environmentCache = new TtlCache<EnvironmentRecord[]>({ ttlMs: options.ttlMs, now: options.now });
  }

  async currentEnvironmentCode(): Promise<string> {
    return (await this.resolve()).code;
  }

  async resolve(): Promise<ResolvedEnvironment> {
    const fromFlag = this.validateOverride(this.overrides.flag(this.overrideName), "flag");
    if (fromFlag) {
      return { code: fromFlag, source: "flag" };
    }

    const envName = toEnvironmentVariableName(this.overrideName);
    const fromEnv = this.validateOverride(this.overrides.env(envName), "env");
    if (fromEnv) {
      return { code: fromEnv, source: "env" };
    }

    const baseUrl = this.baseUrl();
    if (baseUrl) {
      const fromStore = await this.matchBaseUrl(baseUrl);
      if (fromStore) {
        return { code: fromStore, source: "store" };
      }
    }

    const host = extractHostname(baseUrl) ?? this.safeHostname();
    const fromPattern = this.matchHostPattern(host);
    if (fromPattern) {
      this.logger.debug(
        { event: "environment.pattern.matched", host, environment: fromPattern },
        "Environment detected from hostname pattern",
      );
      return { code: fromPattern, source: "pattern" };
    }

    this.logger.warn(
      { event: "environment.fallback.default", host, environment: this.fallback },
      "Could not detect environment from any source; using fail-safe default",
    );
    return { code: this.fallback, source: "fallback" };
  }

  private validateOverride(raw: string | undefined, source: "flag" | "env"): string | undefined {
    const trimmed = raw?.trim();
    if (!trimmed) {
      return undefined;
    }
    const code = trimmed.toUpperCase();
    if (this.known.has(code)) {
      return code;
    }
    this.logger.error(
      {
        event: "environment.override.invalid",
        source,
        name: source === "flag" ? `--${this.overrideName}` : toEnvironmentVariableName(this.overrideName),
        value: trimmed,
        known: Array.from(this.known),
      },
      "Ignoring environment override that names an unknown environment",
    );
    return undefined;
  }

  private baseUrl(): string | undefined {
    const fromFlag = this.overrides.flag(this.baseUrlName)?.trim();
    if (fromFlag) {
      return fromFlag;
    }
    const fromEnv = this.overrides.env(toEnvironmentVariableName(this.baseUrlName))?.trim();
    return fromEnv && fromEnv.length > 0 ? fromEnv : undefined;
  }

  private safeHostname(): string {
    try {
      return this.hostname().toLowerCase();
    } catch (error) {
      this.logger.warn(
        { err: normalizeError(error), event: "environment.hostname.failed" },
        "Unable to read hostname for environment detection",
      );
      return "";
    }
  }

  private async environments(): Promise<EnvironmentRecord[] | undefined> {
    const cached = this.environmentCache.get(ENVIRONMENTS_KEY);
    if (cached) {
      return cached;
    }
    const result = await this.store.listEnvironments();
    switch (result.status) {
      case "found":
        this.environmentCache.put(ENVIRONMENTS_KEY, result.value);
        for (const environment of result.value) {
          this.idCache.put(environment.code, environment.id);
        }
        return result.value;
      case "not_found":
        return [];
      case "unavailable":
        this.logger.warn(
          { err: normalizeError(result.error), event: "environment.store.unavailable" },
          "Environment store unreachable; hostname pattern fallback engaged",
        );
        return undefined;
    }
  }

  private async matchBaseUrl(baseUrl: string): Promise<string | undefined> {
    const rows = await this.environments();
    if (!rows) {
      return undefined;
    }
    const target = normalizeUrl(baseUrl);
    const match = rows.find((row) => row.baseUrl !== null && normalizeUrl(row.baseUrl) === target);
    if (match) {
      this.logger.debug(
        { event: "environment.store.matched", environment: match.code },
        "Environment detected from base URL",
      );
      return match.code;
    }
    this.logger.debug(
      { event: "environment.store.no_match", host: extractHostname(baseUrl) },
      "Base URL matches no environment row",
    );
    return undefined;
  }

  private matchHostPattern(host: string): string | undefined {
    if (!host) {
      return undefined;
    }
    for (const rule of this.hostPatterns) {
      if (rule.markers.some((marker) => host.includes(marker))) {
        return rule.environment;
      }
    }
    return undefined;
  }

  /**
   * Integer id of an environment code, or undefined when the code has no
   * row or the store cannot be reached. Only found ids are cached.
   */
  async environmentIdForCode(code: string): Promise<number | undefined> {
    const result = await this.lookupEnvironmentId(code.trim().toUpperCase());
    return result.status === "found" ? result.value : undefined;
  }

  async requireEnvironmentId(code: string): Promise<number> {
    const normalized = code.trim().toUpperCase();
    const result = await this.lookupEnvironmentId(normalized);
    switch (result.status) {
      case "found":
        return result.value;
      case "not_found":
        throw new EnvironmentNotResolvedError(normalized);
      case "unavailable":
        throw new EnvironmentStoreUnavailableError(normalized, result.error);
    }
  }

  private async lookupEnvironmentId(normalized: string): Promise<StoreResult<number>> {
    if (!normalized) {
      this.logger.warn({ event: "environment.id.empty_code" }, "Environment id requested for an empty code");
      return NOT_FOUND;
    }
    const cached = this.idCache.get(normalized);
    if (cached !== undefined) {
      return found(cached);
    }
    const result = await this.store.findEnvironmentId(normalized);
    switch (result.status) {
      case "found":
        this.idCache.put(normalized, result.value);
        break;
      case "not_found":
        this.logger.error(
          { event: "environment.id.unknown_code", environment: normalized },
          "Environment code not found in environments table",
        );
        break;
      case "unavailable":
        this.logger.warn(
          { err: normalizeError(result.error), event: "environment.id.store_unavailable", environment: normalized },
          "Environment store unreachable while resolving environment id",
        );
        break;
    }
    return result;
  }

  async currentEnvironmentId(): Promise<number> {
    return this.requireEnvironmentId(await this.currentEnvironmentCode());
  }

  async environmentExists(code: string): Promise<boolean> {
    return (await this.environmentIdForCode(code)) !== undefined;
  }

  clear(): { ids: number; environments: number } {
    return {
      ids: this.idCache.clear(),
      environments: this.environmentCache.clear(),
    };
  }

  evictExpired(): number {
    return this.idCache.evictExpired() + this.environmentCache.evictExpired();
  }

  stats(): EnvironmentCacheStats {
    return {
      ids: this.idCache.stats(),
      entries: this.idCache.liveEntries().map(([code, id]) => ({ code, id })),
      environmentsCached: this.environmentCache.get(ENVIRONMENTS_KEY) !== undefined,
    };
  }
}
