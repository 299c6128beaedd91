import type { Pool } from "pg";

import { AuditRecorder } from "./audit/AuditRecorder.js";
import { LoggerAuditSink, PostgresAuditSink } from "./audit/sinks.js";
import type { AuditSink } from "./audit/types.js";
import { TtlCache } from "./cache/TtlCache.js";
import { loadConfig } from "./config/loadConfig.js";
import type { ServiceConfig } from "./config/schema.js";
import { asQueryable, closePostgresPool, createPostgresPool } from "./database/Postgres.js";
import { EnvironmentResolver } from "./environment/EnvironmentResolver.js";
import { appLogger } from "./observability/logger.js";
import { ConfigurationService } from "./resolution/ConfigurationService.js";
import { SecurityClassifier } from "./security/classification.js";
import { MemoryConfigurationStore } from "./store/MemoryConfigurationStore.js";
import { PostgresConfigurationStore } from "./store/PostgresConfigurationStore.js";
import type { ConfigurationStore } from "./store/types.js";
import { type OverrideSource, createOverrides } from "./utils/env.js";

const logger = appLogger.child({ subsystem: "configuration-bootstrap" });

export type ConfigurationRuntime = {
  service: ConfigurationService;
  store: ConfigurationStore;
  environments: EnvironmentResolver;
  audit: AuditRecorder;
  settings: ServiceConfig;
  /** Drains pending audit events and releases the database pool, if any. */
  close(): Promise<void>;
};

export type CreateConfigurationServiceOptions = {
  settings?: ServiceConfig;
  /** Replaces the store the settings select; the memory backend otherwise starts empty. */
  store?: ConfigurationStore;
  auditSink?: AuditSink;
  overrides?: OverrideSource;
  /** Environment map for settings, the process-environment tier and detection overrides. */
  env?: NodeJS.ProcessEnv;
  now?: () => number;
};

/**
 * Wires store, environment resolver, cache, classifier and audit recorder
 * from the service settings.
 *
 * @example
 * const runtime = createConfigurationService();
 * const timeout = await runtime.service.getInteger("import.timeout.ms", 30_000);
 * await runtime.close();
 */
export function createConfigurationService(options: CreateConfigurationServiceOptions = {}): ConfigurationRuntime {
  const settings = options.settings ?? loadConfig(options.env);

  let pool: Pool | undefined;
  let store: ConfigurationStore;
  if (options.store) {
    store = options.store;
  } else if (settings.store.backend === "postgres") {
    pool = createPostgresPool(settings.store.postgres);
    store = new PostgresConfigurationStore(asQueryable(pool), { timeoutMs: settings.store.timeoutMs });
  } else {
    logger.warn(
      { event: "config.store.memory", backend: "memory" },
      "Using in-memory configuration store; values will not persist",
    );
    store = new MemoryConfigurationStore();
  }

  let sink: AuditSink;
  if (options.auditSink) {
    sink = options.auditSink;
  } else if (settings.audit.sink === "postgres" && pool) {
    sink = new PostgresAuditSink(asQueryable(pool));
  } else {
    sink = new LoggerAuditSink();
  }

  const audit = new AuditRecorder({
    sink,
    workers: settings.audit.workers,
    queueCapacity: settings.audit.queueCapacity,
  });

  const environments = new EnvironmentResolver({
    store,
    overrideName: settings.environment.overrideName,
    baseUrlName: settings.environment.baseUrlName,
    knownEnvironments: settings.environment.known,
    fallbackEnvironment: settings.environment.fallback,
    hostPatterns: settings.environment.hostPatterns,
    overrides: options.overrides ?? (options.env ? createOverrides(options.env) : undefined),
    ttlMs: settings.cache.ttlMs,
    now: options.now,
  });

  const service = new ConfigurationService({
    store,
    environments,
    cache: new TtlCache<string>({ ttlMs: settings.cache.ttlMs, now: options.now }),
    classifier: new SecurityClassifier(),
    audit,
    localEnvironments: settings.environment.local,
    env: options.env,
    now: options.now,
  });

  logger.info(
    {
      event: "config.service.created",
      storeBackend: options.store ? "custom" : settings.store.backend,
      auditSink: options.auditSink ? "custom" : sink instanceof PostgresAuditSink ? "postgres" : "log",
      cacheTtlMs: settings.cache.ttlMs,
    },
    "Configuration service created",
  );

  return {
    service,
    store,
    environments,
    audit,
    settings,
    async close() {
      await audit.close();
      if (store.close) {
        await store.close();
      }
      if (pool) {
        await closePostgresPool(pool);
      }
    },
  };
}
