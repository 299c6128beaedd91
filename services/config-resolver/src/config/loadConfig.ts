import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ZodError } from "zod";

import { ConfigLoadError } from "../errors.js";
import { appLogger } from "../observability/logger.js";
import { resolveEnv } from "../utils/env.js";
import { ServiceConfigSchema, type ServiceConfig } from "./schema.js";

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asNumber(value: string | undefined, name: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value.trim());
  if (!Number.isFinite(parsed)) {
    throw new ConfigLoadError(`${name} must be a number`, [`received "${value}"`]);
  }
  return parsed;
}

function asList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

function section(target: RawRecord, key: string): RawRecord {
  const existing = target[key];
  if (isRecord(existing)) {
    return existing;
  }
  const created: RawRecord = {};
  target[key] = created;
  return created;
}

function assign(target: RawRecord, key: string, value: unknown): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

function readConfigFile(filePath: string): RawRecord {
  const resolved = path.resolve(filePath);
  let content: string;
  try {
    content = fs.readFileSync(resolved, "utf-8");
  } catch (error) {
    throw new ConfigLoadError(`Unable to read configuration file ${resolved}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (error) {
    throw new ConfigLoadError(`Configuration file ${resolved} is not valid YAML`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigLoadError(`Configuration file ${resolved} must contain a mapping at the top level`);
  }
  return parsed;
}

function applyEnvironmentOverrides(raw: RawRecord, env: NodeJS.ProcessEnv): RawRecord {
  const read = (name: string) => resolveEnv(name, undefined, env);

  const cache = section(raw, "cache");
  assign(cache, "ttlMs", asNumber(read("CONFIG_CACHE_TTL_MS"), "CONFIG_CACHE_TTL_MS"));

  const environment = section(raw, "environment");
  assign(environment, "overrideName", read("CONFIG_ENVIRONMENT_OVERRIDE_NAME"));
  assign(environment, "baseUrlName", read("CONFIG_BASE_URL_NAME"));
  assign(environment, "known", asList(read("CONFIG_KNOWN_ENVIRONMENTS")));
  assign(environment, "local", asList(read("CONFIG_LOCAL_ENVIRONMENTS")));
  assign(environment, "fallback", read("CONFIG_FALLBACK_ENVIRONMENT"));

  const store = section(raw, "store");
  assign(store, "backend", read("CONFIG_STORE_BACKEND"));
  assign(store, "timeoutMs", asNumber(read("CONFIG_STORE_TIMEOUT_MS"), "CONFIG_STORE_TIMEOUT_MS"));
  const postgres = section(store, "postgres");
  assign(postgres, "url", read("POSTGRES_URL"));
  assign(
    postgres,
    "maxConnections",
    asNumber(read("POSTGRES_MAX_CONNECTIONS"), "POSTGRES_MAX_CONNECTIONS"),
  );

  const audit = section(raw, "audit");
  assign(audit, "sink", read("CONFIG_AUDIT_SINK"));
  assign(audit, "workers", asNumber(read("CONFIG_AUDIT_WORKERS"), "CONFIG_AUDIT_WORKERS"));
  assign(
    audit,
    "queueCapacity",
    asNumber(read("CONFIG_AUDIT_QUEUE_CAPACITY"), "CONFIG_AUDIT_QUEUE_CAPACITY"),
  );

  return raw;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${location}: ${issue.message}`;
  });
}

/**
 * Builds the service settings from an optional YAML file
 * (`CONFIG_RESOLVER_CONFIG`) with environment variables layered on top.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const filePath = resolveEnv("CONFIG_RESOLVER_CONFIG", undefined, env);
  const raw = filePath ? readConfigFile(filePath) : {};
  const merged = applyEnvironmentOverrides(raw, env);

  const result = ServiceConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigLoadError("Invalid configuration resolver settings", formatIssues(result.error));
  }

  appLogger.debug(
    {
      event: "config.settings.loaded",
      source: filePath ?? "environment",
      storeBackend: result.data.store.backend,
      auditSink: result.data.audit.sink,
      cacheTtlMs: result.data.cache.ttlMs,
    },
    "Configuration resolver settings loaded",
  );
  return result.data;
}
