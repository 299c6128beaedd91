import { Counter, Gauge, register } from "prom-client";

export const RESOLUTIONS_NAME = "config_resolutions_total";
export const CACHE_LOOKUPS_NAME = "config_cache_lookups_total";
export const CACHE_ENTRIES_NAME = "config_cache_entries";
export const STORE_FAILURES_NAME = "config_store_failures_total";
export const AUDIT_EVENTS_NAME = "config_audit_events_total";

export type ResolutionSource = "cache" | "database" | "environment" | "default";
export type AuditDeliveryOutcome = "written" | "failed" | "dropped";

function getOrCreateCounter(name: string, help: string, labelNames: string[]): Counter<string> {
  const existing = register.getSingleMetric(name);
  if (existing instanceof Counter) {
    return existing;
  }
  return new Counter({ name, help, labelNames });
}

function getOrCreateGauge(name: string, help: string): Gauge<string> {
  const existing = register.getSingleMetric(name);
  if (existing instanceof Gauge) {
    return existing;
  }
  return new Gauge({ name, help });
}

const resolutionCounter = getOrCreateCounter(
  RESOLUTIONS_NAME,
  "Configuration values resolved, by the tier that produced them",
  ["source"],
);
const cacheLookupCounter = getOrCreateCounter(
  CACHE_LOOKUPS_NAME,
  "Configuration cache lookups by result",
  ["result"],
);
const cacheEntriesGauge = getOrCreateGauge(CACHE_ENTRIES_NAME, "Entries currently held in the configuration cache");
const storeFailureCounter = getOrCreateCounter(
  STORE_FAILURES_NAME,
  "Configuration store calls that failed or timed out",
  ["operation"],
);
const auditEventCounter = getOrCreateCounter(
  AUDIT_EVENTS_NAME,
  "Configuration audit events by delivery outcome",
  ["outcome"],
);

export function recordResolution(source: ResolutionSource): void {
  resolutionCounter.labels(source).inc();
}

export function recordCacheLookup(hit: boolean): void {
  cacheLookupCounter.labels(hit ? "hit" : "miss").inc();
}

export function setCacheEntries(count: number): void {
  cacheEntriesGauge.set(count);
}

export function recordStoreFailure(operation: string): void {
  storeFailureCounter.labels(operation).inc();
}

export function recordAuditDelivery(outcome: AuditDeliveryOutcome): void {
  auditEventCounter.labels(outcome).inc();
}

export function resetMetrics(): void {
  resolutionCounter.reset();
  cacheLookupCounter.reset();
  cacheEntriesGauge.reset();
  storeFailureCounter.reset();
  auditEventCounter.reset();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

export function getMetricsSnapshot(): Promise<string> {
  return register.metrics();
}
