/**
 * Service settings schemas (zod).
 *
 * These describe how the resolver itself is wired: cache lifetime, how the
 * environment is detected, which store and audit sink to use. They are not
 * the configuration entries the resolver serves.
 */

import { z } from "zod";

const EnvironmentCodeSchema = z
  .string()
  .trim()
  .min(1)
  .transform((value) => value.toUpperCase());

// ============================================================================
// Cache
// ============================================================================

export const CacheConfigSchema = z.object({
  ttlMs: z.number().int().min(1000).max(3_600_000).default(300_000),
});
export type CacheConfig = z.infer<typeof CacheConfigSchema>;

// ============================================================================
// Environment detection
// ============================================================================

export const HostPatternRuleSchema = z.object({
  environment: EnvironmentCodeSchema,
  markers: z.array(z.string().trim().min(1).transform((value) => value.toLowerCase())).min(1),
});
export type HostPatternRule = z.infer<typeof HostPatternRuleSchema>;

// UAT is listed before PROD: UAT hostnames commonly contain the PROD marker too.
export const DEFAULT_HOST_PATTERNS: HostPatternRule[] = [
  { environment: "DEV", markers: ["localhost", "127.0.0.1", "0.0.0.0"] },
  { environment: "UAT", markers: ["uat", "-evx", "staging"] },
  { environment: "PROD", markers: ["prod"] },
];

export const EnvironmentDetectionConfigSchema = z.object({
  overrideName: z.string().trim().min(1).default("app.environment"),
  baseUrlName: z.string().trim().min(1).default("app.base.url"),
  known: z.array(EnvironmentCodeSchema).min(1).default(["LOCAL", "DEV", "TEST", "UAT", "PROD"]),
  local: z.array(EnvironmentCodeSchema).default(["LOCAL", "DEV"]),
  fallback: EnvironmentCodeSchema.default("PROD"),
  hostPatterns: z.array(HostPatternRuleSchema).default(DEFAULT_HOST_PATTERNS),
});
export type EnvironmentDetectionConfig = z.infer<typeof EnvironmentDetectionConfigSchema>;

// ============================================================================
// Store
// ============================================================================

export const StoreBackendSchema = z.enum(["postgres", "memory"]);
export type StoreBackend = z.infer<typeof StoreBackendSchema>;

export const PostgresConfigSchema = z.object({
  url: z.string().min(1).optional(),
  maxConnections: z.number().int().min(1).max(100).default(10),
  idleTimeoutMs: z.number().int().min(0).default(30_000),
  connectionTimeoutMs: z.number().int().min(0).default(5_000),
  statementTimeoutMs: z.number().int().min(0).default(2_000),
});
export type PostgresConfig = z.infer<typeof PostgresConfigSchema>;

export const StoreConfigSchema = z
  .object({
    backend: StoreBackendSchema.default("memory"),
    timeoutMs: z.number().int().min(50).max(60_000).default(2_000),
    postgres: PostgresConfigSchema.default({}),
  })
  .refine((data) => data.backend !== "postgres" || Boolean(data.postgres.url), {
    message: "postgres.url is required when store backend is 'postgres'",
    path: ["postgres", "url"],
  });
export type StoreConfig = z.infer<typeof StoreConfigSchema>;

// ============================================================================
// Audit
// ============================================================================

export const AuditSinkKindSchema = z.enum(["log", "postgres"]);
export type AuditSinkKind = z.infer<typeof AuditSinkKindSchema>;

export const AuditConfigSchema = z.object({
  sink: AuditSinkKindSchema.default("log"),
  workers: z.number().int().min(1).max(16).default(2),
  queueCapacity: z.number().int().min(1).max(100_000).default(1_000),
});
export type AuditConfig = z.infer<typeof AuditConfigSchema>;

// ============================================================================
// Root
// ============================================================================

export const ServiceConfigSchema = z
  .object({
    cache: CacheConfigSchema.default({}),
    environment: EnvironmentDetectionConfigSchema.default({}),
    store: StoreConfigSchema.default({}),
    audit: AuditConfigSchema.default({}),
  })
  .refine((data) => data.audit.sink !== "postgres" || data.store.backend === "postgres", {
    message: "audit sink 'postgres' requires the postgres store backend",
    path: ["audit", "sink"],
  })
  .refine((data) => data.environment.known.includes(data.environment.fallback), {
    message: "fallback environment must be one of the known environments",
    path: ["environment", "fallback"],
  });
export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;

export function validateConfig(input: unknown): ServiceConfig {
  return ServiceConfigSchema.parse(input);
}

export function getDefaultConfig(): ServiceConfig {
  return ServiceConfigSchema.parse({});
}
