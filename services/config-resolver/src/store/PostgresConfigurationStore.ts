import { z } from "zod";

import type { Queryable } from "../database/Postgres.js";
import { type AppLogger, appLogger, normalizeError } from "../observability/logger.js";
import { recordStoreFailure } from "../observability/metrics.js";
import { parseClassification } from "../security/classification.js";
import { withTimeout } from "../utils/withTimeout.js";
import {
  type ConfigurationEntry,
  type ConfigurationStore,
  type EnvironmentRecord,
  type StoreOperation,
  type StoreResult,
  NOT_FOUND,
  found,
  unavailable,
} from "./types.js";

const ENTRY_COLUMNS = `
  cfg_key,
  env_id,
  cfg_value,
  cfg_data_type,
  cfg_classification,
  cfg_is_active,
  cfg_is_system_managed,
  cfg_description,
  cfg_category`;

const FIND_ENTRY_SQL = `SELECT ${ENTRY_COLUMNS}
  FROM configuration_entries
  WHERE cfg_key = $1
    AND env_id IS NOT DISTINCT FROM $2
    AND cfg_is_active = true
  LIMIT 1`;

const FIND_ENTRIES_SQL = `SELECT ${ENTRY_COLUMNS}
  FROM configuration_entries
  WHERE env_id IS NOT DISTINCT FROM $1
    AND cfg_is_active = true
    AND ($2::text IS NULL OR left(cfg_key, length($2::text)) = $2::text)
  ORDER BY cfg_key`;

const LIST_ENVIRONMENTS_SQL = `SELECT env_id, env_code, env_base_url
  FROM environments
  ORDER BY env_id`;

const FIND_ENVIRONMENT_ID_SQL = `SELECT env_id
  FROM environments
  WHERE UPPER(env_code) = UPPER($1)
  LIMIT 1`;

const EntryRowSchema = z.object({
  cfg_key: z.string(),
  env_id: z.coerce.number().int().nullable(),
  cfg_value: z.string().nullable(),
  cfg_data_type: z
    .string()
    .nullable()
    .transform((value) => (value ?? "STRING").toUpperCase())
    .pipe(z.enum(["STRING", "INTEGER", "BOOLEAN"]).catch("STRING")),
  cfg_classification: z.string().nullable().optional(),
  cfg_is_active: z.boolean(),
  cfg_is_system_managed: z.boolean().nullable().optional(),
  cfg_description: z.string().nullable().optional(),
  cfg_category: z.string().nullable().optional(),
});

const EnvironmentRowSchema = z.object({
  env_id: z.coerce.number().int(),
  env_code: z.string(),
  env_base_url: z.string().nullable().optional(),
});

const EnvironmentIdRowSchema = z.object({
  env_id: z.coerce.number().int(),
});

function toEntry(row: z.infer<typeof EntryRowSchema>): ConfigurationEntry {
  const entry: ConfigurationEntry = {
    key: row.cfg_key,
    environmentId: row.env_id,
    value: row.cfg_value ?? "",
    dataType: row.cfg_data_type,
    isActive: row.cfg_is_active,
    isSystemManaged: row.cfg_is_system_managed ?? false,
    description: row.cfg_description ?? "",
  };
  const classification = parseClassification(row.cfg_classification);
  if (classification) {
    entry.classification = classification;
  }
  if (row.cfg_category) {
    entry.category = row.cfg_category;
  }
  return entry;
}

export type PostgresConfigurationStoreOptions = {
  /** Upper bound for every query; exceeding it reports the store unavailable. */
  timeoutMs?: number;
  logger?: AppLogger;
};

/**
 * Reads configuration entries and environments from Postgres. Every call
 * resolves to a StoreResult; driver errors, timeouts and malformed rows are
 * reported as `unavailable` rather than thrown.
 */
export class PostgresConfigurationStore implements ConfigurationStore {
  private readonly timeoutMs: number;
  private readonly logger: AppLogger;

  constructor(
    private readonly db: Queryable,
    options: PostgresConfigurationStoreOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? 2_000;
    this.logger = options.logger ?? appLogger.child({ subsystem: "configuration-store" });
  }

  private async run<T>(
    operation: StoreOperation,
    sql: string,
    values: unknown[],
    map: (rows: unknown[]) => StoreResult<T>,
  ): Promise<StoreResult<T>> {
    try {
      const result = await withTimeout(this.db.query(sql, values), this.timeoutMs, `configuration store ${operation}`);
      return map(result.rows);
    } catch (error) {
      recordStoreFailure(operation);
      this.logger.warn(
        { err: normalizeError(error), operation, event: "config.store.query_failed" },
        "Configuration store query failed",
      );
      return unavailable(error);
    }
  }

  findActiveEntry(key: string, environmentId: number | null): Promise<StoreResult<ConfigurationEntry>> {
    return this.run("find_entry", FIND_ENTRY_SQL, [key, environmentId], (rows) => {
      const [row] = rows;
      if (row === undefined) {
        return NOT_FOUND;
      }
      return found(toEntry(EntryRowSchema.parse(row)));
    });
  }

  findActiveEntries(
    environmentId: number | null,
    prefix?: string,
  ): Promise<StoreResult<ConfigurationEntry[]>> {
    return this.run("find_entries", FIND_ENTRIES_SQL, [environmentId, prefix ?? null], (rows) =>
      found(rows.map((row) => toEntry(EntryRowSchema.parse(row)))),
    );
  }

  listEnvironments(): Promise<StoreResult<EnvironmentRecord[]>> {
    return this.run("list_environments", LIST_ENVIRONMENTS_SQL, [], (rows) =>
      found(
        rows.map((raw) => {
          const row = EnvironmentRowSchema.parse(raw);
          return {
            id: row.env_id,
            code: row.env_code.trim().toUpperCase(),
            baseUrl: row.env_base_url ?? null,
          };
        }),
      ),
    );
  }

  findEnvironmentId(code: string): Promise<StoreResult<number>> {
    return this.run("find_environment_id", FIND_ENVIRONMENT_ID_SQL, [code.trim()], (rows) => {
      const [row] = rows;
      if (row === undefined) {
        return NOT_FOUND;
      }
      return found(EnvironmentIdRowSchema.parse(row).env_id);
    });
  }
}
