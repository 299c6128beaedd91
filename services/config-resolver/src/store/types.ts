import type { Classification } from "../security/classification.js";

export type ConfigurationDataType = "STRING" | "INTEGER" | "BOOLEAN";

export type ConfigurationEntry = {
  key: string;
  /** `null` marks a global entry that applies to every environment. */
  environmentId: number | null;
  value: string;
  dataType: ConfigurationDataType;
  classification?: Classification;
  isActive: boolean;
  isSystemManaged: boolean;
  description: string;
  category?: string;
};

export type EnvironmentRecord = {
  id: number;
  code: string;
  baseUrl: string | null;
};

/**
 * Outcome of a store lookup. `unavailable` means the store could not be
 * asked (connection failure, timeout), which callers must not confuse with
 * the row being absent.
 */
export type StoreResult<T> =
  | { status: "found"; value: T }
  | { status: "not_found" }
  | { status: "unavailable"; error: Error };

export type StoreOperation =
  | "find_entry"
  | "find_entries"
  | "list_environments"
  | "find_environment_id";

export interface ConfigurationStore {
  /** Active entry for `key` in one environment, or the global entry when `environmentId` is null. */
  findActiveEntry(key: string, environmentId: number | null): Promise<StoreResult<ConfigurationEntry>>;
  /**
   * Active entries scoped to one environment (or the globals when null),
   * optionally restricted to keys starting with `prefix`.
   */
  findActiveEntries(
    environmentId: number | null,
    prefix?: string,
  ): Promise<StoreResult<ConfigurationEntry[]>>;
  listEnvironments(): Promise<StoreResult<EnvironmentRecord[]>>;
  findEnvironmentId(code: string): Promise<StoreResult<number>>;
  close?(): Promise<void>;
}

export function found<T>(value: T): StoreResult<T> {
  return { status: "found", value };
}

export const NOT_FOUND: StoreResult<never> = { status: "not_found" };

export function unavailable(error: unknown): StoreResult<never> {
  return {
    status: "unavailable",
    error: error instanceof Error ? error : new Error(String(error)),
  };
}
