import {
  type ConfigurationEntry,
  type ConfigurationStore,
  type EnvironmentRecord,
  type StoreResult,
  NOT_FOUND,
  found,
  unavailable,
} from "./types.js";

export type MemoryConfigurationStoreOptions = {
  entries?: Array<Partial<ConfigurationEntry> & Pick<ConfigurationEntry, "key" | "value">>;
  environments?: EnvironmentRecord[];
};

function toEntry(
  input: Partial<ConfigurationEntry> & Pick<ConfigurationEntry, "key" | "value">,
): ConfigurationEntry {
  const entry: ConfigurationEntry = {
    key: input.key,
    value: input.value,
    environmentId: input.environmentId ?? null,
    dataType: input.dataType ?? "STRING",
    isActive: input.isActive ?? true,
    isSystemManaged: input.isSystemManaged ?? false,
    description: input.description ?? "",
  };
  if (input.classification) {
    entry.classification = input.classification;
  }
  if (input.category) {
    entry.category = input.category;
  }
  return entry;
}

/**
 * Store kept in process memory, for local development and tests. Entries
 * are never removed; replacing an entry deactivates the previous one for the
 * same `(key, environmentId)`, mirroring the relational store.
 */
export class MemoryConfigurationStore implements ConfigurationStore {
  private readonly entries: ConfigurationEntry[] = [];
  private readonly environments = new Map<number, EnvironmentRecord>();
  private failure: Error | null = null;

  constructor(options: MemoryConfigurationStoreOptions = {}) {
    for (const environment of options.environments ?? []) {
      this.putEnvironment(environment);
    }
    for (const entry of options.entries ?? []) {
      this.putEntry(entry);
    }
  }

  /**
   * Makes every subsequent call report the store as unavailable until
   * cleared with `null`.
   */
  setUnavailable(error: Error | null): void {
    this.failure = error;
  }

  putEnvironment(environment: EnvironmentRecord): void {
    this.environments.set(environment.id, { ...environment, code: environment.code.toUpperCase() });
  }

  putEntry(input: Partial<ConfigurationEntry> & Pick<ConfigurationEntry, "key" | "value">): ConfigurationEntry {
    const entry = toEntry(input);
    if (entry.isActive) {
      this.deactivate(entry.key, entry.environmentId);
    }
    this.entries.push(entry);
    return entry;
  }

  deactivate(key: string, environmentId: number | null): number {
    let changed = 0;
    for (const entry of this.entries) {
      if (entry.key === key && entry.environmentId === environmentId && entry.isActive) {
        entry.isActive = false;
        changed += 1;
      }
    }
    return changed;
  }

  async findActiveEntry(key: string, environmentId: number | null): Promise<StoreResult<ConfigurationEntry>> {
    if (this.failure) {
      return unavailable(this.failure);
    }
    const match = this.entries.find(
      (entry) => entry.isActive && entry.key === key && entry.environmentId === environmentId,
    );
    return match ? found({ ...match }) : NOT_FOUND;
  }

  async findActiveEntries(
    environmentId: number | null,
    prefix?: string,
  ): Promise<StoreResult<ConfigurationEntry[]>> {
    if (this.failure) {
      return unavailable(this.failure);
    }
    const matches = this.entries
      .filter(
        (entry) =>
          entry.isActive &&
          entry.environmentId === environmentId &&
          (prefix === undefined || entry.key.startsWith(prefix)),
      )
      .map((entry) => ({ ...entry }))
      .sort((left, right) => left.key.localeCompare(right.key));
    return found(matches);
  }

  async listEnvironments(): Promise<StoreResult<EnvironmentRecord[]>> {
    if (this.failure) {
      return unavailable(this.failure);
    }
    const rows = Array.from(this.environments.values())
      .map((environment) => ({ ...environment }))
      .sort((left, right) => left.id - right.id);
    return found(rows);
  }

  async findEnvironmentId(code: string): Promise<StoreResult<number>> {
    if (this.failure) {
      return unavailable(this.failure);
    }
    const normalized = code.trim().toUpperCase();
    for (const environment of this.environments.values()) {
      if (environment.code === normalized) {
        return found(environment.id);
      }
    }
    return NOT_FOUND;
  }
}
