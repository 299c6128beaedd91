import { afterEach, describe, expect, it, vi } from "vitest";

import type { Queryable } from "../database/Postgres.js";
import { createLogger } from "../observability/logger.js";
import { PostgresConfigurationStore } from "./PostgresConfigurationStore.js";

function entryRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    cfg_key: "smtp.host",
    env_id: 3,
    cfg_value: "mail.uat",
    cfg_data_type: "string",
    cfg_classification: "internal",
    cfg_is_active: true,
    cfg_is_system_managed: false,
    cfg_description: "Outbound mail relay",
    cfg_category: "MAIL",
    ...overrides,
  };
}

function fakeDb(rows: unknown[]) {
  const query = vi.fn<Queryable["query"]>().mockResolvedValue({ rows });
  return { db: { query }, query };
}

describe("PostgresConfigurationStore", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("maps an entry row", async () => {
    const { db, query } = fakeDb([entryRow()]);
    const store = new PostgresConfigurationStore(db, { logger: createLogger({ level: "silent" }) });

    const result = await store.findActiveEntry("smtp.host", 3);

    expect(result).toEqual({
      status: "found",
      value: {
        key: "smtp.host",
        environmentId: 3,
        value: "mail.uat",
        dataType: "STRING",
        classification: "INTERNAL",
        isActive: true,
        isSystemManaged: false,
        description: "Outbound mail relay",
        category: "MAIL",
      },
    });
    expect(query).toHaveBeenCalledWith(expect.stringContaining("env_id IS NOT DISTINCT FROM $2"), ["smtp.host", 3]);
  });

  it("passes null for global lookups and reports missing rows", async () => {
    const { db, query } = fakeDb([]);
    const store = new PostgresConfigurationStore(db);

    expect(await store.findActiveEntry("smtp.host", null)).toEqual({ status: "not_found" });
    expect(query).toHaveBeenCalledWith(expect.any(String), ["smtp.host", null]);
  });

  it("treats null values and unknown data types leniently", async () => {
    const { db } = fakeDb([entryRow({ cfg_value: null, cfg_data_type: "JSON", cfg_classification: null })]);
    const store = new PostgresConfigurationStore(db);

    const result = await store.findActiveEntry("smtp.host", 3);

    expect(result).toMatchObject({ status: "found", value: { value: "", dataType: "STRING" } });
    if (result.status === "found") {
      expect(result.value.classification).toBeUndefined();
    }
  });

  it("queries section entries with the prefix", async () => {
    const { db, query } = fakeDb([entryRow(), entryRow({ cfg_key: "smtp.port", cfg_value: "25" })]);
    const store = new PostgresConfigurationStore(db);

    const result = await store.findActiveEntries(3, "smtp.");

    expect(query).toHaveBeenCalledWith(expect.stringContaining("ORDER BY cfg_key"), [3, "smtp."]);
    expect(result.status === "found" ? result.value.map((entry) => entry.value) : []).toEqual(["mail.uat", "25"]);
  });

  it("normalizes environment rows", async () => {
    const { db } = fakeDb([
      { env_id: "1", env_code: " dev ", env_base_url: "http://localhost:8090" },
      { env_id: 2, env_code: "PROD", env_base_url: null },
    ]);
    const store = new PostgresConfigurationStore(db);

    expect(await store.listEnvironments()).toEqual({
      status: "found",
      value: [
        { id: 1, code: "DEV", baseUrl: "http://localhost:8090" },
        { id: 2, code: "PROD", baseUrl: null },
      ],
    });
  });

  it("looks up environment ids", async () => {
    const { db, query } = fakeDb([{ env_id: 4 }]);
    const store = new PostgresConfigurationStore(db);

    expect(await store.findEnvironmentId(" uat ")).toEqual({ status: "found", value: 4 });
    expect(query).toHaveBeenCalledWith(expect.stringContaining("UPPER(env_code) = UPPER($1)"), ["uat"]);
  });

  it("reports driver errors as unavailable", async () => {
    const query = vi.fn<Queryable["query"]>().mockRejectedValue(new Error("ECONNREFUSED"));
    const logger = createLogger({ level: "silent" });
    const warn = vi.spyOn(logger, "warn");
    const store = new PostgresConfigurationStore({ query }, { logger });

    const result = await store.findActiveEntry("smtp.host", 3);

    expect(result.status).toBe("unavailable");
    expect(result.status === "unavailable" ? result.error.message : "").toBe("ECONNREFUSED");
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ event: "config.store.query_failed", operation: "find_entry" }),
      "Configuration store query failed",
    );
  });

  it("reports malformed rows as unavailable", async () => {
    const { db } = fakeDb([{ cfg_key: 42 }]);
    const store = new PostgresConfigurationStore(db, { logger: createLogger({ level: "silent" }) });

    expect((await store.findActiveEntry("smtp.host", 3)).status).toBe("unavailable");
  });

  it("times out slow queries", async () => {
    vi.useFakeTimers();
    const query = vi.fn<Queryable["query"]>().mockReturnValue(new Promise(() => undefined));
    const store = new PostgresConfigurationStore({ query }, { timeoutMs: 100, logger: createLogger({ level: "silent" }) });

    const pending = store.listEnvironments();
    await vi.advanceTimersByTimeAsync(101);
    const result = await pending;

    expect(result.status).toBe("unavailable");
    expect(result.status === "unavailable" ? result.error.name : "").toBe("TimeoutError");
  });
});
