import { describe, expect, it } from "vitest";

import { MemoryConfigurationStore } from "./MemoryConfigurationStore.js";

function seeded(): MemoryConfigurationStore {
  return new MemoryConfigurationStore({
    environments: [
      { id: 1, code: "dev", baseUrl: "http://localhost:8090" },
      { id: 3, code: "UAT", baseUrl: "https://uat.example.com" },
    ],
    entries: [
      { key: "smtp.host", value: "mail.global", environmentId: null },
      { key: "smtp.host", value: "mail.uat", environmentId: 3 },
      { key: "smtp.port", value: "25", environmentId: 3 },
      { key: "import.batch.size", value: "500", environmentId: null },
    ],
  });
}

describe("MemoryConfigurationStore", () => {
  it("separates environment-specific and global entries", async () => {
    const store = seeded();

    const scoped = await store.findActiveEntry("smtp.host", 3);
    const global = await store.findActiveEntry("smtp.host", null);

    expect(scoped).toMatchObject({ status: "found", value: { value: "mail.uat", environmentId: 3 } });
    expect(global).toMatchObject({ status: "found", value: { value: "mail.global", environmentId: null } });
    expect(await store.findActiveEntry("smtp.port", null)).toEqual({ status: "not_found" });
  });

  it("deactivates the previous entry when one is replaced", async () => {
    const store = seeded();
    store.putEntry({ key: "smtp.host", value: "mail2.uat", environmentId: 3 });

    expect(await store.findActiveEntry("smtp.host", 3)).toMatchObject({
      status: "found",
      value: { value: "mail2.uat" },
    });
    expect(store.deactivate("smtp.host", 3)).toBe(1);
    expect(await store.findActiveEntry("smtp.host", 3)).toEqual({ status: "not_found" });
  });

  it("filters section entries by prefix, sorted by key", async () => {
    const result = await seeded().findActiveEntries(3, "smtp.");

    expect(result.status).toBe("found");
    if (result.status === "found") {
      expect(result.value.map((entry) => entry.key)).toEqual(["smtp.host", "smtp.port"]);
    }
  });

  it("upper-cases environment codes", async () => {
    const store = seeded();

    expect(await store.findEnvironmentId(" Dev ")).toEqual({ status: "found", value: 1 });
    expect(await store.findEnvironmentId("PROD")).toEqual({ status: "not_found" });
    const environments = await store.listEnvironments();
    expect(environments).toEqual({
      status: "found",
      value: [
        { id: 1, code: "DEV", baseUrl: "http://localhost:8090" },
        { id: 3, code: "UAT", baseUrl: "https://uat.example.com" },
      ],
    });
  });

  it("reports unavailable while a failure is set", async () => {
    const store = seeded();
    const failure = new Error("connection refused");
    store.setUnavailable(failure);

    expect(await store.findActiveEntry("smtp.host", null)).toEqual({ status: "unavailable", error: failure });
    expect(await store.listEnvironments()).toEqual({ status: "unavailable", error: failure });

    store.setUnavailable(null);
    expect((await store.findEnvironmentId("UAT")).status).toBe("found");
  });

  it("returns copies of stored entries", async () => {
    const store = seeded();
    const first = await store.findActiveEntry("smtp.host", null);
    if (first.status === "found") {
      first.value.value = "changed";
    }

    expect(await store.findActiveEntry("smtp.host", null)).toMatchObject({ value: { value: "mail.global" } });
  });
});
