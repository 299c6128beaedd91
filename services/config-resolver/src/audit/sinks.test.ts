import { describe, expect, it, vi } from "vitest";

import type { Queryable } from "../database/Postgres.js";
import { createLogger } from "../observability/logger.js";
import { runWithContext } from "../observability/requestContext.js";
import { LoggerAuditSink, PostgresAuditSink } from "./sinks.js";
import { createAuditEvent } from "./types.js";

describe("createAuditEvent", () => {
  it("fills defaults and freezes the event", () => {
    const audited = createAuditEvent({ eventType: "CACHE_CLEAR", startedAtEpochMs: 1_000 }, 1_250);

    expect(audited).toMatchObject({
      eventType: "CACHE_CLEAR",
      classification: "PUBLIC",
      outcome: "success",
      actor: "system",
      timestampEpochMs: 1_250,
      durationMs: 250,
    });
    expect(audited.eventId).toMatch(/^[0-9a-f-]{36}$/);
    expect(Object.isFrozen(audited)).toBe(true);
  });

  it("attributes events to the actor in the request context", () => {
    const audited = runWithContext({ actorId: "ops-user" }, () => createAuditEvent({ eventType: "READ" }));
    expect(audited.actor).toBe("ops-user");
  });
});

describe("LoggerAuditSink", () => {
  it("logs successes at info and failures at warn", async () => {
    const logger = createLogger({ level: "silent" });
    const info = vi.spyOn(logger, "info");
    const warn = vi.spyOn(logger, "warn");
    const sink = new LoggerAuditSink(logger);

    await sink.write(
      createAuditEvent({ eventType: "READ", key: "smtp.host", maskedValue: "mail****", source: "database" }, 0),
    );
    await sink.write(createAuditEvent({ eventType: "READ", key: "x", source: "parse-error", outcome: "failure" }, 0));

    expect(info).toHaveBeenCalledWith(
      expect.objectContaining({
        event: "config.audit",
        event_type: "READ",
        key: "smtp.host",
        value: "mail****",
        source: "database",
        ts: "1970-01-01T00:00:00.000Z",
      }),
      "configuration audit event",
    );
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe("PostgresAuditSink", () => {
  it("inserts one row per event", async () => {
    const query = vi.fn<Queryable["query"]>().mockResolvedValue({ rows: [] });
    const sink = new PostgresAuditSink({ query });
    const audited = createAuditEvent(
      {
        eventType: "UPDATE",
        key: "db.password",
        environmentCode: "UAT",
        classification: "CONFIDENTIAL",
        maskedValue: "[REDACTED]",
        actor: "admin",
        source: "operator",
        startedAtEpochMs: 5_000,
      },
      5_010,
    );

    await sink.write(audited);

    expect(query).toHaveBeenCalledTimes(1);
    expect(query).toHaveBeenCalledWith(expect.stringContaining("INSERT INTO configuration_audit_events"), [
      audited.eventId,
      "UPDATE",
      "db.password",
      "UAT",
      "CONFIDENTIAL",
      "[REDACTED]",
      "admin",
      "operator",
      "success",
      new Date(5_010),
      10,
    ]);
  });

  it("propagates database errors to the recorder", async () => {
    const query = vi.fn<Queryable["query"]>().mockRejectedValue(new Error("relation does not exist"));
    const sink = new PostgresAuditSink({ query });

    await expect(sink.write(createAuditEvent({ eventType: "READ" }))).rejects.toThrow("relation does not exist");
  });
});
