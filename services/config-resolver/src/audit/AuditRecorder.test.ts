import { describe, expect, it, vi } from "vitest";

import { createLogger } from "../observability/logger.js";
import { AuditRecorder } from "./AuditRecorder.js";
import { type AuditEvent, type AuditSink, createAuditEvent } from "./types.js";

function event(key: string): AuditEvent {
  return createAuditEvent({ eventType: "READ", key, source: "database" });
}

function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** Sink whose writes stay pending until released one at a time. */
function gatedSink() {
  const pending: Array<() => void> = [];
  const written: AuditEvent[] = [];
  const sink: AuditSink = {
    write: vi.fn(
      (audited: AuditEvent) =>
        new Promise<void>((resolve) => {
          pending.push(() => {
            written.push(audited);
            resolve();
          });
        }),
    ),
  };
  return { sink, pending, written };
}

describe("AuditRecorder", () => {
  it("returns before the sink is called", async () => {
    const sink: AuditSink = { write: vi.fn(async () => undefined) };
    const recorder = new AuditRecorder({ sink, logger: createLogger({ level: "silent" }) });

    expect(recorder.record(event("a"))).toBe(true);
    expect(sink.write).not.toHaveBeenCalled();

    await recorder.flush();
    expect(sink.write).toHaveBeenCalledTimes(1);
    expect(recorder.stats()).toMatchObject({ written: 1, failed: 0, dropped: 0, queued: 0 });
  });

  it("runs at most the configured number of workers", async () => {
    const { sink, pending, written } = gatedSink();
    const recorder = new AuditRecorder({ sink, workers: 2, logger: createLogger({ level: "silent" }) });

    for (const key of ["a", "b", "c", "d", "e"]) {
      recorder.record(event(key));
    }
    await nextTick();

    expect(pending).toHaveLength(2);
    expect(recorder.stats()).toMatchObject({ inFlight: 2, queued: 3, workers: 2 });

    while (pending.length > 0) {
      pending.shift()?.();
      await nextTick();
    }
    await recorder.flush();

    expect(written.map((audited) => audited.key)).toEqual(["a", "b", "c", "d", "e"]);
    expect(recorder.stats()).toMatchObject({ written: 5, inFlight: 0, queued: 0 });
  });

  it("drops events once the queue is full", async () => {
    const { sink, pending } = gatedSink();
    const logger = createLogger({ level: "silent" });
    const warn = vi.spyOn(logger, "warn");
    const recorder = new AuditRecorder({ sink, workers: 1, queueCapacity: 2, logger });

    expect(recorder.record(event("a"))).toBe(true);
    expect(recorder.record(event("b"))).toBe(true);
    expect(recorder.record(event("c"))).toBe(false);

    expect(recorder.stats().dropped).toBe(1);
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ event: "config.audit.dropped", reason: "queue_full", dropped: 1 }),
      "Audit event dropped",
    );

    const flushed = recorder.flush();
    while (pending.length > 0 || recorder.stats().queued > 0) {
      pending.shift()?.();
      await nextTick();
    }
    await flushed;
    expect(recorder.stats()).toMatchObject({ written: 2, dropped: 1 });
  });

  it("counts and logs sink failures without stopping", async () => {
    const logger = createLogger({ level: "silent" });
    const error = vi.spyOn(logger, "error");
    const write = vi
      .fn<(audited: AuditEvent) => Promise<void>>()
      .mockRejectedValueOnce(new Error("audit table locked"))
      .mockResolvedValue(undefined);
    const recorder = new AuditRecorder({ sink: { write }, workers: 1, logger });

    recorder.record(event("a"));
    recorder.record(event("b"));
    await recorder.flush();

    expect(recorder.stats()).toMatchObject({ written: 1, failed: 1 });
    expect(error).toHaveBeenCalledWith(
      expect.objectContaining({ event: "config.audit.write_failed", eventType: "READ" }),
      "Failed to write audit event",
    );
  });

  it("drains, closes the sink and rejects new events after close", async () => {
    const write = vi.fn(async () => undefined);
    const close = vi.fn(async () => undefined);
    const recorder = new AuditRecorder({ sink: { write, close }, logger: createLogger({ level: "silent" }) });

    recorder.record(event("a"));
    await recorder.close();

    expect(write).toHaveBeenCalledTimes(1);
    expect(close).toHaveBeenCalledTimes(1);
    expect(recorder.record(event("b"))).toBe(false);
    expect(recorder.stats().dropped).toBe(1);
  });
});
