import { type AppLogger, appLogger, normalizeError } from "../observability/logger.js";
import { recordAuditDelivery } from "../observability/metrics.js";
import type { AuditEvent, AuditSink } from "./types.js";

const DEFAULT_WORKERS = 2;
const DEFAULT_QUEUE_CAPACITY = 1_000;
// Warn on the first drop, then once per this many further drops.
const DROP_LOG_INTERVAL = 100;

export type AuditRecorderOptions = {
  sink: AuditSink;
  workers?: number;
  queueCapacity?: number;
  logger?: AppLogger;
};

export type AuditRecorderStats = {
  queued: number;
  inFlight: number;
  written: number;
  failed: number;
  dropped: number;
  workers: number;
  queueCapacity: number;
};

/**
 * Hands audit events to a sink without making the caller wait.
 *
 * `record` only appends to a bounded queue; a fixed number of async workers
 * drain it. When the queue is full the event is dropped and counted, so a
 * slow or failing sink never adds latency to configuration reads.
 */
export class AuditRecorder {
  private readonly sink: AuditSink;
  private readonly maxWorkers: number;
  private readonly capacity: number;
  private readonly logger: AppLogger;
  private readonly queue: AuditEvent[] = [];
  private activeWorkers = 0;
  private inFlight = 0;
  private written = 0;
  private failed = 0;
  private dropped = 0;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(options: AuditRecorderOptions) {
    this.sink = options.sink;
    this.maxWorkers = Math.max(1, Math.floor(options.workers ?? DEFAULT_WORKERS));
    this.capacity = Math.max(1, Math.floor(options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY));
    this.logger = options.logger ?? appLogger.child({ subsystem: "audit-recorder" });
  }

  /**
   * Enqueues an event. Returns false when it was dropped because the queue
   * is full or the recorder is closed.
   */
  record(event: AuditEvent): boolean {
    if (this.closed) {
      this.drop(event, "closed");
      return false;
    }
    if (this.queue.length >= this.capacity) {
      this.drop(event, "queue_full");
      return false;
    }
    this.queue.push(event);
    this.dispatch();
    return true;
  }

  private drop(event: AuditEvent, reason: "queue_full" | "closed"): void {
    this.dropped += 1;
    recordAuditDelivery("dropped");
    if (this.dropped === 1 || this.dropped % DROP_LOG_INTERVAL === 0) {
      this.logger.warn(
        {
          event: "config.audit.dropped",
          reason,
          eventType: event.eventType,
          dropped: this.dropped,
          queueCapacity: this.capacity,
        },
        "Audit event dropped",
      );
    }
  }

  private dispatch(): void {
    // Workers claim events as they run, so one worker per queued event is enough.
    while (this.activeWorkers < this.maxWorkers && this.activeWorkers < this.queue.length) {
      this.activeWorkers += 1;
      this.runWorker()
        .catch((error: unknown) => {
          this.logger.error(
            { err: normalizeError(error), event: "config.audit.worker_crashed" },
            "Audit worker stopped unexpectedly",
          );
        })
        .finally(() => {
          this.activeWorkers -= 1;
          if (this.queue.length > 0) {
            this.dispatch();
          }
          this.notifyIfIdle();
        });
    }
  }

  private async runWorker(): Promise<void> {
    // Yield first so `record` returns before any sink work starts.
    await Promise.resolve();
    let next = this.queue.shift();
    while (next !== undefined) {
      this.inFlight += 1;
      try {
        await this.sink.write(next);
        this.written += 1;
        recordAuditDelivery("written");
      } catch (error) {
        this.failed += 1;
        recordAuditDelivery("failed");
        this.logger.error(
          {
            err: normalizeError(error),
            event: "config.audit.write_failed",
            eventId: next.eventId,
            eventType: next.eventType,
          },
          "Failed to write audit event",
        );
      } finally {
        this.inFlight -= 1;
      }
      next = this.queue.shift();
    }
  }

  private notifyIfIdle(): void {
    if (this.activeWorkers > 0 || this.queue.length > 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  /**
   * Resolves once every queued event has been handed to the sink.
   */
  flush(): Promise<void> {
    if (this.activeWorkers === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stops accepting events, drains the queue and closes the sink.
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.flush();
    if (this.sink.close) {
      await this.sink.close();
    }
  }

  stats(): AuditRecorderStats {
    return {
      queued: this.queue.length,
      inFlight: this.inFlight,
      written: this.written,
      failed: this.failed,
      dropped: this.dropped,
      workers: this.maxWorkers,
      queueCapacity: this.capacity,
    };
  }
}
