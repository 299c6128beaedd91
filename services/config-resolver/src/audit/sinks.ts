import type { Queryable } from "../database/Postgres.js";
import { type AppLogger, appLogger } from "../observability/logger.js";
import type { AuditEvent, AuditSink } from "./types.js";

/**
 * Writes each event as one structured log line on the `audit` channel.
 */
export class LoggerAuditSink implements AuditSink {
  private readonly logger: AppLogger;

  constructor(logger?: AppLogger) {
    this.logger = logger ?? appLogger.child({ channel: "audit" });
  }

  async write(event: AuditEvent): Promise<void> {
    const level = event.outcome === "failure" ? "warn" : "info";
    this.logger[level](
      {
        event: "config.audit",
        event_id: event.eventId,
        event_type: event.eventType,
        key: event.key,
        environment: event.environmentCode,
        classification: event.classification,
        value: event.maskedValue,
        actor: event.actor,
        source: event.source,
        outcome: event.outcome,
        ts: new Date(event.timestampEpochMs).toISOString(),
        duration_ms: event.durationMs,
      },
      "configuration audit event",
    );
  }
}

const INSERT_AUDIT_SQL = `INSERT INTO configuration_audit_events (
    event_id,
    event_type,
    cfg_key,
    env_code,
    classification,
    masked_value,
    actor,
    source,
    outcome,
    occurred_at,
    duration_ms
  ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`;

/**
 * Appends events to the `configuration_audit_events` table. Rows are only
 * ever inserted.
 */
export class PostgresAuditSink implements AuditSink {
  constructor(private readonly db: Queryable) {}

  async write(event: AuditEvent): Promise<void> {
    await this.db.query(INSERT_AUDIT_SQL, [
      event.eventId,
      event.eventType,
      event.key ?? null,
      event.environmentCode ?? null,
      event.classification,
      event.maskedValue ?? null,
      event.actor ?? null,
      event.source ?? null,
      event.outcome,
      new Date(event.timestampEpochMs),
      event.durationMs,
    ]);
  }
}
