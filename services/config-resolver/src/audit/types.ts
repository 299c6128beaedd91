import { randomUUID } from "node:crypto";

import { currentActor } from "../observability/requestContext.js";
import type { Classification } from "../security/classification.js";

export const AUDIT_EVENT_TYPES = [
  "READ",
  "CREATE",
  "UPDATE",
  "DELETE",
  "CACHE_CLEAR",
  "CACHE_REFRESH",
  "ENV_RESOLVE",
] as const;

export type AuditEventType = (typeof AUDIT_EVENT_TYPES)[number];

export type AuditSource =
  | "cache"
  | "database"
  | "environment"
  | "default"
  | "section"
  | "section-error"
  | "parse-error"
  | "flag"
  | "env"
  | "store"
  | "pattern"
  | "fallback"
  | "operator";

export type AuditOutcome = "success" | "failure";

/**
 * Immutable record of one configuration read, write or cache-management
 * action. `maskedValue` has already been through the classifier.
 */
export type AuditEvent = Readonly<{
  eventId: string;
  eventType: AuditEventType;
  key?: string;
  environmentCode?: string;
  classification: Classification;
  maskedValue?: string;
  actor?: string;
  source?: AuditSource;
  outcome: AuditOutcome;
  timestampEpochMs: number;
  durationMs: number;
}>;

export type AuditEventInput = {
  eventType: AuditEventType;
  key?: string;
  environmentCode?: string;
  classification?: Classification;
  maskedValue?: string;
  actor?: string;
  source?: AuditSource;
  outcome?: AuditOutcome;
  startedAtEpochMs?: number;
};

export function createAuditEvent(input: AuditEventInput, now: number = Date.now()): AuditEvent {
  const startedAt = input.startedAtEpochMs ?? now;
  const event: AuditEvent = {
    eventId: randomUUID(),
    eventType: input.eventType,
    key: input.key,
    environmentCode: input.environmentCode,
    classification: input.classification ?? "PUBLIC",
    maskedValue: input.maskedValue,
    actor: input.actor ?? currentActor(),
    source: input.source,
    outcome: input.outcome ?? "success",
    timestampEpochMs: now,
    durationMs: Math.max(0, now - startedAt),
  };
  return Object.freeze(event);
}

export interface AuditSink {
  write(event: AuditEvent): Promise<void>;
  close?(): Promise<void>;
}
