import auditLogger from "./logger.js";
import { getRequestContext } from "./requestContext.js";

export type AuditOutcome = "success" | "failure" | "denied";

export type AuditEvent = {
  action: string;
  outcome: AuditOutcome;
  resource?: string;
  traceId?: string;
  requestId?: string;
  details?: Record<string, unknown>;
  error?: string;
};

const secretKeyPatterns = [/token/i, /secret/i, /password/i, /authorization/i];

function selectLevel(outcome: AuditOutcome): "info" | "warn" | "error" {
  switch (outcome) {
    case "failure":
      return "error";
    case "denied":
      return "warn";
    default:
      return "info";
  }
}

function shouldMask(key?: string): boolean {
  if (!key) {
    return false;
  }
  return secretKeyPatterns.some((pattern) => pattern.test(key));
}

function sanitizeValue(value: unknown, key?: string): unknown {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === "string" && shouldMask(key)) {
    return "[redacted]";
  }
  if (Array.isArray(value)) {
    const sanitizedArray = value
      .map((item) => sanitizeValue(item))
      .filter((item) => item !== undefined);
    return sanitizedArray.length > 0 ? sanitizedArray : undefined;
  }
  if (typeof value === "object") {
    const sanitizedObject: Record<string, unknown> = {};
    for (const [nestedKey, nestedValue] of Object.entries(value)) {
      const sanitized = sanitizeValue(nestedValue, nestedKey);
      if (sanitized !== undefined) {
        sanitizedObject[nestedKey] = sanitized;
      }
    }
    return Object.keys(sanitizedObject).length > 0 ? sanitizedObject : undefined;
  }
  return value;
}

function sanitizeDetails(
  details?: Record<string, unknown>
): Record<string, unknown> | undefined {
  if (!details) {
    return undefined;
  }
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(details)) {
    const sanitizedValue = sanitizeValue(value, key);
    if (sanitizedValue !== undefined) {
      sanitized[key] = sanitizedValue;
    }
  }
  return Object.keys(sanitized).length > 0 ? sanitized : undefined;
}

/**
 * Writes one structured audit line for an administrative change. Request and
 * trace ids fall back to the active request context.
 */
export function logAuditEvent(event: AuditEvent): void {
  const context = getRequestContext();
  const requestId = event.requestId ?? context?.requestId;
  const traceId = event.traceId ?? context?.traceId;
  const level = selectLevel(event.outcome);

  const payload: Record<string, unknown> = {
    type: "audit",
    event: event.action,
    outcome: event.outcome,
    target: event.resource ?? "unspecified",
    actor_id: context?.actorId ?? "anonymous",
    redacted_details: sanitizeDetails(event.details) ?? {}
  };
  if (requestId) {
    payload.request_id = requestId;
  }
  if (traceId) {
    payload.trace_id = traceId;
  }
  if (event.error) {
    payload.error = event.error;
  }

  auditLogger[level](payload, `audit.${event.action}`);
}
