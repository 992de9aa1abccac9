import pino, { stdTimeFunctions, type Logger as PinoLogger, type LoggerOptions } from "pino";

export type AppLogger = PinoLogger;

export type NormalizedError = {
  message: string;
  name?: string;
  stack?: string;
  code?: string | number;
  cause?: unknown;
  details?: Record<string, unknown>;
};

type CreateLoggerOptions = {
  level?: string;
  serviceName?: string;
  bindings?: Record<string, unknown>;
  options?: LoggerOptions;
};

const RESERVED_ERROR_KEYS = new Set(["message", "name", "stack", "code", "cause"]);

function envOr(name: string, fallback: string): string {
  const value = process.env[name]?.trim();
  return value && value.length > 0 ? value : fallback;
}

export function createLogger(options: CreateLoggerOptions = {}): AppLogger {
  const logger = pino({
    level: options.level ?? envOr("LOG_LEVEL", "info"),
    base: { service: options.serviceName ?? envOr("SERVICE_NAME", "media-orchestrator") },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    ...options.options,
  });
  if (options.bindings && Object.keys(options.bindings).length > 0) {
    return logger.child(options.bindings);
  }
  return logger;
}

export const appLogger: AppLogger = createLogger({ bindings: { subsystem: "orchestrator" } });
export default appLogger;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Flattens anything thrown into a plain object that pino serializes under
 * `err`, keeping extra properties (such as a DocumentError's source) as
 * `details`.
 */
export function normalizeError(error: unknown): NormalizedError {
  if (typeof error === "string") {
    return { message: error };
  }
  if (!isRecord(error)) {
    return { message: String(error) };
  }

  const message =
    typeof error.message === "string" && error.message.length > 0
      ? error.message
      : safeStringify(error) ?? "Unknown error";
  const normalized: NormalizedError = { message };
  if (typeof error.name === "string") {
    normalized.name = error.name;
  }
  if (typeof error.stack === "string") {
    normalized.stack = error.stack;
  }
  if (typeof error.code === "string" || typeof error.code === "number") {
    normalized.code = error.code;
  }
  if ("cause" in error && error.cause !== undefined) {
    normalized.cause = isRecord(error.cause) ? normalizeError(error.cause) : error.cause;
  }

  const details: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(error)) {
    if (!RESERVED_ERROR_KEYS.has(key)) {
      details[key] = value;
    }
  }
  if (Object.keys(details).length > 0) {
    normalized.details = details;
  }
  return normalized;
}

function safeStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}
