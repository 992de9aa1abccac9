import type { Response } from "express";

import { getRequestContext } from "../observability/requestContext.js";
import { appLogger, normalizeError } from "../observability/logger.js";
import { FrozenMutationError } from "../values/Value.js";

export type ErrorDetails = Array<{ path: string; message: string }>;

type ErrorBody = {
  code: string;
  message: string;
  details?: unknown;
};

function sanitize(body: ErrorBody): ErrorBody {
  const sanitized: ErrorBody = {
    code: body.code,
    message: body.message,
  };

  if (body.details !== undefined) {
    sanitized.details = body.details;
  }

  return sanitized;
}

function enrich(body: ErrorBody): ErrorBody & { requestId?: string; traceId?: string } {
  const context = getRequestContext();
  const metadata: { requestId?: string; traceId?: string } = {};

  if (context) {
    metadata.requestId = context.requestId;
    metadata.traceId = context.traceId;
  }

  return {
    ...sanitize(body),
    ...metadata,
  };
}

export function respondWithError(res: Response, status: number, body: ErrorBody): void {
  res.status(status).json(enrich(body));
}

export function respondWithValidationError(res: Response, details: ErrorDetails): void {
  respondWithError(res, 400, {
    code: "invalid_request",
    message: "Request validation failed",
    details,
  });
}

type BodyParserError = {
  status?: number;
  statusCode?: number;
  type?: string;
  limit?: number;
};

function asBodyParserError(error: unknown): BodyParserError | undefined {
  if (!error || typeof error !== "object") {
    return undefined;
  }
  const candidate: BodyParserError = {};
  if ("status" in error && typeof error.status === "number") {
    candidate.status = error.status;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    candidate.statusCode = error.statusCode;
  }
  if ("type" in error && typeof error.type === "string") {
    candidate.type = error.type;
  }
  if ("limit" in error && typeof error.limit === "number") {
    candidate.limit = error.limit;
  }
  return candidate;
}

export function respondWithPayloadTooLargeError(res: Response, error: BodyParserError): void {
  const details = Number.isFinite(error.limit) ? { limit: error.limit } : undefined;

  respondWithError(res, 413, {
    code: "payload_too_large",
    message: "Request body exceeds the configured limit",
    details,
  });
}

export function respondWithUnexpectedError(res: Response, error: unknown): void {
  const parserError = asBodyParserError(error);
  const status = parserError?.status ?? parserError?.statusCode;
  if (parserError && (status === 413 || parserError.type === "entity.too.large")) {
    respondWithPayloadTooLargeError(res, parserError);
    return;
  }
  if (parserError?.type === "entity.parse.failed") {
    respondWithError(res, 400, {
      code: "invalid_json",
      message: "Request body is not valid JSON",
    });
    return;
  }

  const normalized = normalizeError(error);
  const context = getRequestContext();
  const fields = {
    err: normalized,
    requestId: context?.requestId ?? res.locals.requestId,
    traceId: context?.traceId ?? res.locals.traceId,
  };
  if (error instanceof FrozenMutationError) {
    // A published tree was written to; this is a defect, not a client error.
    appLogger.fatal(fields, "Read-only configuration mutated");
  } else {
    appLogger.error(fields, "Unexpected request error");
  }

  const message = error instanceof Error ? error.message : "unexpected error";
  respondWithError(res, 500, {
    code: "internal_error",
    message,
  });
}
