import { randomUUID } from "node:crypto";

import type { Response } from "express";

import { getRequestContext } from "../observability/requestContext.js";

export function getRequestIds(res: Response): { requestId: string; traceId: string } {
  const context = getRequestContext();
  const requestId = context?.requestId ?? String(res.locals.requestId ?? randomUUID());
  const traceId = context?.traceId ?? String(res.locals.traceId ?? randomUUID());
  return { requestId, traceId };
}
