import { timingSafeEqual } from "node:crypto";

import type { NextFunction, Request, Response } from "express";

import { respondWithError } from "../http/errors.js";
import { logAuditEvent } from "../observability/audit.js";
import { setActorInContext } from "../observability/requestContext.js";

export const ACCESS_TOKEN_ACTOR = "access-token";

function safeEqual(left: string, right: string): boolean {
  const a = Buffer.from(left, "utf-8");
  const b = Buffer.from(right, "utf-8");
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Reads the presented token from `Authorization`. `Basic` carries the token
 * base64-encoded as a whole, `Bearer` carries it verbatim.
 */
export function extractAccessToken(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  const match = /^(\w+)\s+(.+)$/u.exec(header.trim());
  if (!match) {
    return undefined;
  }
  const [, scheme, credentials] = match;
  switch (scheme.toLowerCase()) {
    case "basic":
      return Buffer.from(credentials, "base64").toString("utf-8");
    case "bearer":
      return credentials;
    default:
      return undefined;
  }
}

/**
 * Rejects requests that do not present `accessToken`. An empty token turns the
 * check off; startup only allows that outside production.
 */
export function createAccessTokenMiddleware(accessToken: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!accessToken) {
      next();
      return;
    }
    const presented = extractAccessToken(req.header("authorization"));
    if (presented !== undefined && safeEqual(presented, accessToken)) {
      setActorInContext(ACCESS_TOKEN_ACTOR);
      next();
      return;
    }
    logAuditEvent({
      action: "admin.authenticate",
      outcome: "denied",
      resource: `${req.method} ${req.baseUrl}${req.path}`,
      details: { reason: presented === undefined ? "missing_token" : "invalid_token" },
    });
    res.setHeader("WWW-Authenticate", 'Basic realm="media-admin"');
    respondWithError(res, 401, {
      code: "unauthorized",
      message: "A valid access token is required",
    });
  };
}
