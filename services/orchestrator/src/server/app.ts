import { randomUUID } from "node:crypto";
import cors from "cors";
import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";

import type { AppConfig } from "../config/loadConfig.js";
import { ConfigController } from "../controllers/ConfigController.js";
import { VirtualHostController } from "../controllers/VirtualHostController.js";
import { respondWithUnexpectedError } from "../http/errors.js";
import { getRequestIds } from "../http/helpers.js";
import { createAccessTokenMiddleware } from "../middleware/accessToken.js";
import { determineCorsOptions } from "../middleware/security.js";
import { appLogger } from "../observability/logger.js";
import { getMetricsContentType, getMetricsSnapshot } from "../observability/metrics.js";
import { runWithContext, type RequestContext } from "../observability/requestContext.js";
import type { Orchestrator } from "../orchestrator/Orchestrator.js";
import type { ReadonlyServerConfig } from "../schemas/ServerConfig.js";

export type AdminServerDependencies = {
  config: AppConfig;
  /** The frozen server configuration; its `Managers/API` section drives auth and CORS. */
  server: ReadonlyServerConfig;
  orchestrator: Orchestrator;
};

export function createServer({ config, server, orchestrator }: AdminServerDependencies): Express {
  const app = express();
  const api = server.managers.node.api.node;
  const crossDomains = api.crossDomains.items.map((item) => item.value);

  const virtualHostController = new VirtualHostController(orchestrator);
  const configController = new ConfigController(server);

  const contexts = new WeakMap<Request, RequestContext>();

  app.disable("x-powered-by");

  app.use((req: Request, res: Response, next: NextFunction) => {
    const headerRequestId = req.header("x-request-id")?.trim();
    const headerTraceId = req.header("x-trace-id")?.trim();
    const requestId =
      headerRequestId && headerRequestId.length > 0
        ? headerRequestId
        : randomUUID();
    const traceId =
      headerTraceId && headerTraceId.length > 0 ? headerTraceId : randomUUID();
    res.locals.requestId = requestId;
    res.locals.traceId = traceId;
    res.setHeader("x-request-id", requestId);
    res.setHeader("x-trace-id", traceId);
    const context: RequestContext = { requestId, traceId };
    contexts.set(req, context);
    runWithContext(context, () => next());
  });

  app.use(cors(determineCorsOptions(crossDomains)));
  app.use(express.json({ limit: config.admin.jsonLimitBytes }));
  // The body parser continues from stream callbacks, outside the request's context.
  app.use((req: Request, _res: Response, next: NextFunction) => {
    const context = contexts.get(req);
    if (context) {
      runWithContext(context, () => next());
      return;
    }
    next();
  });

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on("finish", () => {
      const duration = Date.now() - start;
      const { requestId, traceId } = getRequestIds(res);
      appLogger.info(
        {
          event: "http.request",
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          durationMs: duration,
          requestId,
          traceId,
        },
        "handled http request",
      );
    });
    next();
  });

  app.get("/healthz", (_req, res) => {
    res.json({ status: "ok", virtualHosts: orchestrator.snapshot().size });
  });

  app.get("/metrics", async (_req, res) => {
    try {
      const snapshot = await getMetricsSnapshot();
      res.setHeader("Content-Type", getMetricsContentType());
      res.send(snapshot);
    } catch (error) {
      respondWithUnexpectedError(res, error);
    }
  });

  app.use("/v1", createAccessTokenMiddleware(api.accessToken.value));

  app.get("/v1/config", (req, res) => configController.getConfig(req, res));

  app.get("/v1/vhosts", (req, res) => virtualHostController.listVirtualHosts(req, res));
  app.post("/v1/vhosts", (req, res) => virtualHostController.createVirtualHost(req, res));
  app.get("/v1/vhosts/:name", (req, res) => virtualHostController.getVirtualHost(req, res));
  app.get("/v1/vhosts/:name/config", (req, res) => virtualHostController.getVirtualHostConfig(req, res));
  app.delete("/v1/vhosts/:name", (req, res) => virtualHostController.deleteVirtualHost(req, res));

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const context = contexts.get(req);
    if (context) {
      runWithContext(context, () => respondWithUnexpectedError(res, err));
      return;
    }
    respondWithUnexpectedError(res, err);
  });

  return app;
}
