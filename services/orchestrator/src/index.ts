import http from "node:http";

import type { Express } from "express";

import { loadConfig, type AppConfig } from "./config/loadConfig.js";
import { FileDocumentLoader, type DocumentLoader } from "./document/DocumentLoader.js";
import { appLogger, normalizeError } from "./observability/logger.js";
import { bindMismatchCounter } from "./observability/metrics.js";
import { ApplicationRegistry } from "./orchestrator/ApplicationRegistry.js";
import { Orchestrator } from "./orchestrator/Orchestrator.js";
import { ServerConfig, type ReadonlyServerConfig } from "./schemas/ServerConfig.js";
import { createServer } from "./server/app.js";
import { DocumentBinder } from "./tree/DocumentBinder.js";
import { renderText } from "./tree/Serializer.js";

export { createServer } from "./server/app.js";
export { Orchestrator } from "./orchestrator/Orchestrator.js";
export type {
  OrchestratorModule,
  ReconfigurationOutcome,
  ReconfigurationResult,
  VirtualHost,
} from "./orchestrator/Orchestrator.js";

const DEFAULT_ADMIN_PORT = 8081;

export class StartupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StartupError";
  }
}

export type MediaConfigRuntime = {
  config: AppConfig;
  server: ReadonlyServerConfig;
  orchestrator: Orchestrator;
  applications: ApplicationRegistry;
};

/**
 * Binds the server document, registers its virtual hosts as read-only hosts
 * and freezes the tree.
 *
 * @throws DocumentError when the server document or an include is unusable
 * @throws StartupError when a document virtual host is rejected
 */
export async function loadRuntime(
  appConfig?: AppConfig,
  loader: DocumentLoader = new FileDocumentLoader(),
): Promise<MediaConfigRuntime> {
  const config = appConfig ?? loadConfig();
  const server = new ServerConfig();
  const report = new DocumentBinder({ loader }).bindFile(config.serverConfigPath, server);
  if (report.mismatches.length > 0) {
    bindMismatchCounter.labels("document").inc(report.mismatches.length);
  }

  const orchestrator = new Orchestrator();
  const applications = new ApplicationRegistry();
  orchestrator.registerModule(applications);

  for (const item of server.virtualHosts.items) {
    const outcome = await orchestrator.createVirtualHost(item.node, { origin: "document" });
    if (outcome.result !== "succeeded") {
      throw new StartupError(
        `Virtual host ${item.node.name.value || "(unnamed)"} could not be created: ${outcome.result}${
          outcome.reason ? ` (${outcome.reason})` : ""
        }`,
      );
    }
  }
  server.freeze();

  if (config.dump.enabled) {
    appLogger.debug(
      {
        source: config.serverConfigPath,
        includes: report.includes,
        configuration: renderText(server, {
          defaults: config.dump.includeDefaults ? "include_defaults" : "omit_defaults",
        }),
      },
      "effective server configuration",
    );
  }

  return { config, server, orchestrator, applications };
}

/**
 * Resolves the admin listener from `Bind/Managers/API`. Returns undefined when
 * the document has no such section, which disables the admin API.
 *
 * @throws StartupError for an unusable port, or a missing access token in production
 */
export function resolveAdminListener(
  runtime: MediaConfigRuntime,
): { port: number; host: string } | undefined {
  const bind = runtime.server.bind.node.managers.node.api;
  if (!bind.isParsed()) {
    return undefined;
  }
  const port = bind.node.port.orElse(DEFAULT_ADMIN_PORT);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new StartupError(`Admin API port ${port} is out of range`);
  }
  const accessToken = runtime.server.managers.node.api.node.accessToken.orElse("");
  if (!accessToken && runtime.config.runMode === "production") {
    throw new StartupError("Managers/API/AccessToken must be set in production");
  }
  if (!accessToken) {
    appLogger.warn("admin API access token is empty; requests are not authenticated");
  }
  return { port, host: runtime.config.admin.host };
}

export function createAdminApp(runtime: MediaConfigRuntime): Express {
  return createServer({
    config: runtime.config,
    server: runtime.server,
    orchestrator: runtime.orchestrator,
  });
}

/**
 * Loads the configuration and starts the admin listener when the document
 * declares one.
 */
export async function bootstrapMediaConfig(appConfig?: AppConfig): Promise<http.Server | undefined> {
  const runtime = await loadRuntime(appConfig);
  const listener = resolveAdminListener(runtime);
  if (!listener) {
    appLogger.info("admin API disabled: no Bind/Managers/API section in the server document");
    return undefined;
  }

  const server = http.createServer(createAdminApp(runtime));
  server.listen(listener.port, listener.host, () => {
    appLogger.info(
      { port: listener.port, host: listener.host, virtualHosts: runtime.orchestrator.snapshot().size },
      "admin API listening",
    );
  });
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      appLogger.info({ signal }, "shutting down admin API");
      server.close((error) => {
        if (error) {
          appLogger.error({ err: normalizeError(error) }, "admin API did not close cleanly");
          process.exitCode = 1;
        }
      });
    });
  }
  return server;
}

if (process.env.NODE_ENV !== "test") {
  bootstrapMediaConfig().catch((error) => {
    appLogger.fatal({ err: normalizeError(error) }, "startup failed");
    process.exit(1);
  });
}
