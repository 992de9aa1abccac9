import type { Request, Response } from "express";

import { DocumentError } from "../document/DocumentNode.js";
import type { DocumentLoader } from "../document/DocumentLoader.js";
import { jsonDocument } from "../document/JsonDocument.js";
import { respondWithError, respondWithUnexpectedError, respondWithValidationError } from "../http/errors.js";
import { getRequestIds } from "../http/helpers.js";
import {
  RenderQuerySchema,
  VirtualHostDefinitionSchema,
  VirtualHostNameSchema,
  formatValidationIssues,
} from "../http/validation.js";
import { logAuditEvent } from "../observability/audit.js";
import { bindMismatchCounter } from "../observability/metrics.js";
import type { Orchestrator, ReconfigurationOutcome, VirtualHost } from "../orchestrator/Orchestrator.js";
import { VirtualHostConfig } from "../schemas/VirtualHostConfig.js";
import { DocumentBinder } from "../tree/DocumentBinder.js";
import { renderText, renderXml } from "../tree/Serializer.js";

export type VirtualHostSummary = {
  name: string;
  origin: VirtualHost["origin"];
  readOnly: boolean;
  distribution: string;
  hostNames: string[];
  applications: string[];
  createdAt: string;
};

export function summarizeVirtualHost(host: VirtualHost): VirtualHostSummary {
  return {
    name: host.name,
    origin: host.origin,
    readOnly: host.isReadOnly,
    distribution: host.config.distribution.value,
    hostNames: [...host.hostNames],
    applications: host.config.applications.items.map((item) => item.node.name.value),
    createdAt: host.createdAt.toISOString(),
  };
}

/** Definitions posted to the API are self-contained; `include` is refused. */
const inlineOnlyLoader: DocumentLoader = {
  load(reference: string): never {
    throw new DocumentError("Includes are not supported in API definitions", reference);
  },
};

export class VirtualHostController {
  private readonly binder = new DocumentBinder({ loader: inlineOnlyLoader });

  constructor(private readonly orchestrator: Orchestrator) {}

  listVirtualHosts(_req: Request, res: Response): void {
    res.json({ virtualHosts: this.orchestrator.listVirtualHosts().map(summarizeVirtualHost) });
  }

  getVirtualHost(req: Request, res: Response): void {
    const host = this.resolveHost(req, res);
    if (host) {
      res.json(summarizeVirtualHost(host));
    }
  }

  getVirtualHostConfig(req: Request, res: Response): void {
    const host = this.resolveHost(req, res);
    if (!host) {
      return;
    }
    const query = RenderQuerySchema.safeParse(req.query);
    if (!query.success) {
      respondWithValidationError(res, formatValidationIssues(query.error.issues));
      return;
    }
    const { format, defaults } = query.data;
    if (format === "xml") {
      res.type("application/xml").send(renderXml(host.config, { defaults }));
      return;
    }
    res.type("text/plain").send(renderText(host.config, { defaults, appendNewLine: true }));
  }

  async createVirtualHost(req: Request, res: Response): Promise<void> {
    const body = VirtualHostDefinitionSchema.safeParse(req.body);
    if (!body.success) {
      respondWithValidationError(res, formatValidationIssues(body.error.issues));
      return;
    }

    const definition = new VirtualHostConfig();
    try {
      const report = this.binder.bind(jsonDocument(body.data, definition.tag), definition);
      if (report.mismatches.length > 0) {
        bindMismatchCounter.labels("api").inc(report.mismatches.length);
      }
    } catch (error) {
      if (error instanceof DocumentError) {
        respondWithError(res, 400, { code: "invalid_definition", message: error.message });
        return;
      }
      respondWithUnexpectedError(res, error);
      return;
    }

    // The name must stay addressable by the lookup and delete routes.
    const nameResult = VirtualHostNameSchema.safeParse(definition.name.value);
    if (!nameResult.success) {
      respondWithValidationError(
        res,
        formatValidationIssues(nameResult.error.issues).map((issue) => ({ ...issue, path: "name" })),
      );
      return;
    }
    const requestedName = nameResult.data;
    try {
      const outcome = await this.orchestrator.createVirtualHost(definition, { origin: "api" });
      this.audit("vhost.create", requestedName, outcome, res);
      switch (outcome.result) {
        case "succeeded":
          if (outcome.host) {
            res.status(201).json(summarizeVirtualHost(outcome.host));
            return;
          }
          break;
        case "already_exists":
          respondWithError(res, 409, {
            code: "already_exists",
            message: outcome.reason ?? `Virtual host ${requestedName} already exists`,
          });
          return;
        case "failed":
          respondWithError(res, 400, {
            code: "reconfiguration_failed",
            message: outcome.reason ?? "Virtual host could not be created",
          });
          return;
      }
      respondWithError(res, 500, {
        code: "unexpected_result",
        message: `Unexpected result ${outcome.result} while creating a virtual host`,
      });
    } catch (error) {
      respondWithUnexpectedError(res, error);
    }
  }

  async deleteVirtualHost(req: Request, res: Response): Promise<void> {
    const nameResult = VirtualHostNameSchema.safeParse(req.params.name);
    if (!nameResult.success) {
      respondWithValidationError(res, formatValidationIssues(nameResult.error.issues));
      return;
    }
    const name = nameResult.data;

    const existing = this.orchestrator.getVirtualHost(name);
    if (existing?.isReadOnly) {
      const { requestId, traceId } = getRequestIds(res);
      logAuditEvent({
        action: "vhost.delete",
        outcome: "denied",
        resource: `vhost:${name}`,
        requestId,
        traceId,
        details: { reason: "read_only" },
      });
      respondWithError(res, 403, {
        code: "read_only",
        message: `Virtual host ${name} is defined by the server document and cannot be deleted`,
      });
      return;
    }

    try {
      const outcome = await this.orchestrator.deleteVirtualHost(name);
      this.audit("vhost.delete", name, outcome, res);
      switch (outcome.result) {
        case "succeeded":
          if (outcome.host) {
            res.json(summarizeVirtualHost(outcome.host));
            return;
          }
          break;
        case "not_found":
          respondWithError(res, 404, {
            code: "not_found",
            message: `Virtual host ${name} does not exist`,
          });
          return;
        case "failed":
          respondWithError(res, 400, {
            code: "reconfiguration_failed",
            message: outcome.reason ?? "Virtual host could not be deleted",
          });
          return;
      }
      respondWithError(res, 500, {
        code: "unexpected_result",
        message: `Unexpected result ${outcome.result} while deleting a virtual host`,
      });
    } catch (error) {
      respondWithUnexpectedError(res, error);
    }
  }

  private resolveHost(req: Request, res: Response): VirtualHost | undefined {
    const nameResult = VirtualHostNameSchema.safeParse(req.params.name);
    if (!nameResult.success) {
      respondWithValidationError(res, formatValidationIssues(nameResult.error.issues));
      return undefined;
    }
    const host = this.orchestrator.getVirtualHost(nameResult.data);
    if (!host) {
      respondWithError(res, 404, {
        code: "not_found",
        message: `Virtual host ${nameResult.data} does not exist`,
      });
      return undefined;
    }
    return host;
  }

  private audit(action: string, name: string, outcome: ReconfigurationOutcome, res: Response): void {
    const { requestId, traceId } = getRequestIds(res);
    logAuditEvent({
      action,
      outcome: outcome.result === "succeeded" ? "success" : "failure",
      resource: `vhost:${name}`,
      requestId,
      traceId,
      details: { result: outcome.result, reason: outcome.reason },
    });
  }
}
