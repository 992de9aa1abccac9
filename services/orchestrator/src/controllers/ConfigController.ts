import type { Request, Response } from "express";

import { respondWithValidationError } from "../http/errors.js";
import { RenderQuerySchema, formatValidationIssues } from "../http/validation.js";
import type { ReadonlyServerConfig } from "../schemas/ServerConfig.js";
import { renderText, renderXml } from "../tree/Serializer.js";

/** Serves the effective server configuration as loaded at startup. */
export class ConfigController {
  constructor(private readonly server: ReadonlyServerConfig) {}

  getConfig(req: Request, res: Response): void {
    const query = RenderQuerySchema.safeParse(req.query);
    if (!query.success) {
      respondWithValidationError(res, formatValidationIssues(query.error.issues));
      return;
    }
    const { format, defaults } = query.data;
    if (format === "xml") {
      res.type("application/xml").send(renderXml(this.server, { defaults }));
      return;
    }
    res.type("text/plain").send(renderText(this.server, { defaults, appendNewLine: true }));
  }
}
