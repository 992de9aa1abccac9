import { readFileSync } from "node:fs";
import path from "node:path";

import { normalizeError } from "../observability/logger.js";
import { DocumentError, type DocumentNode } from "./DocumentNode.js";
import { parseXmlDocument } from "./XmlDocument.js";

export interface DocumentLoader {
  /**
   * Loads the document `reference` points at. Relative references resolve
   * against the directory of `relativeTo` when given.
   */
  load(reference: string, relativeTo?: string): DocumentNode;
}

export class FileDocumentLoader implements DocumentLoader {
  constructor(private readonly baseDir: string = process.cwd()) {}

  resolve(reference: string, relativeTo?: string): string {
    const base = relativeTo ? path.dirname(relativeTo) : this.baseDir;
    return path.resolve(base, reference);
  }

  load(reference: string, relativeTo?: string): DocumentNode {
    const filePath = this.resolve(reference, relativeTo);
    let text: string;
    try {
      text = readFileSync(filePath, "utf-8");
    } catch (error) {
      throw new DocumentError("Could not read configuration document", filePath, {
        err: normalizeError(error),
      });
    }
    return parseXmlDocument(text, filePath);
  }
}
