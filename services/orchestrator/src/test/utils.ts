import path from "node:path";

import type { DocumentLoader } from "../document/DocumentLoader.js";
import { DocumentError, type DocumentNode } from "../document/DocumentNode.js";
import { parseXmlDocument } from "../document/XmlDocument.js";
import { createLogger } from "../observability/logger.js";

export const TEST_CONFIG_DIR = "/etc/media";

export const silentLogger = createLogger({ level: "silent" });

/** Serves XML documents from memory, keyed by absolute POSIX path. */
export class MemoryDocumentLoader implements DocumentLoader {
  readonly loaded: string[] = [];

  constructor(
    private readonly files: Record<string, string>,
    private readonly baseDir: string = TEST_CONFIG_DIR,
  ) {}

  load(reference: string, relativeTo?: string): DocumentNode {
    const base = relativeTo ? path.posix.dirname(relativeTo) : this.baseDir;
    const filePath = path.posix.resolve(base, reference);
    const text = this.files[filePath];
    if (text === undefined) {
      throw new DocumentError("Could not read configuration document", filePath);
    }
    this.loaded.push(filePath);
    return parseXmlDocument(text, filePath);
  }
}

export function configPath(name: string): string {
  return path.posix.join(TEST_CONFIG_DIR, name);
}
