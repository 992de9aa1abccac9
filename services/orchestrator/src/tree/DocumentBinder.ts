import { FileDocumentLoader, type DocumentLoader } from "../document/DocumentLoader.js";
import { DocumentError, type DocumentNode } from "../document/DocumentNode.js";
import { appLogger, type AppLogger } from "../observability/logger.js";
import { isListValue } from "../values/ListValue.js";
import type { BindContext } from "../values/Value.js";
import type { ConfigNode, LayerMismatch } from "./ConfigNode.js";

export const INCLUDE_ATTRIBUTE = "include";

export type BindMismatch = LayerMismatch & {
  /** Element path of the node the mismatch was found on, e.g. `Server/Bind`. */
  path: string;
};

export type BindReport = {
  mismatches: BindMismatch[];
  /** Resolved sources of every included document, in load order. */
  includes: string[];
};

type DocumentBinderOptions = {
  loader?: DocumentLoader;
  logger?: AppLogger;
};

/**
 * One binding pass. Tracks the element path for reports and the chain of
 * included sources for cycle detection.
 */
class BindPass implements BindContext {
  readonly report: BindReport = { mismatches: [], includes: [] };
  private readonly path: string[] = [];
  private readonly includeChain: string[] = [];

  constructor(
    private readonly loader: DocumentLoader,
    private readonly logger: AppLogger,
    rootSource?: string,
  ) {
    if (rootSource) {
      this.includeChain.push(rootSource);
    }
  }

  bindNode(node: DocumentNode, target: ConfigNode): void {
    this.path.push(node.name);
    try {
      const include = node.getAttribute(INCLUDE_ATTRIBUTE);
      if (include !== undefined) {
        this.applyIncludes(include, node, target);
      }
      this.bindFields(node, target);
      target.markParsed();
    } finally {
      this.path.pop();
    }
  }

  private bindFields(node: DocumentNode, target: ConfigNode): void {
    for (const [name, value] of target.fields()) {
      if (isListValue(value) && value.inline) {
        if (node.getChildren(value.itemName).length > 0) {
          value.parseFromNode(node, this);
        }
        continue;
      }

      const attribute = node.getAttribute(name);
      if (attribute !== undefined) {
        value.parseFromAttribute(attribute);
        continue;
      }

      const [element, ...duplicates] = node.getChildren(name);
      if (!element) {
        continue;
      }
      if (duplicates.length > 0) {
        this.logger.debug(
          { path: this.currentPath(), field: name, count: duplicates.length + 1 },
          "duplicate configuration element; binding the first",
        );
      }
      value.parseFromNode(element, this);
    }
  }

  private applyIncludes(include: string, node: DocumentNode, target: ConfigNode): void {
    const references = include
      .split(",")
      .map((reference) => reference.trim())
      .filter((reference) => reference.length > 0);

    for (const reference of references) {
      const included = this.loader.load(reference, node.source);
      const source = included.source ?? reference;
      if (included.name !== target.tag) {
        throw new DocumentError(
          `Included document root <${included.name}> does not match <${target.tag}>`,
          source,
        );
      }
      if (this.includeChain.includes(source)) {
        throw new DocumentError("Include cycle detected", source, {
          chain: [...this.includeChain, source],
        });
      }

      this.report.includes.push(source);
      this.includeChain.push(source);
      try {
        const scratch = target.createEmpty();
        this.bindNode(included, scratch);
        this.recordMismatches(target.layer(scratch));
      } finally {
        this.includeChain.pop();
      }
    }
  }

  private recordMismatches(mismatches: LayerMismatch[]): void {
    for (const mismatch of mismatches) {
      const entry: BindMismatch = { ...mismatch, path: this.currentPath() };
      this.report.mismatches.push(entry);
      this.logger.warn({ ...entry }, "configuration value kind mismatch; keeping current value");
    }
  }

  private currentPath(): string {
    return this.path.join("/");
  }
}

/**
 * Binds parsed documents onto configuration trees. Declared fields are looked
 * up as attributes first, then as child elements; undeclared attributes and
 * elements are ignored.
 */
export class DocumentBinder {
  private readonly loader: DocumentLoader;
  private readonly logger: AppLogger;

  constructor(options: DocumentBinderOptions = {}) {
    this.loader = options.loader ?? new FileDocumentLoader();
    this.logger = (options.logger ?? appLogger).child({ component: "DocumentBinder" });
  }

  bind(document: DocumentNode, target: ConfigNode): BindReport {
    const pass = new BindPass(this.loader, this.logger, document.source);
    pass.bindNode(document, target);
    return pass.report;
  }

  /**
   * Loads a document through the loader and binds it.
   *
   * @throws DocumentError when the file cannot be read or parsed, or when its
   * root element is not `target.tag`
   */
  bindFile(reference: string, target: ConfigNode): BindReport {
    const document = this.loader.load(reference);
    if (document.name !== target.tag) {
      throw new DocumentError(
        `Document root <${document.name}> does not match <${target.tag}>`,
        document.source ?? reference,
      );
    }
    const report = this.bind(document, target);
    this.logger.debug(
      { source: document.source ?? reference, includes: report.includes, mismatches: report.mismatches.length },
      "configuration document bound",
    );
    return report;
  }
}
