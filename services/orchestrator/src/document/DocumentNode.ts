/**
 * The only view of a parsed document the binder relies on. Adapters exist for
 * XML text and for JSON payloads from the admin API.
 */
export interface DocumentNode {
  readonly name: string;
  /** Path of the file the node was read from; includes resolve against it. */
  readonly source?: string;
  getAttribute(name: string): string | undefined;
  getChildren(name: string): DocumentNode[];
  /** Character content of the element, or "" when it has none. */
  text(): string;
}

export class DocumentError extends Error {
  constructor(
    message: string,
    public readonly source?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(source ? `${message} (${source})` : message);
    this.name = "DocumentError";
  }
}
