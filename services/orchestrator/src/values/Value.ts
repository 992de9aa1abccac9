import type { DocumentNode } from "../document/DocumentNode.js";
import type { ConfigNode } from "../tree/ConfigNode.js";

export enum ValueKind {
  Boolean = "boolean",
  Integer = "integer",
  Float = "float",
  String = "string",
  Enum = "enum",
  Object = "object",
  List = "list",
}

export type BindResult =
  | { ok: true }
  | { ok: false; reason: "kind_mismatch"; expected: string; actual: string };

/**
 * Hook the binder hands to composite values so that nested elements are bound
 * with the same include handling as the root.
 */
export interface BindContext {
  bindNode(node: DocumentNode, target: ConfigNode): void;
}

/**
 * Read side of a configuration value. Published trees expose their leaves
 * through this interface only.
 */
export interface ReadonlyValue<T> {
  readonly kind: ValueKind;
  readonly value: T;
  isParsed(): boolean;
  isReadOnly(): boolean;
  orElse(fallback: T): T;
  toString(indent?: number, appendNewLine?: boolean): string;
}

export class FrozenMutationError extends Error {
  constructor(target: string) {
    super(`Attempted to mutate a read-only configuration ${target}`);
    this.name = "FrozenMutationError";
  }
}

export type AnyValue = Value<unknown>;

export abstract class Value<T> implements ReadonlyValue<T> {
  abstract readonly kind: ValueKind;

  protected storage: T;
  protected parsed = false;
  private frozen = false;

  protected constructor(private readonly createDefault: () => T) {
    this.storage = createDefault();
  }

  get value(): T {
    return this.storage;
  }

  isParsed(): boolean {
    return this.parsed;
  }

  isReadOnly(): boolean {
    return this.frozen;
  }

  orElse(fallback: T): T {
    return this.parsed ? this.storage : fallback;
  }

  reset(): void {
    this.assertMutable();
    this.storage = this.createDefault();
    this.parsed = false;
  }

  assign(value: T): void {
    this.assertMutable();
    this.storage = value;
    this.parsed = true;
  }

  parseFromValue(source: AnyValue): BindResult {
    this.assertMutable();
    if (source.kind !== this.kind || source.describe() !== this.describe() || !this.adopt(source)) {
      return {
        ok: false,
        reason: "kind_mismatch",
        expected: this.describe(),
        actual: source.describe(),
      };
    }
    this.parsed = true;
    return { ok: true };
  }

  parseFromAttribute(text: string): void {
    this.assertMutable();
    this.storage = this.convert(text);
    this.parsed = true;
  }

  parseFromNode(node: DocumentNode, _context: BindContext): void {
    this.assertMutable();
    this.storage = this.convert(node.text());
    this.parsed = true;
  }

  toString(indent = 0, appendNewLine = false): string {
    const text = this.render(indent);
    return appendNewLine ? `${text}\n` : text;
  }

  freeze(): void {
    this.frozen = true;
  }

  /**
   * Shape label, e.g. `enum(live|vod)` or `list(string)`. Two values of the
   * same kind only bind to each other when their labels match.
   */
  describe(): string {
    return this.kind;
  }

  protected assertMutable(): void {
    if (this.frozen) {
      throw new FrozenMutationError(`${this.describe()} value`);
    }
  }

  /**
   * Copies the storage of a same-kind source. Returns false, without touching
   * `this`, when the source's shape is incompatible.
   */
  protected abstract adopt(source: AnyValue): boolean;

  protected abstract convert(text: string): T;

  protected abstract render(indent: number): string;
}
