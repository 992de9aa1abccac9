import type { DocumentNode } from "../document/DocumentNode.js";
import {
  Value,
  ValueKind,
  type AnyValue,
  type BindContext,
  type ReadonlyValue,
} from "./Value.js";

export interface ReadonlyListValue<R> {
  readonly kind: ValueKind;
  readonly itemName: string;
  readonly items: readonly R[];
  isParsed(): boolean;
  isReadOnly(): boolean;
  toString(indent?: number, appendNewLine?: boolean): string;
}

export type ListValueOptions = {
  /**
   * Items repeat directly under the parent element (`<IP>` in `<Server>`)
   * instead of inside a container element named after the field.
   */
  inline?: boolean;
};

export class ListValue<V extends AnyValue> extends Value<V[]> {
  readonly kind = ValueKind.List;
  readonly inline: boolean;
  private readonly itemShape: string;

  constructor(
    readonly itemName: string,
    private readonly createItem: () => V,
    options: ListValueOptions = {},
  ) {
    super(() => []);
    this.inline = options.inline ?? false;
    this.itemShape = createItem().describe();
  }

  get items(): readonly V[] {
    return this.storage;
  }

  /** Appends a default item and returns it for programmatic population. */
  add(): V {
    this.assertMutable();
    const item = this.createItem();
    this.storage = [...this.storage, item];
    this.parsed = true;
    return item;
  }

  override describe(): string {
    return `list(${this.itemShape})`;
  }

  override parseFromNode(node: DocumentNode, context: BindContext): void {
    this.assertMutable();
    this.storage = node.getChildren(this.itemName).map((child) => {
      const item = this.createItem();
      item.parseFromNode(child, context);
      return item;
    });
    this.parsed = true;
  }

  override freeze(): void {
    super.freeze();
    for (const item of this.storage) {
      item.freeze();
    }
  }

  protected adopt(source: AnyValue): boolean {
    const incoming = source.value;
    if (!Array.isArray(incoming)) {
      return false;
    }
    const copies: V[] = [];
    for (const entry of incoming) {
      if (!(entry instanceof Value)) {
        return false;
      }
      const item = this.createItem();
      if (!item.parseFromValue(entry).ok) {
        return false;
      }
      copies.push(item);
    }
    this.storage = copies;
    return true;
  }

  protected convert(text: string): V[] {
    return text
      .split(",")
      .map((segment) => segment.trim())
      .filter((segment) => segment.length > 0)
      .map((segment) => {
        const item = this.createItem();
        item.parseFromAttribute(segment);
        return item;
      });
  }

  protected render(indent: number): string {
    if (this.storage.some((item) => item.kind === ValueKind.Object)) {
      return this.storage.map((item) => item.toString(indent)).join("\n");
    }
    return this.storage.map((item) => item.toString()).join(", ");
  }
}

export function isListValue(value: ReadonlyValue<unknown>): value is ListValue<AnyValue> {
  return value instanceof ListValue;
}
