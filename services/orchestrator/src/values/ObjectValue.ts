import type { DocumentNode } from "../document/DocumentNode.js";
import type { ConfigNode } from "../tree/ConfigNode.js";
import { Value, ValueKind, type AnyValue, type BindContext, type ReadonlyValue } from "./Value.js";

export interface ReadonlyObjectValue<R> {
  readonly kind: ValueKind;
  readonly node: R;
  isParsed(): boolean;
  isReadOnly(): boolean;
  toString(indent?: number, appendNewLine?: boolean): string;
}

/**
 * A nested configuration section. Element binding merges into the current
 * node, so values layered in from an include survive unless set locally.
 */
export class ObjectValue<N extends ConfigNode> extends Value<N> {
  readonly kind = ValueKind.Object;

  constructor(private readonly createNode: () => N) {
    super(createNode);
  }

  get node(): N {
    return this.storage;
  }

  override describe(): string {
    return `object(${this.storage.tag})`;
  }

  override parseFromNode(node: DocumentNode, context: BindContext): void {
    this.assertMutable();
    context.bindNode(node, this.storage);
    this.parsed = true;
  }

  override freeze(): void {
    super.freeze();
    this.storage.freeze();
  }

  protected adopt(source: AnyValue): boolean {
    const incoming = source.value;
    const copy = this.createNode();
    if (!copy.isLayerSource(incoming) || copy.layer(incoming).length > 0) {
      return false;
    }
    this.storage = copy;
    return true;
  }

  protected convert(): N {
    return this.createNode();
  }

  protected render(indent: number): string {
    return this.storage.toString(indent);
  }
}

export function isObjectValue(value: ReadonlyValue<unknown>): value is ObjectValue<ConfigNode> {
  return value instanceof ObjectValue;
}
