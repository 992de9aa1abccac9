import { FrozenMutationError, type AnyValue, type ReadonlyValue } from "../values/Value.js";
import { renderText } from "./Serializer.js";

export type LayerMismatch = {
  field: string;
  expected: string;
  actual: string;
};

/**
 * Read side of a configuration section. Node classes extend this with their
 * typed fields so that published trees can only be read.
 */
export interface ReadonlyConfigNode {
  readonly tag: string;
  isParsed(): boolean;
  isReadOnly(): boolean;
  fields(): IterableIterator<[string, ReadonlyValue<unknown>]>;
  toString(indent?: number, appendNewLine?: boolean): string;
}

/**
 * A configuration section whose fields are fixed by the subclass. Fields are
 * registered with `define` from property initializers, so declaration order is
 * document and serialization order.
 */
export abstract class ConfigNode implements ReadonlyConfigNode {
  abstract readonly tag: string;

  private readonly values = new Map<string, AnyValue>();
  private parsed = false;
  private readOnly = false;

  protected define<V extends AnyValue>(name: string, value: V): V {
    if (this.values.has(name)) {
      throw new Error(`Configuration field ${name} is defined twice`);
    }
    this.values.set(name, value);
    return value;
  }

  /** Fresh, unbound node of the same class; used as include scratch space. */
  protected abstract spawn(): ConfigNode;

  createEmpty(): ConfigNode {
    return this.spawn();
  }

  fields(): IterableIterator<[string, AnyValue]> {
    return this.values.entries();
  }

  field(name: string): AnyValue | undefined {
    return this.values.get(name);
  }

  isParsed(): boolean {
    return this.parsed;
  }

  isReadOnly(): boolean {
    return this.readOnly;
  }

  markParsed(): void {
    this.assertMutable();
    this.parsed = true;
  }

  reset(): void {
    this.assertMutable();
    for (const value of this.values.values()) {
      value.reset();
    }
    this.parsed = false;
  }

  freeze(): this {
    if (this.readOnly) {
      return this;
    }
    this.readOnly = true;
    for (const value of this.values.values()) {
      value.freeze();
    }
    return this;
  }

  isLayerSource(candidate: unknown): candidate is ConfigNode {
    return candidate instanceof ConfigNode && candidate.tag === this.tag;
  }

  /**
   * Copies every parsed field of `source` onto this node. A field whose shape
   * does not match is left untouched and reported; the others still apply.
   */
  layer(source: ConfigNode): LayerMismatch[] {
    this.assertMutable();
    const mismatches: LayerMismatch[] = [];
    for (const [name, incoming] of source.fields()) {
      const target = this.values.get(name);
      if (!target || !incoming.isParsed()) {
        continue;
      }
      const result = target.parseFromValue(incoming);
      if (!result.ok) {
        mismatches.push({ field: name, expected: result.expected, actual: result.actual });
      }
    }
    if (source.isParsed()) {
      this.parsed = true;
    }
    return mismatches;
  }

  toString(indent = 0, appendNewLine = false): string {
    return renderText(this, { indent, appendNewLine });
  }

  private assertMutable(): void {
    if (this.readOnly) {
      throw new FrozenMutationError(`<${this.tag}> node`);
    }
  }
}
