import { toFloat, toInteger } from "./converters.js";
import { Value, ValueKind, type AnyValue } from "./Value.js";

export class IntegerValue extends Value<number> {
  readonly kind = ValueKind.Integer;

  constructor() {
    super(() => 0);
  }

  protected adopt(source: AnyValue): boolean {
    const incoming = source.value;
    if (typeof incoming !== "number" || !Number.isSafeInteger(incoming)) {
      return false;
    }
    this.storage = incoming;
    return true;
  }

  protected convert(text: string): number {
    return toInteger(text);
  }

  protected render(): string {
    return String(this.storage);
  }
}

export class FloatValue extends Value<number> {
  readonly kind = ValueKind.Float;

  constructor() {
    super(() => 0);
  }

  protected adopt(source: AnyValue): boolean {
    const incoming = source.value;
    if (typeof incoming !== "number" || !Number.isFinite(incoming)) {
      return false;
    }
    this.storage = incoming;
    return true;
  }

  protected convert(text: string): number {
    return toFloat(text);
  }

  protected render(): string {
    return String(this.storage);
  }
}
