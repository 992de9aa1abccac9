import { toBool } from "./converters.js";
import { Value, ValueKind, type AnyValue } from "./Value.js";

export class BooleanValue extends Value<boolean> {
  readonly kind = ValueKind.Boolean;

  constructor() {
    super(() => false);
  }

  protected adopt(source: AnyValue): boolean {
    const incoming = source.value;
    if (typeof incoming !== "boolean") {
      return false;
    }
    this.storage = incoming;
    return true;
  }

  protected convert(text: string): boolean {
    return toBool(text);
  }

  protected render(): string {
    return this.storage ? "true" : "false";
  }
}
