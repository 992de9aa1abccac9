import { Value, ValueKind, type AnyValue } from "./Value.js";

export class StringValue extends Value<string> {
  readonly kind = ValueKind.String;

  constructor() {
    super(() => "");
  }

  protected adopt(source: AnyValue): boolean {
    const incoming = source.value;
    if (typeof incoming !== "string") {
      return false;
    }
    this.storage = incoming;
    return true;
  }

  protected convert(text: string): string {
    return text;
  }

  protected render(): string {
    return this.storage;
  }
}
