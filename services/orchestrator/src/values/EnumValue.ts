import { Value, ValueKind, type AnyValue } from "./Value.js";

/**
 * Closed set of string choices. The first choice is the default; matching is
 * case-insensitive and stores the declared spelling.
 */
export class EnumValue<C extends string> extends Value<C> {
  readonly kind = ValueKind.Enum;

  constructor(readonly choices: readonly [C, ...C[]]) {
    super(() => choices[0]);
  }

  override describe(): string {
    return `enum(${this.choices.join("|")})`;
  }

  protected adopt(source: AnyValue): boolean {
    const incoming = source.value;
    const match = this.choices.find((choice) => choice === incoming);
    if (match === undefined) {
      return false;
    }
    this.storage = match;
    return true;
  }

  protected convert(text: string): C {
    const token = text.trim().toLowerCase();
    return this.choices.find((choice) => choice.toLowerCase() === token) ?? this.choices[0];
  }

  protected render(): string {
    return this.storage;
  }
}
