import { ConfigNode, type ReadonlyConfigNode } from "../tree/ConfigNode.js";
import {
  ListValue,
  StringValue,
  type ReadonlyListValue,
  type ReadonlyValue,
} from "../values/index.js";

export interface ReadonlyHostConfig extends ReadonlyConfigNode {
  readonly names: ReadonlyListValue<ReadonlyValue<string>>;
}

/** Domain names a listener or virtual host answers for. */
export class HostConfig extends ConfigNode implements ReadonlyHostConfig {
  readonly tag = "Host";
  readonly names = this.define("Names", new ListValue("Name", () => new StringValue()));

  protected spawn(): HostConfig {
    return new HostConfig();
  }
}

/** Trimmed, lower-cased and de-duplicated names of a host section. */
export function hostNamesOf(host: ReadonlyHostConfig): string[] {
  const names = host.names.items
    .map((name) => name.value.trim().toLowerCase())
    .filter((name) => name.length > 0);
  return [...new Set(names)];
}
