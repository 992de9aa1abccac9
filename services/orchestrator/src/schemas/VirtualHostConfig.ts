import { ConfigNode, type ReadonlyConfigNode } from "../tree/ConfigNode.js";
import {
  ListValue,
  ObjectValue,
  StringValue,
  type ReadonlyListValue,
  type ReadonlyObjectValue,
  type ReadonlyValue,
} from "../values/index.js";
import { ApplicationConfig, type ReadonlyApplicationConfig } from "./ApplicationConfig.js";
import { HostConfig, type ReadonlyHostConfig } from "./HostConfig.js";

export interface ReadonlyVirtualHostConfig extends ReadonlyConfigNode {
  readonly name: ReadonlyValue<string>;
  readonly distribution: ReadonlyValue<string>;
  readonly host: ReadonlyObjectValue<ReadonlyHostConfig>;
  readonly applications: ReadonlyListValue<ReadonlyObjectValue<ReadonlyApplicationConfig>>;
}

export class VirtualHostConfig extends ConfigNode implements ReadonlyVirtualHostConfig {
  readonly tag = "VirtualHost";
  readonly name = this.define("Name", new StringValue());
  readonly distribution = this.define("Distribution", new StringValue());
  readonly host = this.define("Host", new ObjectValue(() => new HostConfig()));
  readonly applications = this.define(
    "Applications",
    new ListValue("Application", () => new ObjectValue(() => new ApplicationConfig())),
  );

  protected spawn(): VirtualHostConfig {
    return new VirtualHostConfig();
  }

  /** Mutable deep copy carrying the same parsed flags. */
  copy(): VirtualHostConfig {
    const copy = new VirtualHostConfig();
    copy.layer(this);
    return copy;
  }
}
